import React from 'react'
import { Box, Text, useInput } from 'ink'

interface HelpScreenProps {
  onClose: () => void
}

export const HelpScreen = ({ onClose }: HelpScreenProps) => {
  useInput((input, key) => {
    if (key.escape || input === 'q' || input === '?') {
      onClose()
    }
  })

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold color="cyan">Expense TUI - Keyboard Shortcuts</Text>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Expense List</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Text color="cyan" bold>j/k</Text> or <Text color="cyan" bold>↑/↓</Text>   Navigate up/down</Text>
          <Text><Text color="cyan" bold>G</Text>           Jump to last item</Text>
          <Text><Text color="cyan" bold>gg</Text>          Jump to first item</Text>
          <Text><Text color="cyan" bold>Ctrl+d/u</Text>    Half-page down/up</Text>
          <Text><Text color="cyan" bold>PgDn/PgUp</Text>   Full page down/up</Text>
          <Text><Text color="cyan" bold>/</Text>           Search all fields (live)</Text>
          <Text><Text color="cyan" bold>c</Text>           Cycle category filter</Text>
          <Text><Text color="cyan" bold>d</Text>           Set date range (YYYY-MM-DD..YYYY-MM-DD)</Text>
          <Text><Text color="cyan" bold>x</Text>           Clear all filters</Text>
          <Text><Text color="cyan" bold>a</Text>           Add an expense</Text>
          <Text><Text color="cyan" bold>s</Text>           Summary and forecast</Text>
          <Text><Text color="cyan" bold>r</Text>           Reload the expense file</Text>
        </Box>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Add Expense</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Text color="cyan" bold>Tab/↓</Text>       Next field</Text>
          <Text><Text color="cyan" bold>Shift+Tab/↑</Text> Previous field</Text>
          <Text><Text color="cyan" bold>Enter</Text>       Save expense</Text>
          <Text><Text color="cyan" bold>Esc</Text>         Cancel</Text>
        </Box>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Summary</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text dimColor>Totals follow the filters active in the list.</Text>
          <Text><Text color="cyan" bold>Esc/s</Text>       Back to the list</Text>
        </Box>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Global</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Text color="cyan" bold>?</Text>           Show this help</Text>
          <Text><Text color="cyan" bold>q</Text>           Quit</Text>
        </Box>
      </Box>

      <Box marginTop={2}>
        <Text dimColor>Press Esc or ? to close</Text>
      </Box>
    </Box>
  )
}

import React from 'react'
import { Box, Text } from 'ink'

interface StatusBarProps {
  title: string
  expenseCount: number
  shownCount: number
  totalLabel: string
  rejectedCount?: number
}

export const StatusBar = ({
  title,
  expenseCount,
  shownCount,
  totalLabel,
  rejectedCount = 0,
}: StatusBarProps) => (
  <Box
    borderStyle="single"
    borderColor="gray"
    paddingX={1}
    justifyContent="space-between"
  >
    <Text>
      <Text bold color="green">
        {title}
      </Text>
    </Text>
    <Box gap={2}>
      {rejectedCount > 0 && (
        <Text color="yellow">{rejectedCount} skipped</Text>
      )}
      <Text dimColor>
        {shownCount !== expenseCount && `${shownCount} of `}
        {expenseCount} expenses · <Text color="cyan">{totalLabel}</Text>
      </Text>
    </Box>
  </Box>
)

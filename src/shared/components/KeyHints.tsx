import React from 'react'
import { Box, Text } from 'ink'

export interface KeyHint {
  key: string
  label: string
}

interface KeyHintsProps {
  hints: readonly KeyHint[]
  /** Extra text shown after the hints, e.g. where changes are saved */
  note?: string
}

export const KeyHints = ({ hints, note }: KeyHintsProps) => (
  <Box marginTop={1} gap={2} flexWrap="wrap">
    {hints.map(({ key, label }) => (
      <Box key={key} gap={1}>
        <Text color="cyan" bold>
          {key}
        </Text>
        <Text dimColor>{label}</Text>
      </Box>
    ))}
    {note && <Text dimColor italic>{note}</Text>}
  </Box>
)

import React from 'react'
import { Box, Text } from 'ink'
import type { ExpenseRecord } from './expense-types.js'

interface ExpenseRowProps {
  expense: ExpenseRecord
  amountLabel: string
  isSelected: boolean
}

export const ExpenseRow = ({ expense, amountLabel, isSelected }: ExpenseRowProps) => (
  <Box gap={1}>
    {/* Selection indicator */}
    <Text color={isSelected ? 'cyan' : undefined}>
      {isSelected ? '▶' : ' '}
    </Text>

    <Box width={10}>
      <Text dimColor>{expense.date}</Text>
    </Box>

    <Box width={18}>
      <Text color="green">{expense.category.slice(0, 17)}</Text>
    </Box>

    <Box width={14} justifyContent="flex-end">
      <Text color="red">{amountLabel}</Text>
    </Box>

    <Box width={36}>
      <Text bold={isSelected}>{expense.description.slice(0, 35)}</Text>
    </Box>
  </Box>
)

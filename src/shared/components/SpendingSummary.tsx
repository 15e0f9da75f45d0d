import React from 'react'
import { Box, Text } from 'ink'
import type { CategoryTotal } from '../../reporting/index.js'
import { formatMoney } from '../../cli/output.js'

interface SpendingSummaryProps {
  totalSpent: number
  averageMonthly: number | null
  topCategory: CategoryTotal | null
  currency: string
}

export const SpendingSummary = ({ totalSpent, averageMonthly, topCategory, currency }: SpendingSummaryProps) => (
  <Box paddingX={1} gap={3} borderStyle="single" borderColor="gray" borderTop={false} borderLeft={false} borderRight={false}>
    <Box gap={1}>
      <Text dimColor>Spent:</Text>
      <Text color="red" bold>{formatMoney(totalSpent, currency)}</Text>
    </Box>

    {averageMonthly !== null && (
      <Box gap={1}>
        <Text dimColor>Avg/month:</Text>
        <Text bold>{formatMoney(averageMonthly, currency)}</Text>
      </Box>
    )}

    {topCategory && (
      <Box gap={1}>
        <Text dimColor>Top:</Text>
        <Text color="yellow">{topCategory.category.slice(0, 12)}</Text>
        <Text dimColor>({topCategory.percentOfTotal.toFixed(1)}%)</Text>
      </Box>
    )}
  </Box>
)

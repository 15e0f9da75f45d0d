import React, { useMemo } from 'react'
import { Box, Text, useInput } from 'ink'
import { useAtomValue, useSetAtom } from 'jotai'
import { createSummaryAtom } from '../expenses/expense-atoms.js'
import { goBackAtom } from '../navigation/navigation-atoms.js'
import { renderTextBar } from './charts.js'
import { formatMoney } from '../cli/output.js'
import { describeFilters, formatForecastLine } from '../cli/commands/summary.js'
import { SpendingSummary } from '../shared/components/SpendingSummary.js'
import { KeyHints } from '../shared/components/KeyHints.js'

interface SummaryScreenProps {
  currency: string
  topLimit: number
}

const BAR_WIDTH = 24

export const SummaryScreen = ({ currency, topLimit }: SummaryScreenProps) => {
  const summaryAtom = useMemo(() => createSummaryAtom(topLimit), [topLimit])
  const report = useAtomValue(summaryAtom)
  const goBack = useSetAtom(goBackAtom)

  useInput((input, key) => {
    if (key.escape || input === 'q' || input === 's') {
      goBack()
    }
  })

  const money = (amount: number) => formatMoney(amount, currency)
  const filters = describeFilters(report.filters)
  const maxCategory = Math.max(0, ...report.categories.map((c) => c.total))
  const maxMonth = Math.max(0, ...report.months.map((m) => m.total))

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold color="cyan">Spending Summary</Text>
      {filters && <Text dimColor>Filters: {filters}</Text>}

      <SpendingSummary
        totalSpent={report.summary.totalSpent}
        averageMonthly={report.summary.averageMonthly}
        topCategory={report.categories[0] ?? null}
        currency={currency}
      />

      {report.summary.expenseCount === 0 ? (
        <Box marginTop={1}>
          <Text color="yellow">No expenses to summarize.</Text>
        </Box>
      ) : (
        <>
          <Box marginTop={1} flexDirection="column">
            <Text bold>By Category</Text>
            {report.categories.map((c) => (
              <Box key={c.category} gap={1}>
                <Box width={18}>
                  <Text>{c.category.slice(0, 17)}</Text>
                </Box>
                <Box width={14} justifyContent="flex-end">
                  <Text>{money(c.total)}</Text>
                </Box>
                <Text color="green">{renderTextBar(c.total, maxCategory, BAR_WIDTH)}</Text>
                <Text dimColor>{c.percentOfTotal.toFixed(1)}%</Text>
              </Box>
            ))}
          </Box>

          <Box marginTop={1} flexDirection="column">
            <Text bold>By Month</Text>
            {report.months.map((m) => (
              <Box key={m.month} gap={1}>
                <Box width={18}>
                  <Text>{m.month}</Text>
                </Box>
                <Box width={14} justifyContent="flex-end">
                  <Text>{money(m.total)}</Text>
                </Box>
                <Text color="cyan">{renderTextBar(m.total, maxMonth, BAR_WIDTH)}</Text>
                <Text dimColor>{m.count}</Text>
              </Box>
            ))}
          </Box>

          <Box marginTop={1} flexDirection="column">
            <Text bold>Top {report.topExpenses.length} Expenses</Text>
            {report.topExpenses.map((e, i) => (
              <Box key={i} gap={1}>
                <Box width={10}>
                  <Text dimColor>{e.date}</Text>
                </Box>
                <Box width={18}>
                  <Text color="green">{e.category.slice(0, 17)}</Text>
                </Box>
                <Box width={14} justifyContent="flex-end">
                  <Text color="red">{money(e.amount)}</Text>
                </Box>
                <Text>{e.description.slice(0, 30)}</Text>
              </Box>
            ))}
          </Box>
        </>
      )}

      <Box marginTop={1}>
        <Text color={report.forecast.success ? 'magenta' : 'gray'}>
          {formatForecastLine(report.forecast, currency)}
        </Text>
      </Box>

      <KeyHints hints={[{ key: 'Esc/s', label: 'back' }]} note="Totals follow the filters set in the list" />
    </Box>
  )
}

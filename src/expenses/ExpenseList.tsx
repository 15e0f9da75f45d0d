import React, { useState } from 'react'
import { Box, Text, useInput, useApp } from 'ink'
import TextInput from 'ink-text-input'
import { useAtom, useAtomValue, useSetAtom } from 'jotai'
import {
  expensesAtom,
  filteredExpensesAtom,
  filtersAtom,
  rejectedRowsAtom,
  searchQueryAtom,
  categoryFilterAtom,
  dateRangeAtom,
  cycleCategoryAtom,
  clearFiltersAtom,
  isLoadingAtom,
  errorAtom,
} from './expense-atoms.js'
import { formatDateRange, parseDateRangeInput } from './date-range-input.js'
import { ExpenseRow } from './ExpenseRow.js'
import { navigateAtom } from '../navigation/navigation-atoms.js'
import { totalAmount } from '../reporting/index.js'
import { formatMoney } from '../cli/output.js'
import { useListNavigation } from '../shared/hooks/useListNavigation.js'
import { KeyHints } from '../shared/components/KeyHints.js'
import { StatusBar } from '../shared/components/StatusBar.js'

type InputMode = 'browse' | 'search' | 'range'

interface ExpenseListProps {
  title: string
  currency: string
  pageSize: number
  onReload: () => Promise<void>
}

export const ExpenseList = ({ title, currency, pageSize, onReload }: ExpenseListProps) => {
  const { exit } = useApp()
  const expenses = useAtomValue(filteredExpensesAtom)
  const allExpenses = useAtomValue(expensesAtom)
  const filters = useAtomValue(filtersAtom)
  const rejected = useAtomValue(rejectedRowsAtom)
  const [searchQuery, setSearchQuery] = useAtom(searchQueryAtom)
  const categoryFilter = useAtomValue(categoryFilterAtom)
  const [dateRange, setDateRange] = useAtom(dateRangeAtom)
  const cycleCategory = useSetAtom(cycleCategoryAtom)
  const clearFilters = useSetAtom(clearFiltersAtom)
  const isLoading = useAtomValue(isLoadingAtom)
  const error = useAtomValue(errorAtom)
  const navigate = useSetAtom(navigateAtom)

  const [mode, setMode] = useState<InputMode>('browse')
  const [rangeDraft, setRangeDraft] = useState('')
  const [rangeError, setRangeError] = useState<string | null>(null)

  // Selection goes back to the top whenever the filters change
  const { visibleRange, positionDisplay, isSelected } = useListNavigation({
    itemCount: expenses.length,
    viewportSize: pageSize,
    enabled: mode === 'browse',
    resetKey: filters,
  })

  useInput(
    (input, key) => {
      if (key.ctrl) return

      if (input === '/') {
        setMode('search')
      } else if (input === 'd') {
        setRangeDraft(dateRange ? formatDateRange(dateRange) : '')
        setRangeError(null)
        setMode('range')
      } else if (input === 'c') {
        cycleCategory()
      } else if (input === 'x') {
        clearFilters()
      } else if (input === 'a') {
        navigate('add')
      } else if (input === 's') {
        navigate('summary')
      } else if (input === 'r') {
        void onReload()
      } else if (input === '?') {
        navigate('help')
      } else if (input === 'q') {
        exit()
      }
    },
    { isActive: mode === 'browse' }
  )

  // Escape leaves an input without applying a pending range
  useInput(
    (_input, key) => {
      if (key.escape) {
        setMode('browse')
      }
    },
    { isActive: mode !== 'browse' }
  )

  const submitRange = (text: string) => {
    if (!text.trim()) {
      setDateRange(null)
      setMode('browse')
      return
    }
    try {
      setDateRange(parseDateRangeInput(text))
      setRangeError(null)
      setMode('browse')
    } catch (err) {
      setRangeError(err instanceof Error ? err.message : String(err))
    }
  }

  if (isLoading) {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color="cyan">Loading expenses...</Text>
      </Box>
    )
  }

  return (
    <Box flexDirection="column">
      <StatusBar
        title={title}
        expenseCount={allExpenses.length}
        shownCount={expenses.length}
        totalLabel={formatMoney(totalAmount(expenses), currency)}
        rejectedCount={rejected.length}
      />

      {error && (
        <Box paddingX={1}>
          <Text color="red">{error}</Text>
        </Box>
      )}

      {/* Filter bar */}
      <Box paddingX={1} gap={2}>
        <Text>
          Category: <Text color={categoryFilter === null ? 'gray' : 'yellow'}>{categoryFilter ?? 'All'}</Text>
        </Text>
        <Text>
          Dates: <Text color={dateRange ? 'yellow' : 'gray'}>{dateRange ? formatDateRange(dateRange) : 'Any'}</Text>
        </Text>
        {mode !== 'search' && searchQuery && (
          <Text>
            Search: <Text color="yellow">{searchQuery}</Text>
          </Text>
        )}
        <Text dimColor>{expenses.length > 0 ? positionDisplay : 'No expenses'}</Text>
      </Box>

      {mode === 'search' && (
        <Box paddingX={1}>
          <Text color="cyan">/ </Text>
          <TextInput
            value={searchQuery}
            onChange={setSearchQuery}
            onSubmit={() => setMode('browse')}
            placeholder="keyword"
          />
        </Box>
      )}

      {mode === 'range' && (
        <Box paddingX={1} flexDirection="column">
          <Box>
            <Text color="cyan">Range: </Text>
            <TextInput
              value={rangeDraft}
              onChange={setRangeDraft}
              onSubmit={submitRange}
              placeholder="YYYY-MM-DD..YYYY-MM-DD (empty clears)"
            />
          </Box>
          {rangeError && <Text color="red">{rangeError}</Text>}
        </Box>
      )}

      {/* Header */}
      <Box paddingX={1} gap={1} marginTop={1}>
        <Text dimColor> </Text>
        <Box width={10}>
          <Text dimColor bold>Date</Text>
        </Box>
        <Box width={18}>
          <Text dimColor bold>Category</Text>
        </Box>
        <Box width={14} justifyContent="flex-end">
          <Text dimColor bold>Amount</Text>
        </Box>
        <Box width={36}>
          <Text dimColor bold>Description</Text>
        </Box>
      </Box>

      {/* Expense list */}
      <Box flexDirection="column" paddingX={1}>
        {expenses.length === 0 ? (
          <Box marginY={1}>
            <Text color="yellow">
              {allExpenses.length === 0
                ? 'No expenses yet. Press a to add one.'
                : 'No expenses match the current filters.'}
            </Text>
          </Box>
        ) : (
          expenses.slice(visibleRange.start, visibleRange.end).map((expense, viewportIndex) => {
            const actualIndex = visibleRange.start + viewportIndex
            return (
              <ExpenseRow
                key={actualIndex}
                expense={expense}
                amountLabel={formatMoney(expense.amount, currency)}
                isSelected={isSelected(actualIndex)}
              />
            )
          })
        )}
      </Box>

      <KeyHints
        hints={
          mode === 'browse'
            ? [
                { key: 'j/k', label: 'nav' },
                { key: '/', label: 'search' },
                { key: 'c', label: 'category' },
                { key: 'd', label: 'dates' },
                { key: 'x', label: 'clear' },
                { key: 'a', label: 'add' },
                { key: 's', label: 'summary' },
                { key: 'r', label: 'reload' },
                { key: '?', label: 'help' },
                { key: 'q', label: 'quit' },
              ]
            : [
                { key: 'Enter', label: 'apply' },
                { key: 'Esc', label: 'back' },
              ]
        }
      />
    </Box>
  )
}

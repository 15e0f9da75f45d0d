import type { ListOptions } from '../args.js'
import { sortNewestFirst, type ExpenseRecord } from '../../expenses/expense-types.js'
import { applyFilters } from '../../reporting/index.js'
import { formatMoney, formatTable, reportError } from '../output.js'
import { createContext, loadRecords, toExpenseOutput, toFilters, type ExpenseOutput } from './context.js'

interface ListResult {
  success: boolean
  count: number
  total: number
  expenses: ExpenseOutput[]
  formatted?: string
}

export const formatExpenseTable = (expenses: readonly ExpenseOutput[]): string => {
  const headers = ['Date', 'Category', 'Amount', 'Description']
  const rows = expenses.map((e) => [
    e.date,
    e.category.slice(0, 20),
    e.amountFormatted,
    e.description.slice(0, 40),
  ])
  return formatTable(headers, rows)
}

export const listCommand = async (options: ListOptions): Promise<void> => {
  const context = await createContext(options)
  const { formatter, config } = context
  const records = await loadRecords(context)

  let filtered: ExpenseRecord[]
  try {
    filtered = applyFilters(records, toFilters(options))
  } catch (err) {
    return reportError(formatter, err)
  }

  const currency = config.display.currency
  const expenses = sortNewestFirst(filtered)
    .slice(0, options.limit)
    .map((record) => toExpenseOutput(record, (amount) => formatMoney(amount, currency)))

  const result: ListResult = {
    success: true,
    count: expenses.length,
    total: filtered.length,
    expenses,
  }

  // Add formatted text for text mode
  if (options.format === 'text') {
    if (expenses.length === 0) {
      result.formatted = 'No expenses found.'
    } else {
      const shown = result.count < result.total ? ` (showing ${result.count})` : ''
      result.formatted = `Found ${result.total} expenses${shown}:\n\n${formatExpenseTable(expenses)}`
    }
  }

  formatter.success(result)
}

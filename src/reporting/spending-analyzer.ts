import type { ExpenseRecord } from '../expenses/expense-types.js'
import { byCategory, byMonth, filterByCategory, filterByDateRange, search, topN, totalAmount } from './aggregator.js'
import { predictNext } from './forecaster.js'
import type { CategorySummary, DateRange, ForecastResult, MonthlySummary } from './types.js'

/**
 * Filters applied before aggregation, in the order category, date range, keyword.
 */
export interface ExpenseFilters {
  category?: string
  range?: DateRange
  keyword?: string
}

/**
 * Spending total for one category.
 *
 * @example
 * const food: CategoryTotal = { category: 'Food', total: 8000, percentOfTotal: 13.8 }
 */
export interface CategoryTotal {
  category: string
  total: number
  /** Share of all spending, one decimal place */
  percentOfTotal: number
}

export interface SpendingReport {
  /** ISO timestamp when the report was generated */
  generatedAt: string
  filters: ExpenseFilters
  summary: {
    totalSpent: number
    expenseCount: number
    categoryCount: number
    monthCount: number
    /** Average per month present in the data (null with no data) */
    averageMonthly: number | null
  }
  /** Category totals in first-appearance order */
  categories: CategoryTotal[]
  months: MonthlySummary
  topExpenses: ExpenseRecord[]
  forecast: ForecastResult
}

export interface AnalyzerInput {
  records: readonly ExpenseRecord[]
  filters?: ExpenseFilters
  /** Number of top expenses to include (default: 10) */
  topLimit?: number
  /** Clock for generatedAt, for reproducible output */
  now?: Date
}

/**
 * Applies category, date range and keyword filters in that order.
 * Throws a ValidationError for a malformed or inverted date range.
 */
export const applyFilters = (
  records: readonly ExpenseRecord[],
  filters: ExpenseFilters
): ExpenseRecord[] => {
  let result = [...records]
  if (filters.category !== undefined) {
    result = filterByCategory(result, filters.category)
  }
  if (filters.range) {
    result = filterByDateRange(result, filters.range.start, filters.range.end)
  }
  if (filters.keyword) {
    result = search(result, filters.keyword)
  }
  return result
}

/**
 * Converts a category summary into totals with their share of spending.
 */
export const toCategoryTotals = (summary: CategorySummary): CategoryTotal[] => {
  const total = [...summary.values()].reduce((sum, value) => sum + value, 0)
  const divisor = total || 1 // Prevent division by zero

  return [...summary.entries()].map(([category, value]) => ({
    category,
    total: value,
    percentOfTotal: Math.round((value / divisor) * 1000) / 10,
  }))
}

/**
 * Main entry point: filters records and builds every summary used by the
 * CLI, the TUI summary screen and the report emitters.
 */
export const analyzeSpending = ({
  records,
  filters = {},
  topLimit = 10,
  now = new Date(),
}: AnalyzerInput): SpendingReport => {
  const filtered = applyFilters(records, filters)
  const months = byMonth(filtered)
  const categories = toCategoryTotals(byCategory(filtered))
  const totalSpent = totalAmount(filtered)

  return {
    generatedAt: now.toISOString(),
    filters,
    summary: {
      totalSpent,
      expenseCount: filtered.length,
      categoryCount: categories.length,
      monthCount: months.length,
      averageMonthly: months.length > 0 ? Math.round(totalSpent / months.length) : null,
    },
    categories,
    months,
    topExpenses: topN(filtered, topLimit),
    forecast: predictNext(months),
  }
}

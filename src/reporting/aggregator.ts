import {
  ValidationError,
  formatAmountValue,
  getMonthKey,
  isValidIsoDate,
  type ExpenseRecord,
} from '../expenses/expense-types.js'
import type { CategorySummary, DateRange, MonthlySummary, MonthlyTotal } from './types.js'

/**
 * Sums all amounts.
 */
export const totalAmount = (records: readonly ExpenseRecord[]): number =>
  records.reduce((sum, record) => sum + record.amount, 0)

/**
 * Aggregates spending by category.
 * Keys compare exactly (no case folding) and keep first-appearance order.
 *
 * @example
 * byCategory(records) // => Map { 'Food' => 8000, 'Rent' => 50000 }
 */
export const byCategory = (records: readonly ExpenseRecord[]): CategorySummary => {
  const summary: CategorySummary = new Map()

  for (const record of records) {
    summary.set(record.category, (summary.get(record.category) ?? 0) + record.amount)
  }

  return summary
}

/**
 * Aggregates spending by calendar month, oldest first.
 * Month keys are YYYY-MM so string comparison sorts chronologically.
 */
export const byMonth = (records: readonly ExpenseRecord[]): MonthlySummary => {
  const accumulator = new Map<string, MonthlyTotal>()

  for (const record of records) {
    const month = getMonthKey(record.date)
    const entry = accumulator.get(month)
    if (entry) {
      entry.total += record.amount
      entry.count += 1
    } else {
      accumulator.set(month, { month, total: record.amount, count: 1 })
    }
  }

  return [...accumulator.values()].sort((a, b) => (a.month < b.month ? -1 : a.month > b.month ? 1 : 0))
}

/**
 * Returns the n largest expenses, highest first.
 * Array.prototype.sort is stable, so equal amounts keep their input order.
 */
export const topN = (records: readonly ExpenseRecord[], n: number): ExpenseRecord[] => {
  const limit = Math.floor(n)
  if (!(limit > 0)) return []

  return [...records].sort((a, b) => b.amount - a.amount).slice(0, limit)
}

const searchableFields = (record: ExpenseRecord): string[] => [
  record.date,
  record.category,
  formatAmountValue(record.amount),
  record.description,
]

/**
 * Case-insensitive substring search across every field.
 * An empty keyword matches everything.
 */
export const search = (records: readonly ExpenseRecord[], keyword: string): ExpenseRecord[] => {
  const needle = keyword.toLowerCase()
  return records.filter((record) =>
    searchableFields(record).some((field) => field.toLowerCase().includes(needle))
  )
}

/**
 * Keeps records whose category matches exactly.
 */
export const filterByCategory = (
  records: readonly ExpenseRecord[],
  category: string
): ExpenseRecord[] => records.filter((record) => record.category === category)

/**
 * Validates a date range, throwing a ValidationError on bad input.
 */
export const assertDateRange = ({ start, end }: DateRange): void => {
  if (!isValidIsoDate(start)) {
    throw new ValidationError('BadDate', `Invalid start date "${start}" (expected YYYY-MM-DD)`)
  }
  if (!isValidIsoDate(end)) {
    throw new ValidationError('BadDate', `Invalid end date "${end}" (expected YYYY-MM-DD)`)
  }
  if (start > end) {
    throw new ValidationError('BadRange', `Start date ${start} is after end date ${end}`)
  }
}

/**
 * Keeps records dated within [start, end], both ends inclusive.
 * Uses string comparison on YYYY-MM-DD to avoid timezone issues.
 */
export const filterByDateRange = (
  records: readonly ExpenseRecord[],
  start: string,
  end: string
): ExpenseRecord[] => {
  assertDateRange({ start, end })
  return records.filter((record) => record.date >= start && record.date <= end)
}

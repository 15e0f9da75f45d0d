import type { ExpenseRecord } from '../expenses/expense-types.js'
import type { MonthlyTotal } from '../reporting/types.js'

/**
 * Creates a mock ExpenseRecord with sensible defaults
 */
export const createMockExpense = (overrides: Partial<ExpenseRecord> = {}): ExpenseRecord => ({
  date: '2024-01-15',
  category: 'Food',
  amount: 1000, // 10.00 in minor units
  description: 'Test expense',
  ...overrides,
})

/**
 * Creates a monthly summary from [month, total] pairs
 */
export const createMonthlySummary = (entries: Array<[string, number]>): MonthlyTotal[] =>
  entries.map(([month, total]) => ({ month, total, count: 1 }))

import { describe, it, expect, beforeEach } from 'vitest'
import { createStore } from 'jotai'
import {
  expensesAtom,
  searchQueryAtom,
  categoryFilterAtom,
  dateRangeAtom,
  filtersAtom,
  filteredExpensesAtom,
  categoriesAtom,
  createSummaryAtom,
  cycleCategoryAtom,
  clearFiltersAtom,
} from '../expense-atoms.js'
import { createMockExpense } from '../../test-utils/fixtures.js'

const records = [
  createMockExpense({ date: '2024-01-10', category: 'Food', amount: 1500, description: 'Groceries' }),
  createMockExpense({ date: '2024-01-20', category: 'Transport', amount: 300, description: 'Bus pass' }),
  createMockExpense({ date: '2024-02-05', category: 'Food', amount: 2500, description: 'Dinner out' }),
  createMockExpense({ date: '2024-03-01', category: 'Rent', amount: 50000, description: 'March rent' }),
]

describe('expense atoms', () => {
  let store: ReturnType<typeof createStore>

  beforeEach(() => {
    store = createStore()
    store.set(expensesAtom, records)
  })

  it('shows every expense newest first without filters', () => {
    expect(store.get(filtersAtom)).toEqual({})
    expect(store.get(filteredExpensesAtom).map((e) => e.date)).toEqual([
      '2024-03-01',
      '2024-02-05',
      '2024-01-20',
      '2024-01-10',
    ])
  })

  it('combines category, range and keyword filters', () => {
    store.set(categoryFilterAtom, 'Food')
    store.set(dateRangeAtom, { start: '2024-01-01', end: '2024-01-31' })

    expect(store.get(filteredExpensesAtom).map((e) => e.description)).toEqual(['Groceries'])

    store.set(dateRangeAtom, null)
    store.set(searchQueryAtom, 'dinner')

    expect(store.get(filteredExpensesAtom).map((e) => e.description)).toEqual(['Dinner out'])
  })

  it('lists categories in first-appearance order', () => {
    expect(store.get(categoriesAtom)).toEqual(['Food', 'Transport', 'Rent'])
  })

  it('cycles through categories and back to all', () => {
    store.set(cycleCategoryAtom)
    expect(store.get(categoryFilterAtom)).toBe('Food')
    store.set(cycleCategoryAtom)
    expect(store.get(categoryFilterAtom)).toBe('Transport')
    store.set(cycleCategoryAtom)
    expect(store.get(categoryFilterAtom)).toBe('Rent')
    store.set(cycleCategoryAtom)
    expect(store.get(categoryFilterAtom)).toBeNull()
  })

  it('clears every filter at once', () => {
    store.set(categoryFilterAtom, 'Rent')
    store.set(searchQueryAtom, 'march')
    store.set(dateRangeAtom, { start: '2024-03-01', end: '2024-03-31' })

    store.set(clearFiltersAtom)

    expect(store.get(filtersAtom)).toEqual({})
    expect(store.get(filteredExpensesAtom)).toHaveLength(4)
  })

  it('summarizes the filtered expenses', () => {
    store.set(categoryFilterAtom, 'Food')
    const report = store.get(createSummaryAtom(1))

    expect(report.filters).toEqual({ category: 'Food' })
    expect(report.summary.totalSpent).toBe(4000)
    expect(report.topExpenses.map((e) => e.description)).toEqual(['Dinner out'])
    expect(report.forecast.success).toBe(true)
  })
})

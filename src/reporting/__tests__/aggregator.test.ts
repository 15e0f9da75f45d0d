import { describe, it, expect } from 'vitest'
import {
  byCategory,
  byMonth,
  filterByCategory,
  filterByDateRange,
  search,
  topN,
  totalAmount,
} from '../aggregator.js'
import { ValidationError } from '../../expenses/expense-types.js'
import { createMockExpense } from '../../test-utils/fixtures.js'

const records = [
  createMockExpense({ date: '2024-01-15', category: 'Food', amount: 5000, description: 'Lunch' }),
  createMockExpense({ date: '2024-01-20', category: 'Rent', amount: 50000, description: 'January rent' }),
  createMockExpense({ date: '2024-02-02', category: 'Food', amount: 3000, description: 'Groceries' }),
  createMockExpense({ date: '2023-12-31', category: 'food', amount: 700, description: 'Snack' }),
]

describe('totalAmount', () => {
  it('sums every amount', () => {
    expect(totalAmount(records)).toBe(58700)
    expect(totalAmount([])).toBe(0)
  })
})

describe('byCategory', () => {
  it('sums per category in first-appearance order', () => {
    const summary = byCategory(records)

    expect([...summary.entries()]).toEqual([
      ['Food', 8000],
      ['Rent', 50000],
      ['food', 700],
    ])
  })

  it('returns an empty map for no records', () => {
    expect(byCategory([]).size).toBe(0)
  })
})

describe('byMonth', () => {
  it('sums per month in chronological order', () => {
    expect(byMonth(records)).toEqual([
      { month: '2023-12', total: 700, count: 1 },
      { month: '2024-01', total: 55000, count: 2 },
      { month: '2024-02', total: 3000, count: 1 },
    ])
  })

  it('does not fill months without expenses', () => {
    const summary = byMonth([
      createMockExpense({ date: '2024-01-01' }),
      createMockExpense({ date: '2024-04-01' }),
    ])

    expect(summary.map((m) => m.month)).toEqual(['2024-01', '2024-04'])
  })
})

describe('topN', () => {
  it('returns every record once n reaches the length', () => {
    expect(topN(records, 10)).toEqual(topN(records, records.length))
    expect(topN(records, records.length)).toHaveLength(4)
  })

  it('returns the largest expenses first', () => {
    expect(topN(records, 2).map((r) => r.amount)).toEqual([50000, 5000])
  })

  it('returns everything when n exceeds the count', () => {
    expect(topN(records, 10)).toHaveLength(4)
  })

  it('returns nothing for zero or negative n', () => {
    expect(topN(records, 0)).toEqual([])
    expect(topN(records, -3)).toEqual([])
  })

  it('keeps input order for equal amounts', () => {
    const tied = [
      createMockExpense({ amount: 100, description: 'first' }),
      createMockExpense({ amount: 200, description: 'big' }),
      createMockExpense({ amount: 100, description: 'second' }),
    ]

    expect(topN(tied, 3).map((r) => r.description)).toEqual(['big', 'first', 'second'])
  })

  it('does not reorder the input', () => {
    const input = [...records]
    topN(input, 2)

    expect(input).toEqual(records)
  })
})

describe('search', () => {
  it('matches any field case-insensitively', () => {
    expect(search(records, 'RENT').map((r) => r.description)).toEqual(['January rent'])
    expect(search(records, 'food').map((r) => r.description)).toEqual(['Lunch', 'Groceries', 'Snack'])
  })

  it('matches dates and formatted amounts', () => {
    expect(search(records, '2024-02').map((r) => r.description)).toEqual(['Groceries'])
    expect(search(records, '500.00').map((r) => r.description)).toEqual(['January rent'])
  })

  it('matches everything for an empty keyword', () => {
    expect(search(records, '')).toHaveLength(4)
  })
})

describe('filterByCategory', () => {
  it('matches the category exactly', () => {
    expect(filterByCategory(records, 'Food').map((r) => r.description)).toEqual(['Lunch', 'Groceries'])
    expect(filterByCategory(records, 'food').map((r) => r.description)).toEqual(['Snack'])
  })

  it('returns nothing for an unknown category', () => {
    expect(filterByCategory(records, 'Travel')).toEqual([])
  })
})

describe('filterByDateRange', () => {
  it('includes both ends', () => {
    const result = filterByDateRange(records, '2024-01-15', '2024-02-02')

    expect(result.map((r) => r.description)).toEqual(['Lunch', 'January rent', 'Groceries'])
  })

  it('accepts a single-day range', () => {
    expect(filterByDateRange(records, '2023-12-31', '2023-12-31').map((r) => r.description)).toEqual(['Snack'])
  })

  it('throws BadRange when start is after end', () => {
    try {
      filterByDateRange(records, '2024-02-01', '2024-01-01')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError)
      if (err instanceof ValidationError) {
        expect(err.kind).toBe('BadRange')
        expect(err.message).toBe('Start date 2024-02-01 is after end date 2024-01-01')
      }
    }
  })

  it('returns the same records when applied twice', () => {
    const once = filterByDateRange(records, '2024-01-01', '2024-01-31')

    expect(filterByDateRange(once, '2024-01-01', '2024-01-31')).toEqual(once)
  })

  it('throws BadDate for malformed dates', () => {
    try {
      filterByDateRange(records, '2024-01-01', '2024-02-30')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError)
      if (err instanceof ValidationError) {
        expect(err.kind).toBe('BadDate')
        expect(err.message).toBe('Invalid end date "2024-02-30" (expected YYYY-MM-DD)')
      }
    }
  })
})

describe('totals', () => {
  it('agree across category, month and overall sums', () => {
    const categorySum = [...byCategory(records).values()].reduce((sum, value) => sum + value, 0)
    const monthSum = byMonth(records).reduce((sum, m) => sum + m.total, 0)

    expect(categorySum).toBe(58700)
    expect(monthSum).toBe(58700)
    expect(totalAmount(records)).toBe(58700)
  })
})

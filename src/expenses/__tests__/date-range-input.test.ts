import { describe, it, expect } from 'vitest'
import { formatDateRange, parseDateRangeInput } from '../date-range-input.js'
import { ValidationError } from '../expense-types.js'

describe('parseDateRangeInput', () => {
  it('parses the double-dot form', () => {
    expect(parseDateRangeInput('2024-01-01..2024-03-31')).toEqual({ start: '2024-01-01', end: '2024-03-31' })
  })

  it('accepts spaces and commas as separators', () => {
    expect(parseDateRangeInput(' 2024-01-01 2024-01-31 ')).toEqual({ start: '2024-01-01', end: '2024-01-31' })
    expect(parseDateRangeInput('2024-01-01, 2024-01-31')).toEqual({ start: '2024-01-01', end: '2024-01-31' })
  })

  it('allows a single-day range', () => {
    expect(parseDateRangeInput('2024-05-05..2024-05-05')).toEqual({ start: '2024-05-05', end: '2024-05-05' })
  })

  it('rejects a missing end date', () => {
    expect(() => parseDateRangeInput('2024-01-01')).toThrow('Invalid end date "" (expected YYYY-MM-DD)')
  })

  it('rejects an inverted range', () => {
    try {
      parseDateRangeInput('2024-02-01..2024-01-01')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError)
      if (err instanceof ValidationError) {
        expect(err.kind).toBe('BadRange')
      }
    }
  })
})

describe('formatDateRange', () => {
  it('produces text parseDateRangeInput accepts', () => {
    const range = { start: '2024-01-01', end: '2024-06-30' }

    expect(formatDateRange(range)).toBe('2024-01-01..2024-06-30')
    expect(parseDateRangeInput(formatDateRange(range))).toEqual(range)
  })
})

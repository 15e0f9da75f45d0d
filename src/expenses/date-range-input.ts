import { assertDateRange, type DateRange } from '../reporting/index.js'

const SEPARATOR = /\s*(?:\.\.|\s|,)\s*/

/**
 * Parses "YYYY-MM-DD..YYYY-MM-DD" (space or comma also work) into a
 * validated inclusive range.
 *
 * @throws ValidationError for malformed dates or start after end
 *
 * @example
 * parseDateRangeInput('2024-01-01..2024-03-31')
 * // => { start: '2024-01-01', end: '2024-03-31' }
 */
export const parseDateRangeInput = (text: string): DateRange => {
  const [start = '', end = ''] = text.trim().split(SEPARATOR)
  const range = { start, end }
  assertDateRange(range)
  return range
}

/**
 * Formats a range back into the text accepted by parseDateRangeInput.
 */
export const formatDateRange = ({ start, end }: DateRange): string => `${start}..${end}`

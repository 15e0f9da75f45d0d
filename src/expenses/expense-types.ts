import { z } from 'zod'

/**
 * A single validated expense.
 * Amounts use minor units (100 = 1.00) so totals stay exact.
 *
 * @example
 * const lunch: ExpenseRecord = {
 *   date: '2024-01-15',
 *   category: 'Food',
 *   amount: 1250, // 12.50
 *   description: 'Lunch with team',
 * }
 */
export interface ExpenseRecord {
  /** Calendar date in YYYY-MM-DD format */
  date: string
  /** Grouping label, compared case-sensitively */
  category: string
  /** Positive amount in minor units */
  amount: number
  description: string
}

export type ValidationErrorKind = 'BadDate' | 'BadAmount' | 'EmptyCategory' | 'BadRange'

export class ValidationError extends Error {
  readonly kind: ValidationErrorKind

  constructor(kind: ValidationErrorKind, message: string) {
    super(message)
    this.name = 'ValidationError'
    this.kind = kind
  }

  toJSON(): { kind: ValidationErrorKind; message: string } {
    return { kind: this.kind, message: this.message }
  }
}

export type ValidationResult =
  | { success: true; record: ExpenseRecord }
  | { success: false; error: ValidationError }

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * Checks a YYYY-MM-DD string for both shape and calendar validity.
 * Uses UTC so the check does not depend on the local timezone.
 */
export const isValidIsoDate = (value: string): boolean => {
  const match = ISO_DATE_PATTERN.exec(value)
  if (!match) return false

  const [, year, month, day] = match.map(Number)
  const date = new Date(Date.UTC(year, month - 1, day))
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  )
}

const dateSchema = z.string().trim().refine(isValidIsoDate)

const DECIMAL_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/

const amountSchema = z
  .string()
  .trim()
  .regex(DECIMAL_PATTERN)
  .transform(Number)
  .pipe(z.number().finite().positive())
  .transform((value) => Math.round(value * 100))
  .pipe(z.number().int().positive())

const categorySchema = z.string().trim().min(1)

/**
 * Parses decimal text into minor units.
 * Returns null for anything that is not a positive amount of at least 0.01.
 *
 * @example
 * parseAmount('12.5') // => 1250
 * parseAmount('-3')   // => null
 */
export const parseAmount = (raw: string): number | null => {
  const result = amountSchema.safeParse(raw)
  return result.success ? result.data : null
}

/**
 * Renders minor units as plain decimal text, the form written to CSV.
 *
 * @example
 * formatAmountValue(1250) // => '12.50'
 */
export const formatAmountValue = (amount: number): string => (amount / 100).toFixed(2)

/**
 * Extracts the YYYY-MM month key from a record date.
 */
export const getMonthKey = (date: string): string => date.slice(0, 7)

/**
 * Orders records newest first. Records on the same day show the most
 * recently added first, since the file is append-only.
 */
export const sortNewestFirst = (records: readonly ExpenseRecord[]): ExpenseRecord[] =>
  [...records].reverse().sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0))

/**
 * Gets today's date in YYYY-MM-DD format (local time).
 */
export const getToday = (now: Date = new Date()): string => {
  const y = now.getFullYear()
  const m = String(now.getMonth() + 1).padStart(2, '0')
  const d = String(now.getDate()).padStart(2, '0')
  return `${y}-${m}-${d}`
}

/**
 * Validates raw text fields into an ExpenseRecord.
 * Checks run in order date, amount, category; the first failure wins.
 */
export const validateExpense = (
  rawDate: string,
  rawCategory: string,
  rawAmount: string,
  rawDescription = ''
): ValidationResult => {
  const date = dateSchema.safeParse(rawDate)
  if (!date.success) {
    return {
      success: false,
      error: new ValidationError('BadDate', `Invalid date "${rawDate}" (expected YYYY-MM-DD)`),
    }
  }

  const amount = amountSchema.safeParse(rawAmount)
  if (!amount.success) {
    return {
      success: false,
      error: new ValidationError('BadAmount', `Invalid amount "${rawAmount}" (expected a positive number)`),
    }
  }

  const category = categorySchema.safeParse(rawCategory)
  if (!category.success) {
    return {
      success: false,
      error: new ValidationError('EmptyCategory', 'Category must not be empty'),
    }
  }

  return {
    success: true,
    record: {
      date: date.data,
      category: category.data,
      amount: amount.data,
      description: rawDescription.trim(),
    },
  }
}

/**
 * Types for spending summaries and forecasts.
 *
 * All monetary values use minor units (100 = 1.00), matching ExpenseRecord.
 */

export type { ExpenseRecord } from '../expenses/expense-types.js'

/**
 * Total spent in one calendar month.
 *
 * @example
 * const january: MonthlyTotal = { month: '2024-01', total: 45000, count: 12 }
 */
export interface MonthlyTotal {
  /** Month in YYYY-MM format */
  month: string
  /** Sum of amounts in minor units */
  total: number
  /** Number of records in the month */
  count: number
}

/**
 * Monthly totals in ascending chronological order.
 * Months without records are absent rather than zero.
 */
export type MonthlySummary = MonthlyTotal[]

/**
 * Category label to total, in order of first appearance.
 */
export type CategorySummary = Map<string, number>

/**
 * Inclusive date range, both ends in YYYY-MM-DD format.
 */
export interface DateRange {
  start: string
  end: string
}

/**
 * Fitted least-squares line over month indices.
 */
export interface LinearTrend {
  slope: number
  intercept: number
}

/**
 * Forecast for the month after the last one in a summary.
 *
 * @example
 * const prediction: Prediction = {
 *   month: '2024-04',
 *   predicted: 40000,
 *   slope: 10000,
 *   intercept: 10000,
 *   basedOnMonths: 3,
 * }
 */
export interface Prediction extends LinearTrend {
  /** Month being predicted, YYYY-MM */
  month: string
  /** Predicted total in minor units, rounded to the nearest unit. May be negative. */
  predicted: number
  /** Number of months the line was fitted on */
  basedOnMonths: number
}

export type ForecastErrorKind = 'InsufficientData'

export class ForecastError extends Error {
  readonly kind: ForecastErrorKind

  constructor(kind: ForecastErrorKind, message: string) {
    super(message)
    this.name = 'ForecastError'
    this.kind = kind
  }

  toJSON(): { kind: ForecastErrorKind; message: string } {
    return { kind: this.kind, message: this.message }
  }
}

export type ForecastResult =
  | { success: true; prediction: Prediction }
  | { success: false; error: ForecastError }

import {
  ForecastError,
  type ForecastResult,
  type LinearTrend,
  type MonthlySummary,
} from './types.js'

/**
 * Gets the month after a YYYY-MM month.
 *
 * @example
 * getNextMonth('2024-12') // => '2025-01'
 */
export const getNextMonth = (month: string): string => {
  const [year, m] = month.split('-').map(Number)
  if (m === 12) {
    return `${year + 1}-01`
  }
  return `${year}-${String(m + 1).padStart(2, '0')}`
}

/**
 * Ordinary least squares over (x, y) points.
 * Returns null when x has no variance, since the slope is undefined.
 */
export const fitLinearTrend = (points: ReadonlyArray<readonly [number, number]>): LinearTrend | null => {
  const n = points.length
  if (n === 0) return null

  const meanX = points.reduce((sum, [x]) => sum + x, 0) / n
  const meanY = points.reduce((sum, [, y]) => sum + y, 0) / n

  let covariance = 0
  let variance = 0
  for (const [x, y] of points) {
    covariance += (x - meanX) * (y - meanY)
    variance += (x - meanX) ** 2
  }

  if (variance === 0) return null

  const slope = covariance / variance
  return { slope, intercept: meanY - slope * meanX }
}

/**
 * Predicts next month's total from a monthly summary.
 *
 * Each month becomes one point: x is its position in the summary (0, 1, 2, ...)
 * and y its total. Gaps between months are not filled. The prediction is the
 * fitted line at x = number of months. Negative predictions are returned as-is.
 *
 * @example
 * predictNext([
 *   { month: '2024-01', total: 10000, count: 1 },
 *   { month: '2024-02', total: 20000, count: 1 },
 *   { month: '2024-03', total: 30000, count: 1 },
 * ])
 * // => { success: true, prediction: { month: '2024-04', predicted: 40000, slope: 10000, intercept: 10000, basedOnMonths: 3 } }
 */
export const predictNext = (summary: MonthlySummary): ForecastResult => {
  const trend = fitLinearTrend(summary.map((entry, index) => [index, entry.total] as const))

  if (!trend) {
    return {
      success: false,
      error: new ForecastError(
        'InsufficientData',
        `Need at least 2 months of data for a forecast (have ${summary.length})`
      ),
    }
  }

  const lastMonth = summary[summary.length - 1].month
  const nextIndex = summary.length

  return {
    success: true,
    prediction: {
      month: getNextMonth(lastMonth),
      predicted: Math.round(trend.slope * nextIndex + trend.intercept),
      slope: trend.slope,
      intercept: trend.intercept,
      basedOnMonths: summary.length,
    },
  }
}

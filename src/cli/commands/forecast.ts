import type { ForecastOptions } from '../args.js'
import {
  applyFilters,
  byMonth,
  predictNext,
  type ForecastResult,
  type MonthlySummary,
} from '../../reporting/index.js'
import { formatMoney, formatTable, reportError } from '../output.js'
import { createContext, loadRecords, toFilters } from './context.js'
import { formatForecastLine } from './summary.js'

interface ForecastCommandResult {
  success: boolean
  months: MonthlySummary
  forecast: ForecastResult
  formatted?: string
}

export const formatForecastText = (
  months: MonthlySummary,
  forecast: ForecastResult,
  currency: string
): string => {
  if (months.length === 0) {
    return 'No expenses found.'
  }

  const table = formatTable(
    ['Month', 'Spent'],
    months.map((m) => [m.month, formatMoney(m.total, currency)])
  )
  return `${table}\n\n${formatForecastLine(forecast, currency)}`
}

/**
 * Forecast CLI command implementation.
 * Too little data is a normal outcome here, reported with success: false
 * rather than as a command failure.
 *
 * @example
 * expense-tui forecast --category Food --format text
 */
export const forecastCommand = async (options: ForecastOptions): Promise<void> => {
  const context = await createContext(options)
  const { formatter, config } = context
  const records = await loadRecords(context)

  let months: MonthlySummary
  try {
    months = byMonth(applyFilters(records, toFilters(options)))
  } catch (err) {
    return reportError(formatter, err)
  }

  const forecast = predictNext(months)
  const result: ForecastCommandResult = { success: forecast.success, months, forecast }

  if (options.format === 'text') {
    result.formatted = formatForecastText(months, forecast, config.display.currency)
  }

  formatter.success(result)
}

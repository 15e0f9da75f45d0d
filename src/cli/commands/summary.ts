import type { SummaryOptions } from '../args.js'
import {
  analyzeSpending,
  renderTextBar,
  type ExpenseFilters,
  type ForecastResult,
  type SpendingReport,
} from '../../reporting/index.js'
import { formatMoney, formatTable, reportError } from '../output.js'
import { createContext, loadRecords, toFilters } from './context.js'

interface SummaryResult {
  success: boolean
  report: SpendingReport
  formatted?: string
}

const BAR_WIDTH = 20

/**
 * Describes active filters, e.g. `category=Food, 2024-01-01..2024-03-31`.
 */
export const describeFilters = (filters: ExpenseFilters): string | null => {
  const parts: string[] = []
  if (filters.category !== undefined) parts.push(`category=${filters.category}`)
  if (filters.range) parts.push(`${filters.range.start}..${filters.range.end}`)
  if (filters.keyword) parts.push(`search "${filters.keyword}"`)
  return parts.length > 0 ? parts.join(', ') : null
}

/**
 * One-line forecast description shared by the summary and forecast commands.
 */
export const formatForecastLine = (forecast: ForecastResult, currency: string): string => {
  if (!forecast.success) {
    return forecast.error.message
  }

  const { month, predicted, slope, basedOnMonths } = forecast.prediction
  const trend = Math.round(slope)
  const sign = trend > 0 ? '+' : ''
  const line =
    `Forecast for ${month}: ${formatMoney(predicted, currency)} ` +
    `(trend ${sign}${formatMoney(trend, currency)}/month over ${basedOnMonths} months)`

  return predicted < 0 ? `${line} - negative forecast, not clamped` : line
}

/**
 * Generates a formatted text summary for terminal display.
 */
export const formatSummaryText = (report: SpendingReport, currency: string): string => {
  const lines: string[] = []
  const divider = '─'.repeat(60)
  const money = (amount: number) => formatMoney(amount, currency)

  // Header
  lines.push('')
  lines.push('  Expense Summary')
  const filters = describeFilters(report.filters)
  if (filters) {
    lines.push(`  Filters: ${filters}`)
  }
  lines.push('')
  lines.push(divider)

  // Summary Section
  lines.push('')
  lines.push('  SUMMARY')
  lines.push('')
  lines.push(`  Total Spent:    ${money(report.summary.totalSpent)}`)
  lines.push(`  Expenses:       ${report.summary.expenseCount}`)
  lines.push(`  Categories:     ${report.summary.categoryCount}`)
  lines.push(`  Months:         ${report.summary.monthCount}`)
  if (report.summary.averageMonthly !== null) {
    lines.push(`  Avg Monthly:    ${money(report.summary.averageMonthly)}`)
  }

  // Category Breakdown
  lines.push('')
  lines.push(divider)
  lines.push('')
  lines.push('  SPENDING BY CATEGORY')
  lines.push('')

  if (report.categories.length === 0) {
    lines.push('  No spending found.')
  } else {
    const max = Math.max(...report.categories.map((c) => c.total))
    lines.push(
      formatTable(
        ['Category', 'Spent', 'Share', ''],
        report.categories.map((c) => [
          c.category.slice(0, 20),
          money(c.total),
          `${c.percentOfTotal.toFixed(1)}%`,
          renderTextBar(c.total, max, BAR_WIDTH),
        ])
      )
    )
  }

  // Monthly Breakdown
  if (report.months.length > 0) {
    const max = Math.max(...report.months.map((m) => m.total))
    lines.push('')
    lines.push(divider)
    lines.push('')
    lines.push('  MONTHLY SPENDING')
    lines.push('')
    lines.push(
      formatTable(
        ['Month', 'Spent', 'Count', ''],
        report.months.map((m) => [m.month, money(m.total), String(m.count), renderTextBar(m.total, max, BAR_WIDTH)])
      )
    )
  }

  // Top Expenses
  if (report.topExpenses.length > 0) {
    lines.push('')
    lines.push(divider)
    lines.push('')
    lines.push(`  TOP ${report.topExpenses.length} EXPENSES`)
    lines.push('')
    lines.push(
      formatTable(
        ['Date', 'Category', 'Amount', 'Description'],
        report.topExpenses.map((e) => [e.date, e.category.slice(0, 20), money(e.amount), e.description.slice(0, 30)])
      )
    )
  }

  // Forecast
  lines.push('')
  lines.push(divider)
  lines.push('')
  lines.push('  FORECAST')
  lines.push('')
  lines.push(`  ${formatForecastLine(report.forecast, currency)}`)

  lines.push('')
  lines.push(divider)
  lines.push('')

  return lines.join('\n')
}

/**
 * Summary CLI command implementation.
 *
 * @example
 * expense-tui summary --from 2024-01-01 --to 2024-06-30 --top 5 --format text
 */
export const summaryCommand = async (options: SummaryOptions): Promise<void> => {
  const context = await createContext(options)
  const { formatter, config } = context
  const records = await loadRecords(context)

  formatter.progress(`Analyzing ${records.length} expenses...`)

  let report: SpendingReport
  try {
    report = analyzeSpending({
      records,
      filters: toFilters(options),
      topLimit: options.top ?? config.display.topN,
    })
  } catch (err) {
    return reportError(formatter, err)
  }

  const result: SummaryResult = { success: true, report }

  // Add formatted text for text mode
  if (options.format === 'text') {
    result.formatted = formatSummaryText(report, config.display.currency)
  }

  formatter.success(result)
}

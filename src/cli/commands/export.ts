import { join } from 'node:path'
import type { ExportOptions } from '../args.js'
import { resolvePath } from '../../config/config-loader.js'
import { byCategory, byMonth, exportSummaryWorkbook, toCategoryTotals } from '../../reporting/index.js'
import { createContext, loadRecords } from './context.js'

export const DEFAULT_WORKBOOK_NAME = 'monthly_summary.xlsx'

interface ExportResult {
  success: boolean
  path: string
  months: number
  categories: number
  formatted?: string
}

/**
 * Export CLI command implementation.
 *
 * @example
 * expense-tui export --out reports/2024.xlsx
 */
export const exportCommand = async (options: ExportOptions): Promise<void> => {
  const context = await createContext(options)
  const { formatter, config } = context
  const records = await loadRecords(context)

  if (records.length === 0) {
    formatter.error('No data to export.')
  }

  const path = resolvePath(options.out ?? join(config.storage.reportsDir, DEFAULT_WORKBOOK_NAME))
  const months = byMonth(records)
  const categories = toCategoryTotals(byCategory(records))

  formatter.progress(`Writing ${months.length} months to ${path}...`)
  await exportSummaryWorkbook(path, months, categories)

  const result: ExportResult = {
    success: true,
    path,
    months: months.length,
    categories: categories.length,
  }

  if (options.format === 'text') {
    result.formatted = `Excel summary saved to ${path}`
  }

  formatter.success(result)
}

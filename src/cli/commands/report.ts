import { join } from 'node:path'
import type { ReportOptions } from '../args.js'
import { resolvePath } from '../../config/config-loader.js'
import { loadProjectInfoFile } from '../../config/config-service.js'
import { DEFAULT_PROJECT_INFO, type ProjectInfo } from '../../config/config-types.js'
import { analyzeSpending, writePdfReport } from '../../reporting/index.js'
import { createContext, loadRecords } from './context.js'

export const DEFAULT_REPORT_NAME = 'expense_report.pdf'

/** Number of expenses charted on the overview page */
const REPORT_TOP_EXPENSES = 10

interface ReportResult {
  success: boolean
  path: string
  expenses: number
  formatted?: string
}

/**
 * Report CLI command implementation.
 *
 * @example
 * expense-tui report --project project.json --out reports/final.pdf
 */
export const reportCommand = async (options: ReportOptions): Promise<void> => {
  const context = await createContext(options)
  const { formatter, config } = context
  const records = await loadRecords(context)

  let project: ProjectInfo = config.project ?? DEFAULT_PROJECT_INFO
  if (options.project) {
    try {
      project = await loadProjectInfoFile(resolvePath(options.project))
    } catch (err) {
      formatter.error(`Could not read project info from ${options.project}`, err instanceof Error ? err.message : err)
    }
  }

  const path = resolvePath(options.out ?? join(config.storage.reportsDir, DEFAULT_REPORT_NAME))
  const report = analyzeSpending({ records, topLimit: REPORT_TOP_EXPENSES })

  formatter.progress(`Rendering PDF report for ${records.length} expenses...`)
  await writePdfReport(path, {
    records,
    report,
    project,
    currency: config.display.currency,
    rowsPerPage: config.report.rowsPerPage,
  })

  const result: ReportResult = { success: true, path, expenses: records.length }

  if (options.format === 'text') {
    result.formatted = `PDF report saved to ${path}`
  }

  formatter.success(result)
}

import { dirname } from 'node:path'
import { mkdir, writeFile } from 'node:fs/promises'
import { utils, write, type WorkBook } from 'xlsx'
import type { CategoryTotal } from './spending-analyzer.js'
import type { MonthlySummary } from './types.js'

export const MONTHLY_SHEET = 'Monthly Summary'
export const CATEGORY_SHEET = 'Categories'

/**
 * Builds a workbook with monthly and category totals.
 * Amounts are written in major units (12.5, not 1250) so spreadsheets sum them directly.
 */
export const buildSummaryWorkbook = (
  months: MonthlySummary,
  categories: readonly CategoryTotal[]
): WorkBook => {
  const workbook = utils.book_new()

  const monthSheet = utils.aoa_to_sheet([
    ['Month', 'Amount'],
    ...months.map((m) => [m.month, m.total / 100]),
  ])
  utils.book_append_sheet(workbook, monthSheet, MONTHLY_SHEET)

  const categorySheet = utils.aoa_to_sheet([
    ['Category', 'Amount'],
    ...categories.map((c) => [c.category, c.total / 100]),
  ])
  utils.book_append_sheet(workbook, categorySheet, CATEGORY_SHEET)

  return workbook
}

/**
 * Writes the summary workbook to disk and returns the path written.
 */
export const exportSummaryWorkbook = async (
  path: string,
  months: MonthlySummary,
  categories: readonly CategoryTotal[]
): Promise<string> => {
  const workbook = buildSummaryWorkbook(months, categories)
  const buffer: Buffer = write(workbook, { type: 'buffer', bookType: 'xlsx' })

  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, buffer)
  return path
}

import { dirname } from 'node:path'
import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { read, utils } from 'xlsx'
import {
  formatAmountValue,
  validateExpense,
  type ExpenseRecord,
  type ValidationError,
} from './expense-types.js'

export const CSV_COLUMNS = ['date', 'category', 'amount', 'description'] as const

const REQUIRED_COLUMNS = ['date', 'category', 'amount'] as const

type Column = (typeof CSV_COLUMNS)[number]

export class ExpenseStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ExpenseStoreError'
  }
}

/**
 * A data row that failed validation and was left out of the load.
 */
export interface RejectedRow {
  /** 1-based line number in the file (the header is line 1) */
  line: number
  raw: string[]
  error: ValidationError
}

export interface LoadResult {
  records: ExpenseRecord[]
  rejected: RejectedRow[]
}

const cellText = (cell: unknown): string => (cell === null || cell === undefined ? '' : String(cell))

/**
 * Splits CSV text into rows of cell text.
 * Raw mode keeps every cell as written, so dates and amounts are never reinterpreted.
 */
export const parseCsvRows = (content: string): string[][] => {
  if (content.trim() === '') return []

  const workbook = read(content, { type: 'string', raw: true, cellDates: false })
  const sheet = workbook.Sheets[workbook.SheetNames[0]]
  if (!sheet) return []

  const rows = utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: false,
    defval: '',
    blankrows: true,
  })

  return rows.map((row) => row.map(cellText))
}

/**
 * Maps each known column to its index in the header row.
 * Header names compare case-insensitively, so column order is free.
 */
const resolveColumns = (header: string[]): Record<Column, number> => {
  const normalized = header.map((h) => h.trim().toLowerCase())
  const indexOf = (column: Column) => normalized.indexOf(column)

  const missing = REQUIRED_COLUMNS.filter((column) => indexOf(column) === -1)
  if (missing.length > 0) {
    throw new ExpenseStoreError(`Expense file header is missing column(s): ${missing.join(', ')}`)
  }

  return {
    date: indexOf('date'),
    category: indexOf('category'),
    amount: indexOf('amount'),
    description: indexOf('description'),
  }
}

/** Number of file lines a parsed row occupied, counting newlines inside quoted fields */
const lineSpan = (row: string[]): number =>
  row.reduce((lines, value) => lines + value.split('\n').length - 1, 1)

/**
 * Validates parsed CSV rows. The first row must be the header.
 * Invalid rows are collected in `rejected` instead of failing the whole load.
 */
export const parseExpenseRows = (rows: string[][]): LoadResult => {
  if (rows.length === 0) {
    return { records: [], rejected: [] }
  }

  const [header, ...dataRows] = rows
  const columns = resolveColumns(header)
  const cell = (row: string[], column: Column) =>
    columns[column] === -1 ? '' : row[columns[column]] ?? ''

  const records: ExpenseRecord[] = []
  const rejected: RejectedRow[] = []
  let nextLine = 1 + lineSpan(header)

  dataRows.forEach((row) => {
    const line = nextLine
    nextLine += lineSpan(row)
    if (row.every((value) => value.trim() === '')) return

    const result = validateExpense(
      cell(row, 'date'),
      cell(row, 'category'),
      cell(row, 'amount'),
      cell(row, 'description')
    )

    if (result.success) {
      records.push(result.record)
    } else {
      rejected.push({ line, raw: row, error: result.error })
    }
  })

  return { records, rejected }
}

const columnValues = (record: ExpenseRecord): Record<Column, string> => ({
  date: record.date,
  category: record.category,
  amount: formatAmountValue(record.amount),
  description: record.description,
})

const toRow = (record: ExpenseRecord): string[] => {
  const values = columnValues(record)
  return CSV_COLUMNS.map((column) => values[column])
}

/**
 * Lays a record out under an existing header.
 * Unknown columns stay empty; a file without a description column drops it.
 */
const toRowForHeader = (header: string[], record: ExpenseRecord): string[] => {
  const columns = resolveColumns(header)
  const values = columnValues(record)
  const row = header.map(() => '')
  for (const column of CSV_COLUMNS) {
    if (columns[column] !== -1) row[columns[column]] = values[column]
  }
  return row
}

/**
 * Writes rows as CSV text with a trailing newline.
 * Fields containing commas, quotes or newlines are quoted.
 */
const toCsv = (rows: string[][]): string =>
  `${utils.sheet_to_csv(utils.aoa_to_sheet(rows), { FS: ',', RS: '\n' })}\n`

/**
 * Serializes records to CSV text, header first.
 */
export const serializeExpenses = (records: readonly ExpenseRecord[]): string =>
  toCsv([[...CSV_COLUMNS], ...records.map(toRow)])

const ensureFile = async (path: string): Promise<void> => {
  if (existsSync(path)) return
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, serializeExpenses([]))
}

/**
 * Loads all expenses from a CSV file, creating it with just a header if missing.
 */
export const loadExpenses = async (path: string): Promise<LoadResult> => {
  await ensureFile(path)

  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (err) {
    throw new ExpenseStoreError(`Could not read expense file ${path}`, { cause: err })
  }

  return parseExpenseRows(parseCsvRows(content))
}

/**
 * Appends a validated record and rewrites the file (last write wins).
 * The new row follows the file's own column order; rows that failed
 * validation on load are kept as they were.
 */
export const appendExpense = async (path: string, record: ExpenseRecord): Promise<void> => {
  await ensureFile(path)

  const existing = await readFile(path, 'utf-8')
  const [header] = parseCsvRows(existing)
  if (!header) {
    await writeFile(path, serializeExpenses([record]))
    return
  }

  const separator = existing.endsWith('\n') ? '' : '\n'
  await writeFile(path, `${existing}${separator}${toCsv([toRowForHeader(header, record)])}`)
}

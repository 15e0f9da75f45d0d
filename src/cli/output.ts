import type { OutputFormat } from './args.js'
import { ValidationError } from '../expenses/expense-types.js'
import { ExpenseStoreError, type RejectedRow } from '../expenses/expense-store.js'

export interface OutputFormatter {
  /** Output successful result to stdout */
  success<T>(data: T): void
  /** Output error to stderr and exit with code 1 */
  error(message: string, details?: unknown): never
  /** Output progress message to stderr (skipped in quiet mode) */
  progress(message: string): void
  /** Output warning to stderr */
  warn(message: string): void
}

const hasFormattedText = (data: unknown): data is { formatted: string } =>
  typeof data === 'object' && data !== null && 'formatted' in data && typeof data.formatted === 'string'

/**
 * Renders error details for text mode: objects as `key: value` lines,
 * anything else as-is.
 */
const describeDetails = (details: unknown): string => {
  if (typeof details === 'object' && details !== null) {
    return Object.entries(details)
      .map(([key, value]) => `  ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`)
      .join('\n')
  }
  return String(details)
}

/**
 * Create an output formatter based on format and quiet settings
 */
export const createFormatter = (format: OutputFormat, quiet: boolean): OutputFormatter => {
  const progress = (message: string) => {
    if (!quiet) {
      process.stderr.write(`${message}\n`)
    }
  }

  const warn = (message: string) => {
    process.stderr.write(`Warning: ${message}\n`)
  }

  if (format === 'json') {
    return {
      success: <T>(data: T) => {
        console.log(JSON.stringify(data, null, 2))
      },
      error: (message: string, details?: unknown): never => {
        console.error(JSON.stringify({ success: false, error: message, details }, null, 2))
        process.exit(1)
      },
      progress,
      warn,
    }
  }

  // Text format: pre-rendered text when the command provides it
  return {
    success: <T>(data: T) => {
      if (typeof data === 'string') {
        console.log(data)
      } else if (hasFormattedText(data)) {
        console.log(data.formatted)
      } else {
        console.log(JSON.stringify(data, null, 2))
      }
    },
    error: (message: string, details?: unknown): never => {
      console.error(`Error: ${message}`)
      if (details !== undefined) {
        console.error(describeDetails(details))
      }
      process.exit(1)
    },
    progress,
    warn,
  }
}

/**
 * Reports an error from the expense core or store through the formatter.
 * ValidationError kinds are passed along so scripts can branch on them.
 */
export const reportError = (formatter: OutputFormatter, err: unknown): never => {
  if (err instanceof ValidationError) {
    return formatter.error(err.message, { kind: err.kind })
  }
  if (err instanceof ExpenseStoreError) {
    return formatter.error(err.message)
  }
  throw err
}

/**
 * Emits one warning per row skipped while loading the expense file.
 */
export const warnRejectedRows = (formatter: OutputFormatter, rejected: readonly RejectedRow[]): void => {
  for (const row of rejected) {
    formatter.warn(`Skipped line ${row.line}: ${row.error.message}`)
  }
}

/**
 * Format minor units as currency
 *
 * @example
 * formatMoney(123456, '$') // => '$1,234.56'
 * formatMoney(-500, '€')   // => '-€5.00'
 */
export const formatMoney = (amount: number, currency: string): string => {
  const formatted = (Math.abs(amount) / 100).toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })
  return amount < 0 ? `-${currency}${formatted}` : `${currency}${formatted}`
}

/**
 * Create a simple text table from data
 */
export const formatTable = (
  headers: string[],
  rows: string[][],
  columnWidths?: number[]
): string => {
  const widths = columnWidths || headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map(r => (r[i] || '').length))
    return Math.max(h.length, maxRowWidth)
  })

  const formatRow = (cells: string[]) =>
    cells.map((cell, i) => (cell || '').padEnd(widths[i])).join('  ').trimEnd()

  const headerLine = formatRow(headers)
  const separator = widths.map(w => '-'.repeat(w)).join('  ')
  const dataLines = rows.map(formatRow)

  return [headerLine, separator, ...dataLines].join('\n')
}

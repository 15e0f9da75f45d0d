import type { FilterOptions, GlobalOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import { loadConfigWithEnv, resolvePath } from '../../config/config-loader.js'
import { loadExpenses } from '../../expenses/expense-store.js'
import type { ExpenseRecord } from '../../expenses/expense-types.js'
import type { ExpenseFilters } from '../../reporting/index.js'
import { createFormatter, reportError, warnRejectedRows, type OutputFormatter } from '../output.js'

/** Open-ended bounds used when only one side of a date range is given */
export const EARLIEST_DATE = '1000-01-01'
export const LATEST_DATE = '9999-12-31'

export interface CommandContext {
  config: AppConfig
  /** Absolute path of the expense CSV file */
  dataFile: string
  formatter: OutputFormatter
}

/**
 * Resolves config (file, env, --data) and the formatter for a command.
 */
export const createContext = async (options: GlobalOptions): Promise<CommandContext> => {
  const formatter = createFormatter(options.format, options.quiet)
  const { config } = await loadConfigWithEnv({ dataFile: options.data })

  return {
    config,
    dataFile: resolvePath(config.storage.dataFile),
    formatter,
  }
}

/**
 * Loads every valid record, warning about rows that were skipped.
 */
export const loadRecords = async ({ dataFile, formatter }: CommandContext): Promise<ExpenseRecord[]> => {
  formatter.progress(`Reading expenses from ${dataFile}...`)

  try {
    const { records, rejected } = await loadExpenses(dataFile)
    warnRejectedRows(formatter, rejected)
    return records
  } catch (err) {
    return reportError(formatter, err)
  }
}

/**
 * Builds analyzer filters from command-line options.
 * A single date bound leaves the other side open.
 */
export const toFilters = (options: FilterOptions & { search?: string }): ExpenseFilters => {
  const filters: ExpenseFilters = {}
  if (options.category !== undefined) {
    filters.category = options.category
  }
  if (options.from !== undefined || options.to !== undefined) {
    filters.range = {
      start: options.from ?? EARLIEST_DATE,
      end: options.to ?? LATEST_DATE,
    }
  }
  if (options.search) {
    filters.keyword = options.search
  }
  return filters
}

export interface ExpenseOutput {
  date: string
  category: string
  /** Amount in major units, e.g. 12.5 */
  amount: number
  amountFormatted: string
  description: string
}

export const toExpenseOutput = (record: ExpenseRecord, format: (amount: number) => string): ExpenseOutput => ({
  date: record.date,
  category: record.category,
  amount: record.amount / 100,
  amountFormatted: format(record.amount),
  description: record.description,
})

import { Command, InvalidArgumentError } from 'commander'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'

const getVersion = (): string => {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url))
    const pkgPath = join(__dirname, '..', '..', 'package.json')
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'))
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version
    }
    return '0.0.0'
  } catch {
    return '0.0.0'
  }
}

export type OutputFormat = 'json' | 'text'

export interface GlobalOptions {
  format: OutputFormat
  quiet: boolean
  /** Expense CSV file, overrides config and env */
  data?: string
}

export interface FilterOptions {
  category?: string
  from?: string
  to?: string
}

export interface AddOptions extends GlobalOptions {
  date?: string
  category: string
  amount: string
  description: string
}

export interface ListOptions extends GlobalOptions, FilterOptions {
  search?: string
  limit: number
}

export interface SummaryOptions extends GlobalOptions, FilterOptions {
  top?: number
}

export type ForecastOptions = GlobalOptions & FilterOptions

export interface ExportOptions extends GlobalOptions {
  out?: string
}

export interface ReportOptions extends GlobalOptions {
  out?: string
  project?: string
}

export type CommandAction =
  | { command: 'add'; options: AddOptions }
  | { command: 'list'; options: ListOptions }
  | { command: 'summary'; options: SummaryOptions }
  | { command: 'forecast'; options: ForecastOptions }
  | { command: 'export'; options: ExportOptions }
  | { command: 'report'; options: ReportOptions }
  | { command: 'project' }
  | { command: 'tui'; data?: string }

const parseFormat = (value: string): OutputFormat => {
  if (value !== 'json' && value !== 'text') {
    throw new InvalidArgumentError(`Invalid format "${value}" (expected json or text)`)
  }
  return value
}

const parseCount = (value: string): number => {
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive whole number, got "${value}"`)
  }
  return parsed
}

/**
 * Parse CLI arguments and return the command to execute
 * Returns null if --help or --version was displayed
 */
export const parseArgs = (argv: string[]): CommandAction | null => {
  let result: CommandAction | null = null

  const program = new Command()
    .name('expense-tui')
    .description('Track expenses in a CSV file, summarize them and forecast next month')
    .version(getVersion())
    .option('-d, --data <path>', 'Path to the expense CSV file')
    .enablePositionalOptions()
    // Throw instead of exiting; subcommands created below inherit this
    .exitOverride()
    .action((options: { data?: string }) => {
      // Default action when no subcommand is provided - run TUI
      result = { command: 'tui', data: options.data }
    })

  // Global options available to all subcommands
  const addGlobalOptions = (cmd: Command) => {
    return cmd
      .option('-f, --format <format>', 'Output format: json or text', parseFormat, 'json')
      .option('-q, --quiet', 'Suppress progress messages', false)
      .option('-d, --data <path>', 'Path to the expense CSV file')
  }

  const addFilterOptions = (cmd: Command) => {
    return cmd
      .option('-c, --category <name>', 'Only this category (exact, case-sensitive)')
      .option('--from <date>', 'Start date, inclusive (YYYY-MM-DD)')
      .option('--to <date>', 'End date, inclusive (YYYY-MM-DD)')
  }

  // Add command
  addGlobalOptions(
    program
      .command('add')
      .description('Record a new expense')
      .requiredOption('-c, --category <name>', 'Expense category')
      .requiredOption('-a, --amount <amount>', 'Amount, e.g. 12.50')
      .option('--date <date>', 'Expense date (YYYY-MM-DD, default: today)')
      .option('--description <text>', 'Free-text description', '')
  ).action((options: AddOptions) => {
    result = { command: 'add', options }
  })

  // List command
  addGlobalOptions(
    addFilterOptions(
      program
        .command('list')
        .description('List expenses, newest first')
        .option('-s, --search <keyword>', 'Case-insensitive keyword across all fields')
        .option('-l, --limit <number>', 'Maximum number of expenses', parseCount, 50)
    )
  ).action((options: ListOptions) => {
    result = { command: 'list', options }
  })

  // Summary command
  addGlobalOptions(
    addFilterOptions(
      program
        .command('summary')
        .description('Totals by category and month, plus the largest expenses')
        .option('-t, --top <number>', 'Number of top expenses (default: from config)', parseCount)
    )
  ).action((options: SummaryOptions) => {
    result = { command: 'summary', options }
  })

  // Forecast command
  addGlobalOptions(
    addFilterOptions(
      program.command('forecast').description('Predict next month from the monthly trend')
    )
  ).action((options: ForecastOptions) => {
    result = { command: 'forecast', options }
  })

  // Export command
  addGlobalOptions(
    program
      .command('export')
      .description('Write monthly and category totals to an Excel workbook')
      .option('-o, --out <file>', 'Output .xlsx path (default: <reportsDir>/monthly_summary.xlsx)')
  ).action((options: ExportOptions) => {
    result = { command: 'export', options }
  })

  // Report command
  addGlobalOptions(
    program
      .command('report')
      .description('Generate the full PDF report')
      .option('-o, --out <file>', 'Output .pdf path (default: <reportsDir>/expense_report.pdf)')
      .option('-p, --project <file>', 'Project info JSON file for the cover page')
  ).action((options: ReportOptions) => {
    result = { command: 'report', options }
  })

  // Project command
  program
    .command('project')
    .description('Edit the project details shown on the report cover')
    .action(() => {
      result = { command: 'project' }
    })

  try {
    program.parse(argv)
  } catch (err: unknown) {
    // Commander throws on --help and --version, which is expected
    if (err && typeof err === 'object' && 'code' in err) {
      const { code } = err
      if (code === 'commander.helpDisplayed' || code === 'commander.version') {
        return null
      }
    }
    throw err
  }

  return result
}

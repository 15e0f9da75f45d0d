import type { AddOptions } from '../args.js'
import { appendExpense } from '../../expenses/expense-store.js'
import { getToday, validateExpense } from '../../expenses/expense-types.js'
import { formatMoney, reportError } from '../output.js'
import { createContext, toExpenseOutput, type ExpenseOutput } from './context.js'

interface AddResult {
  success: boolean
  dataFile: string
  expense: ExpenseOutput
  formatted?: string
}

/**
 * Add CLI command implementation.
 *
 * @example
 * expense-tui add --category Food --amount 12.50 --description "Lunch"
 */
export const addCommand = async (options: AddOptions): Promise<void> => {
  const context = await createContext(options)
  const { formatter, dataFile, config } = context

  const result = validateExpense(
    options.date ?? getToday(),
    options.category,
    options.amount,
    options.description
  )
  if (!result.success) {
    return reportError(formatter, result.error)
  }

  formatter.progress(`Saving expense to ${dataFile}...`)
  try {
    await appendExpense(dataFile, result.record)
  } catch (err) {
    return reportError(formatter, err)
  }

  const currency = config.display.currency
  const expense = toExpenseOutput(result.record, (amount) => formatMoney(amount, currency))
  const output: AddResult = { success: true, dataFile, expense }

  if (options.format === 'text') {
    const description = expense.description ? ` (${expense.description})` : ''
    output.formatted = `Added ${expense.amountFormatted} to ${expense.category} on ${expense.date}${description}`
  }

  formatter.success(output)
}

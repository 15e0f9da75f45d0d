import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import {
  ExpenseStoreError,
  appendExpense,
  loadExpenses,
  parseCsvRows,
  parseExpenseRows,
  serializeExpenses,
} from '../expense-store.js'
import { createMockExpense } from '../../test-utils/fixtures.js'

const HEADER = 'date,category,amount,description'

describe('parseCsvRows', () => {
  it('returns no rows for blank content', () => {
    expect(parseCsvRows('')).toEqual([])
    expect(parseCsvRows('  \n')).toEqual([])
  })

  it('keeps cell text exactly as written', () => {
    const rows = parseCsvRows(`${HEADER}\n2024-01-05,Food,12.50,Lunch\n`)

    expect(rows[1]).toEqual(['2024-01-05', 'Food', '12.50', 'Lunch'])
  })

  it('unquotes fields containing commas', () => {
    const rows = parseCsvRows(`${HEADER}\n2024-01-05,Rent,500,"Flat, January"\n`)

    expect(rows[1][3]).toBe('Flat, January')
  })
})

describe('parseExpenseRows', () => {
  it('returns nothing for an empty file', () => {
    expect(parseExpenseRows([])).toEqual({ records: [], rejected: [] })
  })

  it('maps columns by header name in any order and case', () => {
    const { records } = parseExpenseRows([
      ['Amount', 'DATE', 'Category'],
      ['12.5', '2024-01-01', 'Food'],
    ])

    expect(records).toEqual([{ date: '2024-01-01', category: 'Food', amount: 1250, description: '' }])
  })

  it('throws when a required column is missing', () => {
    expect(() => parseExpenseRows([['date', 'amount'], ['2024-01-01', '5']])).toThrow(ExpenseStoreError)
    expect(() => parseExpenseRows([['date', 'amount']])).toThrow(
      'Expense file header is missing column(s): category'
    )
  })

  it('collects invalid rows with their line numbers', () => {
    const { records, rejected } = parseExpenseRows([
      ['date', 'category', 'amount', 'description'],
      ['2024-01-15', 'Food', '12.50', 'Lunch'],
      ['2024-13-01', 'Food', '5', 'Bad month'],
      ['2024-01-20', 'Transport', 'abc', 'Bus'],
    ])

    expect(records).toHaveLength(1)
    expect(rejected.map((r) => [r.line, r.error.kind])).toEqual([
      [3, 'BadDate'],
      [4, 'BadAmount'],
    ])
    expect(rejected[1].raw).toEqual(['2024-01-20', 'Transport', 'abc', 'Bus'])
  })

  it('counts file lines spanned by quoted newlines', () => {
    const { rejected } = parseExpenseRows([
      ['date', 'category', 'amount', 'description'],
      ['2024-01-15', 'Food', '5', 'Two\nlines'],
      ['bad', 'Food', '5', ''],
    ])

    expect(rejected.map((r) => r.line)).toEqual([4])
  })

  it('skips blank rows without rejecting them', () => {
    const { records, rejected } = parseExpenseRows([
      ['date', 'category', 'amount'],
      ['', '', ''],
      ['2024-01-15', 'Food', '1'],
    ])

    expect(records).toHaveLength(1)
    expect(rejected).toEqual([])
  })
})

describe('serializeExpenses', () => {
  it('writes only the header for no records', () => {
    expect(serializeExpenses([])).toBe(`${HEADER}\n`)
  })

  it('writes amounts with two decimals', () => {
    const csv = serializeExpenses([createMockExpense({ date: '2024-02-03', category: 'Travel', amount: 4500, description: 'Taxi' })])

    expect(csv).toBe(`${HEADER}\n2024-02-03,Travel,45.00,Taxi\n`)
  })
})

describe('file operations', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'expense-store-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('creates a missing file with just the header', async () => {
    const path = join(dir, 'nested', 'expenses.csv')

    const result = await loadExpenses(path)

    expect(result).toEqual({ records: [], rejected: [] })
    expect(existsSync(path)).toBe(true)
    expect(await readFile(path, 'utf-8')).toBe(`${HEADER}\n`)
  })

  it('appends a record to a new file', async () => {
    const path = join(dir, 'expenses.csv')

    await appendExpense(path, createMockExpense({ date: '2024-01-15', category: 'Food', amount: 1250, description: 'Lunch' }))

    expect(await readFile(path, 'utf-8')).toBe(`${HEADER}\n2024-01-15,Food,12.50,Lunch\n`)
  })

  it('adds a line break when the file does not end with one', async () => {
    const path = join(dir, 'expenses.csv')
    await writeFile(path, `${HEADER}\n2024-01-01,Food,1.00,Snack`)

    await appendExpense(path, createMockExpense({ date: '2024-01-02', amount: 200, description: 'Tea' }))
    const { records } = await loadExpenses(path)

    expect(records.map((r) => r.description)).toEqual(['Snack', 'Tea'])
  })

  it('appends in the column order of the existing header', async () => {
    const path = join(dir, 'expenses.csv')
    await writeFile(path, 'category,date,amount,description\nFood,2024-01-05,10.00,Lunch\n')

    await appendExpense(path, createMockExpense({ date: '2024-02-01', category: 'Rent', amount: 50000, description: 'Flat' }))
    const { records, rejected } = await loadExpenses(path)

    expect(await readFile(path, 'utf-8')).toBe(
      'category,date,amount,description\nFood,2024-01-05,10.00,Lunch\nRent,2024-02-01,500.00,Flat\n'
    )
    expect(rejected).toEqual([])
    expect(records.map((r) => r.category)).toEqual(['Food', 'Rent'])
  })

  it('leaves out columns the existing header does not have', async () => {
    const path = join(dir, 'expenses.csv')
    await writeFile(path, 'amount,category,date\n')

    await appendExpense(path, createMockExpense({ date: '2024-02-01', category: 'Rent', amount: 50000, description: 'Flat' }))

    expect(await readFile(path, 'utf-8')).toBe('amount,category,date\n500.00,Rent,2024-02-01\n')
  })

  it('round-trips descriptions with commas and quotes', async () => {
    const path = join(dir, 'expenses.csv')
    const expense = createMockExpense({ description: 'Dinner, "the usual"' })

    await appendExpense(path, expense)
    const { records } = await loadExpenses(path)

    expect(records).toEqual([expense])
  })

  it('keeps rows that failed validation when appending', async () => {
    const path = join(dir, 'expenses.csv')
    await writeFile(path, `${HEADER}\nnot-a-date,Food,5,Broken\n`)

    await appendExpense(path, createMockExpense())
    const content = await readFile(path, 'utf-8')
    const { records, rejected } = await loadExpenses(path)

    expect(content).toContain('not-a-date,Food,5,Broken\n')
    expect(records).toHaveLength(1)
    expect(rejected).toHaveLength(1)
    expect(rejected[0].line).toBe(2)
  })
})

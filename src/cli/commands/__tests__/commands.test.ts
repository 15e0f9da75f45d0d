import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { addCommand, listCommand, forecastCommand, exportCommand, reportCommand } from '../index.js'
import type { GlobalOptions } from '../../args.js'

vi.mock('../../../config/config-service.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../config/config-service.js')>()),
  loadConfig: vi.fn(async () => null),
}))

const HEADER = 'date,category,amount,description'

describe('CLI commands', () => {
  let dir: string
  let dataFile: string
  let log: MockInstance<typeof console.log>
  let errorLog: MockInstance<typeof console.error>

  const base = (): GlobalOptions => ({ format: 'json', quiet: true, data: dataFile })

  const lastOutput = (): unknown => {
    const calls = log.mock.calls
    return JSON.parse(String(calls[calls.length - 1][0]))
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'expense-cli-'))
    dataFile = join(dir, 'expenses.csv')
    vi.stubEnv('EXPENSE_CURRENCY', '$')
    vi.stubEnv('EXPENSE_REPORTS_DIR', join(dir, 'reports'))
    log = vi.spyOn(console, 'log').mockImplementation(() => {})
    errorLog = vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`)
    })
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    vi.unstubAllEnvs()
    await rm(dir, { recursive: true, force: true })
  })

  it('adds an expense to the data file', async () => {
    await addCommand({ ...base(), date: '2024-01-15', category: 'Food', amount: '12.5', description: 'Lunch' })

    expect(lastOutput()).toEqual({
      success: true,
      dataFile,
      expense: { date: '2024-01-15', category: 'Food', amount: 12.5, amountFormatted: '$12.50', description: 'Lunch' },
    })
    expect(await readFile(dataFile, 'utf-8')).toBe(`${HEADER}\n2024-01-15,Food,12.50,Lunch\n`)
  })

  it('rejects an invalid amount without writing', async () => {
    await expect(
      addCommand({ ...base(), date: '2024-01-15', category: 'Food', amount: 'abc', description: '' })
    ).rejects.toThrow('exit 1')

    expect(errorLog).toHaveBeenCalledWith(
      JSON.stringify(
        { success: false, error: 'Invalid amount "abc" (expected a positive number)', details: { kind: 'BadAmount' } },
        null,
        2
      )
    )
    expect(existsSync(dataFile)).toBe(false)
  })

  it('lists expenses newest first with a limit', async () => {
    await writeFile(
      dataFile,
      `${HEADER}\n2024-01-05,Food,10.00,Bread\n2024-03-01,Rent,500.00,March\n2024-02-10,Food,20.00,Cheese\n`
    )

    await listCommand({ ...base(), limit: 2 })

    expect(lastOutput()).toMatchObject({
      success: true,
      count: 2,
      total: 3,
      expenses: [{ description: 'March' }, { description: 'Cheese' }],
    })
  })

  it('fails on an inverted date range', async () => {
    await writeFile(dataFile, `${HEADER}\n`)

    await expect(listCommand({ ...base(), limit: 50, from: '2024-03-01', to: '2024-01-01' })).rejects.toThrow(
      'exit 1'
    )
    expect(errorLog).toHaveBeenCalledWith(
      JSON.stringify(
        { success: false, error: 'Start date 2024-03-01 is after end date 2024-01-01', details: { kind: 'BadRange' } },
        null,
        2
      )
    )
  })

  it('reports insufficient data for a forecast', async () => {
    await writeFile(dataFile, `${HEADER}\n2024-01-05,Food,10.00,Bread\n`)

    await forecastCommand(base())

    expect(lastOutput()).toEqual({
      success: false,
      months: [{ month: '2024-01', total: 1000, count: 1 }],
      forecast: {
        success: false,
        error: { kind: 'InsufficientData', message: 'Need at least 2 months of data for a forecast (have 1)' },
      },
    })
  })

  it('exports the workbook to the reports directory', async () => {
    await writeFile(dataFile, `${HEADER}\n2024-01-05,Food,10.00,Bread\n2024-02-05,Rent,100.00,Feb\n`)

    await exportCommand(base())

    const path = join(dir, 'reports', 'monthly_summary.xlsx')
    expect(lastOutput()).toEqual({ success: true, path, months: 2, categories: 2 })
    expect(existsSync(path)).toBe(true)
  })

  it('refuses to export an empty dataset', async () => {
    await expect(exportCommand(base())).rejects.toThrow('exit 1')
  })

  it('writes the PDF report', async () => {
    await writeFile(dataFile, `${HEADER}\n2024-01-05,Food,10.00,Bread\n`)
    const out = join(dir, 'out', 'report.pdf')

    await reportCommand({ ...base(), out })

    expect(lastOutput()).toEqual({ success: true, path: out, expenses: 1 })
    const bytes = await readFile(out)
    expect(bytes.subarray(0, 5).toString()).toBe('%PDF-')
  })
})

import { describe, it, expect } from 'vitest'
import {
  appConfigSchema,
  projectInfoSchema,
  teamMemberSchema,
  DEFAULT_CONFIG,
  DEFAULT_PROJECT_INFO,
} from '../config-types.js'

describe('teamMemberSchema', () => {
  it('accepts a name with an optional role', () => {
    expect(teamMemberSchema.safeParse({ name: 'Asha' }).success).toBe(true)
    expect(teamMemberSchema.safeParse({ name: 'Asha', role: 'Lead' }).success).toBe(true)
  })

  it('rejects an empty name', () => {
    expect(teamMemberSchema.safeParse({ name: '' }).success).toBe(false)
  })
})

describe('projectInfoSchema', () => {
  it('fills defaults for missing fields', () => {
    const result = projectInfoSchema.parse({ course: 'Software Engineering' })

    expect(result.projectTitle).toBe('Smart Expense Tracker')
    expect(result.course).toBe('Software Engineering')
    expect(result.team).toEqual([])
  })

  it('rejects a non-array team', () => {
    expect(projectInfoSchema.safeParse({ team: 'everyone' }).success).toBe(false)
  })
})

describe('appConfigSchema', () => {
  it('produces full defaults from an empty object', () => {
    expect(DEFAULT_CONFIG).toEqual({
      storage: { dataFile: 'data/expenses.csv', reportsDir: 'reports' },
      display: { currency: '₹', pageSize: 30, topN: 10 },
      report: { rowsPerPage: 28 },
    })
  })

  it('keeps provided values and defaults the rest', () => {
    const result = appConfigSchema.parse({ display: { currency: '$' } })

    expect(result.display).toEqual({ currency: '$', pageSize: 30, topN: 10 })
    expect(result.storage.dataFile).toBe('data/expenses.csv')
  })

  it('validates numeric bounds', () => {
    expect(appConfigSchema.safeParse({ display: { topN: 0 } }).success).toBe(false)
    expect(appConfigSchema.safeParse({ display: { pageSize: 500 } }).success).toBe(false)
    expect(appConfigSchema.safeParse({ report: { rowsPerPage: 4 } }).success).toBe(false)
    expect(appConfigSchema.safeParse({ report: { rowsPerPage: 40 } }).success).toBe(true)
    expect(appConfigSchema.safeParse({ report: { rowsPerPage: 41 } }).success).toBe(false)
  })

  it('rejects an empty data file path', () => {
    expect(appConfigSchema.safeParse({ storage: { dataFile: '' } }).success).toBe(false)
  })

  it('accepts project info', () => {
    const result = appConfigSchema.parse({ project: { supervisor: 'Dr. Rao' } })

    expect(result.project).toEqual({ ...DEFAULT_PROJECT_INFO, supervisor: 'Dr. Rao' })
  })
})

import { describe, it, expect, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { loadProjectInfoFile } from '../config-service.js'

describe('loadProjectInfoFile', () => {
  let dir: string | undefined

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true })
  })

  it('reads project info and fills defaults', async () => {
    dir = await mkdtemp(join(tmpdir(), 'project-info-'))
    const path = join(dir, 'project.json')
    await writeFile(path, JSON.stringify({ institute: 'City College', team: [{ name: 'Asha', role: 'Lead' }] }))

    const info = await loadProjectInfoFile(path)

    expect(info.institute).toBe('City College')
    expect(info.projectTitle).toBe('Smart Expense Tracker')
    expect(info.team).toEqual([{ name: 'Asha', role: 'Lead' }])
  })

  it('rejects an invalid shape', async () => {
    dir = await mkdtemp(join(tmpdir(), 'project-info-'))
    const path = join(dir, 'project.json')
    await writeFile(path, JSON.stringify({ team: [{ role: 'No name' }] }))

    await expect(loadProjectInfoFile(path)).rejects.toThrow()
  })
})

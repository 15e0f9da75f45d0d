import { homedir } from 'node:os'
import { join } from 'node:path'
import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { appConfigSchema, projectInfoSchema, type AppConfig, type ProjectInfo } from './config-types.js'

const CONFIG_DIR = join(homedir(), '.config', 'expense-tui')
const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

export const getConfigPath = () => CONFIG_FILE

/**
 * Reads the config file. Returns null when it is missing or fails validation.
 */
export const loadConfig = async (): Promise<AppConfig | null> => {
  try {
    if (!existsSync(CONFIG_FILE)) return null
    const content = await readFile(CONFIG_FILE, 'utf-8')
    return appConfigSchema.parse(JSON.parse(content))
  } catch {
    return null
  }
}

export const saveConfig = async (config: AppConfig): Promise<void> => {
  await mkdir(CONFIG_DIR, { recursive: true })
  await writeFile(CONFIG_FILE, JSON.stringify(config, null, 2))
}

export const updateConfig = async (updates: Partial<AppConfig>): Promise<AppConfig> => {
  const current = (await loadConfig()) ?? appConfigSchema.parse({})

  const updated: AppConfig = {
    ...current,
    storage: { ...current.storage, ...updates.storage },
    display: { ...current.display, ...updates.display },
    report: { ...current.report, ...updates.report },
    project: updates.project ?? current.project,
  }

  await saveConfig(updated)
  return updated
}

/**
 * Reads project info from a standalone JSON file (used by `report --project`).
 * Missing fields fall back to defaults; invalid JSON or shapes throw.
 */
export const loadProjectInfoFile = async (path: string): Promise<ProjectInfo> => {
  const content = await readFile(path, 'utf-8')
  return projectInfoSchema.parse(JSON.parse(content))
}

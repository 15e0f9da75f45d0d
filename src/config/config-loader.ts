import { isAbsolute, resolve } from 'node:path'
import { loadConfig as loadConfigFile } from './config-service.js'
import { appConfigSchema, type AppConfig } from './config-types.js'

/**
 * Environment variable names for scripting
 */
export const ENV_VARS = {
  DATA_FILE: 'EXPENSE_DATA_FILE',
  REPORTS_DIR: 'EXPENSE_REPORTS_DIR',
  CURRENCY: 'EXPENSE_CURRENCY',
} as const

export type ConfigSource = 'env' | 'file' | 'mixed' | 'defaults'

interface LoadConfigResult {
  config: AppConfig
  source: ConfigSource
}

export interface ConfigOverrides {
  /** Data file from the command line; wins over env and file */
  dataFile?: string
}

/**
 * Load config from environment variables, with fallback to the config file
 * and then to schema defaults. Env vars take priority over config file values.
 */
export const loadConfigWithEnv = async (
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadConfigResult> => {
  const fileConfig = await loadConfigFile()

  const envDataFile = env[ENV_VARS.DATA_FILE] || undefined
  const envReportsDir = env[ENV_VARS.REPORTS_DIR] || undefined
  const envCurrency = env[ENV_VARS.CURRENCY] || undefined
  const hasEnv = Boolean(envDataFile || envReportsDir || envCurrency)

  let source: ConfigSource
  if (hasEnv) {
    source = fileConfig ? 'mixed' : 'env'
  } else {
    source = fileConfig ? 'file' : 'defaults'
  }

  const mergedConfig = {
    ...fileConfig,
    storage: {
      ...fileConfig?.storage,
      dataFile: overrides.dataFile ?? envDataFile ?? fileConfig?.storage.dataFile,
      reportsDir: envReportsDir ?? fileConfig?.storage.reportsDir,
    },
    display: {
      ...fileConfig?.display,
      currency: envCurrency ?? fileConfig?.display.currency,
    },
  }

  // Validate with zod schema; undefined fields take their defaults
  const validated = appConfigSchema.parse(mergedConfig)

  return { config: validated, source }
}

/**
 * Resolves a configured path against the working directory.
 */
export const resolvePath = (path: string, cwd: string = process.cwd()): string =>
  isAbsolute(path) ? path : resolve(cwd, path)

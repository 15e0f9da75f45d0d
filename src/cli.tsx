#!/usr/bin/env node
import React from 'react'
import { render } from 'ink'
import { App } from './app.js'
import { parseArgs, type CommandAction } from './cli/args.js'
import { loadConfigWithEnv, resolvePath } from './config/config-loader.js'
import { runProjectWizard } from './config/project-wizard.js'
import {
  addCommand,
  listCommand,
  summaryCommand,
  forecastCommand,
  exportCommand,
  reportCommand,
} from './cli/commands/index.js'

const runTuiMode = async (data: string | undefined) => {
  const { config } = await loadConfigWithEnv({ dataFile: data })
  const dataFile = resolvePath(config.storage.dataFile)

  const instance = render(<App config={config} dataFile={dataFile} />)
  await instance.waitUntilExit()
}

const runCliCommand = async (action: CommandAction) => {
  switch (action.command) {
    case 'tui':
      await runTuiMode(action.data)
      break
    case 'project':
      await runProjectWizard()
      break
    case 'add':
      await addCommand(action.options)
      break
    case 'list':
      await listCommand(action.options)
      break
    case 'summary':
      await summaryCommand(action.options)
      break
    case 'forecast':
      await forecastCommand(action.options)
      break
    case 'export':
      await exportCommand(action.options)
      break
    case 'report':
      await reportCommand(action.options)
      break
  }
}

const main = async () => {
  try {
    // Parse command line arguments
    const action = parseArgs(process.argv)

    // If null, --help or --version was displayed
    if (!action) {
      process.exit(0)
    }

    await runCliCommand(action)
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error)
    process.exit(1)
  }
}

void main()

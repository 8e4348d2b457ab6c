#!/usr/bin/env node

import { Command } from 'commander'
import { realpathSync } from 'node:fs'
import { createRequire } from 'node:module'
import { pathToFileURL } from 'node:url'
import process from 'node:process'
import { z } from 'zod'

import {
  commandImport,
  commandMigrate,
  commandServe,
  commandStats,
  commandStop,
} from './commands.js'

const require = createRequire(import.meta.url)
const pkg = z.object({ version: z.string() }).parse(require('../package.json'))

const PROJECT_DIR_HELP = 'Project directory (default: $PROJECT_DIR or the current directory)'

export function createProgram(): Command {
  const program = new Command()
    .name('feature-queue')
    .description('Feature backlog for an autonomous coding agent')
    .version(pkg.version)

  program
    .command('serve')
    .description('Serve the feature tools over MCP on stdio')
    .option('--project-dir <path>', PROJECT_DIR_HELP)
    .action(async (opts: { projectDir?: string }) => {
      await commandServe(opts)
    })

  program
    .command('migrate')
    .description('Apply database migrations and import a legacy feature_list.json')
    .option('--project-dir <path>', PROJECT_DIR_HELP)
    .action(async (opts: { projectDir?: string }) => {
      await commandMigrate(opts)
    })

  program
    .command('stats')
    .description('Show how many features are passing')
    .option('--json', 'Emit JSON output')
    .option('--project-dir <path>', PROJECT_DIR_HELP)
    .action(async (opts: { json?: boolean; projectDir?: string }) => {
      await commandStats(opts)
    })

  program
    .command('import')
    .description('Append features from a JSON array file to the end of the queue')
    .argument('<file>', 'JSON file with category, name, description and steps per feature')
    .option('--project-dir <path>', PROJECT_DIR_HELP)
    .action(async (file: string, opts: { projectDir?: string }) => {
      await commandImport(file, opts)
    })

  program
    .command('stop')
    .description('Ask the running agent to stop after its current feature')
    .option('--clear', 'Withdraw a pending stop request')
    .option('--project-dir <path>', PROJECT_DIR_HELP)
    .action((opts: { clear?: boolean; projectDir?: string }) => {
      commandStop(opts)
    })

  return program
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv)
}

const isDirectRun = (() => {
  if (typeof process.argv[1] !== 'string') return false
  try {
    return import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href
  } catch {
    return import.meta.url === pathToFileURL(process.argv[1]).href
  }
})()

if (isDirectRun) {
  runCli().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error)
    console.error(`error: ${message}`)
    process.exit(1)
  })
}

import { existsSync, readFileSync } from 'node:fs'
import path from 'node:path'

import { SchedulerError, FeatureValidationError } from '@feature-queue/core'
import { describeReceipt } from '@feature-queue/database'
import { serveStdio } from '@feature-queue/mcp-server'

import {
  clearStop,
  isStopRequested,
  requestStop,
  resolvePaths,
  withScheduler,
  type ProjectOptions,
} from './lib/index.js'

export async function commandServe(options: ProjectOptions): Promise<void> {
  const paths = resolvePaths(options.projectDir)
  if (isStopRequested(paths.stopFile)) {
    console.error(`Stop requested (${paths.stopFile}); the agent will exit after its current feature.`)
  }
  await serveStdio({ projectDir: paths.projectDir, databasePath: paths.databasePath })
}

export async function commandMigrate(options: ProjectOptions): Promise<void> {
  const paths = resolvePaths(options.projectDir)
  console.log(`Running migrations for ${paths.databasePath}...`)
  await withScheduler(paths, (_scheduler, receipt) => {
    for (const line of describeReceipt(receipt)) console.log(line)
    return Promise.resolve()
  })
  console.log('Migrations complete!')
}

export async function commandStats(options: ProjectOptions & { json?: boolean }): Promise<void> {
  const paths = resolvePaths(options.projectDir)
  const stats = await withScheduler(paths, (scheduler) => scheduler.getStats())

  if (options.json) {
    console.log(JSON.stringify(stats, null, 2))
    return
  }
  console.log(`Progress: ${stats.passing}/${stats.total} features passing (${stats.percentage}%)`)
  if (isStopRequested(paths.stopFile)) {
    console.log('Stop requested: the agent will exit after its current feature.')
  }
}

function readFeatureFile(file: string): unknown[] {
  const resolved = path.resolve(file)
  if (!existsSync(resolved)) {
    throw new Error(`File not found: ${resolved}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(resolved, 'utf8'))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid JSON in ${resolved}: ${message}`)
  }

  if (!Array.isArray(parsed)) {
    throw new Error(`${resolved} must contain a JSON array of features`)
  }
  return parsed
}

export async function commandImport(file: string, options: ProjectOptions): Promise<void> {
  const features = readFeatureFile(file)
  if (features.length === 0) {
    console.log('No features to import.')
    return
  }

  const paths = resolvePaths(options.projectDir)
  try {
    const created = await withScheduler(paths, (scheduler) => scheduler.createBulk(features))
    console.log(`Created ${created} features.`)
  } catch (error) {
    if (error instanceof FeatureValidationError) {
      throw new Error(`${error.message}; nothing was imported`)
    }
    if (error instanceof SchedulerError) {
      throw new Error(error.message)
    }
    throw error
  }
}

export function commandStop(options: ProjectOptions & { clear?: boolean }): void {
  const paths = resolvePaths(options.projectDir)
  if (options.clear) {
    const removed = clearStop(paths.stopFile)
    console.log(removed ? 'Stop request cleared.' : 'No stop request pending.')
    return
  }
  requestStop(paths.stopFile)
  console.log('Stop requested. The agent will finish its current feature and exit.')
  console.log(`Signal file: ${paths.stopFile}`)
}

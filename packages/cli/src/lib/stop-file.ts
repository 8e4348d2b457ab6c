import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs'
import path from 'node:path'

// Checked by the coding agent between features; it finishes the current one and exits.
export const STOP_FILE_NAME = '.feature-queue-stop'

export function requestStop(stopFile: string, now: Date = new Date()): void {
  mkdirSync(path.dirname(stopFile), { recursive: true })
  writeFileSync(stopFile, `${now.toISOString()}\n`, 'utf8')
}

export function clearStop(stopFile: string): boolean {
  if (!existsSync(stopFile)) return false
  rmSync(stopFile, { force: true })
  return true
}

export function isStopRequested(stopFile: string): boolean {
  return existsSync(stopFile)
}

import path from 'node:path'
import { loadConfig, parseConfig } from '@feature-queue/config'

import { STOP_FILE_NAME } from './stop-file.js'
import type { Paths } from './types.js'

export function resolvePaths(projectDir?: string): Paths {
  const config = projectDir ? parseConfig({ ...process.env, PROJECT_DIR: projectDir }) : loadConfig()
  return {
    projectDir: config.projectDir,
    databasePath: config.databasePath,
    stopFile: path.join(config.projectDir, STOP_FILE_NAME),
  }
}

import path from 'node:path'
import { z } from 'zod'

export const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  // Directory of the project whose features are tracked
  PROJECT_DIR: z.string().min(1).default('.'),
  // SQLite database file; defaults to features.db inside PROJECT_DIR
  DATABASE_URL: z.string().min(1).optional(),
})

export type Config = {
  nodeEnv: z.infer<typeof configSchema>['NODE_ENV']
  projectDir: string
  databasePath: string
}

export const DEFAULT_DATABASE_FILE = 'features.db'

let cachedConfig: Config | null = null

export function parseConfig(env: Record<string, string | undefined>): Config {
  const result = configSchema.safeParse(env)

  if (!result.success) {
    console.error('Invalid environment configuration:')
    console.error(result.error.format())
    throw new Error('Invalid environment configuration')
  }

  const projectDir = path.resolve(result.data.PROJECT_DIR)
  return {
    nodeEnv: result.data.NODE_ENV,
    projectDir,
    databasePath: result.data.DATABASE_URL
      ? path.resolve(result.data.DATABASE_URL)
      : path.join(projectDir, DEFAULT_DATABASE_FILE),
  }
}

export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig
  }

  cachedConfig = parseConfig(process.env)
  return cachedConfig
}

export function resetConfigCache(): void {
  cachedConfig = null
}

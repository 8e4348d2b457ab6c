import path from 'node:path'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { loadConfig, parseConfig, resetConfigCache } from '../src/env'

afterEach(() => {
  resetConfigCache()
  vi.unstubAllEnvs()
  vi.restoreAllMocks()
})

describe('parseConfig', () => {
  it('defaults to the working directory and features.db', () => {
    const config = parseConfig({})

    expect(config.nodeEnv).toBe('development')
    expect(config.projectDir).toBe(path.resolve('.'))
    expect(config.databasePath).toBe(path.join(path.resolve('.'), 'features.db'))
  })

  it('places the database inside PROJECT_DIR', () => {
    const config = parseConfig({ PROJECT_DIR: '/tmp/demo-project', NODE_ENV: 'test' })

    expect(config.nodeEnv).toBe('test')
    expect(config.projectDir).toBe('/tmp/demo-project')
    expect(config.databasePath).toBe('/tmp/demo-project/features.db')
  })

  it('honours an explicit DATABASE_URL', () => {
    const config = parseConfig({ PROJECT_DIR: '/tmp/demo-project', DATABASE_URL: '/data/q.db' })
    expect(config.databasePath).toBe('/data/q.db')
  })

  it('throws on an unknown NODE_ENV', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    expect(() => parseConfig({ NODE_ENV: 'staging' })).toThrow(
      'Invalid environment configuration'
    )
  })
})

describe('loadConfig', () => {
  it('caches the first parsed configuration', () => {
    vi.stubEnv('PROJECT_DIR', '/tmp/first')
    const first = loadConfig()
    vi.stubEnv('PROJECT_DIR', '/tmp/second')

    expect(loadConfig()).toBe(first)
    expect(first.projectDir).toBe('/tmp/first')
  })
})

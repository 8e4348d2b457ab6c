import { beforeEach, describe, expect, it } from 'vitest'
import { FeatureScheduler, InMemoryFeatureStore, StoreError } from '@feature-queue/core'
import { handleToolCall, toolCatalog, UnknownToolError } from '../src/tools'

const features = [
  {
    category: 'auth',
    name: 'Sign in',
    description: 'User signs in with email and password',
    steps: ['Open /login', 'Submit the form', 'See the dashboard'],
  },
  {
    category: 'auth',
    name: 'Sign out',
    description: 'User signs out from the menu',
    steps: ['Open the menu', 'Click sign out'],
  },
]

describe('handleToolCall', () => {
  let store: InMemoryFeatureStore
  let scheduler: FeatureScheduler

  const call = (name: string, args?: unknown) => handleToolCall(scheduler, name, args)

  beforeEach(async () => {
    store = new InMemoryFeatureStore()
    scheduler = new FeatureScheduler(store, { random: () => 0 })
    await call('feature_create_bulk', { features })
  })

  it('lists every tool once', () => {
    expect(toolCatalog.map((tool) => tool.name)).toEqual([
      'feature_get_stats',
      'feature_get_next',
      'feature_get_for_regression',
      'feature_mark_passing',
      'feature_skip',
      'feature_record_failure',
      'feature_create_bulk',
    ])
  })

  it('reports stats', async () => {
    await call('feature_mark_passing', { featureId: 1 })
    expect(await call('feature_get_stats')).toEqual({ passing: 1, total: 2, percentage: 50 })
  })

  it('returns the next feature as a snapshot', async () => {
    expect(await call('feature_get_next', {})).toEqual({
      id: 1,
      priority: 1,
      category: 'auth',
      name: 'Sign in',
      description: 'User signs in with email and password',
      steps: ['Open /login', 'Submit the form', 'See the dashboard'],
      passes: false,
      inProgress: true,
      failureCount: 0,
      lastError: null,
    })
  })

  it('marks resumed work and previous failures', async () => {
    await call('feature_record_failure', { featureId: 2, errorMessage: 'selector missing' })
    await call('feature_skip', { featureId: 1 })

    const fresh = await call('feature_get_next')
    expect(fresh).toMatchObject({
      id: 2,
      attemptsRemaining: 4,
      warning: 'This feature has failed 1 time(s) previously',
    })

    const resumed = await call('feature_get_next')
    expect(resumed).toMatchObject({
      id: 2,
      resumed: true,
      message: 'Resuming previously started feature',
      attemptsRemaining: 4,
    })
  })

  it('walks the auto-skip scenario', async () => {
    await call('feature_get_next')

    let last: Record<string, unknown> = {}
    for (let i = 0; i < 5; i++) {
      last = await call('feature_record_failure', { featureId: 1, errorMessage: 'x' })
    }
    expect(last).toEqual({
      featureId: 1,
      featureName: 'Sign in',
      failureCount: 5,
      maxFailures: 5,
      thresholdExceeded: true,
      message: "Recorded failure #5 for feature 'Sign in'",
      warning: 'Feature will be auto-skipped on next attempt',
    })

    expect(await call('feature_get_next')).toEqual({
      autoSkipped: true,
      skippedFeatureId: 1,
      skippedFeatureName: 'Sign in',
      failureCount: 5,
      oldPriority: 1,
      newPriority: 3,
      reason: 'Feature failed 5 times consecutively and was auto-skipped',
      lastError: 'x',
      message: 'Fetching next feature...',
    })

    expect(await call('feature_get_next')).toMatchObject({ id: 2, name: 'Sign out' })
  })

  it('omits the warning below the threshold', async () => {
    const result = await call('feature_record_failure', { featureId: 1, errorMessage: 'x' })
    expect(result).not.toHaveProperty('warning')
    expect(result.thresholdExceeded).toBe(false)
  })

  it('reports blocked and completed queues as errors', async () => {
    for (let i = 0; i < 5; i++) {
      await call('feature_record_failure', { featureId: 1, errorMessage: 'x' })
    }
    await call('feature_mark_passing', { featureId: 2 })

    expect(await call('feature_get_next')).toEqual({
      error:
        'All remaining features have failed too many times (1 features blocked). Manual intervention required.',
      blockedCount: 1,
    })

    await call('feature_mark_passing', { featureId: 1 })
    expect(await call('feature_get_next')).toEqual({
      error: 'All features are passing! No more work to do.',
    })
  })

  it('skips a feature to the end of the queue', async () => {
    expect(await call('feature_skip', { featureId: 1 })).toEqual({
      id: 1,
      name: 'Sign in',
      oldPriority: 1,
      newPriority: 3,
      message: "Feature 'Sign in' moved to end of queue",
    })
  })

  it('rejects skipping a passing feature', async () => {
    await call('feature_mark_passing', { featureId: 1 })
    expect(await call('feature_skip', { featureId: 1 })).toEqual({
      error: 'Cannot skip a feature that is already passing',
    })
  })

  it('reports unknown feature ids', async () => {
    expect(await call('feature_mark_passing', { featureId: 9 })).toEqual({
      error: 'Feature with ID 9 not found',
    })
  })

  it('returns a regression sample bounded by the passing count', async () => {
    await call('feature_mark_passing', { featureId: 2 })

    const result = await call('feature_get_for_regression', {})
    expect(result.count).toBe(1)
    expect(result.features).toEqual([expect.objectContaining({ id: 2, passes: true })])
  })

  it('reports the offending index of an invalid bulk entry', async () => {
    const result = await call('feature_create_bulk', {
      features: [features[0], { category: 'auth', name: 'No steps', description: 'd' }],
    })

    expect(result).toEqual({
      error: 'Feature at index 1 has missing or invalid fields (steps)',
      index: 1,
      fields: ['steps'],
    })
    expect(await call('feature_get_stats')).toEqual({ passing: 0, total: 2, percentage: 0 })
  })

  it('rejects malformed arguments', async () => {
    expect(await call('feature_mark_passing', { featureId: 0 })).toEqual({
      error: 'Invalid arguments: featureId: Number must be greater than or equal to 1',
    })
    expect(await call('feature_get_for_regression', { limit: 11 })).toEqual({
      error: 'Invalid arguments: limit: Number must be less than or equal to 10',
    })
    expect(await call('feature_create_bulk', { features: [] })).toEqual({
      error: 'Invalid arguments: features: Array must contain at least 1 element(s)',
    })
    expect(await call('feature_skip', 'nope')).toEqual({ error: 'arguments must be an object' })
  })

  it('throws for unknown tools', async () => {
    await expect(call('feature_delete', {})).rejects.toBeInstanceOf(UnknownToolError)
  })

  it('lets store failures propagate', async () => {
    const failing = new FeatureScheduler({
      transaction: () => Promise.reject(new StoreError('disk I/O error')),
      close: () => Promise.resolve(),
    })

    await expect(handleToolCall(failing, 'feature_get_stats', {})).rejects.toBeInstanceOf(
      StoreError
    )
  })
})

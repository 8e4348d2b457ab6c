import { type Feature, MAX_FEATURE_FAILURES, type NewFeature, truncateError } from './feature'
import { type FeatureStore, type FeatureStoreTransaction } from './feature-store'
import {
  FeatureAlreadyPassingError,
  FeatureNotFoundError,
  FeatureValidationError,
} from './errors'
import { checkFeatureInput } from './schemas'
import { type RandomSource, sample } from './shuffle'

export type FetchNextResult =
  | {
      kind: 'next'
      feature: Feature
      // Present only when the feature failed before
      attemptsRemaining?: number
    }
  | { kind: 'resumed'; feature: Feature; attemptsRemaining: number }
  | {
      kind: 'auto-skipped'
      featureId: number
      featureName: string
      failureCount: number
      lastError: string | null
      oldPriority: number
      newPriority: number
    }
  | { kind: 'blocked'; blockedCount: number }
  | { kind: 'all-complete' }

export interface SkipResult {
  id: number
  name: string
  oldPriority: number
  newPriority: number
}

export interface FailureResult {
  feature: Feature
  thresholdExceeded: boolean
}

export interface FeatureStats {
  passing: number
  total: number
  percentage: number
}

export interface FeatureSchedulerOptions {
  random?: RandomSource
  onAutoSkip?: (result: Extract<FetchNextResult, { kind: 'auto-skipped' }>) => void
}

async function nextPriority(tx: FeatureStoreTransaction): Promise<number> {
  const max = await tx.maxPriority()
  return max === null ? 1 : max + 1
}

async function requireFeature(tx: FeatureStoreTransaction, id: number): Promise<Feature> {
  const feature = await tx.findById(id)
  if (!feature) {
    throw new FeatureNotFoundError(id)
  }
  return feature
}

/**
 * One decimal place, ties to the even tenth. Only quarters (x.25, x.75) are
 * exact ties in binary; everything else rounds to the nearest tenth.
 */
export function roundPercentage(passing: number, total: number): number {
  if (total <= 0) return 0
  const percentage = (passing / total) * 100
  const quarters = percentage * 4
  if (Number.isInteger(quarters) && quarters % 2 === 1) {
    const tenths = Math.floor(percentage * 10)
    return (tenths % 2 === 0 ? tenths : tenths + 1) / 10
  }
  return Number(percentage.toFixed(1))
}

/**
 * Work-item scheduler over a FeatureStore. Every operation runs in exactly one
 * store transaction. Callers are expected to keep at most one feature in
 * progress: fetchNext only hands out a fresh feature when none is in progress.
 */
export class FeatureScheduler {
  private readonly random: RandomSource
  private readonly onAutoSkip?: FeatureSchedulerOptions['onAutoSkip']

  constructor(
    private readonly store: FeatureStore,
    options: FeatureSchedulerOptions = {}
  ) {
    this.random = options.random ?? Math.random
    this.onAutoSkip = options.onAutoSkip
  }

  async fetchNext(): Promise<FetchNextResult> {
    const result = await this.store.transaction(async (tx): Promise<FetchNextResult> => {
      const current = await tx.findFirst({ inProgress: true })

      if (current) {
        if (current.failureCount >= MAX_FEATURE_FAILURES) {
          const newPriority = await nextPriority(tx)
          await tx.update(current.id, {
            priority: newPriority,
            inProgress: false,
            failureCount: 0,
          })
          return {
            kind: 'auto-skipped',
            featureId: current.id,
            featureName: current.name,
            failureCount: current.failureCount,
            lastError: current.lastError,
            oldPriority: current.priority,
            newPriority,
          }
        }

        return {
          kind: 'resumed',
          feature: current,
          attemptsRemaining: MAX_FEATURE_FAILURES - current.failureCount,
        }
      }

      const candidate = await tx.findFirst({
        passes: false,
        failureCountBelow: MAX_FEATURE_FAILURES,
      })

      if (!candidate) {
        const blockedCount = await tx.count({
          passes: false,
          failureCountAtLeast: MAX_FEATURE_FAILURES,
        })
        return blockedCount > 0 ? { kind: 'blocked', blockedCount } : { kind: 'all-complete' }
      }

      const feature = await tx.update(candidate.id, { inProgress: true })
      if (feature.failureCount > 0) {
        return {
          kind: 'next',
          feature,
          attemptsRemaining: MAX_FEATURE_FAILURES - feature.failureCount,
        }
      }
      return { kind: 'next', feature }
    })

    if (result.kind === 'auto-skipped') {
      this.onAutoSkip?.(result)
    }
    return result
  }

  markPassing(id: number): Promise<Feature> {
    return this.store.transaction(async (tx) => {
      await requireFeature(tx, id)
      return tx.update(id, {
        passes: true,
        inProgress: false,
        failureCount: 0,
        lastError: null,
      })
    })
  }

  skip(id: number): Promise<SkipResult> {
    return this.store.transaction(async (tx) => {
      const feature = await requireFeature(tx, id)
      if (feature.passes) {
        throw new FeatureAlreadyPassingError(id)
      }

      const newPriority = await nextPriority(tx)
      await tx.update(id, {
        priority: newPriority,
        inProgress: false,
        failureCount: 0,
        lastError: null,
      })

      return { id, name: feature.name, oldPriority: feature.priority, newPriority }
    })
  }

  recordFailure(id: number, message: string): Promise<FailureResult> {
    return this.store.transaction(async (tx) => {
      const feature = await requireFeature(tx, id)
      const updated = await tx.update(id, {
        failureCount: feature.failureCount + 1,
        lastError: truncateError(message),
      })
      return {
        feature: updated,
        thresholdExceeded: updated.failureCount >= MAX_FEATURE_FAILURES,
      }
    })
  }

  /**
   * Appends features after the current tail of the queue, keeping the given
   * order. The first invalid entry rejects the whole batch.
   */
  createBulk(items: readonly unknown[]): Promise<number> {
    return this.store.transaction(async (tx) => {
      const start = await nextPriority(tx)
      const features: NewFeature[] = []

      items.forEach((item, index) => {
        const check = checkFeatureInput(item)
        if (!check.ok) {
          throw new FeatureValidationError(index, check.fields)
        }
        features.push({ ...check.value, priority: start + index })
      })

      return tx.insertMany(features)
    })
  }

  getStats(): Promise<FeatureStats> {
    return this.store.transaction(async (tx) => {
      const total = await tx.count()
      const passing = await tx.count({ passes: true })
      return { passing, total, percentage: roundPercentage(passing, total) }
    })
  }

  getForRegression(limit: number): Promise<Feature[]> {
    return this.store.transaction(async (tx) => {
      const passing = await tx.list({ passes: true })
      return sample(passing, limit, this.random)
    })
  }
}

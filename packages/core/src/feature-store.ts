import { type Feature, type FeatureUpdate, type NewFeature } from './feature'
import { FeatureNotFoundError } from './errors'

export interface FeatureFilter {
  passes?: boolean
  inProgress?: boolean
  // Exclusive upper bound on failureCount
  failureCountBelow?: number
  // Inclusive lower bound on failureCount
  failureCountAtLeast?: number
}

/**
 * Reads and writes visible inside one store transaction. Ordered queries sort
 * by priority ascending, then id ascending.
 */
export interface FeatureStoreTransaction {
  findById(id: number): Promise<Feature | null>
  findFirst(filter: FeatureFilter): Promise<Feature | null>
  list(filter: FeatureFilter): Promise<Feature[]>
  count(filter?: FeatureFilter): Promise<number>
  maxPriority(): Promise<number | null>
  update(id: number, updates: FeatureUpdate): Promise<Feature>
  insertMany(features: NewFeature[]): Promise<number>
}

export interface FeatureStore {
  /**
   * Runs `fn` in a transaction. Commits when `fn` resolves and rolls back when
   * it rejects, re-throwing the rejection.
   */
  transaction<T>(fn: (tx: FeatureStoreTransaction) => Promise<T>): Promise<T>
  close(): Promise<void>
}

export function matchesFilter(feature: Feature, filter: FeatureFilter = {}): boolean {
  if (filter.passes !== undefined && feature.passes !== filter.passes) return false
  if (filter.inProgress !== undefined && feature.inProgress !== filter.inProgress) return false
  if (filter.failureCountBelow !== undefined && feature.failureCount >= filter.failureCountBelow) {
    return false
  }
  if (
    filter.failureCountAtLeast !== undefined &&
    feature.failureCount < filter.failureCountAtLeast
  ) {
    return false
  }
  return true
}

export function compareQueueOrder(a: Feature, b: Feature): number {
  return a.priority - b.priority || a.id - b.id
}

class InMemoryFeatureTransaction implements FeatureStoreTransaction {
  constructor(
    private readonly items: Map<number, Feature>,
    private nextId: number
  ) {}

  get lastId(): number {
    return this.nextId
  }

  findById(id: number): Promise<Feature | null> {
    const feature = this.items.get(id)
    return Promise.resolve(feature ? clone(feature) : null)
  }

  async findFirst(filter: FeatureFilter): Promise<Feature | null> {
    const [first] = await this.list(filter)
    return first ?? null
  }

  list(filter: FeatureFilter): Promise<Feature[]> {
    const matches = Array.from(this.items.values())
      .filter((feature) => matchesFilter(feature, filter))
      .sort(compareQueueOrder)
      .map(clone)
    return Promise.resolve(matches)
  }

  count(filter?: FeatureFilter): Promise<number> {
    let total = 0
    for (const feature of this.items.values()) {
      if (matchesFilter(feature, filter)) total++
    }
    return Promise.resolve(total)
  }

  maxPriority(): Promise<number | null> {
    let max: number | null = null
    for (const feature of this.items.values()) {
      if (max === null || feature.priority > max) max = feature.priority
    }
    return Promise.resolve(max)
  }

  update(id: number, updates: FeatureUpdate): Promise<Feature> {
    const existing = this.items.get(id)
    if (!existing) {
      return Promise.reject(new FeatureNotFoundError(id))
    }

    const updated: Feature = { ...existing, ...updates }
    this.items.set(id, updated)
    return Promise.resolve(clone(updated))
  }

  insertMany(features: NewFeature[]): Promise<number> {
    for (const input of features) {
      this.nextId += 1
      this.items.set(this.nextId, {
        id: this.nextId,
        priority: input.priority,
        category: input.category,
        name: input.name,
        description: input.description,
        steps: [...input.steps],
        passes: false,
        inProgress: false,
        failureCount: 0,
        lastError: null,
      })
    }
    return Promise.resolve(features.length)
  }
}

/**
 * Process-local store. Each transaction works on a copy of the table that
 * replaces the committed state only when the transaction resolves. Ids keep
 * increasing across rolled-back inserts, so they are never reused.
 */
export class InMemoryFeatureStore implements FeatureStore {
  private items: Map<number, Feature> = new Map()
  private lastId = 0
  private queue: Promise<unknown> = Promise.resolve()

  transaction<T>(fn: (tx: FeatureStoreTransaction) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const working = new Map(Array.from(this.items, ([id, feature]) => [id, clone(feature)]))
      const tx = new InMemoryFeatureTransaction(working, this.lastId)
      try {
        const result = await fn(tx)
        this.items = working
        return result
      } finally {
        this.lastId = tx.lastId
      }
    }

    // Serialize transactions so read-then-write sequences never interleave
    const next = this.queue.then(run, run)
    this.queue = next.catch(() => undefined)
    return next
  }

  close(): Promise<void> {
    return Promise.resolve()
  }
}

function clone(feature: Feature): Feature {
  return { ...feature, steps: [...feature.steps] }
}

export type SchedulerErrorCode = 'NOT_FOUND' | 'ALREADY_PASSING' | 'VALIDATION'

/**
 * Base class for rejections the scheduler reports back to the caller as a
 * result field. Thrown inside a store transaction so nothing is committed.
 */
export class SchedulerError extends Error {
  readonly code: SchedulerErrorCode

  constructor(code: SchedulerErrorCode, message: string) {
    super(message)
    this.name = 'SchedulerError'
    this.code = code
  }
}

export class FeatureNotFoundError extends SchedulerError {
  readonly featureId: number

  constructor(featureId: number) {
    super('NOT_FOUND', `Feature with ID ${featureId} not found`)
    this.name = 'FeatureNotFoundError'
    this.featureId = featureId
  }
}

export class FeatureAlreadyPassingError extends SchedulerError {
  readonly featureId: number

  constructor(featureId: number) {
    super('ALREADY_PASSING', 'Cannot skip a feature that is already passing')
    this.name = 'FeatureAlreadyPassingError'
    this.featureId = featureId
  }
}

export class FeatureValidationError extends SchedulerError {
  readonly index: number
  readonly fields: string[]

  constructor(index: number, fields: string[]) {
    const detail = fields.length > 0 ? fields.join(', ') : 'category, name, description, steps'
    super('VALIDATION', `Feature at index ${index} has missing or invalid fields (${detail})`)
    this.name = 'FeatureValidationError'
    this.index = index
    this.fields = fields
  }
}

/**
 * Storage failure (I/O, corruption, constraint violation). Aborts the current
 * operation; the transaction that raised it is rolled back.
 */
export class StoreError extends Error {
  readonly code = 'STORE'

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StoreError'
  }
}

export function isSchedulerError(error: unknown): error is SchedulerError {
  return error instanceof SchedulerError
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export const MAX_FEATURE_FAILURES = 5

export const MAX_ERROR_LENGTH = 500

export interface Feature {
  id: number
  priority: number
  category: string
  name: string
  description: string
  steps: string[]
  passes: boolean
  inProgress: boolean
  failureCount: number
  lastError: string | null
}

export interface NewFeature {
  priority: number
  category: string
  name: string
  description: string
  steps: string[]
}

export type FeatureUpdate = Partial<
  Pick<Feature, 'priority' | 'passes' | 'inProgress' | 'failureCount' | 'lastError'>
>

export function truncateError(message: string | null | undefined): string | null {
  if (!message) return null
  // Counted in code points so a surrogate pair is never split
  return Array.from(message).slice(0, MAX_ERROR_LENGTH).join('')
}

import { z } from 'zod'

export const featureInputSchema = z.object({
  category: z.string().min(1).max(100),
  name: z.string().min(1).max(255),
  description: z.string().min(1),
  steps: z.array(z.string()).min(1),
})

export type FeatureInput = z.infer<typeof featureInputSchema>

export type FeatureInputCheck =
  | { ok: true; value: FeatureInput }
  | { ok: false; fields: string[] }

/**
 * Validate one bulk-create entry. On failure, reports the top-level fields
 * that are missing or malformed, in schema order.
 */
export function checkFeatureInput(value: unknown): FeatureInputCheck {
  const result = featureInputSchema.safeParse(value)
  if (result.success) {
    return { ok: true, value: result.data }
  }

  const invalid = new Set<string>()
  for (const issue of result.error.issues) {
    const [field] = issue.path
    if (typeof field === 'string') invalid.add(field)
  }
  const fields = Object.keys(featureInputSchema.shape).filter((key) => invalid.has(key))
  return { ok: false, fields }
}

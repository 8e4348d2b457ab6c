import { z } from 'zod'

const featureId = z.number().int().min(1)

export const emptyInputSchema = z.object({}).strict()

export const regressionInputSchema = z
  .object({
    limit: z.number().int().min(1).max(10).default(3),
  })
  .strict()

export const featureIdInputSchema = z
  .object({
    featureId,
  })
  .strict()

export const recordFailureInputSchema = z
  .object({
    featureId,
    errorMessage: z.string(),
  })
  .strict()

// Entries are validated one by one by the scheduler so errors can name the index
export const createBulkInputSchema = z
  .object({
    features: z.array(z.unknown()).min(1),
  })
  .strict()

export type ToolInputSchema = {
  type: 'object'
  additionalProperties: false
  required?: string[]
  properties: Record<string, unknown>
}

type McpInputSchemaMap = {
  feature_get_stats: ToolInputSchema
  feature_get_next: ToolInputSchema
  feature_get_for_regression: ToolInputSchema
  feature_mark_passing: ToolInputSchema
  feature_skip: ToolInputSchema
  feature_record_failure: ToolInputSchema
  feature_create_bulk: ToolInputSchema
}

const featureIdProperty = {
  type: 'integer',
  minimum: 1,
  description: 'The ID of the feature',
}

export const mcpInputSchemas: McpInputSchemaMap = {
  feature_get_stats: { type: 'object', additionalProperties: false, properties: {} },
  feature_get_next: { type: 'object', additionalProperties: false, properties: {} },
  feature_get_for_regression: {
    type: 'object',
    additionalProperties: false,
    properties: {
      limit: {
        type: 'integer',
        minimum: 1,
        maximum: 10,
        default: 3,
        description: 'Maximum number of passing features to return',
      },
    },
  },
  feature_mark_passing: {
    type: 'object',
    additionalProperties: false,
    required: ['featureId'],
    properties: { featureId: featureIdProperty },
  },
  feature_skip: {
    type: 'object',
    additionalProperties: false,
    required: ['featureId'],
    properties: { featureId: featureIdProperty },
  },
  feature_record_failure: {
    type: 'object',
    additionalProperties: false,
    required: ['featureId', 'errorMessage'],
    properties: {
      featureId: featureIdProperty,
      errorMessage: { type: 'string', description: 'What went wrong' },
    },
  },
  feature_create_bulk: {
    type: 'object',
    additionalProperties: false,
    required: ['features'],
    properties: {
      features: {
        type: 'array',
        minItems: 1,
        description: 'Features to create, in priority order',
        items: {
          type: 'object',
          required: ['category', 'name', 'description', 'steps'],
          properties: {
            category: { type: 'string', minLength: 1, maxLength: 100 },
            name: { type: 'string', minLength: 1, maxLength: 255 },
            description: { type: 'string', minLength: 1 },
            steps: { type: 'array', minItems: 1, items: { type: 'string' } },
          },
        },
      },
    },
  },
}

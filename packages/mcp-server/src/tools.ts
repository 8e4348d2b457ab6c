import { ZodError, type ZodType, type ZodTypeDef } from 'zod'
import {
  type Feature,
  type FeatureScheduler,
  type FetchNextResult,
  FeatureValidationError,
  MAX_FEATURE_FAILURES,
  isSchedulerError,
} from '@feature-queue/core'
import {
  createBulkInputSchema,
  emptyInputSchema,
  featureIdInputSchema,
  mcpInputSchemas,
  recordFailureInputSchema,
  regressionInputSchema,
  type ToolInputSchema,
} from './schemas'

type ToolName = keyof typeof mcpInputSchemas

type ToolMeta = {
  name: ToolName
  description: string
  inputSchema: ToolInputSchema
}

export type ToolResult = Record<string, unknown>

export class UnknownToolError extends Error {
  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`)
    this.name = 'UnknownToolError'
  }
}

class InvalidArgumentsError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidArgumentsError'
  }
}

export const toolCatalog: ToolMeta[] = [
  {
    name: 'feature_get_stats',
    description:
      'Get feature completion progress: passing count, total count and percentage passing.',
    inputSchema: mcpInputSchemas.feature_get_stats,
  },
  {
    name: 'feature_get_next',
    description:
      'Get the next feature to implement and mark it in progress. Returns the in-progress feature again when resuming interrupted work. A feature that failed 5 times is auto-skipped; call again to get real work.',
    inputSchema: mcpInputSchemas.feature_get_next,
  },
  {
    name: 'feature_get_for_regression',
    description:
      'Get a random selection of passing features to re-verify after making changes.',
    inputSchema: mcpInputSchemas.feature_get_for_regression,
  },
  {
    name: 'feature_mark_passing',
    description:
      'Mark a feature as passing after implementing and verifying it. Clears its failure count and last error.',
    inputSchema: mcpInputSchemas.feature_mark_passing,
  },
  {
    name: 'feature_skip',
    description:
      'Move a feature to the end of the queue with a fresh failure count, e.g. when it depends on work that is not done yet.',
    inputSchema: mcpInputSchemas.feature_skip,
  },
  {
    name: 'feature_record_failure',
    description:
      'Record a failed attempt at a feature. After 5 failures the feature is auto-skipped on the next feature_get_next call.',
    inputSchema: mcpInputSchemas.feature_record_failure,
  },
  {
    name: 'feature_create_bulk',
    description:
      'Create features in one batch. They are queued after existing features in the given order. Any invalid entry rejects the whole batch.',
    inputSchema: mcpInputSchemas.feature_create_bulk,
  },
]

function assertObject(value: unknown, message: string): Record<string, unknown> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw new InvalidArgumentsError(message)
  }
  return value as Record<string, unknown>
}

function parseWithSchema<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T {
  try {
    return schema.parse(input)
  } catch (error) {
    if (error instanceof ZodError) {
      const detail = error.issues
        .map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
        .join('; ')
      throw new InvalidArgumentsError(`Invalid arguments: ${detail}`)
    }
    throw error
  }
}

export function formatFeature(feature: Feature) {
  return {
    id: feature.id,
    priority: feature.priority,
    category: feature.category,
    name: feature.name,
    description: feature.description,
    steps: feature.steps,
    passes: feature.passes,
    inProgress: feature.inProgress,
    failureCount: feature.failureCount,
    lastError: feature.lastError,
  }
}

export function formatFetchNext(result: FetchNextResult): ToolResult {
  switch (result.kind) {
    case 'next': {
      if (result.attemptsRemaining === undefined) {
        return formatFeature(result.feature)
      }
      return {
        ...formatFeature(result.feature),
        attemptsRemaining: result.attemptsRemaining,
        warning: `This feature has failed ${result.feature.failureCount} time(s) previously`,
      }
    }
    case 'resumed':
      return {
        ...formatFeature(result.feature),
        resumed: true,
        message: 'Resuming previously started feature',
        attemptsRemaining: result.attemptsRemaining,
      }
    case 'auto-skipped':
      return {
        autoSkipped: true,
        skippedFeatureId: result.featureId,
        skippedFeatureName: result.featureName,
        failureCount: result.failureCount,
        oldPriority: result.oldPriority,
        newPriority: result.newPriority,
        reason: `Feature failed ${result.failureCount} times consecutively and was auto-skipped`,
        lastError: result.lastError,
        message: 'Fetching next feature...',
      }
    case 'blocked':
      return {
        error: `All remaining features have failed too many times (${result.blockedCount} features blocked). Manual intervention required.`,
        blockedCount: result.blockedCount,
      }
    case 'all-complete':
      return { error: 'All features are passing! No more work to do.' }
  }
}

async function runTool(
  scheduler: FeatureScheduler,
  toolName: ToolName,
  args: Record<string, unknown>
): Promise<ToolResult> {
  switch (toolName) {
    case 'feature_get_stats': {
      parseWithSchema(emptyInputSchema, args)
      const stats = await scheduler.getStats()
      return { ...stats }
    }
    case 'feature_get_next': {
      parseWithSchema(emptyInputSchema, args)
      return formatFetchNext(await scheduler.fetchNext())
    }
    case 'feature_get_for_regression': {
      const input = parseWithSchema(regressionInputSchema, args)
      const features = await scheduler.getForRegression(input.limit)
      return { features: features.map(formatFeature), count: features.length }
    }
    case 'feature_mark_passing': {
      const input = parseWithSchema(featureIdInputSchema, args)
      return formatFeature(await scheduler.markPassing(input.featureId))
    }
    case 'feature_skip': {
      const input = parseWithSchema(featureIdInputSchema, args)
      const result = await scheduler.skip(input.featureId)
      return {
        ...result,
        message: `Feature '${result.name}' moved to end of queue`,
      }
    }
    case 'feature_record_failure': {
      const input = parseWithSchema(recordFailureInputSchema, args)
      const { feature, thresholdExceeded } = await scheduler.recordFailure(
        input.featureId,
        input.errorMessage
      )
      return {
        featureId: feature.id,
        featureName: feature.name,
        failureCount: feature.failureCount,
        maxFailures: MAX_FEATURE_FAILURES,
        thresholdExceeded,
        message: `Recorded failure #${feature.failureCount} for feature '${feature.name}'`,
        ...(thresholdExceeded ? { warning: 'Feature will be auto-skipped on next attempt' } : {}),
      }
    }
    case 'feature_create_bulk': {
      const input = parseWithSchema(createBulkInputSchema, args)
      return { created: await scheduler.createBulk(input.features) }
    }
  }
}

function isToolName(name: string): name is ToolName {
  return toolCatalog.some((tool) => tool.name === name)
}

/**
 * Run one tool call. Scheduler rejections and malformed arguments come back
 * as an `error` field; unknown tools and store failures are thrown.
 */
export async function handleToolCall(
  scheduler: FeatureScheduler,
  toolName: string,
  args: unknown
): Promise<ToolResult> {
  if (!isToolName(toolName)) {
    throw new UnknownToolError(toolName)
  }

  try {
    const parsedArgs = args == null ? {} : assertObject(args, 'arguments must be an object')
    return await runTool(scheduler, toolName, parsedArgs)
  } catch (error) {
    if (error instanceof FeatureValidationError) {
      return { error: error.message, index: error.index, fields: error.fields }
    }
    if (isSchedulerError(error) || error instanceof InvalidArgumentsError) {
      return { error: error.message }
    }
    throw error
  }
}

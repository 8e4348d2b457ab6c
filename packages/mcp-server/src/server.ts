/**
 * MCP server exposing the feature queue to a coding agent.
 *
 * Tool logic lives in ./tools; this file wires it to the MCP SDK and owns the
 * store lifecycle for the stdio entry point. stdout carries the protocol, so
 * everything here logs with console.error.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js'
import { createRequire } from 'node:module'
import { z } from 'zod'
import { FeatureScheduler, formatError } from '@feature-queue/core'
import {
  describeReceipt,
  openFeatureStore,
  runRuntimeMigrations,
} from '@feature-queue/database'
import { handleToolCall, toolCatalog } from './tools'

const require = createRequire(import.meta.url)
const pkg = z.object({ version: z.string() }).parse(require('../package.json'))

export const SERVER_NAME = 'features'

export function createFeatureMcpServer(scheduler: FeatureScheduler): Server {
  const server = new Server(
    { name: SERVER_NAME, version: pkg.version },
    { capabilities: { tools: {} } }
  )

  server.setRequestHandler(ListToolsRequestSchema, () =>
    Promise.resolve({
      tools: toolCatalog.map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    })
  )

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    try {
      const result = await handleToolCall(
        scheduler,
        request.params.name,
        request.params.arguments
      )
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
      }
    } catch (error) {
      console.error(`Tool ${request.params.name} failed: ${formatError(error)}`)
      return {
        content: [{ type: 'text', text: `Error: ${formatError(error)}` }],
        isError: true,
      }
    }
  })

  return server
}

export interface ServeOptions {
  projectDir: string
  databasePath: string
}

/**
 * Open the project database, bring it up to date, and serve MCP on stdio until
 * the client disconnects or the process is asked to stop. The store is closed
 * on the way out.
 */
export async function serveStdio(options: ServeOptions): Promise<void> {
  const store = openFeatureStore(options.databasePath)

  try {
    const receipt = await runRuntimeMigrations(store.db, options.projectDir)
    console.error(`Database: ${options.databasePath}`)
    for (const line of describeReceipt(receipt)) console.error(line)

    const scheduler = new FeatureScheduler(store, {
      onAutoSkip: (skipped) => {
        console.error(
          `Auto-skipped feature ${skipped.featureId} (${skipped.featureName}) after ${skipped.failureCount} failures; priority ${skipped.oldPriority} -> ${skipped.newPriority}`
        )
      },
    })
    const server = createFeatureMcpServer(scheduler)
    const closed = new Promise<void>((resolve) => {
      server.onclose = () => resolve()
    })

    const shutdown = () => {
      server.close().catch((error: unknown) => {
        console.error(`Failed to close MCP server: ${formatError(error)}`)
      })
    }
    process.once('SIGINT', shutdown)
    process.once('SIGTERM', shutdown)
    process.stdin.once('end', shutdown)

    await server.connect(new StdioServerTransport())
    console.error(`${SERVER_NAME} MCP server running on stdio`)
    await closed
    process.off('SIGINT', shutdown)
    process.off('SIGTERM', shutdown)
    process.stdin.off('end', shutdown)
  } finally {
    await store.close()
  }
}

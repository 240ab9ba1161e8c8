/**
 * MCP Server for lakehouse-ops
 *
 * Registers every catalog operation as an MCP tool. This is a thin adapter
 * over the shared operations layer: arguments are validated by the tool's
 * zod shape, then dispatched through the router.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'

import type { DispatchError, OperationContext } from '../lib/operations/index.js'

import { ClassifiedError } from '../lib/execution/errors.js'

type ToolResponse = { content: Array<{ text: string; type: 'text' }>; isError?: boolean }

/**
 * Format a successful result as pretty JSON text
 */
export function formatResponse(value: unknown): ToolResponse {
  return { content: [{ text: JSON.stringify(value, null, 2) ?? 'null', type: 'text' }] }
}

/**
 * Format a dispatch failure as error text with category and hint
 */
export function formatError(error: DispatchError): ToolResponse {
  const lines = [`❌ ${error.message}`]

  if (error instanceof ClassifiedError) {
    const attempts = error.exhausted ? `, gave up after ${error.attempts} attempts` : ''
    lines.push(`category: ${error.category}${attempts}`, `hint: ${error.hint}`)
  }

  return { content: [{ text: lines.join('\n'), type: 'text' }], isError: true }
}

export function createServer(ctx: OperationContext): McpServer {
  const server = new McpServer({
    name: 'lakehouse-ops',
    version: '1.0.0',
  })

  for (const summary of ctx.router.list()) {
    const definition = ctx.router.get(summary.id)
    if (!definition) continue

    server.registerTool(
      definition.id,
      {
        description: `${definition.description} [${definition.scope}]`,
        inputSchema: definition.input,
      },
      async (args) => {
        const result = await ctx.router.dispatch(definition.id, args)
        return result.ok ? formatResponse(result.value) : formatError(result.error)
      },
    )
  }

  return server
}

/**
 * Run the MCP server with stdio transport
 */
export async function runServer(ctx: OperationContext): Promise<void> {
  const server = createServer(ctx)
  const transport = new StdioServerTransport()
  await server.connect(transport)
  console.error(`lakehouse-ops MCP server running on stdio (${ctx.router.list().length} tools)`)
}

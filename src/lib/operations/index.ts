/**
 * Operations Module
 *
 * The operation catalog shared across all interfaces (CLI, RPC, MCP).
 * Each interface is a thin adapter that:
 * 1. Parses input (flags/JSON-RPC params/MCP schema)
 * 2. Dispatches through the shared router
 * 3. Formats output (console/JSON-RPC response/MCP response)
 */

export { OPERATIONS } from './catalog/index.js'

// Context management
export {
  createContext,
  getContextConfig,
  updateContext,
} from './context.js'
export type {
  CreateContextOptions,
  OperationContext,
} from './context.js'

// Definitions
export { defineOperation } from './definition.js'
export type {
  HandlerContext,
  OperationArgs,
  OperationDefinition,
  OperationKind,
  OperationRuntime,
} from './definition.js'

// Routing
export { OperationRouter } from './router.js'
export type { DispatchError, OperationSummary, RouterOptions } from './router.js'

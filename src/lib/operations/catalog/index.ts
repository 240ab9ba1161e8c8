/**
 * Operation catalog
 */

import type { OperationDefinition } from '../definition.js'

import { accountOperations } from './account.js'
import { clusterOperations } from './clusters.js'
import { jobOperations } from './jobs.js'
import { secretOperations } from './secrets.js'
import { sqlOperations } from './sql.js'
import { unityCatalogOperations } from './unity-catalog.js'
import { warehouseOperations } from './warehouses.js'
import { workspaceOperations } from './workspace.js'

export const OPERATIONS: readonly OperationDefinition[] = [
  ...clusterOperations,
  ...jobOperations,
  ...warehouseOperations,
  ...sqlOperations,
  ...secretOperations,
  ...workspaceOperations,
  ...unityCatalogOperations,
  ...accountOperations,
]

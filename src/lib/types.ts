/**
 * Shared type definitions for lakehouse-ops
 *
 * Platform payloads keep the REST API's snake_case field names. Only the
 * fields the operations read are declared; the rest pass through untouched.
 */

// ~/.lakeops/credentials.yaml - one entry per profile
export interface CredentialProfile {
  accountHost?: string   // Account console origin (defaults to DEFAULT_ACCOUNT_HOST)
  accountId?: string     // Required for account-scoped operations
  host: string           // Workspace origin, e.g. https://dbc-1234.cloud.databricks.com
  name: string
  token: string          // Personal access token or pre-issued OAuth token
}

export const DEFAULT_ACCOUNT_HOST = 'https://accounts.cloud.databricks.com'

// Everything an API module needs to make an authenticated request
export interface Connection {
  fetch?: typeof fetch   // Injected in tests; global fetch otherwise
  host: string
  token: string
}

type Extra = Record<string, unknown>

// ── Compute ───────────────────────────────────────────────────────

export type ClusterState =
  | 'ERROR'
  | 'PENDING'
  | 'RESIZING'
  | 'RESTARTING'
  | 'RUNNING'
  | 'TERMINATED'
  | 'TERMINATING'
  | 'UNKNOWN'

export interface ClusterInfo extends Extra {
  cluster_id: string
  cluster_name?: string
  node_type_id?: string
  num_workers?: number
  spark_version?: string
  state?: ClusterState
  state_message?: string
}

export interface CreateClusterRequest {
  autoscale?: { max_workers?: number; min_workers?: number }
  cluster_name: string
  node_type_id: string
  num_workers?: number
  spark_version: string
}

// ── Jobs ──────────────────────────────────────────────────────────

export interface JobSettings extends Extra {
  name?: string
  tasks?: unknown[]
}

export interface JobInfo extends Extra {
  job_id: number
  settings?: JobSettings
}

export interface JobList {
  has_more?: boolean
  jobs?: JobInfo[]
  next_page_token?: string
}

export type RunLifeCycleState =
  | 'BLOCKED'
  | 'INTERNAL_ERROR'
  | 'PENDING'
  | 'QUEUED'
  | 'RUNNING'
  | 'SKIPPED'
  | 'TERMINATED'
  | 'TERMINATING'
  | 'WAITING_FOR_RETRY'

export interface RunInfo extends Extra {
  run_id: number
  state?: {
    life_cycle_state?: RunLifeCycleState
    result_state?: string
    state_message?: string
  }
}

// ── SQL ───────────────────────────────────────────────────────────

export interface WarehouseInfo extends Extra {
  cluster_size?: string
  id: string
  name?: string
  state?: string
}

export type StatementState = 'CANCELED' | 'CLOSED' | 'FAILED' | 'PENDING' | 'RUNNING' | 'SUCCEEDED'

export type Row = Array<null | string>

export interface StatementChunk {
  chunk_index?: number
  data_array?: Row[]
  next_chunk_index?: number
  row_count?: number
  row_offset?: number
  truncated?: boolean
}

export interface StatementColumn {
  name: string
  position?: number
  type_name?: string
}

export interface StatementManifest {
  schema?: { column_count?: number; columns?: StatementColumn[] }
  total_chunk_count?: number
  total_row_count?: number
  truncated?: boolean
}

export interface StatementResponse {
  manifest?: StatementManifest
  result?: StatementChunk
  statement_id: string
  status?: {
    error?: { error_code?: string; message?: string }
    state?: StatementState
  }
}

export interface ExecuteStatementRequest {
  catalog?: string
  row_limit?: number
  schema?: string
  statement: string
  wait_timeout?: string
  warehouse_id: string
}

// ── Secrets ───────────────────────────────────────────────────────

export interface SecretScope {
  backend_type?: string
  name: string
}

export interface SecretMetadata {
  key: string
  last_updated_timestamp?: number
}

// ── Workspace objects ─────────────────────────────────────────────

export type ExportFormat = 'DBC' | 'HTML' | 'JUPYTER' | 'SOURCE'

export interface WorkspaceObject extends Extra {
  language?: string
  object_id?: number
  object_type?: string
  path: string
}

export interface ExportedObject {
  content?: string
  file_type?: string
}

// ── Unity Catalog ─────────────────────────────────────────────────

export interface CatalogInfo extends Extra {
  comment?: string
  name: string
  owner?: string
}

export interface SchemaInfo extends Extra {
  catalog_name?: string
  full_name?: string
  name: string
}

export interface TableInfo extends Extra {
  catalog_name?: string
  full_name?: string
  name: string
  schema_name?: string
  table_type?: string
}

// ── Account ───────────────────────────────────────────────────────

export interface AccountWorkspace extends Extra {
  deployment_name?: string
  workspace_id: number
  workspace_name?: string
  workspace_status?: string
}

export interface ScimUser extends Extra {
  active?: boolean
  displayName?: string
  id: string
  userName?: string
}

export interface ScimGroup extends Extra {
  displayName?: string
  id: string
}

export interface ScimServicePrincipal extends Extra {
  active?: boolean
  applicationId?: string
  displayName?: string
  id: string
}

export interface ScimList<T> {
  Resources?: T[]
  itemsPerPage?: number
  startIndex?: number
  totalResults?: number
}

export interface MetastoreInfo extends Extra {
  metastore_id: string
  name?: string
  region?: string
}

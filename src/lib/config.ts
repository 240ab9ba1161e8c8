/**
 * Execution settings loader for ~/.lakeops/config.yaml
 *
 * Precedence per setting: environment variable > config file > built-in default.
 */

import * as yaml from 'js-yaml'
import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'

import { DEFAULT_WAIT } from './api/wait.js'
import { DEFAULT_MAX_WORKERS } from './execution/batch.js'
import { DEFAULT_RETRY_POLICY } from './execution/retry.js'
import { logger } from './logger.js'

export interface ExecutionSettings {
  baseDelayMs: number
  maxAttempts: number
  maxDelayMs: number
  maxWorkers: number
  pollIntervalMs: number
  verbose?: number
  waitTimeoutMs: number
}

export const DEFAULT_SETTINGS: Readonly<ExecutionSettings> = {
  baseDelayMs: DEFAULT_RETRY_POLICY.baseDelayMs,
  maxAttempts: DEFAULT_RETRY_POLICY.maxAttempts,
  maxDelayMs: DEFAULT_RETRY_POLICY.maxDelayMs,
  maxWorkers: DEFAULT_MAX_WORKERS,
  pollIntervalMs: DEFAULT_WAIT.pollIntervalMs,
  waitTimeoutMs: DEFAULT_WAIT.timeoutMs,
}

const positiveInt = z.coerce.number().int().positive()
const nonNegativeInt = z.coerce.number().int().nonnegative()

const ConfigFileSchema = z.object({
  batch: z.object({
    max_workers: positiveInt.optional(), // eslint-disable-line camelcase
  }).optional(),
  retry: z.object({
    base_delay_ms: nonNegativeInt.optional(), // eslint-disable-line camelcase
    max_attempts: positiveInt.optional(), // eslint-disable-line camelcase
    max_delay_ms: nonNegativeInt.optional(), // eslint-disable-line camelcase
  }).optional(),
  verbose: z.coerce.number().int().min(-1).max(3).optional(),
  wait: z.object({
    poll_interval_ms: positiveInt.optional(), // eslint-disable-line camelcase
    timeout_ms: positiveInt.optional(), // eslint-disable-line camelcase
  }).optional(),
})

export type ConfigFile = z.infer<typeof ConfigFileSchema>

const ENV_OVERRIDES = {
  baseDelayMs: { name: 'LAKEOPS_BASE_DELAY_MS', schema: nonNegativeInt },
  maxAttempts: { name: 'LAKEOPS_MAX_ATTEMPTS', schema: positiveInt },
  maxDelayMs: { name: 'LAKEOPS_MAX_DELAY_MS', schema: nonNegativeInt },
  maxWorkers: { name: 'LAKEOPS_MAX_WORKERS', schema: positiveInt },
  pollIntervalMs: { name: 'LAKEOPS_POLL_INTERVAL_MS', schema: positiveInt },
  waitTimeoutMs: { name: 'LAKEOPS_WAIT_TIMEOUT_MS', schema: positiveInt },
} as const

type EnvSetting = keyof typeof ENV_OVERRIDES

/**
 * Get config path
 */
export function getConfigPath(): string {
  return join(homedir(), '.lakeops', 'config.yaml')
}

/**
 * Parse config file content. Throws with the offending key on invalid values.
 */
export function parseConfigFile(content: string): ConfigFile {
  const raw: unknown = yaml.load(content)
  if (raw === undefined || raw === null) {
    return {}
  }

  const parsed = ConfigFileSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue ? issue.path.join('.') : 'config'
    throw new Error(`Invalid config value at ${where}: ${issue?.message ?? 'invalid structure'}`)
  }

  return parsed.data
}

/**
 * Merge defaults, config file and environment into effective settings
 */
export function resolveSettings(file: ConfigFile = {}, env: NodeJS.ProcessEnv = process.env): ExecutionSettings {
  const settings: ExecutionSettings = {
    baseDelayMs: file.retry?.base_delay_ms ?? DEFAULT_SETTINGS.baseDelayMs,
    maxAttempts: file.retry?.max_attempts ?? DEFAULT_SETTINGS.maxAttempts,
    maxDelayMs: file.retry?.max_delay_ms ?? DEFAULT_SETTINGS.maxDelayMs,
    maxWorkers: file.batch?.max_workers ?? DEFAULT_SETTINGS.maxWorkers,
    pollIntervalMs: file.wait?.poll_interval_ms ?? DEFAULT_SETTINGS.pollIntervalMs,
    verbose: file.verbose,
    waitTimeoutMs: file.wait?.timeout_ms ?? DEFAULT_SETTINGS.waitTimeoutMs,
  }

  for (const key of Object.keys(ENV_OVERRIDES)) {
    if (!isEnvSetting(key)) continue

    const { name, schema } = ENV_OVERRIDES[key]
    const value = env[name]
    if (value === undefined || value === '') continue

    const parsed = schema.safeParse(value)
    if (!parsed.success) {
      throw new Error(`Invalid ${name}="${value}": ${parsed.error.issues[0]?.message ?? 'not a valid number'}`)
    }

    logger.configResolution(`${key} (${name})`, parsed.data)
    settings[key] = parsed.data
  }

  return settings
}

/**
 * Load settings from the config file (if present) and the environment
 */
export function loadSettings(path: string = getConfigPath(), env: NodeJS.ProcessEnv = process.env): ExecutionSettings {
  let file: ConfigFile = {}

  if (existsSync(path)) {
    try {
      file = parseConfigFile(readFileSync(path, 'utf8'))
    } catch (error) {
      throw new Error(`${path}: ${error instanceof Error ? error.message : String(error)}`)
    }

    logger.configResolution('config file', path)
  }

  return resolveSettings(file, env)
}

function isEnvSetting(key: string): key is EnvSetting {
  return key in ENV_OVERRIDES
}

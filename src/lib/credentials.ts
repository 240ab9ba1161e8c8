/**
 * Credentials Manager - Handles ~/.lakeops/credentials.yaml
 */

import * as yaml from 'js-yaml'
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { z } from 'zod'

import type { CredentialProfile } from './types.js'

import { logger } from './logger.js'

// YAML file structure (snake_case, same keys as the platform's own config files)
const CredentialsYamlSchema = z.object({
  default: z.string().optional(),
  profiles: z.record(z.object({
    account_host: z.string().optional(), // eslint-disable-line camelcase
    account_id: z.string().optional(), // eslint-disable-line camelcase
    host: z.string(),
    token: z.string(),
  })).default({}),
})

type CredentialsYaml = z.infer<typeof CredentialsYamlSchema>

/**
 * Get credentials path
 */
export function getCredentialsPath(): string {
  return join(homedir(), '.lakeops', 'credentials.yaml')
}

/**
 * Credentials manager with abstraction over YAML format
 */
export class CredentialsManager {
  private defaultProfile: string | undefined
  private path: string
  private profiles: Map<string, CredentialProfile>

  private constructor(path: string) {
    this.path = path
    this.profiles = new Map()
  }

  /**
   * Load credentials from YAML file. A missing file is an empty manager;
   * a malformed one is reported and also treated as empty.
   */
  static load(path?: string): CredentialsManager {
    const credentialsPath = path ?? getCredentialsPath()
    const manager = new CredentialsManager(credentialsPath)

    if (!existsSync(credentialsPath)) {
      return manager
    }

    let raw: unknown
    try {
      raw = yaml.load(readFileSync(credentialsPath, 'utf8'))
    } catch (error) {
      logger.warn(`Ignoring unreadable credentials file ${credentialsPath}: ${error instanceof Error ? error.message : String(error)}`)
      return manager
    }

    if (raw === undefined || raw === null) {
      return manager
    }

    const parsed = CredentialsYamlSchema.safeParse(raw)
    if (!parsed.success) {
      logger.warn(`Ignoring invalid credentials file ${credentialsPath}: ${parsed.error.issues[0]?.message ?? 'invalid structure'}`)
      return manager
    }

    manager.defaultProfile = parsed.data.default

    for (const [name, profile] of Object.entries(parsed.data.profiles)) {
      manager.profiles.set(name, {
        accountHost: profile.account_host,
        accountId: profile.account_id,
        host: profile.host,
        name,
        token: profile.token,
      })
    }

    return manager
  }

  /**
   * Add or update a profile
   */
  add(profile: CredentialProfile): void {
    this.profiles.set(profile.name, profile)
  }

  get(name: string): CredentialProfile | undefined {
    return this.profiles.get(name)
  }

  getDefault(): string | undefined {
    return this.defaultProfile
  }

  has(name: string): boolean {
    return this.profiles.has(name)
  }

  listNames(): string[] {
    return [...this.profiles.keys()]
  }

  listProfiles(): CredentialProfile[] {
    return [...this.profiles.values()]
  }

  /**
   * Remove a profile
   */
  remove(name: string): boolean {
    const deleted = this.profiles.delete(name)
    if (deleted && this.defaultProfile === name) {
      this.defaultProfile = undefined
    }

    return deleted
  }

  /**
   * Profile to use: explicit name, then LAKEOPS_PROFILE, then the file default
   */
  resolve(explicitName?: string): CredentialProfile | undefined {
    const name = explicitName || process.env.LAKEOPS_PROFILE || this.defaultProfile
    if (!name) return undefined

    const source = explicitName ? 'flag' : process.env.LAKEOPS_PROFILE ? 'env' : 'credentials default'
    logger.configResolution(`profile (${source})`, name)
    return this.profiles.get(name)
  }

  /**
   * Save credentials to YAML file
   */
  save(): void {
    const dir = dirname(this.path)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }

    const yamlData: CredentialsYaml = {
      profiles: {},
    }

    if (this.defaultProfile) {
      yamlData.default = this.defaultProfile
    }

    for (const [name, profile] of this.profiles) {
      yamlData.profiles[name] = {
        host: profile.host,
        token: profile.token,
        ...(profile.accountId && { account_id: profile.accountId }), // eslint-disable-line camelcase
        ...(profile.accountHost && { account_host: profile.accountHost }), // eslint-disable-line camelcase
      }
    }

    const content = yaml.dump(yamlData, {
      indent: 2,
      lineWidth: -1,
      noRefs: true,
    })

    writeFileSync(this.path, content, { encoding: 'utf8', mode: 0o600 })
  }

  /**
   * Set the default profile
   */
  setDefault(name: string): void {
    if (!this.profiles.has(name)) {
      throw new Error(`Profile "${name}" not found`)
    }

    this.defaultProfile = name
  }
}

/**
 * Message explaining how to configure credentials when none resolve.
 * The wording mentions credentials so that the classifier files it under Auth.
 */
export function getMissingProfileMessage(manager: CredentialsManager, explicitName?: string): string {
  const requested = explicitName || process.env.LAKEOPS_PROFILE || manager.getDefault()
  const names = manager.listNames()
  const lines = [
    requested
      ? `No credentials for profile "${requested}"`
      : 'No credentials configured: no --profile given, LAKEOPS_PROFILE unset and no default profile',
  ]

  if (names.length > 0) {
    lines.push('', 'Available profiles:', ...names.map(name => `  - ${name}`))
  }

  lines.push('', 'Create one with:', '  lakeops profile create <name> --host <workspace-url> --token <token>')
  return lines.join('\n')
}

/**
 * Origin of a workspace URL, or undefined when it is not an https URL
 */
export function normalizeHost(value: string): string | undefined {
  try {
    const url = new URL(value)
    return url.protocol === 'https:' ? url.origin : undefined
  } catch {
    return undefined
  }
}

/**
 * Keep the first and last three characters of a token
 */
export function maskToken(token: string): string {
  if (token.length <= 8) {
    return '***'
  }

  return `${token.slice(0, 3)}...${token.slice(-3)}`
}

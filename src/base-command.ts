import { Command, Flags } from '@oclif/core'

import { type ExecutionSettings, loadSettings } from './lib/config.js'
import { CredentialsManager } from './lib/credentials.js'
import { logger, resolveVerbosity } from './lib/logger.js'
import { createContext, type OperationContext } from './lib/operations/index.js'

export interface CommonFlags {
  profile?: string
  silent: boolean
  verbose?: number
}

export default abstract class BaseCommand extends Command {
  static baseFlags = {
    profile: Flags.string({
      char: 'p',
      description: 'Profile from ~/.lakeops/credentials.yaml (defaults to LAKEOPS_PROFILE, then the default profile)',
      required: false,
    }),
    silent: Flags.boolean({
      char: 's',
      default: false,
      description: 'Suppress all diagnostics except errors',
    }),
    verbose: Flags.integer({
      char: 'v',
      description: 'Diagnostics level on stderr: 1 verbose, 2 debug, 3 trace',
      max: 3,
      min: 1,
    }),
  }

  /**
   * Load settings, apply verbosity and build the shared operation context
   */
  protected createOperationContext(flags: CommonFlags): OperationContext {
    const settings = this.loadExecutionSettings()
    logger.setLevel(resolveVerbosity(flags.verbose, flags.silent, settings.verbose))

    return createContext({
      credentials: CredentialsManager.load(),
      profileName: flags.profile,
      settings,
    })
  }

  protected loadExecutionSettings(): ExecutionSettings {
    try {
      return loadSettings()
    } catch (error) {
      this.error(error instanceof Error ? error.message : String(error))
    }
  }
}

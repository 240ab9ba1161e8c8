import { Args, Command, Flags } from '@oclif/core'
import inquirer from 'inquirer'

import { CredentialsManager, getCredentialsPath, normalizeHost } from '../../../lib/credentials.js'

export default class ProfileCreate extends Command {
  static args = {
    name: Args.string({
      description: 'Profile name',
      required: true,
    }),
  }
  static description = 'Create or update a profile configuration'
  static examples = [
    '<%= config.bin %> profile create dev --host https://dbc-1234.cloud.databricks.com --token <token>',
    '<%= config.bin %> profile create admin --host https://dbc-1234.cloud.databricks.com --token <token> --account-id <id> --default',
  ]
  static override flags = {
    'account-host': Flags.string({
      description: 'Account console URL (only for non-default clouds)',
      required: false,
    }),
    'account-id': Flags.string({
      description: 'Account ID, required for account-scoped operations',
      required: false,
    }),
    default: Flags.boolean({
      default: false,
      description: 'Set this profile as the default',
      required: false,
    }),
    force: Flags.boolean({
      default: false,
      description: 'Overwrite an existing profile',
    }),
    host: Flags.string({
      description: 'Workspace URL',
      required: true,
    }),
    json: Flags.boolean({
      default: false,
      description: 'Output as JSON',
    }),
    token: Flags.string({
      char: 't',
      description: 'Personal access token (prompted for when omitted)',
      required: false,
    }),
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(ProfileCreate)

    const host = normalizeHost(flags.host)
    if (!host) {
      this.error(`Invalid host "${flags.host}": expected an https:// URL`)
    }

    const credentials = CredentialsManager.load()
    const existed = credentials.has(args.name)
    if (existed && !flags.force) {
      this.error(`Profile "${args.name}" already exists. Use --force to overwrite it.`)
    }

    const token = flags.token ?? await this.promptToken(host)

    credentials.add({
      accountHost: flags['account-host'],
      accountId: flags['account-id'],
      host,
      name: args.name,
      token,
    })

    // First profile becomes the default
    const setAsDefault = flags.default || credentials.listNames().length === 1
    if (setAsDefault) {
      credentials.setDefault(args.name)
    }

    try {
      credentials.save()
    } catch (error) {
      this.error(`Failed to write credentials file: ${error instanceof Error ? error.message : String(error)}`)
    }

    if (flags.json) {
      this.log(JSON.stringify({ default: setAsDefault, host, name: args.name, updated: existed }, null, 2))
      return
    }

    this.log(`Profile '${args.name}' ${existed ? 'updated' : 'created'} in ${getCredentialsPath()}`)
    if (setAsDefault) {
      this.log(`Set as default profile`)
    }
  }

  private async promptToken(host: string): Promise<string> {
    if (!process.stdin.isTTY) {
      this.error('No --token given and no terminal to prompt for one')
    }

    const { token } = await inquirer.prompt<{ token: string }>([
      {
        mask: '*',
        message: `Access token for ${host}:`,
        name: 'token',
        type: 'password',
        validate: (input: string) => input.trim() !== '' || 'Token cannot be empty',
      },
    ])

    return token.trim()
  }
}

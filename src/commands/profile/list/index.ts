import { Command, Flags } from '@oclif/core'

import { CredentialsManager, getCredentialsPath, maskToken } from '../../../lib/credentials.js'
import { DEFAULT_ACCOUNT_HOST } from '../../../lib/types.js'

export default class ProfileList extends Command {
  static description = 'List all available profile configurations'
  static examples = [
    '<%= config.bin %> profile list',
    '<%= config.bin %> profile list --details',
    '<%= config.bin %> profile list --json',
  ]
  static override flags = {
    details: Flags.boolean({
      char: 'd',
      default: false,
      description: 'Show detailed information for each profile',
      required: false,
    }),
    json: Flags.boolean({
      default: false,
      description: 'Output as JSON',
    }),
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(ProfileList)

    const credentials = CredentialsManager.load()
    const defaultName = credentials.getDefault()
    const profiles = credentials.listProfiles().sort((a, b) => a.name.localeCompare(b.name))

    if (flags.json) {
      this.log(JSON.stringify({
        default: defaultName ?? null,
        profiles: profiles.map(profile => ({
          accountId: profile.accountId ?? null,
          host: profile.host,
          name: profile.name,
        })),
      }, null, 2))
      return
    }

    if (profiles.length === 0) {
      this.log(`No profiles found in ${getCredentialsPath()}`)
      this.log(`Create a profile using '${this.config.bin} profile create'`)
      return
    }

    this.log('Available profiles:')

    for (const profile of profiles) {
      const isDefault = defaultName === profile.name ? ' [DEFAULT]' : ''

      if (!flags.details) {
        this.log(`  - ${profile.name}${isDefault}`)
        continue
      }

      this.log(`\nProfile: ${profile.name}${isDefault}`)
      this.log(`  Host: ${profile.host}`)
      this.log(`  Token: ${maskToken(profile.token)}`)
      this.log(`  Account ID: ${profile.accountId ?? '(not set)'}`)
      this.log(`  Account Host: ${profile.accountHost ?? DEFAULT_ACCOUNT_HOST}`)
    }
  }
}

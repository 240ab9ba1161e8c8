import { Args, Command } from '@oclif/core'

import { CredentialsManager } from '../../../lib/credentials.js'

export default class ProfileSetDefault extends Command {
  static args = {
    name: Args.string({
      description: 'Profile name to set as default',
      required: true,
    }),
  }
  static description = 'Set the default profile'
  static examples = [
    `$ <%= config.bin %> profile set-default production
Default profile set to 'production'
`,
  ]

  async run(): Promise<void> {
    const { args } = await this.parse(ProfileSetDefault)

    const credentials = CredentialsManager.load()
    if (!credentials.has(args.name)) {
      const available = credentials.listNames()
      this.error(`Profile '${args.name}' not found. Available profiles: ${available.length > 0 ? available.join(', ') : '(none)'}`)
    }

    credentials.setDefault(args.name)

    try {
      credentials.save()
    } catch (error) {
      this.error(`Failed to write credentials file: ${error instanceof Error ? error.message : String(error)}`)
    }

    this.log(`Default profile set to '${args.name}'`)
  }
}

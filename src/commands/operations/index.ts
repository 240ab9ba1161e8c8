import { Flags } from '@oclif/core'

import BaseCommand from '../../base-command.js'
import { CLIENT_SCOPES } from '../../lib/clients/index.js'

export default class Operations extends BaseCommand {
  static description = 'List catalog operations'
  static examples = [
    '<%= config.bin %> operations',
    '<%= config.bin %> operations --scope account',
    '<%= config.bin %> operations --json',
  ]
  static flags = {
    ...BaseCommand.baseFlags,
    json: Flags.boolean({
      default: false,
      description: 'Output as JSON',
    }),
    scope: Flags.string({
      description: 'Only operations for this client scope',
      options: [...CLIENT_SCOPES],
    }),
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Operations)
    const ctx = this.createOperationContext(flags)
    const scope = CLIENT_SCOPES.find(candidate => candidate === flags.scope)
    const operations = ctx.router.list(scope)

    if (flags.json) {
      this.log(JSON.stringify({ operations }, null, 2))
      return
    }

    const width = Math.max(...operations.map(operation => operation.id.length))
    for (const operation of operations) {
      const kind = operation.kind === 'single' ? '' : ` (${operation.kind})`
      this.log(`${operation.id.padEnd(width)}  ${operation.scope.padEnd(9)}  ${operation.description}${kind}`)
    }
  }
}

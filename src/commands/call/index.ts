import { Args, Flags } from '@oclif/core'
import { readFileSync } from 'node:fs'

import BaseCommand from '../../base-command.js'
import { ClassifiedError } from '../../lib/execution/errors.js'
import { formatDispatchError, formatYamlLike } from '../../lib/format.js'

export default class Call extends BaseCommand {
  static args = {
    operation: Args.string({
      description: 'Operation id (see `operations`)',
      required: true,
    }),
  }
  static description = 'Run one catalog operation'
  static examples = [
    '<%= config.bin %> call list_clusters',
    '<%= config.bin %> call get_cluster --args \'{"cluster_id":"0123-456789-abcdef"}\'',
    '<%= config.bin %> call execute_statement --args-file query.json --json',
    '<%= config.bin %> call list_account_users --args \'{"count":10}\' --profile prod',
  ]
  static flags = {
    ...BaseCommand.baseFlags,
    args: Flags.string({
      char: 'a',
      description: 'Operation arguments as a JSON object',
      exclusive: ['args-file'],
    }),
    'args-file': Flags.string({
      char: 'f',
      description: 'Read operation arguments from a JSON file',
      exclusive: ['args'],
    }),
    json: Flags.boolean({
      default: false,
      description: 'Output as JSON',
    }),
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Call)
    const operationArgs = this.readArguments(flags.args, flags['args-file'])
    const ctx = this.createOperationContext(flags)

    const result = await ctx.router.dispatch(args.operation, operationArgs)

    if (result.ok) {
      this.log(flags.json
        ? JSON.stringify(result.value, null, 2)
        : formatYamlLike(result.value, { styled: process.stdout.isTTY }))
      return
    }

    if (flags.json) {
      this.log(JSON.stringify({ error: result.error.toJSON() }, null, 2))
      this.exit(1)
    }

    const hint = result.error instanceof ClassifiedError ? undefined : 'Run `operations` to list available operation ids.'
    this.error(formatDispatchError(result.error, { styled: process.stderr.isTTY }), { exit: 1, suggestions: hint ? [hint] : undefined })
  }

  private readArguments(inline?: string, file?: string): Record<string, unknown> {
    let text: string | undefined = inline
    if (file) {
      try {
        text = readFileSync(file, 'utf8')
      } catch (error) {
        this.error(`Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`)
      }
    }

    if (!text) return {}

    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch {
      this.error('Arguments must be valid JSON')
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      this.error('Arguments must be a JSON object')
    }

    return { ...parsed }
  }
}

import BaseCommand from '../../base-command.js'
import { logger } from '../../lib/logger.js'
import { runRpcServer } from '../../rpc/server.js'

export default class Rpc extends BaseCommand {
  static description = `Start a JSON-RPC 2.0 server over stdio

Protocol: JSON-RPC 2.0, newline-delimited (stdin/stdout)

Startup signal:
  {"ready":true,"version":"1.0"}

Methods:
  operations             List catalog operations
                         Params: {scope?}
                         Result: {operations: [{id, scope, kind, description}]}

  dispatch               Run a catalog operation
                         Params: {operation, arguments?}
                         Result: the operation's result
                         Errors: -32601 unknown operation
                                 -32602 invalid arguments
                                 -32000 remote failure, data = {category, retryable, hint, ...}

  config                 Get current profile, client states and settings
                         Params: {}

  config.set             Switch profile; client handles are rebuilt on next use
                         Params: {profile?}

  shutdown               Graceful shutdown
                         Params: {}
                         Result: {ok: true} then exit

Notes:
  - Stderr used for logs, stdout for protocol
  - Exits on stdin EOF or shutdown method`
  static examples = [
    {
      command: '<%= config.bin %> rpc',
      description: 'Start RPC server',
    },
    {
      command: 'echo \'{"jsonrpc":"2.0","method":"operations","id":1}\' | <%= config.bin %> rpc',
      description: 'List operations',
    },
    {
      command: 'echo \'{"jsonrpc":"2.0","method":"dispatch","params":{"operation":"list_clusters"},"id":1}\' | <%= config.bin %> rpc',
      description: 'List clusters',
    },
  ]
  static flags = {
    ...BaseCommand.baseFlags,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Rpc)

    // stdout carries the protocol
    logger.setWriters({ out: console.error })
    await runRpcServer(this.createOperationContext(flags))
  }
}

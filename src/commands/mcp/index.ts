import BaseCommand from '../../base-command.js'
import { logger } from '../../lib/logger.js'
import { runServer } from '../../mcp/server.js'

export default class Mcp extends BaseCommand {
  static description = 'Start the MCP server over stdio, one tool per catalog operation'
  static examples = [
    '<%= config.bin %> mcp',
    '<%= config.bin %> mcp --profile staging',
  ]
  static flags = {
    ...BaseCommand.baseFlags,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Mcp)

    // stdout carries the protocol
    logger.setWriters({ out: console.error })
    await runServer(this.createOperationContext(flags))
  }
}

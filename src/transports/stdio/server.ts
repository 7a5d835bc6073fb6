import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { logger } from '../../core/Logger.js';
import { AbstractTransport, ProtocolServerFactory } from '../base.js';

/**
 * Single client over stdin/stdout. Nothing else may write to stdout while
 * this transport runs.
 */
export class StdioTransport extends AbstractTransport {
  readonly type = 'stdio';
  private server?: Server;

  constructor(private readonly createServer: ProtocolServerFactory) {
    super();
  }

  async start(): Promise<void> {
    if (this.server) {
      throw new Error('Stdio transport already started');
    }

    const server = this.createServer();
    server.onclose = () => {
      logger.info('Stdio transport closed');
      this.server = undefined;
      this._onclose?.();
    };
    server.onerror = (error) => {
      logger.error(`Stdio transport error: ${error.message}`);
      this._onerror?.(error);
    };

    this.server = server;
    await server.connect(new StdioServerTransport());
    logger.info('Serving MCP over stdio');
  }

  async close(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    await server?.close();
  }

  isRunning(): boolean {
    return this.server !== undefined;
  }
}

import { IncomingMessage, Server as HttpServer, ServerResponse, createServer } from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { logger } from '../../core/Logger.js';
import { AbstractTransport, ProtocolServerFactory, TransportAddress } from '../base.js';
import { getCorsHeaders, setResponseHeaders } from '../utils/cors.js';
import { readJsonBody, requestUrl, sendJson } from '../utils/http.js';
import { DEFAULT_SSE_CONFIG, SSETransportConfig } from './types.js';

const log = logger.child('sse');

interface SSEConnection {
  server: Server;
  transport: SSEServerTransport;
  keepAlive: NodeJS.Timeout;
}

/**
 * Legacy HTTP+SSE transport: one event stream per client on `GET /sse`,
 * client messages on `POST /messages/?sessionId=<id>`.
 */
export class SSETransport extends AbstractTransport {
  readonly type = 'sse';

  private _server?: HttpServer;
  private readonly _config: Required<Omit<SSETransportConfig, 'cors'>> & Pick<SSETransportConfig, 'cors'>;
  private readonly _connections = new Map<string, SSEConnection>();

  constructor(
    private readonly createProtocolServer: ProtocolServerFactory,
    config: SSETransportConfig = {}
  ) {
    super();
    this._config = { ...DEFAULT_SSE_CONFIG, ...config };
    log.debug(`SSE transport configured with: ${JSON.stringify(this._config)}`);
  }

  async start(): Promise<void> {
    if (this._server) {
      throw new Error('SSE transport already started');
    }

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        log.error(`Error handling request: ${error instanceof Error ? error.message : String(error)}`);
        if (!res.headersSent) {
          sendJson(res, 500, { error: 'internal_error', message: 'Internal Server Error' });
        }
      });
    });
    this._server = server;

    server.on('close', () => {
      log.info('SSE server closed');
      this._onclose?.();
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this._config.port, this._config.host, () => {
        server.off('error', reject);
        server.on('error', (error) => {
          log.error(`SSE server error: ${error.message}`);
          this._onerror?.(error);
        });
        resolve();
      });
    });

    const bound = this.address();
    log.info(`SSE transport listening on ${bound?.host ?? this._config.host}:${bound?.port ?? this._config.port}`);
  }

  address(): TransportAddress | undefined {
    const address = this._server?.address();
    if (!address || typeof address === 'string') {
      return undefined;
    }
    return { host: address.address, port: address.port };
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = requestUrl(req);
    log.debug(`Incoming request: ${req.method} ${url.pathname}`);

    if (req.method === 'OPTIONS') {
      setResponseHeaders(res, getCorsHeaders(this._config.cors, true));
      res.writeHead(204).end();
      return;
    }

    setResponseHeaders(res, getCorsHeaders(this._config.cors));

    if (req.method === 'GET' && url.pathname === '/health') {
      sendJson(res, 200, { status: 'healthy', transport: 'sse', connections: this._connections.size });
      return;
    }

    if (req.method === 'GET' && url.pathname === this._config.endpoint) {
      await this.openStream(res);
      return;
    }

    if (req.method === 'POST' && this.isMessageEndpoint(url.pathname)) {
      await this.handlePostMessage(req, res, url.searchParams.get('sessionId'));
      return;
    }

    sendJson(res, 404, { error: 'not_found', message: `No route for ${req.method} ${url.pathname}` });
  }

  private isMessageEndpoint(pathname: string): boolean {
    const endpoint = this._config.messageEndpoint.replace(/\/+$/, '');
    return pathname === endpoint || pathname === `${endpoint}/`;
  }

  private async openStream(res: ServerResponse): Promise<void> {
    const transport = new SSEServerTransport(this._config.messageEndpoint, res);
    const sessionId = transport.sessionId;
    const server = this.createProtocolServer();

    if (res.socket) {
      res.socket.setNoDelay(true);
      res.socket.setTimeout(0);
      res.socket.setKeepAlive(true, 1000);
    }

    const keepAlive = setInterval(() => {
      if (!res.writableEnded) {
        res.write(': keep-alive\n\n');
      }
    }, this._config.keepAliveIntervalMs);
    keepAlive.unref();

    transport.onclose = () => {
      clearInterval(keepAlive);
      if (this._connections.delete(sessionId)) {
        log.info(`SSE connection closed for session: ${sessionId}`);
      }
    };
    transport.onerror = (error) => {
      log.error(`SSE connection error for session ${sessionId}: ${error.message}`);
    };

    this._connections.set(sessionId, { server, transport, keepAlive });
    await server.connect(transport);
    log.info(`SSE connection established for session: ${sessionId}`);
  }

  private async handlePostMessage(req: IncomingMessage, res: ServerResponse, sessionId: string | null): Promise<void> {
    if (!sessionId) {
      sendJson(res, 400, { error: 'bad_request', message: 'Missing sessionId parameter' });
      return;
    }

    const connection = this._connections.get(sessionId);
    if (!connection) {
      log.warn(`Message for unknown session: ${sessionId}`);
      sendJson(res, 404, { error: 'not_found', message: 'Session not found' });
      return;
    }

    let body: unknown;
    try {
      body = await readJsonBody(req, this._config.maxMessageSize);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn(`Rejected message for session ${sessionId}: ${message}`);
      sendJson(res, 400, { error: 'bad_request', message });
      return;
    }

    await connection.transport.handlePostMessage(req, res, body);
  }

  async close(): Promise<void> {
    const connections = [...this._connections.values()];
    this._connections.clear();
    for (const connection of connections) {
      clearInterval(connection.keepAlive);
      try {
        await connection.server.close();
      } catch (error) {
        log.error(`Error closing SSE session: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    const server = this._server;
    this._server = undefined;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  isRunning(): boolean {
    return Boolean(this._server);
  }
}

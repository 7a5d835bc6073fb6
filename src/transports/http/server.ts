import { randomUUID } from 'node:crypto';
import { IncomingMessage, ServerResponse, createServer, Server as HttpServer } from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { PROTECTED_RESOURCE_METADATA_PATH } from '../../auth/metadata/protected-resource.js';
import { logger } from '../../core/Logger.js';
import { AbstractTransport, ProtocolServerFactory, TransportAddress } from '../base.js';
import { getCorsHeaders, setResponseHeaders } from '../utils/cors.js';
import {
  DEFAULT_MAX_MESSAGE_SIZE,
  getRequestHeader,
  readJsonBody,
  requestUrl,
  sendJson,
  sendJsonRpcError,
} from '../utils/http.js';
import { SessionTable } from './session-table.js';
import { DEFAULT_HTTP_STREAM_CONFIG, HttpStreamTransportConfig } from './types.js';

const log = logger.child('http');

type AuthenticatedRequest = IncomingMessage & { auth?: AuthInfo };

interface HttpSession {
  server: Server;
  transport: StreamableHTTPServerTransport;
  /** Standalone `GET` streams currently open. */
  openStreams: number;
  close(): Promise<void>;
  isStreaming(): boolean;
}

export class HttpStreamTransport extends AbstractTransport {
  readonly type = 'http-stream';
  private _server?: HttpServer;
  private _isRunning = false;
  private readonly _config: HttpStreamTransportConfig;
  private readonly _host: string;
  private readonly _port: number;
  private readonly _endpoint: string;
  private readonly _enableJsonResponse: boolean;
  private readonly _stateless: boolean;
  private readonly _sessions: SessionTable<HttpSession>;

  constructor(
    private readonly createProtocolServer: ProtocolServerFactory,
    config: HttpStreamTransportConfig = {}
  ) {
    super();
    this._config = config;
    this._host = config.host ?? DEFAULT_HTTP_STREAM_CONFIG.host;
    this._port = config.port ?? DEFAULT_HTTP_STREAM_CONFIG.port;
    this._endpoint = config.endpoint ?? DEFAULT_HTTP_STREAM_CONFIG.endpoint;
    this._enableJsonResponse = (config.responseMode ?? DEFAULT_HTTP_STREAM_CONFIG.responseMode) === 'batch';
    this._stateless = config.stateless ?? DEFAULT_HTTP_STREAM_CONFIG.stateless;
    this._sessions = new SessionTable({ idleTimeoutMs: config.sessionIdleTimeoutMs });

    log.debug(
      `HttpStreamTransport configured with: ${JSON.stringify({
        host: this._host,
        port: this._port,
        endpoint: this._endpoint,
        responseMode: config.responseMode ?? DEFAULT_HTTP_STREAM_CONFIG.responseMode,
        stateless: this._stateless,
        auth: config.auth !== undefined,
        oauthMetadata: config.oauthMetadata !== undefined,
      })}`
    );
  }

  async start(): Promise<void> {
    if (this._isRunning) {
      throw new Error('HttpStreamTransport already started');
    }

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        log.error(`Error handling request: ${error instanceof Error ? error.message : String(error)}`);
        if (!res.headersSent) {
          sendJsonRpcError(res, 500, -32603, 'Internal server error');
        }
      });
    });
    this._server = server;

    server.on('close', () => {
      log.info('HTTP server closed');
      this._isRunning = false;
      this._onclose?.();
    });

    await new Promise<void>((resolve, reject) => {
      const onStartupError = (error: Error) => {
        log.error(`HTTP server error: ${error.message}`);
        reject(error);
      };
      server.once('error', onStartupError);
      server.listen(this._port, this._host, () => {
        server.off('error', onStartupError);
        server.on('error', (error) => {
          log.error(`HTTP server error: ${error.message}`);
          this._onerror?.(error);
        });
        resolve();
      });
    });

    this._isRunning = true;
    if (!this._stateless) {
      this._sessions.startSweeper();
    }
    const bound = this.address();
    log.info(
      `HTTP server listening on ${bound?.host ?? this._host}:${bound?.port ?? this._port}, endpoint ${this._endpoint}` +
        (this._stateless ? ' (stateless)' : '')
    );
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
      sendJson(res, 200, {
        status: 'healthy',
        transport: 'streamable-http',
        stateless: this._stateless,
        sessions: this._sessions.size,
      });
      return;
    }

    if (req.method === 'GET' && url.pathname === PROTECTED_RESOURCE_METADATA_PATH) {
      if (this._config.oauthMetadata) {
        this._config.oauthMetadata.serve(res);
      } else {
        sendJson(res, 404, { error: 'not_found', message: 'OAuth protected resource metadata is not configured' });
      }
      return;
    }

    // Authentication runs before any session lookup or body parsing so that a
    // bad token is always a 401.
    let authInfo: AuthInfo | undefined;
    if (this._config.auth) {
      const gate = await this._config.auth.authenticate(req, res);
      if (gate.status === 'rejected') {
        return;
      }
      authInfo = gate.authInfo;
    }
    const authedReq: AuthenticatedRequest = Object.assign(req, { auth: authInfo });

    if (url.pathname !== this._endpoint) {
      sendJson(res, 404, { error: 'not_found', message: `No route for ${req.method} ${url.pathname}` });
      return;
    }

    if (this._stateless) {
      await this.handleStatelessRequest(authedReq, res);
    } else {
      await this.handleSessionRequest(authedReq, res);
    }
  }

  private async handleSessionRequest(req: AuthenticatedRequest, res: ServerResponse): Promise<void> {
    const sessionId = getRequestHeader(req, 'mcp-session-id');

    if (sessionId) {
      const session = this._sessions.touch(sessionId);
      if (!session) {
        log.warn(`Request for unknown session: ${sessionId}`);
        sendJsonRpcError(res, 404, -32001, 'Session not found');
        return;
      }
      const body = await this.readBody(req, res);
      if (body.failed) {
        return;
      }
      log.debug(`Reusing existing session: ${sessionId}`);
      if (req.method === 'GET') {
        this.trackStream(sessionId, session, res);
      }
      await session.transport.handleRequest(req, res, body.value);
      return;
    }

    if (req.method !== 'POST') {
      sendJsonRpcError(res, 400, -32000, 'Bad Request: No valid session ID provided');
      return;
    }

    const body = await this.readBody(req, res);
    if (body.failed) {
      return;
    }
    if (!isInitializeRequest(body.value)) {
      sendJsonRpcError(res, 400, -32000, 'Bad Request: No valid session ID provided');
      return;
    }

    log.info('Creating new session for initialization request');
    const session = await this.openSession();
    try {
      await session.transport.handleRequest(req, res, body.value);
    } finally {
      // No id means the transport refused the initialize request.
      if (session.transport.sessionId === undefined) {
        log.warn('Initialization failed; discarding session');
        await session.close();
      }
    }
  }

  private trackStream(sessionId: string, session: HttpSession, res: ServerResponse): void {
    session.openStreams += 1;
    res.on('close', () => {
      session.openStreams -= 1;
      this._sessions.touch(sessionId);
    });
  }

  private async openSession(): Promise<HttpSession> {
    const server = this.createProtocolServer();
    const sessions = this._sessions;
    const session: HttpSession = {
      server,
      transport: new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        enableJsonResponse: this._enableJsonResponse,
        onsessioninitialized: (id) => {
          log.info(`Session initialized: ${id}`);
          sessions.set(id, session);
        },
      }),
      openStreams: 0,
      close: () => server.close(),
      isStreaming: () => session.openStreams > 0,
    };

    // Must be assigned before connect(), which chains its own handler onto it.
    session.transport.onclose = () => {
      const id = session.transport.sessionId;
      if (id && sessions.delete(id)) {
        log.info(`Transport closed for session: ${id}`);
      }
    };
    session.transport.onerror = (error) => {
      log.error(`Transport error for session ${session.transport.sessionId ?? '<pending>'}: ${error.message}`);
    };

    await server.connect(session.transport);
    return session;
  }

  private async handleStatelessRequest(req: AuthenticatedRequest, res: ServerResponse): Promise<void> {
    if (req.method !== 'POST') {
      res.setHeader('Allow', 'POST, OPTIONS');
      sendJsonRpcError(res, 405, -32000, 'Method not allowed.');
      return;
    }

    const body = await this.readBody(req, res);
    if (body.failed) {
      return;
    }

    const server = this.createProtocolServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: this._enableJsonResponse,
    });
    res.on('close', () => {
      server.close().catch((error: unknown) => {
        log.error(`Error closing stateless server: ${error instanceof Error ? error.message : String(error)}`);
      });
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, body.value);
  }

  private async readBody(
    req: IncomingMessage,
    res: ServerResponse
  ): Promise<{ failed: false; value: unknown } | { failed: true }> {
    if (req.method !== 'POST') {
      return { failed: false, value: undefined };
    }
    try {
      return { failed: false, value: await readJsonBody(req, this._config.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE) };
    } catch (error) {
      log.warn(`Rejected request body: ${error instanceof Error ? error.message : String(error)}`);
      sendJsonRpcError(res, 400, -32700, 'Parse error');
      return { failed: true };
    }
  }

  async close(): Promise<void> {
    await this._sessions.closeAll();

    const server = this._server;
    this._server = undefined;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
    this._isRunning = false;
  }

  isRunning(): boolean {
    return this._isRunning;
  }
}

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { ProtectedResourceMetadata } from '../auth/metadata/protected-resource.js';
import { RequestAuthenticator } from '../auth/middleware.js';
import { OAuthAuthProvider } from '../auth/providers/oauth.js';
import { AuthProvider } from '../auth/types.js';
import { OpenMeteoClient } from '../services/open-meteo/client.js';
import { WeatherService } from '../services/open-meteo/types.js';
import { ToolProtocol } from '../tools/BaseTool.js';
import { createDefaultTools } from '../tools/index.js';
import { ToolRegistry } from '../tools/registry.js';
import { AbstractTransport, TransportAddress } from '../transports/base.js';
import { HttpStreamTransport } from '../transports/http/server.js';
import { SSETransport } from '../transports/sse/server.js';
import { StdioTransport } from '../transports/stdio/server.js';
import { TransportType, createRequestContext } from '../utils/requestContext.js';
import { AuthSettings, ServerConfig } from './config.js';
import { logger } from './Logger.js';
import { renderToolOutcome } from './response-adapter.js';

export const SERVER_INFO = { name: 'meteo-mcp-server', version: '0.1.0' } as const;

export interface MCPServerOptions {
  config: ServerConfig;
  /** Defaults to the Open-Meteo client built from `config.openMeteo`. */
  weather?: WeatherService;
  /** Defaults to the built-in weather, air-quality and time tools. */
  tools?: readonly ToolProtocol[];
  /** Defaults to a JWKS-backed bearer provider built from `config.auth`. */
  authProvider?: AuthProvider;
}

export class MCPServer {
  readonly registry: ToolRegistry;
  private readonly config: ServerConfig;
  private readonly authProvider?: AuthProvider;
  private transport?: AbstractTransport;

  constructor(options: MCPServerOptions) {
    this.config = options.config;
    const weather = options.weather ?? new OpenMeteoClient(options.config.openMeteo);
    this.registry = new ToolRegistry(options.tools ?? createDefaultTools({ weather }));

    if (options.config.auth) {
      this.authProvider = options.authProvider ?? createOAuthProvider(options.config.auth);
    }
  }

  /**
   * Protocol server for one session. Bearer claims reach tools only through
   * `extra.authInfo`, which the HTTP transport fills from `req.auth`.
   */
  createProtocolServer(transport: TransportType): Server {
    const server = new Server(SERVER_INFO, { capabilities: { tools: {} } });
    const authEnforced = this.enforcesAuth(transport);
    const resourceMetadataUrl = this.config.auth?.resourceMetadataUrl;

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.registry.list().map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const context = createRequestContext({
        transport,
        authEnforced,
        sessionId: extra.sessionId,
        authInfo: extra.authInfo,
        resourceMetadataUrl,
      });
      const outcome = await this.registry.invoke(request.params.name, request.params.arguments, context);
      return renderToolOutcome(outcome);
    });

    return server;
  }

  async start(): Promise<void> {
    if (this.transport) {
      throw new Error('Server already started');
    }

    const transport = this.createTransport();
    const type = transport.type;
    if (this.config.auth && !this.enforcesAuth(type)) {
      logger.warn(`Authentication is configured but not enforced on the ${type} transport`);
    }

    transport.onerror = (error) => logger.error(`Transport error: ${error.message}`);
    this.transport = transport;
    await transport.start();
    logger.info(`${SERVER_INFO.name} ${SERVER_INFO.version} started with ${this.registry.list().length} tools`);
  }

  async stop(): Promise<void> {
    const transport = this.transport;
    this.transport = undefined;
    if (transport) {
      await transport.close();
      logger.info('Server stopped');
    }
  }

  address(): TransportAddress | undefined {
    return this.transport?.address();
  }

  isRunning(): boolean {
    return this.transport?.isRunning() ?? false;
  }

  private enforcesAuth(transport: TransportType): boolean {
    return this.authProvider !== undefined && transport === 'http-stream';
  }

  private createTransport(): AbstractTransport {
    const { config } = this;
    switch (config.transport) {
      case 'stdio':
        return new StdioTransport(() => this.createProtocolServer('stdio'));
      case 'sse':
        return new SSETransport(() => this.createProtocolServer('sse'), {
          host: config.host,
          port: config.port,
        });
      case 'streamable-http':
        return new HttpStreamTransport(() => this.createProtocolServer('http-stream'), {
          host: config.host,
          port: config.port,
          stateless: config.stateless,
          responseMode: config.responseMode,
          auth: this.authProvider ? new RequestAuthenticator(this.authProvider) : undefined,
          oauthMetadata: config.auth ? this.createResourceMetadata(config.auth) : undefined,
        });
    }
  }

  private createResourceMetadata(auth: AuthSettings): ProtectedResourceMetadata | undefined {
    if (!auth.resource) {
      return undefined;
    }
    const scopes = new Set(this.registry.list().flatMap((tool) => tool.requiredScopes));
    return new ProtectedResourceMetadata({
      resource: auth.resource,
      authorizationServers: [auth.issuerBaseUrl],
      scopesSupported: [...scopes],
    });
  }
}

function createOAuthProvider(auth: AuthSettings): OAuthAuthProvider {
  return new OAuthAuthProvider({
    validation: {
      jwksUri: auth.jwksUri,
      issuer: auth.issuer,
      audience: auth.audience,
      verifySsl: auth.verifySsl,
    },
    resourceMetadataUrl: auth.resourceMetadataUrl,
  });
}

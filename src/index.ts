export { MCPServer, SERVER_INFO } from './core/MCPServer.js';
export type { MCPServerOptions } from './core/MCPServer.js';
export { loadConfig, ConfigError } from './core/config.js';
export type { ServerConfig, AuthSettings, ConfigOverrides, TransportMode } from './core/config.js';
export { logger, Logger } from './core/Logger.js';
export type { LogLevel, ScopedLogger } from './core/Logger.js';
export { renderToolOutcome, toolErrorPayload } from './core/response-adapter.js';

export { MCPTool, REQUIRED_SCOPES_FIELD } from './tools/BaseTool.js';
export type { ToolProtocol, ToolDescriptor, ToolInputSchema } from './tools/BaseTool.js';
export { ToolRegistry } from './tools/registry.js';
export { createDefaultTools } from './tools/index.js';
export * from './tools/errors.js';
export type { ToolContent, ToolOutcome } from './tools/outcome.js';

export { OpenMeteoClient, DEFAULT_OPEN_METEO_URLS } from './services/open-meteo/client.js';
export * from './services/open-meteo/types.js';

export { OAuthAuthProvider } from './auth/providers/oauth.js';
export type { OAuthConfig } from './auth/providers/oauth.js';
export { JWTValidator, providerEndpoints } from './auth/validators/jwt-validator.js';
export type { JWTValidationConfig } from './auth/validators/jwt-validator.js';
export { RequestAuthenticator } from './auth/middleware.js';
export { ProtectedResourceMetadata } from './auth/metadata/protected-resource.js';
export { requireScope, requireScopes, requireAnyScope, extractScopes } from './auth/scopes.js';
export { InvalidTokenError, buildBearerChallenge } from './auth/errors.js';
export type { AuthClaims, AuthProvider, AuthResult } from './auth/types.js';

export { HttpStreamTransport } from './transports/http/server.js';
export { SSETransport } from './transports/sse/server.js';
export { StdioTransport } from './transports/stdio/server.js';
export type { RequestContext, TransportType } from './utils/requestContext.js';

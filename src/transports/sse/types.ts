import { CORSConfig } from '../utils/cors.js';

export interface SSETransportConfig {
  host?: string;
  port?: number;
  /** Event stream endpoint. */
  endpoint?: string;
  /** Endpoint announced to clients for posting messages. */
  messageEndpoint?: string;
  maxMessageSize?: string;
  keepAliveIntervalMs?: number;
  cors?: CORSConfig;
}

export const DEFAULT_SSE_CONFIG = {
  host: '0.0.0.0',
  port: 8080,
  endpoint: '/sse',
  messageEndpoint: '/messages/',
  maxMessageSize: '4mb',
  keepAliveIntervalMs: 15000,
} as const;

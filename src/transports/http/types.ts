import { ProtectedResourceMetadata } from '../../auth/metadata/protected-resource.js';
import { RequestAuthenticator } from '../../auth/middleware.js';
import { CORSConfig } from '../utils/cors.js';

/**
 * `stream` answers POSTs with an SSE stream; `batch` answers with a single
 * JSON body.
 */
export type ResponseMode = 'stream' | 'batch';

export interface HttpStreamTransportConfig {
  host?: string;
  /** `0` binds an ephemeral port; read it back with `address()`. */
  port?: number;
  endpoint?: string;
  responseMode?: ResponseMode;
  /** Fresh server and transport per request, no session ids. */
  stateless?: boolean;
  maxMessageSize?: string;
  sessionIdleTimeoutMs?: number;
  cors?: CORSConfig;
  /** When set, every non-exempt request must carry a valid bearer token. */
  auth?: RequestAuthenticator;
  oauthMetadata?: ProtectedResourceMetadata;
}

export const DEFAULT_HTTP_STREAM_CONFIG = {
  host: '0.0.0.0',
  port: 8080,
  endpoint: '/mcp',
  responseMode: 'stream',
  stateless: false,
} as const;

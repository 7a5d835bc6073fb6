import { ServerResponse } from 'node:http';

export interface CORSConfig {
  allowOrigin?: string;
  allowMethods?: string;
  allowHeaders?: string;
  exposeHeaders?: string;
  maxAge?: string;
}

export const DEFAULT_CORS_CONFIG: Required<CORSConfig> = {
  allowOrigin: '*',
  allowMethods: 'GET, POST, DELETE, OPTIONS',
  allowHeaders: 'Content-Type, Accept, Authorization, Mcp-Session-Id, Mcp-Protocol-Version, Last-Event-ID',
  exposeHeaders: 'Content-Type, Mcp-Session-Id, Mcp-Protocol-Version, WWW-Authenticate',
  maxAge: '86400',
};

export function getCorsHeaders(config: CORSConfig = {}, includeMaxAge = false): Record<string, string> {
  const cors = { ...DEFAULT_CORS_CONFIG, ...config };
  const headers: Record<string, string> = {
    'Access-Control-Allow-Origin': cors.allowOrigin,
    'Access-Control-Allow-Methods': cors.allowMethods,
    'Access-Control-Allow-Headers': cors.allowHeaders,
    'Access-Control-Expose-Headers': cors.exposeHeaders,
  };
  if (includeMaxAge) {
    headers['Access-Control-Max-Age'] = cors.maxAge;
  }
  return headers;
}

export function setResponseHeaders(res: ServerResponse, headers: Record<string, string>): void {
  for (const [key, value] of Object.entries(headers)) {
    res.setHeader(key, value);
  }
}

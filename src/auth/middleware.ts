import { IncomingMessage, ServerResponse } from 'node:http';
import { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import { logger } from '../core/Logger.js';
import { AuthProvider, toAuthInfo } from './types.js';

const log = logger.child('auth');

export const DEFAULT_EXEMPT_PATHS: readonly string[] = ['/health', '/.well-known/oauth-protected-resource'];

export type AuthGate = { status: 'passed'; authInfo?: AuthInfo } | { status: 'rejected' };

export interface RequestAuthenticatorOptions {
  exemptPaths?: readonly string[];
}

/**
 * Gatekeeper in front of the MCP transports. It must run before the SDK
 * transport touches the response: once the session stream is open the status
 * code can no longer become a 401.
 */
export class RequestAuthenticator {
  private readonly exemptPaths: ReadonlySet<string>;

  constructor(
    private readonly provider: AuthProvider,
    options: RequestAuthenticatorOptions = {}
  ) {
    this.exemptPaths = new Set(options.exemptPaths ?? DEFAULT_EXEMPT_PATHS);
    log.info(`Request authentication enabled (excluded paths: ${[...this.exemptPaths].join(', ')})`);
  }

  isExempt(req: IncomingMessage): boolean {
    if (req.method === 'OPTIONS') {
      return true;
    }
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    return this.exemptPaths.has(path);
  }

  async authenticate(req: IncomingMessage, res: ServerResponse): Promise<AuthGate> {
    if (this.isExempt(req)) {
      return { status: 'passed' };
    }

    const result = await this.provider.authenticate(req);
    if (!result.ok) {
      log.warn(`Authentication failed for ${req.method} ${req.url} from ${req.socket.remoteAddress}: ${result.message}`);
      sendUnauthorized(res, this.provider.getWWWAuthenticateHeader(result.reason), result.message);
      return { status: 'rejected' };
    }

    return { status: 'passed', authInfo: toAuthInfo(result.token, result.claims) };
  }
}

export function sendUnauthorized(res: ServerResponse, challenge: string, message: string): void {
  if (res.headersSent) {
    return;
  }
  res.setHeader('WWW-Authenticate', challenge);
  res.setHeader('Content-Type', 'application/json');
  res.writeHead(401);
  res.end(JSON.stringify({ error: 'unauthorized', message }));
}

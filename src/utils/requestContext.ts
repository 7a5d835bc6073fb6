import { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import { AuthClaims, claimsFromAuthInfo } from '../auth/types.js';

export type TransportType = 'stdio' | 'sse' | 'http-stream';

/**
 * Whether authentication is in force for a request. `disabled` means scope
 * checks pass; an authenticated context is checked against its claims.
 */
export type AuthState = { kind: 'disabled' } | { kind: 'authenticated'; claims: AuthClaims };

export interface RequestContext {
  transport: TransportType;
  sessionId?: string;
  auth: AuthState;
  resourceMetadataUrl?: string;
}

export interface ContextOptions {
  transport: TransportType;
  /** Authentication is configured and the transport enforces it. */
  authEnforced: boolean;
  sessionId?: string;
  authInfo?: AuthInfo;
  resourceMetadataUrl?: string;
}

/**
 * Builds the per-call context handed to tools. When authentication is
 * enforced but a request arrives without claims, it gets an authenticated
 * context with no scopes so that scope checks fail closed.
 */
export function createRequestContext(options: ContextOptions): RequestContext {
  let auth: AuthState;
  if (!options.authEnforced) {
    auth = { kind: 'disabled' };
  } else if (options.authInfo) {
    auth = { kind: 'authenticated', claims: claimsFromAuthInfo(options.authInfo) };
  } else {
    auth = {
      kind: 'authenticated',
      claims: { subject: 'anonymous', issuer: '', scopes: [], expiresAt: 0 },
    };
  }

  return {
    transport: options.transport,
    sessionId: options.sessionId,
    auth,
    resourceMetadataUrl: options.resourceMetadataUrl,
  };
}

export function grantedScopes(context: RequestContext): readonly string[] {
  return context.auth.kind === 'authenticated' ? context.auth.claims.scopes : [];
}

import { IncomingMessage } from 'node:http';
import { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';

/**
 * Claims of a validated access token, reduced to what the server acts on.
 */
export interface AuthClaims {
  subject: string;
  issuer: string;
  scopes: readonly string[];
  /** Epoch seconds. */
  expiresAt: number;
  clientId?: string;
}

export type AuthFailureReason = 'missing_token' | 'invalid_token';

export type AuthResult =
  | { ok: true; token: string; claims: AuthClaims }
  | { ok: false; reason: AuthFailureReason; message: string };

export interface AuthProvider {
  authenticate(req: IncomingMessage): Promise<AuthResult>;
  /** Challenge for a transport-level 401. */
  getWWWAuthenticateHeader(reason: AuthFailureReason): string;
}

/**
 * The SDK carries `req.auth` into every request handler as `extra.authInfo`;
 * the claims ride along in `extra`.
 */
export function toAuthInfo(token: string, claims: AuthClaims): AuthInfo {
  return {
    token,
    clientId: claims.clientId ?? claims.subject,
    scopes: [...claims.scopes],
    expiresAt: claims.expiresAt,
    extra: {
      subject: claims.subject,
      issuer: claims.issuer,
    },
  };
}

export function claimsFromAuthInfo(info: AuthInfo): AuthClaims {
  const subject = info.extra?.subject;
  const issuer = info.extra?.issuer;
  return {
    subject: typeof subject === 'string' ? subject : info.clientId,
    issuer: typeof issuer === 'string' ? issuer : '',
    scopes: [...info.scopes],
    expiresAt: info.expiresAt ?? 0,
    clientId: info.clientId,
  };
}

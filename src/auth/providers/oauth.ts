import { IncomingMessage } from 'node:http';
import { logger } from '../../core/Logger.js';
import { buildBearerChallenge } from '../errors.js';
import { AuthFailureReason, AuthProvider, AuthResult } from '../types.js';
import { JWTValidator, JWTValidationConfig } from '../validators/jwt-validator.js';

const log = logger.child('auth');

export interface OAuthConfig {
  validation: JWTValidationConfig;
  /** Advertised in `WWW-Authenticate` challenges as `resource_metadata`. */
  resourceMetadataUrl?: string;
  headerName?: string;
}

/**
 * Bearer-token authentication against an OAuth2 / OIDC provider's JWKS.
 */
export class OAuthAuthProvider implements AuthProvider {
  private readonly validator: JWTValidator;
  private readonly headerName: string;
  private readonly resourceMetadataUrl?: string;

  constructor(config: OAuthConfig, validator?: JWTValidator) {
    this.validator = validator ?? new JWTValidator(config.validation);
    this.headerName = (config.headerName ?? 'Authorization').toLowerCase();
    this.resourceMetadataUrl = config.resourceMetadataUrl;

    log.debug(
      `OAuthAuthProvider config - issuer: ${config.validation.issuer}, audience: ${config.validation.audience ?? '<not checked>'}`
    );
  }

  async authenticate(req: IncomingMessage): Promise<AuthResult> {
    const header = req.headers[this.headerName];
    const headerValue = Array.isArray(header) ? header[0] : header;

    if (!headerValue) {
      log.warn(`Missing Authorization header for ${req.method} ${req.url}`);
      return { ok: false, reason: 'missing_token', message: 'Missing Authorization header' };
    }

    const match = /^Bearer (.*)$/.exec(headerValue);
    if (!match) {
      log.warn('Invalid Authorization header format');
      return {
        ok: false,
        reason: 'invalid_token',
        message: "Invalid Authorization header format. Expected 'Bearer <token>'",
      };
    }

    const token = match[1].trim();
    if (token === '') {
      log.warn('Empty token in Authorization header');
      return { ok: false, reason: 'invalid_token', message: 'Empty token' };
    }

    if (this.hasTokenInQueryString(req)) {
      log.error('Security violation: token found in query string');
      return { ok: false, reason: 'invalid_token', message: 'Tokens in query strings are not allowed' };
    }

    try {
      const claims = await this.validator.validateClaims(token);
      log.debug(`Authenticated request from user: ${claims.subject}, scopes: [${claims.scopes.join(', ')}]`);
      return { ok: true, token, claims };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn(`Token validation failed: ${message}`);
      return { ok: false, reason: 'invalid_token', message: 'Invalid or expired token' };
    }
  }

  getWWWAuthenticateHeader(reason: AuthFailureReason): string {
    return buildBearerChallenge({
      resourceMetadataUrl: this.resourceMetadataUrl,
      params: { error: reason },
    });
  }

  private hasTokenInQueryString(req: IncomingMessage): boolean {
    if (!req.url) {
      return false;
    }
    const url = new URL(req.url, `http://${req.headers.host ?? 'localhost'}`);
    return url.searchParams.has('access_token') || url.searchParams.has('token');
  }
}

import { Agent as HttpsAgent } from 'node:https';
import jwt, { Algorithm, JwtPayload, VerifyOptions } from 'jsonwebtoken';
import jwksClient, { JwksClient, SigningKey } from 'jwks-rsa';
import { logger } from '../../core/Logger.js';
import { InvalidTokenError } from '../errors.js';
import { extractScopes } from '../scopes.js';
import { AuthClaims } from '../types.js';

const log = logger.child('auth');

export interface TokenClaims extends JwtPayload {
  sub: string;
  iss: string;
  exp: number;
  scope?: string;
  client_id?: string;
}

export interface JWTValidationConfig {
  jwksUri: string;
  issuer: string;
  /** When absent the audience is not checked. */
  audience?: string;
  algorithms?: Algorithm[];
  cacheTTL?: number;
  cacheMaxEntries?: number;
  rateLimit?: boolean;
  /**
   * `false` accepts any TLS certificate from the identity provider. Only for
   * local development against a self-signed provider.
   */
  verifySsl?: boolean;
}

const DEFAULT_ALGORITHMS: Algorithm[] = ['RS256', 'RS384', 'RS512'];

/**
 * Derives the JWKS endpoint and expected issuer from an identity provider
 * base URL laid out like WSO2 Identity Server or Asgardeo.
 */
export function providerEndpoints(issuerBaseUrl: string): { jwksUri: string; issuer: string } {
  const base = issuerBaseUrl.replace(/\/+$/, '').replace(/\/oauth2(\/token)?$/, '');
  return {
    jwksUri: `${base}/oauth2/jwks`,
    issuer: `${base}/oauth2/token`,
  };
}

export class JWTValidator {
  private jwksClient: JwksClient;
  private config: Required<Omit<JWTValidationConfig, 'audience'>> & { audience?: string };

  constructor(config: JWTValidationConfig) {
    this.config = {
      algorithms: DEFAULT_ALGORITHMS,
      cacheTTL: 3600000,
      cacheMaxEntries: 5,
      rateLimit: true,
      verifySsl: true,
      ...config,
    };

    // jwks-rsa refetches the key set when a kid is missing from its cache,
    // which covers key rotation at the provider.
    this.jwksClient = jwksClient({
      jwksUri: this.config.jwksUri,
      cache: true,
      cacheMaxEntries: this.config.cacheMaxEntries,
      cacheMaxAge: this.config.cacheTTL,
      rateLimit: this.config.rateLimit,
      jwksRequestsPerMinute: this.config.rateLimit ? 10 : undefined,
      requestAgent: this.config.verifySsl ? undefined : new HttpsAgent({ rejectUnauthorized: false }),
    });

    log.info(`JWTValidator initialized with JWKS URI: ${this.config.jwksUri}, issuer: ${this.config.issuer}`);
    if (!this.config.verifySsl) {
      log.warn('SSL verification is DISABLED for the identity provider - use only in development!');
    }
  }

  async validate(token: string): Promise<TokenClaims> {
    try {
      log.debug('Starting JWT validation');

      const decoded = jwt.decode(token, { complete: true });
      if (!decoded || typeof decoded === 'string') {
        throw new InvalidTokenError({ message: 'Invalid token format: unable to decode' });
      }

      const { kid, alg } = decoded.header;
      if (!kid) {
        throw new InvalidTokenError({ message: 'Invalid token: missing kid in header' });
      }

      if (!this.config.algorithms.some((allowed) => allowed === alg)) {
        throw new InvalidTokenError({
          message: `Invalid token algorithm: ${alg}. Expected one of: ${this.config.algorithms.join(', ')}`,
        });
      }

      const key = await this.getSigningKey(kid);
      const verified = await this.verifyToken(token, key);

      log.debug(`JWT validation successful for subject: ${verified.sub}`);
      return verified;
    } catch (error) {
      if (error instanceof InvalidTokenError) {
        log.warn(`JWT validation failed: ${error.message}`);
        throw error;
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      log.error(`JWT validation failed: ${message}`);
      throw new InvalidTokenError({ message: `JWT validation failed: ${message}` });
    }
  }

  /**
   * Validates the token and reduces its claims to the shape the rest of the
   * server uses.
   */
  async validateClaims(token: string): Promise<AuthClaims> {
    const claims = await this.validate(token);
    return {
      subject: claims.sub,
      issuer: claims.iss,
      scopes: extractScopes(claims),
      expiresAt: claims.exp,
      clientId: typeof claims.client_id === 'string' ? claims.client_id : undefined,
    };
  }

  private async getSigningKey(kid: string): Promise<string> {
    try {
      log.debug(`Fetching signing key for kid: ${kid}`);
      const key: SigningKey = await this.jwksClient.getSigningKey(kid);
      return key.getPublicKey();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new InvalidTokenError({ message: `Failed to fetch signing key: ${message}` });
    }
  }

  private verifyToken(token: string, publicKey: string): Promise<TokenClaims> {
    return new Promise((resolve, reject) => {
      const options: VerifyOptions & { complete: false } = {
        algorithms: this.config.algorithms,
        issuer: this.config.issuer,
        complete: false,
      };

      // Audience is checked below so that access tokens carrying only
      // client_id are accepted.
      jwt.verify(token, publicKey, options, (err, decoded) => {
        if (err) {
          if (err.name === 'TokenExpiredError') {
            reject(new InvalidTokenError({ message: 'Token has expired' }));
          } else if (err.name === 'NotBeforeError') {
            reject(new InvalidTokenError({ message: 'Token not yet valid' }));
          } else {
            reject(new InvalidTokenError({ message: `Token verification failed: ${err.message}` }));
          }
          return;
        }

        if (!decoded || typeof decoded === 'string') {
          reject(new InvalidTokenError({ message: 'Invalid token payload' }));
          return;
        }

        const { sub, iss, exp } = decoded;
        if (!sub) {
          reject(new InvalidTokenError({ message: 'Token missing required claim: sub' }));
          return;
        }
        if (!iss) {
          reject(new InvalidTokenError({ message: 'Token missing required claim: iss' }));
          return;
        }
        if (exp === undefined) {
          reject(new InvalidTokenError({ message: 'Token missing required claim: exp' }));
          return;
        }

        const clientId = typeof decoded.client_id === 'string' ? decoded.client_id : undefined;
        const expectedAudience = this.config.audience;
        if (expectedAudience) {
          const aud = decoded.aud;
          const audienceMatches = Array.isArray(aud) ? aud.includes(expectedAudience) : aud === expectedAudience;
          if (!audienceMatches && clientId !== expectedAudience) {
            reject(
              new InvalidTokenError({
                message: `Token audience mismatch. Expected ${expectedAudience}, got aud: ${aud}, client_id: ${clientId}`,
              })
            );
            return;
          }
        }

        const scope = typeof decoded.scope === 'string' ? decoded.scope : undefined;
        resolve({ ...decoded, sub, iss, exp, scope, client_id: clientId });
      });
    });
  }
}

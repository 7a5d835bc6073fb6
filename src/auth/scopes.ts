import { logger } from '../core/Logger.js';
import { RequestContext, grantedScopes } from '../utils/requestContext.js';
import { InsufficientScopeError } from './errors.js';

const log = logger.child('auth');

/**
 * Collects granted scopes from the claim shapes providers use: OAuth2 `scope`
 * (space separated), Azure-style `scp` and a plain `scopes` array.
 */
export function extractScopes(claims: Record<string, unknown>): string[] {
  const scopes: string[] = [];
  const add = (value: unknown) => {
    const items = typeof value === 'string' ? value.split(/\s+/) : Array.isArray(value) ? value : [];
    for (const item of items) {
      if (typeof item === 'string' && item !== '' && !scopes.includes(item)) {
        scopes.push(item);
      }
    }
  };

  add(claims.scope);
  add(claims.scp);
  add(claims.scopes);
  return scopes;
}

function subjectOf(context: RequestContext): string {
  return context.auth.kind === 'authenticated' ? context.auth.claims.subject : 'unauthenticated';
}

/**
 * Throws unless every scope in `required` is granted. Passes whenever
 * authentication is disabled for the request.
 */
export function requireScopes(required: readonly string[], context: RequestContext): void {
  if (context.auth.kind === 'disabled' || required.length === 0) {
    return;
  }

  const available = grantedScopes(context);
  if (required.every((scope) => available.includes(scope))) {
    return;
  }

  log.warn(
    `User ${subjectOf(context)} missing required scopes [${required.join(', ')}]. Available scopes: [${available.join(', ')}]`
  );
  throw InsufficientScopeError.create(required, available, {
    resourceMetadataUrl: context.resourceMetadataUrl,
  });
}

export function requireScope(scope: string, context: RequestContext): void {
  requireScopes([scope], context);
}

export function requireAnyScope(required: readonly string[], context: RequestContext): void {
  if (context.auth.kind === 'disabled' || required.length === 0) {
    return;
  }

  const available = grantedScopes(context);
  if (required.some((scope) => available.includes(scope))) {
    return;
  }

  log.warn(
    `User ${subjectOf(context)} missing required scopes (need one of: ${required.join(', ')}). Available scopes: [${available.join(', ')}]`
  );
  throw InsufficientScopeError.create(required, available, {
    resourceMetadataUrl: context.resourceMetadataUrl,
    message: `Requires one of these scopes: ${required.join(', ')}`,
  });
}

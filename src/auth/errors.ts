import { Data } from "effect";

export class InvalidTokenError extends Data.TaggedError("InvalidTokenError")<{
  message: string;
}> {}

interface InsufficientScopeFields {
  requiredScopes: readonly string[];
  availableScopes: readonly string[];
  resourceMetadataUrl?: string;
  message: string;
}

/**
 * Raised by the scope checks when the caller's token lacks a scope a tool
 * declares. It is never sent as a real 401: by the time a tool runs the
 * response stream is already committed, so the response adapter encodes it
 * in-band together with the challenge a `WWW-Authenticate` header would carry.
 */
export class InsufficientScopeError extends Data.TaggedError("InsufficientScopeError")<InsufficientScopeFields> {
  static create(
    requiredScopes: readonly string[],
    availableScopes: readonly string[],
    options: { resourceMetadataUrl?: string; message?: string } = {}
  ): InsufficientScopeError {
    const scopeList = requiredScopes.join(", ");
    const message =
      options.message ??
      (requiredScopes.length === 1 ? `Required scope: ${scopeList}` : `Required scopes: ${scopeList}`);

    return new InsufficientScopeError({
      requiredScopes: [...requiredScopes],
      availableScopes: [...availableScopes],
      resourceMetadataUrl: options.resourceMetadataUrl,
      message,
    });
  }

  wwwAuthenticate(): string {
    return buildBearerChallenge({
      resourceMetadataUrl: this.resourceMetadataUrl,
      params: { scope: this.requiredScopes.join(" ") },
    });
  }
}

/**
 * `Bearer resource_metadata="...", key="value", ...`. The metadata URL, when
 * present, always comes first.
 */
export function buildBearerChallenge(options: {
  resourceMetadataUrl?: string;
  params: Record<string, string>;
}): string {
  const parts: string[] = [];
  if (options.resourceMetadataUrl) {
    parts.push(`resource_metadata="${options.resourceMetadataUrl}"`);
  }
  for (const [key, value] of Object.entries(options.params)) {
    parts.push(`${key}="${value}"`);
  }
  return `Bearer ${parts.join(", ")}`;
}

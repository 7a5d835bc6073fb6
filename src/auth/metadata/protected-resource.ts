import { ServerResponse } from 'node:http';
import { logger } from '../../core/Logger.js';

export const PROTECTED_RESOURCE_METADATA_PATH = '/.well-known/oauth-protected-resource';

export interface OAuthMetadataConfig {
  authorizationServers: string[];
  resource: string;
  scopesSupported?: string[];
}

export interface ProtectedResourceMetadataResponse {
  resource: string;
  authorization_servers: string[];
  scopes_supported?: string[];
  bearer_methods_supported: string[];
}

/**
 * OAuth 2.0 Protected Resource Metadata (RFC 9728) for this server.
 */
export class ProtectedResourceMetadata {
  private config: OAuthMetadataConfig;
  private metadataJson: string;

  constructor(config: OAuthMetadataConfig) {
    if (!config.resource || config.resource.trim() === '') {
      throw new Error('OAuth metadata requires a resource identifier');
    }

    if (!config.authorizationServers || config.authorizationServers.length === 0) {
      throw new Error('OAuth metadata requires at least one authorization server');
    }

    for (const server of config.authorizationServers) {
      try {
        new URL(server);
      } catch {
        throw new Error(`Invalid authorization server URL: ${server}`);
      }
    }

    this.config = config;
    this.metadataJson = JSON.stringify(this.generateMetadata(), null, 2);

    logger.debug(
      `ProtectedResourceMetadata initialized - resource: ${this.config.resource}, servers: ${this.config.authorizationServers.length}`
    );
  }

  /**
   * URL at which the document is served for a given resource identifier.
   */
  static metadataUrlFor(resource: string): string {
    const url = new URL(resource);
    return `${url.origin}${PROTECTED_RESOURCE_METADATA_PATH}`;
  }

  generateMetadata(): ProtectedResourceMetadataResponse {
    const metadata: ProtectedResourceMetadataResponse = {
      resource: this.config.resource,
      authorization_servers: this.config.authorizationServers,
      bearer_methods_supported: ['header'],
    };
    if (this.config.scopesSupported && this.config.scopesSupported.length > 0) {
      metadata.scopes_supported = this.config.scopesSupported;
    }
    return metadata;
  }

  toJSON(): string {
    return this.metadataJson;
  }

  serve(res: ServerResponse): void {
    res.setHeader('Content-Type', 'application/json');
    res.setHeader('Cache-Control', 'public, max-age=3600');
    res.writeHead(200);
    res.end(this.metadataJson);
  }
}

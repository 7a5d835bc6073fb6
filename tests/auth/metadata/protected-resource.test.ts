import { describe, it, expect } from '@jest/globals';
import { ProtectedResourceMetadata } from '../../../src/auth/metadata/protected-resource.js';

describe('ProtectedResourceMetadata', () => {
  describe('Configuration Validation', () => {
    it('should throw error for empty resource', () => {
      expect(() => {
        new ProtectedResourceMetadata({
          authorizationServers: ['https://idp.example.test'],
          resource: '  ',
        });
      }).toThrow('OAuth metadata requires a resource identifier');
    });

    it('should throw error for missing authorization servers', () => {
      expect(() => {
        new ProtectedResourceMetadata({
          authorizationServers: [],
          resource: 'https://mcp.example.test/mcp',
        });
      }).toThrow('OAuth metadata requires at least one authorization server');
    });

    it('should throw error for invalid authorization server URL', () => {
      expect(() => {
        new ProtectedResourceMetadata({
          authorizationServers: ['not-a-valid-url'],
          resource: 'https://mcp.example.test/mcp',
        });
      }).toThrow('Invalid authorization server URL: not-a-valid-url');
    });
  });

  describe('Metadata Generation', () => {
    it('should describe the resource with header bearer tokens', () => {
      const metadata = new ProtectedResourceMetadata({
        authorizationServers: ['https://idp.example.test'],
        resource: 'https://mcp.example.test/mcp',
        scopesSupported: ['read_airquality'],
      });

      expect(metadata.generateMetadata()).toEqual({
        resource: 'https://mcp.example.test/mcp',
        authorization_servers: ['https://idp.example.test'],
        scopes_supported: ['read_airquality'],
        bearer_methods_supported: ['header'],
      });
    });

    it('should leave out scopes_supported when no scope is declared', () => {
      const metadata = new ProtectedResourceMetadata({
        authorizationServers: ['https://idp.example.test'],
        resource: 'https://mcp.example.test/mcp',
        scopesSupported: [],
      });

      expect(JSON.parse(metadata.toJSON())).toEqual({
        resource: 'https://mcp.example.test/mcp',
        authorization_servers: ['https://idp.example.test'],
        bearer_methods_supported: ['header'],
      });
    });
  });

  describe('metadataUrlFor', () => {
    it('should place the document at the origin of the resource', () => {
      expect(ProtectedResourceMetadata.metadataUrlFor('https://mcp.example.test:8443/mcp')).toBe(
        'https://mcp.example.test:8443/.well-known/oauth-protected-resource'
      );
    });
  });
});

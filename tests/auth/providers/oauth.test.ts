import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { IncomingMessage } from 'node:http';
import { Socket } from 'node:net';
import { OAuthAuthProvider } from '../../../src/auth/providers/oauth.js';
import { MockAuthServer } from '../../fixtures/mock-auth-server.js';

describe('OAuthAuthProvider', () => {
  let mockServer: MockAuthServer;
  let provider: OAuthAuthProvider;

  beforeAll(async () => {
    mockServer = new MockAuthServer();
    await mockServer.start();

    provider = new OAuthAuthProvider({
      validation: {
        jwksUri: mockServer.getJWKSUri(),
        audience: mockServer.getAudience(),
        issuer: mockServer.getIssuer(),
      },
      resourceMetadataUrl: 'http://127.0.0.1:8080/.well-known/oauth-protected-resource',
    });
  });

  afterAll(async () => {
    await mockServer.stop();
  });

  const createMockRequest = (headers: Record<string, string>, url = '/mcp'): IncomingMessage => {
    const socket = new Socket();
    Object.defineProperty(socket, 'remoteAddress', {
      value: '127.0.0.1',
      writable: false,
    });
    const req = new IncomingMessage(socket);
    req.headers = headers;
    req.method = 'POST';
    req.url = url;
    return req;
  };

  describe('authenticate', () => {
    it('should authenticate with valid Bearer token', async () => {
      const token = mockServer.generateToken({ scope: 'read_airquality' });
      const result = await provider.authenticate(createMockRequest({ authorization: `Bearer ${token}` }));

      expect(result).toEqual({
        ok: true,
        token,
        claims: {
          subject: 'test-user-123',
          issuer: mockServer.getIssuer(),
          scopes: ['read_airquality'],
          expiresAt: expect.any(Number),
          clientId: undefined,
        },
      });
    });

    it('should report a missing Authorization header', async () => {
      const result = await provider.authenticate(createMockRequest({}));

      expect(result).toEqual({ ok: false, reason: 'missing_token', message: 'Missing Authorization header' });
    });

    it('should reject a non-Bearer scheme', async () => {
      const result = await provider.authenticate(createMockRequest({ authorization: 'Basic dGVzdDp0ZXN0' }));

      expect(result).toEqual({
        ok: false,
        reason: 'invalid_token',
        message: "Invalid Authorization header format. Expected 'Bearer <token>'",
      });
    });

    it('should reject an empty token', async () => {
      const result = await provider.authenticate(createMockRequest({ authorization: 'Bearer    ' }));

      expect(result).toEqual({ ok: false, reason: 'invalid_token', message: 'Empty token' });
    });

    it('should reject a token passed in the query string', async () => {
      const token = mockServer.generateToken();
      const result = await provider.authenticate(
        createMockRequest({ authorization: `Bearer ${token}` }, `/mcp?access_token=${token}`)
      );

      expect(result).toEqual({
        ok: false,
        reason: 'invalid_token',
        message: 'Tokens in query strings are not allowed',
      });
    });

    it('should reject an expired token with a generic message', async () => {
      const token = mockServer.generateExpiredToken();
      const result = await provider.authenticate(createMockRequest({ authorization: `Bearer ${token}` }));

      expect(result).toEqual({ ok: false, reason: 'invalid_token', message: 'Invalid or expired token' });
    });
  });

  describe('getWWWAuthenticateHeader', () => {
    it('should include the resource metadata URL before the error', () => {
      expect(provider.getWWWAuthenticateHeader('missing_token')).toBe(
        'Bearer resource_metadata="http://127.0.0.1:8080/.well-known/oauth-protected-resource", error="missing_token"'
      );
    });

    it('should omit resource_metadata when none is configured', () => {
      const bare = new OAuthAuthProvider({
        validation: { jwksUri: mockServer.getJWKSUri(), issuer: mockServer.getIssuer() },
      });

      expect(bare.getWWWAuthenticateHeader('invalid_token')).toBe('Bearer error="invalid_token"');
    });
  });
});

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from '@jest/globals';
import { loadConfig } from '../../../src/core/config.js';
import { MCPServer } from '../../../src/core/MCPServer.js';
import { FakeWeatherService } from '../../fixtures/fake-weather-service.js';
import { McpHttpClient, resultOf, toolText } from '../../fixtures/mcp-http-client.js';
import { MockAuthServer } from '../../fixtures/mock-auth-server.js';

const RESOURCE = 'http://127.0.0.1:8080/mcp';
const METADATA_URL = 'http://127.0.0.1:8080/.well-known/oauth-protected-resource';

describe('HttpStreamTransport with bearer authentication', () => {
  let authServer: MockAuthServer;
  let server: MCPServer;
  let baseUrl: string;

  beforeAll(async () => {
    authServer = new MockAuthServer();
    await authServer.start();
  });

  afterAll(async () => {
    await authServer.stop();
  });

  beforeEach(async () => {
    const config = loadConfig({
      MCP_TRANSPORT: 'streamable-http',
      HOST: '127.0.0.1',
      PORT: '0',
      MCP_RESPONSE_MODE: 'batch',
      AUTH_ENABLED: 'true',
      AUTH_ISSUER_URL: authServer.getBaseUrl(),
      AUTH_AUDIENCE: authServer.getAudience(),
      AUTH_RESOURCE: RESOURCE,
    });
    server = new MCPServer({ config, weather: new FakeWeatherService() });
    await server.start();
    baseUrl = `http://127.0.0.1:${server.address()?.port ?? 0}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  describe('rejected requests', () => {
    it('returns 401 with a challenge when no token is sent', async () => {
      const response = await new McpHttpClient(baseUrl).initialize();

      expect(response.status).toBe(401);
      expect(response.headers.get('www-authenticate')).toBe(
        `Bearer resource_metadata="${METADATA_URL}", error="missing_token"`
      );
      expect(JSON.parse(response.text)).toEqual({ error: 'unauthorized', message: 'Missing Authorization header' });
    });

    it('returns 401 invalid_token for an expired token', async () => {
      const response = await new McpHttpClient(baseUrl, authServer.generateExpiredToken()).initialize();

      expect(response.status).toBe(401);
      expect(response.headers.get('www-authenticate')).toBe(
        `Bearer resource_metadata="${METADATA_URL}", error="invalid_token"`
      );
      expect(JSON.parse(response.text)).toEqual({ error: 'unauthorized', message: 'Invalid or expired token' });
    });

    it('returns 401 for a token from another issuer', async () => {
      const token = authServer.generateToken({ iss: 'https://other.example/oauth2/token' });

      const response = await new McpHttpClient(baseUrl, token).initialize();

      expect(response.status).toBe(401);
    });

    it('returns 401 for a token signed by an unknown key', async () => {
      const response = await new McpHttpClient(baseUrl, authServer.generateForeignToken()).initialize();

      expect(response.status).toBe(401);
    });

    it('returns 401 for a non-bearer authorization header', async () => {
      const client = new McpHttpClient(baseUrl);

      const response = await client.call('tools/list', {});
      const basic = await client.request('POST', '/mcp', { jsonrpc: '2.0', id: 1, method: 'tools/list' }, {
        Authorization: 'Basic dGVzdDp0ZXN0',
      });

      expect(response.status).toBe(401);
      expect(basic.status).toBe(401);
      expect(JSON.parse(basic.text)).toEqual({
        error: 'unauthorized',
        message: "Invalid Authorization header format. Expected 'Bearer <token>'",
      });
    });

    it('checks the token before the session id', async () => {
      const client = new McpHttpClient(baseUrl, authServer.generateExpiredToken());
      client.sessionId = 'no-such-session';

      const response = await client.call('tools/list');

      expect(response.status).toBe(401);
    });

    it('checks the token before the route', async () => {
      const response = await fetch(`${baseUrl}/unknown`);

      expect(response.status).toBe(401);
    });
  });

  describe('exempt routes', () => {
    it('serves the health check without a token', async () => {
      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(200);
    });

    it('serves protected-resource metadata without a token', async () => {
      const response = await fetch(`${baseUrl}/.well-known/oauth-protected-resource`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        resource: RESOURCE,
        authorization_servers: [authServer.getBaseUrl()],
        bearer_methods_supported: ['header'],
        scopes_supported: ['read_airquality'],
      });
    });

    it('answers CORS preflight without a token', async () => {
      const response = await fetch(`${baseUrl}/mcp`, { method: 'OPTIONS' });

      expect(response.status).toBe(204);
    });
  });

  describe('authenticated sessions', () => {
    it('runs unscoped tools for any valid token', async () => {
      const client = new McpHttpClient(baseUrl, authServer.generateToken());
      await client.initialize();

      const response = await client.callTool('get_timezone_info', { timezone_name: 'UTC' });

      expect(response.status).toBe(200);
      expect(resultOf(response).isError).toBeUndefined();
    });

    it('reports a missing scope in-band', async () => {
      const client = new McpHttpClient(baseUrl, authServer.generateToken({ scope: 'openid profile' }));
      await client.initialize();

      const response = await client.callTool('get_air_quality', { city: 'Lisbon' });

      expect(response.status).toBe(200);
      expect(resultOf(response).isError).toBe(true);
      expect(JSON.parse(toolText(response))).toEqual({
        error: 'insufficient_scope',
        message: 'Required scope: read_airquality',
        required_scopes: ['read_airquality'],
        available_scopes: ['openid', 'profile'],
        status_code: 401,
        www_authenticate: `Bearer resource_metadata="${METADATA_URL}", scope="read_airquality"`,
        resource_metadata_url: METADATA_URL,
      });
    });

    it('runs scoped tools when the token grants the scope', async () => {
      const client = new McpHttpClient(baseUrl, authServer.generateToken({ scope: 'openid read_airquality' }));
      await client.initialize();

      const response = await client.callTool('get_air_quality_details', { city: 'Lisbon' });

      expect(resultOf(response).isError).toBeUndefined();
      expect(JSON.parse(toolText(response))).toMatchObject({ city: 'Lisbon', current: { pm10: 18.2 } });
    });

    it('requires the token on every request of a session', async () => {
      const client = new McpHttpClient(baseUrl, authServer.generateToken());
      await client.initialize();
      const anonymous = new McpHttpClient(baseUrl);
      anonymous.sessionId = client.sessionId;

      const response = await anonymous.call('tools/list');

      expect(response.status).toBe(401);
    });
  });
});

export const PROTOCOL_VERSION = '2025-03-26';

export interface McpHttpResponse {
  status: number;
  headers: Headers;
  /** JSON-RPC messages from a JSON body or from the `data:` lines of an SSE body. */
  messages: unknown[];
  text: string;
}

/**
 * Minimal streamable-HTTP client for driving the server in tests.
 */
export class McpHttpClient {
  sessionId?: string;
  private nextId = 1;

  constructor(
    private readonly baseUrl: string,
    private readonly token?: string
  ) {}

  async post(body: unknown, extraHeaders: Record<string, string> = {}): Promise<McpHttpResponse> {
    return this.request('POST', '/mcp', body, extraHeaders);
  }

  async request(
    method: string,
    path: string,
    body?: unknown,
    extraHeaders: Record<string, string> = {}
  ): Promise<McpHttpResponse> {
    const headers: Record<string, string> = {
      Accept: 'application/json, text/event-stream',
      'Mcp-Protocol-Version': PROTOCOL_VERSION,
      ...extraHeaders,
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    if (this.sessionId) {
      headers['Mcp-Session-Id'] = this.sessionId;
    }

    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await response.text();
    return { status: response.status, headers: response.headers, messages: parseMessages(response.headers, text), text };
  }

  async initialize(): Promise<McpHttpResponse> {
    const response = await this.post({
      jsonrpc: '2.0',
      id: this.nextId++,
      method: 'initialize',
      params: {
        protocolVersion: PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: { name: 'test-client', version: '1.0.0' },
      },
    });
    const sessionId = response.headers.get('mcp-session-id');
    if (sessionId) {
      this.sessionId = sessionId;
    }
    if (response.status === 200) {
      await this.post({ jsonrpc: '2.0', method: 'notifications/initialized' });
    }
    return response;
  }

  async call(method: string, params: Record<string, unknown> = {}): Promise<McpHttpResponse> {
    return this.post({ jsonrpc: '2.0', id: this.nextId++, method, params });
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<McpHttpResponse> {
    return this.call('tools/call', { name, arguments: args });
  }
}

function parseMessages(headers: Headers, text: string): unknown[] {
  const type = headers.get('content-type') ?? '';
  if (type.includes('text/event-stream')) {
    return text
      .split('\n')
      .filter((line) => line.startsWith('data: '))
      .map((line): unknown => JSON.parse(line.slice('data: '.length)));
  }
  if (type.includes('application/json') && text !== '') {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed : [parsed];
  }
  return [];
}

/** The `result` of the single JSON-RPC response in `response`. */
export function resultOf(response: McpHttpResponse): Record<string, unknown> {
  const [message] = response.messages;
  if (!isObject(message) || !isObject(message.result)) {
    throw new Error(`expected a JSON-RPC result, got ${response.status} ${response.text}`);
  }
  return message.result;
}

/** The first text item of a `tools/call` result. */
export function toolText(response: McpHttpResponse): string {
  const content = resultOf(response).content;
  const first: unknown = Array.isArray(content) ? content[0] : undefined;
  if (!isObject(first) || typeof first.text !== 'string') {
    throw new Error(`expected text content, got ${response.text}`);
  }
  return first.text;
}

/** The tool descriptors of a `tools/list` result. */
export function listedTools(response: McpHttpResponse): Record<string, unknown>[] {
  const tools = resultOf(response).tools;
  if (!Array.isArray(tools)) {
    throw new Error(`expected a tools array, got ${response.text}`);
  }
  return tools.filter(isObject);
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

import { IncomingMessage, ServerResponse } from 'node:http';
import contentType from 'content-type';
import getRawBody from 'raw-body';

export const DEFAULT_MAX_MESSAGE_SIZE = '4mb';

export function getRequestHeader(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

export function requestUrl(req: IncomingMessage): URL {
  return new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
}

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  if (res.headersSent) {
    return;
  }
  res.setHeader('Content-Type', 'application/json');
  res.writeHead(status);
  res.end(JSON.stringify(body));
}

export function sendJsonRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  sendJson(res, status, { jsonrpc: '2.0', error: { code, message }, id: null });
}

/**
 * Reads a JSON request body. Rejects on a non-JSON content type, an
 * oversized body or malformed JSON.
 */
export async function readJsonBody(req: IncomingMessage, limit: string = DEFAULT_MAX_MESSAGE_SIZE): Promise<unknown> {
  const ct = contentType.parse(req.headers['content-type'] ?? 'application/json');
  if (ct.type !== 'application/json') {
    throw new Error(`Unsupported content-type: ${ct.type}`);
  }
  const raw = await getRawBody(req, {
    limit,
    encoding: ct.parameters.charset ?? 'utf-8',
  });
  return raw.length > 0 ? JSON.parse(raw) : undefined;
}

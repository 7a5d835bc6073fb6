import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ToolError } from '../tools/errors.js';
import { ToolContent, ToolOutcome } from '../tools/outcome.js';
import { logger } from './Logger.js';

type ErrorPayload = { error: string; message: string } & Record<string, unknown>;

const toText = (text: string): CallToolResult => ({
  content: [{ type: 'text', text }],
});

function renderContent(content: ToolContent): CallToolResult {
  switch (content.kind) {
    case 'text':
      return toText(content.text);
    case 'structured':
      return toText(JSON.stringify(content.data, null, 2));
  }
}

/**
 * JSON body for an in-band tool error. The `insufficient_scope` field names
 * are relied on by existing clients and must not change.
 */
export function toolErrorPayload(error: ToolError): ErrorPayload {
  switch (error._tag) {
    case 'InsufficientScopeError': {
      const payload: ErrorPayload = {
        error: 'insufficient_scope',
        message: error.message,
        required_scopes: [...error.requiredScopes],
        available_scopes: [...error.availableScopes],
        status_code: 401,
        www_authenticate: error.wwwAuthenticate(),
      };
      if (error.resourceMetadataUrl) {
        payload.resource_metadata_url = error.resourceMetadataUrl;
      }
      return payload;
    }
    case 'UnknownToolError':
      return { error: 'unknown_tool', message: error.message, tool: error.toolName };
    case 'InvalidArgumentsError':
      return { error: 'invalid_arguments', message: error.message, issues: [...error.issues] };
    case 'CityNotFoundError':
      return { error: 'city_not_found', message: error.message, city: error.city };
    case 'UpstreamUnavailableError': {
      const payload: ErrorPayload = { error: 'upstream_unavailable', message: error.message, service: error.service };
      if (error.status !== undefined) {
        payload.status = error.status;
      }
      return payload;
    }
    case 'ToolExecutionError':
      return { error: 'tool_error', message: error.message };
  }
}

/**
 * Renders a tool outcome into a `tools/call` result. Failures stay inside a
 * successful JSON-RPC response: the HTTP status was committed when the
 * session stream opened.
 */
export function renderToolOutcome(outcome: ToolOutcome): CallToolResult {
  if (outcome._tag === 'Success') {
    return renderContent(outcome.content);
  }

  const error = outcome.error;
  if (error._tag === 'InsufficientScopeError') {
    // Never sent as a header on this path; logged for operators.
    logger.info(`WWW-Authenticate: ${error.wwwAuthenticate()}`);
  }

  return {
    ...toText(JSON.stringify(toolErrorPayload(error), null, 2)),
    isError: true,
  };
}

import { Data } from "effect";
import { InsufficientScopeError } from "../auth/errors.js";

export { InsufficientScopeError };

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class UnknownToolError extends Data.TaggedError("UnknownToolError")<{
  toolName: string;
  message: string;
}> {
  constructor(args: { toolName: string }) {
    super({ ...args, message: `Unknown tool: ${args.toolName}` });
  }
}

export class InvalidArgumentsError extends Data.TaggedError("InvalidArgumentsError")<{
  toolName: string;
  issues: readonly string[];
  message: string;
}> {
  constructor(args: { toolName: string; issues: readonly string[] }) {
    super({ ...args, message: `Invalid arguments for ${args.toolName}: ${args.issues.join("; ")}` });
  }
}

export class CityNotFoundError extends Data.TaggedError("CityNotFoundError")<{
  city: string;
  message: string;
}> {
  constructor(args: { city: string }) {
    super({ ...args, message: `City not found: ${args.city}` });
  }
}

export class UpstreamUnavailableError extends Data.TaggedError("UpstreamUnavailableError")<{
  service: string;
  status?: number;
  message: string;
}> {
  constructor(args: { service: string; status?: number; cause?: unknown }) {
    const detail = args.status !== undefined ? `HTTP ${args.status}` : describeCause(args.cause);
    super({ service: args.service, status: args.status, message: `${args.service} is unavailable: ${detail}` });
  }
}

export class ToolExecutionError extends Data.TaggedError("ToolExecutionError")<{
  toolName: string;
  message: string;
}> {
  constructor(args: { toolName: string; cause: unknown }) {
    super({
      toolName: args.toolName,
      message: `Error executing tool '${args.toolName}': ${describeCause(args.cause)}`,
    });
  }
}

export type ToolError =
  | UnknownToolError
  | InvalidArgumentsError
  | CityNotFoundError
  | UpstreamUnavailableError
  | InsufficientScopeError
  | ToolExecutionError;

export function isToolError(value: unknown): value is ToolError {
  return (
    value instanceof UnknownToolError ||
    value instanceof InvalidArgumentsError ||
    value instanceof CityNotFoundError ||
    value instanceof UpstreamUnavailableError ||
    value instanceof InsufficientScopeError ||
    value instanceof ToolExecutionError
  );
}

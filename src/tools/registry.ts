import { Effect, Either } from 'effect';
import { logger } from '../core/Logger.js';
import { RequestContext } from '../utils/requestContext.js';
import { ToolDescriptor, ToolProtocol } from './BaseTool.js';
import { ToolError, ToolExecutionError, UnknownToolError, isToolError } from './errors.js';
import { ToolContent, ToolOutcome } from './outcome.js';

const log = logger.child('tools');

/**
 * Name → tool lookup built once at start-up. Descriptors are computed on
 * registration, so what `tools/list` reports is what `tools/call` enforces.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolProtocol>();
  private readonly descriptors: readonly ToolDescriptor[];

  constructor(tools: readonly ToolProtocol[]) {
    const descriptors: ToolDescriptor[] = [];
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
      descriptors.push(Object.freeze(tool.toolDefinition));
      log.info(`Registered tool handler: ${tool.name}`);
    }
    this.descriptors = Object.freeze(descriptors);
    log.info(`Registered ${this.tools.size} tool handlers`);
  }

  list(): readonly ToolDescriptor[] {
    return this.descriptors;
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Runs a tool. Never rejects: every failure comes back as a `Failure`
   * outcome for the response adapter to render in-band.
   */
  async invoke(name: string, args: unknown, context: RequestContext): Promise<ToolOutcome> {
    const result = await Effect.runPromise(
      Effect.either(
        Effect.tapError(this.invokeEffect(name, args, context), (error) =>
          Effect.sync(() => logToolError(name, error))
        )
      )
    );

    if (Either.isLeft(result)) {
      return { _tag: 'Failure', error: result.left };
    }
    log.info(`Tool ${name} executed successfully`);
    return { _tag: 'Success', content: result.right };
  }

  private invokeEffect(name: string, args: unknown, context: RequestContext): Effect.Effect<ToolContent, ToolError> {
    const tool = this.tools.get(name);

    return Effect.gen(function* () {
      if (!tool) {
        return yield* Effect.fail(new UnknownToolError({ toolName: name }));
      }

      yield* Effect.sync(() =>
        log.info(`Executing tool: ${name} (transport: ${context.transport}, session: ${context.sessionId ?? 'none'})`)
      );

      return yield* Effect.tryPromise({
        try: () => tool.toolCall(args, context),
        catch: (cause): ToolError => (isToolError(cause) ? cause : new ToolExecutionError({ toolName: name, cause })),
      });
    });
  }
}

function logToolError(name: string, error: ToolError): void {
  switch (error._tag) {
    case 'UnknownToolError':
    case 'InvalidArgumentsError':
    case 'CityNotFoundError':
      log.warn(`Tool ${name} rejected: ${error.message}`);
      break;
    case 'InsufficientScopeError':
      log.warn(`Scope error in tool ${name}: ${error.message}`);
      break;
    case 'UpstreamUnavailableError':
    case 'ToolExecutionError':
      log.error(`Tool ${name} failed: ${error.message}`);
      break;
  }
}

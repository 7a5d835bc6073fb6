import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { requireScopes } from '../auth/scopes.js';
import { RequestContext } from '../utils/requestContext.js';
import { InvalidArgumentsError } from './errors.js';
import { ToolContent, structuredContent, textContent } from './outcome.js';

/** Non-standard input-schema field through which clients discover scopes. */
export const REQUIRED_SCOPES_FIELD = 'x-required-scopes';

export type ToolInputSchema = Tool['inputSchema'];

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  requiredScopes: readonly string[];
}

export interface ToolProtocol {
  name: string;
  description: string;
  requiredScopes: readonly string[];
  toolDefinition: ToolDescriptor;
  /**
   * Checks scopes, validates `args` and runs the tool. Rejects with one of the
   * tagged tool errors.
   */
  toolCall(args: unknown, context: RequestContext): Promise<ToolContent>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export abstract class MCPTool<TSchema extends z.ZodTypeAny = z.ZodTypeAny> implements ToolProtocol {
  abstract name: string;
  abstract description: string;
  protected abstract schema: TSchema;
  readonly requiredScopes: readonly string[] = [];

  get toolDefinition(): ToolDescriptor {
    return {
      name: this.name,
      description: this.description,
      inputSchema: this.buildInputSchema(),
      requiredScopes: this.requiredScopes,
    };
  }

  async toolCall(args: unknown, context: RequestContext): Promise<ToolContent> {
    requireScopes(this.requiredScopes, context);
    const input = this.parseArguments(args);
    return this.execute(input, context);
  }

  protected abstract execute(input: z.infer<TSchema>, context: RequestContext): Promise<ToolContent>;

  protected parseArguments(args: unknown): z.infer<TSchema> {
    const result = this.schema.safeParse(args ?? {});
    if (!result.success) {
      const issues = result.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      });
      throw new InvalidArgumentsError({ toolName: this.name, issues });
    }
    return result.data;
  }

  protected text(text: string): ToolContent {
    return textContent(text);
  }

  protected structured(data: unknown): ToolContent {
    return structuredContent(data);
  }

  private buildInputSchema(): ToolInputSchema {
    const json: unknown = zodToJsonSchema(this.schema, { $refStrategy: 'none' });
    const properties = isRecord(json) && isRecord(json.properties) ? json.properties : {};
    const required =
      isRecord(json) && Array.isArray(json.required)
        ? json.required.filter((field): field is string => typeof field === 'string')
        : [];

    return {
      type: 'object',
      properties,
      required,
      [REQUIRED_SCOPES_FIELD]: [...this.requiredScopes],
    };
  }
}

import { ToolError } from './errors.js';

export type ToolContent = { kind: 'text'; text: string } | { kind: 'structured'; data: unknown };

export type ToolOutcome = { _tag: 'Success'; content: ToolContent } | { _tag: 'Failure'; error: ToolError };

export const textContent = (text: string): ToolContent => ({ kind: 'text', text });

export const structuredContent = (data: unknown): ToolContent => ({ kind: 'structured', data });

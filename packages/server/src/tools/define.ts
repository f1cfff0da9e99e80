import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { errorMessage } from '@tubepulse/shared';
import type { ToolContext } from '../context.js';

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.ZodRawShape;
  /** Never rejects: failures come back as an "Error: ..." text result */
  run(args: unknown, ctx: ToolContext): Promise<CallToolResult>;
}

export interface ToolConfig<S extends z.ZodRawShape> {
  name: string;
  description: string;
  input: S;
  handler: (args: z.objectOutputType<S, z.ZodTypeAny>, ctx: ToolContext) => Promise<unknown>;
}

export function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

export function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function defineTool<S extends z.ZodRawShape>(config: ToolConfig<S>): ToolDefinition {
  const schema = z.object(config.input);

  return {
    name: config.name,
    description: config.description,
    inputSchema: config.input,
    async run(args, ctx) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        return errorResult(`Invalid arguments: ${formatIssues(parsed.error)}`);
      }

      const started = Date.now();
      try {
        const value = await config.handler(parsed.data, ctx);
        ctx.logger.debug({ tool: config.name, ms: Date.now() - started }, 'Tool completed');
        return jsonResult(value);
      } catch (err) {
        ctx.logger.warn({ tool: config.name, err: errorMessage(err) }, 'Tool failed');
        return errorResult(errorMessage(err));
      }
    },
  };
}

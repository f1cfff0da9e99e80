import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { ToolContext } from './context.js';
import { ALL_TOOLS, type ToolDefinition } from './tools/index.js';

export const SERVER_NAME = 'tubepulse';
export const SERVER_VERSION = '0.1.0';

export function createMcpServer(ctx: ToolContext, tools: ToolDefinition[] = ALL_TOOLS): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  for (const tool of tools) {
    server.registerTool(
      tool.name,
      { description: tool.description, inputSchema: tool.inputSchema },
      async (args) => {
        ctx.logger.info({ tool: tool.name }, 'Tool called');
        return tool.run(args, ctx);
      },
    );
  }

  ctx.logger.debug({ tools: tools.length }, 'Tools registered');
  return server;
}

/** Serve over stdin/stdout until the client disconnects */
export async function startStdioServer(ctx: ToolContext): Promise<McpServer> {
  const server = createMcpServer(ctx);
  await server.connect(new StdioServerTransport());
  ctx.logger.info({ name: SERVER_NAME, version: SERVER_VERSION }, 'MCP server listening on stdio');
  return server;
}

export { createToolContext, type ToolContext } from './context.js';
export { createMcpServer, startStdioServer, SERVER_NAME, SERVER_VERSION } from './server.js';
export {
  ALL_TOOLS,
  findTool,
  defineTool,
  jsonResult,
  errorResult,
  type ToolDefinition,
  type ToolConfig,
} from './tools/index.js';

import { catalogTools } from './catalog.js';
import { channelTools } from './channels.js';
import type { ToolDefinition } from './define.js';
import { reportTools } from './reports.js';
import { trendTools } from './trends.js';
import { videoTools } from './video.js';

export const ALL_TOOLS: ToolDefinition[] = [
  ...catalogTools,
  ...videoTools,
  ...trendTools,
  ...channelTools,
  ...reportTools,
];

export function findTool(name: string, tools: ToolDefinition[] = ALL_TOOLS): ToolDefinition | undefined {
  return tools.find((t) => t.name === name);
}

export { defineTool, jsonResult, errorResult, type ToolDefinition, type ToolConfig } from './define.js';
export { catalogTools, channelTools, reportTools, trendTools, videoTools };

import type { CatalogClient, Logger } from '@tubepulse/shared';

/** Everything a tool handler may touch. Built once per process and passed explicitly. */
export interface ToolContext {
  catalog: CatalogClient;
  logger: Logger;
  now: () => Date;
}

export function createToolContext(
  catalog: CatalogClient,
  logger: Logger,
  now: () => Date = () => new Date(),
): ToolContext {
  return { catalog, logger, now };
}

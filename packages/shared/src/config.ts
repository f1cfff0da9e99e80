import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const configSchema = z.object({
  // YouTube Data API
  youtubeApiKey: z.string().min(1),
  youtubeApiBaseUrl: z.string().url().default('https://www.googleapis.com/youtube/v3'),

  // Logging
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (cachedConfig) return cachedConfig;

  const result = configSchema.safeParse({
    youtubeApiKey: env.YOUTUBE_API_KEY,
    youtubeApiBaseUrl: env.YOUTUBE_API_BASE_URL || undefined,
    logLevel: env.LOG_LEVEL || undefined,
  });

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const missing = Object.entries(errors)
      .map(([k, v]) => `  ${k}: ${v?.join(', ')}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${missing}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

/** Drop the cached config so the next loadConfig() re-reads the environment */
export function resetConfig(): void {
  cachedConfig = null;
}

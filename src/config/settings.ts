import dotenv from 'dotenv';
import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const settingsSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  REDIS_URL: z
    .string()
    .optional()
    .transform(value => (value && value.length > 0 ? value : undefined)),
  CONFIG_STORE_TTL_SECONDS: z.coerce.number().int().min(0).default(0),
  TERRAFORM_PARALLELISM: z.coerce.number().int().positive().default(10),
});

export interface Settings {
  logLevel: LogLevel;
  redisUrl?: string;
  configStoreTtlSeconds: number;
  terraformParallelism: number;
}

let cached: Settings | null = null;
let envLoaded = false;

export function parseSettings(env: NodeJS.ProcessEnv): Settings {
  const result = settingsSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
  }

  return {
    logLevel: result.data.LOG_LEVEL,
    redisUrl: result.data.REDIS_URL,
    configStoreTtlSeconds: result.data.CONFIG_STORE_TTL_SECONDS,
    terraformParallelism: result.data.TERRAFORM_PARALLELISM,
  };
}

export function getSettings(): Settings {
  if (!envLoaded) {
    dotenv.config();
    envLoaded = true;
  }
  if (!cached) {
    cached = parseSettings(process.env);
  }
  return cached;
}

export function resetSettings(): void {
  cached = null;
}

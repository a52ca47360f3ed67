import { z } from 'zod';

import { DEFAULT_MAX_RETRIES, DEFAULT_RETRY_DELAY_SECONDS } from './types';

const truthy = new Set(['true', '1', 'yes', 'on']);

const booleanFromEnv = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? fallback : truthy.has(value.trim().toLowerCase())));

const listFromEnv = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  );

const envSchema = z.object({
  LOG_LEVEL: z.string().default('info'),
  HOOK_DEFAULT_MAX_RETRIES: z.coerce.number().int().nonnegative().default(DEFAULT_MAX_RETRIES),
  HOOK_DEFAULT_RETRY_DELAY_SECONDS: z.coerce.number().nonnegative().default(DEFAULT_RETRY_DELAY_SECONDS),
  HOOK_HANDLER_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30_000),
  HOOK_CLEANUP_MAX_AGE_SECONDS: z.coerce.number().positive().default(86_400),
  HOOK_CONSOLE_ENABLED: booleanFromEnv(true),
  HOOK_MODULES: listFromEnv,
  METRICS_PORT: z.coerce.number().int().positive().optional(),
});

export interface OrchestratorConfig {
  logLevel: string;
  defaultMaxRetries: number;
  defaultRetryDelaySeconds: number;
  handlerTimeoutMs: number;
  cleanupMaxAgeSeconds: number;
  consoleEnabled: boolean;
  hookModules: string[];
  metricsPort?: number;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): OrchestratorConfig => {
  const parsed = envSchema.parse(env);
  return {
    logLevel: parsed.LOG_LEVEL,
    defaultMaxRetries: parsed.HOOK_DEFAULT_MAX_RETRIES,
    defaultRetryDelaySeconds: parsed.HOOK_DEFAULT_RETRY_DELAY_SECONDS,
    handlerTimeoutMs: parsed.HOOK_HANDLER_TIMEOUT_MS,
    cleanupMaxAgeSeconds: parsed.HOOK_CLEANUP_MAX_AGE_SECONDS,
    consoleEnabled: parsed.HOOK_CONSOLE_ENABLED,
    hookModules: parsed.HOOK_MODULES,
    metricsPort: parsed.METRICS_PORT,
  };
};

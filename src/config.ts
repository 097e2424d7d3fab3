/**
 * Configuration
 *
 * Validates environment variables with Zod. `main.ts` loads `.env` through
 * dotenv before calling `loadConfig`; tests pass their own env object.
 */

import { z } from 'zod';
import { ConfigError } from './errors';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  // Server
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),

  // Text completion (requests fall back to defaults when the key is unset)
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Contact-list directory
  LIST_PROVIDER_URL: z.string().url().optional(),
  LIST_PROVIDER_API_KEY: optionalString,
  LIST_PROVIDER_TOKEN: optionalString,
  LIST_PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Versions kept per session
  CHECKPOINT_HISTORY_LIMIT: z.coerce.number().int().positive().default(20),
});

export type Env = z.infer<typeof envSchema>;

type LogLevel = NonNullable<Env['LOG_LEVEL']>;

// Used when LOG_LEVEL is unset
const DEFAULT_LOG_LEVEL: Record<Env['NODE_ENV'], LogLevel> = {
  development: 'info',
  production: 'info',
  test: 'silent',
};

export type AppConfig = {
  server: { host: string; port: number };
  logLevel: LogLevel;
  completion: {
    apiKey?: string;
    model: string;
    timeoutMs: number;
  };
  listProvider: {
    baseUrl?: string;
    apiKey?: string;
    bearerToken?: string;
    timeoutMs: number;
  };
  checkpoints: { maxHistory: number };
};

/**
 * Parse the environment into the application config
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment variables: ${problems}`);
  }

  const parsed = result.data;
  return {
    server: { host: parsed.HOST, port: parsed.PORT },
    logLevel: parsed.LOG_LEVEL ?? DEFAULT_LOG_LEVEL[parsed.NODE_ENV],
    completion: {
      apiKey: parsed.OPENAI_API_KEY,
      model: parsed.OPENAI_MODEL,
      timeoutMs: parsed.COMPLETION_TIMEOUT_MS,
    },
    listProvider: {
      baseUrl: parsed.LIST_PROVIDER_URL,
      apiKey: parsed.LIST_PROVIDER_API_KEY,
      bearerToken: parsed.LIST_PROVIDER_TOKEN,
      timeoutMs: parsed.LIST_PROVIDER_TIMEOUT_MS,
    },
    checkpoints: { maxHistory: parsed.CHECKPOINT_HISTORY_LIMIT },
  };
}

/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { fileURLToPath } from 'url';
import { DEFAULT_OLLAMA_BASE_URL, DEFAULT_OLLAMA_MODEL } from './lib/llm/ollama';

const flagSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // Server
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:5173,http://127.0.0.1:5173')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean)
    ),

  // Database
  DATABASE_URL: z.string().url().optional(),
  SCHEMA_REFRESH_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),

  // LLM
  OLLAMA_BASE_URL: z.string().url().default(DEFAULT_OLLAMA_BASE_URL),
  OLLAMA_MODEL: z.string().min(1).default(DEFAULT_OLLAMA_MODEL),

  // Caches (size 0 disables)
  PARSE_CACHE_SIZE: z.coerce.number().int().min(0).default(200),
  RESPONSE_CACHE_SIZE: z.coerce.number().int().min(0).default(100),
  RESPONSE_CACHE_TTL_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),

  // Attach the sanitized intent to every answer
  SHOW_INTENT_DEBUG: flagSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Raised when the environment does not validate; one line per issue
 */
export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse and validate configuration from an environment map.
 *
 * @throws ConfigError listing every invalid key
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Load `.env` from the repository root, if there is one
 */
export function loadEnvFile(): void {
  const envPath = fileURLToPath(new URL('../../.env', import.meta.url));
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }
}

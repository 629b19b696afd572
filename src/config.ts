import { z } from 'zod';
import { DEFAULT_MAX_IDLE_CONNECTIONS, DEFAULT_TIMEOUT_MS, PexelsClient } from './client.js';
import { PEXELS_API } from './endpoints.js';
import { PexelsError } from './errors.js';

export interface PexelsConfig {
  apiKey: string;
  timeout: number;
  maxIdleConnections: number;
  baseUrl: string;
}

const positiveInt = z.coerce.number().int().positive();

function readSetting<T>(env: NodeJS.ProcessEnv, name: string, schema: z.ZodType<T>, fallback: T): T {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`Ignoring invalid ${name}="${raw}", using ${String(fallback)}`);
    return fallback;
  }
  return parsed.data;
}

/**
 * Reads client settings from the environment. Call `dotenv.config()` first to
 * pick up a local `.env` file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PexelsConfig {
  const apiKey = env.PEXELS_API_KEY?.trim();
  if (!apiKey) {
    throw PexelsError.apiKeyNotFound('PEXELS_API_KEY');
  }

  return {
    apiKey,
    timeout: readSetting(env, 'PEXELS_TIMEOUT_MS', positiveInt, DEFAULT_TIMEOUT_MS),
    maxIdleConnections: readSetting(env, 'PEXELS_MAX_IDLE_CONNECTIONS', positiveInt, DEFAULT_MAX_IDLE_CONNECTIONS),
    baseUrl: readSetting(env, 'PEXELS_BASE_URL', z.string().url(), PEXELS_API),
  };
}

export function createClient(config: PexelsConfig = loadConfig()): PexelsClient {
  return new PexelsClient(config.apiKey, {
    timeout: config.timeout,
    maxIdleConnections: config.maxIdleConnections,
    baseUrl: config.baseUrl,
  });
}

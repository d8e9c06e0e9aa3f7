// Service configuration, read from the environment once and cached
import { z } from 'zod';

export const GROQ_DEFAULT_BASE_URL = 'https://api.groq.com/openai/v1';
export const GROQ_DEFAULT_MODEL = 'llama-3.1-70b-versatile';
export const GROQ_DEFAULT_TIMEOUT_MS = 30_000;

// Empty strings count as unset so `FOO=` in an env file falls back to the default
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const SettingsSchema = z.object({
  GROQ_API_KEY: optionalString,
  GROQ_BASE_URL: optionalString.pipe(z.string().url().optional()),
  GROQ_MODEL: optionalString,
  GROQ_TIMEOUT_MS: optionalString.pipe(z.coerce.number().int().positive().optional()),
  HOST: optionalString,
  PORT: optionalString.pipe(z.coerce.number().int().min(0).max(65535).optional()),
  LOG_LEVEL: optionalString.pipe(z.enum(['debug', 'info', 'warn', 'error']).optional()),
  LOG_ERROR_FILE: optionalString,
});

export interface ServiceSettings {
  groq: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
  };
  server: {
    host: string;
    port: number;
  };
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error';
    errorFile?: string;
  };
}

let cached: ServiceSettings | null = null;

/**
 * Parse settings from the given environment and cache them.
 * Throws when a variable is set to something unusable (e.g. a non-numeric PORT).
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): ServiceSettings {
  const result = SettingsSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const vars = result.data;
  cached = {
    groq: {
      apiKey: vars.GROQ_API_KEY,
      baseUrl: (vars.GROQ_BASE_URL ?? GROQ_DEFAULT_BASE_URL).replace(/\/$/, ''),
      model: vars.GROQ_MODEL ?? GROQ_DEFAULT_MODEL,
      timeoutMs: vars.GROQ_TIMEOUT_MS ?? GROQ_DEFAULT_TIMEOUT_MS,
    },
    server: {
      host: vars.HOST ?? '0.0.0.0',
      port: vars.PORT ?? 8000,
    },
    logging: {
      level: vars.LOG_LEVEL ?? 'info',
      errorFile: vars.LOG_ERROR_FILE,
    },
  };
  return cached;
}

export function getSettings(): ServiceSettings {
  return cached ?? loadSettings();
}

export function resetSettingsCache(): void {
  cached = null;
}

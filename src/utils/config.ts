import { z } from 'zod';

const DEFAULT_GEMINI_URL =
  'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:generateContent';

function unquote(value: string) {
  return value.replace(/^['"]|['"]$/g, '');
}

// Quotes are stripped before the value is checked.
const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(9090),
  GEMINI_API_URL: z.string().transform(unquote).pipe(z.string().url()).default(DEFAULT_GEMINI_URL),
  GEMINI_API_KEY: z.string().transform(unquote).pipe(z.string().min(1, 'Missing GEMINI_API_KEY')),
  GEMINI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CORS_ORIGINS: z.string().default(''),
});

export interface GeminiConfig {
  apiUrl: string;
  apiKey: string;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  gemini: GeminiConfig;
  // Empty means any origin.
  corsOrigins: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    gemini: {
      apiUrl: e.GEMINI_API_URL.replace(/\/$/, ''),
      apiKey: e.GEMINI_API_KEY,
      timeoutMs: e.GEMINI_TIMEOUT_MS,
    },
    corsOrigins: e.CORS_ORIGINS.split(',').map(s => s.trim()).filter(Boolean),
  };
}

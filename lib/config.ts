import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

// Blank variables in a .env file mean "not set".
const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const numberWithDefault = (fallback: number) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().finite().default(fallback)
  );

const envSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  MODEL_NAME: optionalString,
  MAX_TOKENS: numberWithDefault(1000).pipe(z.number().int().positive()),
  TEMPERATURE: numberWithDefault(0.3).pipe(z.number().min(0).max(2)),
  GOOGLE_API_KEY: optionalString,
  GOOGLE_CSE_ID: optionalString,
  MAX_SEARCH_RESULTS: numberWithDefault(5).pipe(z.number().int().min(1).max(10)),
  SEARCH_TIMEOUT: numberWithDefault(10).pipe(z.number().positive()),
  USER_AGENT: optionalString,
});

export interface AppConfig {
  readonly openAiApiKey?: string;
  readonly openAiBaseUrl?: string;
  readonly modelName: string;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly googleApiKey?: string;
  readonly googleCseId?: string;
  readonly maxSearchResults: number;
  readonly searchTimeoutSeconds: number;
  readonly userAgent: string;
}

/**
 * Reads the process-wide settings once. Callers load `.env` files (dotenv)
 * before calling this; the function itself only looks at `env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    throw new ConfigurationError(`Invalid configuration: ${variables.join(', ')}`, variables);
  }

  const vars = parsed.data;
  return Object.freeze({
    openAiApiKey: vars.OPENAI_API_KEY,
    openAiBaseUrl: vars.OPENAI_BASE_URL,
    modelName: vars.MODEL_NAME ?? 'gpt-5-nano',
    maxTokens: vars.MAX_TOKENS,
    temperature: vars.TEMPERATURE,
    googleApiKey: vars.GOOGLE_API_KEY,
    googleCseId: vars.GOOGLE_CSE_ID,
    maxSearchResults: vars.MAX_SEARCH_RESULTS,
    searchTimeoutSeconds: vars.SEARCH_TIMEOUT,
    userAgent: vars.USER_AGENT ?? DEFAULT_USER_AGENT,
  });
}

export function hasCustomSearch(config: AppConfig): boolean {
  return Boolean(config.googleApiKey && config.googleCseId);
}

export function requireOpenAiApiKey(config: AppConfig): string {
  if (!config.openAiApiKey) {
    throw new ConfigurationError(
      'OPENAI_API_KEY is not set; configure it in the environment or a .env file',
      ['OPENAI_API_KEY']
    );
  }
  return config.openAiApiKey;
}

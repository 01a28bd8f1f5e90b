import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly keys: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  NODE_ENV: z.string().default('development'),

  KAKAO_REST_API_KEY: optionalString,
  KAKAO_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  KAKAO_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(1),

  LLM_PROVIDER: z
    .string()
    .default('openai')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['openai', 'none'])),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),

  SEARCH_CITY: z.string().min(1).default('서울'),
  STATION_DISTRICTS_FILE: z.string().min(1).default('data/station-districts.json'),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  port: number;
  nodeEnv: string;
  kakao: {
    apiKey: string | undefined;
    timeoutMs: number;
    maxRetries: number;
  };
  llm: {
    provider: 'openai' | 'none';
    openaiApiKey: string | undefined;
    model: string;
    timeoutMs: number;
  };
  searchCity: string;
  stationDistrictsFile: string;
}

export type CredentialKey = 'KAKAO_REST_API_KEY' | 'OPENAI_API_KEY';

/**
 * Parse and validate the process environment.
 * Throws ConfigError naming every invalid key.
 */
export function getConfig(source: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigError(`Invalid configuration: ${keys.join(', ')}`, keys);
  }

  const env = parsed.data;
  return Object.freeze({
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    kakao: {
      apiKey: env.KAKAO_REST_API_KEY,
      timeoutMs: env.KAKAO_TIMEOUT_MS,
      maxRetries: env.KAKAO_MAX_RETRIES,
    },
    llm: {
      provider: env.LLM_PROVIDER,
      openaiApiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS,
    },
    searchCity: env.SEARCH_CITY,
    stationDistrictsFile: env.STATION_DISTRICTS_FILE,
  });
}

/**
 * Return a credential or fail fast.
 * Used at pipeline construction; never retried.
 */
export function requireCredential(config: AppConfig, key: CredentialKey): string {
  const value = key === 'KAKAO_REST_API_KEY' ? config.kakao.apiKey : config.llm.openaiApiKey;
  if (!value) {
    throw new ConfigError(`${key} is not set`, [key]);
  }
  return value;
}

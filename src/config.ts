import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ConfigError } from './kb/errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export const PROVIDER_NAMES = ['gemini', 'openai', 'ollama'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const delayList = z
  .string()
  .default('1000,2000')
  .transform((raw, ctx) => {
    const parts = raw.split(',').map((p) => p.trim()).filter(Boolean);
    const delays = parts.map(Number);
    if (delays.some((d) => !Number.isFinite(d) || d < 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a comma-separated list of milliseconds' });
      return z.NEVER;
    }
    return delays;
  });

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1'));

const envSchema = z.object({
  SYNAPSE_DATA_DIR: optionalString,
  SYNAPSE_DB_FILE: z.string().default('synapse.db'),

  AI_PROVIDER: z.enum(PROVIDER_NAMES).default('gemini'),
  AI_FALLBACK_PROVIDER: z
    .union([z.enum(PROVIDER_NAMES), z.literal('')])
    .optional()
    .transform((v) => (v ? v : undefined)),

  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().default('gemini-1.5-flash'),
  GEMINI_EMBED_MODEL: z.string().default('text-embedding-004'),

  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_EMBED_MODEL: z.string().default('text-embedding-3-small'),

  // 127.0.0.1 instead of localhost for IPv4/IPv6 compatibility
  OLLAMA_URL: z.string().url().default('http://127.0.0.1:11434'),
  OLLAMA_MODEL: z.string().default('llama3.2'),
  OLLAMA_EMBED_MODEL: z.string().default('nomic-embed-text'),

  PROVIDER_TIMEOUT_MS: positiveInt(30_000),
  PROVIDER_RETRY_DELAYS_MS: delayList,
  METADATA_TIMEOUT_MS: positiveInt(5_000),
  METADATA_USER_AGENT: z.string().default('Mozilla/5.0 (compatible; SynapseBot/1.0)'),
  REQUEST_TIMEOUT_MS: positiveInt(60_000),

  SEARCH_LIMIT: positiveInt(10),
  VECTOR_COLLECTION: z.string().min(1).default('synapse_items'),
  VECTOR_USE_VSS: booleanFlag(true),

  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface ProviderSettings {
  primary: ProviderName;
  fallback?: ProviderName;
  timeoutMs: number;
  retryDelaysMs: number[];
  gemini: { apiKey?: string; model: string; embedModel: string };
  openai: { apiKey?: string; baseUrl: string; model: string; embedModel: string };
  ollama: { url: string; model: string; embedModel: string };
}

export interface AppConfig {
  dataDir: string;
  dbFile: string;
  providers: ProviderSettings;
  metadata: { timeoutMs: number; userAgent: string };
  requestTimeoutMs: number;
  searchLimit: number;
  vectors: { collection: string; useVss: boolean };
  logLevel: LogLevel;
}

/**
 * Build the process-wide configuration once at startup.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  if (e.AI_FALLBACK_PROVIDER === e.AI_PROVIDER) {
    throw new ConfigError('AI_FALLBACK_PROVIDER must differ from AI_PROVIDER');
  }

  const config: AppConfig = {
    dataDir: e.SYNAPSE_DATA_DIR ?? join(homedir(), '.synapse'),
    dbFile: e.SYNAPSE_DB_FILE,
    providers: {
      primary: e.AI_PROVIDER,
      fallback: e.AI_FALLBACK_PROVIDER,
      timeoutMs: e.PROVIDER_TIMEOUT_MS,
      retryDelaysMs: e.PROVIDER_RETRY_DELAYS_MS,
      gemini: { apiKey: e.GEMINI_API_KEY, model: e.GEMINI_MODEL, embedModel: e.GEMINI_EMBED_MODEL },
      openai: {
        apiKey: e.OPENAI_API_KEY,
        baseUrl: e.OPENAI_BASE_URL.replace(/\/$/, ''),
        model: e.OPENAI_MODEL,
        embedModel: e.OPENAI_EMBED_MODEL,
      },
      ollama: { url: e.OLLAMA_URL.replace(/\/$/, ''), model: e.OLLAMA_MODEL, embedModel: e.OLLAMA_EMBED_MODEL },
    },
    metadata: { timeoutMs: e.METADATA_TIMEOUT_MS, userAgent: e.METADATA_USER_AGENT },
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    searchLimit: e.SEARCH_LIMIT,
    vectors: { collection: e.VECTOR_COLLECTION, useVss: e.VECTOR_USE_VSS },
    logLevel: e.LOG_LEVEL,
  };

  return deepFreeze(config);
}

export function getDbPath(config: Pick<AppConfig, 'dataDir' | 'dbFile'>): string {
  return join(config.dataDir, config.dbFile);
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

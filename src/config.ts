/**
 * Configuration for the pipeline
 *
 * `loadConfig` is called once by each entrypoint with `process.env`; the
 * frozen result is passed to every component.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

// Legistar Web API
export const LEGISTAR_API_ROOT = 'https://webapi.legistar.com/v1';

// Analysis
export const MAX_ANALYSIS_CHARS = 20000;
export const RAW_PREVIEW_CHARS = 500;

// Search
export const SEARCH_WORKING_SET = 1000;

export const APP_VERSION = '0.1.0';

const intFromEnv = (defaultValue: number) =>
  z.coerce.number().int().default(defaultValue);

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

const EnvSchema = z.object({
  STAGE: z.string().default('local'),
  PORT: intFromEnv(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: z.enum(['true', 'false']).default('false'),

  LEGISTAR_CLIENT: z.string().min(1).default('spokane'),
  LEGISTAR_BASE_URL: optionalString,
  SOURCE_TIMEOUT_MS: intFromEnv(30000),
  INGEST_LOOKBACK_DAYS: intFromEnv(0),

  STORE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),
  MONGODB_URI: z.string().default('mongodb://localhost:27017'),
  MONGODB_DB: z.string().min(1).default('council_brief'),
  MEETINGS_COLLECTION: z.string().min(1).default('meetings'),
  AGENDA_COLLECTION: z.string().min(1).default('agenda_items'),
  DOCUMENTS_COLLECTION: z.string().min(1).default('documents'),

  REDIS_URL: optionalString,
  ANALYSIS_QUEUE_NAME: z.string().min(1).default('meeting-analysis'),
  INGEST_CRON: z.string().min(1).default('0 */6 * * *'),

  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default('gpt-4.1-mini'),
  OPENAI_MAX_TOKENS: intFromEnv(4000),
  ENRICH_DELAY_MS: intFromEnv(1000)
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];
export type StoreDriver = z.infer<typeof EnvSchema>['STORE_DRIVER'];

export interface AppConfig {
  readonly stage: string;
  readonly port: number;
  readonly log: {
    readonly level: LogLevel;
    readonly pretty: boolean;
  };
  readonly legistar: {
    readonly client: string;
    readonly baseUrl: string;
    readonly timeoutMs: number;
    readonly lookbackDays: number;
  };
  readonly store: {
    readonly driver: StoreDriver;
    readonly mongoUri: string;
    readonly database: string;
    readonly collections: {
      readonly meetings: string;
      readonly agendaItems: string;
      readonly documents: string;
    };
  };
  readonly queue: {
    readonly redisUrl?: string;
    readonly name: string;
    readonly ingestCron: string;
  };
  readonly openai: {
    readonly apiKey?: string;
    readonly model: string;
    readonly maxTokens: number;
    readonly delayMs: number;
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object') {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Build the application configuration from an environment map
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;

  return deepFreeze({
    stage: e.STAGE,
    port: e.PORT,
    log: {
      level: e.LOG_LEVEL,
      pretty: e.LOG_PRETTY === 'true'
    },
    legistar: {
      client: e.LEGISTAR_CLIENT,
      baseUrl: e.LEGISTAR_BASE_URL ?? `${LEGISTAR_API_ROOT}/${e.LEGISTAR_CLIENT}`,
      timeoutMs: e.SOURCE_TIMEOUT_MS,
      lookbackDays: e.INGEST_LOOKBACK_DAYS
    },
    store: {
      driver: e.STORE_DRIVER,
      mongoUri: e.MONGODB_URI,
      database: e.MONGODB_DB,
      collections: {
        meetings: e.MEETINGS_COLLECTION,
        agendaItems: e.AGENDA_COLLECTION,
        documents: e.DOCUMENTS_COLLECTION
      }
    },
    queue: {
      redisUrl: e.REDIS_URL,
      name: e.ANALYSIS_QUEUE_NAME,
      ingestCron: e.INGEST_CRON
    },
    openai: {
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
      maxTokens: e.OPENAI_MAX_TOKENS,
      delayMs: e.ENRICH_DELAY_MS
    }
  });
}

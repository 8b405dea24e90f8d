import { z } from 'zod';
import { ConfigError } from '../utils/errors';
import { type LogLevel, normalizeLogLevel } from '../utils/logger';

/**
 * Producer configuration, read once from the environment at startup.
 * Every component receives the resulting object explicitly; nothing reads process.env later.
 */

export const DEFAULT_API_URLS = {
  swob: 'https://api.weather.gc.ca/collections/swob-realtime/items?lang=en',
  hydrometric: 'https://api.weather.gc.ca/collections/hydrometric-realtime/items?lang=en',
  climateHourly: 'https://api.weather.gc.ca/collections/climate-hourly/items?lang=en',
} as const;

export type StorageConfig =
  | {
      backend: 's3';
      bucket: string;
      region: string;
      endpoint: string | null;
    }
  | {
      backend: 'local';
      rootDir: string;
    };

export interface ProducerConfig {
  readonly storage: StorageConfig;
  readonly kmsKeyId: string | null;
  readonly stateKey: string;
  readonly apiUrls: {
    readonly swob: string;
    readonly hydrometric: string;
    readonly climateHourly: string;
  };
  readonly initialLookbackMinutes: number;
  readonly climateHourlyLookbackDays: number;
  readonly fetchLimit: number;
  readonly fetchTimeoutMs: number;
  readonly minQaThreshold: number;
  readonly maxFutureDays: number;
  readonly overlapMinutes: number;
  readonly logLevel: LogLevel;
  readonly runIntervalMs: number | null;
}

// Unset and blank variables both mean "use the default"
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankAsUndefined, z.string().trim().optional());
const url = (fallback: string) => z.preprocess(blankAsUndefined, z.string().url().default(fallback));
const integer = (fallback: number, min?: number) => {
  const base = z.coerce.number().int();
  return z.preprocess(blankAsUndefined, (min === undefined ? base : base.min(min)).default(fallback));
};

const envSchema = z
  .object({
    STORAGE_BACKEND: z.preprocess(
      (value) => (typeof value === 'string' ? blankAsUndefined(value.trim().toLowerCase()) : value),
      z.enum(['s3', 'local']).default('s3')
    ),
    S3_BUCKET_NAME: optionalString,
    LOCAL_STORAGE_DIR: z.preprocess(blankAsUndefined, z.string().default('./data')),
    AWS_REGION: z.preprocess(blankAsUndefined, z.string().default('us-east-1')),
    AWS_S3_ENDPOINT: optionalString,
    KMS_KEY_ID: optionalString,
    STATE_S3_KEY: z.preprocess(blankAsUndefined, z.string().default('data_state/state.json')),
    API_URL_SWOB: url(DEFAULT_API_URLS.swob),
    API_URL_HYDROMETRIC: url(DEFAULT_API_URLS.hydrometric),
    API_URL_CLIMATE_HOURLY: url(DEFAULT_API_URLS.climateHourly),
    INITIAL_LOOKBACK_MIN: integer(60, 1),
    CLIMATE_HOURLY_LOOKBACK_DAYS: integer(7, 1),
    FETCH_LIMIT: integer(500, 1),
    FETCH_TIMEOUT_MS: integer(30_000, 1),
    MIN_QA_THRESHOLD: integer(0),
    MAX_FUTURE_DAYS: integer(1, 0),
    INCREMENTAL_OVERLAP_MIN: integer(15, 0),
    LOG_LEVEL: optionalString,
    LOGLEVEL: optionalString,
    RUN_INTERVAL_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().optional()),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_BACKEND === 's3' && !env.S3_BUCKET_NAME) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['S3_BUCKET_NAME'],
        message: 'is required when STORAGE_BACKEND is s3',
      });
    }
    const rawLevel = env.LOG_LEVEL ?? env.LOGLEVEL;
    if (rawLevel && !normalizeLogLevel(rawLevel)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [env.LOG_LEVEL ? 'LOG_LEVEL' : 'LOGLEVEL'],
        message: `unknown log level "${rawLevel}"`,
      });
    }
  });

/**
 * Build the configuration from environment variables.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProducerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'} ${issue.message}`)
    );
  }

  const values = parsed.data;
  const storage: StorageConfig =
    values.STORAGE_BACKEND === 'local'
      ? { backend: 'local', rootDir: values.LOCAL_STORAGE_DIR }
      : {
          backend: 's3',
          bucket: values.S3_BUCKET_NAME ?? '',
          region: values.AWS_REGION,
          endpoint: values.AWS_S3_ENDPOINT ?? null,
        };

  return Object.freeze({
    storage: Object.freeze(storage),
    kmsKeyId: values.KMS_KEY_ID ?? null,
    stateKey: values.STATE_S3_KEY,
    apiUrls: Object.freeze({
      swob: values.API_URL_SWOB,
      hydrometric: values.API_URL_HYDROMETRIC,
      climateHourly: values.API_URL_CLIMATE_HOURLY,
    }),
    initialLookbackMinutes: values.INITIAL_LOOKBACK_MIN,
    climateHourlyLookbackDays: values.CLIMATE_HOURLY_LOOKBACK_DAYS,
    fetchLimit: values.FETCH_LIMIT,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    minQaThreshold: values.MIN_QA_THRESHOLD,
    maxFutureDays: values.MAX_FUTURE_DAYS,
    overlapMinutes: values.INCREMENTAL_OVERLAP_MIN,
    logLevel: normalizeLogLevel(values.LOG_LEVEL ?? values.LOGLEVEL) ?? 'info',
    runIntervalMs: values.RUN_INTERVAL_MS ?? null,
  });
}

/** Human-readable configuration summary for the startup log */
export function describeConfig(config: ProducerConfig): Record<string, unknown> {
  return {
    storage:
      config.storage.backend === 's3'
        ? `s3://${config.storage.bucket}`
        : `file://${config.storage.rootDir}`,
    stateKey: config.stateKey,
    encryption: config.kmsKeyId ? 'aws:kms' : 'disabled',
    initialLookbackMinutes: config.initialLookbackMinutes,
    climateHourlyLookbackDays: config.climateHourlyLookbackDays,
    overlapMinutes: config.overlapMinutes,
    fetchLimit: config.fetchLimit,
    minQaThreshold: config.minQaThreshold,
    maxFutureDays: config.maxFutureDays,
    runIntervalMs: config.runIntervalMs,
  };
}

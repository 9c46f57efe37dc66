import { z } from 'zod';

const DEFAULT_SQLITE_PATH = '../../data/sqlite/reelsift.sqlite';

const optionalString = z.preprocess(
  (value) => {
    if (typeof value !== 'string') {
      return value;
    }

    const trimmed = value.trim();

    return trimmed.length === 0 ? undefined : trimmed;
  },
  z.string().min(1).optional(),
);

const optionalBoolean = z.preprocess(
  (value) => {
    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();

      if (normalized.length === 0) {
        return undefined;
      }

      if (normalized === 'true' || normalized === '1') {
        return true;
      }

      if (normalized === 'false' || normalized === '0') {
        return false;
      }

      return value;
    }

    return value;
  },
  z.boolean().optional(),
);

const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'test', 'production'])
      .default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(4000),
    SQLITE_PATH: z
      .string()
      .trim()
      .min(1, 'SQLITE_PATH must not be empty')
      .default(DEFAULT_SQLITE_PATH),
    API_TOKEN: optionalString,
    JELLYFIN_URL: z.preprocess(
      (value) => {
        if (typeof value !== 'string') {
          return value;
        }

        const trimmed = value.trim();

        return trimmed.length === 0 ? undefined : trimmed;
      },
      z.string().url().optional(),
    ),
    JELLYFIN_API_KEY: optionalString,
    SCANNER_ENABLED: optionalBoolean,
    SCAN_WORKERS: z.coerce.number().int().min(1).max(8).default(2),
    SCAN_CRON: optionalString,
    GROUPING_MODE: z.enum(['edge', 'component']).default('edge'),
    AUDIT_RETENTION_DAYS: z.coerce.number().int().min(0).default(30),
    DRY_RUN: optionalBoolean,
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .superRefine((env, ctx) => {
    const hasPartialJellyfinConfiguration = Boolean(env.JELLYFIN_URL) !== Boolean(env.JELLYFIN_API_KEY);

    if (hasPartialJellyfinConfiguration) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'JELLYFIN_URL and JELLYFIN_API_KEY need to be provided together.',
        path: ['JELLYFIN_URL'],
      });
    }
  });

export type RawEnvironment = Record<string, string | undefined>;

export const parseConfig = (env: RawEnvironment) => {
  const rawConfig = envSchema.parse(env);

  return {
    runtime: {
      env: rawConfig.NODE_ENV,
      logLevel: rawConfig.LOG_LEVEL,
    },
    server: {
      port: rawConfig.PORT,
    },
    auth: rawConfig.API_TOKEN
      ? {
          token: rawConfig.API_TOKEN,
        }
      : null,
    database: {
      sqlitePath: rawConfig.SQLITE_PATH,
    },
    jellyfin:
      rawConfig.JELLYFIN_URL && rawConfig.JELLYFIN_API_KEY
        ? {
            url: rawConfig.JELLYFIN_URL,
            apiKey: rawConfig.JELLYFIN_API_KEY,
          }
        : null,
    scanner: {
      enabled: rawConfig.SCANNER_ENABLED ?? true,
      workers: rawConfig.SCAN_WORKERS,
      cronExpression: rawConfig.SCAN_CRON ?? null,
      groupingMode: rawConfig.GROUPING_MODE,
      dryRun: rawConfig.DRY_RUN ?? false,
    },
    audit: {
      retentionDays: rawConfig.AUDIT_RETENTION_DAYS,
    },
  };
};

export type AppConfig = ReturnType<typeof parseConfig>;

export const config: AppConfig = parseConfig(process.env);

export default config;

import { z } from 'zod';
import { ConfigurationError } from './errors';
import { DEFAULT_HASH_COST, MAX_HASH_COST, isValidHashCost } from './services/passwordService';
import type { DeploymentEnvironment, TokenAlgorithm } from './types';

export const DEFAULT_SIGNING_KEY = 'dev-insecure-access-token-key';
export const DEFAULT_COOKIE_KEY = 'dev-insecure-reauth-cookie-key';
export const DEFAULT_TRANSLATION_API_URL =
  'https://deep-translate1.p.rapidapi.com/language/translate/v2';

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const booleanFlag = (fallback: boolean) =>
  z
    .preprocess(
      (value) => (typeof value === 'string' && value !== '' ? value.toLowerCase() : undefined),
      z.enum(['true', 'false', '1', '0', 'yes', 'no']).optional()
    )
    .transform((value) => (value === undefined ? fallback : ['true', '1', 'yes'].includes(value)));

const positiveInt = (fallback: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  DEPLOYMENT_ENVIRONMENT: z.enum(['development', 'production']).default('development'),
  SIGNING_KEY: z.preprocess(emptyAsUndefined, z.string().default(DEFAULT_SIGNING_KEY)),
  COOKIE_SIGNING_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),
  TOKEN_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  ACCESS_TOKEN_TTL_MINUTES: positiveInt(60),
  COOKIE_TTL_DAYS: positiveInt(30),
  ALLOW_GENERATED_COOKIE_KEY: booleanFlag(false),
  USE_OFFLINE_TRANSLATION: booleanFlag(true),
  TRANSLATION_API_URL: z.string().url().default(DEFAULT_TRANSLATION_API_URL),
  TRANSLATION_API_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),
  TRANSLATION_API_HOST: z.string().default('deep-translate1.p.rapidapi.com'),
  TRANSLATION_TIMEOUT_MS: positiveInt(10_000),
  IDENTITY_CHECK_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  IDENTITY_CHECK_TIMEOUT_MS: positiveInt(5_000),
  PASSWORD_HASH_COST: positiveInt(DEFAULT_HASH_COST).refine(isValidHashCost, {
    message: `must be a power of two between 2 and ${MAX_HASH_COST}`
  }),
  STORAGE_DRIVER: z.enum(['memory', 'postgres']).default('postgres'),
  DATABASE_URL: z.preprocess(emptyAsUndefined, z.string().optional()),
  PORT: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(1).max(65535).default(3000)),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface AppConfig {
  environment: DeploymentEnvironment;
  auth: {
    signingKey: string;
    algorithm: TokenAlgorithm;
    accessTokenTtlMinutes: number;
    passwordHashCost: number;
  };
  cookie: {
    signingKey?: string;
    allowGeneratedKey: boolean;
    ttlDays: number;
    secure: boolean;
  };
  translation: {
    offline: boolean;
    apiUrl: string;
    apiKey?: string;
    apiHost: string;
    timeoutMs: number;
  };
  identityCheck: {
    url?: string;
    timeoutMs: number;
  };
  storage: {
    kind: 'memory' | 'postgres';
    databaseUrl?: string;
  };
  port: number;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('InvalidSetting', `Invalid configuration: ${problems.join('; ')}`);
  }
  const e = parsed.data;
  const config: AppConfig = {
    environment: e.DEPLOYMENT_ENVIRONMENT,
    auth: {
      signingKey: e.SIGNING_KEY,
      algorithm: e.TOKEN_ALGORITHM,
      accessTokenTtlMinutes: e.ACCESS_TOKEN_TTL_MINUTES,
      passwordHashCost: e.PASSWORD_HASH_COST
    },
    cookie: {
      signingKey: e.COOKIE_SIGNING_KEY,
      allowGeneratedKey: e.ALLOW_GENERATED_COOKIE_KEY,
      ttlDays: e.COOKIE_TTL_DAYS,
      secure: e.DEPLOYMENT_ENVIRONMENT === 'production'
    },
    translation: {
      offline: e.USE_OFFLINE_TRANSLATION,
      apiUrl: e.TRANSLATION_API_URL,
      apiKey: e.TRANSLATION_API_KEY,
      apiHost: e.TRANSLATION_API_HOST,
      timeoutMs: e.TRANSLATION_TIMEOUT_MS
    },
    identityCheck: {
      url: e.IDENTITY_CHECK_URL,
      timeoutMs: e.IDENTITY_CHECK_TIMEOUT_MS
    },
    storage: {
      kind: e.STORAGE_DRIVER,
      databaseUrl: e.DATABASE_URL
    },
    port: e.PORT,
    logLevel: e.LOG_LEVEL
  };
  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object') {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

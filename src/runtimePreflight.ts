import { DEFAULT_SIGNING_KEY } from './config';
import { ConfigurationError } from './errors';

export interface RuntimePreflightOptions {
  allowMemoryInProduction?: boolean;
}

const MIN_PRODUCTION_KEY_LENGTH = 32;

function isBlank(value: string | undefined): boolean {
  return !value || value.trim().length === 0;
}

export function shouldRunRuntimePreflight(env: NodeJS.ProcessEnv): boolean {
  return env.ENABLE_RUNTIME_PREFLIGHT === '1' || env.DEPLOYMENT_ENVIRONMENT === 'production';
}

export function validateRuntimeEnv(
  env: NodeJS.ProcessEnv,
  options: RuntimePreflightOptions = {}
): string[] {
  const errors: string[] = [];
  const allowMemoryInProduction = options.allowMemoryInProduction ?? false;
  const production = env.DEPLOYMENT_ENVIRONMENT?.trim() === 'production';

  const storageDriver = env.STORAGE_DRIVER?.trim();
  if (isBlank(storageDriver)) {
    errors.push('STORAGE_DRIVER is not set; expected postgres or memory');
  } else if (storageDriver !== 'postgres' && storageDriver !== 'memory') {
    errors.push(`STORAGE_DRIVER=${storageDriver} is invalid; expected postgres or memory`);
  }

  if (storageDriver === 'memory' && production && !allowMemoryInProduction) {
    errors.push(
      'memory storage loses every account and note on restart (set ALLOW_MEMORY_IN_PRODUCTION=1 to override)'
    );
  }

  if (storageDriver === 'postgres') {
    const databaseUrl = env.DATABASE_URL?.trim();
    if (!databaseUrl) {
      errors.push('DATABASE_URL is required when STORAGE_DRIVER=postgres');
    } else if (!/^postgres(ql)?:\/\//.test(databaseUrl)) {
      errors.push('DATABASE_URL must start with postgres:// or postgresql://');
    }
  }

  const port = (env.PORT ?? '3000').trim();
  if (!/^\d+$/.test(port)) {
    errors.push(`PORT=${port} is invalid; it must be a number`);
  } else {
    const value = Number(port);
    if (value < 1 || value > 65535) {
      errors.push(`PORT=${port} is out of range 1-65535`);
    }
  }

  if (production) {
    const signingKey = env.SIGNING_KEY?.trim();
    if (!signingKey || signingKey === DEFAULT_SIGNING_KEY) {
      errors.push('SIGNING_KEY must be set to a non-default value in production');
    } else if (signingKey.length < MIN_PRODUCTION_KEY_LENGTH) {
      errors.push(`SIGNING_KEY must be at least ${MIN_PRODUCTION_KEY_LENGTH} characters in production`);
    }
    if (signingKey && env.COOKIE_SIGNING_KEY?.trim() === signingKey) {
      errors.push('COOKIE_SIGNING_KEY must differ from SIGNING_KEY');
    }
  }

  return errors;
}

export function assertRuntimeEnv(
  env: NodeJS.ProcessEnv,
  options: RuntimePreflightOptions = {}
): void {
  const errors = validateRuntimeEnv(env, options);
  if (errors.length === 0) {
    return;
  }

  const message = ['Runtime environment check failed:', ...errors.map((item) => `- ${item}`)].join(
    '\n'
  );
  throw new ConfigurationError('InvalidSetting', message);
}

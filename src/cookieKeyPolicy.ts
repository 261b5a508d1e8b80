import crypto from 'node:crypto';
import { DEFAULT_COOKIE_KEY, type AppConfig } from './config';
import { ConfigurationError } from './errors';
import type { Logger } from './logger';

export type CookieKeySource = 'configured' | 'default' | 'generated';

export interface ProvisionedCookieKey {
  key: string;
  source: CookieKeySource;
}

export function generateCookieKey(): string {
  return crypto.randomBytes(32).toString('hex');
}

const REMEDIATION = [
  'No secure reauthentication cookie key is configured for production. Fix it with one of:',
  '  1. set COOKIE_SIGNING_KEY to a strong random value (at least 32 characters)',
  `  2. replace the built-in default "${DEFAULT_COOKIE_KEY}" with a key of your own`,
  '  3. set ALLOW_GENERATED_COOKIE_KEY=true to generate a key per process (cookies die on every restart)'
].join('\n');

export function provisionCookieKey(
  config: Pick<AppConfig, 'environment' | 'cookie'>,
  logger: Logger,
  generateKey: () => string = generateCookieKey
): ProvisionedCookieKey {
  const configured = config.cookie.signingKey;

  if (config.environment === 'development') {
    if (configured) {
      return { key: configured, source: 'configured' };
    }
    logger.warn('Using the default reauthentication cookie key; never do this in production');
    return { key: DEFAULT_COOKIE_KEY, source: 'default' };
  }

  if (configured && configured !== DEFAULT_COOKIE_KEY) {
    return { key: configured, source: 'configured' };
  }

  if (config.cookie.allowGeneratedKey) {
    logger.warn(
      'SECURITY WARNING: generated a random reauthentication cookie key for this process. ' +
        'Every existing login cookie becomes invalid on each restart. Set COOKIE_SIGNING_KEY to keep them.'
    );
    return { key: generateKey(), source: 'generated' };
  }

  logger.error(REMEDIATION);
  throw new ConfigurationError('WeakProductionKey', REMEDIATION);
}

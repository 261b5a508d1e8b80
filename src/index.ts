import 'dotenv/config';
import { loadConfig } from './config';
import { provisionCookieKey } from './cookieKeyPolicy';
import { createLogger } from './logger';
import { assertRuntimeEnv, shouldRunRuntimePreflight } from './runtimePreflight';
import { buildServer } from './server';

async function main() {
  if (shouldRunRuntimePreflight(process.env)) {
    assertRuntimeEnv(process.env, {
      allowMemoryInProduction: process.env.ALLOW_MEMORY_IN_PRODUCTION === '1'
    });
  }

  const config = loadConfig(process.env);
  const logger = createLogger(config.logLevel);
  const cookieKey = provisionCookieKey(config, logger);
  logger.info(
    { environment: config.environment, cookieKeySource: cookieKey.source },
    'configuration loaded'
  );

  const app = buildServer({ config, cookieKey: cookieKey.key, logger });
  await app.listen({ port: config.port, host: '0.0.0.0' });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

/**
 * Server entry point: validate configuration, listen, then resume any runs
 * a previous process left mid-flight.
 */

import { loadConfig, validateConfig } from './config';
import { createApp, createAppContext } from './server';
import { errorContext, logger, setLogLevel } from './logger';

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);

  const validation = validateConfig(config);
  for (const warning of validation.warnings) logger.warn(warning);
  if (!validation.valid) {
    logger.error('Invalid configuration', { errors: validation.errors });
    process.exitCode = 1;
    return;
  }

  const context = createAppContext({ config });
  const app = createApp(context);

  await new Promise<void>((resolve) => {
    app.listen(config.port, () => resolve());
  });
  logger.info('Server listening', { port: config.port, storage: context.store.kind });

  const recovered = await context.orchestrator.recover();
  if (recovered.length > 0) logger.info('Recovered runs', { count: recovered.length });

  if (config.review.expiryMs > 0) {
    const sweep = setInterval(() => {
      context.orchestrator.expireStaleApprovals(config.review.expiryMs).catch((err: unknown) => {
        logger.error('Approval expiry sweep failed', errorContext(err));
      });
    }, Math.min(config.review.expiryMs, 60_000));
    sweep.unref();
  }
}

main().catch((err: unknown) => {
  logger.error('Server failed to start', errorContext(err));
  process.exitCode = 1;
});

import { createApp } from './app.js';
import { loadConfig } from './config/load.js';
import { JsonLogger } from './core/logger.js';

const main = async (): Promise<void> => {
  const config = loadConfig();
  const logger = new JsonLogger(config.logLevel);
  const app = createApp(config, logger);

  const shutdown = (signal: string): void => {
    logger.info('shutting down', { signal });
    app.stop();
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  app.start();
  logger.info('zone-notify started', { nodeEnv: config.nodeEnv });
};

main().catch((err: unknown) => {
  process.stderr.write(`fatal: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
  process.exit(1);
});

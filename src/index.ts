import 'dotenv/config';
import { describeConfig, loadConfig, type ProducerConfig } from './config/settings';
import { createProducer } from './producer';
import { RunScheduler } from './services/RunScheduler';
import { ConfigError } from './utils/errors';
import { logger, setLogLevel } from './utils/logger';

logger.info('Starting observation producer');

function loadConfigOrExit(): ProducerConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, 'Invalid configuration, exiting');
      process.exit(1);
    }
    throw error;
  }
}

const config = loadConfigOrExit();

// Every component logger is created below, after the level is final
setLogLevel(config.logLevel);
logger.info(describeConfig(config), 'Configuration');

const producer = createProducer(config);

if (config.runIntervalMs === null) {
  try {
    await producer.run();
  } catch (error) {
    logger.fatal({ error }, 'Producer run failed');
    process.exitCode = 1;
  }
} else {
  const scheduler = new RunScheduler(() => producer.run(), config.runIntervalMs);
  scheduler.start();

  const shutdown = () => {
    logger.info('Shutting down gracefully...');
    scheduler
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error }, 'Error while stopping scheduler');
        process.exit(1);
      });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

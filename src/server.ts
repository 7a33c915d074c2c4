// Entry point: loads configuration once, builds the app and starts the HTTP server
import { AppConfig, ConfigError, loadConfig } from './config';
import { createLogger } from './logger';
import { createApp } from './app';

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    // No logger yet: its level comes from the configuration that failed
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

function start(): void {
  const config = loadConfigOrExit();
  const logger = createLogger(config);
  const app = createApp({ config, logger });

  const server = app.listen(config.port, (err?: Error) => {
    if (err) {
      logger.fatal({ err, port: config.port }, 'Failed to start HTTP server');
      process.exit(1);
    }
    logger.info(
      { port: config.port, scanApiUrl: config.scanApiUrl, authMode: config.auth.mode, env: config.nodeEnv },
      'Scan gateway listening',
    );
    if (config.testing) {
      logger.warn('TESTING is set: only the built-in test credential is accepted');
    }
  });

  // Graceful shutdown
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Shutting down');
    server.close((err) => {
      if (err) {
        logger.error({ err }, 'Error while closing server');
        process.exit(1);
      }
      logger.info('Server closed');
      process.exit(0);
    });
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

start();

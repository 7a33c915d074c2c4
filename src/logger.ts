import pino, { type DestinationStream, type Logger } from 'pino';
import type { AppConfig } from './config';

export type { Logger } from 'pino';

type LoggerConfig = Pick<AppConfig, 'logLevel' | 'isProduction' | 'nodeEnv'>;

// Pretty output for local runs; plain JSON lines in production, under Jest,
// or whenever an explicit destination is supplied.
export function createLogger(config: LoggerConfig, destination?: DestinationStream): Logger {
  const options = {
    level: config.logLevel,
    base: { service: 'scan-gateway' },
  };

  if (destination) {
    return pino(options, destination);
  }

  const pretty = !config.isProduction && config.nodeEnv !== 'test';

  return pino({
    ...options,
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            singleLine: true,
          },
        }
      : undefined,
  });
}

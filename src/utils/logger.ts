import pino from 'pino';
import { config, LogLevel } from '../config';

const pinoConfig: pino.LoggerOptions = {
  level: config.logLevel ?? 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
};

// Use pretty printing in development
if (config.env === 'development') {
  pinoConfig.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
    },
  };
}

export const logger = pino(pinoConfig);

// Children keep the level they were created with, so track them for setLogLevel().
const children = new Set<pino.Logger>();

export function createLogger(name: string): pino.Logger {
  const child = logger.child({ module: name });
  children.add(child);
  return child;
}

/** Applies the level from the config file once it has been loaded. */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}

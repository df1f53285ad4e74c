/**
 * Logger factory using Pino
 * Structured JSON logs in production, pino-pretty everywhere else
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'agri-projections',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Pino options shared by the standalone logger and Fastify's request logger.
 */
export const makeLoggerOptions = (config: Partial<LoggerConfig> = {}): LoggerOptions => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  if (finalConfig.pretty === true) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return options;
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  return pinoLib(makeLoggerOptions(config));
};

/**
 * Creates a child logger tagged with the component that owns it
 */
export const createComponentLogger = (parent: Logger, component: string): Logger => {
  return parent.child({ component });
};

export { type Logger } from 'pino';

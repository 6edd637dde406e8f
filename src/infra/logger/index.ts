/**
 * Logger factory using Pino
 *
 * Builders log each statement they build at trace level, and the filter
 * validator logs rejected client filters at debug level. Both take the logger
 * as an option, so embedding applications can pass their own Pino instance.
 */

import pinoLib, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'sql-kit',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Creates a configured Pino logger instance.
 *
 * Lines go to stdout unless a destination is given; a destination also
 * disables the pretty transport.
 */
export const createLogger = (
  config: Partial<LoggerConfig> = {},
  destination?: DestinationStream
): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
    // Bound parameters may carry user data; only counts are logged.
    redact: ['params'],
  };

  if (destination !== undefined) {
    return pinoLib(options, destination);
  }

  // pino-pretty spawns a worker thread; skip it when nothing would be printed
  if (finalConfig.pretty === true && finalConfig.level !== 'silent') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return pinoLib(options);
};

/**
 * Creates a child logger scoped to a component, e.g. `{ component: 'SqlKit' }`
 */
export const createChildLogger = (parent: Logger, context: Record<string, unknown>): Logger => {
  return parent.child(context);
};

export { type Logger } from 'pino';

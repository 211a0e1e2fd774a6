/**
 * Logger factory using Pino
 * Provides structured JSON logging with configurable levels
 */

import pinoLib, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
  /** File descriptor logs are written to; the CLI keeps stdout for results. */
  fd?: 1 | 2;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'fars-accidents',
  pretty: process.env['NODE_ENV'] !== 'production',
  fd: 1,
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };
  const fd = finalConfig.fd ?? 1;

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  // Use pino-pretty in development for readable logs
  if (finalConfig.pretty != null && finalConfig.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: fd,
      },
    };
    return pinoLib(options);
  }

  return pinoLib(options, pinoLib.destination(fd));
};

/**
 * Creates a logger that writes JSON lines to the given stream.
 * Used where log output has to be captured in-process.
 */
export const createStreamLogger = (
  stream: DestinationStream,
  config: Partial<Pick<LoggerConfig, 'level' | 'name'>> = {}
): Logger =>
  pinoLib({ name: config.name ?? defaultConfig.name, level: config.level ?? 'info' }, stream);

/**
 * Creates a child logger with additional context
 */
export const createChildLogger = (parent: Logger, context: Record<string, unknown>): Logger => {
  return parent.child(context);
};

export { type Logger } from 'pino';

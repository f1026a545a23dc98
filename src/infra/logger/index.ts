/**
 * Logger factory using Pino
 * Structured JSON logs for aggregation runs, pretty-printed outside production
 */

import pinoLib, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
  /** Write raw JSON lines here instead of stdout (pretty is ignored) */
  stream?: DestinationStream;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'survey-aggregation',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const { stream, ...finalConfig } = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  if (stream !== undefined) {
    return pinoLib(options, stream);
  }

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

  return pinoLib(options);
};

export { type Logger } from 'pino';

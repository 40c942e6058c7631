import { createRequire } from 'module';

import pino, { type LoggerOptions, type TransportSingleOptions } from 'pino';

import { env, type Environment } from '../../config/env.js';

export type LoggerConfig = Pick<Environment, 'NODE_ENV' | 'LOG_LEVEL' | 'HOST' | 'PORT'>;

const resolvePrettyTransport = (): TransportSingleOptions | undefined => {
  const require = createRequire(import.meta.url);
  try {
    require.resolve('pino-pretty');
  } catch {
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid',
    },
  };
};

/** pino options for this service; the bind address rides along as base bindings. */
export const buildLoggerOptions = (
  config: LoggerConfig,
  prettyTransport?: TransportSingleOptions,
): LoggerOptions => ({
  name: 'service-monitor-api',
  level: config.LOG_LEVEL,
  base: { pid: process.pid, host: config.HOST, port: config.PORT },
  transport: config.NODE_ENV === 'development' ? prettyTransport : undefined,
});

const prettyTransport = env.NODE_ENV === 'development' ? resolvePrettyTransport() : undefined;

export const logger = pino(buildLoggerOptions(env, prettyTransport));

if (env.NODE_ENV === 'development' && prettyTransport === undefined) {
  logger.warn('pino-pretty is not installed; writing JSON logs');
}

export type Logger = typeof logger;

/**
 * Pino loggers for the service.
 *
 * Every line carries `service` and `env` bindings. Development output goes
 * through pino-pretty; other environments write JSON lines.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

import type { AppConfig } from '../config/env.js';

export const SERVICE_NAME = 'latest-indicators-server';

export type LoggerSettings = AppConfig['logger'];

export const buildLoggerOptions = (settings: LoggerSettings): LoggerOptions => {
  const options: LoggerOptions = {
    level: settings.level,
    base: { service: SERVICE_NAME, env: settings.environment },
  };

  if (settings.environment === 'development') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,service,env',
      },
    };
  }

  return options;
};

export const createLogger = (settings: LoggerSettings): Logger =>
  pinoLib(buildLoggerOptions(settings));

/** Discards everything; the default when no logger is injected. */
export const createSilentLogger = (): Logger => pinoLib({ level: 'silent' });

export { type Logger } from 'pino';

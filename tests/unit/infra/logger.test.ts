import { describe, expect, it } from 'vitest';

import { buildLoggerOptions, createSilentLogger, SERVICE_NAME } from '@/infra/logger/index.js';

describe('buildLoggerOptions', () => {
  it('binds the service name and environment to every line', () => {
    const options = buildLoggerOptions({ level: 'warn', environment: 'production' });

    expect(options.level).toBe('warn');
    expect(options.base).toEqual({ service: SERVICE_NAME, env: 'production' });
    expect(options.transport).toBeUndefined();
  });

  it('pretty-prints only in development', () => {
    expect(buildLoggerOptions({ level: 'info', environment: 'development' }).transport).toEqual({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,service,env',
      },
    });
    expect(buildLoggerOptions({ level: 'info', environment: 'test' }).transport).toBeUndefined();
  });
});

describe('createSilentLogger', () => {
  it('logs at the silent level', () => {
    expect(createSilentLogger().level).toBe('silent');
  });
});

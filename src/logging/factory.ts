import pino from 'pino';
import type { SonicBoom } from 'sonic-boom';
import { getLoggingConfig, type LoggingConfig } from './config.js';

export type LoggerBundle = {
  logger: pino.Logger;
  flush: () => Promise<void>;
};

function flushStdout(destination: SonicBoom): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    destination.flush((err) => (err ? reject(err) : resolve()));
  });
}

export function buildLogger(config: LoggingConfig = getLoggingConfig()): LoggerBundle {
  const options: pino.LoggerOptions = {
    name: 'triton',
    level: config.level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.format === 'pretty') {
    // pino-pretty runs in a worker thread and flushes on exit.
    const transport = pino.transport({
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
    });
    return { logger: pino(options, transport), flush: async () => {} };
  }

  const stdout = pino.destination({ dest: 1, sync: false });
  return { logger: pino(options, stdout), flush: () => flushStdout(stdout) };
}

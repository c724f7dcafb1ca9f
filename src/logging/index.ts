import type pino from 'pino';
import { buildLogger } from './factory.js';

const { logger: rootLogger, flush: flushDestination } = buildLogger();

export const logger = rootLogger;

export async function flushLogger(): Promise<void> {
  await flushDestination();
}

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}

export const botLogger = createChildLogger('BOT');
export const chainLogger = createChildLogger('CHAIN');
export const configLogger = createChildLogger('CONFIG');
export const operateLogger = createChildLogger('OPERATE');
export const schedulerLogger = createChildLogger('SCHEDULER');

/**
 * Logger for one configured service; every line carries the service name.
 */
export function createServiceLogger(serviceName: string): pino.Logger {
  return logger.child({ component: 'SERVICE', service: serviceName });
}

export function serializeError(err: Error | unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return {
      type: err.name,
      message: err.message,
      stack: err.stack,
    };
  }
  return { message: String(err) };
}

import pino from 'pino';

export type LogFormat = 'json' | 'pretty';

export type LoggingConfig = {
  level: pino.LevelWithSilent;
  format: LogFormat;
};

const LEVELS: readonly pino.LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLevel(value: string): value is pino.LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

/**
 * LOG_LEVEL (default info) and LOG_FORMAT (json or pretty, default json).
 * Unknown levels fall back to the default; an unknown format is an error.
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const level = env.LOG_LEVEL?.trim().toLowerCase();
  const format = env.LOG_FORMAT?.trim().toLowerCase() || 'json';
  if (format !== 'json' && format !== 'pretty') {
    throw new Error(`LOG_FORMAT must be "json" or "pretty", got "${format}"`);
  }

  return {
    level: level && isLevel(level) ? level : 'info',
    format,
  };
}

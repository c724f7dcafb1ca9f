import { describe, expect, it } from 'vitest';
import { getLoggingConfig } from '../../../src/logging/config.js';

describe('getLoggingConfig', () => {
  it('defaults to info-level JSON', () => {
    expect(getLoggingConfig({})).toEqual({ level: 'info', format: 'json' });
  });

  it('reads level and format case-insensitively', () => {
    expect(getLoggingConfig({ LOG_LEVEL: ' DEBUG ', LOG_FORMAT: 'Pretty' })).toEqual({ level: 'debug', format: 'pretty' });
  });

  it('ignores an unknown level', () => {
    expect(getLoggingConfig({ LOG_LEVEL: 'verbose' }).level).toBe('info');
  });

  it('rejects an unknown format', () => {
    expect(() => getLoggingConfig({ LOG_FORMAT: 'xml' })).toThrow('LOG_FORMAT must be "json" or "pretty", got "xml"');
  });
});

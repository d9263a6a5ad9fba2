import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigError } from '../sales/errors.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'info', defaultFormat: 'text', delimiter: 'auto' });
  });

  it('reads values from the environment', () => {
    expect(
      loadConfig({ LOG_LEVEL: 'debug', SALES_REPORT_FORMAT: 'json', SALES_REPORT_DELIMITER: 'semicolon' }),
    ).toEqual({ logLevel: 'debug', defaultFormat: 'json', delimiter: 'semicolon' });
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ SALES_REPORT_FORMAT: '  ' }).defaultFormat).toBe('text');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ SALES_REPORT_FORMAT: 'xml' })).toThrow(ConfigError);
    expect(() => loadConfig({ SALES_REPORT_DELIMITER: 'pipe' })).toThrow(/^Invalid configuration: delimiter: /);
  });
});

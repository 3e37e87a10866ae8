import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../config/index.js';
import { ConfigError } from '../../utils/errors.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config).toMatchObject({
      captureDir: 'captured_images',
      captureTimeoutMs: 10000,
      dbType: 'mysql',
      dbHost: 'localhost',
      dbUser: 'root',
      dbPassword: '',
      dbName: 'booklog',
      llmTemperature: 0.2,
      llmMaxTokens: 800,
      logLevel: 'info',
    });
    expect(config.cameraUrl).toBeUndefined();
    expect(config.dbPort).toBeUndefined();
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ CAMERA_URL: '', BOOK_LOCATION: '' });
    expect(config.cameraUrl).toBeUndefined();
    expect(config.bookLocation).toBeUndefined();
  });

  it('accepts backend names case-insensitively and coerces numbers', () => {
    const config = loadConfig({ DB_TYPE: 'PostgreSQL', DB_PORT: '6543', CAPTURE_TIMEOUT_MS: '2500' });
    expect(config.dbType).toBe('postgresql');
    expect(config.dbPort).toBe(6543);
    expect(config.captureTimeoutMs).toBe(2500);
  });

  it('rejects an unsupported backend with a ConfigError', () => {
    expect(() => loadConfig({ DB_TYPE: 'oracle' })).toThrow(ConfigError);
    expect(() => loadConfig({ DB_TYPE: 'oracle' })).toThrow(
      'dbType: Unsupported database type; expected one of mysql, postgresql, sqlite'
    );
  });

  it('rejects a malformed camera URL', () => {
    expect(() => loadConfig({ CAMERA_URL: 'not a url' })).toThrow(ConfigError);
  });
});

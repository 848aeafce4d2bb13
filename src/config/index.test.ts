import { describe, expect, it } from 'vitest';
import { StorageError } from '../utils/errors.js';
import { ConfigError, DEFAULT_CONFIG, loadConfig } from './index.js';

describe('loadConfig', () => {
  it('should return defaults with an empty environment', () => {
    expect(loadConfig({ env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('should read environment variables', () => {
    const config = loadConfig({
      env: {
        DATABASE_URL: 'sqlite://./data/app.db',
        DB_JOURNAL_MODE: 'DELETE',
        DB_FOREIGN_KEYS: 'false',
        DB_BUSY_TIMEOUT_MS: '250',
        DB_LOG_QUERIES: '1',
      },
    });

    expect(config).toEqual({
      connectionString: './data/app.db',
      journalMode: 'delete',
      foreignKeys: false,
      busyTimeoutMs: 250,
      logQueries: true,
    });
  });

  it('should let overrides win over the environment', () => {
    const config = loadConfig({
      env: { DATABASE_URL: 'env.db', DB_LOG_QUERIES: 'true' },
      overrides: { connectionString: 'file://override.db', logQueries: false },
    });

    expect(config.connectionString).toBe('override.db');
    expect(config.logQueries).toBe(false);
  });

  it('should ignore empty environment variables', () => {
    expect(loadConfig({ env: { DATABASE_URL: '' } }).connectionString).toBe(':memory:');
  });

  it('should report every invalid field', () => {
    let caught: unknown;
    try {
      loadConfig({ env: { DB_JOURNAL_MODE: 'fast', DB_BUSY_TIMEOUT_MS: '-5' } });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.fields.map((f) => f.path)).toEqual(['journalMode', 'busyTimeoutMs']);
      expect(caught.message).toContain('Configuration invalid:');
    }
  });

  it('should reject malformed boolean flags', () => {
    expect(() => loadConfig({ env: { DB_FOREIGN_KEYS: 'maybe' } })).toThrow(ConfigError);
  });

  it('should raise configuration failures as storage errors', () => {
    expect(() => loadConfig({ overrides: { connectionString: '' } })).toThrow(StorageError);
  });
});

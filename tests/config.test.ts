import { afterEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../server/config';

const KEYS = ['DATABASE_PATH', 'PORT', 'INBOX_PLUGINS', 'DEFAULT_LANGUAGE'];
const saved = Object.fromEntries(KEYS.map((key) => [key, process.env[key]]));

afterEach(() => {
  for (const key of KEYS) {
    const value = saved[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    for (const key of KEYS) {
      delete process.env[key];
    }
    expect(loadConfig()).toEqual({
      databasePath: './data/inbox.sqlite',
      port: 3000,
      plugins: ['salons'],
      defaultLanguage: 'en',
    });
  });

  it('reads plugin lists and ports from the environment', () => {
    process.env.INBOX_PLUGINS = ' Restaurants, salons ,';
    process.env.PORT = '8080';
    process.env.DEFAULT_LANGUAGE = 'ar';
    const config = loadConfig();
    expect(config.plugins).toEqual(['restaurants', 'salons']);
    expect(config.port).toBe(8080);
    expect(config.defaultLanguage).toBe('ar');
  });

  it('rejects invalid ports', () => {
    process.env.PORT = 'eighty';
    expect(() => loadConfig()).toThrow(
      'Invalid env var: PORT must be a non-negative integer',
    );
  });
});

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../config/index.js';
import { ConfigError } from '../../utils/errors.js';

describe('loadConfig', () => {
  it('applies defaults when the environment is empty', () => {
    const config = loadConfig({});
    expect(config.zip).toBe('64093');
    expect(config.country).toBe('USA');
    expect(config.timezone).toBe('America/Chicago');
    expect(config.userAgent).toBe('WeatherApp/1.0');
    expect(config.httpTimeoutMs).toBe(10000);
    expect(config.dbDriver).toBe('sqlite');
    expect(config.databasePath).toBe('data/weather.db');
    expect(config.dbPort).toBe(3306);
    expect(config.dbPassword).toBe('');
  });

  it('reads and coerces environment variables', () => {
    const config = loadConfig({
      ZIP: '10001',
      TIMEZONE: 'America/New_York',
      HTTP_TIMEOUT_MS: '2500',
      DB_DRIVER: 'mysql',
      DB_PORT: '3307',
    });
    expect(config.zip).toBe('10001');
    expect(config.timezone).toBe('America/New_York');
    expect(config.httpTimeoutMs).toBe(2500);
    expect(config.dbDriver).toBe('mysql');
    expect(config.dbPort).toBe(3307);
  });

  it('treats empty strings as unset', () => {
    expect(loadConfig({ ZIP: '', USER_AGENT: '' }).zip).toBe('64093');
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfig({ ZIP: '10001', DB_HOST: 'env-host' }, { zip: '73301', dbHost: undefined });
    expect(config.zip).toBe('73301');
    expect(config.dbHost).toBe('env-host');
  });

  it('selects mysql when connection settings are given without a driver', () => {
    expect(loadConfig({ DB_HOST: 'db.internal' }).dbDriver).toBe('mysql');
    expect(loadConfig({}, { dbName: 'wx' }).dbDriver).toBe('mysql');
    expect(loadConfig({ DB_PASS: '' }).dbDriver).toBe('sqlite');
  });

  it('keeps an explicit driver even with connection settings', () => {
    expect(loadConfig({ DB_DRIVER: 'sqlite', DB_HOST: 'db.internal' }).dbDriver).toBe('sqlite');
    expect(loadConfig({ DB_HOST: 'db.internal' }, { dbDriver: 'sqlite' }).dbDriver).toBe('sqlite');
  });

  it('rejects a malformed ZIP code', () => {
    expect(() => loadConfig({ ZIP: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig({ ZIP: 'abc' })).toThrow('zip: must be a 5-digit ZIP code');
  });

  it('rejects an unknown time zone', () => {
    expect(() => loadConfig({ TIMEZONE: 'Mars/Olympus_Mons' })).toThrow('timezone: must be an IANA time zone');
  });
});

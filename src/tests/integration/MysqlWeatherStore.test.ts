import { describe, it, expect, vi } from 'vitest';
import { MysqlWeatherStore, type SqlExecutor, type SqlValue } from '../../persistence/mysql/MysqlWeatherStore.js';
import type { WeatherRecordInput } from '../../ports/WeatherStorePort.js';
import { PersistenceError } from '../../utils/errors.js';

describe('MysqlWeatherStore', () => {
  const input: WeatherRecordInput = {
    date: '2026-10-18',
    zip: '64093',
    lat: 38.76281234,
    lon: -93.7361,
    condition: 'Overcast',
    tempHighF: 18.84,
    tempLowF: 4.0,
    precipMM: 0.0,
    windMaxMPH: 9.8,
  };

  // DECIMAL columns as mysql2 returns them without decimalNumbers
  const row = {
    date_local: '2026-10-18',
    zip: '64093',
    lat: '38.762812',
    lon: '-93.736100',
    condition: 'Overcast',
    temp_high_f: '18.8',
    temp_low_f: '4.0',
    precip_mm: '0.0',
    wind_max_mph: '9.8',
    created_epoch: 1792339200,
    updated_epoch: '1792339260',
  };

  function fakeExecutor(results: unknown[] = []) {
    const execute = vi.fn<(sql: string, values?: SqlValue[]) => Promise<unknown>>();
    for (const result of results) execute.mockResolvedValueOnce(result);
    const end = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
    const executor: SqlExecutor = { execute, end };
    return { executor, execute, end };
  }

  it('creates weather_daily with a unique (date_local, zip) key', async () => {
    const { executor, execute } = fakeExecutor([[]]);

    await new MysqlWeatherStore(executor).ensureSchema();

    const sql = execute.mock.calls[0]?.[0] ?? '';
    expect(sql).toContain('CREATE TABLE IF NOT EXISTS weather_daily');
    expect(sql).toContain('UNIQUE KEY uq_weather_daily_date_zip (date_local, zip)');
    expect(sql).toContain('temp_high_f DECIMAL(4,1)');
    expect(sql).toContain('precip_mm DECIMAL(6,1)');
    expect(sql).toContain('wind_max_mph DECIMAL(5,1)');
  });

  it('upserts with rounded values and returns the stored row', async () => {
    const { executor, execute } = fakeExecutor([{ affectedRows: 1 }, [row]]);

    const stored = await new MysqlWeatherStore(executor).upsert(input);

    const [sql, values] = execute.mock.calls[0] ?? [];
    expect(sql).toContain('ON DUPLICATE KEY UPDATE');
    expect(sql).not.toMatch(/created_at\s*=/);
    expect(values).toEqual(['2026-10-18', '64093', 38.762812, -93.7361, 'Overcast', 18.8, 4, 0, 9.8]);
    expect(execute.mock.calls[1]?.[1]).toEqual(['64093', '2026-10-18']);
    expect(stored).toEqual({
      date: '2026-10-18',
      zip: '64093',
      lat: 38.762812,
      lon: -93.7361,
      condition: 'Overcast',
      tempHighF: 18.8,
      tempLowF: 4,
      precipMM: 0,
      windMaxMPH: 9.8,
      createdAt: '2026-10-18T16:00:00Z',
      updatedAt: '2026-10-18T16:01:00Z',
    });
  });

  it('returns null when no row matches', async () => {
    const { executor } = fakeExecutor([[]]);

    expect(await new MysqlWeatherStore(executor).get('64093', '2026-10-17')).toBeNull();
  });

  it('wraps driver failures in PersistenceError', async () => {
    const { executor, execute } = fakeExecutor();
    execute.mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:3306'));

    await expect(new MysqlWeatherStore(executor).upsert(input)).rejects.toThrow(
      new PersistenceError('Failed to store weather for 2026-10-18: connect ECONNREFUSED 127.0.0.1:3306')
    );
  });

  it('rejects rows of an unexpected shape', async () => {
    const { executor } = fakeExecutor([[{ zip: '64093' }]]);

    await expect(new MysqlWeatherStore(executor).get('64093', '2026-10-18')).rejects.toBeInstanceOf(
      PersistenceError
    );
  });

  it('ends the pool on close', async () => {
    const { executor, end } = fakeExecutor();

    await new MysqlWeatherStore(executor).close();

    expect(end).toHaveBeenCalledOnce();
  });
});

import mysql from 'mysql2/promise';
import { z } from 'zod';
import type { Config } from '../../config/index.js';
import type {
  DailyWeatherRecord,
  WeatherRecordInput,
  WeatherStorePort,
} from '../../ports/WeatherStorePort.js';
import { PersistenceError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { toStoredScale } from '../weatherRecord.js';

export type SqlValue = string | number | null;

/** The slice of a mysql2 pool the store needs; rows come back untyped and are validated here. */
export interface SqlExecutor {
  execute(sql: string, values?: SqlValue[]): Promise<unknown>;
  end(): Promise<void>;
}

export function createMysqlExecutor(
  config: Pick<Config, 'dbHost' | 'dbPort' | 'dbUser' | 'dbPassword' | 'dbName' | 'httpTimeoutMs'>
): SqlExecutor {
  const pool = mysql.createPool({
    host: config.dbHost,
    port: config.dbPort,
    user: config.dbUser,
    password: config.dbPassword,
    database: config.dbName,
    connectionLimit: 1,
    connectTimeout: config.httpTimeoutMs,
    decimalNumbers: true,
    dateStrings: true,
  });

  return {
    async execute(sql, values = []) {
      const [rows] = await pool.execute(sql, values);
      return rows;
    },
    end: () => pool.end(),
  };
}

const CREATE_TABLE = `
  CREATE TABLE IF NOT EXISTS weather_daily (
    id INT UNSIGNED AUTO_INCREMENT PRIMARY KEY,
    date_local DATE NOT NULL,
    zip VARCHAR(10) NOT NULL,
    lat DECIMAL(9,6) NOT NULL,
    lon DECIMAL(9,6) NOT NULL,
    \`condition\` VARCHAR(64) NOT NULL,
    temp_high_f DECIMAL(4,1) NOT NULL,
    temp_low_f DECIMAL(4,1) NOT NULL,
    precip_mm DECIMAL(6,1) NOT NULL,
    wind_max_mph DECIMAL(5,1) NOT NULL,
    created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
    UNIQUE KEY uq_weather_daily_date_zip (date_local, zip)
  )`;

const UPSERT = `
  INSERT INTO weather_daily (
    date_local, zip, lat, lon, \`condition\`,
    temp_high_f, temp_low_f, precip_mm, wind_max_mph
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  ON DUPLICATE KEY UPDATE
    lat = VALUES(lat),
    lon = VALUES(lon),
    \`condition\` = VALUES(\`condition\`),
    temp_high_f = VALUES(temp_high_f),
    temp_low_f = VALUES(temp_low_f),
    precip_mm = VALUES(precip_mm),
    wind_max_mph = VALUES(wind_max_mph),
    updated_at = CURRENT_TIMESTAMP`;

// Timestamps are read as epoch seconds so the session time zone does not matter
const SELECT_ONE = `
  SELECT date_local, zip, lat, lon, \`condition\`,
         temp_high_f, temp_low_f, precip_mm, wind_max_mph,
         UNIX_TIMESTAMP(created_at) AS created_epoch,
         UNIX_TIMESTAMP(updated_at) AS updated_epoch
  FROM weather_daily
  WHERE zip = ? AND date_local = ?`;

function epochToIso(seconds: number): string {
  return new Date(seconds * 1000).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

// DECIMAL columns arrive as strings unless decimalNumbers is set
const rowSchema = z.object({
  date_local: z.string(),
  zip: z.string(),
  lat: z.coerce.number(),
  lon: z.coerce.number(),
  condition: z.string(),
  temp_high_f: z.coerce.number(),
  temp_low_f: z.coerce.number(),
  precip_mm: z.coerce.number(),
  wind_max_mph: z.coerce.number(),
  created_epoch: z.coerce.number(),
  updated_epoch: z.coerce.number(),
});

const rowsSchema = z.array(rowSchema);

type WeatherDailyRow = z.infer<typeof rowSchema>;

function rowToRecord(row: WeatherDailyRow): DailyWeatherRecord {
  return {
    date: row.date_local,
    zip: row.zip,
    lat: row.lat,
    lon: row.lon,
    condition: row.condition,
    tempHighF: row.temp_high_f,
    tempLowF: row.temp_low_f,
    precipMM: row.precip_mm,
    windMaxMPH: row.wind_max_mph,
    createdAt: epochToIso(row.created_epoch),
    updatedAt: epochToIso(row.updated_epoch),
  };
}

export class MysqlWeatherStore implements WeatherStorePort {
  private readonly logger = createLogger({ repository: 'MysqlWeatherStore' });

  constructor(private readonly executor: SqlExecutor) {}

  async ensureSchema(): Promise<void> {
    try {
      await this.executor.execute(CREATE_TABLE);
    } catch (error) {
      this.logger.error({ err: error }, 'Schema setup failed');
      throw new PersistenceError(`Failed to prepare weather_daily: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async upsert(input: WeatherRecordInput): Promise<DailyWeatherRecord> {
    const record = toStoredScale(input);
    try {
      await this.executor.execute(UPSERT, [
        record.date,
        record.zip,
        record.lat,
        record.lon,
        record.condition,
        record.tempHighF,
        record.tempLowF,
        record.precipMM,
        record.windMaxMPH,
      ]);
    } catch (error) {
      this.logger.error({ err: error, zip: record.zip, date: record.date }, 'Upsert failed');
      throw new PersistenceError(`Failed to store weather for ${record.date}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const stored = await this.get(record.zip, record.date);
    if (!stored) {
      throw new PersistenceError(`Row for ${record.date} (ZIP ${record.zip}) missing after upsert`);
    }
    return stored;
  }

  async get(zip: string, date: string): Promise<DailyWeatherRecord | null> {
    let rows: unknown;
    try {
      rows = await this.executor.execute(SELECT_ONE, [zip, date]);
    } catch (error) {
      throw new PersistenceError(`Failed to read weather for ${date}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = rowsSchema.safeParse(rows);
    if (!parsed.success) {
      throw new PersistenceError(`Unexpected weather_daily row shape for ${date}`, {
        cause: parsed.error,
      });
    }

    const [row] = parsed.data;
    return row ? rowToRecord(row) : null;
  }

  async close(): Promise<void> {
    await this.executor.end();
  }
}

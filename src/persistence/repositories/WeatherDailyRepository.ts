import type { Database } from 'better-sqlite3';
import type {
  DailyWeatherRecord,
  WeatherRecordInput,
  WeatherStorePort,
} from '../../ports/WeatherStorePort.js';
import { PersistenceError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { toStoredScale } from '../weatherRecord.js';

type WeatherDailyRow = {
  id: number;
  date_local: string;
  zip: string;
  lat: number;
  lon: number;
  condition: string;
  temp_high_f: number;
  temp_low_f: number;
  precip_mm: number;
  wind_max_mph: number;
  created_at: string;
  updated_at: string;
};

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
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/** SQLite-backed weather store. Statements run synchronously inside async methods. */
export class WeatherDailyRepository implements WeatherStorePort {
  private readonly logger = createLogger({ repository: 'WeatherDailyRepository' });

  constructor(private readonly db: Database) {}

  async upsert(input: WeatherRecordInput): Promise<DailyWeatherRecord> {
    const record = toStoredScale(input);
    try {
      this.db
        .prepare(
          `INSERT INTO weather_daily (
             date_local, zip, lat, lon, condition,
             temp_high_f, temp_low_f, precip_mm, wind_max_mph
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(date_local, zip) DO UPDATE SET
             lat = excluded.lat,
             lon = excluded.lon,
             condition = excluded.condition,
             temp_high_f = excluded.temp_high_f,
             temp_low_f = excluded.temp_low_f,
             precip_mm = excluded.precip_mm,
             wind_max_mph = excluded.wind_max_mph,
             updated_at = strftime('%Y-%m-%dT%H:%M:%SZ', 'now')`
        )
        .run(
          record.date,
          record.zip,
          record.lat,
          record.lon,
          record.condition,
          record.tempHighF,
          record.tempLowF,
          record.precipMM,
          record.windMaxMPH
        );
    } catch (error) {
      this.logger.error({ err: error, zip: record.zip, date: record.date }, 'Upsert failed');
      throw new PersistenceError(`Failed to store weather for ${record.date}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const stored = this.find(record.zip, record.date);
    if (!stored) {
      throw new PersistenceError(`Row for ${record.date} (ZIP ${record.zip}) missing after upsert`);
    }
    return stored;
  }

  async get(zip: string, date: string): Promise<DailyWeatherRecord | null> {
    return this.find(zip, date);
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private find(zip: string, date: string): DailyWeatherRecord | null {
    try {
      const row = this.db
        .prepare('SELECT * FROM weather_daily WHERE zip = ? AND date_local = ?')
        .get(zip, date) as WeatherDailyRow | undefined;
      if (!row) return null;
      return rowToRecord(row);
    } catch (error) {
      throw new PersistenceError(`Failed to read weather for ${date}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

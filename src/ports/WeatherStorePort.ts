export interface DailyWeatherRecord {
  date: string;
  zip: string;
  lat: number;
  lon: number;
  condition: string;
  tempHighF: number;
  tempLowF: number;
  precipMM: number;
  windMaxMPH: number;
  /** ISO-8601 UTC; set on first insert only */
  createdAt: string;
  /** ISO-8601 UTC; refreshed on every upsert */
  updatedAt: string;
}

export type WeatherRecordInput = Omit<DailyWeatherRecord, 'createdAt' | 'updatedAt'>;

export interface WeatherStorePort {
  /** Insert the (date, zip) row, or overwrite its non-key fields. Returns the stored row. */
  upsert(input: WeatherRecordInput): Promise<DailyWeatherRecord>;
  /** Stored row for the exact key, or null. */
  get(zip: string, date: string): Promise<DailyWeatherRecord | null>;
  close(): Promise<void>;
}

import type { DailyWeatherRecord } from '../../ports/WeatherStorePort.js';

export interface WeatherExport {
  date: string;
  zip: string;
  coords: { lat: number; lon: number };
  condition: string;
  highF: number;
  lowF: number;
  precipMM: number;
  windMaxMPH: number;
}

export function exportRecord(record: DailyWeatherRecord): WeatherExport {
  return {
    date: record.date,
    zip: record.zip,
    coords: { lat: record.lat, lon: record.lon },
    condition: record.condition,
    highF: record.tempHighF,
    lowF: record.tempLowF,
    precipMM: record.precipMM,
    windMaxMPH: record.windMaxMPH,
  };
}

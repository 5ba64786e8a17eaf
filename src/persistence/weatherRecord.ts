import type { WeatherRecordInput } from '../ports/WeatherStorePort.js';
import { roundTo } from '../utils/numbers.js';

/** Column scales shared by every store, matching the MySQL DECIMAL definitions. */
export const COLUMN_SCALE = {
  coordinate: 6,
  temperature: 1,
  precipitation: 1,
  wind: 1,
} as const;

export function toStoredScale(input: WeatherRecordInput): WeatherRecordInput {
  return {
    ...input,
    lat: roundTo(input.lat, COLUMN_SCALE.coordinate),
    lon: roundTo(input.lon, COLUMN_SCALE.coordinate),
    tempHighF: roundTo(input.tempHighF, COLUMN_SCALE.temperature),
    tempLowF: roundTo(input.tempLowF, COLUMN_SCALE.temperature),
    precipMM: roundTo(input.precipMM, COLUMN_SCALE.precipitation),
    windMaxMPH: roundTo(input.windMaxMPH, COLUMN_SCALE.wind),
  };
}

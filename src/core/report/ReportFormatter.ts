import type { DailyForecast } from '../../ports/ForecastPort.js';
import { weatherCodeLabel } from './weatherCodes.js';

/**
 * Render one day's forecast as the plain-text report printed by `forecast`.
 * Measurements are shown with one decimal place.
 */
export function formatReport(
  zip: string,
  lat: number,
  lon: number,
  forecast: DailyForecast,
  placeName?: string
): string {
  const place = placeName ? `ZIP ${zip}, ${placeName}` : `ZIP ${zip}`;

  return [
    `lat: ${lat}`,
    `lon: ${lon}`,
    `Weather Forecast for ${forecast.date} (${place}):`,
    `Condition: ${weatherCodeLabel(forecast.weatherCode)}`,
    `High: ${forecast.tempHighF.toFixed(1)} F`,
    `Low: ${forecast.tempLowF.toFixed(1)} F`,
    `Precipitation: ${forecast.precipMM.toFixed(1)} mm`,
    `Max Wind Speed: ${forecast.windMaxMPH.toFixed(1)} mph`,
  ].join('\n');
}

import { describe, it, expect } from 'vitest';
import { formatReport } from '../../core/report/ReportFormatter.js';
import { WeatherCode, weatherCodeLabel } from '../../core/report/weatherCodes.js';
import type { DailyForecast } from '../../ports/ForecastPort.js';

describe('ReportFormatter', () => {
  const forecast: DailyForecast = {
    date: '2026-10-18',
    tempHighF: 18.8,
    tempLowF: 4.0,
    precipMM: 0.0,
    windMaxMPH: 9.8,
    weatherCode: 3,
  };

  it('renders condition and temperatures with one decimal', () => {
    const lines = formatReport('64093', 38.7628, -93.7361, forecast).split('\n');
    expect(lines).toContain('Condition: Overcast');
    expect(lines).toContain('High: 18.8 F');
    expect(lines).toContain('Low: 4.0 F');
  });

  it('renders the full report', () => {
    const report = formatReport('64093', 38.7628, -93.7361, forecast, 'Warrensburg, MO');
    expect(report).toBe(
      [
        'lat: 38.7628',
        'lon: -93.7361',
        'Weather Forecast for 2026-10-18 (ZIP 64093, Warrensburg, MO):',
        'Condition: Overcast',
        'High: 18.8 F',
        'Low: 4.0 F',
        'Precipitation: 0.0 mm',
        'Max Wind Speed: 9.8 mph',
      ].join('\n')
    );
  });

  it('labels unknown weather codes as Unknown', () => {
    const lines = formatReport('64093', 38.7628, -93.7361, { ...forecast, weatherCode: 999 }).split('\n');
    expect(lines[3]).toBe('Condition: Unknown');
  });
});

describe('weatherCodeLabel', () => {
  it('maps known WMO codes', () => {
    expect(weatherCodeLabel(WeatherCode.ClearSky)).toBe('Clear sky');
    expect(weatherCodeLabel(61)).toBe('Rain (slight)');
    expect(weatherCodeLabel(65)).toBe('Rain (heavy)');
    expect(weatherCodeLabel(95)).toBe('Thunderstorm');
  });

  it('returns Unknown for codes outside the table', () => {
    expect(weatherCodeLabel(999)).toBe('Unknown');
    expect(weatherCodeLabel(-1)).toBe('Unknown');
    expect(weatherCodeLabel(4)).toBe('Unknown');
  });
});

import { z } from 'zod';
import type { ForecastPort, DailyForecast } from '../../ports/ForecastPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { fetchJson } from '../../utils/http.js';
import { TransportError } from '../../utils/errors.js';

const ADAPTER = 'OpenMeteo';

const DAILY_FIELDS = [
  'temperature_2m_max',
  'temperature_2m_min',
  'precipitation_sum',
  'wind_speed_10m_max',
  'weather_code',
] as const;

const series = z.array(z.number()).nonempty();

const forecastResponseSchema = z.object({
  daily: z.object({
    time: z.array(z.string()).nonempty(),
    temperature_2m_max: series,
    temperature_2m_min: series,
    precipitation_sum: series,
    wind_speed_10m_max: series,
    weather_code: z.array(z.number().int()).nonempty(),
  }),
});

export class OpenMeteoAdapter implements ForecastPort {
  private readonly logger = createLogger({ adapter: 'OpenMeteoAdapter' });
  private readonly baseUrl: string;
  private readonly timezone: string;
  private readonly timeoutMs: number;

  constructor(config: Pick<Config, 'forecastUrl' | 'timezone' | 'httpTimeoutMs'>) {
    this.baseUrl = config.forecastUrl;
    this.timezone = config.timezone;
    this.timeoutMs = config.httpTimeoutMs;
  }

  async getDailyForecast(lat: number, lon: number): Promise<DailyForecast> {
    const logger = this.logger.child({ method: 'getDailyForecast', lat, lon });

    const url = new URL(this.baseUrl);
    url.searchParams.set('latitude', String(lat));
    url.searchParams.set('longitude', String(lon));
    url.searchParams.set('daily', DAILY_FIELDS.join(','));
    url.searchParams.set('timezone', this.timezone);
    url.searchParams.set('forecast_days', '1');
    url.searchParams.set('temperature_unit', 'fahrenheit');
    url.searchParams.set('wind_speed_unit', 'mph');
    url.searchParams.set('precipitation_unit', 'mm');

    logger.info('Fetching daily forecast');

    const body = await fetchJson({ adapter: ADAPTER, url, timeoutMs: this.timeoutMs, logger });

    const parsed = forecastResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues }, 'Unexpected forecast response');
      throw new TransportError(ADAPTER, `${ADAPTER} returned an unexpected response`, {
        cause: parsed.error,
      });
    }

    // forecast_days=1, so index 0 is the requested day
    const { daily } = parsed.data;
    const forecast: DailyForecast = {
      date: daily.time[0],
      tempHighF: daily.temperature_2m_max[0],
      tempLowF: daily.temperature_2m_min[0],
      precipMM: daily.precipitation_sum[0],
      windMaxMPH: daily.wind_speed_10m_max[0],
      weatherCode: daily.weather_code[0],
    };

    logger.info({ date: forecast.date, weatherCode: forecast.weatherCode }, 'Forecast fetched');
    return forecast;
  }
}

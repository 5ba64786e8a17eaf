import type { GeocoderPort, GeoLocation } from '../../ports/GeocoderPort.js';
import type { ForecastPort, DailyForecast } from '../../ports/ForecastPort.js';
import { createLogger } from '../../utils/logger.js';
import { UserNotice } from '../../utils/errors.js';
import { localDateString } from '../../utils/dates.js';
import { weatherCodeLabel } from '../report/weatherCodes.js';

export interface ForecastResult {
  zip: string;
  location: GeoLocation;
  forecast: DailyForecast;
  condition: string;
  notices: UserNotice[];
}

export interface ForecastServiceOptions {
  timezone: string;
  /** Clock used to decide today's local date */
  now?: () => Date;
}

export class ForecastService {
  private readonly logger = createLogger({ service: 'ForecastService' });
  private readonly timezone: string;
  private readonly now: () => Date;

  constructor(
    private readonly geocoder: GeocoderPort,
    private readonly forecastPort: ForecastPort,
    options: ForecastServiceOptions
  ) {
    this.timezone = options.timezone;
    this.now = options.now ?? (() => new Date());
  }

  async run(zip: string): Promise<ForecastResult> {
    const location = await this.geocoder.geocode(zip);
    const forecast = await this.forecastPort.getDailyForecast(location.lat, location.lon);

    const notices: UserNotice[] = [];
    const expected = localDateString(this.timezone, this.now());
    if (forecast.date !== expected) {
      this.logger.warn({ expected, actual: forecast.date }, 'Forecast date mismatch');
      notices.push(
        new UserNotice(
          `Warning: API date mismatch (expected ${expected}, got ${forecast.date})`,
          'DATE_MISMATCH'
        )
      );
    }

    return {
      zip,
      location,
      forecast,
      condition: weatherCodeLabel(forecast.weatherCode),
      notices,
    };
  }
}

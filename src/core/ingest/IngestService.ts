import type { DailyWeatherRecord, WeatherStorePort } from '../../ports/WeatherStorePort.js';
import type { UserNotice } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { ForecastService } from '../forecast/ForecastService.js';

export interface IngestResult {
  record: DailyWeatherRecord;
  notices: UserNotice[];
}

export class IngestService {
  private readonly logger = createLogger({ service: 'IngestService' });

  constructor(
    private readonly forecastService: ForecastService,
    private readonly store: WeatherStorePort
  ) {}

  async run(zip: string): Promise<IngestResult> {
    const { location, forecast, condition, notices } = await this.forecastService.run(zip);

    const record = await this.store.upsert({
      date: forecast.date,
      zip,
      lat: location.lat,
      lon: location.lon,
      condition,
      tempHighF: forecast.tempHighF,
      tempLowF: forecast.tempLowF,
      precipMM: forecast.precipMM,
      windMaxMPH: forecast.windMaxMPH,
    });

    this.logger.info({ zip, date: record.date, condition }, 'Forecast stored');
    return { record, notices };
  }
}

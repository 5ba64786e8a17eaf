import type { WeatherStorePort } from '../../ports/WeatherStorePort.js';
import { createLogger } from '../../utils/logger.js';
import { exportRecord, type WeatherExport } from './JsonExporter.js';

export class ExportService {
  private readonly logger = createLogger({ service: 'ExportService' });

  constructor(private readonly store: WeatherStorePort) {}

  /** Stored record for (zip, date) in export shape, or null when nothing was ingested. */
  async run(zip: string, date: string): Promise<WeatherExport | null> {
    const record = await this.store.get(zip, date);
    if (!record) {
      this.logger.info({ zip, date }, 'No stored record');
      return null;
    }
    return exportRecord(record);
  }
}

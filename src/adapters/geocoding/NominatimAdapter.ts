import { z } from 'zod';
import type { GeocoderPort, GeoLocation } from '../../ports/GeocoderPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { fetchJson } from '../../utils/http.js';
import { NotFoundError, TransportError } from '../../utils/errors.js';

const ADAPTER = 'Nominatim';

// Nominatim serialises coordinates as strings
const coordinate = (min: number, max: number) =>
  z
    .union([z.string(), z.number()])
    .transform((value) => Number(value))
    .pipe(z.number().finite().min(min).max(max));

const searchResultSchema = z.array(
  z.object({
    lat: coordinate(-90, 90),
    lon: coordinate(-180, 180),
    display_name: z.string().optional(),
  })
);

export class NominatimAdapter implements GeocoderPort {
  private readonly logger = createLogger({ adapter: 'NominatimAdapter' });
  private readonly baseUrl: string;
  private readonly country: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;

  constructor(config: Pick<Config, 'geocoderUrl' | 'country' | 'userAgent' | 'httpTimeoutMs'>) {
    this.baseUrl = config.geocoderUrl;
    this.country = config.country;
    this.userAgent = config.userAgent;
    this.timeoutMs = config.httpTimeoutMs;
  }

  async geocode(postalCode: string): Promise<GeoLocation> {
    const logger = this.logger.child({ method: 'geocode', postalCode });

    const url = new URL(this.baseUrl);
    url.searchParams.set('postalcode', postalCode);
    url.searchParams.set('country', this.country);
    url.searchParams.set('format', 'json');

    logger.info('Geocoding postal code');

    const body = await fetchJson({
      adapter: ADAPTER,
      url,
      timeoutMs: this.timeoutMs,
      headers: { 'User-Agent': this.userAgent },
      logger,
    });

    const parsed = searchResultSchema.safeParse(body);
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues }, 'Unexpected geocoding response');
      throw new TransportError(ADAPTER, `${ADAPTER} returned an unexpected response`, {
        cause: parsed.error,
      });
    }

    const [match] = parsed.data;
    if (!match) {
      throw new NotFoundError(ADAPTER, `ZIP code not found: ${postalCode}`);
    }

    const location: GeoLocation = { lat: match.lat, lon: match.lon };
    if (match.display_name) location.displayName = match.display_name;

    logger.info({ lat: location.lat, lon: location.lon }, 'Postal code geocoded');
    return location;
  }
}

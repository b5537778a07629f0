import { z } from 'zod';
import {
  classifyAqi,
  dangerLevel,
  type AqiCategory,
  type DangerLevel,
} from '../../domain/airQuality/aqi.js';
import { createLogger } from '../logger.js';

export const POLLUTANTS = ['pm25', 'pm10', 'o3', 'no2', 'so2', 'co'] as const;

export type Pollutant = (typeof POLLUTANTS)[number];

export interface AirQualityReport {
  city: string;
  aqi: number | null;
  station: string;
  coordinates: [number, number] | null;
  category: AqiCategory;
  dangerLevel: DangerLevel;
  pollutants: Record<Pollutant, number | null>;
  temperature: number | null;
  humidity: number | null;
  pressure: number | null;
  measuredAt: string | null;
}

export type AirQualityFailure = 'timeout' | 'network' | 'http' | 'malformed' | 'rejected';

export class AirQualityApiError extends Error {
  constructor(
    public readonly reason: AirQualityFailure,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'AirQualityApiError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface AirQualityClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

const log = createLogger('air-quality');

const measurement = z.object({ v: z.number() }).optional();

const envelopeSchema = z.object({
  status: z.string(),
  data: z.unknown(),
});

// The feed reports "-" for stations without a current index.
const feedDataSchema = z.object({
  aqi: z.union([z.number(), z.string()]).optional(),
  city: z
    .object({
      name: z.string().optional(),
      geo: z.array(z.number()).optional(),
    })
    .optional(),
  iaqi: z.record(measurement).optional(),
  time: z.object({ s: z.string().optional() }).optional(),
});

type FeedData = z.infer<typeof feedDataSchema>;

function toReport(city: string, data: FeedData): AirQualityReport {
  const aqi = typeof data.aqi === 'number' ? data.aqi : null;
  const iaqi = data.iaqi ?? {};
  const reading = (key: string): number | null => iaqi[key]?.v ?? null;
  const geo = data.city?.geo;

  return {
    city,
    aqi,
    station: data.city?.name || 'Unknown',
    coordinates: geo && geo.length >= 2 ? [geo[0], geo[1]] : null,
    category: classifyAqi(aqi),
    dangerLevel: dangerLevel(aqi),
    pollutants: {
      pm25: reading('pm25'),
      pm10: reading('pm10'),
      o3: reading('o3'),
      no2: reading('no2'),
      so2: reading('so2'),
      co: reading('co'),
    },
    temperature: reading('t'),
    humidity: reading('h'),
    pressure: reading('p'),
    measuredAt: data.time?.s ?? null,
  };
}

// fetch rejects with a DOMException when the timeout signal fires.
function isAbort(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

function describeRejection(data: unknown): string {
  return typeof data === 'string' && data.length > 0 ? data : 'invalid response';
}

/**
 * Client for the WAQI city feed.
 */
export class AirQualityClient {
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: AirQualityClientOptions) {
    this.fetchFn = options.fetch ?? fetch;
  }

  async fetchCity(city: string): Promise<AirQualityReport> {
    const name = city.trim();
    if (!name) {
      throw new AirQualityApiError('rejected', 'City name is required');
    }

    const base = this.options.baseUrl.replace(/\/+$/, '');
    const url = new URL(`${base}/feed/${encodeURIComponent(name)}/`);
    url.searchParams.set('token', this.options.token);

    let res: Response;
    try {
      res = await this.fetchFn(url.toString(), {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      log.warn('Air quality request failed', { city: name, error });
      if (isAbort(error)) {
        throw new AirQualityApiError('timeout', 'The air quality service did not respond in time', {
          cause: error,
        });
      }
      throw new AirQualityApiError('network', 'Could not connect to the air quality service', {
        cause: error,
      });
    }

    if (!res.ok) {
      log.warn('Air quality service returned an error status', { city: name, status: res.status });
      throw new AirQualityApiError('http', `Air quality service responded with HTTP ${res.status}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (error) {
      throw new AirQualityApiError('malformed', 'Air quality service returned invalid JSON', {
        cause: error,
      });
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new AirQualityApiError('malformed', 'Air quality service returned an unexpected payload', {
        cause: envelope.error,
      });
    }

    if (envelope.data.status !== 'ok') {
      log.warn('Air quality request rejected', { city: name, status: envelope.data.status });
      throw new AirQualityApiError(
        'rejected',
        `Air quality service rejected the request: ${describeRejection(envelope.data.data)}`
      );
    }

    const data = feedDataSchema.safeParse(envelope.data.data);
    if (!data.success) {
      log.warn('Unexpected air quality payload', { city: name, issues: data.error.errors.length });
      throw new AirQualityApiError('malformed', 'Air quality service returned an unexpected payload', {
        cause: data.error,
      });
    }

    log.debug('Air quality report fetched', { city: name });
    return toReport(name, data.data);
  }
}

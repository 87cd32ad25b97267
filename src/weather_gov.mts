import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { Histogram } from 'prom-client';
import { z } from 'zod';

import { FetchError } from './errors.mjs';
import { time } from './monitor.mjs';
import { Observation, ObservationField } from './observation.mjs';
import { parseTimestamp } from './time_util.mjs';
import { normalize } from './units.mjs';

const WEATHER_GOV_HOST = 'api.weather.gov';
const DEFAULT_TIMEOUT_MS = 10000;

const fetchDuration = new Histogram({
  name: 'weather_upstream_fetch_duration_seconds',
  help: 'Time spent fetching the latest station observation.'
});

const quantitySchema = z.object({
  unitCode: z.string(),
  value: z.number().nullish()
}).nullish();

const latestObservationSchema = z.object({
  properties: z.object({
    timestamp: z.string(),
    temperature: quantitySchema,
    relativeHumidity: quantitySchema,
    windSpeed: quantitySchema,
    windDirection: quantitySchema,
    barometricPressure: quantitySchema
  })
});

type Quantity = z.infer<typeof quantitySchema>;
export type LatestObservationResponse = z.infer<typeof latestObservationSchema>;

export type FetchResult =
  | { ok: true; observation: Observation }
  | { ok: false; error: FetchError };

export interface UpstreamClient {
  fetch(): Promise<FetchResult>;
}

export interface WeatherGovOptions {
  /** NWS station identifier, e.g. `KNYC`. Ignored when `url` is given. */
  station?: string;
  /** Full URL of the latest-observation endpoint. */
  url?: string;
  /** Identifies the exporter and its operator to the API. */
  userAgent: string;
  timeoutMs?: number;
  http?: Pick<AxiosInstance, 'get'>;
}

export function stationUrl(station: string): string {
  return `https://${WEATHER_GOV_HOST}/stations/` +
    `${encodeURIComponent(station)}/observations/latest`;
}

/** Client for the latest observation of a single weather.gov station. */
export class WeatherGov implements UpstreamClient {
  readonly url: string;
  private readonly _userAgent: string;
  private readonly _timeoutMs: number;
  private readonly _http: Pick<AxiosInstance, 'get'>;

  constructor({ station, url, userAgent, timeoutMs, http }: WeatherGovOptions) {
    if (!url && !station) {
      throw new TypeError('Either a station or an observation URL is required.');
    }
    this.url = url ?? stationUrl(station ?? '');
    this._userAgent = userAgent;
    this._timeoutMs = timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this._http = http ?? axios;
  }

  async fetch(): Promise<FetchResult> {
    let res: AxiosResponse<unknown>;
    try {
      res = await time(fetchDuration, () => this._http.get<unknown>(this.url, {
        headers: {
          'User-Agent': this._userAgent,
          Accept: 'application/geo+json'
        },
        timeout: this._timeoutMs,
        validateStatus: () => true
      }));
    } catch (err) {
      return failure(classifyRequestError(err));
    }

    if (res.status < 200 || res.status > 299) {
      return failure(new FetchError(
        'bad_status',
        `Failed to get ${this.url}: ${res.status}`
      ));
    }
    return parseLatestObservation(res.data);
  }
}

/**
 * Validates a latest-observation payload and normalizes it into an
 * `Observation`.
 */
export function parseLatestObservation(data: unknown): FetchResult {
  const parsed = latestObservationSchema.safeParse(data);
  if (!parsed.success) {
    return failure(new FetchError(
      'parse',
      `Malformed observation: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      { cause: parsed.error }
    ));
  }

  const { properties } = parsed.data;
  const observedAt = parseTimestamp(properties.timestamp);
  if (observedAt === undefined) {
    return failure(new FetchError(
      'parse',
      `Invalid observation timestamp: ${properties.timestamp}`
    ));
  }

  const quantity = (field: ObservationField, q: Quantity): number | null =>
    q ? normalize(field, q.unitCode, q.value ?? null) : null;

  return {
    ok: true,
    observation: {
      temperature: quantity('temperature', properties.temperature),
      relativeHumidity:
        quantity('relativeHumidity', properties.relativeHumidity),
      windSpeed: quantity('windSpeed', properties.windSpeed),
      windDirection: quantity('windDirection', properties.windDirection),
      barometricPressure:
        quantity('barometricPressure', properties.barometricPressure),
      observedAt
    }
  };
}

function classifyRequestError(err: unknown): FetchError {
  if (axios.isAxiosError(err)) {
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
      return new FetchError('timeout', err.message, { cause: err });
    }
    return new FetchError('network', err.message, { cause: err });
  }
  return new FetchError('network', `${err}`, { cause: err });
}

function failure(error: FetchError): FetchResult {
  return { ok: false, error };
}

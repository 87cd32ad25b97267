import { Gauge, Registry } from 'prom-client';

import { EncodingError } from './errors.mjs';
import { ObservationField } from './observation.mjs';
import { CacheEntry } from './observation_cache.mjs';
import { Clock, monotonicClock } from './time_util.mjs';

export interface MetricDescriptor {
  readonly field: ObservationField;
  readonly name: string;
  readonly help: string;
  readonly unit: string;
}

export const STALENESS_METRIC = 'weather_last_fetch_age_seconds';

export const METRIC_DESCRIPTORS: readonly MetricDescriptor[] = Object.freeze([
  {
    field: 'temperature',
    name: 'weather_temperature_celsius',
    help: 'Air temperature at the station',
    unit: 'degrees Celsius'
  },
  {
    field: 'relativeHumidity',
    name: 'weather_relative_humidity_percent',
    help: 'Relative humidity at the station',
    unit: 'percent'
  },
  {
    field: 'windSpeed',
    name: 'weather_wind_speed_kilometers_per_hour',
    help: 'Sustained wind speed at the station',
    unit: 'kilometers per hour'
  },
  {
    field: 'windDirection',
    name: 'weather_wind_direction_degrees',
    help: 'Direction the wind blows from, clockwise from true north',
    unit: 'degrees'
  },
  {
    field: 'barometricPressure',
    name: 'weather_barometric_pressure_pascals',
    help: 'Barometric pressure at the station',
    unit: 'pascals'
  }
] as const);

/** Renders cache entries into the Prometheus text exposition format. */
export class MetricsRegistry {
  constructor(
    private readonly _clock: Clock = monotonicClock,
    private readonly _descriptors: readonly MetricDescriptor[] =
      METRIC_DESCRIPTORS
  ) { }

  /**
   * Produces the exposition text for `entry`.
   *
   * Fields without a value are left out. Without an entry the result holds no
   * metrics at all.
   */
  async render(entry: CacheEntry | undefined): Promise<string> {
    try {
      const registry = new Registry();
      if (entry) {
        for (const { field, name, help, unit } of this._descriptors) {
          const value = entry.observation[field];
          if (value === null) continue;
          new Gauge({
            name,
            help: `${help}, in ${unit}.`,
            registers: [registry]
          }).set(value);
        }
        new Gauge({
          name: STALENESS_METRIC,
          help: 'Seconds since the last successful upstream fetch.',
          registers: [registry]
        }).set(Math.max(0, this._clock() - entry.fetchAt));
      }
      return await registry.metrics();
    } catch (err) {
      throw new EncodingError('Failed to render weather metrics.', {
        cause: err
      });
    }
  }
}

import { Counter } from 'prom-client';

import { logger } from './logging.mjs';
import { ObservationField } from './observation.mjs';

type Conversion = (value: number) => number;

const identity: Conversion = (value) => value;

const conversionFailures = new Counter({
  name: 'weather_unit_conversion_failures_total',
  help: 'Upstream quantities dropped because their unit is not convertible.',
  labelNames: ['field']
});

// Keyed by the WMO unit code with its `wmoUnit:` or `unit:` prefix removed.
const CONVERSIONS: Record<ObservationField, Record<string, Conversion>> = {
  temperature: {
    degC: identity,
    degF: (f) => (f - 32) * 5 / 9,
    K: (k) => k - 273.15
  },
  relativeHumidity: {
    percent: identity
  },
  windSpeed: {
    'km_h-1': identity,
    'm_s-1': (ms) => ms * 3.6,
    kn: (kn) => kn * 1.852
  },
  windDirection: {
    'degree_(angle)': identity
  },
  barometricPressure: {
    Pa: identity,
    hPa: (hpa) => hpa * 100
  }
};

/** Strips the namespace prefix from a unit code, e.g. `wmoUnit:degC`. */
export function unitName(unitCode: string): string {
  const separator = unitCode.lastIndexOf(':');
  return separator === -1 ? unitCode : unitCode.slice(separator + 1);
}

/**
 * Converts an upstream quantity into the unit the exporter publishes for
 * `field`.
 *
 * Returns `null` for a missing value or an unrecognized unit.
 */
export function normalize(
  field: ObservationField,
  unitCode: string,
  value: number | null
): number | null {
  if (value === null) return null;
  const unit = unitName(unitCode);
  const table = CONVERSIONS[field];
  const convert = Object.hasOwn(table, unit) ? table[unit] : undefined;
  if (!convert) {
    conversionFailures.inc({ field });
    logger.warn('Dropping quantity with unknown unit.', { field, unitCode });
    return null;
  }
  return convert(value);
}

type Celsius = number;
type Percent100 = number; // 0 - 100
type KilometersPerHour = number;
type Degrees = number;    // 0 - 360
type Pascals = number;
type Timestamp = number;  // unix seconds

/**
 * A single normalized station observation.
 *
 * Measurements are `null` when the station did not report them.
 */
export interface Observation {
  readonly temperature: Celsius | null;
  readonly relativeHumidity: Percent100 | null;
  readonly windSpeed: KilometersPerHour | null;
  readonly windDirection: Degrees | null;
  readonly barometricPressure: Pascals | null;
  readonly observedAt: Timestamp;
}

export type ObservationField = Exclude<keyof Observation, 'observedAt'>;

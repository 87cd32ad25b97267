import { Counter } from 'prom-client';

import { logger } from './logging.mjs';
import { Observation } from './observation.mjs';
import { formatTimestamp } from './time_util.mjs';

const cacheWriteCounter = new Counter({
  name: 'weather_cache_writes_total',
  help: 'Count of observations written to the cache.'
});

export interface CacheEntry {
  readonly observation: Observation;
  /** Monotonic clock reading, in seconds, when the observation arrived. */
  readonly fetchAt: number;
}

/**
 * Single-slot holder for the most recent successfully fetched observation.
 *
 * Entries are frozen and replaced whole, so a reader holding an entry never
 * sees it change. Entries never expire; staleness is judged by the caller.
 */
export class ObservationCache {
  private _entry?: CacheEntry;

  get(): CacheEntry | undefined {
    return this._entry;
  }

  set(observation: Observation, fetchAt: number): CacheEntry {
    const previous = this._entry?.observation.observedAt;
    if (previous !== undefined && observation.observedAt < previous) {
      logger.warn('Observation timestamp went backwards.', {
        previous: formatTimestamp(previous),
        current: formatTimestamp(observation.observedAt)
      });
    }
    const entry: CacheEntry = Object.freeze({
      observation: Object.freeze({ ...observation }),
      fetchAt
    });
    this._entry = entry;
    cacheWriteCounter.inc();
    return entry;
  }

  /** Seconds elapsed since the current entry was fetched. */
  age(now: number): number | undefined {
    return this._entry ? now - this._entry.fetchAt : undefined;
  }
}

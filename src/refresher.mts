import { Counter } from 'prom-client';

import { logger } from './logging.mjs';
import { ObservationCache } from './observation_cache.mjs';
import { Clock, formatTimestamp, monotonicClock } from './time_util.mjs';
import { UpstreamClient } from './weather_gov.mjs';

export type RefreshMode = 'on-demand' | 'interval';

export const MIN_INTERVAL_SECONDS = 1;
// Node fires timers longer than a signed 32-bit millisecond count after 1ms.
export const MAX_INTERVAL_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

const fetchFailureCounter = new Counter({
  name: 'weather_upstream_fetch_failures_total',
  help: 'Count of failed upstream observation fetches.',
  labelNames: ['reason']
});

export interface RefresherOptions {
  mode: RefreshMode;
  /**
   * Seconds between fetches in `interval` mode; maximum age of the cached
   * observation before a scrape triggers a fetch in `on-demand` mode.
   */
  intervalSeconds: number;
  clock?: Clock;
}

/**
 * Keeps the observation cache filled from the upstream client.
 *
 * At most one fetch is in flight at a time. Failed fetches are logged and
 * leave the cache untouched.
 */
export class Refresher {
  private readonly _mode: RefreshMode;
  private readonly _intervalSeconds: number;
  private readonly _clock: Clock;
  private _inflight?: Promise<boolean>;
  private _timer?: NodeJS.Timeout;

  constructor(
    private readonly _client: UpstreamClient,
    private readonly _cache: ObservationCache,
    { mode, intervalSeconds, clock }: RefresherOptions
  ) {
    if (
      !(intervalSeconds >= MIN_INTERVAL_SECONDS) ||
      !(intervalSeconds <= MAX_INTERVAL_SECONDS)
    ) {
      throw new RangeError(
        `Refresh interval must be between ${MIN_INTERVAL_SECONDS} and ` +
        `${MAX_INTERVAL_SECONDS} seconds, got ${intervalSeconds}.`
      );
    }
    this._mode = mode;
    this._intervalSeconds = intervalSeconds;
    this._clock = clock ?? monotonicClock;
  }

  get mode(): RefreshMode {
    return this._mode;
  }

  /**
   * Fetches a new observation, joining the fetch already in flight if there
   * is one.
   *
   * Resolves to `true` when the cache was updated.
   */
  refresh(): Promise<boolean> {
    if (!this._inflight) {
      this._inflight = this._refreshOnce().finally(() => {
        this._inflight = undefined;
      });
    }
    return this._inflight;
  }

  /**
   * Prepares the cache for a scrape.
   *
   * In `on-demand` mode an empty cache is filled before returning, and a stale
   * one is refreshed in the background while the scrape serves the old entry.
   */
  async beforeScrape(): Promise<void> {
    if (this._mode !== 'on-demand') return;
    const age = this._cache.age(this._clock());
    if (age === undefined) {
      await this.refresh();
    } else if (age >= this._intervalSeconds) {
      this.refresh().catch((error: unknown) => {
        logger.error('Background refresh failed.', { error });
      });
    }
  }

  /** Starts periodic fetching in `interval` mode. */
  start() {
    if (this._mode !== 'interval' || this._timer) return;
    const tick = () => {
      this.refresh().catch((error: unknown) => {
        logger.error('Scheduled refresh failed.', { error });
      });
    };
    this._timer = setInterval(tick, this._intervalSeconds * 1000);
    tick();
  }

  async stop() {
    if (this._timer) {
      clearInterval(this._timer);
      this._timer = undefined;
    }
    await this._inflight;
  }

  private async _refreshOnce(): Promise<boolean> {
    const result = await this._client.fetch();
    if (!result.ok) {
      const { reason, message } = result.error;
      fetchFailureCounter.inc({ reason });
      logger.warn('Failed to refresh weather observation.', {
        reason,
        error: message,
        cachedAge: this._cache.age(this._clock())
      });
      return false;
    }
    const entry = this._cache.set(result.observation, this._clock());
    logger.info('Refreshed weather observation.', {
      observedAt: formatTimestamp(entry.observation.observedAt)
    });
    return true;
  }
}

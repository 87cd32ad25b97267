#!/usr/bin/env node
import { loadConfig } from './config.mjs';
import { logger } from './logging.mjs';
import { MetricsRegistry } from './metrics_registry.mjs';
import { Monitor } from './monitor.mjs';
import { ObservationCache } from './observation_cache.mjs';
import { InvertedPromise } from './promises.mjs';
import { Refresher } from './refresher.mjs';
import { WeatherGov } from './weather_gov.mjs';

const config = loadConfig();

const cache = new ObservationCache();
const weather = new WeatherGov({
  station: config.station,
  url: config.stationUrl,
  userAgent: config.userAgent,
  timeoutMs: config.fetchTimeoutMs
});
const refresher = new Refresher(weather, cache, {
  mode: config.refreshMode,
  intervalSeconds: config.refreshIntervalSeconds
});
const metrics = new MetricsRegistry();
const monitor = new Monitor({
  port: config.port,
  hostname: config.hostname,
  labels: { app: 'weather-exporter' },
  exposition: async () => {
    await refresher.beforeScrape();
    return metrics.render(cache.get());
  }
});

await monitor.listening();
logger.info('Exporting station observations.', {
  url: weather.url,
  mode: refresher.mode,
  intervalSeconds: config.refreshIntervalSeconds
});
refresher.start();

const shutdown = new InvertedPromise<NodeJS.Signals>();
process.once('SIGINT', shutdown.resolve);
process.once('SIGTERM', shutdown.resolve);
const signal = await shutdown.promise;

logger.info('Shutting down.', { signal });
await refresher.stop();
await monitor.close();

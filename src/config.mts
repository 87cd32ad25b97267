import { z } from 'zod';

import {
  MAX_INTERVAL_SECONDS,
  MIN_INTERVAL_SECONDS,
  RefreshMode
} from './refresher.mjs';

const DEFAULT_STATION = 'KNYC';
const DEFAULT_USER_AGENT = 'weather-exporter (admin@example.com)';

const envSchema = z.object({
  WEATHER_STATION: z.string().trim().min(1).default(DEFAULT_STATION),
  WEATHER_STATION_URL: z.string().url().optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  LISTEN_HOST: z.string().min(1).default('0.0.0.0'),
  REFRESH_MODE: z.enum(['on-demand', 'interval']).default('on-demand'),
  REFRESH_INTERVAL_SECONDS: z.coerce.number()
    .min(MIN_INTERVAL_SECONDS)
    .max(MAX_INTERVAL_SECONDS)
    .default(300),
  FETCH_TIMEOUT_SECONDS: z.coerce.number().positive().default(10),
  USER_AGENT: z.string().trim().min(1).default(DEFAULT_USER_AGENT)
});

export interface Config {
  station: string;
  stationUrl?: string;
  port: number;
  hostname: string;
  refreshMode: RefreshMode;
  refreshIntervalSeconds: number;
  fetchTimeoutMs: number;
  userAgent: string;
}

/**
 * Reads the exporter configuration from environment variables.
 *
 * Empty variables count as unset. Throws when a variable is set to an
 * invalid value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(({ path, message }) => `${path.join('.')}: ${message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const vars = parsed.data;
  return {
    station: vars.WEATHER_STATION,
    stationUrl: vars.WEATHER_STATION_URL,
    port: vars.PORT,
    hostname: vars.LISTEN_HOST,
    refreshMode: vars.REFRESH_MODE,
    refreshIntervalSeconds: vars.REFRESH_INTERVAL_SECONDS,
    fetchTimeoutMs: vars.FETCH_TIMEOUT_SECONDS * 1000,
    userAgent: vars.USER_AGENT
  };
}

import axios from 'axios';
import { Histogram } from 'prom-client';
import { afterAll, afterEach, beforeAll, describe, expect, test } from 'vitest';

import { Monitor, time } from './monitor.mjs';
import { InvertedPromise } from './promises.mjs';

describe('time', () => {
  const metric = new Histogram({ name: 'test_metric', help: 'for testing' });
  afterEach(() => metric.reset());

  async function getTotalCount<T extends string>(
    metric: Histogram<T>
  ): Promise<number> {
    const countMetric = (await metric.get())
      .values.find(({ metricName }) => /_count$/.test(metricName ?? ''));
    return countMetric?.value ?? 0;
  }

  test('measures synchronous execution', async () => {
    time(metric, () => { });
    expect(await getTotalCount(metric)).toEqual(1);
    time(metric, () => { });
    expect(await getTotalCount(metric)).toEqual(2);
  });

  test('measures synchronous failures', async () => {
    expect(() => time(metric, () => { throw new Error('oops'); }))
      .toThrowError('oops');
    expect(await getTotalCount(metric)).toEqual(1);
  });

  test('measures asynchronous execution', async () => {
    const deferred = new InvertedPromise<void>();
    const prom = time(metric, () => deferred.promise);
    expect(await getTotalCount(metric)).toEqual(0);
    deferred.resolve();
    await prom;
    expect(await getTotalCount(metric)).toEqual(1);
  });

  test('measures asynchronous failures', async () => {
    await expect(time(
      metric,
      () => Promise.reject(new Error('oops'))
    )).rejects.toThrowError('oops');
    expect(await getTotalCount(metric)).toEqual(1);
  });

  test('returns the function result', async () => {
    expect(time(metric, () => 42)).toEqual(42);
    expect(await time(metric, () => Promise.resolve('done'))).toEqual('done');
  });
});

describe('Monitor', () => {
  let respond: () => Promise<string> = async () => '';
  let monitor: Monitor;
  let baseUrl: string;

  beforeAll(async () => {
    monitor = new Monitor({
      port: 0,
      hostname: '127.0.0.1',
      labels: { app: 'test' },
      exposition: () => respond()
    });
    const { port } = await monitor.listening();
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(() => monitor.close());

  afterEach(() => {
    respond = async () => '';
  });

  function get(path: string) {
    return axios.get<string>(`${baseUrl}${path}`, {
      responseType: 'text',
      validateStatus: () => true
    });
  }

  test('serves the weather exposition on /', async () => {
    respond = async () => 'weather_temperature_celsius 21.5\n';
    const res = await get('/');
    expect(res.status).toEqual(200);
    expect(res.headers['content-type'])
      .toEqual('text/plain; version=0.0.4; charset=utf-8');
    expect(res.data).toEqual('weather_temperature_celsius 21.5\n');
  });

  test('ignores query strings', async () => {
    respond = async () => 'weather_wind_direction_degrees 230\n';
    const res = await get('/?station=KNYC');
    expect(res.status).toEqual(200);
    expect(res.data).toEqual('weather_wind_direction_degrees 230\n');
  });

  test('serves an empty exposition with status 200', async () => {
    respond = async () => '\n';
    const res = await get('/');
    expect(res.status).toEqual(200);
    expect(res.data).toEqual('\n');
  });

  test('serves process metrics on /metrics', async () => {
    const res = await get('/metrics');
    expect(res.status).toEqual(200);
    expect(res.data.split('\n'))
      .toContain('# TYPE process_cpu_user_seconds_total counter');
  });

  test('answers liveness checks', async () => {
    const res = await get('/healthz');
    expect(res.status).toEqual(200);
    expect(res.data).toEqual('ok');
  });

  test('responds 404 to unknown paths', async () => {
    const res = await get('/forecast');
    expect(res.status).toEqual(404);
    expect(res.data).toEqual('Not found');
  });

  test('rejects methods other than GET', async () => {
    const res = await axios.post<string>(`${baseUrl}/`, 'x', {
      responseType: 'text',
      validateStatus: () => true
    });
    expect(res.status).toEqual(405);
    expect(res.headers['allow']).toEqual('GET, HEAD');
  });

  test('responds 500 when rendering fails', async () => {
    respond = async () => { throw new Error('boom'); };
    const res = await get('/');
    expect(res.status).toEqual(500);
    expect(res.data).toEqual('Error: boom');
  });
});

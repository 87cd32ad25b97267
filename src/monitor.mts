import { Server, ServerResponse, createServer } from 'node:http';
import { AddressInfo } from 'node:net';
import { Histogram, collectDefaultMetrics, register } from 'prom-client';

import { logger } from './logging.mjs';

const DEFAULT_PORT = 5000;
const DEFAULT_HOSTNAME = '0.0.0.0';

let defaultMetricsCollected = false;

interface MonitorOptions {
  /** Produces the exposition body served on `/`. */
  exposition: () => Promise<string>;
  port?: number;
  hostname?: string;
  labels?: { [key: string]: string };
}

/**
 * HTTP server publishing the weather exposition on `/` and the exporter's own
 * process metrics on `/metrics`.
 */
export class Monitor {
  private readonly _server: Server;
  private readonly _listeningProm: Promise<AddressInfo>;
  private readonly _exposition: () => Promise<string>;
  private _closeProm?: Promise<void>;

  constructor({ exposition, port, hostname, labels }: MonitorOptions) {
    port = port ?? DEFAULT_PORT;
    hostname = hostname ?? DEFAULT_HOSTNAME;
    this._exposition = exposition;
    this._server = this._startServer();
    this._listeningProm = (new Promise<void>((resolve, reject) => {
      this._server.once('error', reject);
      this._server.listen(port, hostname, resolve);
    })).then(() => {
      const address = this._server.address();
      if (address === null || typeof address === 'string') {
        throw new Error(`Unexpected server address: ${address}`);
      }
      logger.info('Metrics server listening.', { port: address.port, hostname });
      return address;
    }, (error: unknown) => {
      logger.error(
        'Failed to start metrics server.',
        { port, hostname, error }
      );
      throw error;
    });
    if (!defaultMetricsCollected) {
      collectDefaultMetrics({ labels });
      defaultMetricsCollected = true;
    }
  }

  /** Resolves with the bound address once the server accepts connections. */
  listening(): Promise<AddressInfo> {
    return this._listeningProm;
  }

  async close() {
    if (!this._closeProm) {
      this._closeProm = this._listeningProm.then(() => new Promise<void>(
        (resolve, reject) => {
          this._server.close((err) => err ? reject(err) : resolve());
        }
      ));
    }
    await this._closeProm;
  }

  private _startServer(): Server {
    return createServer(async (req, res) => {
      try {
        const { pathname } = new URL(req.url ?? '/', 'http://localhost');
        if (req.method !== 'GET' && req.method !== 'HEAD') {
          res.statusCode = 405;
          res.setHeader('Allow', 'GET, HEAD');
          await end(res, 'Method not allowed');
          return;
        }
        if (pathname === '/') {
          logger.debug('Rendering weather metrics.');
          const body = await this._exposition();
          res.setHeader('Content-Type', register.contentType);
          await end(res, body);
          return;
        }
        if (pathname === '/metrics') {
          logger.debug('Retrieving process metrics.');
          res.setHeader('Content-Type', register.contentType);
          await end(res, await register.metrics());
          return;
        }
        if (pathname === '/healthz') {
          res.setHeader('Content-Type', 'text/plain');
          await end(res, 'ok');
          return;
        }
        logger.warn('Unknown request to metrics service.', { url: req.url });
        res.statusCode = 404;
        await end(res, 'Not found');
      } catch (err) {
        logger.error('Failed to serve metrics.', { url: req.url, error: err });
        res.statusCode = 500;
        await end(res, `${err}`);
      }
    });
  }
}

/**
 * Calls the given function and records its execution time in the provided
 * metric.
 *
 * Duration is recorded in floating seconds. Promises are timed until they
 * settle, whether they resolve or reject.
 */
export function time<T>(metric: Histogram, func: () => T): T {
  const endTimer = metric.startTimer();
  let pending = false;
  try {
    let res = func();
    if (res instanceof Promise) {
      res = res.finally(() => endTimer()) as T;
      pending = true;
    }
    return res;
  } finally {
    if (!pending) endTimer();
  }
}

function end(stream: ServerResponse, body: string): Promise<void> {
  return new Promise<void>((resolve) => {
    stream.end(body, resolve);
  });
}

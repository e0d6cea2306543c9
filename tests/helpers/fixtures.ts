import { Express } from 'express';
import { EventMeta } from '../../src/types/event';
import { OverlayResult } from '../../src/types/overlay';
import { OverlayOptions, computeOverlayFromEvent } from '../../src/overlay/overlay-computer';

/**
 * Shared test fixtures: events, a tiny overlay grid, deferred promises and an
 * in-process HTTP server for the Express app
 */

export const TINY_GRID: OverlayOptions = {
  radiusDeg: 0.2,
  stepDeg: 0.1,
  minMmi: 2,
};

export function makeEvent(overrides: Partial<EventMeta> = {}): EventMeta {
  return {
    event_id: 'test-evt-1',
    time_utc: '2025-01-05T03:00:00.000Z',
    time_th: '2025-01-05T10:00:00.000+07:00',
    lat: 18.5,
    lon: 98.9,
    depth_km: 12,
    mag: 4.6,
    place: '10 km N of Test Town',
    source: 'usgs',
    ...overrides,
  };
}

export const EVENT_A = makeEvent();
export const EVENT_A_KEY = '2025-01-05T03:00:00.000Z|18.5|98.9|4.6|12';

export const EVENT_B = makeEvent({
  event_id: 'test-evt-2',
  time_utc: '2025-01-06T12:30:00.000Z',
  time_th: '2025-01-06T19:30:00.000+07:00',
  lat: 19.1,
  lon: 99.2,
  depth_km: 8,
  mag: 5.1,
});
export const EVENT_B_KEY = '2025-01-06T12:30:00.000Z|19.1|99.2|5.1|8';

export function tinyOverlay(event: EventMeta): OverlayResult {
  return computeOverlayFromEvent(event, TINY_GRID, new Date('2025-01-07T00:00:00.000Z'));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export interface RunningServer {
  baseUrl: string;
  close: () => Promise<void>;
}

export function startServer(app: Express): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('server did not bind to a TCP port'));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () => new Promise<void>((done, fail) => {
          server.closeAllConnections();
          server.close(err => (err ? fail(err) : done()));
        }),
      });
    });
  });
}

import { describe, it, expect, vi } from 'vitest';
import { CouchEndpoint } from '../../src/lib/couch/endpoint.js';
import { ReplicationMonitor, stallTicks } from '../../src/lib/monitor/index.js';
import type { ProgressSink } from '../../src/lib/progress/types.js';
import { TransportError } from '../../src/utils/errors.js';
import {
  FakeCouch,
  SOURCE,
  TARGET,
  info,
  instantSleep,
  notFound,
  status,
} from '../helpers/fake-couch.js';

class RecordingSink implements ProgressSink {
  readonly updates: [number, number][] = [];
  stops = 0;

  update(current: number, max: number): void {
    this.updates.push([current, max]);
  }

  stop(): void {
    this.stops++;
  }
}

function createMonitor(
  fake: FakeCouch,
  overrides: { stallTimeoutSeconds?: number; progress?: ProgressSink; sleep?: () => Promise<void> } = {},
): ReplicationMonitor {
  return new ReplicationMonitor({
    source: new CouchEndpoint({ url: SOURCE, http: fake }),
    target: new CouchEndpoint({ url: TARGET, http: fake }),
    stallTimeoutSeconds: overrides.stallTimeoutSeconds ?? 10,
    pollIntervalMs: 1000,
    progress: overrides.progress,
    sleep: overrides.sleep ?? instantSleep,
  });
}

describe('stallTicks()', () => {
  it('should equal the timeout in seconds at a one second cadence', () => {
    expect(stallTicks(300, 1000)).toBe(300);
  });

  it('should round up for slower polling', () => {
    expect(stallTicks(5, 2000)).toBe(3);
  });

  it('should never be below one tick', () => {
    expect(stallTicks(1, 5000)).toBe(1);
  });
});

describe('ReplicationMonitor', () => {
  it('should complete without polling the target when the source holds no data', async () => {
    const fake = new FakeCouch().on('GET', `${SOURCE}/orders`, info(100, 0));

    const result = await createMonitor(fake).watch('orders');

    expect(result.status).toBe('completed');
    expect(fake.callsTo('GET', `${TARGET}/orders`)).toHaveLength(0);
  });

  it('should report a stall when the doc count stops moving', async () => {
    const fake = new FakeCouch()
      .on('GET', `${SOURCE}/orders`, info(100, 5000))
      .on('GET', `${TARGET}/orders`, info(40, 2000));

    const result = await createMonitor(fake, { stallTimeoutSeconds: 3 }).watch('orders');

    expect(result.status).toBe('stalled');
    expect(result.progress).toEqual({
      targetDocCount: 100,
      observedDocCount: 40,
      observedSize: 2000,
      stallStreak: 3,
      polls: 4,
    });
  });

  it('should count a target that never appears towards the stall', async () => {
    const fake = new FakeCouch()
      .on('GET', `${SOURCE}/orders`, info(100, 5000))
      .on('GET', `${TARGET}/orders`, notFound);

    const result = await createMonitor(fake, { stallTimeoutSeconds: 3 }).watch('orders');

    expect(result.status).toBe('stalled');
    expect(result.progress.polls).toBe(3);
    expect(result.progress.observedDocCount).toBe(0);
  });

  it('should treat a missing target database as empty rather than failing', async () => {
    const fake = new FakeCouch()
      .on('GET', `${SOURCE}/orders`, info(100, 5000))
      .on('GET', `${TARGET}/orders`, notFound, notFound, info(100, 5000));

    const result = await createMonitor(fake).watch('orders');

    expect(result.status).toBe('completed');
    expect(result.progress.polls).toBe(3);
  });

  it('should reset the stall streak whenever the count moves', async () => {
    const fake = new FakeCouch()
      .on('GET', `${SOURCE}/orders`, info(100, 5000))
      .on(
        'GET',
        `${TARGET}/orders`,
        info(10, 500),
        info(10, 500),
        info(20, 1000),
        info(20, 1000),
        info(100, 5000),
      );

    const result = await createMonitor(fake, { stallTimeoutSeconds: 2 }).watch('orders');

    expect(result.status).toBe('completed');
    expect(result.progress.stallStreak).toBe(0);
    expect(result.progress.polls).toBe(5);
  });

  it('should fail with the response body on any other error status', async () => {
    const fake = new FakeCouch()
      .on('GET', `${SOURCE}/orders`, info(100, 5000))
      .on('GET', `${TARGET}/orders`, status(500, { error: 'internal_server_error' }));

    const result = await createMonitor(fake).watch('orders');

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.reason).toBe('{"error":"internal_server_error"}');
    expect(result.error).toBeInstanceOf(TransportError);
    expect(result.error).toMatchObject({ transport: { status: 500 } });
  });

  it('should fail when the target cannot be reached', async () => {
    const fake = new FakeCouch()
      .on('GET', `${SOURCE}/orders`, info(100, 5000))
      .on('GET', `${TARGET}/orders`, () =>
        Promise.reject(
          new TransportError('GET target failed: connect ECONNREFUSED', {
            method: 'GET',
            url: `${TARGET}/orders`,
          }),
        ),
      );

    const result = await createMonitor(fake).watch('orders');

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.reason).toBe('GET target failed: connect ECONNREFUSED');
  });

  it('should reject when the source metadata cannot be read', async () => {
    const fake = new FakeCouch();

    await expect(createMonitor(fake).watch('orders')).rejects.toBeInstanceOf(TransportError);
  });

  it('should report progress clamped to the source size and sleep between polls', async () => {
    const fake = new FakeCouch()
      .on('GET', `${SOURCE}/orders`, info(100, 5000))
      .on('GET', `${TARGET}/orders`, notFound, info(40, 2100), info(100, 5400));
    const sink = new RecordingSink();
    const sleep = vi.fn(instantSleep);

    const result = await createMonitor(fake, { progress: sink, sleep }).watch('orders');

    expect(result.status).toBe('completed');
    expect(sink.updates).toEqual([
      [0, 5000],
      [2100, 5000],
      [5000, 5000],
    ]);
    expect(sink.stops).toBe(1);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000, undefined);
  });

  it('should stop polling once cancelled', async () => {
    const fake = new FakeCouch()
      .on('GET', `${SOURCE}/orders`, info(100, 5000))
      .on('GET', `${TARGET}/orders`, info(40, 2000));
    const controller = new AbortController();
    controller.abort();

    const result = await createMonitor(fake).watch('orders', controller.signal);

    expect(result.status).toBe('cancelled');
    expect(fake.callsTo('GET', `${TARGET}/orders`)).toHaveLength(0);
  });
});

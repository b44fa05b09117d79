// Path: src/services/rotation-client.test.ts

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RotationClient } from './rotation-client.js';
import { createRotationPolicy, type RotationEvent } from './cid-lifecycle/index.js';
import { SimulatedTransportEngine } from '../lib/transport/simulated.js';
import type { RotationEventSink } from '../lib/event-log.js';
import { EventLogError } from '../utils/error.js';

class MemorySink implements RotationEventSink {
  readonly events: RotationEvent[] = [];

  async append(event: RotationEvent): Promise<void> {
    this.events.push(event);
  }
}

describe('RotationClient', () => {
  let now: number;

  beforeEach(() => {
    vi.useFakeTimers();
    now = 0;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function createClient(eventLog: RotationEventSink, autoCloseSeconds = 0) {
    const engine = new SimulatedTransportEngine({ connections: 1, surface: 'manager-issue', autoCloseSeconds });
    const client = new RotationClient({
      engine,
      eventLog,
      policy: createRotationPolicy({ rotateIntervalSeconds: 10, jitterSeconds: 0, minGapSeconds: 5 }),
      tickIntervalMs: 200,
      initialDelayMs: 0,
      clock: () => now,
    });
    return { engine, client };
  }

  it('should rotate its connection with role client', async () => {
    const sink = new MemorySink();
    const { client } = createClient(sink);
    await client.start();
    expect(client.connectionId).toBe('conn-1');

    now = 10;
    await vi.advanceTimersByTimeAsync(200);

    expect(sink.events).toHaveLength(1);
    expect(sink.events[0]).toMatchObject({
      event: 'rotate_ok',
      role: 'client',
      reason: 'timer',
      detail: { strategy: 'cidManager.issueConnectionId()', connectionId: 'conn-1' },
    });
    expect(sink.events[0].detail.issued).toMatch(/^[0-9a-f]{16}$/);

    await client.stop();
  });

  it('should close extra connections', async () => {
    const { engine, client } = createClient(new MemorySink());
    await client.start();

    const extra = engine.openConnection();

    expect(extra.isClosing()).toBe(true);
    expect(client.connectionId).toBe('conn-1');
    await client.stop();
  });

  it('should resolve closed() when the connection ends', async () => {
    const { client } = createClient(new MemorySink(), 3);
    await client.start();

    const onClosed = vi.fn();
    const closed = client.closed().then(onClosed);

    await vi.advanceTimersByTimeAsync(2999);
    expect(onClosed).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await closed;
    expect(onClosed).toHaveBeenCalledTimes(1);

    await client.stop();
  });

  describe('when the event log fails', () => {
    const failing: RotationEventSink = {
      append: async () => {
        throw new EventLogError('/tmp/rotation.jsonl', new Error('disk full'));
      },
    };

    it('should reject a pending closed() with the log error', async () => {
      const { engine, client } = createClient(failing);
      await client.start();
      const closed = client.closed();
      const settled = expect(closed).rejects.toBeInstanceOf(EventLogError);

      now = 10;
      await vi.advanceTimersByTimeAsync(200);

      await settled;
      expect(engine.openCount).toBe(0);
      await client.stop();
    });

    it('should reject closed() called after the connection ended', async () => {
      const { client } = createClient(failing);
      await client.start();

      now = 10;
      await vi.advanceTimersByTimeAsync(200);

      await expect(client.closed()).rejects.toThrow('disk full');
      await client.stop();
    });
  });
});

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { VectorClock } from '@driftsync/core';
import { InMemoryTransportHub, type DeliveryFailure, type SyncEndpoint } from './in-memory-transport.js';
import { createSyncMessage, encodePayload, verifySyncMessage } from './sync-message.js';
import type { SyncMessage } from './types.js';

class RecordingEndpoint implements SyncEndpoint {
  readonly received: SyncMessage[] = [];

  constructor(
    readonly deviceId: string,
    private readonly failWith?: Error
  ) {}

  handleIncoming(message: SyncMessage): Promise<void> {
    if (this.failWith) return Promise.reject(this.failWith);
    this.received.push(message);
    return Promise.resolve();
  }
}

function message(sourceDeviceId: string): SyncMessage {
  return createSyncMessage({
    sourceDeviceId,
    type: 'heartbeat',
    payload: encodePayload({ from: sourceDeviceId }),
    vectorClock: VectorClock.from({ [sourceDeviceId]: 1 }),
    timestamp: 0,
  });
}

describe('InMemoryTransportHub', () => {
  let hub: InMemoryTransportHub;
  let failures: DeliveryFailure[];

  beforeEach(() => {
    hub = new InMemoryTransportHub();
    failures = [];
    hub.errors$.subscribe((failure) => failures.push(failure));
  });

  afterEach(() => {
    hub.dispose();
  });

  it('should broadcast to every other endpoint', async () => {
    const a = new RecordingEndpoint('a');
    const b = new RecordingEndpoint('b');
    const c = new RecordingEndpoint('c');
    [a, b, c].forEach((endpoint) => hub.connect(endpoint));

    await hub.transportFor('a').broadcast(message('a'));
    await hub.flush();

    expect(a.received).toHaveLength(0);
    expect(b.received).toHaveLength(1);
    expect(c.received).toHaveLength(1);
    expect(hub.deliveredCount).toBe(2);
  });

  it('should deliver an intact copy of the message', async () => {
    const b = new RecordingEndpoint('b');
    hub.connect(b);
    const sent = message('a');

    await hub.transportFor('a').send(sent, 'b');
    await hub.flush();

    const [delivered] = b.received;
    expect(delivered).not.toBe(sent);
    expect(delivered?.checksum).toBe(sent.checksum);
    expect(delivered && verifySyncMessage(delivered)).toBe(true);
  });

  it('should report an unknown target', async () => {
    await hub.transportFor('a').send(message('a'), 'ghost');

    expect(failures).toHaveLength(1);
    expect(failures[0]?.deviceId).toBe('ghost');
    expect(failures[0]?.error.code).toBe('DRIFT_D501');
  });

  it('should report receiver failures without failing the sender', async () => {
    hub.connect(new RecordingEndpoint('b', new Error('disk full')));
    const sent = message('a');

    await expect(hub.transportFor('a').send(sent, 'b')).resolves.toBeUndefined();
    await hub.flush();

    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({ deviceId: 'b', messageId: sent.id });
    expect(failures[0]?.error.message).toBe('disk full');
    expect(failures[0]?.error.code).toBe('DRIFT_X900');
  });

  it('should drop traffic to and from a partitioned device', async () => {
    const a = new RecordingEndpoint('a');
    const b = new RecordingEndpoint('b');
    hub.connect(a);
    hub.connect(b);

    hub.setPartitioned('b', true);
    await hub.transportFor('a').send(message('a'), 'b');
    await hub.transportFor('b').send(message('b'), 'a');
    await hub.flush();
    expect(a.received).toHaveLength(0);
    expect(b.received).toHaveLength(0);

    hub.setPartitioned('b', false);
    await hub.transportFor('a').send(message('a'), 'b');
    await hub.flush();
    expect(b.received).toHaveLength(1);
  });

  it('should stop delivering after disconnect', async () => {
    const b = new RecordingEndpoint('b');
    const disconnect = hub.connect(b);
    disconnect();

    await hub.transportFor('a').broadcast(message('a'));
    await hub.flush();

    expect(b.received).toHaveLength(0);
    expect(failures).toEqual([]);
  });
});

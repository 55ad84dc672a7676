import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  DriftError,
  IntegrityError,
  VectorClock,
  acknowledgmentSchema,
  createLogger,
  type LogEntry,
} from '@driftsync/core';
import { decodeChanges, encodeChanges } from '../delta/codec.js';
import { createDeltaSyncEngine } from '../delta/delta-sync-engine.js';
import { ManualResolutionRequiredError } from './errors.js';
import { InMemoryTransportHub } from './in-memory-transport.js';
import {
  MultiDeviceSyncManager,
  createMultiDeviceSyncManager,
} from './multi-device-sync-manager.js';
import { createSyncMessage, decodePayload, encodePayload } from './sync-message.js';
import type {
  ConflictResolution,
  DeviceConflict,
  DeviceInfo,
  MultiDeviceSyncConfig,
  SyncManagerStatus,
  SyncMessage,
  SyncMessageType,
} from './types.js';

const START = 1_700_000_000_000;

function device(id: string, overrides: Partial<DeviceInfo> = {}): DeviceInfo {
  return {
    id,
    name: id,
    platform: 'android',
    lastSeen: 0,
    syncVersion: 0,
    isOnline: true,
    capabilities: [],
    ...overrides,
  };
}

function messageFrom(
  sourceDeviceId: string,
  type: SyncMessageType,
  body: unknown,
  targetDeviceId?: string
): SyncMessage {
  return createSyncMessage({
    sourceDeviceId,
    targetDeviceId,
    type,
    payload: encodePayload(body),
    vectorClock: VectorClock.from({ [sourceDeviceId]: 1 }),
    timestamp: Date.now(),
  });
}

function stubTransport() {
  return {
    send: vi.fn((_message: SyncMessage, _targetDeviceId: string) => Promise.resolve()),
    broadcast: vi.fn((_message: SyncMessage) => Promise.resolve()),
  };
}

describe('MultiDeviceSyncManager', () => {
  const managers: MultiDeviceSyncManager[] = [];

  function track(manager: MultiDeviceSyncManager): MultiDeviceSyncManager {
    managers.push(manager);
    return manager;
  }

  function standalone(overrides: Partial<MultiDeviceSyncConfig> = {}) {
    const transport = stubTransport();
    const manager = track(
      createMultiDeviceSyncManager({
        deviceId: 'phone',
        deviceName: 'Phone',
        transport,
        now: () => Date.now(),
        ...overrides,
      })
    );
    return { manager, transport };
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
  });

  afterEach(() => {
    for (const manager of managers.splice(0)) {
      manager.destroy();
    }
    vi.useRealTimers();
  });

  // ── Configuration & lifecycle ───────────────────────────────────────

  describe('configuration', () => {
    it('should apply defaults', () => {
      const { manager } = standalone();

      expect(manager.syncProtocol).toBe('websocket');
      expect(manager.conflictStrategy).toBe('last-write-wins');
      expect(manager.currentDevice).toEqual({
        id: 'phone',
        name: 'Phone',
        platform: 'web',
        lastSeen: START,
        syncVersion: 1,
        isOnline: false,
        capabilities: ['offlineStorage', 'encryption', 'backgroundSync'],
      });
      expect(manager.deviceCount).toBe(1);
    });

    it('should generate a device id when none is given', () => {
      const manager = track(
        createMultiDeviceSyncManager({ deviceName: 'Tablet', transport: stubTransport() })
      );
      expect(manager.deviceId).toMatch(/^[0-9a-f-]{36}$/);
    });

    it.each([
      { deviceName: '  ' },
      { heartbeatIntervalMs: 0 },
      { maxDevices: 0 },
      { maxDevices: 2.5 },
    ])('should reject %o', (overrides) => {
      try {
        createMultiDeviceSyncManager({ deviceName: 'Phone', transport: stubTransport(), ...overrides });
        expect.fail('expected a configuration error');
      } catch (error) {
        expect(DriftError.isCode(error, 'DRIFT_V401')).toBe(true);
      }
    });
  });

  describe('lifecycle', () => {
    it('should announce itself on start and leave on stop', async () => {
      const { manager, transport } = standalone();
      const statuses: SyncManagerStatus[] = [];
      manager.status$.subscribe((status) => statuses.push(status));

      await manager.start();
      await manager.stop();

      expect(statuses).toEqual(['stopped', 'running', 'stopped']);
      expect(transport.broadcast.mock.calls.map(([message]) => message.type)).toEqual([
        'device-registration',
        'device-deregistration',
      ]);
    });

    it('should stay stopped when the announcement fails', async () => {
      const { manager, transport } = standalone();
      transport.broadcast.mockRejectedValueOnce(new Error('offline'));

      await expect(manager.start()).rejects.toThrow('offline');
      expect(manager.status).toBe('stopped');

      await vi.advanceTimersByTimeAsync(120_000);
      expect(transport.broadcast).toHaveBeenCalledTimes(1);
    });

    it('should refuse to send while stopped', async () => {
      const { manager } = standalone();

      await expect(manager.sendDelta([])).rejects.toSatisfy((error: unknown) =>
        DriftError.isCode(error, 'DRIFT_D500')
      );
    });

    it('should refuse incoming messages while stopped', async () => {
      const { manager } = standalone();

      await expect(
        manager.handleIncoming(messageFrom('laptop', 'heartbeat', device('laptop')))
      ).rejects.toSatisfy((error: unknown) => DriftError.isCode(error, 'DRIFT_D500'));
    });

    it('should keep the pending log bounded while no peer answers', async () => {
      const { manager, transport } = standalone({ heartbeatIntervalMs: 1_000 });
      await manager.start();

      await vi.advanceTimersByTimeAsync(100_000);

      expect(transport.broadcast).toHaveBeenCalledTimes(101);
      expect(manager.pendingMessages()).toEqual([]);
    });

    it('should expire an unacknowledged delta after three heartbeat intervals', async () => {
      const { manager } = standalone({ heartbeatIntervalMs: 1_000 });
      await manager.start();
      await vi.advanceTimersByTimeAsync(3_000);
      const sent = await manager.sendDelta([]);

      await vi.advanceTimersByTimeAsync(3_000);
      expect(manager.pendingMessages()).toEqual([sent]);

      await vi.advanceTimersByTimeAsync(1_000);
      expect(manager.pendingMessages()).toEqual([]);
    });
  });

  // ── Incoming messages ───────────────────────────────────────────────

  describe('handleIncoming', () => {
    it('should reject a tampered message before changing any state', async () => {
      const { manager, transport } = standalone();
      await manager.start();
      const handler = vi.fn();
      manager.setMessageHandler(handler);
      const clockBefore = manager.vectorClock;

      const genuine = messageFrom('laptop', 'delta-sync', []);
      const tampered: SyncMessage = { ...genuine, checksum: '0'.repeat(64) };

      await expect(manager.handleIncoming(tampered)).rejects.toBeInstanceOf(IntegrityError);
      expect(manager.vectorClock.equals(clockBefore)).toBe(true);
      expect(manager.getDevice('laptop')).toBeUndefined();
      expect(handler).not.toHaveBeenCalled();
      expect(transport.send).not.toHaveBeenCalled();
    });

    it('should merge the sender clock and then count the receive', async () => {
      const { manager } = standalone();
      await manager.start();

      const message = createSyncMessage({
        sourceDeviceId: 'laptop',
        type: 'delta-sync',
        payload: encodeChanges([]),
        vectorClock: VectorClock.from({ laptop: 4, tablet: 2 }),
        timestamp: Date.now(),
      });
      await manager.handleIncoming(message);

      expect(manager.vectorClock.toJSON()).toEqual({ laptop: 4, phone: 2, tablet: 2 });
    });

    it('should acknowledge every message except acknowledgments', async () => {
      const { manager, transport } = standalone();
      await manager.start();

      const delta = messageFrom('laptop', 'delta-sync', []);
      await manager.handleIncoming(delta);
      await manager.handleIncoming(messageFrom('laptop', 'acknowledgment', { messageId: 'other' }));

      expect(transport.send).toHaveBeenCalledTimes(1);
      const [ack, target] = transport.send.mock.calls[0] ?? [];
      expect(target).toBe('laptop');
      expect(ack?.type).toBe('acknowledgment');
      if (ack) {
        expect(decodePayload(acknowledgmentSchema, ack, 'acknowledgment')).toEqual({
          messageId: delta.id,
        });
      }
      expect(manager.pendingMessages().map((message) => message.type)).toEqual(['device-registration']);
    });

    it('should drop a pending message once it is acknowledged', async () => {
      const { manager } = standalone();
      await manager.start();
      const [registration] = manager.pendingMessages();

      await manager.handleIncoming(
        messageFrom('laptop', 'acknowledgment', { messageId: registration?.id })
      );

      expect(manager.pendingMessages()).toEqual([]);
    });

    it('should ignore its own and misrouted messages', async () => {
      const { manager, transport } = standalone();
      await manager.start();
      const clockBefore = manager.vectorClock;

      await manager.handleIncoming(messageFrom('phone', 'heartbeat', manager.currentDevice));
      await manager.handleIncoming(messageFrom('laptop', 'heartbeat', device('laptop'), 'tablet'));

      expect(manager.vectorClock.equals(clockBefore)).toBe(true);
      expect(manager.deviceCount).toBe(1);
      expect(transport.send).not.toHaveBeenCalled();
    });

    it('should reply only to a broadcast registration', async () => {
      const { manager, transport } = standalone();
      await manager.start();

      await manager.handleIncoming(messageFrom('laptop', 'device-registration', device('laptop')));
      await manager.handleIncoming(
        messageFrom('tablet', 'device-registration', device('tablet'), 'phone')
      );

      expect(transport.send.mock.calls.map(([message, target]) => [message.type, target])).toEqual([
        ['device-registration', 'laptop'],
        ['acknowledgment', 'laptop'],
        ['acknowledgment', 'tablet'],
      ]);
      expect(manager.deviceCount).toBe(3);
    });

    it('should reject device info that does not describe the sender', async () => {
      const { manager } = standalone();
      await manager.start();
      const clockBefore = manager.vectorClock;

      await expect(
        manager.handleIncoming(messageFrom('laptop', 'heartbeat', device('tablet')))
      ).rejects.toSatisfy((error: unknown) => DriftError.isCode(error, 'DRIFT_V400'));
      expect(manager.vectorClock.equals(clockBefore)).toBe(true);
    });

    it('should reject an invalid delta payload', async () => {
      const { manager } = standalone();
      await manager.start();

      await expect(
        manager.handleIncoming(messageFrom('laptop', 'delta-sync', { changes: 'all' }))
      ).rejects.toSatisfy((error: unknown) => DriftError.isCode(error, 'DRIFT_V400'));
    });

    it('should hand data messages to the handler one at a time', async () => {
      const { manager } = standalone();
      await manager.start();
      const calls: string[] = [];
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      manager.setMessageHandler(async (message) => {
        calls.push(`start:${message.type}`);
        if (message.type === 'delta-sync') await gate;
        calls.push(`end:${message.type}`);
      });

      const first = manager.handleIncoming(messageFrom('laptop', 'delta-sync', []));
      const second = manager.handleIncoming(messageFrom('laptop', 'request', { scope: 'full' }));
      release();
      await Promise.all([first, second]);

      expect(calls).toEqual(['start:delta-sync', 'end:delta-sync', 'start:request', 'end:request']);
    });

    it('should never move lastSeen or syncVersion backwards', async () => {
      const { manager } = standalone();
      await manager.start();

      manager.updateDevice(device('laptop', { lastSeen: START + 500, syncVersion: 9 }));
      await manager.handleIncoming(
        messageFrom('laptop', 'heartbeat', device('laptop', { lastSeen: 1, syncVersion: 3 }))
      );

      expect(manager.getDevice('laptop')).toMatchObject({ lastSeen: START + 500, syncVersion: 9 });
    });
  });

  // ── Registry ────────────────────────────────────────────────────────

  describe('device registry', () => {
    it('should evict the least recently seen offline device', () => {
      const { manager } = standalone({ maxDevices: 2 });

      manager.updateDevice(device('old', { isOnline: false, lastSeen: 50 }));
      manager.updateDevice(device('older', { isOnline: false, lastSeen: 10 }));
      manager.updateDevice(device('new'));

      expect(manager.allDevices.map((info) => info.id)).toEqual(['phone', 'old', 'new']);
    });

    it('should admit a device over the limit when nothing is offline', () => {
      const entries: LogEntry[] = [];
      const { manager } = standalone({
        maxDevices: 1,
        logger: createLogger({ enabled: true, level: 'warn', handler: (entry) => entries.push(entry) }),
      });

      manager.updateDevice(device('laptop'));
      manager.updateDevice(device('tablet'));

      expect(manager.deviceCount).toBe(3);
      expect(entries).toHaveLength(1);
      expect(entries[0]?.message).toBe('Device limit exceeded with no offline device to evict');
      expect(entries[0]?.context).toBe('MultiDeviceSyncManager');
      expect(entries[0]?.data).toMatchObject({ admittedId: 'tablet' });
    });

    it('should ignore updates about itself', () => {
      const { manager } = standalone();
      manager.updateDevice(device('phone'));
      expect(manager.deviceCount).toBe(1);
    });

    it('should publish the registry with this device first', () => {
      const { manager } = standalone();
      const snapshots: string[][] = [];
      manager.devices$.subscribe((devices) => snapshots.push(devices.map((info) => info.id)));

      manager.updateDevice(device('laptop'));
      manager.markOffline('laptop');
      manager.removeDevice('laptop');

      expect(snapshots).toEqual([['phone'], ['phone', 'laptop'], ['phone', 'laptop'], ['phone']]);
    });

    it('should refuse to send to an unknown device', async () => {
      const { manager } = standalone();
      await manager.start();

      await expect(manager.send(messageFrom('phone', 'full-sync', {}), 'laptop')).rejects.toSatisfy(
        (error: unknown) => DriftError.isCode(error, 'DRIFT_D501')
      );
    });
  });

  // ── Outgoing messages ───────────────────────────────────────────────

  describe('sending', () => {
    it('should advance the clock before stamping a delta', async () => {
      const { manager } = standalone();
      await manager.start();
      const before = manager.vectorClock.timestamp('phone');

      const message = await manager.sendDelta([]);

      expect(message.vectorClock.timestamp('phone')).toBe(before + 1);
      expect(manager.vectorClock.equals(message.vectorClock)).toBe(true);
    });

    it('should retarget a message without touching its checksum', async () => {
      const { manager, transport } = standalone();
      await manager.start();
      manager.updateDevice(device('laptop'));
      const original = messageFrom('phone', 'full-sync', { notes: [] });

      await manager.send(original, 'laptop');

      const [sent, target] = transport.send.mock.calls[0] ?? [];
      expect(target).toBe('laptop');
      expect(sent?.targetDeviceId).toBe('laptop');
      expect(sent?.checksum).toBe(original.checksum);
    });

    it('should reject a snapshot that is not plain JSON', async () => {
      const { manager } = standalone();
      await manager.start();

      await expect(manager.sendFullSync({ when: new Date(0), at: Number.NaN })).rejects.toSatisfy(
        (error: unknown) => DriftError.isCode(error, 'DRIFT_V400')
      );
    });
  });

  // ── Conflicts ───────────────────────────────────────────────────────

  describe('conflicts', () => {
    it('should not treat a causally newer remote edit as a conflict', () => {
      const { manager } = standalone();

      const conflict = manager.detectConflict({
        entityId: 'note-1',
        entityType: 'note',
        localData: 'mine',
        remoteData: 'theirs',
        remoteDeviceId: 'laptop',
        remoteVectorClock: manager.vectorClock.increment('laptop'),
      });

      expect(conflict).toBeUndefined();
      expect(manager.unresolvedConflicts()).toEqual([]);
    });

    it('should settle a concurrent edit with last-write-wins', () => {
      const { manager } = standalone();
      const emitted: DeviceConflict<unknown>[] = [];
      manager.conflicts$.subscribe((conflict) => emitted.push(conflict));

      const conflict = manager.detectConflict({
        entityId: 'note-1',
        entityType: 'note',
        localData: 'mine',
        remoteData: 'theirs',
        remoteDeviceId: 'laptop',
        remoteVectorClock: VectorClock.from({ laptop: 3 }),
      });
      if (!conflict) throw new Error('expected a conflict');

      expect(emitted).toEqual([conflict]);
      const resolution = manager.resolveConflict(conflict);

      // 'phone' sorts after 'laptop'
      expect(resolution.resolvedData).toBe('mine');
      expect(resolution.resolvedVectorClock.toJSON()).toEqual({ laptop: 3, phone: 1 });
      expect(manager.unresolvedConflicts()).toEqual([]);
    });

    it('should reject a resolution for an unknown conflict', async () => {
      const { manager } = standalone();
      await manager.start();

      await expect(manager.submitResolution('missing', 'value')).rejects.toSatisfy((error: unknown) =>
        DriftError.isCode(error, 'DRIFT_R302')
      );
    });
  });

  // ── Several replicas over the in-memory hub ─────────────────────────

  describe('with peers', () => {
    let hub: InMemoryTransportHub;

    function peer(deviceId: string, overrides: Partial<MultiDeviceSyncConfig> = {}) {
      const manager = track(
        createMultiDeviceSyncManager({
          deviceId,
          deviceName: `${deviceId} device`,
          platform: 'desktop',
          transport: hub.transportFor(deviceId),
          now: () => Date.now(),
          ...overrides,
        })
      );
      hub.connect(manager);
      return manager;
    }

    async function startAll(...peers: MultiDeviceSyncManager[]): Promise<void> {
      await Promise.all(peers.map((manager) => manager.start()));
      await hub.flush();
    }

    beforeEach(() => {
      hub = new InMemoryTransportHub();
    });

    afterEach(() => {
      hub.dispose();
    });

    it('should discover each other and settle every acknowledgment', async () => {
      const laptop = peer('laptop');
      const phone = peer('phone');

      await startAll(laptop, phone);

      expect(laptop.getDevice('phone')).toMatchObject({ isOnline: true, lastSeen: START });
      expect(phone.getDevice('laptop')?.name).toBe('laptop device');
      expect(laptop.pendingMessages()).toEqual([]);
      expect(phone.pendingMessages()).toEqual([]);
    });

    it('should carry a delta from one replica to another', async () => {
      const laptop = peer('laptop');
      const phone = peer('phone');
      const laptopEngine = createDeltaSyncEngine({ replicaId: 'laptop' });
      const phoneEngine = createDeltaSyncEngine({ replicaId: 'phone' });

      const base = { id: 'note-1', title: 'Groceries', body: 'Milk, eggs and a loaf of bread', done: false };
      let phoneCopy = base;
      phone.setMessageHandler((message) => {
        if (message.type !== 'delta-sync') return;
        for (const change of decodeChanges(message.payload)) {
          if (change.patch) phoneCopy = phoneEngine.applyPatch(change.patch, phoneCopy);
          phoneEngine.recordChange(change);
        }
      });
      await startAll(laptop, phone);

      const edited = { ...base, title: 'Groceries (done)', done: true };
      laptopEngine.track(base, edited, 'note');
      const sent = await laptop.sendDelta(laptopEngine.pendingChanges());
      await hub.flush();

      expect(phoneCopy).toEqual(edited);
      expect(phoneEngine.currentVersion('note-1')).toBe(1);
      expect(phone.vectorClock.happenedAfter(sent.vectorClock)).toBe(true);
      expect(laptop.pendingMessages()).toEqual([]);
    });

    it('should mark a silent device offline after three missed heartbeats', async () => {
      const laptop = peer('laptop', { heartbeatIntervalMs: 1_000 });
      const phone = peer('phone', { heartbeatIntervalMs: 1_000 });
      await startAll(laptop, phone);

      hub.setPartitioned('phone', true);
      await vi.advanceTimersByTimeAsync(3_000);
      await hub.flush();
      expect(laptop.getDevice('phone')?.isOnline).toBe(true);

      await vi.advanceTimersByTimeAsync(1_000);
      await hub.flush();
      expect(laptop.getDevice('phone')?.isOnline).toBe(false);

      hub.setPartitioned('phone', false);
      await vi.advanceTimersByTimeAsync(1_000);
      await hub.flush();
      expect(laptop.getDevice('phone')).toMatchObject({ isOnline: true, lastSeen: START + 5_000 });
    });

    it('should keep devices online while heartbeats flow', async () => {
      const laptop = peer('laptop', { heartbeatIntervalMs: 1_000 });
      const phone = peer('phone', { heartbeatIntervalMs: 1_000 });
      await startAll(laptop, phone);

      await vi.advanceTimersByTimeAsync(10_000);
      await hub.flush();

      expect(laptop.getDevice('phone')).toMatchObject({ isOnline: true, lastSeen: START + 10_000 });
      expect(phone.getDevice('laptop')?.isOnline).toBe(true);
    });

    it('should forget a device that deregisters', async () => {
      const laptop = peer('laptop');
      const phone = peer('phone');
      await startAll(laptop, phone);

      await laptop.stop();
      await hub.flush();

      expect(phone.getDevice('laptop')).toBeUndefined();
      expect(phone.deviceCount).toBe(1);
    });

    it('should share a manual resolution with other devices', async () => {
      const laptop = peer('laptop', { conflictStrategy: 'ask-user' });
      const phone = peer('phone');
      await startAll(laptop, phone);

      const remoteClock = VectorClock.from({ phone: 50 });
      const conflict = laptop.detectConflict({
        entityId: 'note-1',
        entityType: 'note',
        localData: { title: 'A' },
        remoteData: { title: 'B' },
        remoteDeviceId: 'phone',
        remoteVectorClock: remoteClock,
      });
      if (!conflict) throw new Error('expected a conflict');
      phone.detectConflict({
        entityId: 'note-1',
        entityType: 'note',
        localData: { title: 'B' },
        remoteData: { title: 'A' },
        remoteDeviceId: 'laptop',
        remoteVectorClock: VectorClock.from({ laptop: 99 }),
      });

      expect(() => laptop.resolveConflict(conflict)).toThrow(ManualResolutionRequiredError);
      expect(laptop.unresolvedConflicts()).toHaveLength(1);

      const received: ConflictResolution[] = [];
      phone.resolutions$.subscribe((resolution) => received.push(resolution));

      const resolution = await laptop.submitResolution(conflict.id, { title: 'A and B' });
      await hub.flush();

      expect(resolution).toMatchObject({
        conflictId: conflict.id,
        entityId: 'note-1',
        resolution: 'manual',
        resolvedData: { title: 'A and B' },
      });
      expect(resolution.resolvedVectorClock.happenedAfter(remoteClock)).toBe(true);
      expect(laptop.unresolvedConflicts()).toEqual([]);

      expect(received).toHaveLength(1);
      expect(received[0]?.resolvedData).toEqual({ title: 'A and B' });
      expect(received[0]?.resolvedVectorClock.equals(resolution.resolvedVectorClock)).toBe(true);
      expect(phone.unresolvedConflicts()).toEqual([]);
    });
  });
});

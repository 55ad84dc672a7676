/**
 * MultiDeviceSyncManager - device registry, messaging and conflict handling
 * for one replica.
 *
 * Every outbound message is stamped with the manager's vector clock and
 * checksummed. Inbound messages are verified before anything else happens,
 * then merged into the local clock and dispatched by type. Data messages
 * (full-sync, delta-sync, request) reach the registered handler one at a
 * time, in arrival order.
 *
 * @example
 * ```typescript
 * const manager = createMultiDeviceSyncManager({
 *   deviceName: 'Work laptop',
 *   platform: 'macos',
 *   transport,
 * });
 *
 * manager.setMessageHandler(async (message) => {
 *   if (message.type === 'delta-sync') {
 *     applyChanges(decodeChanges(message.payload));
 *   }
 * });
 *
 * manager.devices$.subscribe((devices) => renderDeviceList(devices));
 * await manager.start();
 * await manager.sendDelta(engine.pendingChanges());
 * ```
 */

import {
  DriftError,
  VectorClock,
  acknowledgmentSchema,
  conflictResolutionSchema,
  deviceInfoSchema,
  ensureDriftError,
  generateId,
  jsonValueSchema,
  noopLogger,
  syncRequestSchema,
  toJsonValue,
  type Logger,
} from '@driftsync/core';
import { BehaviorSubject, Subject, takeUntil, type Observable } from 'rxjs';
import { decodeChanges, encodeChanges } from '../delta/codec.js';
import type { DeltaChange } from '../delta/types.js';
import { findConflict, resolveConflict as settleConflict } from './conflict.js';
import { ManualResolutionRequiredError } from './errors.js';
import { SerialQueue } from './serial-queue.js';
import {
  assertSyncMessageIntegrity,
  createSyncMessage,
  decodePayload,
  encodePayload,
  retargetSyncMessage,
} from './sync-message.js';
import {
  DEFAULT_MULTI_DEVICE_CONFIG,
  type ConflictResolution,
  type ConflictStrategy,
  type DeviceCapability,
  type DeviceConflict,
  type DeviceInfo,
  type DevicePlatform,
  type MultiDeviceSyncConfig,
  type SyncManagerStatus,
  type SyncMessage,
  type SyncMessageHandler,
  type SyncMessageType,
  type SyncProtocol,
  type SyncTransport,
} from './types.js';

/** A device is considered offline after this many missed heartbeats */
const OFFLINE_AFTER_HEARTBEATS = 3;

export interface DetectConflictInput<T> {
  entityId: string;
  entityType: string;
  localData: T;
  remoteData: T;
  remoteDeviceId: string;
  remoteVectorClock: VectorClock;
}

/** Decoded body of an inbound message */
type Inbound =
  | { kind: 'device'; info: DeviceInfo }
  | { kind: 'deregistration' }
  | { kind: 'data' }
  | { kind: 'resolution'; resolution: ConflictResolution }
  | { kind: 'acknowledgment'; messageId: string };

interface ResolvedConfig {
  deviceId: string;
  deviceName: string;
  platform: DevicePlatform;
  syncProtocol: SyncProtocol;
  heartbeatIntervalMs: number;
  conflictStrategy: ConflictStrategy;
  maxDevices: number;
  capabilities: DeviceCapability[];
}

function invalidConfig(message: string, context: Record<string, unknown>): DriftError {
  return new DriftError({ code: 'DRIFT_V401', message, context });
}

function resolveConfig(config: MultiDeviceSyncConfig): ResolvedConfig {
  if (config.deviceName.trim() === '') {
    throw invalidConfig('deviceName must not be empty', { deviceName: config.deviceName });
  }
  if (config.deviceId?.trim() === '') {
    throw invalidConfig('deviceId must not be empty', { deviceId: config.deviceId });
  }

  const heartbeatIntervalMs =
    config.heartbeatIntervalMs ?? DEFAULT_MULTI_DEVICE_CONFIG.heartbeatIntervalMs;
  if (!Number.isFinite(heartbeatIntervalMs) || heartbeatIntervalMs <= 0) {
    throw invalidConfig('heartbeatIntervalMs must be a positive number', { heartbeatIntervalMs });
  }

  const maxDevices = config.maxDevices ?? DEFAULT_MULTI_DEVICE_CONFIG.maxDevices;
  if (!Number.isInteger(maxDevices) || maxDevices < 1) {
    throw invalidConfig('maxDevices must be a positive integer', { maxDevices });
  }

  return {
    deviceId: config.deviceId ?? generateId(),
    deviceName: config.deviceName,
    platform: config.platform ?? DEFAULT_MULTI_DEVICE_CONFIG.platform,
    syncProtocol: config.syncProtocol ?? DEFAULT_MULTI_DEVICE_CONFIG.syncProtocol,
    heartbeatIntervalMs,
    conflictStrategy: config.conflictStrategy ?? DEFAULT_MULTI_DEVICE_CONFIG.conflictStrategy,
    maxDevices,
    capabilities: [...(config.capabilities ?? DEFAULT_MULTI_DEVICE_CONFIG.capabilities)],
  };
}

export class MultiDeviceSyncManager {
  private readonly config: ResolvedConfig;
  private readonly transport: SyncTransport;
  private readonly logger: Logger;
  private readonly now: () => number;

  private readonly destroy$ = new Subject<void>();
  private readonly statusSubject$ = new BehaviorSubject<SyncManagerStatus>('stopped');
  private readonly devicesSubject$: BehaviorSubject<DeviceInfo[]>;
  private readonly messagesSubject$ = new Subject<SyncMessage>();
  private readonly conflictsSubject$ = new Subject<DeviceConflict<unknown>>();
  private readonly resolutionsSubject$ = new Subject<ConflictResolution>();

  private readonly devices = new Map<string, DeviceInfo>();
  private readonly pending = new Map<string, SyncMessage>();
  private readonly conflicts = new Map<string, DeviceConflict<unknown>>();
  private readonly handlerQueue = new SerialQueue();

  private clock: VectorClock;
  private handler: SyncMessageHandler | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  /** Registry snapshots, this device first */
  readonly devices$: Observable<DeviceInfo[]>;

  /** Every message this manager sends */
  readonly messages$: Observable<SyncMessage>;

  /** Conflicts recorded by {@link detectConflict} */
  readonly conflicts$: Observable<DeviceConflict<unknown>>;

  /** Resolutions submitted locally or received from other devices */
  readonly resolutions$: Observable<ConflictResolution>;

  readonly status$: Observable<SyncManagerStatus>;

  constructor(config: MultiDeviceSyncConfig) {
    this.config = resolveConfig(config);
    this.transport = config.transport;
    this.logger = (config.logger ?? noopLogger).child('MultiDeviceSyncManager');
    this.now = config.now ?? Date.now;
    this.clock = VectorClock.empty().increment(this.config.deviceId);

    this.devicesSubject$ = new BehaviorSubject<DeviceInfo[]>([this.currentDevice]);
    this.devices$ = this.devicesSubject$.asObservable().pipe(takeUntil(this.destroy$));
    this.messages$ = this.messagesSubject$.asObservable().pipe(takeUntil(this.destroy$));
    this.conflicts$ = this.conflictsSubject$.asObservable().pipe(takeUntil(this.destroy$));
    this.resolutions$ = this.resolutionsSubject$.asObservable().pipe(takeUntil(this.destroy$));
    this.status$ = this.statusSubject$.asObservable().pipe(takeUntil(this.destroy$));
  }

  get deviceId(): string {
    return this.config.deviceId;
  }

  get status(): SyncManagerStatus {
    return this.statusSubject$.getValue();
  }

  get isRunning(): boolean {
    return this.status === 'running';
  }

  get syncProtocol(): SyncProtocol {
    return this.config.syncProtocol;
  }

  get conflictStrategy(): ConflictStrategy {
    return this.config.conflictStrategy;
  }

  get vectorClock(): VectorClock {
    return this.clock;
  }

  /**
   * This device as other replicas see it
   */
  get currentDevice(): DeviceInfo {
    return {
      id: this.config.deviceId,
      name: this.config.deviceName,
      platform: this.config.platform,
      lastSeen: this.now(),
      syncVersion: this.clock.timestamp(this.config.deviceId),
      isOnline: this.isRunning,
      capabilities: [...this.config.capabilities],
    };
  }

  /** Known devices including this one */
  get deviceCount(): number {
    return this.devices.size + 1;
  }

  get allDevices(): DeviceInfo[] {
    return [this.currentDevice, ...this.devices.values()];
  }

  getDevice(deviceId: string): DeviceInfo | undefined {
    if (deviceId === this.config.deviceId) return this.currentDevice;
    return this.devices.get(deviceId);
  }

  /** Sent messages not yet acknowledged */
  pendingMessages(): SyncMessage[] {
    return Array.from(this.pending.values());
  }

  unresolvedConflicts(): DeviceConflict<unknown>[] {
    return Array.from(this.conflicts.values());
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Start heartbeats and announce this device.
   *
   * If the announcement fails the manager stops again and the transport
   * error is rethrown.
   */
  async start(): Promise<void> {
    if (this.isRunning) return;

    this.statusSubject$.next('running');
    this.emitDevices();
    this.heartbeatTimer = setInterval(() => this.heartbeat(), this.config.heartbeatIntervalMs);

    try {
      await this.dispatch('device-registration', encodePayload(this.currentDevice));
    } catch (error) {
      this.clearHeartbeat();
      this.statusSubject$.next('stopped');
      this.emitDevices();
      this.logger.error('Device registration failed', ensureDriftError(error));
      throw error;
    }

    this.logger.info('Sync manager started', {
      deviceId: this.config.deviceId,
      protocol: this.config.syncProtocol,
    });
  }

  /**
   * Stop heartbeats and tell other devices this one is leaving. The manager
   * is stopped afterwards even if the announcement fails.
   */
  async stop(): Promise<void> {
    if (!this.isRunning) return;

    this.clearHeartbeat();
    try {
      await this.dispatch('device-deregistration', encodePayload({}));
    } finally {
      this.statusSubject$.next('stopped');
      this.emitDevices();
      this.logger.info('Sync manager stopped', { deviceId: this.config.deviceId });
    }
  }

  /**
   * Release timers and complete every stream. No announcement is sent.
   */
  destroy(): void {
    this.clearHeartbeat();
    this.statusSubject$.next('stopped');
    this.destroy$.next();
    this.destroy$.complete();
    this.statusSubject$.complete();
    this.devicesSubject$.complete();
    this.messagesSubject$.complete();
    this.conflictsSubject$.complete();
    this.resolutionsSubject$.complete();
    this.handler = null;
  }

  // ---------------------------------------------------------------------------
  // Device registry
  // ---------------------------------------------------------------------------

  /**
   * Add or refresh a remote device. `lastSeen` and `syncVersion` never move
   * backwards for a known device.
   */
  updateDevice(info: DeviceInfo): void {
    if (info.id === this.config.deviceId) return;

    const existing = this.devices.get(info.id);
    if (existing) {
      this.devices.set(info.id, {
        ...info,
        lastSeen: Math.max(existing.lastSeen, info.lastSeen),
        syncVersion: Math.max(existing.syncVersion, info.syncVersion),
      });
    } else {
      this.devices.set(info.id, { ...info, capabilities: [...info.capabilities] });
      this.logger.info('Device registered', { deviceId: info.id, platform: info.platform });
      this.enforceDeviceLimit(info.id);
    }
    this.emitDevices();
  }

  removeDevice(deviceId: string): void {
    if (!this.devices.delete(deviceId)) return;
    this.logger.info('Device removed', { deviceId });
    this.emitDevices();
  }

  markOffline(deviceId: string): void {
    const device = this.devices.get(deviceId);
    if (!device?.isOnline) return;
    this.devices.set(deviceId, { ...device, isOnline: false });
    this.logger.info('Device went offline', { deviceId, lastSeen: device.lastSeen });
    this.emitDevices();
  }

  // ---------------------------------------------------------------------------
  // Messaging
  // ---------------------------------------------------------------------------

  /**
   * Set the handler for full-sync, delta-sync and request messages
   */
  setMessageHandler(handler: SyncMessageHandler | null): void {
    this.handler = handler;
  }

  /**
   * Send an existing message to every device.
   *
   * @throws DriftError DRIFT_D500 when the manager is stopped
   */
  async broadcast(message: SyncMessage): Promise<void> {
    this.assertRunning();
    await this.transmit(retargetSyncMessage(message, undefined));
  }

  /**
   * Send an existing message to one registered device.
   *
   * @throws DriftError DRIFT_D500 when the manager is stopped
   * @throws DriftError DRIFT_D501 when the target is not registered
   */
  async send(message: SyncMessage, targetDeviceId: string): Promise<void> {
    this.assertRunning();
    this.assertKnownDevice(targetDeviceId);
    await this.transmit(retargetSyncMessage(message, targetDeviceId));
  }

  /**
   * Ask one device, or every device, for a full snapshot
   */
  async requestFullSync(targetDeviceId?: string): Promise<SyncMessage> {
    this.assertRunning();
    if (targetDeviceId !== undefined) this.assertKnownDevice(targetDeviceId);
    return this.dispatch('request', encodePayload({ scope: 'full' }), targetDeviceId);
  }

  /**
   * Send a full snapshot of entities.
   *
   * @throws DriftError DRIFT_V400 when the snapshot is not plain JSON
   */
  async sendFullSync(snapshot: unknown, targetDeviceId?: string): Promise<SyncMessage> {
    this.assertRunning();
    if (targetDeviceId !== undefined) this.assertKnownDevice(targetDeviceId);
    const payload = encodePayload(snapshot);
    this.advanceClock();
    return this.dispatch('full-sync', payload, targetDeviceId);
  }

  /**
   * Send delta changes. The clock advances before the message is stamped,
   * so every delta carries a fresh local event.
   */
  async sendDelta(changes: readonly DeltaChange[], targetDeviceId?: string): Promise<SyncMessage> {
    this.assertRunning();
    if (targetDeviceId !== undefined) this.assertKnownDevice(targetDeviceId);
    const payload = encodeChanges(changes);
    this.advanceClock();
    return this.dispatch('delta-sync', payload, targetDeviceId);
  }

  /**
   * Process a message delivered by the transport.
   *
   * The checksum is verified first; a corrupted message is rejected before
   * any state changes. Messages from this device, or addressed to another
   * device, are ignored.
   *
   * @throws IntegrityError DRIFT_I100 when the checksum does not match
   * @throws DriftError DRIFT_D500 when the manager is stopped
   * @throws DriftError DRIFT_V400 when the payload is invalid for its type
   */
  async handleIncoming(message: SyncMessage): Promise<void> {
    try {
      assertSyncMessageIntegrity(message);
    } catch (error) {
      this.logger.warn('Rejected message with bad checksum', {
        messageId: message.id,
        sourceDeviceId: message.sourceDeviceId,
      });
      throw error;
    }

    if (message.sourceDeviceId === this.config.deviceId) {
      this.logger.debug('Ignored own message', { messageId: message.id });
      return;
    }
    if (message.targetDeviceId !== undefined && message.targetDeviceId !== this.config.deviceId) {
      this.logger.debug('Ignored message for another device', {
        messageId: message.id,
        targetDeviceId: message.targetDeviceId,
      });
      return;
    }

    this.assertRunning();
    const inbound = this.decodeInbound(message);

    this.clock = this.clock.merge(message.vectorClock).increment(this.config.deviceId);
    this.touch(message.sourceDeviceId);

    switch (inbound.kind) {
      case 'device':
        this.updateDevice({ ...inbound.info, lastSeen: this.now(), isOnline: true });
        if (message.type === 'device-registration' && message.targetDeviceId === undefined) {
          await this.dispatch(
            'device-registration',
            encodePayload(this.currentDevice),
            message.sourceDeviceId
          );
        }
        break;
      case 'deregistration':
        this.removeDevice(message.sourceDeviceId);
        break;
      case 'data':
        await this.handlerQueue.run(() => this.deliver(message));
        break;
      case 'resolution':
        this.applyRemoteResolution(inbound.resolution);
        break;
      case 'acknowledgment':
        this.pending.delete(inbound.messageId);
        break;
    }

    if (message.type !== 'acknowledgment') {
      await this.dispatch(
        'acknowledgment',
        encodePayload({ messageId: message.id }),
        message.sourceDeviceId
      );
    }
  }

  // ---------------------------------------------------------------------------
  // Conflicts
  // ---------------------------------------------------------------------------

  /**
   * Compare a remote edit against this device's clock. Concurrent edits are
   * recorded and emitted on `conflicts$`; anything else returns `undefined`.
   */
  detectConflict<T>(input: DetectConflictInput<T>): DeviceConflict<T> | undefined {
    const conflict = findConflict({
      entityId: input.entityId,
      entityType: input.entityType,
      localDeviceId: this.config.deviceId,
      remoteDeviceId: input.remoteDeviceId,
      localVectorClock: this.clock,
      remoteVectorClock: input.remoteVectorClock,
      localData: input.localData,
      remoteData: input.remoteData,
      timestamp: this.now(),
    });
    if (!conflict) return undefined;

    this.conflicts.set(conflict.id, conflict);
    this.logger.info('Conflict detected', {
      conflictId: conflict.id,
      entityId: conflict.entityId,
      remoteDeviceId: conflict.remoteDeviceId,
    });
    this.conflictsSubject$.next(conflict);
    return conflict;
  }

  /**
   * Settle a conflict with the configured strategy. A settled conflict is
   * no longer unresolved.
   *
   * @throws ManualResolutionRequiredError when the strategy needs outside input
   */
  resolveConflict<T>(conflict: DeviceConflict<T>): ConflictResolution<T> {
    try {
      const resolution = settleConflict(conflict, this.config.conflictStrategy);
      this.conflicts.delete(conflict.id);
      return resolution;
    } catch (error) {
      if (error instanceof ManualResolutionRequiredError) {
        this.logger.debug('Conflict awaits manual resolution', {
          conflictId: conflict.id,
          strategy: this.config.conflictStrategy,
        });
      }
      throw error;
    }
  }

  /**
   * Settle an open conflict with a chosen value and broadcast the outcome.
   *
   * @throws DriftError DRIFT_R302 when the conflict is not open
   * @throws DriftError DRIFT_V400 when the value is not plain JSON
   */
  async submitResolution(conflictId: string, value: unknown): Promise<ConflictResolution> {
    this.assertRunning();
    const conflict = this.conflicts.get(conflictId);
    if (!conflict) {
      throw new DriftError({ code: 'DRIFT_R302', context: { conflictId } });
    }
    const resolvedData = toJsonValue(value);

    this.clock = this.clock
      .merge(conflict.localVectorClock)
      .merge(conflict.remoteVectorClock)
      .increment(this.config.deviceId);

    const resolution: ConflictResolution = {
      conflictId,
      entityId: conflict.entityId,
      entityType: conflict.entityType,
      resolution: 'manual',
      resolvedData,
      resolvedVectorClock: this.clock,
    };
    this.conflicts.delete(conflictId);
    this.resolutionsSubject$.next(resolution);

    await this.dispatch(
      'conflict-resolution',
      encodePayload({ ...resolution, resolvedVectorClock: resolution.resolvedVectorClock.toJSON() })
    );
    return resolution;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private decodeInbound(message: SyncMessage): Inbound {
    switch (message.type) {
      case 'heartbeat':
      case 'device-registration': {
        const info = decodePayload(deviceInfoSchema, message, 'device info');
        if (info.id !== message.sourceDeviceId) {
          throw new DriftError({
            code: 'DRIFT_V400',
            message: 'Device info does not describe the sending device',
            context: { messageId: message.id, sourceDeviceId: message.sourceDeviceId, deviceId: info.id },
          });
        }
        return { kind: 'device', info };
      }
      case 'device-deregistration':
        return { kind: 'deregistration' };
      case 'full-sync':
        decodePayload(jsonValueSchema, message, 'snapshot');
        return { kind: 'data' };
      case 'delta-sync':
        decodeChanges(message.payload);
        return { kind: 'data' };
      case 'request':
        decodePayload(syncRequestSchema, message, 'request');
        return { kind: 'data' };
      case 'conflict-resolution': {
        const body = decodePayload(conflictResolutionSchema, message, 'resolution');
        return {
          kind: 'resolution',
          resolution: { ...body, resolvedVectorClock: VectorClock.from(body.resolvedVectorClock) },
        };
      }
      case 'acknowledgment': {
        const body = decodePayload(acknowledgmentSchema, message, 'acknowledgment');
        return { kind: 'acknowledgment', messageId: body.messageId };
      }
    }
  }

  private async deliver(message: SyncMessage): Promise<void> {
    if (!this.handler) {
      this.logger.debug('No message handler set', { messageId: message.id, type: message.type });
      return;
    }
    await this.handler(message);
  }

  private applyRemoteResolution(resolution: ConflictResolution): void {
    for (const [id, conflict] of this.conflicts) {
      if (conflict.entityId === resolution.entityId && conflict.entityType === resolution.entityType) {
        this.conflicts.delete(id);
      }
    }
    this.resolutionsSubject$.next(resolution);
  }

  private touch(deviceId: string): void {
    const device = this.devices.get(deviceId);
    if (!device) return;
    this.devices.set(deviceId, {
      ...device,
      lastSeen: Math.max(device.lastSeen, this.now()),
      isOnline: true,
    });
    this.emitDevices();
  }

  private heartbeat(): void {
    if (!this.isRunning) return;
    this.sweepOffline();
    this.dispatch('heartbeat', encodePayload(this.currentDevice)).catch((error: unknown) => {
      this.logger.error('Heartbeat failed', ensureDriftError(error));
    });
  }

  private sweepOffline(): void {
    const threshold = this.config.heartbeatIntervalMs * OFFLINE_AFTER_HEARTBEATS;
    const now = this.now();
    for (const device of Array.from(this.devices.values())) {
      if (device.isOnline && now - device.lastSeen > threshold) {
        this.markOffline(device.id);
      }
    }

    // Unacknowledged sends expire on the same horizon as silent devices
    let expired = 0;
    for (const [id, message] of this.pending) {
      if (now - message.timestamp > threshold) {
        this.pending.delete(id);
        expired++;
      }
    }
    if (expired > 0) {
      this.logger.debug('Expired unacknowledged messages', { expired, remaining: this.pending.size });
    }
  }

  /**
   * Evict the least recently seen offline devices while the registry is over
   * its limit. Online devices are never evicted.
   */
  private enforceDeviceLimit(admittedId: string): void {
    while (this.devices.size > this.config.maxDevices) {
      let oldest: DeviceInfo | undefined;
      for (const device of this.devices.values()) {
        if (!device.isOnline && (!oldest || device.lastSeen < oldest.lastSeen)) {
          oldest = device;
        }
      }
      if (!oldest) {
        this.logger.warn('Device limit exceeded with no offline device to evict', {
          maxDevices: this.config.maxDevices,
          deviceCount: this.devices.size,
          admittedId,
        });
        return;
      }
      this.devices.delete(oldest.id);
      this.logger.info('Evicted offline device', { deviceId: oldest.id, lastSeen: oldest.lastSeen });
    }
  }

  private advanceClock(): void {
    this.clock = this.clock.increment(this.config.deviceId);
  }

  private async dispatch(
    type: SyncMessageType,
    payload: Uint8Array,
    targetDeviceId?: string
  ): Promise<SyncMessage> {
    this.assertRunning();
    const message = createSyncMessage({
      sourceDeviceId: this.config.deviceId,
      targetDeviceId,
      type,
      payload,
      vectorClock: this.clock,
      timestamp: this.now(),
    });
    await this.transmit(message);
    return message;
  }

  private async transmit(message: SyncMessage): Promise<void> {
    if (message.type !== 'acknowledgment' && message.type !== 'heartbeat') {
      this.pending.set(message.id, message);
    }
    this.messagesSubject$.next(message);

    if (message.targetDeviceId === undefined) {
      await this.transport.broadcast(message);
    } else {
      await this.transport.send(message, message.targetDeviceId);
    }
  }

  private assertRunning(): void {
    if (!this.isRunning) {
      throw new DriftError({ code: 'DRIFT_D500', context: { deviceId: this.config.deviceId } });
    }
  }

  private assertKnownDevice(deviceId: string): void {
    if (!this.devices.has(deviceId)) {
      throw new DriftError({ code: 'DRIFT_D501', context: { deviceId } });
    }
  }

  private emitDevices(): void {
    this.devicesSubject$.next(this.allDevices);
  }

  private clearHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }
}

/**
 * Create a multi-device sync manager
 */
export function createMultiDeviceSyncManager(config: MultiDeviceSyncConfig): MultiDeviceSyncManager {
  return new MultiDeviceSyncManager(config);
}

import type { JsonValue, Logger, VectorClock } from '@driftsync/core';

export type DevicePlatform =
  | 'ios'
  | 'macos'
  | 'tvos'
  | 'watchos'
  | 'visionos'
  | 'android'
  | 'web'
  | 'desktop';

export type SyncProtocol = 'websocket' | 'polling' | 'push-notification' | 'hybrid';

export type DeviceCapability =
  | 'backgroundSync'
  | 'pushNotifications'
  | 'realTimeSync'
  | 'offlineStorage'
  | 'encryption';

/**
 * How concurrent edits are settled. Only the write-wins strategies settle
 * automatically; the rest surface the conflict for outside input.
 */
export type ConflictStrategy =
  | 'last-write-wins'
  | 'first-write-wins'
  | 'merge'
  | 'ask-user'
  | 'device-priority';

export type SyncMessageType =
  | 'heartbeat'
  | 'device-registration'
  | 'device-deregistration'
  | 'full-sync'
  | 'delta-sync'
  | 'conflict-resolution'
  | 'acknowledgment'
  | 'request';

export type SyncManagerStatus = 'stopped' | 'running';

export interface DeviceInfo {
  id: string;
  name: string;
  platform: DevicePlatform;
  /** Receiver-local time the device was last heard from */
  lastSeen: number;
  syncVersion: number;
  isOnline: boolean;
  capabilities: DeviceCapability[];
}

/**
 * Immutable unit of exchange between replicas.
 *
 * `checksum` is SHA-256 over `payload` followed by the UTF-8 bytes of `id`,
 * so re-targeting a message keeps it valid.
 */
export interface SyncMessage {
  readonly id: string;
  readonly sourceDeviceId: string;
  /** Absent for broadcasts */
  readonly targetDeviceId?: string;
  readonly type: SyncMessageType;
  readonly payload: Uint8Array;
  readonly timestamp: number;
  readonly vectorClock: VectorClock;
  readonly checksum: string;
}

/**
 * Two replicas edited the same entity without seeing each other's edit.
 */
export interface DeviceConflict<T = JsonValue> {
  id: string;
  entityId: string;
  entityType: string;
  localDeviceId: string;
  remoteDeviceId: string;
  localVectorClock: VectorClock;
  remoteVectorClock: VectorClock;
  localData: T;
  remoteData: T;
  timestamp: number;
}

export type ResolutionKind = 'last-write-wins' | 'first-write-wins' | 'manual';

export interface ConflictResolution<T = JsonValue> {
  conflictId: string;
  entityId: string;
  entityType: string;
  resolution: ResolutionKind;
  resolvedData: T;
  resolvedVectorClock: VectorClock;
}

/**
 * Carries messages between replicas. Implementations must deliver payload
 * bytes unchanged and call `handleIncoming` on the receiving manager.
 */
export interface SyncTransport {
  send(message: SyncMessage, targetDeviceId: string): Promise<void>;
  broadcast(message: SyncMessage): Promise<void>;
}

/**
 * Receives full-sync, delta-sync and request messages, one at a time.
 */
export type SyncMessageHandler = (message: SyncMessage) => Promise<void> | void;

export interface MultiDeviceSyncConfig {
  deviceName: string;
  transport: SyncTransport;
  deviceId?: string;
  platform?: DevicePlatform;
  syncProtocol?: SyncProtocol;
  heartbeatIntervalMs?: number;
  conflictStrategy?: ConflictStrategy;
  /** Most remote devices kept in the registry */
  maxDevices?: number;
  capabilities?: DeviceCapability[];
  logger?: Logger;
  now?: () => number;
}

export interface MultiDeviceDefaults {
  platform: DevicePlatform;
  syncProtocol: SyncProtocol;
  heartbeatIntervalMs: number;
  conflictStrategy: ConflictStrategy;
  maxDevices: number;
  capabilities: readonly DeviceCapability[];
}

export const DEFAULT_MULTI_DEVICE_CONFIG: Readonly<MultiDeviceDefaults> = Object.freeze({
  platform: 'web',
  syncProtocol: 'websocket',
  heartbeatIntervalMs: 30_000,
  conflictStrategy: 'last-write-wins',
  maxDevices: 10,
  capabilities: Object.freeze<DeviceCapability[]>(['offlineStorage', 'encryption', 'backgroundSync']),
});

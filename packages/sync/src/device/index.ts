export { findConflict, pickWinner, resolveConflict, type ConflictCandidate } from './conflict.js';
export { ManualResolutionRequiredError } from './errors.js';
export {
  InMemoryTransportHub,
  type DeliveryFailure,
  type SyncEndpoint,
} from './in-memory-transport.js';
export {
  MultiDeviceSyncManager,
  createMultiDeviceSyncManager,
  type DetectConflictInput,
} from './multi-device-sync-manager.js';
export { SerialQueue } from './serial-queue.js';
export {
  assertSyncMessageIntegrity,
  computeMessageChecksum,
  createSyncMessage,
  decodePayload,
  decodeSyncMessage,
  encodePayload,
  encodeSyncMessage,
  retargetSyncMessage,
  verifySyncMessage,
  type CreateSyncMessageInput,
} from './sync-message.js';
export {
  DEFAULT_MULTI_DEVICE_CONFIG,
  type ConflictResolution,
  type ConflictStrategy,
  type DeviceCapability,
  type DeviceConflict,
  type DeviceInfo,
  type DevicePlatform,
  type MultiDeviceDefaults,
  type MultiDeviceSyncConfig,
  type ResolutionKind,
  type SyncManagerStatus,
  type SyncMessage,
  type SyncMessageHandler,
  type SyncMessageType,
  type SyncProtocol,
  type SyncTransport,
} from './types.js';

/**
 * Sync message construction, verification and wire encoding.
 *
 * Payloads are canonical JSON bytes. On the wire a message is a JSON
 * envelope with the payload in base64.
 *
 * @module device/sync-message
 */

import {
  IntegrityError,
  VectorClock,
  bytesToUtf8,
  decodeBase64,
  encodeBase64,
  encodeCanonical,
  encodedSyncMessageSchema,
  generateId,
  parseJson,
  parseWire,
  sha256Hex,
  utf8ToBytes,
  type EncodedSyncMessage,
} from '@driftsync/core';
import type { z } from 'zod';
import type { SyncMessage, SyncMessageType } from './types.js';

export interface CreateSyncMessageInput {
  sourceDeviceId: string;
  targetDeviceId?: string;
  type: SyncMessageType;
  payload: Uint8Array;
  vectorClock: VectorClock;
  timestamp: number;
  id?: string;
}

/**
 * SHA-256 over the payload followed by the message id
 */
export function computeMessageChecksum(payload: Uint8Array, id: string): string {
  return sha256Hex(payload, utf8ToBytes(id));
}

export function createSyncMessage(input: CreateSyncMessageInput): SyncMessage {
  const id = input.id ?? generateId();
  return {
    id,
    sourceDeviceId: input.sourceDeviceId,
    targetDeviceId: input.targetDeviceId,
    type: input.type,
    payload: input.payload,
    timestamp: input.timestamp,
    vectorClock: input.vectorClock,
    checksum: computeMessageChecksum(input.payload, id),
  };
}

export function verifySyncMessage(message: SyncMessage): boolean {
  return computeMessageChecksum(message.payload, message.id) === message.checksum;
}

/**
 * @throws IntegrityError DRIFT_I100 when the checksum does not match
 */
export function assertSyncMessageIntegrity(message: SyncMessage): void {
  if (!verifySyncMessage(message)) {
    throw new IntegrityError('DRIFT_I100', {
      messageId: message.id,
      sourceDeviceId: message.sourceDeviceId,
      type: message.type,
    });
  }
}

/**
 * Re-issue a message for another target; id and checksum are unchanged.
 */
export function retargetSyncMessage(message: SyncMessage, targetDeviceId: string | undefined): SyncMessage {
  return { ...message, targetDeviceId };
}

export function encodePayload(value: unknown): Uint8Array {
  return encodeCanonical(value);
}

/**
 * Parse and validate a message payload.
 *
 * @throws DriftError DRIFT_V400 when the payload is not valid for the schema
 */
export function decodePayload<S extends z.ZodTypeAny>(
  schema: S,
  message: SyncMessage,
  what: string
): z.output<S> {
  return parseWire(schema, parseJson(bytesToUtf8(message.payload)), `${message.type} ${what}`);
}

export function encodeSyncMessage(message: SyncMessage): Uint8Array {
  const envelope: EncodedSyncMessage = {
    id: message.id,
    sourceDeviceId: message.sourceDeviceId,
    targetDeviceId: message.targetDeviceId,
    type: message.type,
    payload: encodeBase64(message.payload),
    timestamp: message.timestamp,
    vectorClock: message.vectorClock.toJSON(),
    checksum: message.checksum,
  };
  return encodeCanonical(envelope);
}

/**
 * Decode a wire envelope. The checksum is not verified here; that is
 * `handleIncoming`'s first step.
 *
 * @throws DriftError DRIFT_V400 for a malformed envelope
 */
export function decodeSyncMessage(bytes: Uint8Array): SyncMessage {
  const envelope = parseWire(encodedSyncMessageSchema, parseJson(bytesToUtf8(bytes)), 'sync message');
  return {
    id: envelope.id,
    sourceDeviceId: envelope.sourceDeviceId,
    targetDeviceId: envelope.targetDeviceId,
    type: envelope.type,
    payload: decodeBase64(envelope.payload),
    timestamp: envelope.timestamp,
    vectorClock: VectorClock.from(envelope.vectorClock),
    checksum: envelope.checksum,
  };
}

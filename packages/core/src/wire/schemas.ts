/**
 * Wire schemas for everything that crosses the replica boundary.
 *
 * Payloads are validated after their checksum has been verified, so a
 * schema failure always means a well-formed but incompatible sender.
 *
 * @module wire/schemas
 */

import { z } from 'zod';
import { DriftError } from '../errors/drift-error.js';
import type { JsonValue } from '../types/json.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export const vectorClockStateSchema = z.record(z.number().int().nonnegative());

const pathSchema = z.array(z.string()).min(1);
const countSchema = z.number().int().nonnegative();

export const patchOperationSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('retain'), count: countSchema }),
  z.object({ type: z.literal('insert'), bytes: z.string() }),
  z.object({ type: z.literal('delete'), count: countSchema }),
  z.object({ type: z.literal('copy'), offset: countSchema, length: countSchema }),
  z.object({ type: z.literal('setField'), path: pathSchema, value: jsonValueSchema }),
  z.object({ type: z.literal('deleteField'), path: pathSchema }),
  z.object({ type: z.literal('incrementField'), path: pathSchema, amount: z.number().int() }),
  z.object({ type: z.literal('appendArray'), path: pathSchema, values: z.array(jsonValueSchema) }),
  z.object({ type: z.literal('removeArrayItems'), path: pathSchema, indices: z.array(countSchema) }),
]);

export const deltaPatchSchema = z.object({
  operations: z.array(patchOperationSchema),
  sourceChecksum: z.string(),
  targetChecksum: z.string(),
  sizeReduction: z.number().min(0).max(1),
});

export const deltaOperationSchema = z.enum(['create', 'update', 'delete', 'move', 'restore']);

export const deltaChangeSchema = z.object({
  id: z.string(),
  entityId: z.string(),
  entityType: z.string(),
  operation: deltaOperationSchema,
  timestamp: z.number(),
  version: z.number().int().positive(),
  previousVersion: z.number().int().nonnegative().optional(),
  checksum: z.string(),
  patch: deltaPatchSchema.optional(),
  metadata: z.record(z.string()),
  vectorClock: vectorClockStateSchema.optional(),
});

export const devicePlatformSchema = z.enum([
  'ios',
  'macos',
  'tvos',
  'watchos',
  'visionos',
  'android',
  'web',
  'desktop',
]);

export const deviceCapabilitySchema = z.enum([
  'backgroundSync',
  'pushNotifications',
  'realTimeSync',
  'offlineStorage',
  'encryption',
]);

export const deviceInfoSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  platform: devicePlatformSchema,
  lastSeen: z.number(),
  syncVersion: z.number().int().nonnegative(),
  isOnline: z.boolean(),
  capabilities: z.array(deviceCapabilitySchema),
});

export const conflictResolutionSchema = z.object({
  conflictId: z.string(),
  entityId: z.string(),
  entityType: z.string(),
  resolution: z.enum(['last-write-wins', 'first-write-wins', 'manual']),
  resolvedData: jsonValueSchema,
  resolvedVectorClock: vectorClockStateSchema,
});

export const acknowledgmentSchema = z.object({
  messageId: z.string().min(1),
});

export const syncRequestSchema = z.object({
  scope: z.literal('full'),
});

export const syncMessageTypeSchema = z.enum([
  'heartbeat',
  'device-registration',
  'device-deregistration',
  'full-sync',
  'delta-sync',
  'conflict-resolution',
  'acknowledgment',
  'request',
]);

/** Encoded sync message envelope; `payload` is base64 */
export const encodedSyncMessageSchema = z.object({
  id: z.string().min(1),
  sourceDeviceId: z.string().min(1),
  targetDeviceId: z.string().min(1).optional(),
  type: syncMessageTypeSchema,
  payload: z.string(),
  timestamp: z.number(),
  vectorClock: vectorClockStateSchema,
  checksum: z.string(),
});

export type EncodedSyncMessage = z.infer<typeof encodedSyncMessageSchema>;

/**
 * Parse a value against a wire schema.
 *
 * @throws DriftError DRIFT_V400 listing every schema issue
 */
export function parseWire<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DriftError({
      code: 'DRIFT_V400',
      message: `Invalid ${what}: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'} ${issue.message}`)
        .join('; ')}`,
      context: { what },
    });
  }
  return result.data;
}

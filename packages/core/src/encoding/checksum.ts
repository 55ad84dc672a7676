import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, concatBytes, utf8ToBytes } from '@noble/hashes/utils';
import { canonicalStringify } from './canonical-json.js';

/**
 * Lower-case hex SHA-256 of raw bytes
 */
export function sha256Hex(...parts: Uint8Array[]): string {
  return bytesToHex(sha256(parts.length === 1 && parts[0] ? parts[0] : concatBytes(...parts)));
}

/**
 * Canonical UTF-8 bytes of a value
 */
export function encodeCanonical(value: unknown): Uint8Array {
  return utf8ToBytes(canonicalStringify(value));
}

/**
 * Content hash of a value's canonical encoding
 */
export function checksumOf(value: unknown): string {
  return sha256Hex(encodeCanonical(value));
}

export { utf8ToBytes };

/**
 * Decode UTF-8 bytes
 */
export function bytesToUtf8(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}

import { describe, expect, it } from 'vitest';
import { decodeBase64, encodeBase64 } from './base64.js';
import { bytesToUtf8, checksumOf, encodeCanonical, sha256Hex, utf8ToBytes } from './checksum.js';

describe('sha256Hex', () => {
  it('should hash raw bytes to lower-case hex', () => {
    expect(sha256Hex(utf8ToBytes('abc'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });

  it('should hash the concatenation of several parts', () => {
    expect(sha256Hex(utf8ToBytes('a'), utf8ToBytes('bc'))).toBe(sha256Hex(utf8ToBytes('abc')));
  });
});

describe('checksumOf', () => {
  it('should ignore key order', () => {
    expect(checksumOf({ a: 1, b: [1, 2] })).toBe(checksumOf({ b: [1, 2], a: 1 }));
  });

  it('should change when any value changes', () => {
    expect(checksumOf({ a: 1 })).not.toBe(checksumOf({ a: 2 }));
  });

  it('should hash the canonical encoding', () => {
    expect(checksumOf('abc')).toBe(sha256Hex(utf8ToBytes('"abc"')));
    expect(bytesToUtf8(encodeCanonical({ z: 0, a: 'é' }))).toBe('{"a":"é","z":0}');
  });
});

describe('base64', () => {
  it('should encode bytes', () => {
    expect(encodeBase64(utf8ToBytes('hello'))).toBe('aGVsbG8=');
  });

  it('should decode to the original bytes', () => {
    expect(bytesToUtf8(decodeBase64('aGVsbG8='))).toBe('hello');
  });

  it('should respect subarray views', () => {
    const bytes = utf8ToBytes('xxhelloxx').subarray(2, 7);
    expect(encodeBase64(bytes)).toBe('aGVsbG8=');
  });
});

export { decodeBase64, encodeBase64 } from './base64.js';
export { canonicalStringify, parseJson, toJsonValue } from './canonical-json.js';
export { bytesToUtf8, checksumOf, encodeCanonical, sha256Hex, utf8ToBytes } from './checksum.js';

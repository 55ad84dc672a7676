/**
 * driftsync error codes
 *
 * Error codes are structured as DRIFT_[CATEGORY][NUMBER]:
 * - I: Integrity errors (I100-I199) - bytes were corrupted in flight or at rest
 * - C: Causality errors (C200-C299) - the local copy diverged further than expected
 * - R: Resolution outcomes (R300-R399) - a conflict needs outside input
 * - V: Validation errors (V400-V499)
 * - D: Device/session errors (D500-D599)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Integrity errors (I100-I199)
  DRIFT_I100: {
    code: 'DRIFT_I100',
    message: 'Message checksum validation failed',
    suggestion:
      'The message is corrupted and must be discarded. Ask the sender to regenerate it; do not retry with the same bytes.',
  },
  DRIFT_I101: {
    code: 'DRIFT_I101',
    message: 'Patched data does not match the expected target checksum',
    suggestion:
      'The patch or the local data is corrupted. Replace the local copy with a full snapshot from the sender.',
  },

  // Causality errors (C200-C299)
  DRIFT_C200: {
    code: 'DRIFT_C200',
    message: 'Local data does not match the patch source checksum',
    suggestion:
      'The data changed faster than it could sync. Request a full resync of this entity before applying further patches.',
  },
  DRIFT_C201: {
    code: 'DRIFT_C201',
    message: 'Version conflict detected',
    suggestion: 'The change log already holds a newer version of this entity. Request a full resync.',
  },

  // Resolution outcomes (R300-R399)
  DRIFT_R300: {
    code: 'DRIFT_R300',
    message: 'Conflict requires manual resolution',
    suggestion:
      'The configured strategy cannot pick a winner on its own. Present the conflict to the user and call submitResolution() with the chosen value.',
  },
  DRIFT_R301: {
    code: 'DRIFT_R301',
    message: 'Required conflict data is missing',
    suggestion: 'Both sides of a conflict must carry their data before it can be resolved.',
  },
  DRIFT_R302: {
    code: 'DRIFT_R302',
    message: 'Conflict not found',
    suggestion: 'The conflict was already resolved or was never detected on this replica.',
  },

  // Validation errors (V400-V499)
  DRIFT_V400: {
    code: 'DRIFT_V400',
    message: 'Invalid data format',
    suggestion: 'Values must be plain JSON: records, arrays, strings, finite numbers, booleans or null.',
  },
  DRIFT_V401: {
    code: 'DRIFT_V401',
    message: 'Invalid argument',
    suggestion: 'Check the argument against the documented constraints.',
  },
  DRIFT_V402: {
    code: 'DRIFT_V402',
    message: 'Duplicate entity id in batch',
    suggestion: 'Each entity may appear at most once per snapshot.',
  },
  DRIFT_V403: {
    code: 'DRIFT_V403',
    message: 'Failed to generate delta patch',
    suggestion: 'Both sides of a patch must be encodable as JSON.',
  },
  DRIFT_V404: {
    code: 'DRIFT_V404',
    message: 'Failed to apply delta patch',
    suggestion: 'The patch does not fit the shape of the data. Request a full snapshot instead.',
  },

  // Device/session errors (D500-D599)
  DRIFT_D500: {
    code: 'DRIFT_D500',
    message: 'Sync manager is not running',
    suggestion: 'Call start() before sending messages.',
  },
  DRIFT_D501: {
    code: 'DRIFT_D501',
    message: 'Target device not found',
    suggestion: 'The device has not registered with this replica or was evicted.',
  },

  // Internal errors (X900-X999)
  DRIFT_X900: {
    code: 'DRIFT_X900',
    message: 'Internal error',
    suggestion: 'This is a bug in driftsync. Please report it with the error context.',
  },
} as const;

/**
 * Type for error codes
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error categories
 */
export type ErrorCategory =
  | 'integrity'
  | 'causality'
  | 'resolution'
  | 'validation'
  | 'device'
  | 'internal';

/**
 * Get the category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const prefix = code.charAt(6);
  switch (prefix) {
    case 'I':
      return 'integrity';
    case 'C':
      return 'causality';
    case 'R':
      return 'resolution';
    case 'V':
      return 'validation';
    case 'D':
      return 'device';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}

/**
 * Error codes
 *
 * Codes are structured as SHARDSTATS_[CATEGORY][NUMBER]:
 * - W: Binary wire errors (W100-W199)
 * - D: Document form errors (D200-D299)
 * - B: Broadcast dispatch errors (B300-B399)
 * - C: Configuration errors (C400-C499)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Binary wire errors (W100-W199)
  SHARDSTATS_W100: {
    code: 'SHARDSTATS_W100',
    message: 'Binary stream truncated',
    suggestion: 'The stream ended before every field was read. Check that the sender wrote the full message.',
  },
  SHARDSTATS_W101: {
    code: 'SHARDSTATS_W101',
    message: 'Malformed binary stream',
    suggestion: 'The stream does not follow the expected field layout. Check that both ends use the same codec version.',
  },
  SHARDSTATS_W102: {
    code: 'SHARDSTATS_W102',
    message: 'Counter out of range',
    suggestion: 'A summed counter exceeded Number.MAX_SAFE_INTEGER and can no longer be encoded exactly.',
  },

  // Document form errors (D200-D299)
  SHARDSTATS_D200: {
    code: 'SHARDSTATS_D200',
    message: 'Malformed document',
    suggestion: 'The document must be a JSON object.',
  },
  SHARDSTATS_D201: {
    code: 'SHARDSTATS_D201',
    message: 'Invalid document field',
    suggestion: 'A recognised field holds a value of the wrong type. Unknown fields are ignored, known ones are checked.',
  },

  // Broadcast dispatch errors (B300-B399)
  SHARDSTATS_B300: {
    code: 'SHARDSTATS_B300',
    message: 'Shard request failed',
    suggestion: 'The shard did not answer successfully. The failure is recorded in the response.',
  },
  SHARDSTATS_B301: {
    code: 'SHARDSTATS_B301',
    message: 'Shard request timed out',
    suggestion: 'Increase timeoutMs or check the health of the node holding the shard.',
  },

  // Configuration errors (C400-C499)
  SHARDSTATS_C400: {
    code: 'SHARDSTATS_C400',
    message: 'Invalid configuration',
    suggestion: 'Check the configuration values against the documented ranges.',
  },

  // Internal errors (X900-X999)
  SHARDSTATS_X900: {
    code: 'SHARDSTATS_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'wire' | 'document' | 'dispatch' | 'config' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt('SHARDSTATS_'.length);
  switch (letter) {
    case 'W':
      return 'wire';
    case 'D':
      return 'document';
    case 'B':
      return 'dispatch';
    case 'C':
      return 'config';
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

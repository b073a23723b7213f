/**
 * Error codes for all toprank errors.
 * Used to identify error types programmatically.
 */
export enum ToprankErrorCode {
  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',

  // File System
  INVALID_PATH = 'INVALID_PATH',
  WRITE_FAILED = 'WRITE_FAILED',

  // Parsing
  PARSE_FAILED = 'PARSE_FAILED',
  UNSUPPORTED_LANGUAGE = 'UNSUPPORTED_LANGUAGE',

  // Caller input
  INVALID_INPUT = 'INVALID_INPUT',

  // System
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export const ErrorCodes = {
  // Content errors
  PARSE_ERROR: 'PARSE_ERROR',
  MISSING_REFERENCE: 'MISSING_REFERENCE',
  REFERENCE_ID_OVERFLOW: 'REFERENCE_ID_OVERFLOW',

  // Package errors
  INVALID_DOCX: 'INVALID_DOCX',
  ENTRY_NOT_FOUND: 'ENTRY_NOT_FOUND',
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',

  // File system errors
  FILE_READ_ERROR: 'FILE_READ_ERROR',
  FILE_WRITE_ERROR: 'FILE_WRITE_ERROR',

  // Usage errors
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
  INVALID_CONFIG: 'INVALID_CONFIG',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

import { ErrorCodes, ErrorCode } from './error-codes';

export const EXIT_CODES = {
  failure: 1,
  usage: 2,
} as const;

export class AppError extends Error {
  public exitCode: number;
  public isOperational: boolean;
  public code: ErrorCode;
  public details?: unknown;

  constructor(message: string, exitCode: number, code: ErrorCode, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.exitCode = exitCode;
    this.isOperational = true;
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }

  static parse(message: string, details?: unknown): AppError {
    return new AppError(message, EXIT_CODES.failure, ErrorCodes.PARSE_ERROR, details);
  }

  static missingReference(footnoteNumber: number): AppError {
    return new AppError(
      `Cross-reference to footnote ${footnoteNumber} has no matching footnote reference in the document`,
      EXIT_CODES.failure,
      ErrorCodes.MISSING_REFERENCE,
      { footnoteNumber }
    );
  }

  static referenceIdOverflow(footnoteNumber: number, maxDigits: number): AppError {
    return new AppError(
      `Footnote number ${footnoteNumber} does not fit in a ${maxDigits}-digit reference id`,
      EXIT_CODES.failure,
      ErrorCodes.REFERENCE_ID_OVERFLOW,
      { footnoteNumber, maxDigits }
    );
  }

  static invalidDocx(message: string): AppError {
    return new AppError(message, EXIT_CODES.failure, ErrorCodes.INVALID_DOCX);
  }

  static entryNotFound(entryName: string): AppError {
    return new AppError(`Package entry ${entryName} not found`, EXIT_CODES.failure, ErrorCodes.ENTRY_NOT_FOUND, { entryName });
  }

  static fileTooLarge(what: string, size: number, limit: number): AppError {
    return new AppError(
      `${what} is too large: ${size} bytes exceeds limit of ${limit} bytes`,
      EXIT_CODES.failure,
      ErrorCodes.FILE_TOO_LARGE,
      { size, limit }
    );
  }

  static fileRead(filePath: string, cause: string): AppError {
    return new AppError(`Error reading the file ${filePath}: ${cause}`, EXIT_CODES.failure, ErrorCodes.FILE_READ_ERROR, { filePath });
  }

  static fileWrite(filePath: string, cause: string): AppError {
    return new AppError(`Error writing the file ${filePath}: ${cause}`, EXIT_CODES.failure, ErrorCodes.FILE_WRITE_ERROR, { filePath });
  }

  static invalidArguments(message: string, details?: unknown): AppError {
    return new AppError(message, EXIT_CODES.usage, ErrorCodes.INVALID_ARGUMENTS, details);
  }

  static invalidConfig(message: string, details?: unknown): AppError {
    return new AppError(message, EXIT_CODES.usage, ErrorCodes.INVALID_CONFIG, details);
  }

  static internal(message: string = 'Internal error'): AppError {
    return new AppError(message, EXIT_CODES.failure, ErrorCodes.INTERNAL_ERROR);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

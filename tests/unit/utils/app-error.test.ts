/**
 * AppError Tests
 */
import { describe, it, expect } from 'vitest';
import { AppError, isAppError } from '../../../src/utils/app-error';
import { ErrorCodes } from '../../../src/utils/error-codes';

describe('AppError', () => {
  it('should build parse errors with details', () => {
    const error = AppError.parse('Error parsing cross references', { text: '1x' });
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe(ErrorCodes.PARSE_ERROR);
    expect(error.exitCode).toBe(1);
    expect(error.details).toEqual({ text: '1x' });
    expect(error.isOperational).toBe(true);
  });

  it('should name the footnote in missing reference errors', () => {
    const error = AppError.missingReference(12);
    expect(error.message).toBe('Cross-reference to footnote 12 has no matching footnote reference in the document');
    expect(error.code).toBe('MISSING_REFERENCE');
  });

  it('should use exit code 2 for usage errors', () => {
    expect(AppError.invalidArguments('bad').exitCode).toBe(2);
    expect(AppError.invalidConfig('bad').exitCode).toBe(2);
  });

  it('should describe file errors with the path', () => {
    expect(AppError.fileRead('/tmp/a.docx', 'ENOENT').message).toBe('Error reading the file /tmp/a.docx: ENOENT');
    expect(AppError.fileWrite('/tmp/b.docx', 'EACCES').code).toBe('FILE_WRITE_ERROR');
  });

  it('should be recognised by isAppError', () => {
    expect(isAppError(AppError.internal())).toBe(true);
    expect(isAppError(new Error('plain'))).toBe(false);
  });
});

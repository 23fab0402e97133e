/**
 * File Validator Utility
 * Magic byte and size checks for .docx input before it reaches the unzipper
 */

/**
 * ZIP signatures a .docx (Office Open XML) package may start with
 */
const ZIP_SIGNATURES: { signature: number[]; offset?: number }[] = [
  { signature: [0x50, 0x4B, 0x03, 0x04] }, // PK.. (ZIP)
  { signature: [0x50, 0x4B, 0x05, 0x06] }, // PK.. (empty ZIP)
  { signature: [0x50, 0x4B, 0x07, 0x08] }, // PK.. (spanned ZIP)
];

export interface FileValidationResult {
  valid: boolean;
  error?: string;
  warnings: string[];
}

export function hasZipSignature(buffer: Buffer): boolean {
  return ZIP_SIGNATURES.some(({ signature, offset = 0 }) => {
    if (buffer.length < offset + signature.length) return false;
    return signature.every((byte, index) => buffer[offset + index] === byte);
  });
}

/**
 * Validates file size is within limits
 */
export function validateFileSize(size: number, maxSizeBytes: number): boolean {
  return size > 0 && size <= maxSizeBytes;
}

/**
 * Validates a buffer claimed to be a .docx package
 *
 * @param filename - used only for the extension warning
 */
export function validateDocxBuffer(buffer: Buffer, maxSizeBytes: number, filename?: string): FileValidationResult {
  const warnings: string[] = [];

  if (!validateFileSize(buffer.length, maxSizeBytes)) {
    return {
      valid: false,
      error: buffer.length === 0
        ? 'File is empty'
        : `File size ${buffer.length} exceeds maximum ${maxSizeBytes}`,
      warnings,
    };
  }

  if (!hasZipSignature(buffer)) {
    return {
      valid: false,
      error: 'File content is not a ZIP archive; a .docx file is required',
      warnings,
    };
  }

  if (filename && !filename.toLowerCase().endsWith('.docx')) {
    warnings.push(`Extension of ${filename} is not .docx`);
  }

  return { valid: true, warnings };
}

export * from './services/crossref';
export {
  docxCrossRefService,
  processDocxFile,
} from './services/docx/docx-crossref.service';
export type {
  BufferCrossRefResult,
  DocxCrossRefOptions,
  DocxCrossRefResult,
  XmlFilePaths,
} from './services/docx/docx-crossref.service';
export { docxPackageService, readDocxPackage, writeDocxPackage } from './services/docx/docx-package.service';
export type { DocxPackage, DocxPackageOptions } from './services/docx/docx-package.service';
export { AppError, isAppError } from './utils/app-error';
export { ErrorCodes } from './utils/error-codes';
export type { ErrorCode } from './utils/error-codes';
export { createLogger, logger, silentLogger } from './lib/logger';
export type { Logger, LogLevel, LogContext } from './lib/logger';
export type { MissingReferencePolicy } from './config';

/**
 * DOCX Package Service
 * Reads document.xml and footnotes.xml out of a .docx archive and writes them
 * back, leaving every other entry as it was
 */

import JSZip from 'jszip';
import { logger as defaultLogger, Logger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import { formatFileSize } from '../../utils/file-helpers';
import { validateDocxBuffer } from '../../utils/file-validator';
import { DOCX_ENTRIES, DocxLimits, getDocxLimits } from '../../config/docx.config';

export interface DocxPackage {
  zip: JSZip;
  documentXml: string;
  footnotesXml: string;
}

export interface DocxPackageOptions {
  limits?: DocxLimits;
  logger?: Logger;
  filename?: string;
}

class DocxPackageService {
  async read(buffer: Buffer, options: DocxPackageOptions = {}): Promise<DocxPackage> {
    const limits = options.limits ?? getDocxLimits();
    const log = options.logger ?? defaultLogger;

    const validation = validateDocxBuffer(buffer, limits.maxDocxSize, options.filename);
    if (!validation.valid) {
      if (buffer.length > limits.maxDocxSize) {
        throw AppError.fileTooLarge('DOCX file', buffer.length, limits.maxDocxSize);
      }
      throw AppError.invalidDocx(validation.error ?? 'Invalid DOCX file');
    }
    for (const warning of validation.warnings) {
      log.warn(`[DOCX Package] ${warning}`);
    }

    log.debug(`[DOCX Package] Loading archive (${formatFileSize(buffer.length)})`);

    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(buffer);
    } catch (error) {
      throw AppError.invalidDocx(`Unable to open DOCX archive: ${error instanceof Error ? error.message : String(error)}`);
    }

    const entryCount = Object.keys(zip.files).length;
    if (entryCount > limits.maxZipEntries) {
      throw AppError.invalidDocx(`DOCX archive has ${entryCount} entries, more than the limit of ${limits.maxZipEntries}`);
    }

    const documentXml = await this.readEntry(zip, DOCX_ENTRIES.document, limits);
    const footnotesXml = await this.readEntry(zip, DOCX_ENTRIES.footnotes, limits);

    log.debug('[DOCX Package] Archive loaded', {
      entries: entryCount,
      documentXml: formatFileSize(Buffer.byteLength(documentXml)),
      footnotesXml: formatFileSize(Buffer.byteLength(footnotesXml)),
    });

    return { zip, documentXml, footnotesXml };
  }

  /**
   * Replace the two XML entries and produce the new archive.
   * Other entries keep their contents; the archive is recompressed with DEFLATE
   * as Word writes it.
   */
  async write(zip: JSZip, documentXml: string, footnotesXml: string): Promise<Buffer> {
    zip.file(DOCX_ENTRIES.document, documentXml);
    zip.file(DOCX_ENTRIES.footnotes, footnotesXml);
    return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  }

  private async readEntry(zip: JSZip, entryName: string, limits: DocxLimits): Promise<string> {
    const entry = zip.file(entryName);
    if (!entry) {
      throw AppError.entryNotFound(entryName);
    }
    const xml = await entry.async('string');
    const size = Buffer.byteLength(xml);
    if (size > limits.maxXmlSize) {
      throw AppError.fileTooLarge(entryName, size, limits.maxXmlSize);
    }
    return xml;
  }
}

export const docxPackageService = new DocxPackageService();

export const readDocxPackage = (buffer: Buffer, options?: DocxPackageOptions): Promise<DocxPackage> =>
  docxPackageService.read(buffer, options);

export const writeDocxPackage = (zip: JSZip, documentXml: string, footnotesXml: string): Promise<Buffer> =>
  docxPackageService.write(zip, documentXml, footnotesXml);

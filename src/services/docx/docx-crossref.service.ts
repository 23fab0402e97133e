/**
 * DOCX Cross-Reference Service
 * Runs the cross-reference pipeline over a .docx file, or over loose
 * document.xml / footnotes.xml files
 */

import path from 'path';
import { logger as defaultLogger } from '../../lib/logger';
import { loadBinaryFile, loadTextFile, saveBinaryFile, saveTextFile } from '../../utils/file-helpers';
import { processCrossReferences } from '../crossref/crossref-pipeline.service';
import type { PipelineOptions, PipelineStats } from '../crossref/crossref.types';
import { docxPackageService } from './docx-package.service';
import type { DocxLimits } from '../../config/docx.config';

export interface DocxCrossRefOptions extends PipelineOptions {
  limits?: DocxLimits;
}

export interface DocxCrossRefResult {
  outputPath: string;
  stats: PipelineStats;
}

export interface BufferCrossRefResult {
  buffer: Buffer;
  stats: PipelineStats;
}

export interface XmlFilePaths {
  documentXml: string;
  footnotesXml: string;
}

class DocxCrossRefService {
  /**
   * Rewrite a .docx package held in memory.
   * Nothing is produced if any stage fails.
   */
  async processBuffer(buffer: Buffer, options: DocxCrossRefOptions = {}, filename?: string): Promise<BufferCrossRefResult> {
    const pkg = await docxPackageService.read(buffer, { limits: options.limits, logger: options.logger, filename });
    const result = processCrossReferences(pkg.documentXml, pkg.footnotesXml, options);
    const output = await docxPackageService.write(pkg.zip, result.document, result.footnotes);
    return { buffer: output, stats: result.stats };
  }

  /**
   * Rewrite a .docx file. Without `outputPath` the input is overwritten; it is
   * read fully before anything is written.
   */
  async processFile(inputPath: string, outputPath?: string, options: DocxCrossRefOptions = {}): Promise<DocxCrossRefResult> {
    const log = options.logger ?? defaultLogger;
    const target = outputPath ?? inputPath;

    log.info(`[DOCX CrossRef] Processing ${inputPath}`);
    const input = await loadBinaryFile(inputPath);
    const { buffer, stats } = await this.processBuffer(input, options, path.basename(inputPath));

    await saveBinaryFile(target, buffer);
    log.info(`[DOCX CrossRef] Wrote ${target}`);

    return { outputPath: target, stats };
  }

  /** Same pipeline over already extracted XML files. */
  async processXmlFiles(input: XmlFilePaths, output: XmlFilePaths, options: PipelineOptions = {}): Promise<PipelineStats> {
    const log = options.logger ?? defaultLogger;

    const documentXml = await loadTextFile(input.documentXml);
    const footnotesXml = await loadTextFile(input.footnotesXml);
    const result = processCrossReferences(documentXml, footnotesXml, options);

    await saveTextFile(output.documentXml, result.document);
    await saveTextFile(output.footnotesXml, result.footnotes);
    log.info(`[DOCX CrossRef] Wrote ${output.documentXml} and ${output.footnotesXml}`);

    return result.stats;
  }
}

export const docxCrossRefService = new DocxCrossRefService();

export function processDocxFile(inputPath: string, outputPath?: string, options: DocxCrossRefOptions = {}): Promise<DocxCrossRefResult> {
  return docxCrossRefService.processFile(inputPath, outputPath, options);
}

/**
 * DOCX Package Configuration
 * Entry names and limits used when reading and rewriting a .docx archive
 */

import { getConfig } from './index';

export const DOCX_ENTRIES = {
  document: 'word/document.xml',
  footnotes: 'word/footnotes.xml',
} as const;

export interface DocxLimits {
  /** Maximum size of the .docx archive itself */
  maxDocxSize: number;
  /** Maximum uncompressed size of each XML entry we rewrite */
  maxXmlSize: number;
  /** Maximum number of entries in the archive */
  maxZipEntries: number;
}

export function getDocxLimits(): DocxLimits {
  const { maxDocxSize, maxXmlSize, maxZipEntries } = getConfig();
  return { maxDocxSize, maxXmlSize, maxZipEntries };
}

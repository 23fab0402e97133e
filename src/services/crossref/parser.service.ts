/**
 * Parser
 * Turns lexer segments into branches: numbered footnote references for
 * document.xml, resolved cross-references for footnotes.xml.
 */

import { logger as defaultLogger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import type {
  Branch,
  FootnotesParseResult,
  ParseResult,
  Segment,
  StageOptions,
} from './crossref.types';
import { REFERENCE_ID_DIGITS } from './reference-patterns';

/**
 * Parse the document segments.
 *
 * Footnote references are numbered by position starting at 1. This assumes
 * the document numbers its footnotes sequentially with no offset; it is not
 * checked against footnotes.xml.
 */
export function parseDocument(segments: Segment[], options: StageOptions = {}): Branch[] {
  const log = options.logger ?? defaultLogger;
  log.debug('[Parser] Starting document parser...');

  const branches: Branch[] = [];
  let footnoteNumber = 1;

  for (const segment of segments) {
    switch (segment.kind) {
      case 'Other':
        branches.push({ type: 'text', contents: segment.span });
        break;
      case 'FootnoteReference':
        log.trace(`[Parser] Pushing footnote reference ${footnoteNumber}`);
        branches.push({ type: 'footnoteRef', number: footnoteNumber, contents: segment.span });
        footnoteNumber++;
        break;
      case 'CrossReference':
        // document.xml never yields cross-references
        break;
    }
  }

  log.debug('[Parser] Document parser finished.', { footnoteReferences: footnoteNumber - 1 });
  return branches;
}

/**
 * Read the footnote number out of a cross-reference's digits. Numbers must
 * fit the reference id, so more than REFERENCE_ID_DIGITS digits is an error.
 * Zero parses to 0; no footnote carries it, so the renderer treats it as a
 * missing reference.
 */
export function parseFootnoteNumber(digits: string): number {
  if (!/^\d+$/.test(digits)) {
    throw AppError.parse(`Error parsing cross references: "${digits}" is not a number`, { text: digits });
  }
  const significant = digits.replace(/^0+/, '');
  if (significant.length > REFERENCE_ID_DIGITS) {
    throw AppError.parse(
      `Error parsing cross references: "${digits}" exceeds ${REFERENCE_ID_DIGITS} digits`,
      { text: digits }
    );
  }
  return significant.length === 0 ? 0 : Number(significant);
}

/**
 * Parse the footnote segments, collecting the distinct footnote numbers that
 * are cross-referenced in the order they first appear.
 */
export function parseFootnotes(segments: Segment[], options: StageOptions = {}): FootnotesParseResult {
  const log = options.logger ?? defaultLogger;
  log.debug('[Parser] Starting footnotes parser...');

  const branches: Branch[] = [];
  const referenced: number[] = [];
  const seen = new Set<number>();

  for (const segment of segments) {
    switch (segment.kind) {
      case 'Other':
        branches.push({ type: 'text', contents: segment.span });
        break;
      case 'CrossReference': {
        const number = parseFootnoteNumber(segment.span.text());
        if (!seen.has(number)) {
          log.trace(`[Parser] Adding footnote ${number} to used cross-references`);
          seen.add(number);
          referenced.push(number);
        }
        branches.push({ type: 'crossRef', number, digits: segment.span });
        break;
      }
      case 'FootnoteReference':
        break;
    }
  }

  log.debug('[Parser] Footnote parser finished.', { referencedFootnotes: referenced.length });
  return { branches, referenced };
}

export function parse(
  documentSegments: Segment[],
  footnoteSegments: Segment[],
  options: StageOptions = {}
): ParseResult {
  const log = options.logger ?? defaultLogger;
  log.debug('[Parser] Starting parser...');

  const documentBranches = parseDocument(documentSegments, options);
  const { branches: footnoteBranches, referenced } = parseFootnotes(footnoteSegments, options);

  log.debug('[Parser] Parser finished.');
  return { documentBranches, footnoteBranches, referenced };
}

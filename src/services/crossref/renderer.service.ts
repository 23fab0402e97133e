/**
 * Renderer
 * Writes the new document.xml and footnotes.xml.
 *
 * Bookmark markup in document.xml:
 *   <w:bookmarkStart w:id="1" w:name="_Ref000000001"/> ...run... <w:bookmarkEnd w:id="1"/>
 * The id pairs the start and end tags; the name is what a NOTEREF field in
 * footnotes.xml points at.
 */

import { logger as defaultLogger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import type {
  Branch,
  DocumentRenderResult,
  ReferenceIdTable,
  RenderOptions,
  RenderResult,
  StageOptions,
} from './crossref.types';
import {
  REFERENCE_ID_DIGITS,
  REFERENCE_ID_PREFIX,
  bookmarkEndTag,
  bookmarkStartTag,
  noteRefField,
} from './reference-patterns';

/**
 * Build the bookmark name for a footnote, e.g. 1 → "_Ref000000001".
 * Numbers wider than the padding are rejected instead of widening the name.
 */
export function createReferenceId(footnoteNumber: number): string {
  if (!Number.isInteger(footnoteNumber) || footnoteNumber < 1) {
    throw AppError.internal(`Invalid footnote number ${footnoteNumber}`);
  }
  const digits = String(footnoteNumber);
  if (digits.length > REFERENCE_ID_DIGITS) {
    throw AppError.referenceIdOverflow(footnoteNumber, REFERENCE_ID_DIGITS);
  }
  return `${REFERENCE_ID_PREFIX}${digits.padStart(REFERENCE_ID_DIGITS, '0')}`;
}

/**
 * Render document.xml, wrapping every referenced footnote run in a bookmark.
 * Unreferenced runs are copied as they are and do not consume a bookmark id.
 */
export function renderDocument(
  branches: Branch[],
  referenced: Iterable<number>,
  startingBookmark: number,
  options: StageOptions = {}
): DocumentRenderResult {
  const log = options.logger ?? defaultLogger;
  log.debug('[Renderer] Beginning document rendering...');

  const wanted = new Set(referenced);
  const referenceIds: ReferenceIdTable = new Map();
  const chunks: string[] = [];
  let bookmarkId = startingBookmark;

  for (const branch of branches) {
    switch (branch.type) {
      case 'text':
        chunks.push(branch.contents.text());
        break;
      case 'footnoteRef': {
        if (!wanted.has(branch.number)) {
          chunks.push(branch.contents.text());
          break;
        }
        const referenceId = createReferenceId(branch.number);
        referenceIds.set(branch.number, referenceId);

        log.trace(`[Renderer] Bookmarking footnote ${branch.number}`, { bookmarkId, referenceId });
        chunks.push(bookmarkStartTag(bookmarkId, referenceId));
        chunks.push(branch.contents.text());
        chunks.push(bookmarkEndTag(bookmarkId));
        bookmarkId++;
        break;
      }
      case 'crossRef':
        break;
    }
  }

  const bookmarksAdded = bookmarkId - startingBookmark;
  log.debug('[Renderer] Document rendering finished.', { bookmarksAdded });
  return { text: chunks.join(''), referenceIds, bookmarksAdded, nextBookmarkId: bookmarkId };
}

/**
 * Render footnotes.xml, replacing each cross-reference number with a NOTEREF
 * field bound to the footnote's bookmark.
 */
export function renderFootnotes(
  branches: Branch[],
  referenceIds: ReferenceIdTable,
  options: RenderOptions = {}
): string {
  const log = options.logger ?? defaultLogger;
  const policy = options.missingReference ?? 'fail';
  log.debug('[Renderer] Beginning footnote rendering...');

  const chunks: string[] = [];

  for (const branch of branches) {
    switch (branch.type) {
      case 'text':
        chunks.push(branch.contents.text());
        break;
      case 'crossRef': {
        const referenceId = referenceIds.get(branch.number);
        if (referenceId === undefined) {
          if (policy === 'fail') {
            throw AppError.missingReference(branch.number);
          }
          log.warn(`[Renderer] No footnote ${branch.number} to cross-reference; leaving the number as text`);
          chunks.push(branch.digits.text());
          break;
        }
        chunks.push(noteRefField(referenceId, branch.number));
        break;
      }
      case 'footnoteRef':
        break;
    }
  }

  log.debug('[Renderer] Footnote rendering finished.');
  return chunks.join('');
}

export function render(
  documentBranches: Branch[],
  referenced: number[],
  startingBookmark: number,
  footnoteBranches: Branch[],
  options: RenderOptions = {}
): RenderResult {
  const log = options.logger ?? defaultLogger;
  log.debug('[Renderer] Beginning rendering...');

  const documentResult = renderDocument(documentBranches, referenced, startingBookmark, options);
  const footnotes = renderFootnotes(footnoteBranches, documentResult.referenceIds, options);

  log.debug('[Renderer] Rendering finished.');
  return {
    document: documentResult.text,
    footnotes,
    bookmarksAdded: documentResult.bookmarksAdded,
  };
}

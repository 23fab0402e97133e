/**
 * Bookmark Id Allocator
 * Picks the first bookmark id that cannot collide with bookmarks already
 * present in document.xml
 */

import { logger as defaultLogger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import type { StageOptions } from './crossref.types';
import { BOOKMARK_START_ID, UINT32_MAX } from './reference-patterns';

/**
 * Parse a captured id as an unsigned 32-bit integer.
 * Anything else (empty, signed, non-decimal, overflowing) is a parse error.
 */
export function parseUnsignedId(text: string, what: string): number {
  if (!/^\d+$/.test(text)) {
    throw AppError.parse(`Error parsing ${what}: "${text}" is not an unsigned integer`, { text });
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value) || value > UINT32_MAX) {
    throw AppError.parse(`Error parsing ${what}: "${text}" is too large`, { text });
  }
  return value;
}

/**
 * Word assigns bookmark ids freely (headings, _GoBack, ...), so new bookmarks
 * start one past the highest id in use.
 */
export function startingBookmarkId(documentXml: string, options: StageOptions = {}): number {
  const log = options.logger ?? defaultLogger;
  log.debug('[Bookmark Allocator] Determining starting bookmark id...');

  let highest = 0;
  let found = 0;

  for (const match of documentXml.matchAll(BOOKMARK_START_ID)) {
    const id = parseUnsignedId(match[1], 'existing bookmark id in document.xml');
    found++;
    if (id > highest) {
      highest = id;
    }
  }

  // Ids are u32 in the file format; one past the maximum has nowhere to go
  if (found > 0 && highest === UINT32_MAX) {
    throw AppError.parse(`Error parsing existing bookmark id in document.xml: no id available after ${UINT32_MAX}`);
  }

  const starting = found > 0 ? highest + 1 : 1;
  log.debug(`[Bookmark Allocator] Starting bookmark is ${starting}`, { existingBookmarks: found });
  return starting;
}

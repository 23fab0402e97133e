/**
 * Cross-Reference Pipeline
 * bookmark allocation → lexing → parsing → rendering, over the text of
 * document.xml and footnotes.xml
 */

import { logger as defaultLogger } from '../../lib/logger';
import { getConfig } from '../../config';
import type { PipelineOptions, PipelineResult } from './crossref.types';
import { startingBookmarkId } from './bookmark-allocator.service';
import { lex } from './lexer.service';
import { parse } from './parser.service';
import { render } from './renderer.service';

class CrossRefPipelineService {
  /**
   * Turn plain "note N" / "notes N–M" references in the footnotes into
   * NOTEREF fields and bookmark the footnotes they point at.
   *
   * Either both outputs are produced or the first error is thrown as is.
   */
  process(documentXml: string, footnotesXml: string, options: PipelineOptions = {}): PipelineResult {
    const log = options.logger ?? defaultLogger;
    const stageOptions: PipelineOptions = {
      logger: log,
      missingReference: options.missingReference ?? getConfig().missingReference,
    };

    const startingBookmark = startingBookmarkId(documentXml, stageOptions);
    const { documentSegments, footnoteSegments } = lex(documentXml, footnotesXml, stageOptions);
    const { documentBranches, footnoteBranches, referenced } = parse(documentSegments, footnoteSegments, stageOptions);
    const rendered = render(documentBranches, referenced, startingBookmark, footnoteBranches, stageOptions);

    const stats = {
      startingBookmark,
      footnoteReferences: documentBranches.filter(branch => branch.type === 'footnoteRef').length,
      crossReferences: footnoteBranches.filter(branch => branch.type === 'crossRef').length,
      referencedFootnotes: referenced.length,
      bookmarksAdded: rendered.bookmarksAdded,
    };
    log.info(
      `[CrossRef Pipeline] Added ${stats.bookmarksAdded} bookmarks for ${stats.crossReferences} cross-references`,
      stats
    );

    return { document: rendered.document, footnotes: rendered.footnotes, stats };
  }
}

export const crossRefPipelineService = new CrossRefPipelineService();

/** Pure entry point: new document.xml and footnotes.xml text. */
export function processCrossReferences(
  documentXml: string,
  footnotesXml: string,
  options: PipelineOptions = {}
): PipelineResult {
  return crossRefPipelineService.process(documentXml, footnotesXml, options);
}

export { processCrossReferences as process };

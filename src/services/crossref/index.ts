/**
 * Cross-Reference Services - Central Exports
 */

// Pipeline
export { crossRefPipelineService, process, processCrossReferences } from './crossref-pipeline.service';

// Stages
export { startingBookmarkId, parseUnsignedId } from './bookmark-allocator.service';
export { lex, lexDocument, lexFootnotes, joinSegments } from './lexer.service';
export { parse, parseDocument, parseFootnotes, parseFootnoteNumber } from './parser.service';
export { render, renderDocument, renderFootnotes, createReferenceId } from './renderer.service';

// Types
export * from './crossref.types';
export { TextSpan } from './text-span';
export * from './reference-patterns';

/**
 * Cross-Reference Types
 * Segments produced by the lexer, branches produced by the parser and the
 * results handed between pipeline stages
 */

import type { Logger } from '../../lib/logger';
import type { MissingReferencePolicy } from '../../config';
import { TextSpan } from './text-span';

export type SegmentKind = 'Other' | 'FootnoteReference' | 'CrossReference';

export interface Segment {
  kind: SegmentKind;
  span: TextSpan;
}

export interface TextBranch {
  type: 'text';
  contents: TextSpan;
}

export interface FootnoteRefBranch {
  type: 'footnoteRef';
  /** 1-based position of the footnote in the document */
  number: number;
  contents: TextSpan;
}

export interface CrossRefBranch {
  type: 'crossRef';
  /** Footnote number the cross-reference points at */
  number: number;
  /** The digits as written, kept for the 'preserve' missing-reference policy */
  digits: TextSpan;
}

export type Branch = TextBranch | FootnoteRefBranch | CrossRefBranch;

export interface LexResult {
  documentSegments: Segment[];
  footnoteSegments: Segment[];
}

export interface FootnotesParseResult {
  branches: Branch[];
  /** Distinct footnote numbers referenced, in first-seen order */
  referenced: number[];
}

export interface ParseResult {
  documentBranches: Branch[];
  footnoteBranches: Branch[];
  referenced: number[];
}

/** Footnote number → bookmark name, e.g. 3 → "_Ref000000003" */
export type ReferenceIdTable = Map<number, string>;

export interface DocumentRenderResult {
  text: string;
  referenceIds: ReferenceIdTable;
  bookmarksAdded: number;
  nextBookmarkId: number;
}

export interface RenderResult {
  document: string;
  footnotes: string;
  bookmarksAdded: number;
}

export interface PipelineStats {
  startingBookmark: number;
  footnoteReferences: number;
  crossReferences: number;
  referencedFootnotes: number;
  bookmarksAdded: number;
}

export interface PipelineResult {
  document: string;
  footnotes: string;
  stats: PipelineStats;
}

export interface StageOptions {
  logger?: Logger;
}

export interface RenderOptions extends StageOptions {
  missingReference?: MissingReferencePolicy;
}

export type PipelineOptions = RenderOptions;

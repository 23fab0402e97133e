/**
 * Lexer
 * Splits document.xml into footnote-reference runs and everything else, and
 * footnotes.xml into cross-reference numbers and everything else.
 *
 * Offsets are UTF-16 code unit indexes into the input string. Every segment
 * is a TextSpan over the input, and the segments of one input always
 * concatenate back to that input.
 */

import { logger as defaultLogger, Logger } from '../../lib/logger';
import type { LexResult, Segment, SegmentKind, StageOptions } from './crossref.types';
import { FOOTNOTE_CROSS_REFERENCE, FOOTNOTE_REFERENCE_RUN } from './reference-patterns';
import { TextSpan } from './text-span';

class SegmentBuilder {
  private readonly segments: Segment[] = [];
  private cursor = 0;

  constructor(
    private readonly input: string,
    private readonly log: Logger
  ) {}

  /** Push a segment running from the cursor up to `end`. */
  push(kind: SegmentKind, end: number): void {
    const span = new TextSpan(this.input, this.cursor, end);
    this.log.trace(`[Lexer] Pushing segment ${kind}`, { start: span.start, length: span.length });
    this.segments.push({ kind, span });
    this.cursor = end;
  }

  /** Close the trailing Other segment and hand back the sequence. */
  finish(): Segment[] {
    this.push('Other', this.input.length);
    return this.segments;
  }
}

/**
 * Lex document.xml.
 * The sequence starts and ends with an Other segment and alternates strictly;
 * two adjacent runs get an empty Other between them.
 */
export function lexDocument(documentXml: string, options: StageOptions = {}): Segment[] {
  const log = options.logger ?? defaultLogger;
  log.debug('[Lexer] Lexing document...');

  const builder = new SegmentBuilder(documentXml, log);

  for (const match of documentXml.matchAll(FOOTNOTE_REFERENCE_RUN)) {
    const start = match.index ?? 0;
    builder.push('Other', start);
    builder.push('FootnoteReference', start + match[0].length);
  }

  const segments = builder.finish();
  log.debug('[Lexer] Document lexing finished.', { segments: segments.length });
  return segments;
}

/**
 * Lex footnotes.xml.
 * A single reference ("note 3") becomes Other(..."note ") + CrossReference(3).
 * A range ("notes 1–2") becomes Other(..."notes ") + CrossReference(1) +
 * Other(dash) + CrossReference(2), so the dash is copied through untouched.
 */
export function lexFootnotes(footnotesXml: string, options: StageOptions = {}): Segment[] {
  const log = options.logger ?? defaultLogger;
  log.debug('[Lexer] Lexing footnotes...');

  const builder = new SegmentBuilder(footnotesXml, log);

  for (const match of footnotesXml.matchAll(FOOTNOTE_CROSS_REFERENCE)) {
    const start = match.index ?? 0;
    const groups = match.groups ?? {};

    if (groups.first !== undefined && groups.dash !== undefined && groups.second !== undefined) {
      // '>' + 'notes '
      const numberStart = start + 1 + groups.rangeMarker.length;
      const dashStart = numberStart + groups.first.length;
      const secondStart = dashStart + groups.dash.length;

      builder.push('Other', numberStart);
      builder.push('CrossReference', dashStart);
      builder.push('Other', secondStart);
      builder.push('CrossReference', secondStart + groups.second.length);
    } else {
      const numberStart = start + 1 + groups.singleMarker.length;

      builder.push('Other', numberStart);
      builder.push('CrossReference', start + match[0].length);
    }
  }

  const segments = builder.finish();
  log.debug('[Lexer] Footnote lexing finished.', { segments: segments.length });
  return segments;
}

export function lex(documentXml: string, footnotesXml: string, options: StageOptions = {}): LexResult {
  const log = options.logger ?? defaultLogger;
  log.debug('[Lexer] Starting lexer...');

  const result: LexResult = {
    documentSegments: lexDocument(documentXml, options),
    footnoteSegments: lexFootnotes(footnotesXml, options),
  };

  log.debug('[Lexer] Lexer finished.');
  return result;
}

/** Rebuild the text a segment sequence was cut from. */
export function joinSegments(segments: Segment[]): string {
  return segments.map(segment => segment.span.text()).join('');
}

/**
 * Parser Tests
 */
import { describe, it, expect, vi } from 'vitest';

vi.mock('../../../../src/lib/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  },
}));

import {
  parse,
  parseDocument,
  parseFootnotes,
  parseFootnoteNumber,
} from '../../../../src/services/crossref/parser.service';
import { lexDocument, lexFootnotes } from '../../../../src/services/crossref/lexer.service';
import type { Branch, Segment, SegmentKind } from '../../../../src/services/crossref/crossref.types';
import { TextSpan } from '../../../../src/services/crossref/text-span';
import { AppError } from '../../../../src/utils/app-error';

const RUN = '<w:r><w:rPr><w:rStyle w:val="FootnoteReference" /></w:rPr><w:footnoteReference w:id="9" /></w:r>';

/** Build segments over one backing string from [kind, text] pairs. */
function segmentsOf(parts: [SegmentKind, string][]): Segment[] {
  const source = parts.map(([, text]) => text).join('');
  let offset = 0;
  return parts.map(([kind, text]) => {
    const span = new TextSpan(source, offset, offset + text.length);
    offset += text.length;
    return { kind, span };
  });
}

const footnoteNumbers = (branches: Branch[]): number[] =>
  branches.flatMap(branch => (branch.type === 'footnoteRef' ? [branch.number] : []));

const crossRefNumbers = (branches: Branch[]): number[] =>
  branches.flatMap(branch => (branch.type === 'crossRef' ? [branch.number] : []));

describe('parseDocument', () => {
  it('should map Other segments to text branches verbatim', () => {
    const branches = parseDocument(segmentsOf([['Other', '<w:p/>']]));
    expect(branches).toHaveLength(1);
    const [first] = branches;
    expect(first.type).toBe('text');
    expect(first.type === 'text' && first.contents.text()).toBe('<w:p/>');
  });

  it('should number footnote references sequentially from 1', () => {
    const input = `a${RUN}b${RUN}c${RUN}${RUN}d`;
    const branches = parseDocument(lexDocument(input));
    expect(footnoteNumbers(branches)).toEqual([1, 2, 3, 4]);
  });

  it('should keep the run markup as the branch contents', () => {
    const branches = parseDocument(lexDocument(`x${RUN}y`));
    const footnote = branches.find(branch => branch.type === 'footnoteRef');
    expect(footnote?.type === 'footnoteRef' && footnote.contents.text()).toBe(RUN);
  });

  it('should ignore cross-reference segments', () => {
    const branches = parseDocument(segmentsOf([['Other', 'a'], ['CrossReference', '1'], ['Other', 'b']]));
    expect(branches.map(branch => branch.type)).toEqual(['text', 'text']);
  });
});

describe('parseFootnotes', () => {
  it('should resolve cross-reference digits to numbers', () => {
    const { branches, referenced } = parseFootnotes(lexFootnotes('<w:t>note 12.</w:t>'));
    expect(crossRefNumbers(branches)).toEqual([12]);
    expect(referenced).toEqual([12]);
  });

  it('should produce both ends of a range', () => {
    const { branches, referenced } = parseFootnotes(lexFootnotes('<w:t>notes 1–2.</w:t>'));
    expect(crossRefNumbers(branches)).toEqual([1, 2]);
    expect(referenced).toEqual([1, 2]);
    expect(branches.map(branch => branch.type)).toEqual(['text', 'crossRef', 'text', 'crossRef', 'text']);
  });

  it('should collapse duplicates and keep first-seen order', () => {
    const input = '<w:t>note 5</w:t><w:t>notes 2-5</w:t><w:t>note 2</w:t><w:t>note 1</w:t>';
    const { branches, referenced } = parseFootnotes(lexFootnotes(input));
    expect(crossRefNumbers(branches)).toEqual([5, 2, 5, 2, 1]);
    expect(referenced).toEqual([5, 2, 1]);
  });

  it('should return an empty referenced list without cross-references', () => {
    expect(parseFootnotes(lexFootnotes('<w:t>nothing</w:t>')).referenced).toEqual([]);
  });

  it('should keep the source digits on each cross-reference', () => {
    const { branches } = parseFootnotes(lexFootnotes('<w:t>note 007</w:t>'));
    const crossRef = branches.find(branch => branch.type === 'crossRef');
    expect(crossRef).toMatchObject({ type: 'crossRef', number: 7 });
    expect(crossRef?.type === 'crossRef' && crossRef.digits.text()).toBe('007');
  });

  it('should fail with a parse error on malformed digits', () => {
    const segments = segmentsOf([['Other', 'note '], ['CrossReference', '1x']]);
    expect(() => parseFootnotes(segments)).toThrow(AppError);
  });
});

describe('parseFootnoteNumber', () => {
  it('should parse up to nine significant digits', () => {
    expect(parseFootnoteNumber('999999999')).toBe(999999999);
    expect(parseFootnoteNumber('0000000000042')).toBe(42);
  });

  it('should reject numbers wider than the reference id', () => {
    expect(() => parseFootnoteNumber('1000000000')).toThrow(/exceeds 9 digits/);
  });

  it('should read zero as 0', () => {
    expect(parseFootnoteNumber('0')).toBe(0);
    expect(parseFootnoteNumber('000')).toBe(0);
  });
});

describe('parse', () => {
  it('should parse both segment lists', () => {
    const result = parse(lexDocument(`a${RUN}b`), lexFootnotes('<w:t>note 1</w:t>'));
    expect(footnoteNumbers(result.documentBranches)).toEqual([1]);
    expect(crossRefNumbers(result.footnoteBranches)).toEqual([1]);
    expect(result.referenced).toEqual([1]);
  });
});

/**
 * Markup patterns for footnote cross-references
 */

// Existing bookmarks in document.xml: <w:bookmarkStart w:id="12" ...
export const BOOKMARK_START_ID = /<w:bookmarkStart w:id="([^"]*)"/g;

// A footnote reference run in document.xml, as Pandoc writes it
export const FOOTNOTE_REFERENCE_RUN =
  /<w:r><w:rPr><w:rStyle w:val="FootnoteReference"\s*\/><\/w:rPr><w:footnoteReference w:id="\d+"\s*\/><\/w:r>/g;

// Cross-references in footnotes.xml at the start of a text node:
// ">notes 1–2" (range, hyphen or en-dash) or ">note 3" (single)
export const FOOTNOTE_CROSS_REFERENCE =
  />(?:(?<rangeMarker>notes )(?<first>\d+)(?<dash>[-–])(?<second>\d+)|(?<singleMarker>note )(?<single>\d+))/g;

// Bookmark names are "_Ref" followed by the footnote number zero-padded to 9 digits
export const REFERENCE_ID_PREFIX = '_Ref';
export const REFERENCE_ID_WIDTH = 13;
export const REFERENCE_ID_DIGITS = REFERENCE_ID_WIDTH - REFERENCE_ID_PREFIX.length;

export const UINT32_MAX = 4294967295;

export function bookmarkStartTag(id: number, name: string): string {
  return `<w:bookmarkStart w:id="${id}" w:name="${name}"/>`;
}

export function bookmarkEndTag(id: number): string {
  return `<w:bookmarkEnd w:id="${id}"/>`;
}

/**
 * Closes the surrounding text run, inserts a NOTEREF field showing `number`
 * and reopens a text run for whatever follows.
 */
export function noteRefField(referenceId: string, number: number): string {
  return `</w:t></w:r><w:fldSimple w:instr=" NOTEREF ${referenceId} "><w:r><w:t>${number}</w:t></w:r></w:fldSimple><w:r><w:t xml:space="preserve">`;
}

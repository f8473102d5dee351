/**
 * Line patterns for regulation structure detection.
 *
 * Patterns are anchored at the start of the line: a boundary is only a
 * boundary when the line opens with it, so mid-sentence cross-references
 * ("as laid down in Article 5") stay ordinary content.
 */

// CHAPTER IV, Chapter ii
export const CHAPTER_PATTERN = /^CHAPTER\s+[IVXLCDM]+\b/i;

// Article 5, but not Article 5(2)
export const ARTICLE_PATTERN = /^Article\s+\d+\b(?!\s*\(\d+\))/i;

// Article 5(2)
export const SUB_ARTICLE_PATTERN = /^Article\s+\d+\s*\(\d+\)/i;

// Table-level label split: word, number, trailing extra text
export const ARTICLE_LABEL_PATTERN = /(Article)\s*(\d+)\s*(.*)/;

export const AMENDMENTS_NAME_PATTERN = /^Amendments?\s+to\s+(?:Regulation|Directive)\b/i;

export const AMENDMENTS_THEME = 'Amendments';

export type LineKind = 'chapter' | 'article' | 'sub-article' | 'text';

/**
 * Classify a trimmed line. Chapter boundaries win over everything else.
 */
export function classifyLine(text: string): LineKind {
  if (CHAPTER_PATTERN.test(text)) return 'chapter';
  if (ARTICLE_PATTERN.test(text)) return 'article';
  if (SUB_ARTICLE_PATTERN.test(text)) return 'sub-article';
  return 'text';
}

export function formatSubArticleMarker(text: string): string {
  return `[Sub-Article: ${text}]`;
}

import { OcrPage, OcrResult, TextLine } from '../types/index.js';

const PAGE_MARKER = /^\[Page:\s*\d+\]$/i;
const HORIZONTAL_RULE = /^(?:-{3,}|\*{3,}|_{3,})$/;
const HEADING_PREFIX = /^#{1,6}\s+/;
const BULLET_PREFIX = /^[-*•]\s+/;
const EMPHASIS = /\*\*|__/g;

/**
 * Strip the markdown decoration the OCR model adds so that boundary
 * patterns anchor on the text itself
 */
export function cleanLine(raw: string): string {
  return raw
    .trim()
    .replace(HEADING_PREFIX, '')
    .replace(BULLET_PREFIX, '')
    .replace(EMPHASIS, '')
    .trim();
}

function isNoise(line: string): boolean {
  return line.length === 0 || PAGE_MARKER.test(line) || HORIZONTAL_RULE.test(line);
}

export function pageToLines(page: OcrPage): TextLine[] {
  const lines: TextLine[] = [];

  for (const raw of page.markdown.split(/\r?\n/)) {
    const trimmed = raw.trim();
    if (isNoise(trimmed)) continue;

    const text = cleanLine(trimmed);
    if (text.length > 0) {
      lines.push({ text, pageNumber: page.pageNumber });
    }
  }

  return lines;
}

/**
 * Flatten OCR pages into the ordered line sequence read by the extractor
 */
export function readLines(result: Pick<OcrResult, 'pages'>): TextLine[] {
  return [...result.pages]
    .sort((a, b) => a.pageNumber - b.pageNumber)
    .flatMap((page) => pageToLines(page));
}

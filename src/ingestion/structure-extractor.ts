/**
 * Structure extraction: turns a flat sequence of recognised lines into
 * chapter/article records.
 *
 * The extractor is a fold over the lines. `stepExtractor` takes the current
 * state and one line and returns the next state plus, when an article ends,
 * the record for it. Nothing is mutated, so the algorithm can be driven and
 * inspected one line at a time.
 */

import { StructuredRecord, TextLine } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { classifyLine, formatSubArticleMarker } from './structure-patterns.js';

const logger = createChildLogger('structure-extractor');

export interface ExtractorState {
  readonly chapterId: string | null;
  readonly chapterName: string | null;
  readonly articleId: string | null;
  readonly articleName: string | null;
  readonly content: readonly string[];
  readonly expectChapterName: boolean;
  readonly expectArticleName: boolean;
  readonly processing: boolean;
}

export interface ExtractorStep {
  state: ExtractorState;
  record?: StructuredRecord;
}

export const INITIAL_EXTRACTOR_STATE: ExtractorState = {
  chapterId: null,
  chapterName: null,
  articleId: null,
  articleName: null,
  content: [],
  expectChapterName: false,
  expectArticleName: false,
  processing: false,
};

/**
 * Build the record for the article accumulated so far. Returns undefined
 * when there is no current article or it has no body text; such an article
 * is dropped.
 */
export function flushRecord(state: ExtractorState): StructuredRecord | undefined {
  if (!state.articleId || state.content.length === 0) {
    return undefined;
  }

  return {
    chapterId: state.chapterId,
    chapterName: state.chapterName,
    articleId: state.articleId,
    articleName: state.articleName,
    content: state.content.join(' '),
  };
}

export function stepExtractor(state: ExtractorState, line: string): ExtractorStep {
  const text = line.trim();
  if (text.length === 0) {
    return { state };
  }

  if (state.expectChapterName) {
    return { state: { ...state, chapterName: text, expectChapterName: false } };
  }

  if (state.expectArticleName) {
    return { state: { ...state, articleName: text, expectArticleName: false } };
  }

  const kind = classifyLine(text);

  if (kind === 'chapter') {
    return {
      record: flushRecord(state),
      state: {
        ...state,
        chapterId: text,
        chapterName: null,
        articleId: null,
        articleName: null,
        content: [],
        expectChapterName: true,
        processing: true,
      },
    };
  }

  if (!state.processing) {
    return { state };
  }

  if (kind === 'article') {
    return {
      record: flushRecord(state),
      state: {
        ...state,
        articleId: text,
        articleName: null,
        content: [],
        expectArticleName: true,
      },
    };
  }

  if (kind === 'sub-article') {
    if (!state.articleId) {
      return { state };
    }
    return {
      state: { ...state, content: [...state.content, formatSubArticleMarker(text)] },
    };
  }

  if (state.chapterId && state.articleId) {
    return { state: { ...state, content: [...state.content, text] } };
  }

  return { state };
}

/**
 * Emit whatever is still accumulated once the input is exhausted
 */
export function finishExtractor(state: ExtractorState): StructuredRecord | undefined {
  return flushRecord(state);
}

/**
 * Extract structured records from lines in reading order
 */
export function extractStructure(lines: Iterable<TextLine | string>): StructuredRecord[] {
  const records: StructuredRecord[] = [];
  let state = INITIAL_EXTRACTOR_STATE;
  let lineCount = 0;

  for (const line of lines) {
    const step = stepExtractor(state, typeof line === 'string' ? line : line.text);
    if (step.record) {
      records.push(step.record);
    }
    state = step.state;
    lineCount++;
  }

  const last = finishExtractor(state);
  if (last) {
    records.push(last);
  }

  logger.info({ lineCount, recordCount: records.length }, 'Structure extraction complete');
  return records;
}

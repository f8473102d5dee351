/**
 * Article merging: collapses the structured table into one canonical record
 * per article.
 *
 * OCR-derived structure is noisy. A cross-reference or footnote that opens a
 * line with "Article 12 of Regulation ..." is detected as an article
 * boundary by the extractor. Here the label is split again at table level;
 * any trailing text after the number marks the row as out of order, and such
 * rows (and rows whose number does not parse) are folded into the previous
 * true article instead of starting a new one.
 */

import { CanonicalArticle, StructuredRecord } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import {
  AMENDMENTS_NAME_PATTERN,
  AMENDMENTS_THEME,
  ARTICLE_LABEL_PATTERN,
} from './structure-patterns.js';

const logger = createChildLogger('article-merger');

export interface ArticleLabel {
  word: string;
  number: number | null;
  extra: string;
}

export interface PreparedRow {
  chapterId: string | null;
  chapterName: string | null;
  articleLabel: ArticleLabel;
  articleName: string | null;
  content: string | null;
  outOfOrder: boolean;
}

export interface MergerState {
  readonly theme: string;
  readonly articleLabel: string;
  readonly articleName: string;
  readonly content: string;
}

export interface MergerStep {
  state: MergerState;
  article?: CanonicalArticle;
}

export const INITIAL_MERGER_STATE: MergerState = {
  theme: '',
  articleLabel: '',
  articleName: '',
  content: '',
};

function isMissing(value: string | null | undefined): value is null | undefined | '' {
  return value === null || value === undefined || value === '';
}

/**
 * Split an article label into word, number and trailing text
 */
export function parseArticleLabel(label: string | null): ArticleLabel {
  const match = label ? ARTICLE_LABEL_PATTERN.exec(label) : null;
  if (!match) {
    return { word: '', number: null, extra: '' };
  }

  const number = Number.parseInt(match[2], 10);
  return {
    word: match[1],
    number: Number.isFinite(number) ? number : null,
    extra: match[3],
  };
}

/**
 * Rebuild the "{word} {number} {extra}" label. Rows without a number have
 * no label.
 */
export function formatArticleLabel(label: ArticleLabel): string {
  if (label.number === null) {
    return '';
  }
  return `${label.word} ${label.number} ${label.extra}`.trim();
}

/**
 * Parse labels, flag out-of-order rows and forward-fill chapter context
 */
export function prepareRows(records: readonly StructuredRecord[]): PreparedRow[] {
  let lastChapterId: string | null = null;
  let lastChapterName: string | null = null;

  return records.map((record) => {
    if (!isMissing(record.chapterId)) lastChapterId = record.chapterId;
    if (!isMissing(record.chapterName)) lastChapterName = record.chapterName;

    const articleLabel = parseArticleLabel(record.articleId);

    return {
      chapterId: lastChapterId,
      chapterName: lastChapterName,
      articleLabel,
      articleName: record.articleName,
      content: record.content,
      outOfOrder: articleLabel.number === null || articleLabel.extra.trim() !== '',
    };
  });
}

/**
 * Theme for a row: amendments to other acts are grouped under a single
 * sentinel theme whatever chapter they sit in
 */
export function resolveTheme(row: Pick<PreparedRow, 'articleName' | 'chapterName'>): string {
  if (row.articleName && AMENDMENTS_NAME_PATTERN.test(row.articleName)) {
    return AMENDMENTS_THEME;
  }
  return row.chapterName ?? '';
}

function toArticle(state: MergerState): CanonicalArticle {
  return {
    theme: state.theme,
    articleTitle: state.articleLabel,
    subTheme: state.articleName,
    content: state.content,
  };
}

export function stepMerger(state: MergerState, row: PreparedRow): MergerStep {
  const label = formatArticleLabel(row.articleLabel);

  if (row.articleLabel.number !== null && !row.outOfOrder) {
    return {
      article: state.articleLabel ? toArticle(state) : undefined,
      state: {
        theme: resolveTheme(row),
        articleLabel: label,
        articleName: row.articleName ?? '',
        content: row.content ?? '',
      },
    };
  }

  if (isMissing(row.content)) {
    return { state };
  }

  return {
    state: {
      ...state,
      content: `${state.content} ${label}${row.articleName ?? ''}: ${row.content}`,
    },
  };
}

export function finishMerger(state: MergerState): CanonicalArticle | undefined {
  return state.articleLabel ? toArticle(state) : undefined;
}

/**
 * Merge structured records into canonical articles
 */
export function mergeArticles(records: readonly StructuredRecord[]): CanonicalArticle[] {
  const rows = prepareRows(records);
  const articles: CanonicalArticle[] = [];
  let state = INITIAL_MERGER_STATE;
  let folded = 0;

  for (const row of rows) {
    const step = stepMerger(state, row);
    if (step.article) {
      articles.push(step.article);
    }
    if (row.outOfOrder) {
      folded++;
    }
    state = step.state;
  }

  const last = finishMerger(state);
  if (last) {
    articles.push(last);
  }

  logger.info(
    { rowCount: rows.length, articleCount: articles.length, foldedRows: folded },
    'Article merge complete'
  );
  return articles;
}

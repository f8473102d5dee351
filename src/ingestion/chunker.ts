import { v4 as uuid } from 'uuid';
import { ArticleChunk, ChunkMetadata, StoredArticle } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('chunker');

export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
}

/**
 * Header repeated at the top of every chunk of an article, so each vector
 * carries its theme and article context
 */
export function formatChunkHeader(article: Pick<StoredArticle, 'theme' | 'articleTitle' | 'subTheme'>): string {
  return `Theme: ${article.theme}\nArticle: ${article.articleTitle}\nSub-Theme: ${article.subTheme}\nContent: `;
}

/**
 * Find a break point at or before maxLength, preferring paragraph, then
 * sentence, then word boundaries in the second half of the window
 */
function findBreakPoint(content: string, maxLength: number): number {
  for (const separator of ['\n\n', '. ', '\n', ' ']) {
    const index = content.lastIndexOf(separator, maxLength - separator.length);
    if (index > maxLength * 0.5) {
      return index + separator.length;
    }
  }
  return maxLength;
}

/**
 * Split text into pieces of at most `size` characters; consecutive pieces
 * share up to `overlap` characters, starting on a word boundary
 */
export function splitText(text: string, size: number, overlap: number): string[] {
  const pieces: string[] = [];
  let rest = text.trim();

  while (rest.length > size) {
    const breakPoint = findBreakPoint(rest, size);
    pieces.push(rest.slice(0, breakPoint).trim());

    let start = breakPoint > overlap ? breakPoint - overlap : breakPoint;
    const space = rest.indexOf(' ', start);
    if (space !== -1 && space < breakPoint) {
      start = space + 1;
    }
    rest = rest.slice(start).trimStart();
  }

  if (rest.length > 0) {
    pieces.push(rest);
  }

  return pieces;
}

/**
 * Splits canonical articles into embedding-sized chunks
 */
export class ArticleChunker {
  private options: ChunkingOptions;

  constructor(options: ChunkingOptions) {
    this.options = options;
  }

  chunkArticle(article: StoredArticle, baseMetadata: ChunkMetadata = {}): ArticleChunk[] {
    const header = formatChunkHeader(article);
    const bodySize = Math.max(
      this.options.chunkSize - header.length,
      Math.floor(this.options.chunkSize / 2)
    );
    const overlap = Math.min(this.options.chunkOverlap, Math.floor(bodySize / 2));

    return splitText(article.content, bodySize, overlap).map((piece, chunkIndex) => ({
      id: uuid(),
      documentId: article.documentId,
      articleId: article.id,
      chunkIndex,
      content: header + piece,
      metadata: {
        ...baseMetadata,
        theme: article.theme,
        articleTitle: article.articleTitle,
        subTheme: article.subTheme,
      },
    }));
  }

  chunkArticles(articles: readonly StoredArticle[], baseMetadata: ChunkMetadata = {}): ArticleChunk[] {
    const chunks = articles.flatMap((article) => this.chunkArticle(article, baseMetadata));

    logger.info(
      { articleCount: articles.length, chunkCount: chunks.length },
      'Article chunking complete'
    );

    return chunks;
  }
}

export function createChunker(options: Partial<ChunkingOptions> = {}): ArticleChunker {
  return new ArticleChunker({
    chunkSize: options.chunkSize ?? 2048,
    chunkOverlap: options.chunkOverlap ?? 200,
  });
}

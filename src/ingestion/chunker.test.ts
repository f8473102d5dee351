import { describe, it, expect } from 'vitest';
import { createChunker, formatChunkHeader, splitText } from './chunker.js';
import { StoredArticle } from '../types/index.js';

function article(content: string, overrides: Partial<StoredArticle> = {}): StoredArticle {
  return {
    id: 'art-1',
    documentId: 'doc-1',
    position: 0,
    theme: 'ICT risk management',
    articleTitle: 'Article 6',
    subTheme: 'ICT risk management framework',
    content,
    ...overrides,
  };
}

const words = Array.from({ length: 60 }, (_, i) => `w${String(i + 1).padStart(2, '0')}`);

describe('splitText', () => {
  it('should return short text as a single piece', () => {
    expect(splitText('  Short body.  ', 100, 10)).toEqual(['Short body.']);
  });

  it('should return nothing for blank text', () => {
    expect(splitText('   ', 100, 10)).toEqual([]);
  });

  it('should break on word boundaries with overlap', () => {
    const pieces = splitText(words.join(' '), 60, 12);

    expect(pieces[0]).toBe(words.slice(0, 15).join(' '));
    expect(pieces[1].startsWith('w14 w15 w16')).toBe(true);
    pieces.forEach((piece) => expect(piece.length).toBeLessThanOrEqual(60));
  });

  it('should keep every word', () => {
    const joined = splitText(words.join(' '), 60, 12).join(' ');

    words.forEach((word) => expect(joined).toContain(word));
  });

  it('should prefer sentence boundaries', () => {
    const text = 'The management body shall approve it. Entities shall review the framework yearly.';
    const pieces = splitText(text, 50, 0);

    expect(pieces).toEqual([
      'The management body shall approve it.',
      'Entities shall review the framework yearly.',
    ]);
  });

  it('should always make progress when overlap exceeds the break point', () => {
    const pieces = splitText('x'.repeat(25), 10, 20);

    expect(pieces).toEqual(['x'.repeat(10), 'x'.repeat(10), 'x'.repeat(5)]);
  });
});

describe('ArticleChunker', () => {
  it('should prefix every chunk with the article header', () => {
    const chunker = createChunker({ chunkSize: 2048, chunkOverlap: 200 });
    const [chunk] = chunker.chunkArticle(article('Entities shall have a framework.'), {
      filename: 'reg.pdf',
    });

    expect(chunk.content).toBe(
      'Theme: ICT risk management\nArticle: Article 6\nSub-Theme: ICT risk management framework\nContent: Entities shall have a framework.'
    );
    expect(chunk).toMatchObject({
      documentId: 'doc-1',
      articleId: 'art-1',
      chunkIndex: 0,
      metadata: {
        filename: 'reg.pdf',
        theme: 'ICT risk management',
        articleTitle: 'Article 6',
        subTheme: 'ICT risk management framework',
      },
    });
    expect(chunk.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should split long articles within the chunk size', () => {
    const chunker = createChunker({ chunkSize: 300, chunkOverlap: 30 });
    const chunks = chunker.chunkArticle(article('Entities shall document controls. '.repeat(40)));

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.map((c) => c.chunkIndex)).toEqual(chunks.map((_, i) => i));
    chunks.forEach((chunk) => {
      expect(chunk.content.length).toBeLessThanOrEqual(300);
      expect(chunk.content.startsWith(formatChunkHeader(article('')))).toBe(true);
    });
  });

  it('should produce no chunks for an empty article', () => {
    expect(createChunker().chunkArticle(article(''))).toEqual([]);
  });

  it('should chunk several articles in order', () => {
    const chunks = createChunker().chunkArticles([
      article('First.', { id: 'a' }),
      article('Second.', { id: 'b' }),
    ]);

    expect(chunks.map((c) => c.articleId)).toEqual(['a', 'b']);
  });
});

import { vi } from 'vitest';
import { v4 as uuid } from 'uuid';
import type {
  CanonicalArticle,
  ComparisonReport,
  Document,
  DocumentInput,
  StoredArticle,
  StructuredRecord,
} from '../../src/types/index.js';
import { PostgresError } from '../../src/types/index.js';
import type { StoreStats } from '../../src/clients/postgres.js';

/**
 * In-memory stand-in for the Postgres store. Saving a document is
 * all-or-nothing like the real transaction.
 */
export interface MockPostgresOptions {
  cachedEmbeddings?: Map<string, number[]>;
  healthy?: boolean;
}

export function createMockPostgresStore(options: MockPostgresOptions = {}) {
  const documents = new Map<string, Document>();
  const records = new Map<string, StructuredRecord[]>();
  const articles = new Map<string, StoredArticle[]>();
  const runs = new Map<string, ComparisonReport>();
  const embeddingCache = new Map(options.cachedEmbeddings ?? []);
  const healthy = options.healthy ?? true;

  return {
    documents,
    articles,
    runs,
    embeddingCache,

    healthCheck: vi.fn(async (): Promise<boolean> => healthy),

    saveStructuredDocument: vi.fn(
      async (
        doc: DocumentInput,
        structured: readonly StructuredRecord[],
        canonical: readonly CanonicalArticle[]
      ): Promise<{ document: Document; articles: StoredArticle[] }> => {
        if ([...documents.values()].some((d) => d.fileHash === doc.fileHash)) {
          throw new PostgresError(`Document with hash ${doc.fileHash} already exists`);
        }

        const document: Document = {
          id: uuid(),
          filename: doc.filename,
          filepath: doc.filepath,
          fileHash: doc.fileHash,
          title: doc.title,
          totalPages: doc.totalPages,
          articleCount: canonical.length,
          ingestedAt: new Date(),
          metadata: doc.metadata ?? {},
        };
        const stored = canonical.map((article, position) => ({
          ...article,
          id: uuid(),
          documentId: document.id,
          position,
        }));

        documents.set(document.id, document);
        records.set(document.id, [...structured]);
        articles.set(document.id, stored);

        return { document, articles: stored };
      }
    ),

    getDocumentByHash: vi.fn(
      async (fileHash: string): Promise<Document | null> =>
        [...documents.values()].find((d) => d.fileHash === fileHash) ?? null
    ),

    getDocumentById: vi.fn(async (id: string): Promise<Document | null> => documents.get(id) ?? null),

    listDocuments: vi.fn(async (): Promise<Document[]> => [...documents.values()]),

    deleteDocument: vi.fn(async (id: string): Promise<void> => {
      documents.delete(id);
      records.delete(id);
      articles.delete(id);
    }),

    listStructuredRecords: vi.fn(
      async (documentId: string): Promise<StructuredRecord[]> => records.get(documentId) ?? []
    ),

    listArticles: vi.fn(
      async (documentId: string): Promise<StoredArticle[]> => articles.get(documentId) ?? []
    ),

    getCachedEmbedding: vi.fn(
      async (contentHash: string): Promise<number[] | null> => embeddingCache.get(contentHash) ?? null
    ),

    cacheEmbedding: vi.fn(
      async (contentHash: string, embedding: number[], _model: string): Promise<void> => {
        embeddingCache.set(contentHash, embedding);
      }
    ),

    saveComparisonRun: vi.fn(async (report: ComparisonReport): Promise<void> => {
      runs.set(report.runId, report);
    }),

    getComparisonRun: vi.fn(
      async (runId: string): Promise<ComparisonReport | null> => runs.get(runId) ?? null
    ),

    getStats: vi.fn(
      async (): Promise<StoreStats> => ({
        documents: documents.size,
        structuredRecords: [...records.values()].reduce((sum, r) => sum + r.length, 0),
        articles: [...articles.values()].reduce((sum, a) => sum + a.length, 0),
        comparisonRuns: runs.size,
      })
    ),
  };
}

export type MockPostgresStore = ReturnType<typeof createMockPostgresStore>;

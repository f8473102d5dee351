import pg from 'pg';
import { z } from 'zod';
import {
  CanonicalArticle,
  ComparisonReport,
  Config,
  Document,
  DocumentInput,
  PostgresError,
  StoredArticle,
  StructuredRecord,
} from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';

const { Pool } = pg;
const logger = createChildLogger('postgres');

const DOCUMENT_COLUMNS = `d.id, d.filename, d.filepath, d.file_hash as "fileHash", d.title,
       d.total_pages as "totalPages", d.ingested_at as "ingestedAt", d.metadata,
       (SELECT COUNT(*)::int FROM canonical_articles a WHERE a.document_id = d.id) as "articleCount"`;

const ARTICLE_COLUMNS = `id, document_id as "documentId", position, theme,
       article_title as "articleTitle", sub_theme as "subTheme", content`;

interface DocumentRow {
  id: string;
  filename: string;
  filepath: string;
  fileHash: string;
  title: string | null;
  totalPages: number | null;
  ingestedAt: Date;
  metadata: Record<string, unknown>;
  articleCount: number;
}

interface ComparisonRunRow {
  id: string;
  oldDocumentId: string | null;
  newDocumentId: string | null;
  documentSummary: string;
  report: unknown;
  createdAt: Date;
}

const UnitSchema = z.object({
  theme: z.string(),
  newSubTheme: z.string(),
  oldSubTheme: z.string(),
  newContent: z.string(),
  oldContent: z.string().optional(),
  analysis: z.string().optional(),
});

const ReportBodySchema = z.object({
  themes: z.array(
    z.object({
      name: z.string(),
      summary: z.string(),
      subThemes: z.array(z.object({ name: z.string(), summary: z.string() })),
    })
  ),
  matched: z.array(UnitSchema),
  unmatched: z.array(UnitSchema),
});

export interface StoreStats {
  documents: number;
  structuredRecords: number;
  articles: number;
  comparisonRuns: number;
}

function toDocument(row: DocumentRow): Document {
  return {
    id: row.id,
    filename: row.filename,
    filepath: row.filepath,
    fileHash: row.fileHash,
    title: row.title ?? undefined,
    totalPages: row.totalPages ?? undefined,
    articleCount: row.articleCount,
    ingestedAt: row.ingestedAt,
    metadata: row.metadata,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}

/**
 * Postgres store for documents, their structured and canonical tables, the
 * embedding cache and comparison runs
 */
export class PostgresStore {
  private pool: pg.Pool;

  constructor(config: Config['postgres']) {
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    this.pool.on('error', (err) => {
      logger.error({ err }, 'Unexpected error on idle client');
    });
  }

  // ============================================================
  // Document Operations
  // ============================================================

  /**
   * Insert a document with its structured records and canonical articles in
   * one transaction
   */
  async saveStructuredDocument(
    doc: DocumentInput,
    records: readonly StructuredRecord[],
    articles: readonly CanonicalArticle[]
  ): Promise<{ document: Document; articles: StoredArticle[] }> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      const inserted = await client.query<{ id: string; ingestedAt: Date }>(
        `INSERT INTO documents (filename, filepath, file_hash, title, total_pages, metadata)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING id, ingested_at as "ingestedAt"`,
        [
          doc.filename,
          doc.filepath,
          doc.fileHash,
          doc.title ?? null,
          doc.totalPages ?? null,
          JSON.stringify(doc.metadata ?? {}),
        ]
      );
      const documentRow = inserted.rows[0];
      if (!documentRow) {
        throw new PostgresError('Document insert returned no row');
      }

      for (const [position, record] of records.entries()) {
        await client.query(
          `INSERT INTO structured_records
             (document_id, position, chapter_id, chapter_name, article_id, article_name, content)
           VALUES ($1, $2, $3, $4, $5, $6, $7)`,
          [
            documentRow.id,
            position,
            record.chapterId,
            record.chapterName,
            record.articleId,
            record.articleName,
            record.content,
          ]
        );
      }

      const storedArticles: StoredArticle[] = [];
      for (const [position, article] of articles.entries()) {
        const result = await client.query<{ id: string }>(
          `INSERT INTO canonical_articles
             (document_id, position, theme, article_title, sub_theme, content)
           VALUES ($1, $2, $3, $4, $5, $6)
           RETURNING id`,
          [
            documentRow.id,
            position,
            article.theme,
            article.articleTitle,
            article.subTheme,
            article.content,
          ]
        );
        const id = result.rows[0]?.id;
        if (!id) {
          throw new PostgresError('Article insert returned no row');
        }
        storedArticles.push({ ...article, id, documentId: documentRow.id, position });
      }

      await client.query('COMMIT');

      logger.info(
        { documentId: documentRow.id, records: records.length, articles: articles.length },
        'Structured document saved'
      );

      return {
        document: {
          id: documentRow.id,
          filename: doc.filename,
          filepath: doc.filepath,
          fileHash: doc.fileHash,
          title: doc.title,
          totalPages: doc.totalPages,
          articleCount: storedArticles.length,
          ingestedAt: documentRow.ingestedAt,
          metadata: doc.metadata ?? {},
        },
        articles: storedArticles,
      };
    } catch (error) {
      await client.query('ROLLBACK');
      if (isUniqueViolation(error)) {
        throw new PostgresError(`Document with hash ${doc.fileHash} already exists`, error);
      }
      logger.error({ error, filename: doc.filename }, 'Failed to save structured document');
      if (error instanceof PostgresError) throw error;
      throw new PostgresError('Failed to save structured document', error);
    } finally {
      client.release();
    }
  }

  async getDocumentByHash(fileHash: string): Promise<Document | null> {
    try {
      const result = await this.pool.query<DocumentRow>(
        `SELECT ${DOCUMENT_COLUMNS} FROM documents d WHERE d.file_hash = $1`,
        [fileHash]
      );
      const row = result.rows[0];
      return row ? toDocument(row) : null;
    } catch (error) {
      logger.error({ error, fileHash }, 'Failed to get document by hash');
      throw new PostgresError('Failed to get document by hash', error);
    }
  }

  async getDocumentById(id: string): Promise<Document | null> {
    try {
      const result = await this.pool.query<DocumentRow>(
        `SELECT ${DOCUMENT_COLUMNS} FROM documents d WHERE d.id = $1`,
        [id]
      );
      const row = result.rows[0];
      return row ? toDocument(row) : null;
    } catch (error) {
      logger.error({ error, id }, 'Failed to get document by id');
      throw new PostgresError('Failed to get document by id', error);
    }
  }

  async listDocuments(): Promise<Document[]> {
    try {
      const result = await this.pool.query<DocumentRow>(
        `SELECT ${DOCUMENT_COLUMNS} FROM documents d ORDER BY d.ingested_at DESC`
      );
      return result.rows.map(toDocument);
    } catch (error) {
      logger.error({ error }, 'Failed to list documents');
      throw new PostgresError('Failed to list documents', error);
    }
  }

  /**
   * Delete a document; its records and articles go with it
   */
  async deleteDocument(id: string): Promise<void> {
    try {
      await this.pool.query('DELETE FROM documents WHERE id = $1', [id]);
      logger.info({ id }, 'Document deleted');
    } catch (error) {
      logger.error({ error, id }, 'Failed to delete document');
      throw new PostgresError('Failed to delete document', error);
    }
  }

  // ============================================================
  // Structured and canonical tables
  // ============================================================

  async listStructuredRecords(documentId: string): Promise<StructuredRecord[]> {
    try {
      const result = await this.pool.query<StructuredRecord>(
        `SELECT chapter_id as "chapterId", chapter_name as "chapterName",
                article_id as "articleId", article_name as "articleName", content
         FROM structured_records WHERE document_id = $1 ORDER BY position`,
        [documentId]
      );
      return result.rows;
    } catch (error) {
      logger.error({ error, documentId }, 'Failed to list structured records');
      throw new PostgresError('Failed to list structured records', error);
    }
  }

  async listArticles(documentId: string): Promise<StoredArticle[]> {
    try {
      const result = await this.pool.query<StoredArticle>(
        `SELECT ${ARTICLE_COLUMNS} FROM canonical_articles
         WHERE document_id = $1 ORDER BY position`,
        [documentId]
      );
      return result.rows;
    } catch (error) {
      logger.error({ error, documentId }, 'Failed to list articles');
      throw new PostgresError('Failed to list articles', error);
    }
  }

  // ============================================================
  // Embedding Cache
  // ============================================================

  async getCachedEmbedding(contentHash: string): Promise<number[] | null> {
    try {
      const result = await this.pool.query<{ embedding: number[] }>(
        'SELECT embedding FROM embedding_cache WHERE content_hash = $1',
        [contentHash]
      );
      return result.rows[0]?.embedding ?? null;
    } catch (error) {
      // A cache miss is not an error for callers
      logger.error({ error }, 'Failed to get cached embedding');
      return null;
    }
  }

  async cacheEmbedding(contentHash: string, embedding: number[], model: string): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO embedding_cache (content_hash, embedding, model)
         VALUES ($1, $2, $3)
         ON CONFLICT (content_hash) DO NOTHING`,
        [contentHash, embedding, model]
      );
    } catch (error) {
      logger.error({ error }, 'Failed to cache embedding');
    }
  }

  // ============================================================
  // Comparison runs
  // ============================================================

  async saveComparisonRun(report: ComparisonReport): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO comparison_runs (id, old_document_id, new_document_id, document_summary, report, created_at)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [
          report.runId,
          report.oldDocumentId ?? null,
          report.newDocumentId ?? null,
          report.documentSummary,
          JSON.stringify({
            themes: report.themes,
            matched: report.matched,
            unmatched: report.unmatched,
          }),
          report.createdAt,
        ]
      );
      logger.info({ runId: report.runId }, 'Comparison run saved');
    } catch (error) {
      logger.error({ error, runId: report.runId }, 'Failed to save comparison run');
      throw new PostgresError('Failed to save comparison run', error);
    }
  }

  async getComparisonRun(runId: string): Promise<ComparisonReport | null> {
    let row: ComparisonRunRow | undefined;
    try {
      const result = await this.pool.query<ComparisonRunRow>(
        `SELECT id, old_document_id as "oldDocumentId", new_document_id as "newDocumentId",
                document_summary as "documentSummary", report, created_at as "createdAt"
         FROM comparison_runs WHERE id = $1`,
        [runId]
      );
      row = result.rows[0];
    } catch (error) {
      logger.error({ error, runId }, 'Failed to get comparison run');
      throw new PostgresError('Failed to get comparison run', error);
    }

    if (!row) {
      return null;
    }

    const body = ReportBodySchema.safeParse(row.report);
    if (!body.success) {
      throw new PostgresError(`Stored comparison run ${runId} is malformed`, body.error.issues);
    }

    return {
      runId: row.id,
      oldDocumentId: row.oldDocumentId ?? undefined,
      newDocumentId: row.newDocumentId ?? undefined,
      documentSummary: row.documentSummary,
      createdAt: row.createdAt,
      ...body.data,
    };
  }

  // ============================================================
  // Utilities
  // ============================================================

  async getStats(): Promise<StoreStats> {
    try {
      const result = await this.pool.query<StoreStats>(
        `SELECT
           (SELECT COUNT(*)::int FROM documents) as "documents",
           (SELECT COUNT(*)::int FROM structured_records) as "structuredRecords",
           (SELECT COUNT(*)::int FROM canonical_articles) as "articles",
           (SELECT COUNT(*)::int FROM comparison_runs) as "comparisonRuns"`
      );
      return (
        result.rows[0] ?? { documents: 0, structuredRecords: 0, articles: 0, comparisonRuns: 0 }
      );
    } catch (error) {
      logger.error({ error }, 'Failed to get stats');
      throw new PostgresError('Failed to get stats', error);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      logger.error({ error }, 'Postgres health check failed');
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('Postgres connection pool closed');
  }
}

// Singleton instance
let storeInstance: PostgresStore | null = null;

export function getPostgresStore(config: Config['postgres']): PostgresStore {
  if (!storeInstance) {
    storeInstance = new PostgresStore(config);
  }
  return storeInstance;
}

export async function resetPostgresStore(): Promise<void> {
  const instance = storeInstance;
  storeInstance = null;
  if (instance) {
    await instance.close();
  }
}

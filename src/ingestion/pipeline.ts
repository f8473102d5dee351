import { readdir, writeFile, mkdir } from 'fs/promises';
import { join, basename, extname } from 'path';
import {
  ArticleChunk,
  Config,
  Document,
  NotFoundError,
  PipelineError,
  StructuredDocument,
  TextLine,
} from '../types/index.js';
import { embeddingCacheKey, hashFile } from '../utils/hash.js';
import { createChildLogger } from '../utils/logger.js';
import { LLMClient, getLLMClient } from '../clients/llm.js';
import { QdrantStore, getQdrantStore, VectorPoint } from '../clients/qdrant.js';
import { PostgresStore, StoreStats, getPostgresStore } from '../clients/postgres.js';
import { PdfProcessor, createPdfProcessor } from './pdf-processor.js';
import { ArticleChunker, createChunker } from './chunker.js';
import { readLines } from './line-reader.js';
import { extractStructure } from './structure-extractor.js';
import { mergeArticles } from './article-merger.js';
import { writeCanonicalWorkbook, writeStructuredWorkbook } from './structure-table.js';

const logger = createChildLogger('ingestion-pipeline');

const EMBEDDING_BATCH_SIZE = 10;

export interface IngestionDeps {
  llm: Pick<LLMClient, 'embedBatch' | 'healthCheck'>;
  qdrant: Pick<
    QdrantStore,
    'initialize' | 'healthCheck' | 'upsertBatch' | 'deleteByDocument' | 'getCollectionInfo'
  >;
  postgres: Pick<
    PostgresStore,
    | 'healthCheck'
    | 'saveStructuredDocument'
    | 'getDocumentByHash'
    | 'getDocumentById'
    | 'deleteDocument'
    | 'getCachedEmbedding'
    | 'cacheEmbedding'
    | 'getStats'
  >;
  pdfProcessor: Pick<PdfProcessor, 'process'>;
}

export interface IngestOptions {
  /** Write the structured and canonical tables to the output directory */
  exportTables?: boolean;
}

export interface IngestFileResult {
  document: Document;
  skipped: boolean;
  articleCount: number;
  chunkCount: number;
}

export interface IngestionStats {
  documentsProcessed: number;
  documentsSkipped: number;
  articlesCreated: number;
  chunksCreated: number;
  errors: string[];
}

export interface PipelineStats extends StoreStats {
  vectorCount: number;
}

/**
 * Lines → structured records → canonical articles
 */
export function structureLines(lines: readonly TextLine[]): StructuredDocument {
  const records = extractStructure(lines);
  return {
    lines: lines.length,
    records,
    articles: mergeArticles(records),
  };
}

function extractTitle(markdown: string, fallback: string): string {
  const heading = markdown.match(/^#{1,2}\s+(.+)$/m);
  if (heading) return heading[1].trim();

  return fallback.replace(/\.[^.]+$/, '');
}

/**
 * Ingests regulation PDFs: structure, persist, chunk, embed and index
 */
export class IngestionPipeline {
  private config: Config;
  private llm: IngestionDeps['llm'];
  private qdrant: IngestionDeps['qdrant'];
  private postgres: IngestionDeps['postgres'];
  private pdfProcessor: IngestionDeps['pdfProcessor'];
  private chunker: ArticleChunker;

  constructor(config: Config, deps: Partial<IngestionDeps> = {}) {
    this.config = config;
    this.llm = deps.llm ?? getLLMClient(config.llm);
    this.qdrant = deps.qdrant ?? getQdrantStore(config.qdrant);
    this.postgres = deps.postgres ?? getPostgresStore(config.postgres);
    this.pdfProcessor = deps.pdfProcessor ?? createPdfProcessor(getLLMClient(config.llm));
    this.chunker = createChunker({
      chunkSize: config.pipeline.chunkSize,
      chunkOverlap: config.pipeline.chunkOverlap,
    });
  }

  async initialize(): Promise<void> {
    logger.info('Initializing ingestion pipeline');

    const [llmOk, qdrantOk, pgOk] = await Promise.all([
      this.llm.healthCheck(),
      this.qdrant.healthCheck(),
      this.postgres.healthCheck(),
    ]);

    if (!llmOk) {
      logger.warn('Model endpoint is not responding - OCR/embedding may fail');
    }

    if (!qdrantOk) {
      throw new PipelineError('Qdrant is not responding', 'INIT_ERROR');
    }

    if (!pgOk) {
      throw new PipelineError('Postgres is not responding', 'INIT_ERROR');
    }

    await this.qdrant.initialize();

    logger.info('Ingestion pipeline initialized');
  }

  /**
   * Read a PDF and build its structured and canonical tables without
   * touching any store
   */
  async structureFile(filepath: string): Promise<StructuredDocument> {
    const ocrResult = await this.pdfProcessor.process(filepath);
    const structured = structureLines(readLines(ocrResult));

    logger.info(
      {
        filename: ocrResult.filename,
        lines: structured.lines,
        records: structured.records.length,
        articles: structured.articles.length,
      },
      'Document structured'
    );

    return structured;
  }

  async ingestFile(filepath: string, options: IngestOptions = {}): Promise<IngestFileResult> {
    const filename = basename(filepath);
    logger.info({ filepath, filename }, 'Ingesting file');

    const fileHash = await hashFile(filepath);
    const existing = await this.postgres.getDocumentByHash(fileHash);

    if (existing) {
      logger.info({ filename, hash: fileHash }, 'Document already ingested');
      return { document: existing, skipped: true, articleCount: existing.articleCount, chunkCount: 0 };
    }

    const ocrResult = await this.pdfProcessor.process(filepath);
    const structured = structureLines(readLines(ocrResult));

    if (options.exportTables) {
      await this.exportTables(filename, structured);
    }

    const { document, articles } = await this.postgres.saveStructuredDocument(
      {
        filename,
        filepath,
        fileHash,
        title: extractTitle(ocrResult.fullMarkdown, filename),
        totalPages: ocrResult.totalPages,
        metadata: {
          processedAt: new Date().toISOString(),
          pageCount: ocrResult.pages.length,
          lineCount: structured.lines,
          recordCount: structured.records.length,
        },
      },
      structured.records,
      structured.articles
    );

    try {
      const chunks = this.chunker.chunkArticles(articles, { filename });
      await this.embedAndStoreChunks(chunks);

      logger.info(
        { filename, documentId: document.id, articleCount: articles.length, chunkCount: chunks.length },
        'File ingestion complete'
      );

      return { document, skipped: false, articleCount: articles.length, chunkCount: chunks.length };
    } catch (error) {
      logger.error({ error, documentId: document.id }, 'Indexing failed, removing document');
      await this.removeDocument(document.id);
      throw error;
    }
  }

  private async removeDocument(documentId: string): Promise<void> {
    await this.qdrant.deleteByDocument(documentId).catch((error: unknown) => {
      logger.warn({ error, documentId }, 'Failed to remove vectors');
    });
    await this.postgres.deleteDocument(documentId).catch((error: unknown) => {
      logger.warn({ error, documentId }, 'Failed to remove document rows');
    });
  }

  private async exportTables(filename: string, structured: StructuredDocument): Promise<void> {
    const outputDir = this.config.pipeline.outputDir;
    const stem = filename.replace(/\.[^.]+$/, '');
    await mkdir(outputDir, { recursive: true });
    await writeFile(join(outputDir, `${stem}_structured.xlsx`), writeStructuredWorkbook(structured.records));
    await writeFile(join(outputDir, `${stem}_canonical.xlsx`), writeCanonicalWorkbook(structured.articles));
    logger.info({ outputDir, stem }, 'Tables exported');
  }

  /**
   * Embed chunks (through the embedding cache) and upsert them to Qdrant
   */
  private async embedAndStoreChunks(chunks: ArticleChunk[]): Promise<void> {
    const model = this.config.llm.embeddingModel;
    const points: VectorPoint[] = [];

    for (let i = 0; i < chunks.length; i += EMBEDDING_BATCH_SIZE) {
      const batch = chunks.slice(i, i + EMBEDDING_BATCH_SIZE);
      const keys = batch.map((chunk) => embeddingCacheKey(model, chunk.content));
      const cached = await Promise.all(keys.map((key) => this.postgres.getCachedEmbedding(key)));

      const missing = batch.flatMap((chunk, j) => (cached[j] ? [] : [j]));
      const generated = await this.llm.embedBatch(missing.map((j) => batch[j].content));

      const vectors = [...cached];
      for (const [k, j] of missing.entries()) {
        vectors[j] = generated[k].embedding;
        await this.postgres.cacheEmbedding(keys[j], generated[k].embedding, generated[k].model);
      }

      batch.forEach((chunk, j) => {
        const vector = vectors[j];
        if (!vector) {
          throw new PipelineError(`No embedding for chunk ${chunk.id}`, 'EMBEDDING_ERROR');
        }
        points.push({
          id: chunk.id,
          vector,
          payload: {
            chunkId: chunk.id,
            documentId: chunk.documentId,
            articleId: chunk.articleId,
            content: chunk.content,
            chunkIndex: chunk.chunkIndex,
            metadata: chunk.metadata,
          },
        });
      });

      logger.debug(
        {
          processed: Math.min(i + EMBEDDING_BATCH_SIZE, chunks.length),
          total: chunks.length,
          cacheHits: batch.length - missing.length,
        },
        'Embedding batch progress'
      );
    }

    await this.qdrant.upsertBatch(points);

    logger.info({ vectorCount: points.length }, 'Vectors stored in Qdrant');
  }

  async ingestDirectory(
    dirPath: string,
    options: IngestOptions & { recursive?: boolean } = {}
  ): Promise<IngestionStats> {
    const stats: IngestionStats = {
      documentsProcessed: 0,
      documentsSkipped: 0,
      articlesCreated: 0,
      chunksCreated: 0,
      errors: [],
    };

    logger.info({ dirPath, options }, 'Starting directory ingestion');

    const pdfFiles = await this.findPdfFiles(dirPath, options.recursive);

    logger.info({ fileCount: pdfFiles.length }, 'Found PDF files');

    for (const filepath of pdfFiles) {
      try {
        const result = await this.ingestFile(filepath, options);
        if (result.skipped) {
          stats.documentsSkipped++;
        } else {
          stats.documentsProcessed++;
          stats.articlesCreated += result.articleCount;
          stats.chunksCreated += result.chunkCount;
        }
      } catch (error) {
        const errorMsg = `Failed to ingest ${filepath}: ${error instanceof Error ? error.message : String(error)}`;
        logger.error({ error, filepath }, 'Ingestion failed for file');
        stats.errors.push(errorMsg);
      }
    }

    logger.info({ stats }, 'Directory ingestion complete');

    return stats;
  }

  private async findPdfFiles(dirPath: string, recursive: boolean = false): Promise<string[]> {
    const pdfFiles: string[] = [];
    const entries = await readdir(dirPath, { withFileTypes: true });

    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      const fullPath = join(dirPath, entry.name);

      if (entry.isFile() && extname(entry.name).toLowerCase() === '.pdf') {
        pdfFiles.push(fullPath);
      } else if (entry.isDirectory() && recursive) {
        pdfFiles.push(...(await this.findPdfFiles(fullPath, true)));
      }
    }

    return pdfFiles;
  }

  /**
   * Delete a document with its tables and vectors
   */
  async deleteDocument(documentId: string): Promise<void> {
    const document = await this.postgres.getDocumentById(documentId);
    if (!document) {
      throw new NotFoundError(`Document ${documentId} not found`);
    }

    logger.info({ documentId }, 'Deleting document');

    await this.qdrant.deleteByDocument(documentId);
    await this.postgres.deleteDocument(documentId);

    logger.info({ documentId }, 'Document deleted');
  }

  async getStats(): Promise<PipelineStats> {
    const [storeStats, qdrantInfo] = await Promise.all([
      this.postgres.getStats(),
      this.qdrant.getCollectionInfo(),
    ]);

    return { ...storeStats, vectorCount: qdrantInfo.vectorCount };
  }
}

export function createIngestionPipeline(
  config: Config,
  deps: Partial<IngestionDeps> = {}
): IngestionPipeline {
  return new IngestionPipeline(config, deps);
}

/**
 * Ingestion pipeline tests
 *
 * Runs the real structuring, chunking and embedding-cache logic against
 * in-memory stores and a PDF processor that serves the text fixtures.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { IngestionPipeline } from '../../src/ingestion/pipeline.js';
import { readCanonicalWorkbook } from '../../src/ingestion/structure-table.js';
import { loadConfig } from '../../src/config/index.js';
import { Config, NotFoundError, PipelineError, QdrantError } from '../../src/types/index.js';
import { createMockPostgresStore, MockPostgresStore } from '../helpers/mock-postgres.js';
import { createMockQdrantStore, MockQdrantStore } from '../helpers/mock-qdrant.js';
import { createMockLLMClient, MockLLMClient } from '../helpers/mock-llm.js';
import { loadFixtureOcrResult, NEW_REGULATION, OLD_REGULATION } from '../helpers/test-fixtures.js';

function createFixtureProcessor() {
  return {
    process: vi.fn(async (filepath: string) => {
      const filename = basename(filepath);
      return loadFixtureOcrResult(
        filename.startsWith('regulation-2024') ? NEW_REGULATION : OLD_REGULATION,
        filename
      );
    }),
  };
}

describe('Ingestion pipeline', () => {
  let workDir: string;
  let oldPdf: string;
  let newPdf: string;
  let config: Config;
  let llm: MockLLMClient;
  let qdrant: MockQdrantStore;
  let postgres: MockPostgresStore;
  let pdfProcessor: ReturnType<typeof createFixtureProcessor>;
  let pipeline: IngestionPipeline;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'reg-ingest-'));
    oldPdf = join(workDir, 'regulation-2022.pdf');
    newPdf = join(workDir, 'regulation-2024.pdf');
    await writeFile(oldPdf, 'placeholder pdf 2022');
    await writeFile(newPdf, 'placeholder pdf 2024');

    const base = loadConfig();
    config = { ...base, pipeline: { ...base.pipeline, outputDir: join(workDir, 'output') } };
    llm = createMockLLMClient();
    qdrant = createMockQdrantStore();
    postgres = createMockPostgresStore();
    pdfProcessor = createFixtureProcessor();
    pipeline = new IngestionPipeline(config, { llm, qdrant, postgres, pdfProcessor });
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  describe('initialize', () => {
    it('should fail when Postgres is down', async () => {
      postgres.healthCheck.mockResolvedValueOnce(false);

      await expect(pipeline.initialize()).rejects.toThrow(
        new PipelineError('Postgres is not responding', 'INIT_ERROR')
      );
    });

    it('should only warn when the model endpoint is down', async () => {
      llm.healthCheck.mockResolvedValueOnce(false);

      await pipeline.initialize();

      expect(qdrant.initialize).toHaveBeenCalled();
    });
  });

  describe('ingestFile', () => {
    it('should store the canonical articles and one vector per chunk', async () => {
      const result = await pipeline.ingestFile(oldPdf);

      expect(result.skipped).toBe(false);
      expect(result.articleCount).toBe(4);
      expect(result.chunkCount).toBe(4);
      expect(result.document.title).toBe(
        'Regulation on digital operational resilience for the financial sector'
      );

      const articles = postgres.articles.get(result.document.id) ?? [];
      expect(articles.map((a) => [a.theme, a.articleTitle, a.subTheme])).toEqual([
        ['General provisions', 'Article 1', 'Subject matter'],
        ['General provisions', 'Article 2', 'Scope'],
        ['ICT risk management', 'Article 5', 'Governance and organisation'],
        ['ICT risk management', 'Article 6', 'ICT risk management framework'],
      ]);
      expect(articles[1].content).toBe(
        'This Regulation applies to credit institutions and investment firms.'
      );
      expect(qdrant.points.size).toBe(4);
    });

    it('should prefix every chunk with its article header', async () => {
      await pipeline.ingestFile(oldPdf);

      const scope = [...qdrant.points.values()].find(
        (p) => p.payload.metadata.articleTitle === 'Article 2'
      );
      expect(scope?.payload.content).toBe(
        'Theme: General provisions\nArticle: Article 2\nSub-Theme: Scope\nContent: ' +
          'This Regulation applies to credit institutions and investment firms.'
      );
      expect(scope?.payload.metadata.filename).toBe('regulation-2022.pdf');
    });

    it('should skip a file that was already ingested', async () => {
      const first = await pipeline.ingestFile(oldPdf);
      const second = await pipeline.ingestFile(oldPdf);

      expect(second).toEqual({
        document: first.document,
        skipped: true,
        articleCount: 4,
        chunkCount: 0,
      });
      expect(pdfProcessor.process).toHaveBeenCalledTimes(1);
    });

    it('should remove the document when indexing fails', async () => {
      qdrant.upsertBatch.mockRejectedValueOnce(new QdrantError('Failed to upsert vectors'));

      await expect(pipeline.ingestFile(oldPdf)).rejects.toThrow('Failed to upsert vectors');

      expect(postgres.documents.size).toBe(0);
      expect(qdrant.deleteByDocument).toHaveBeenCalledTimes(1);
    });

    it('should reuse cached embeddings for unchanged chunks', async () => {
      await pipeline.ingestFile(oldPdf);
      await pipeline.ingestFile(newPdf);

      // Articles 1 and 6 are unchanged between the versions
      expect(llm.embedBatch).toHaveBeenCalledTimes(2);
      expect(llm.embedBatch.mock.calls[0][0]).toHaveLength(4);
      expect(llm.embedBatch.mock.calls[1][0]).toHaveLength(4);
      expect(qdrant.points.size).toBe(10);
    });

    it('should export both tables when asked to', async () => {
      await pipeline.ingestFile(newPdf, { exportTables: true });

      const canonical = readCanonicalWorkbook(
        await readFile(join(workDir, 'output', 'regulation-2024_canonical.xlsx'))
      );
      expect(canonical).toHaveLength(6);
      expect(canonical[5]).toEqual({
        theme: 'ICT-related incident management',
        articleTitle: 'Article 17',
        subTheme: 'ICT-related incident management process',
        content:
          'Financial entities shall define and implement an ICT-related incident management process to detect and manage incidents.',
      });
    });
  });

  describe('structureFile', () => {
    it('should structure without touching the stores', async () => {
      const structured = await pipeline.structureFile(newPdf);

      expect(structured.records).toHaveLength(6);
      expect(structured.articles).toHaveLength(6);
      expect(postgres.saveStructuredDocument).not.toHaveBeenCalled();
      expect(qdrant.upsertBatch).not.toHaveBeenCalled();
    });
  });

  describe('ingestDirectory', () => {
    it('should ingest every PDF and collect failures', async () => {
      const nested = join(workDir, 'nested');
      await mkdir(nested);
      await writeFile(join(nested, 'regulation-2024-draft.pdf'), 'placeholder pdf draft');
      await writeFile(join(workDir, 'notes.txt'), 'not a pdf');
      pdfProcessor.process.mockRejectedValueOnce(new Error('corrupt file'));

      const stats = await pipeline.ingestDirectory(workDir, { recursive: true });

      expect(stats).toEqual({
        documentsProcessed: 2,
        documentsSkipped: 0,
        articlesCreated: 10,
        chunksCreated: 10,
        errors: [`Failed to ingest ${join(nested, 'regulation-2024-draft.pdf')}: corrupt file`],
      });
    });

    it('should count duplicates as skipped', async () => {
      await pipeline.ingestFile(oldPdf);

      const stats = await pipeline.ingestDirectory(workDir);

      expect(stats.documentsProcessed).toBe(1);
      expect(stats.documentsSkipped).toBe(1);
    });
  });

  describe('deleteDocument', () => {
    it('should delete rows and vectors', async () => {
      const { document } = await pipeline.ingestFile(oldPdf);

      await pipeline.deleteDocument(document.id);

      expect(postgres.documents.size).toBe(0);
      expect(qdrant.points.size).toBe(0);
    });

    it('should reject an unknown document', async () => {
      await expect(pipeline.deleteDocument('missing')).rejects.toThrow(NotFoundError);
    });
  });

  describe('getStats', () => {
    it('should combine store and vector counts', async () => {
      await pipeline.ingestFile(oldPdf);

      expect(await pipeline.getStats()).toEqual({
        documents: 1,
        structuredRecords: 4,
        articles: 4,
        comparisonRuns: 0,
        vectorCount: 4,
      });
    });
  });
});

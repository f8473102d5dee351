import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApiServer } from './server.js';
import { ComparisonReport, Document, NotFoundError, PostgresError } from '../types/index.js';

const document: Document = {
  id: 'doc-1',
  filename: 'dora.pdf',
  filepath: '/docs/dora.pdf',
  fileHash: 'hash-1',
  articleCount: 2,
  ingestedAt: new Date('2025-01-17T00:00:00Z'),
  metadata: {},
};

const report: ComparisonReport = {
  runId: 'run-1',
  documentSummary: 'Overall summary',
  themes: [],
  matched: [],
  unmatched: [],
  createdAt: new Date('2025-01-17T00:00:00Z'),
};

function createServices() {
  return {
    ingestion: {
      initialize: vi.fn(async () => undefined),
      ingestFile: vi.fn(async () => ({ document, skipped: false, articleCount: 2, chunkCount: 3 })),
      ingestDirectory: vi.fn(async () => ({
        documentsProcessed: 1,
        documentsSkipped: 0,
        articlesCreated: 2,
        chunksCreated: 3,
        errors: [],
      })),
      structureFile: vi.fn(async () => ({ lines: 4, records: [], articles: [] })),
      deleteDocument: vi.fn(async () => undefined),
      getStats: vi.fn(async () => ({
        documents: 1,
        structuredRecords: 2,
        articles: 2,
        comparisonRuns: 0,
        vectorCount: 3,
      })),
    },
    postgres: {
      listDocuments: vi.fn(async () => [document]),
      getDocumentById: vi.fn(async (id: string) => (id === 'doc-1' ? document : null)),
      listArticles: vi.fn(async () => []),
      getComparisonRun: vi.fn(async (id: string) => (id === 'run-1' ? report : null)),
    },
    comparator: {
      compareDocuments: vi.fn(async () => report),
    },
    controlMapper: {
      mapControls: vi.fn(async () => []),
      mapControlsFromWorkbook: vi.fn(async () => []),
    },
    answers: {
      ask: vi.fn(async () => ({
        queryId: 'query-1',
        answer: 'Answer [1]',
        citations: [],
        latencyMs: 12,
      })),
    },
  };
}

describe('API Server', () => {
  let services: ReturnType<typeof createServices>;
  let app: Express;

  beforeEach(() => {
    services = createServices();
    app = createApiServer(services);
  });

  describe('GET /health', () => {
    it('should report store statistics', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        status: 'healthy',
        documents: 1,
        structuredRecords: 2,
        articles: 2,
        comparisonRuns: 0,
        vectorCount: 3,
      });
    });

    it('should return 503 when a store is down', async () => {
      services.ingestion.getStats.mockRejectedValueOnce(new Error('connection refused'));

      const response = await request(app).get('/health');

      expect(response.status).toBe(503);
      expect(response.body).toEqual({ status: 'unhealthy', error: 'connection refused' });
    });
  });

  describe('documents', () => {
    it('should list documents', async () => {
      const response = await request(app).get('/documents');

      expect(response.status).toBe(200);
      expect(response.body[0].id).toBe('doc-1');
    });

    it('should return 404 for articles of an unknown document', async () => {
      const response = await request(app).get('/documents/missing/articles');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Document missing not found', code: 'NOT_FOUND' });
    });

    it('should map a not-found delete to 404', async () => {
      services.ingestion.deleteDocument.mockRejectedValueOnce(new NotFoundError('Document x not found'));

      const response = await request(app).delete('/documents/x');

      expect(response.status).toBe(404);
    });
  });

  describe('POST /ingest/file', () => {
    it('should ingest a file', async () => {
      const response = await request(app)
        .post('/ingest/file')
        .send({ filepath: '/docs/dora.pdf', exportTables: true });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        documentId: 'doc-1',
        filename: 'dora.pdf',
        skipped: false,
        articleCount: 2,
        chunkCount: 3,
      });
      expect(services.ingestion.initialize).toHaveBeenCalled();
      expect(services.ingestion.ingestFile).toHaveBeenCalledWith('/docs/dora.pdf', {
        exportTables: true,
      });
    });

    it('should return 400 without a filepath', async () => {
      const response = await request(app).post('/ingest/file').send({});

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });

    it('should return 500 with the error code on pipeline failure', async () => {
      services.ingestion.ingestFile.mockRejectedValueOnce(
        new PostgresError('Failed to save structured document')
      );

      const response = await request(app).post('/ingest/file').send({ filepath: '/docs/a.pdf' });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        error: 'Failed to save structured document',
        code: 'POSTGRES_ERROR',
      });
    });
  });

  describe('POST /ingest/directory', () => {
    it('should return directory statistics', async () => {
      const response = await request(app)
        .post('/ingest/directory')
        .send({ dirPath: '/docs', recursive: true });

      expect(response.status).toBe(200);
      expect(response.body.documentsProcessed).toBe(1);
      expect(services.ingestion.ingestDirectory).toHaveBeenCalledWith('/docs', {
        recursive: true,
        exportTables: undefined,
      });
    });
  });

  describe('POST /structure', () => {
    it('should return the structured tables', async () => {
      const response = await request(app).post('/structure').send({ filepath: '/docs/a.pdf' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ lines: 4, records: [], articles: [] });
    });
  });

  describe('comparisons', () => {
    it('should compare two documents', async () => {
      const response = await request(app)
        .post('/summary')
        .send({ oldDocumentId: 'doc-0', newDocumentId: 'doc-1' });

      expect(response.status).toBe(200);
      expect(response.body.runId).toBe('run-1');
      expect(services.comparator.compareDocuments).toHaveBeenCalledWith('doc-0', 'doc-1');
    });

    it('should export a stored run as a workbook', async () => {
      const response = await request(app).get('/comparisons/run-1/export');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toContain('spreadsheetml');
      expect(response.headers['content-disposition']).toBe(
        'attachment; filename="comparison_run-1.xlsx"'
      );
    });

    it('should return 404 for an unknown run', async () => {
      const response = await request(app).get('/comparisons/run-9/export');

      expect(response.status).toBe(404);
    });
  });

  describe('POST /controls', () => {
    const control = {
      l1Id: 'C1',
      l1Title: 'Governance',
      l2Id: 'C1.1',
      l2Title: 'Board approval',
      activity: 'The board approves the framework.',
    };

    it('should map inline controls', async () => {
      const response = await request(app)
        .post('/controls')
        .send({ documentId: 'doc-1', controls: [control], l2Filter: ['C1.1'] });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ documentId: 'doc-1', mappings: [] });
      expect(services.controlMapper.mapControls).toHaveBeenCalledWith('doc-1', [control], ['C1.1']);
    });

    it('should map controls from an uploaded workbook', async () => {
      const workbookBase64 = Buffer.from('placeholder').toString('base64');

      const response = await request(app)
        .post('/controls')
        .send({ documentId: 'doc-1', workbookBase64, sheetName: 'Controls' });

      expect(response.status).toBe(200);
      expect(services.controlMapper.mapControlsFromWorkbook).toHaveBeenCalledWith(
        'doc-1',
        Buffer.from('placeholder'),
        { sheetName: 'Controls', l2Filter: undefined }
      );
    });

    it('should require exactly one control source', async () => {
      const response = await request(app).post('/controls').send({ documentId: 'doc-1' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Provide either controls or workbookBase64');
    });
  });

  describe('POST /chat', () => {
    it('should answer a question with history', async () => {
      const history = [{ question: 'What is DORA?', answer: 'A regulation.' }];

      const response = await request(app)
        .post('/chat')
        .send({ question: '  Who does it apply to?  ', history });

      expect(response.status).toBe(200);
      expect(response.body.answer).toBe('Answer [1]');
      expect(services.answers.ask).toHaveBeenCalledWith('Who does it apply to?', {
        history,
        documentId: undefined,
        theme: undefined,
      });
    });

    it('should reject an empty question', async () => {
      const response = await request(app).post('/chat').send({ question: '   ' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'question is required', code: 'VALIDATION_ERROR' });
    });
  });
});

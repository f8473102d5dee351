import express, { Request, Response, NextFunction, Express, RequestHandler } from 'express';
import http from 'http';
import { z, ZodError } from 'zod';
import { Config, NotFoundError, PipelineError, ValidationError } from '../types/index.js';
import { PostgresStore, getPostgresStore } from '../clients/postgres.js';
import { IngestionPipeline } from '../ingestion/pipeline.js';
import { ThemeComparator } from '../comparison/comparator.js';
import { ControlMapper } from '../controls/control-mapper.js';
import { AnswerService } from '../qa/answer-service.js';
import { writeComparisonWorkbook } from '../comparison/export.js';
import { createServices } from '../services.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('api-server');

const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export interface ApiServices {
  ingestion: Pick<
    IngestionPipeline,
    'initialize' | 'ingestFile' | 'ingestDirectory' | 'structureFile' | 'deleteDocument' | 'getStats'
  >;
  postgres: Pick<PostgresStore, 'listDocuments' | 'getDocumentById' | 'listArticles' | 'getComparisonRun'>;
  comparator: Pick<ThemeComparator, 'compareDocuments'>;
  controlMapper: Pick<ControlMapper, 'mapControls' | 'mapControlsFromWorkbook'>;
  answers: Pick<AnswerService, 'ask'>;
}

// ============================================================
// Request schemas
// ============================================================

const IngestFileSchema = z.object({
  filepath: z.string().trim().min(1, 'filepath is required'),
  exportTables: z.boolean().optional(),
});

const IngestDirectorySchema = z.object({
  dirPath: z.string().trim().min(1, 'dirPath is required'),
  recursive: z.boolean().optional(),
  exportTables: z.boolean().optional(),
});

const StructureSchema = z.object({
  filepath: z.string().trim().min(1, 'filepath is required'),
});

const SummarySchema = z.object({
  oldDocumentId: z.string().min(1),
  newDocumentId: z.string().min(1),
});

const ControlSchema = z.object({
  l1Id: z.string(),
  l1Title: z.string(),
  l2Id: z.string(),
  l2Title: z.string(),
  activity: z.string().min(1),
});

const ControlsSchema = z
  .object({
    documentId: z.string().min(1),
    controls: z.array(ControlSchema).optional(),
    workbookBase64: z.string().min(1).optional(),
    sheetName: z.string().optional(),
    l2Filter: z.array(z.string()).optional(),
  })
  .refine((body) => (body.controls === undefined) !== (body.workbookBase64 === undefined), {
    message: 'Provide either controls or workbookBase64',
  });

const ChatSchema = z.object({
  question: z.string().trim().min(1, 'question is required').max(10000, 'question too long'),
  history: z.array(z.object({ question: z.string(), answer: z.string() })).optional(),
  documentId: z.string().optional(),
  theme: z.string().optional(),
});

function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function statusFor(error: PipelineError): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotFoundError) return 404;
  return 500;
}

/**
 * Create and configure the Express API server
 */
export function createApiServer(services: ApiServices): Express {
  const app = express();
  app.use(express.json({ limit: '20mb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info({
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration: Date.now() - start,
      });
    });
    next();
  });

  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const stats = await services.ingestion.getStats();
      res.json({ status: 'healthy', ...stats });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  // ============================================================
  // Documents
  // ============================================================

  app.get(
    '/documents',
    route(async (_req, res) => {
      res.json(await services.postgres.listDocuments());
    })
  );

  app.get(
    '/documents/:id/articles',
    route(async (req, res) => {
      const document = await services.postgres.getDocumentById(req.params.id);
      if (!document) {
        throw new NotFoundError(`Document ${req.params.id} not found`);
      }
      res.json({ document, articles: await services.postgres.listArticles(document.id) });
    })
  );

  app.delete(
    '/documents/:id',
    route(async (req, res) => {
      await services.ingestion.deleteDocument(req.params.id);
      res.status(204).end();
    })
  );

  // ============================================================
  // Ingestion
  // ============================================================

  app.post(
    '/ingest/file',
    route(async (req, res) => {
      const { filepath, exportTables } = IngestFileSchema.parse(req.body);

      await services.ingestion.initialize();
      const result = await services.ingestion.ingestFile(filepath, { exportTables });

      res.json({
        documentId: result.document.id,
        filename: result.document.filename,
        skipped: result.skipped,
        articleCount: result.articleCount,
        chunkCount: result.chunkCount,
      });
    })
  );

  app.post(
    '/ingest/directory',
    route(async (req, res) => {
      const { dirPath, recursive, exportTables } = IngestDirectorySchema.parse(req.body);

      await services.ingestion.initialize();
      res.json(await services.ingestion.ingestDirectory(dirPath, { recursive, exportTables }));
    })
  );

  app.post(
    '/structure',
    route(async (req, res) => {
      const { filepath } = StructureSchema.parse(req.body);
      res.json(await services.ingestion.structureFile(filepath));
    })
  );

  // ============================================================
  // Comparison
  // ============================================================

  app.post(
    '/summary',
    route(async (req, res) => {
      const { oldDocumentId, newDocumentId } = SummarySchema.parse(req.body);
      res.json(await services.comparator.compareDocuments(oldDocumentId, newDocumentId));
    })
  );

  app.get(
    '/comparisons/:runId',
    route(async (req, res) => {
      const report = await services.postgres.getComparisonRun(req.params.runId);
      if (!report) {
        throw new NotFoundError(`Comparison run ${req.params.runId} not found`);
      }
      res.json(report);
    })
  );

  app.get(
    '/comparisons/:runId/export',
    route(async (req, res) => {
      const report = await services.postgres.getComparisonRun(req.params.runId);
      if (!report) {
        throw new NotFoundError(`Comparison run ${req.params.runId} not found`);
      }
      res
        .type(XLSX_CONTENT_TYPE)
        .attachment(`comparison_${report.runId}.xlsx`)
        .send(writeComparisonWorkbook(report));
    })
  );

  // ============================================================
  // Controls & chat
  // ============================================================

  app.post(
    '/controls',
    route(async (req, res) => {
      const body = ControlsSchema.parse(req.body);

      const mappings = body.controls
        ? await services.controlMapper.mapControls(body.documentId, body.controls, body.l2Filter)
        : await services.controlMapper.mapControlsFromWorkbook(
            body.documentId,
            Buffer.from(body.workbookBase64 ?? '', 'base64'),
            { sheetName: body.sheetName, l2Filter: body.l2Filter }
          );

      res.json({ documentId: body.documentId, mappings });
    })
  );

  app.post(
    '/chat',
    route(async (req, res) => {
      const { question, history, documentId, theme } = ChatSchema.parse(req.body);
      res.json(await services.answers.ask(question, { history, documentId, theme }));
    })
  );

  // Error handling middleware
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      res.status(400).json({
        error: err.issues.map((issue) => issue.message).join('; '),
        code: 'VALIDATION_ERROR',
      });
      return;
    }

    if (err instanceof PipelineError) {
      const status = statusFor(err);
      if (status === 500) {
        logger.error({ error: err }, 'Request failed');
      }
      res.status(status).json({ error: err.message, code: err.code });
      return;
    }

    logger.error({ error: err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

/**
 * Start the API server with graceful shutdown
 */
export async function startServer(config: Config, port: number = 3000): Promise<http.Server> {
  const services = createServices(config);
  await services.ingestion.initialize();

  const app = createApiServer(services);
  const server = http.createServer(app);

  const gracefulShutdown = (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, closing connections...');

    server.close(() => {
      logger.info('HTTP server closed');
      getPostgresStore(config.postgres)
        .close()
        .then(() => {
          logger.info('Database connections closed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error({ error }, 'Error closing database connections');
          process.exit(1);
        });
    });

    // Force exit if graceful shutdown takes too long
    setTimeout(() => {
      logger.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  await new Promise<void>((resolve) => server.listen(port, resolve));
  logger.info({ port }, 'API server started');

  return server;
}

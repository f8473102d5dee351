import { z } from 'zod';

// ============================================================
// Configuration Types
// ============================================================

export const ConfigSchema = z.object({
  llm: z.object({
    baseUrl: z.string().url(),
    apiKey: z.string(),
    llmModel: z.string(),
    embeddingModel: z.string(),
    ocrModel: z.string(),
  }),
  qdrant: z.object({
    url: z.string().url(),
    collection: z.string(),
    embeddingDimension: z.number().min(64).max(4096),
  }),
  postgres: z.object({
    host: z.string(),
    port: z.number(),
    database: z.string(),
    user: z.string(),
    password: z.string(),
  }),
  pipeline: z.object({
    chunkSize: z.number().min(100).max(8000),
    chunkOverlap: z.number().min(0).max(1000),
    similarityTopK: z.number().min(1).max(50),
    qaTopK: z.number().min(1).max(50),
    outputDir: z.string(),
  }),
  comparison: z.object({
    concurrency: z.number().min(1).max(16),
    maxRetries: z.number().min(0).max(10),
    retryBaseDelayMs: z.number().min(0),
  }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
});

export type Config = z.infer<typeof ConfigSchema>;

// ============================================================
// Structure Types
// ============================================================

/**
 * One recognised line of text, in reading order
 */
export interface TextLine {
  text: string;
  pageNumber?: number;
}

/**
 * A row of the structured table: one article (or article fragment) with the
 * chapter it was found under
 */
export interface StructuredRecord {
  chapterId: string | null;
  chapterName: string | null;
  articleId: string | null;
  articleName: string | null;
  content: string;
}

/**
 * A reconciled article. `theme` groups articles by chapter (or the amendments
 * sentinel) and `subTheme` is the article name.
 */
export interface CanonicalArticle {
  theme: string;
  articleTitle: string;
  subTheme: string;
  content: string;
}

export interface StructuredDocument {
  lines: number;
  records: StructuredRecord[];
  articles: CanonicalArticle[];
}

// ============================================================
// Document Types
// ============================================================

export interface Document {
  id: string;
  filename: string;
  filepath: string;
  fileHash: string;
  title?: string;
  totalPages?: number;
  articleCount: number;
  ingestedAt: Date;
  metadata: Record<string, unknown>;
}

export interface DocumentInput {
  filename: string;
  filepath: string;
  fileHash: string;
  title?: string;
  totalPages?: number;
  metadata?: Record<string, unknown>;
}

export interface StoredArticle extends CanonicalArticle {
  id: string;
  documentId: string;
  position: number;
}

// ============================================================
// Chunk Types
// ============================================================

export interface ArticleChunk {
  id: string;
  documentId: string;
  articleId: string;
  chunkIndex: number;
  content: string;
  metadata: ChunkMetadata;
}

export interface ChunkMetadata {
  filename?: string;
  theme?: string;
  articleTitle?: string;
  subTheme?: string;
  [key: string]: unknown;
}

// ============================================================
// Embedding & Search Types
// ============================================================

export interface EmbeddingResult {
  embedding: number[];
  model: string;
  tokenCount?: number;
}

export interface SearchResult {
  chunkId: string;
  documentId: string;
  articleId: string;
  content: string;
  chunkIndex: number;
  metadata: ChunkMetadata;
  score: number;
}

// ============================================================
// Comparison Types
// ============================================================

export const NO_MATCH = 'None' as const;

export interface ThemeComparisonUnit {
  theme: string;
  newSubTheme: string;
  oldSubTheme: string | typeof NO_MATCH;
  newContent: string;
  oldContent?: string;
  analysis?: string;
}

export interface ThemeSummary {
  name: string;
  summary: string;
  subThemes: Array<{ name: string; summary: string }>;
}

export interface ComparisonReport {
  runId: string;
  oldDocumentId?: string;
  newDocumentId?: string;
  documentSummary: string;
  themes: ThemeSummary[];
  matched: ThemeComparisonUnit[];
  unmatched: ThemeComparisonUnit[];
  createdAt: Date;
}

// ============================================================
// Control Mapping Types
// ============================================================

export interface ControlDefinition {
  l1Id: string;
  l1Title: string;
  l2Id: string;
  l2Title: string;
  activity: string;
}

export interface ControlMapping {
  control: ControlDefinition;
  documentId: string;
  theme?: string;
  articleTitle?: string;
  subTheme?: string;
  matchedContent: string;
  score: number;
  assessment?: Record<string, unknown>;
  error?: string;
}

// ============================================================
// Question Answering Types
// ============================================================

export interface Citation {
  chunkId: string;
  documentId: string;
  filename: string;
  articleTitle?: string;
  subTheme?: string;
  excerpt: string;
}

export interface AnswerResponse {
  queryId: string;
  answer: string;
  citations: Citation[];
  latencyMs: number;
}

// ============================================================
// OCR Types
// ============================================================

export interface OcrPage {
  pageNumber: number;
  markdown: string;
  confidence?: number;
}

export interface OcrResult {
  filename: string;
  pages: OcrPage[];
  fullMarkdown: string;
  totalPages: number;
}

// ============================================================
// Error Types
// ============================================================

export class PipelineError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

export class LLMError extends PipelineError {
  constructor(message: string, details?: unknown) {
    super(message, 'LLM_ERROR', details);
    this.name = 'LLMError';
  }
}

export class QdrantError extends PipelineError {
  constructor(message: string, details?: unknown) {
    super(message, 'QDRANT_ERROR', details);
    this.name = 'QdrantError';
  }
}

export class PostgresError extends PipelineError {
  constructor(message: string, details?: unknown) {
    super(message, 'POSTGRES_ERROR', details);
    this.name = 'PostgresError';
  }
}

export class OcrError extends PipelineError {
  constructor(message: string, details?: unknown) {
    super(message, 'OCR_ERROR', details);
    this.name = 'OcrError';
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends PipelineError {
  constructor(message: string, details?: unknown) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

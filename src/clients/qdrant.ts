import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';
import { ChunkMetadata, Config, QdrantError, SearchResult } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('qdrant');

const UPSERT_BATCH_SIZE = 100;

export interface QdrantPayload {
  chunkId: string;
  documentId: string;
  articleId: string;
  content: string;
  chunkIndex: number;
  metadata: ChunkMetadata;
  [key: string]: unknown; // Index signature for Qdrant compatibility
}

export interface VectorPoint {
  id: string;
  vector: number[];
  payload: QdrantPayload;
}

export interface SearchFilter {
  documentId?: string;
  theme?: string;
}

const PayloadSchema = z.object({
  chunkId: z.string(),
  documentId: z.string(),
  articleId: z.string(),
  content: z.string(),
  chunkIndex: z.number(),
  metadata: z
    .object({
      filename: z.string().optional(),
      theme: z.string().optional(),
      articleTitle: z.string().optional(),
      subTheme: z.string().optional(),
    })
    .catchall(z.unknown())
    .default({}),
});

/**
 * Qdrant vector store for article chunks
 */
export class QdrantStore {
  private client: QdrantClient;
  private collectionName: string;
  private embeddingDimension: number;

  constructor(config: Config['qdrant']) {
    this.client = new QdrantClient({ url: config.url });
    this.collectionName = config.collection;
    this.embeddingDimension = config.embeddingDimension;
  }

  /**
   * Create the collection and its payload indices if missing
   */
  async initialize(): Promise<void> {
    try {
      const collections = await this.client.getCollections();
      const exists = collections.collections.some((c) => c.name === this.collectionName);

      if (exists) {
        logger.debug({ collection: this.collectionName }, 'Collection exists');
        return;
      }

      logger.info(
        { collection: this.collectionName, dimension: this.embeddingDimension },
        'Creating new Qdrant collection'
      );

      await this.client.createCollection(this.collectionName, {
        vectors: {
          size: this.embeddingDimension,
          distance: 'Cosine',
        },
        replication_factor: 1,
      });

      for (const field of ['documentId', 'articleId', 'metadata.theme']) {
        await this.client.createPayloadIndex(this.collectionName, {
          field_name: field,
          field_schema: 'keyword',
        });
      }

      logger.info('Qdrant collection created successfully');
    } catch (error) {
      logger.error({ error }, 'Failed to initialize Qdrant collection');
      throw new QdrantError('Failed to initialize Qdrant collection', error);
    }
  }

  /**
   * Upsert points in batches
   */
  async upsertBatch(points: VectorPoint[]): Promise<void> {
    try {
      logger.debug({ count: points.length }, 'Batch upserting vectors');

      for (let i = 0; i < points.length; i += UPSERT_BATCH_SIZE) {
        await this.client.upsert(this.collectionName, {
          wait: true,
          points: points.slice(i, i + UPSERT_BATCH_SIZE),
        });
      }

      logger.info({ count: points.length }, 'Batch upsert complete');
    } catch (error) {
      logger.error({ error }, 'Failed to batch upsert vectors');
      throw new QdrantError('Failed to batch upsert vectors', error);
    }
  }

  /**
   * Nearest-neighbour search, optionally restricted to one document or theme
   */
  async search(queryVector: number[], topK: number, filter?: SearchFilter): Promise<SearchResult[]> {
    try {
      logger.debug({ topK, filter }, 'Searching vectors');

      const must = [
        ...(filter?.documentId ? [{ key: 'documentId', match: { value: filter.documentId } }] : []),
        ...(filter?.theme ? [{ key: 'metadata.theme', match: { value: filter.theme } }] : []),
      ];

      const results = await this.client.search(this.collectionName, {
        vector: queryVector,
        limit: topK,
        with_payload: true,
        filter: must.length > 0 ? { must } : undefined,
      });

      const searchResults = results.flatMap((result): SearchResult[] => {
        const parsed = PayloadSchema.safeParse(result.payload);
        if (!parsed.success) {
          logger.warn({ pointId: result.id }, 'Skipping point with malformed payload');
          return [];
        }
        return [{ ...parsed.data, score: result.score }];
      });

      logger.debug({ resultCount: searchResults.length }, 'Vector search complete');

      return searchResults;
    } catch (error) {
      logger.error({ error }, 'Failed to search vectors');
      throw new QdrantError('Failed to search vectors', error);
    }
  }

  /**
   * Delete vectors by document ID
   */
  async deleteByDocument(documentId: string): Promise<void> {
    try {
      await this.client.delete(this.collectionName, {
        wait: true,
        filter: {
          must: [{ key: 'documentId', match: { value: documentId } }],
        },
      });

      logger.info({ documentId }, 'Deleted vectors for document');
    } catch (error) {
      logger.error({ error, documentId }, 'Failed to delete vectors');
      throw new QdrantError('Failed to delete vectors', error);
    }
  }

  async getCollectionInfo(): Promise<{ vectorCount: number; status: string }> {
    try {
      const info = await this.client.getCollection(this.collectionName);
      return {
        vectorCount: info.points_count ?? 0,
        status: info.status,
      };
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'status' in error && error.status === 404) {
        return { vectorCount: 0, status: 'not_created' };
      }
      logger.error({ error }, 'Failed to get collection info');
      throw new QdrantError('Failed to get collection info', error);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch (error) {
      logger.error({ error }, 'Qdrant health check failed');
      return false;
    }
  }
}

// Singleton instance
let storeInstance: QdrantStore | null = null;

export function getQdrantStore(config: Config['qdrant']): QdrantStore {
  if (!storeInstance) {
    storeInstance = new QdrantStore(config);
  }
  return storeInstance;
}

export function resetQdrantStore(): void {
  storeInstance = null;
}

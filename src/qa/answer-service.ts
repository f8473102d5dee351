import { v4 as uuid } from 'uuid';
import { AnswerResponse, Citation, SearchResult } from '../types/index.js';
import { LLMClient } from '../clients/llm.js';
import { QdrantStore, SearchFilter } from '../clients/qdrant.js';
import { PostgresStore } from '../clients/postgres.js';
import { createChildLogger } from '../utils/logger.js';
import { embeddingCacheKey } from '../utils/hash.js';
import { AnswerContext, ChatTurn, NO_ANSWER_RESPONSE } from '../prompts/regulatory-assistant.js';

const logger = createChildLogger('answer-service');

const EXCERPT_LENGTH = 200;

export interface AnswerServiceDeps {
  llm: Pick<LLMClient, 'embed' | 'rephraseQuestion' | 'generateAnswer'>;
  qdrant: Pick<QdrantStore, 'search'>;
  postgres?: Pick<PostgresStore, 'getCachedEmbedding' | 'cacheEmbedding'>;
}

export interface AnswerServiceConfig {
  topK: number;
  embeddingModel: string;
}

export interface AskOptions extends SearchFilter {
  history?: ChatTurn[];
}

function excerpt(content: string): string {
  return content.length > EXCERPT_LENGTH ? `${content.substring(0, EXCERPT_LENGTH)}...` : content;
}

function toContext(result: SearchResult, index: number): AnswerContext {
  return {
    index: index + 1,
    content: result.content,
    filename: result.metadata.filename ?? 'Unknown document',
    articleTitle: result.metadata.articleTitle,
    subTheme: result.metadata.subTheme,
  };
}

/**
 * Retrieval-augmented answers over the indexed articles
 */
export class AnswerService {
  private config: AnswerServiceConfig;
  private deps: AnswerServiceDeps;

  constructor(config: AnswerServiceConfig, deps: AnswerServiceDeps) {
    this.config = config;
    this.deps = deps;
  }

  private async embedQuestion(question: string): Promise<number[]> {
    const key = embeddingCacheKey(this.config.embeddingModel, question);
    const cached = await this.deps.postgres?.getCachedEmbedding(key);
    if (cached) {
      return cached;
    }

    const result = await this.deps.llm.embed(question);
    await this.deps.postgres?.cacheEmbedding(key, result.embedding, result.model);
    return result.embedding;
  }

  async ask(question: string, options: AskOptions = {}): Promise<AnswerResponse> {
    const startTime = Date.now();
    const queryId = uuid();
    const { history = [], ...filter } = options;

    logger.info({ queryId, question, historyTurns: history.length }, 'Processing question');

    const standalone = await this.deps.llm.rephraseQuestion(question, history);
    const embedding = await this.embedQuestion(standalone);
    const results = await this.deps.qdrant.search(embedding, this.config.topK, filter);

    if (results.length === 0) {
      logger.info({ queryId }, 'No matching articles');
      return {
        queryId,
        answer: NO_ANSWER_RESPONSE,
        citations: [],
        latencyMs: Date.now() - startTime,
      };
    }

    const { answer, citedIndices } = await this.deps.llm.generateAnswer(
      standalone,
      results.map(toContext)
    );

    const citations: Citation[] = citedIndices
      .filter((idx) => idx >= 1 && idx <= results.length)
      .map((idx) => {
        const result = results[idx - 1];
        return {
          chunkId: result.chunkId,
          documentId: result.documentId,
          filename: result.metadata.filename ?? 'Unknown',
          articleTitle: result.metadata.articleTitle,
          subTheme: result.metadata.subTheme,
          excerpt: excerpt(result.content),
        };
      });

    const latencyMs = Date.now() - startTime;
    logger.info({ queryId, latencyMs, citationCount: citations.length }, 'Question answered');

    return { queryId, answer, citations, latencyMs };
  }
}

export function createAnswerService(
  config: AnswerServiceConfig,
  deps: AnswerServiceDeps
): AnswerService {
  return new AnswerService(config, deps);
}

import { Config } from './types/index.js';
import { getLLMClient } from './clients/llm.js';
import { getQdrantStore } from './clients/qdrant.js';
import { PostgresStore, getPostgresStore } from './clients/postgres.js';
import { IngestionPipeline, createIngestionPipeline } from './ingestion/pipeline.js';
import { ThemeComparator, createThemeComparator } from './comparison/comparator.js';
import { ControlMapper, createControlMapper } from './controls/control-mapper.js';
import { AnswerService, createAnswerService } from './qa/answer-service.js';

export interface Services {
  postgres: PostgresStore;
  ingestion: IngestionPipeline;
  comparator: ThemeComparator;
  controlMapper: ControlMapper;
  answers: AnswerService;
}

/**
 * Wire the pipelines to the shared client singletons
 */
export function createServices(config: Config): Services {
  const llm = getLLMClient(config.llm);
  const qdrant = getQdrantStore(config.qdrant);
  const postgres = getPostgresStore(config.postgres);

  return {
    postgres,
    ingestion: createIngestionPipeline(config, { llm, qdrant, postgres }),
    comparator: createThemeComparator(config.comparison, { llm, postgres }),
    controlMapper: createControlMapper(
      { topK: config.pipeline.similarityTopK, comparison: config.comparison },
      { llm, qdrant }
    ),
    answers: createAnswerService(
      { topK: config.pipeline.qaTopK, embeddingModel: config.llm.embeddingModel },
      { llm, qdrant, postgres }
    ),
  };
}

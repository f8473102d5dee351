import { config as dotenvConfig } from 'dotenv';
import { Config, ConfigSchema } from '../types/index.js';

dotenvConfig();

function getEnvString(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

export function loadConfig(): Config {
  const rawConfig = {
    llm: {
      baseUrl: getEnvString('LLM_BASE_URL', 'http://localhost:1234/v1'),
      apiKey: getEnvString('LLM_API_KEY', 'not-needed'),
      llmModel: getEnvString('LLM_MODEL', 'qwen2.5-7b-instruct'),
      embeddingModel: getEnvString(
        'LLM_EMBEDDING_MODEL',
        'text-embedding-nomic-embed-text-v1.5'
      ),
      ocrModel: getEnvString('LLM_OCR_MODEL', 'allenai/olmocr-2-7b'),
    },
    qdrant: {
      url: getEnvString('QDRANT_URL', 'http://localhost:6333'),
      collection: getEnvString('QDRANT_COLLECTION', 'regulation_articles'),
      embeddingDimension: getEnvNumber('EMBEDDING_DIMENSION', 768),
    },
    postgres: {
      host: getEnvString('POSTGRES_HOST', 'localhost'),
      port: getEnvNumber('POSTGRES_PORT', 5432),
      database: getEnvString('POSTGRES_DB', 'regulatory_reconciler'),
      user: getEnvString('POSTGRES_USER', 'postgres'),
      password: getEnvString('POSTGRES_PASSWORD', 'postgres'),
    },
    pipeline: {
      chunkSize: getEnvNumber('CHUNK_SIZE', 2048),
      chunkOverlap: getEnvNumber('CHUNK_OVERLAP', 200),
      similarityTopK: getEnvNumber('SIMILARITY_TOP_K', 5),
      qaTopK: getEnvNumber('QA_TOP_K', 6),
      outputDir: getEnvString('OUTPUT_DIR', './output'),
    },
    comparison: {
      concurrency: getEnvNumber('COMPARISON_CONCURRENCY', 2),
      maxRetries: getEnvNumber('COMPARISON_MAX_RETRIES', 3),
      retryBaseDelayMs: getEnvNumber('COMPARISON_RETRY_BASE_DELAY_MS', 250),
    },
    logLevel: getEnvString('LOG_LEVEL', 'info'),
  };

  return ConfigSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}

import OpenAI from 'openai';
import { Config, EmbeddingResult, LLMError } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import {
  ASSISTANT_SYSTEM_PROMPT,
  AnswerContext,
  ChatTurn,
  OCR_PROMPT,
  REPHRASE_SYSTEM_PROMPT,
  formatContexts,
  generateRephrasePrompt,
  generateUserPrompt,
} from '../prompts/regulatory-assistant.js';

const logger = createChildLogger('llm');

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
  stopSequences?: string[];
}

/**
 * Client for any OpenAI-compatible endpoint: chat, embeddings and page OCR
 */
export class LLMClient {
  private client: OpenAI;
  private config: Config['llm'];

  constructor(config: Config['llm']) {
    this.config = config;
    this.client = new OpenAI({
      baseURL: config.baseUrl,
      apiKey: config.apiKey,
    });
  }

  /**
   * Generate embeddings for text
   */
  async embed(text: string): Promise<EmbeddingResult> {
    try {
      logger.debug({ textLength: text.length }, 'Generating embedding');

      const response = await this.client.embeddings.create({
        model: this.config.embeddingModel,
        input: text,
        encoding_format: 'float',
      });

      const first = response.data[0];
      if (!first) {
        throw new LLMError('Empty embedding response');
      }

      return {
        embedding: first.embedding,
        model: this.config.embeddingModel,
        tokenCount: response.usage?.total_tokens,
      };
    } catch (error) {
      if (error instanceof LLMError) throw error;
      logger.error({ error }, 'Failed to generate embedding');
      throw new LLMError('Failed to generate embedding', error);
    }
  }

  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) {
      return [];
    }

    try {
      logger.debug({ count: texts.length }, 'Generating batch embeddings');

      const response = await this.client.embeddings.create({
        model: this.config.embeddingModel,
        input: texts,
        encoding_format: 'float',
      });

      if (response.data.length !== texts.length) {
        throw new LLMError(
          `Embedding count mismatch: expected ${texts.length}, got ${response.data.length}`
        );
      }

      logger.debug(
        { dimensions: response.data[0]?.embedding.length, count: response.data.length },
        'Batch embeddings generated'
      );

      return response.data.map((item) => ({
        embedding: item.embedding,
        model: this.config.embeddingModel,
      }));
    } catch (error) {
      if (error instanceof LLMError) throw error;
      logger.error({ error }, 'Failed to generate batch embeddings');
      throw new LLMError('Failed to generate batch embeddings', error);
    }
  }

  /**
   * Chat completion with the configured model
   */
  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<string> {
    try {
      logger.debug({ messageCount: messages.length }, 'Sending chat completion request');

      const response = await this.client.chat.completions.create({
        model: this.config.llmModel,
        messages,
        temperature: options?.temperature ?? 0,
        max_tokens: options?.maxTokens ?? 2048,
        stop: options?.stopSequences,
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new LLMError('Empty response from LLM');
      }

      logger.debug({ responseLength: content.length }, 'Chat completion successful');

      return content;
    } catch (error) {
      if (error instanceof LLMError) throw error;
      logger.error({ error }, 'Failed to complete chat');
      throw new LLMError('Failed to complete chat', error);
    }
  }

  /**
   * Single-prompt completion, trimmed
   */
  async complete(prompt: string, options?: ChatOptions): Promise<string> {
    const response = await this.chat([{ role: 'user', content: prompt }], options);
    return response.trim();
  }

  /**
   * OCR: convert a rendered page image to markdown using the vision model
   */
  async ocrToMarkdown(imageBase64: string, mimeType: string = 'image/png'): Promise<string> {
    try {
      logger.debug('Processing OCR request');

      const response = await this.client.chat.completions.create({
        model: this.config.ocrModel,
        messages: [
          {
            role: 'user',
            content: [
              {
                type: 'image_url',
                image_url: { url: `data:${mimeType};base64,${imageBase64}` },
              },
              { type: 'text', text: OCR_PROMPT },
            ],
          },
        ],
        max_tokens: 4096,
        temperature: 0,
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new LLMError('Empty OCR response');
      }

      logger.debug({ responseLength: content.length }, 'OCR successful');

      return content;
    } catch (error) {
      if (error instanceof LLMError) throw error;
      logger.error({ error }, 'Failed to perform OCR');
      throw new LLMError('Failed to perform OCR', error);
    }
  }

  /**
   * Rewrite a follow-up question so it stands on its own. Only the last two
   * turns are considered; if the model does not return a question, the
   * original is kept.
   */
  async rephraseQuestion(query: string, history: ChatTurn[]): Promise<string> {
    if (history.length === 0) {
      return query;
    }

    for (const window of [history.slice(-2), history.slice(-1)]) {
      const rephrased = await this.chat(
        [
          { role: 'system', content: REPHRASE_SYSTEM_PROMPT },
          { role: 'user', content: generateRephrasePrompt(query, window) },
        ],
        { temperature: 0, maxTokens: 256 }
      );

      if (rephrased.includes('?')) {
        return rephrased.trim();
      }
    }

    logger.debug({ query }, 'Rephrase did not yield a question, keeping original');
    return query;
  }

  /**
   * Generate answer with citations
   */
  async generateAnswer(
    query: string,
    contexts: AnswerContext[]
  ): Promise<{ answer: string; citedIndices: number[] }> {
    try {
      logger.debug({ query, contextCount: contexts.length }, 'Generating answer with citations');

      const response = await this.chat(
        [
          { role: 'system', content: ASSISTANT_SYSTEM_PROMPT },
          { role: 'user', content: generateUserPrompt(query, formatContexts(contexts)) },
        ],
        { temperature: 0.1, maxTokens: 1024 }
      );

      const citationMatches = response.match(/\[(\d+)\]/g) ?? [];
      const citedIndices = [
        ...new Set(citationMatches.map((m) => parseInt(m.slice(1, -1), 10))),
      ].filter((n) => n >= 1 && n <= contexts.length);

      logger.debug({ citedIndices, answerLength: response.length }, 'Answer generated');

      return { answer: response, citedIndices };
    } catch (error) {
      if (error instanceof LLMError) throw error;
      logger.error({ error }, 'Failed to generate answer');
      throw new LLMError('Failed to generate answer', error);
    }
  }

  /**
   * Health check - verify the endpoint is responding
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.client.models.list();
      return response.data.length > 0;
    } catch (error) {
      logger.error({ error }, 'LLM health check failed');
      return false;
    }
  }
}

// Singleton instance
let clientInstance: LLMClient | null = null;

export function getLLMClient(config: Config['llm']): LLMClient {
  if (!clientInstance) {
    clientInstance = new LLMClient(config);
  }
  return clientInstance;
}

export function resetLLMClient(): void {
  clientInstance = null;
}

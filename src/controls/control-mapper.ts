import pLimit from 'p-limit';
import { z } from 'zod';
import { Config, ControlDefinition, ControlMapping, SearchResult } from '../types/index.js';
import { LLMClient } from '../clients/llm.js';
import { QdrantStore } from '../clients/qdrant.js';
import { createChildLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { stripControlCharacters } from '../utils/text-sanitizer.js';
import { controlAssessmentPrompt } from '../prompts/control-mapping.js';
import { SheetInput, readControlWorkbook, writeWorkbook } from '../ingestion/structure-table.js';

const logger = createChildLogger('control-mapper');

const JSON_OPEN_TAG = '<json>';
const JSON_CLOSE_TAG = '</json>';

const AssessmentSchema = z.record(z.unknown());

export type AssessmentResult =
  | { assessment: Record<string, unknown> }
  | { error: string };

/**
 * Pull the JSON object out of a `<json>…</json>` reply. Failures are
 * returned as an error string, never thrown.
 */
export function parseJsonAssessment(reply: string): AssessmentResult {
  const start = reply.indexOf(JSON_OPEN_TAG);
  const end = start === -1 ? -1 : reply.indexOf(JSON_CLOSE_TAG, start);
  if (start === -1 || end === -1) {
    return { error: 'Parsing error: JSON tags not found in model response' };
  }

  const body = stripControlCharacters(reply.slice(start + JSON_OPEN_TAG.length, end).trim());

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    return { error: `Parsing error: ${error instanceof Error ? error.message : String(error)}` };
  }

  const result = AssessmentSchema.safeParse(parsed);
  return result.success ? { assessment: result.data } : { error: 'Unexpected response format' };
}

export function controlQuery(control: ControlDefinition): string {
  return `Control Activity : ${control.activity}`;
}

export interface ControlMapperDeps {
  llm: Pick<LLMClient, 'embed' | 'complete'>;
  qdrant: Pick<QdrantStore, 'search'>;
  sleep?: (ms: number) => Promise<void>;
}

export interface ControlMapperConfig {
  topK: number;
  comparison: Config['comparison'];
}

/**
 * Maps control activities onto the nearest article chunks of a document and
 * asks the model how well each chunk is covered by the control
 */
export class ControlMapper {
  private config: ControlMapperConfig;
  private deps: ControlMapperDeps;
  private limit: ReturnType<typeof pLimit>;

  constructor(config: ControlMapperConfig, deps: ControlMapperDeps) {
    this.config = config;
    this.deps = deps;
    this.limit = pLimit(config.comparison.concurrency);
  }

  private retry<T>(fn: () => Promise<T>, operation: string): Promise<T> {
    return withRetry(fn, {
      maxRetries: this.config.comparison.maxRetries,
      baseDelayMs: this.config.comparison.retryBaseDelayMs,
      operation,
      sleep: this.deps.sleep,
    });
  }

  private async assess(
    control: ControlDefinition,
    documentId: string,
    query: string,
    hit: SearchResult
  ): Promise<ControlMapping> {
    const reply = await this.limit(() =>
      this.retry(
        () => this.deps.llm.complete(controlAssessmentPrompt(query, hit.content)),
        'control-assessment'
      )
    );
    const result = parseJsonAssessment(reply);

    if ('error' in result) {
      logger.warn({ l2Id: control.l2Id, chunkId: hit.chunkId, error: result.error }, 'Assessment unreadable');
    }

    return {
      control,
      documentId,
      theme: hit.metadata.theme,
      articleTitle: hit.metadata.articleTitle,
      subTheme: hit.metadata.subTheme,
      matchedContent: hit.content,
      score: hit.score,
      ...result,
    };
  }

  /**
   * Map controls (optionally only those whose L2 id is in `l2Filter`) onto a
   * document. Rows come back in control order, then hit order.
   */
  async mapControls(
    documentId: string,
    controls: readonly ControlDefinition[],
    l2Filter?: readonly string[]
  ): Promise<ControlMapping[]> {
    const selected = l2Filter ? controls.filter((c) => l2Filter.includes(c.l2Id)) : [...controls];

    logger.info(
      { documentId, controls: controls.length, selected: selected.length },
      'Mapping controls'
    );

    const perControl = await Promise.all(
      selected.map(async (control) => {
        const query = controlQuery(control);
        const { embedding } = await this.limit(() =>
          this.retry(() => this.deps.llm.embed(query), 'control-embedding')
        );
        const hits = await this.deps.qdrant.search(embedding, this.config.topK, { documentId });

        return Promise.all(hits.map((hit) => this.assess(control, documentId, query, hit)));
      })
    );

    const mappings = perControl.flat();
    logger.info(
      { documentId, mappings: mappings.length, errors: mappings.filter((m) => m.error).length },
      'Control mapping complete'
    );

    return mappings;
  }

  async mapControlsFromWorkbook(
    documentId: string,
    workbook: Buffer,
    options: { sheetName?: string; l2Filter?: readonly string[] } = {}
  ): Promise<ControlMapping[]> {
    const controls = readControlWorkbook(workbook, options.sheetName);
    return this.mapControls(documentId, controls, options.l2Filter);
  }
}

// ============================================================
// Export
// ============================================================

export function controlMappingRows(mappings: readonly ControlMapping[]): Array<Record<string, unknown>> {
  return mappings.map((m) => ({
    'L1 Control ID': m.control.l1Id,
    'L1 Control Title': m.control.l1Title,
    'L2 Control ID': m.control.l2Id,
    'L2 Control Title': m.control.l2Title,
    Theme: m.theme ?? '',
    Article: m.articleTitle ?? '',
    'Sub-Theme': m.subTheme ?? '',
    Score: m.score,
    ...m.assessment,
    ...(m.error ? { error: m.error } : {}),
  }));
}

export function writeControlMappingWorkbook(mappings: readonly ControlMapping[]): Buffer {
  const sheet: SheetInput = { name: 'control_mapping', rows: controlMappingRows(mappings) };
  return writeWorkbook([sheet]);
}

export function createControlMapper(
  config: ControlMapperConfig,
  deps: ControlMapperDeps
): ControlMapper {
  return new ControlMapper(config, deps);
}

import pLimit from 'p-limit';
import { v4 as uuid } from 'uuid';
import {
  CanonicalArticle,
  ComparisonReport,
  Config,
  NO_MATCH,
  NotFoundError,
  PipelineError,
  ThemeComparisonUnit,
  ThemeSummary,
} from '../types/index.js';
import { LLMClient } from '../clients/llm.js';
import { PostgresStore } from '../clients/postgres.js';
import { createChildLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import {
  documentSummaryPrompt,
  identifySubThemePrompt,
  subThemeAnalysisPrompt,
  themeSummaryPrompt,
} from '../prompts/comparison.js';

const logger = createChildLogger('comparator');

export const NO_THEME_MATCHES_SUMMARY =
  'No sub-theme of the new document matched a sub-theme of the old document.';

// ============================================================
// Theme grouping
// ============================================================

export interface ThemeGroup {
  theme: string;
  newSubThemes: string[];
  oldSubThemes: string[];
}

export function normalizeTheme(theme: string): string {
  return theme.replace(/\./g, '').trim().toLowerCase();
}

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/**
 * One group per normalised new theme, in order of first appearance. Old
 * sub-themes are taken from every old article whose normalised theme
 * contains the new theme.
 */
export function groupThemes(
  oldArticles: readonly CanonicalArticle[],
  newArticles: readonly CanonicalArticle[]
): ThemeGroup[] {
  const themes = unique(newArticles.map((a) => normalizeTheme(a.theme)));

  return themes.map((theme) => ({
    theme,
    newSubThemes: unique(
      newArticles.filter((a) => normalizeTheme(a.theme) === theme).map((a) => a.subTheme)
    ),
    oldSubThemes: unique(
      oldArticles.filter((a) => normalizeTheme(a.theme).includes(theme)).map((a) => a.subTheme)
    ),
  }));
}

/**
 * Map a model reply onto one of the candidates, ignoring case and quotes.
 * Anything else is no match.
 */
export function resolveSubThemeMatch(
  reply: string,
  candidates: readonly string[]
): string | typeof NO_MATCH {
  const answer = reply.trim().replace(/^['"`]+|['"`.]+$/g, '').trim().toLowerCase();
  return candidates.find((c) => c.trim().toLowerCase() === answer) ?? NO_MATCH;
}

function contentFor(
  articles: readonly CanonicalArticle[],
  matchesTheme: (normalized: string) => boolean,
  subTheme: string
): string {
  return articles
    .filter((a) => matchesTheme(normalizeTheme(a.theme)) && a.subTheme === subTheme)
    .map((a) => a.content)
    .join(' ');
}

// ============================================================
// Comparator
// ============================================================

export interface ComparatorDeps {
  llm: Pick<LLMClient, 'complete'>;
  postgres?: Pick<PostgresStore, 'getDocumentById' | 'listArticles' | 'saveComparisonRun'>;
  sleep?: (ms: number) => Promise<void>;
}

export interface CompareOptions {
  oldDocumentId?: string;
  newDocumentId?: string;
}

/**
 * Reconciles two canonical tables theme by theme and asks the model for
 * sub-theme, theme and document level change analyses
 */
export class ThemeComparator {
  private config: Config['comparison'];
  private deps: ComparatorDeps;
  private limit: ReturnType<typeof pLimit>;

  constructor(config: Config['comparison'], deps: ComparatorDeps) {
    this.config = config;
    this.deps = deps;
    this.limit = pLimit(config.concurrency);
  }

  /**
   * Model call through the shared pool, retried on retryable failures
   */
  private ask(prompt: string, operation: string): Promise<string> {
    return this.limit(() =>
      withRetry(() => this.deps.llm.complete(prompt), {
        maxRetries: this.config.maxRetries,
        baseDelayMs: this.config.retryBaseDelayMs,
        operation,
        sleep: this.deps.sleep,
      })
    );
  }

  /**
   * Pair every new sub-theme with its closest old sub-theme
   */
  async matchSubThemes(
    oldArticles: readonly CanonicalArticle[],
    newArticles: readonly CanonicalArticle[]
  ): Promise<ThemeComparisonUnit[]> {
    const groups = groupThemes(oldArticles, newArticles);

    const tasks = groups.flatMap((group) =>
      group.newSubThemes.map(async (subTheme): Promise<ThemeComparisonUnit> => {
        const newSubTheme = subTheme.toLowerCase();
        const oldSubTheme =
          group.oldSubThemes.length === 0
            ? NO_MATCH
            : resolveSubThemeMatch(
                await this.ask(
                  identifySubThemePrompt(newSubTheme, group.oldSubThemes),
                  'identify-sub-theme'
                ),
                group.oldSubThemes
              );

        const newContent = contentFor(newArticles, (t) => t === group.theme, subTheme);
        if (oldSubTheme === NO_MATCH) {
          return { theme: group.theme, newSubTheme, oldSubTheme, newContent };
        }

        return {
          theme: group.theme,
          newSubTheme,
          oldSubTheme,
          newContent,
          oldContent: contentFor(oldArticles, (t) => t.includes(group.theme), oldSubTheme),
        };
      })
    );

    return Promise.all(tasks);
  }

  async compareArticles(
    oldArticles: readonly CanonicalArticle[],
    newArticles: readonly CanonicalArticle[],
    options: CompareOptions = {}
  ): Promise<ComparisonReport> {
    const runId = uuid();
    logger.info(
      { runId, oldArticles: oldArticles.length, newArticles: newArticles.length },
      'Starting comparison'
    );

    const units = await this.matchSubThemes(oldArticles, newArticles);
    const unmatched = units.filter((u) => u.oldSubTheme === NO_MATCH);

    const matched = await Promise.all(
      units
        .filter((u) => u.oldSubTheme !== NO_MATCH)
        .map(async (unit): Promise<ThemeComparisonUnit> => ({
          ...unit,
          analysis: await this.ask(
            subThemeAnalysisPrompt(unit.oldContent ?? '', unit.newContent),
            'sub-theme-analysis'
          ),
        }))
    );

    const themes = await this.summarizeThemes(matched);
    const documentSummary =
      themes.length === 0
        ? NO_THEME_MATCHES_SUMMARY
        : await this.ask(
            documentSummaryPrompt(themes.map((t) => ({ name: t.name, summary: t.summary }))),
            'document-summary'
          );

    const report: ComparisonReport = {
      runId,
      oldDocumentId: options.oldDocumentId,
      newDocumentId: options.newDocumentId,
      documentSummary,
      themes,
      matched,
      unmatched,
      createdAt: new Date(),
    };

    logger.info(
      { runId, matched: matched.length, unmatched: unmatched.length, themes: themes.length },
      'Comparison complete'
    );

    return report;
  }

  private async summarizeThemes(matched: readonly ThemeComparisonUnit[]): Promise<ThemeSummary[]> {
    const themeNames = unique(matched.map((u) => u.theme));

    return Promise.all(
      themeNames.map(async (name): Promise<ThemeSummary> => {
        const subThemes = matched
          .filter((u) => u.theme === name)
          .map((u) => ({ name: u.newSubTheme, summary: u.analysis ?? '' }));

        const summary = await this.ask(
          themeSummaryPrompt(
            name,
            subThemes.map((s) => ({ subTheme: s.name, analysis: s.summary }))
          ),
          'theme-summary'
        );

        return { name, summary, subThemes };
      })
    );
  }

  /**
   * Compare two ingested documents and store the run
   */
  async compareDocuments(oldDocumentId: string, newDocumentId: string): Promise<ComparisonReport> {
    const postgres = this.deps.postgres;
    if (!postgres) {
      throw new PipelineError('Comparing stored documents needs a Postgres store', 'CONFIG_ERROR');
    }

    for (const id of [oldDocumentId, newDocumentId]) {
      if (!(await postgres.getDocumentById(id))) {
        throw new NotFoundError(`Document ${id} not found`);
      }
    }

    const [oldArticles, newArticles] = await Promise.all([
      postgres.listArticles(oldDocumentId),
      postgres.listArticles(newDocumentId),
    ]);

    const report = await this.compareArticles(oldArticles, newArticles, {
      oldDocumentId,
      newDocumentId,
    });
    await postgres.saveComparisonRun(report);

    return report;
  }
}

export function createThemeComparator(
  config: Config['comparison'],
  deps: ComparatorDeps
): ThemeComparator {
  return new ThemeComparator(config, deps);
}

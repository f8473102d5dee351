/**
 * Tabular forms of the structured and canonical article tables, and their
 * workbook encoding.
 *
 * The canonical table keeps the column labels downstream consumers already
 * read: the `Title` column holds the theme and the `Theme` column holds the
 * article title. CANONICAL_COLUMN_MAP is the single place that mapping lives.
 */

import * as XLSX from 'xlsx';
import { z } from 'zod';
import {
  CanonicalArticle,
  ControlDefinition,
  StructuredRecord,
  ValidationError,
} from '../types/index.js';

export const STRUCTURED_COLUMNS = [
  'Chapter',
  'Chapter Name',
  'Article',
  'Article Name',
  'Content',
] as const;

export const CANONICAL_COLUMN_MAP = {
  Title: 'theme',
  Theme: 'articleTitle',
  'Sub-Theme': 'subTheme',
  Content: 'content',
} as const satisfies Record<string, keyof CanonicalArticle>;

export const CANONICAL_COLUMNS = [
  'Title',
  'Theme',
  'Sub-Theme',
  'Content',
] as const satisfies ReadonlyArray<keyof typeof CANONICAL_COLUMN_MAP>;

export const CONTROL_COLUMNS = [
  'L1 Control ID',
  'L1 Control Title',
  'L2 Control ID',
  'L2 Control Title',
  'L2 Control Activity',
] as const;

export type StructuredRow = Record<(typeof STRUCTURED_COLUMNS)[number], string | null>;
export type CanonicalRow = Record<keyof typeof CANONICAL_COLUMN_MAP, string>;

// Spreadsheet cells come back as strings, numbers or nothing
const cell = z
  .union([z.string(), z.number(), z.boolean(), z.null(), z.undefined()])
  .transform((value) => {
    if (value === null || value === undefined) return null;
    const text = String(value).trim();
    return text === '' ? null : text;
  });

const requiredCell = cell.pipe(z.string());

const StructuredRowSchema = z.object({
  Chapter: cell,
  'Chapter Name': cell,
  Article: cell,
  'Article Name': cell,
  Content: cell,
});

const CanonicalRowSchema = z.object({
  Title: cell,
  Theme: cell,
  'Sub-Theme': cell,
  Content: cell,
});

const ControlRowSchema = z.object({
  'L1 Control ID': requiredCell,
  'L1 Control Title': cell,
  'L2 Control ID': requiredCell,
  'L2 Control Title': cell,
  'L2 Control Activity': requiredCell,
});

// ============================================================
// Record <-> row conversion
// ============================================================

export function recordsToRows(records: readonly StructuredRecord[]): StructuredRow[] {
  return records.map((record) => ({
    Chapter: record.chapterId,
    'Chapter Name': record.chapterName,
    Article: record.articleId,
    'Article Name': record.articleName,
    Content: record.content,
  }));
}

export function articlesToRows(articles: readonly CanonicalArticle[]): CanonicalRow[] {
  return articles.map((article) => ({
    Title: article.theme,
    Theme: article.articleTitle,
    'Sub-Theme': article.subTheme,
    Content: article.content,
  }));
}

/**
 * Re-express canonical articles in the five-column structured schema, so
 * merged output can be fed back through the merger
 */
export function canonicalToStructured(
  articles: readonly CanonicalArticle[]
): StructuredRecord[] {
  return articles.map((article) => ({
    chapterId: null,
    chapterName: article.theme,
    articleId: article.articleTitle,
    articleName: article.subTheme,
    content: article.content,
  }));
}

function parseRows<T extends z.ZodTypeAny>(
  rows: readonly unknown[],
  schema: T,
  tableName: string
): Array<z.output<T>> {
  return rows.map((row, index) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      throw new ValidationError(
        `Invalid ${tableName} row ${index + 2}: ${result.error.issues
          .map((issue) => `${issue.path.join('.')} ${issue.message}`)
          .join('; ')}`,
        result.error.issues
      );
    }
    return result.data;
  });
}

export function rowsToRecords(rows: readonly unknown[]): StructuredRecord[] {
  return parseRows(rows, StructuredRowSchema, 'structured table').map((row) => ({
    chapterId: row.Chapter,
    chapterName: row['Chapter Name'],
    articleId: row.Article,
    articleName: row['Article Name'],
    content: row.Content ?? '',
  }));
}

export function rowsToArticles(rows: readonly unknown[]): CanonicalArticle[] {
  return parseRows(rows, CanonicalRowSchema, 'canonical table').map((row) => ({
    theme: row.Title ?? '',
    articleTitle: row.Theme ?? '',
    subTheme: row['Sub-Theme'] ?? '',
    content: row.Content ?? '',
  }));
}

export function rowsToControls(rows: readonly unknown[]): ControlDefinition[] {
  return parseRows(rows, ControlRowSchema, 'control table').map((row) => ({
    l1Id: row['L1 Control ID'],
    l1Title: row['L1 Control Title'] ?? '',
    l2Id: row['L2 Control ID'],
    l2Title: row['L2 Control Title'] ?? '',
    activity: row['L2 Control Activity'],
  }));
}

// ============================================================
// Workbook encoding
// ============================================================

export interface SheetInput {
  name: string;
  rows: ReadonlyArray<Record<string, unknown>>;
  columns?: readonly string[];
}

/**
 * Write one or more sheets to an xlsx buffer
 */
export function writeWorkbook(sheets: readonly SheetInput[]): Buffer {
  const workbook = XLSX.utils.book_new();

  for (const sheet of sheets) {
    const worksheet = XLSX.utils.json_to_sheet([...sheet.rows], {
      header: sheet.columns ? [...sheet.columns] : undefined,
    });
    XLSX.utils.book_append_sheet(workbook, worksheet, sheet.name);
  }

  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return buffer;
}

/**
 * Read the rows of one sheet (the first by default) as column-keyed objects
 */
export function readWorkbookRows(buffer: Buffer, sheetName?: string): unknown[] {
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const name = sheetName ?? workbook.SheetNames[0];
  const worksheet = name === undefined ? undefined : workbook.Sheets[name];

  if (!worksheet) {
    throw new ValidationError(`Workbook has no sheet named ${sheetName ?? '(first)'}`);
  }

  return XLSX.utils.sheet_to_json(worksheet, { defval: null, raw: true });
}

export function writeStructuredWorkbook(records: readonly StructuredRecord[]): Buffer {
  return writeWorkbook([
    { name: 'structure', rows: recordsToRows(records), columns: STRUCTURED_COLUMNS },
  ]);
}

export function writeCanonicalWorkbook(articles: readonly CanonicalArticle[]): Buffer {
  return writeWorkbook([
    { name: 'articles', rows: articlesToRows(articles), columns: CANONICAL_COLUMNS },
  ]);
}

export function readStructuredWorkbook(buffer: Buffer): StructuredRecord[] {
  return rowsToRecords(readWorkbookRows(buffer));
}

export function readCanonicalWorkbook(buffer: Buffer): CanonicalArticle[] {
  return rowsToArticles(readWorkbookRows(buffer));
}

export function readControlWorkbook(buffer: Buffer, sheetName?: string): ControlDefinition[] {
  return rowsToControls(readWorkbookRows(buffer, sheetName));
}

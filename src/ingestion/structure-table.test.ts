import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import {
  articlesToRows,
  readCanonicalWorkbook,
  readControlWorkbook,
  readStructuredWorkbook,
  readWorkbookRows,
  rowsToArticles,
  rowsToRecords,
  writeCanonicalWorkbook,
  writeStructuredWorkbook,
  writeWorkbook,
} from './structure-table.js';
import { CanonicalArticle, StructuredRecord, ValidationError } from '../types/index.js';

function workbookFromRows(rows: Array<Record<string, unknown>>, name = 'Sheet1'): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(rows), name);
  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return buffer;
}

describe('structured table', () => {
  const records: StructuredRecord[] = [
    {
      chapterId: 'CHAPTER I',
      chapterName: 'General provisions',
      articleId: 'Article 1',
      articleName: 'Subject matter',
      content: 'This Regulation lays down requirements.',
    },
    {
      chapterId: 'CHAPTER I',
      chapterName: 'General provisions',
      articleId: 'Article 2',
      articleName: null,
      content: 'It applies to financial entities.',
    },
  ];

  it('should write and read back the five columns', () => {
    const buffer = writeStructuredWorkbook(records);

    expect(readStructuredWorkbook(buffer)).toEqual(records);
  });

  it('should coerce numeric cells and blank cells', () => {
    const parsed = rowsToRecords([
      {
        Chapter: 'CHAPTER II',
        'Chapter Name': '',
        Article: 7,
        'Article Name': '  Reporting  ',
        Content: null,
      },
    ]);

    expect(parsed).toEqual([
      {
        chapterId: 'CHAPTER II',
        chapterName: null,
        articleId: '7',
        articleName: 'Reporting',
        content: '',
      },
    ]);
  });
});

describe('canonical table', () => {
  const articles: CanonicalArticle[] = [
    {
      theme: 'Amendments',
      articleTitle: 'Article 59',
      subTheme: 'Amendments to Regulation (EU) No 1093/2010',
      content: 'Article 16 is amended.',
    },
  ];

  it('should store the theme under Title and the article title under Theme', () => {
    expect(articlesToRows(articles)).toEqual([
      {
        Title: 'Amendments',
        Theme: 'Article 59',
        'Sub-Theme': 'Amendments to Regulation (EU) No 1093/2010',
        Content: 'Article 16 is amended.',
      },
    ]);
  });

  it('should round-trip through a workbook with the canonical header order', () => {
    const buffer = writeCanonicalWorkbook(articles);
    const workbook = XLSX.read(buffer, { type: 'buffer' });
    const header = XLSX.utils.sheet_to_json(workbook.Sheets['articles'], { header: 1 })[0];

    expect(header).toEqual(['Title', 'Theme', 'Sub-Theme', 'Content']);
    expect(readCanonicalWorkbook(buffer)).toEqual(articles);
  });

  it('should default missing cells to empty strings', () => {
    expect(rowsToArticles([{ Title: null, Theme: 'Article 1', 'Sub-Theme': null, Content: 'x' }])).toEqual([
      { theme: '', articleTitle: 'Article 1', subTheme: '', content: 'x' },
    ]);
  });
});

describe('control table', () => {
  it('should read control definitions from the named sheet', () => {
    const buffer = workbookFromRows(
      [
        {
          'L1 Control ID': 'L1-01',
          'L1 Control Title': 'ICT governance',
          'L2 Control ID': 'L2-01',
          'L2 Control Title': 'Board oversight',
          'L2 Control Activity': 'The board approves the ICT risk framework annually.',
        },
      ],
      'Controls'
    );

    expect(readControlWorkbook(buffer, 'Controls')).toEqual([
      {
        l1Id: 'L1-01',
        l1Title: 'ICT governance',
        l2Id: 'L2-01',
        l2Title: 'Board oversight',
        activity: 'The board approves the ICT risk framework annually.',
      },
    ]);
  });

  it('should reject a control row without an activity', () => {
    const buffer = workbookFromRows([
      {
        'L1 Control ID': 'L1-01',
        'L1 Control Title': 'ICT governance',
        'L2 Control ID': 'L2-02',
        'L2 Control Title': 'Testing',
        'L2 Control Activity': '',
      },
    ]);

    expect(() => readControlWorkbook(buffer)).toThrow(ValidationError);
    expect(() => readControlWorkbook(buffer)).toThrow(/Invalid control table row 2/);
  });
});

describe('workbook sheets', () => {
  it('should write several sheets and read each by name', () => {
    const buffer = writeWorkbook([
      { name: 'first', rows: [{ a: 1 }] },
      { name: 'second', rows: [{ b: 'two' }] },
    ]);

    expect(readWorkbookRows(buffer, 'second')).toEqual([{ b: 'two' }]);
    expect(readWorkbookRows(buffer)).toEqual([{ a: 1 }]);
  });

  it('should fail on an unknown sheet', () => {
    const buffer = writeWorkbook([{ name: 'only', rows: [{ a: 1 }] }]);

    expect(() => readWorkbookRows(buffer, 'missing')).toThrow(ValidationError);
  });
});

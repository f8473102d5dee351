import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { comparisonSheets, writeComparisonWorkbook } from './export.js';
import { ComparisonReport } from '../types/index.js';
import { readWorkbookRows } from '../ingestion/structure-table.js';

const report: ComparisonReport = {
  runId: 'run-1',
  oldDocumentId: 'doc-old',
  documentSummary: 'Overall summary',
  themes: [
    { name: 'governance', summary: 'Theme summary', subThemes: [{ name: 'board', summary: 'A' }] },
  ],
  matched: [
    {
      theme: 'governance',
      newSubTheme: 'board',
      oldSubTheme: 'Board',
      newContent: 'New',
      oldContent: 'Old',
      analysis: 'A',
    },
  ],
  unmatched: [{ theme: 'governance', newSubTheme: 'audit', oldSubTheme: 'None', newContent: 'Audit' }],
  createdAt: new Date('2025-01-17T00:00:00Z'),
};

describe('comparisonSheets', () => {
  it('should list matched then unmatched sub-themes', () => {
    const [subThemes] = comparisonSheets(report);

    expect(subThemes.rows).toEqual([
      {
        Theme: 'governance',
        'Sub-Theme': 'board',
        'Old Sub-Theme': 'Board',
        'New Content': 'New',
        'Old Content': 'Old',
        Analysis: 'A',
      },
      {
        Theme: 'governance',
        'Sub-Theme': 'audit',
        'Old Sub-Theme': 'None',
        'New Content': 'Audit',
        'Old Content': '',
        Analysis: 'No matching sub-theme in the old document',
      },
    ]);
  });
});

describe('writeComparisonWorkbook', () => {
  it('should write the three report sheets', () => {
    const buffer = writeComparisonWorkbook(report);

    expect(XLSX.read(buffer, { type: 'buffer' }).SheetNames).toEqual([
      'sub_theme_level',
      'theme_level',
      'document_level',
    ]);
    expect(readWorkbookRows(buffer, 'theme_level')).toEqual([
      { Theme: 'governance', Summary: 'Theme summary' },
    ]);
    const documentRows = readWorkbookRows(buffer, 'document_level');
    expect(documentRows).toHaveLength(1);
    expect(documentRows[0]).toMatchObject({
      Run: 'run-1',
      'Old Document': 'doc-old',
      Summary: 'Overall summary',
    });
  });
});

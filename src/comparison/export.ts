import { ComparisonReport, NO_MATCH } from '../types/index.js';
import { SheetInput, writeWorkbook } from '../ingestion/structure-table.js';

export const SUB_THEME_COLUMNS = [
  'Theme',
  'Sub-Theme',
  'Old Sub-Theme',
  'New Content',
  'Old Content',
  'Analysis',
] as const;

export const THEME_COLUMNS = ['Theme', 'Summary'] as const;

export const DOCUMENT_COLUMNS = ['Run', 'Old Document', 'New Document', 'Summary'] as const;

/**
 * Sheets for a comparison report: matched and unmatched sub-themes, theme
 * summaries and the document summary
 */
export function comparisonSheets(report: ComparisonReport): SheetInput[] {
  const units = [...report.matched, ...report.unmatched];

  return [
    {
      name: 'sub_theme_level',
      columns: SUB_THEME_COLUMNS,
      rows: units.map((unit) => ({
        Theme: unit.theme,
        'Sub-Theme': unit.newSubTheme,
        'Old Sub-Theme': unit.oldSubTheme,
        'New Content': unit.newContent,
        'Old Content': unit.oldContent ?? '',
        Analysis:
          unit.oldSubTheme === NO_MATCH ? 'No matching sub-theme in the old document' : unit.analysis ?? '',
      })),
    },
    {
      name: 'theme_level',
      columns: THEME_COLUMNS,
      rows: report.themes.map((theme) => ({ Theme: theme.name, Summary: theme.summary })),
    },
    {
      name: 'document_level',
      columns: DOCUMENT_COLUMNS,
      rows: [
        {
          Run: report.runId,
          'Old Document': report.oldDocumentId ?? '',
          'New Document': report.newDocumentId ?? '',
          Summary: report.documentSummary,
        },
      ],
    },
  ];
}

export function writeComparisonWorkbook(report: ComparisonReport): Buffer {
  return writeWorkbook(comparisonSheets(report));
}

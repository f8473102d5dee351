#!/usr/bin/env node

import { readFile, writeFile, mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import { Command } from 'commander';
import { ComparisonReport, NotFoundError } from '../types/index.js';
import { readCanonicalWorkbook } from '../ingestion/structure-table.js';
import { writeComparisonWorkbook } from '../comparison/export.js';
import {
  CliContext,
  CliOutput,
  consoleOutput,
  lazyContext,
  runProgram,
} from './shared.js';
import { isMainModule } from '../utils/entrypoint.js';

export function createCompareProgram(
  context: () => CliContext,
  output: CliOutput = consoleOutput
): Command {
  const program = new Command();

  const printReport = (report: ComparisonReport) => {
    output.log(`Run ID: ${report.runId}`);
    output.log(`  Matched Sub-Themes: ${report.matched.length}`);
    output.log(`  New Sub-Themes: ${report.unmatched.length}`);
    output.log(`  Themes Summarised: ${report.themes.length}`);
    output.log('\nDocument Summary:');
    output.log(report.documentSummary);
  };

  const saveWorkbook = async (report: ComparisonReport, target?: string) => {
    const path = target ?? join(context().config.pipeline.outputDir, `comparison_${report.runId}.xlsx`);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, writeComparisonWorkbook(report));
    output.log(`\nWorkbook written to ${path}`);
  };

  program
    .name('reg-compare')
    .description('Compare two versions of a regulation theme by theme')
    .version('1.0.0');

  program
    .command('run <oldDocumentId> <newDocumentId>')
    .description('Compare two ingested documents and store the run')
    .option('-o, --output <file>', 'Workbook path (defaults to OUTPUT_DIR/comparison_<runId>.xlsx)')
    .action(async (oldDocumentId: string, newDocumentId: string, options: { output?: string }) => {
      output.log(`Comparing ${oldDocumentId} -> ${newDocumentId}\n`);

      const report = await context().services.comparator.compareDocuments(
        oldDocumentId,
        newDocumentId
      );

      printReport(report);
      await saveWorkbook(report, options.output);
    });

  program
    .command('tables <oldWorkbook> <newWorkbook>')
    .description('Compare two canonical workbooks without the document store')
    .option('-o, --output <file>', 'Workbook path (defaults to OUTPUT_DIR/comparison_<runId>.xlsx)')
    .action(async (oldWorkbook: string, newWorkbook: string, options: { output?: string }) => {
      const oldArticles = readCanonicalWorkbook(await readFile(oldWorkbook));
      const newArticles = readCanonicalWorkbook(await readFile(newWorkbook));

      output.log(`Comparing ${oldArticles.length} old and ${newArticles.length} new articles\n`);

      const report = await context().services.comparator.compareArticles(oldArticles, newArticles);

      printReport(report);
      await saveWorkbook(report, options.output);
    });

  program
    .command('export <runId>')
    .description('Write a stored comparison run as a workbook')
    .option('-o, --output <file>', 'Workbook path (defaults to OUTPUT_DIR/comparison_<runId>.xlsx)')
    .action(async (runId: string, options: { output?: string }) => {
      const report = await context().services.postgres.getComparisonRun(runId);
      if (!report) {
        throw new NotFoundError(`Comparison run ${runId} not found`);
      }
      await saveWorkbook(report, options.output);
    });

  return program;
}

if (isMainModule(import.meta.url)) {
  await runProgram(createCompareProgram(lazyContext()));
}

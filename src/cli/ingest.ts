#!/usr/bin/env node

import { writeFile, mkdir } from 'fs/promises';
import { basename, extname, join } from 'path';
import { Command } from 'commander';
import { writeCanonicalWorkbook, writeStructuredWorkbook } from '../ingestion/structure-table.js';
import {
  CliContext,
  CliOutput,
  consoleOutput,
  lazyContext,
  runProgram,
} from './shared.js';
import { isMainModule } from '../utils/entrypoint.js';

export function createIngestProgram(
  context: () => CliContext,
  output: CliOutput = consoleOutput
): Command {
  const program = new Command();

  program
    .name('reg-ingest')
    .description('Structure and index regulatory PDF documents')
    .version('1.0.0');

  program
    .command('file <filepath>')
    .description('Ingest a single PDF file')
    .option('-t, --export-tables', 'Write the structured and canonical tables as workbooks', false)
    .action(async (filepath: string, options: { exportTables: boolean }) => {
      output.log(`Ingesting file: ${filepath}`);

      const { ingestion } = context().services;
      await ingestion.initialize();
      const result = await ingestion.ingestFile(filepath, { exportTables: options.exportTables });

      if (result.skipped) {
        output.log(`\nAlready ingested as ${result.document.id}, skipping.`);
        return;
      }

      output.log('\nIngestion complete:');
      output.log(`  Document ID: ${result.document.id}`);
      output.log(`  Filename: ${result.document.filename}`);
      output.log(`  Articles: ${result.articleCount}`);
      output.log(`  Chunks Created: ${result.chunkCount}`);
    });

  program
    .command('directory <dirpath>')
    .description('Ingest all PDF files in a directory')
    .option('-r, --recursive', 'Process subdirectories recursively', false)
    .option('-t, --export-tables', 'Write the structured and canonical tables as workbooks', false)
    .action(async (dirpath: string, options: { recursive: boolean; exportTables: boolean }) => {
      output.log(`Ingesting directory: ${dirpath}`);
      output.log(`  Recursive: ${options.recursive}`);

      const { ingestion } = context().services;
      await ingestion.initialize();
      const stats = await ingestion.ingestDirectory(dirpath, options);

      output.log('\nIngestion complete:');
      output.log(`  Documents Processed: ${stats.documentsProcessed}`);
      output.log(`  Documents Skipped: ${stats.documentsSkipped}`);
      output.log(`  Articles Created: ${stats.articlesCreated}`);
      output.log(`  Chunks Created: ${stats.chunksCreated}`);

      if (stats.errors.length > 0) {
        output.log('\nErrors:');
        stats.errors.forEach((err) => output.log(`  - ${err}`));
        process.exitCode = 1;
      }
    });

  program
    .command('structure <filepath>')
    .description('Extract the structured and canonical tables without indexing')
    .option('-o, --output <dir>', 'Directory for the workbooks (defaults to OUTPUT_DIR)')
    .action(async (filepath: string, options: { output?: string }) => {
      const { config, services } = context();
      const structured = await services.ingestion.structureFile(filepath);

      const outputDir = options.output ?? config.pipeline.outputDir;
      const stem = basename(filepath, extname(filepath));
      const structuredPath = join(outputDir, `${stem}_structured.xlsx`);
      const canonicalPath = join(outputDir, `${stem}_canonical.xlsx`);

      await mkdir(outputDir, { recursive: true });
      await writeFile(structuredPath, writeStructuredWorkbook(structured.records));
      await writeFile(canonicalPath, writeCanonicalWorkbook(structured.articles));

      output.log(`Lines read: ${structured.lines}`);
      output.log(`Structured records: ${structured.records.length} -> ${structuredPath}`);
      output.log(`Canonical articles: ${structured.articles.length} -> ${canonicalPath}`);
    });

  program
    .command('delete <documentId>')
    .description('Remove a document and its vectors')
    .action(async (documentId: string) => {
      await context().services.ingestion.deleteDocument(documentId);
      output.log(`Deleted document ${documentId}`);
    });

  program
    .command('stats')
    .description('Show ingestion statistics')
    .action(async () => {
      const stats = await context().services.ingestion.getStats();

      output.log('Ingestion Statistics:');
      output.log(`  Documents: ${stats.documents}`);
      output.log(`  Structured Records: ${stats.structuredRecords}`);
      output.log(`  Articles: ${stats.articles}`);
      output.log(`  Comparison Runs: ${stats.comparisonRuns}`);
      output.log(`  Vectors: ${stats.vectorCount}`);

      if (stats.documents === 0) {
        output.log('\nNo documents have been ingested yet.');
        output.log('Run "reg-ingest file <path>" or "reg-ingest directory <path>" to ingest documents.');
      }
    });

  return program;
}

if (isMainModule(import.meta.url)) {
  await runProgram(createIngestProgram(lazyContext()));
}

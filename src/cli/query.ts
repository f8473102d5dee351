#!/usr/bin/env node

import { readFile, writeFile, mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import { createInterface } from 'readline';
import { Command } from 'commander';
import { AnswerResponse } from '../types/index.js';
import { ChatTurn } from '../prompts/regulatory-assistant.js';
import { writeControlMappingWorkbook } from '../controls/control-mapper.js';
import { createChildLogger } from '../utils/logger.js';
import {
  CliContext,
  CliOutput,
  consoleOutput,
  lazyContext,
  runProgram,
} from './shared.js';
import { isMainModule } from '../utils/entrypoint.js';

const logger = createChildLogger('cli-query');

// Turns kept for rephrasing follow-up questions
const MAX_HISTORY_TURNS = 5;

interface FilterOptions {
  document?: string;
  theme?: string;
}

export function createQueryProgram(
  context: () => CliContext,
  output: CliOutput = consoleOutput,
  input: NodeJS.ReadableStream = process.stdin
): Command {
  const program = new Command();

  const printAnswer = (response: AnswerResponse) => {
    output.log(response.answer);

    if (response.citations.length > 0) {
      output.log('\nSources:');
      response.citations.forEach((citation, i) => {
        const location = [citation.articleTitle, citation.subTheme].filter(Boolean).join(' / ');
        output.log(`  [${i + 1}] ${citation.filename}${location ? `, ${location}` : ''}`);
        output.log(`      "${citation.excerpt}"`);
      });
    }
  };

  program
    .name('reg-query')
    .description('Ask questions about indexed regulations and map controls onto them')
    .version('1.0.0');

  program
    .command('ask <question>')
    .description('Ask a single question')
    .option('-d, --document <id>', 'Only search this document')
    .option('-t, --theme <theme>', 'Only search this theme')
    .action(async (question: string, options: FilterOptions) => {
      output.log(`\nQuery: ${question}\n`);

      const response = await context().services.answers.ask(question, {
        documentId: options.document,
        theme: options.theme,
      });

      output.log('Answer:');
      printAnswer(response);
      output.log(`\nQuery ID: ${response.queryId}`);
      output.log(`Latency: ${response.latencyMs}ms`);
    });

  program
    .command('interactive')
    .description('Start an interactive session that keeps recent questions as context')
    .option('-d, --document <id>', 'Only search this document')
    .option('-t, --theme <theme>', 'Only search this theme')
    .action(async (options: FilterOptions) => {
      const { answers } = context().services;
      let history: ChatTurn[] = [];

      output.log('Regulation Q&A Interactive Mode');
      output.log('Type your questions and press Enter. Type "exit" to quit.\n');

      const rl = createInterface({ input, terminal: false });

      for await (const line of rl) {
        const question = line.trim();
        if (question.toLowerCase() === 'exit') {
          break;
        }
        if (!question) {
          continue;
        }

        output.log(`You: ${question}`);
        try {
          const response = await answers.ask(question, {
            history,
            documentId: options.document,
            theme: options.theme,
          });

          output.log('\nAssistant:');
          printAnswer(response);
          output.log(`\n(${response.latencyMs}ms)\n`);

          // New array each turn: callers may hold on to the one they were given
          history = [...history, { question, answer: response.answer }].slice(-MAX_HISTORY_TURNS);
        } catch (error) {
          logger.warn({ error }, 'Interactive question failed');
          output.error(`Error: ${error instanceof Error ? error.message : 'Unknown error'}\n`);
        }
      }

      rl.close();
      output.log('Goodbye!');
    });

  program
    .command('controls <documentId> <workbook>')
    .description('Map a control catalogue onto an ingested document')
    .option('-s, --sheet <name>', 'Sheet holding the controls (defaults to the first)')
    .option('-f, --filter <l2Ids...>', 'Only map these L2 control ids')
    .option('-o, --output <file>', 'Workbook path (defaults to OUTPUT_DIR/control_mapping_<documentId>.xlsx)')
    .action(
      async (
        documentId: string,
        workbook: string,
        options: { sheet?: string; filter?: string[]; output?: string }
      ) => {
        const { config, services } = context();

        const mappings = await services.controlMapper.mapControlsFromWorkbook(
          documentId,
          await readFile(workbook),
          { sheetName: options.sheet, l2Filter: options.filter }
        );

        const target =
          options.output ?? join(config.pipeline.outputDir, `control_mapping_${documentId}.xlsx`);
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, writeControlMappingWorkbook(mappings));

        const failed = mappings.filter((m) => m.error).length;
        output.log(`Mapped rows: ${mappings.length}`);
        output.log(`Assessment errors: ${failed}`);
        output.log(`Workbook written to ${target}`);
      }
    );

  return program;
}

if (isMainModule(import.meta.url)) {
  await runProgram(createQueryProgram(lazyContext()));
}

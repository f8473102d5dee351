import { Command } from 'commander';
import { Config } from '../types/index.js';
import { getConfig } from '../config/index.js';
import { PostgresStore, resetPostgresStore } from '../clients/postgres.js';
import { IngestionPipeline } from '../ingestion/pipeline.js';
import { ThemeComparator } from '../comparison/comparator.js';
import { ControlMapper } from '../controls/control-mapper.js';
import { AnswerService } from '../qa/answer-service.js';
import { createServices } from '../services.js';

export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

export const consoleOutput: CliOutput = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

export interface CliServices {
  ingestion: Pick<
    IngestionPipeline,
    'initialize' | 'ingestFile' | 'ingestDirectory' | 'structureFile' | 'deleteDocument' | 'getStats'
  >;
  postgres: Pick<PostgresStore, 'getComparisonRun'>;
  comparator: Pick<ThemeComparator, 'compareDocuments' | 'compareArticles'>;
  controlMapper: Pick<ControlMapper, 'mapControlsFromWorkbook'>;
  answers: Pick<AnswerService, 'ask'>;
}

export interface CliContext {
  config: Config;
  services: CliServices;
}

/**
 * Services are built on first use so `--help` never opens a connection
 */
export function lazyContext(): () => CliContext {
  let context: CliContext | null = null;
  return () => {
    if (!context) {
      const config = getConfig();
      context = { config, services: createServices(config) };
    }
    return context;
  };
}

export async function runProgram(
  program: Command,
  argv: readonly string[] = process.argv,
  output: CliOutput = consoleOutput
): Promise<void> {
  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    output.error(`Command failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  } finally {
    await resetPostgresStore();
  }
}

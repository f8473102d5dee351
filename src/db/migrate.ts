#!/usr/bin/env node

import { readFile, access } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import pg from 'pg';
import { z } from 'zod';
import { Config, PipelineError } from '../types/index.js';
import { getConfig } from '../config/index.js';
import { isMainModule } from '../utils/entrypoint.js';
import { createChildLogger } from '../utils/logger.js';

const { Pool } = pg;

const logger = createChildLogger('db-migrate');

const __dirname = dirname(fileURLToPath(import.meta.url));

// src/db under tsx, dist/src/db once built
const SCHEMA_CANDIDATES = [
  join(__dirname, '../../scripts/init-db.sql'),
  join(__dirname, '../../../scripts/init-db.sql'),
];

export async function findSchemaFile(candidates: readonly string[] = SCHEMA_CANDIDATES): Promise<string> {
  for (const candidate of candidates) {
    try {
      await access(candidate);
      return candidate;
    } catch {
      logger.debug({ candidate }, 'Schema file not at candidate path');
    }
  }
  throw new PipelineError(`Schema file not found in: ${candidates.join(', ')}`, 'CONFIG_ERROR');
}

export interface SqlRunner {
  query(sql: string): Promise<{ rows: unknown[] }>;
}

const TableRowSchema = z.object({ table_name: z.string() });

/**
 * Apply the schema script and return the public tables that now exist
 */
export async function applySchema(pool: SqlRunner, schemaPath: string): Promise<string[]> {
  const initSql = await readFile(schemaPath, 'utf-8');
  await pool.query(initSql);

  const tables = await pool.query(`
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = 'public'
    ORDER BY table_name;
  `);

  return tables.rows.map((row) => TableRowSchema.parse(row).table_name);
}

export async function migrate(config: Config = getConfig()): Promise<string[]> {
  logger.info('Running database migrations');

  const pool = new Pool({
    host: config.postgres.host,
    port: config.postgres.port,
    database: config.postgres.database,
    user: config.postgres.user,
    password: config.postgres.password,
  });

  try {
    const tables = await applySchema(pool, await findSchemaFile());
    logger.info({ tables }, 'Migrations completed');
    return tables;
  } finally {
    await pool.end();
  }
}

if (isMainModule(import.meta.url)) {
  try {
    const tables = await migrate();
    console.log('Migrations completed successfully!');
    console.log('\nTables:');
    tables.forEach((table) => console.log(`  - ${table}`));
  } catch (error) {
    logger.error({ error }, 'Migration failed');
    process.exitCode = 1;
  }
}

#!/usr/bin/env node

import { readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import pg from 'pg';
import { getConfig } from '../config/index.js';

const { Pool } = pg;

const __dirname = dirname(fileURLToPath(import.meta.url));

async function migrate(): Promise<void> {
  console.log('Running database migrations...');

  const config = getConfig();
  const pool = new Pool(config.postgres);

  try {
    const initSqlPath = join(__dirname, '../../scripts/init-db.sql');
    const initSql = await readFile(initSqlPath, 'utf-8');

    await pool.query(initSql);

    console.log('Migrations completed successfully!');

    const count = await pool.query<{ count: string }>(
      'SELECT COUNT(*) as count FROM enforcement_records'
    );
    console.log(`\nenforcement_records: ${count.rows[0].count} row(s)`);
  } catch (error) {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

migrate().catch((error: unknown) => {
  console.error('Migration failed:', error);
  process.exit(1);
});

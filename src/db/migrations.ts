import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { DatabaseInterface } from './database.js';

const MIGRATIONS_DIR = new URL('../../migrations/', import.meta.url);

const MIGRATIONS = {
  sqlite: ['001_project_documents.sql'],
  postgres: ['001_project_documents_postgres.sql'],
};

export function splitStatements(sql: string): string[] {
  return sql
    .split(';')
    .map(s => s.replace(/^\s*--.*$/gm, '').trim())
    .filter(s => s.length > 0);
}

/**
 * Run every migration for the database's dialect. Statements are idempotent.
 */
export async function applyMigrations(db: DatabaseInterface): Promise<number> {
  let executed = 0;

  for (const file of MIGRATIONS[db.dialect]) {
    const sql = readFileSync(fileURLToPath(new URL(file, MIGRATIONS_DIR)), 'utf-8');
    for (const statement of splitStatements(sql)) {
      await db.run(statement);
      executed++;
    }
  }

  return executed;
}

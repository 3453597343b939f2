import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { PostgreSQLDatabase, SQLiteDatabase, createDatabase } from '../db/database.js';
import { applyMigrations } from '../db/migrations.js';
import { DatabaseProjectStore } from '../db/project-store.js';
import { dbConfig } from '../config/database.js';
import { RecordingPgClient } from './fakes.js';

describe('PostgreSQLDatabase', () => {
  let client: RecordingPgClient;
  let db: PostgreSQLDatabase;

  beforeEach(() => {
    client = new RecordingPgClient();
    db = new PostgreSQLDatabase(client);
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('returns rows from query and the row count from run', async () => {
    client.rows = [{ n: 1 }];
    client.rowCount = 3;

    expect(await db.query('SELECT 1 AS n')).toEqual([{ n: 1 }]);
    expect(await db.run('DELETE FROM project_documents')).toBe(3);
    expect(client.calls).toEqual([
      { sql: 'SELECT 1 AS n', params: [] },
      { sql: 'DELETE FROM project_documents', params: [] },
    ]);
  });

  test('treats a missing row count as no changes', async () => {
    client.rowCount = null;
    expect(await db.run('UPDATE project_documents SET updated_at = NOW()')).toBe(0);
  });

  test('logs and rethrows driver errors', async () => {
    const error = new Error('connection refused');
    client.failure = error;

    await expect(db.run('SELECT 1')).rejects.toThrow('connection refused');
    expect(console.error).toHaveBeenCalledWith('❌ postgres statement failed (SELECT 1):', error);
  });

  test('runs the PostgreSQL migration statements', async () => {
    expect(await applyMigrations(db)).toBe(2);
    expect(client.calls[0].sql.startsWith('CREATE TABLE IF NOT EXISTS project_documents (')).toBe(true);
    expect(client.calls[1].sql).toBe(
      'CREATE INDEX IF NOT EXISTS idx_project_documents_project ON project_documents(project)'
    );
  });

  test('project store uses numbered placeholders and reads JSONB values', async () => {
    const store = new DatabaseProjectStore(db);

    expect(await store.save('survey', 'config', { variables: [] })).toBe(true);
    expect(client.calls[0].sql).toContain('VALUES ($1, $2, $3, NOW())');
    expect(client.calls[0].params).toEqual(['survey', 'config', '{"variables":[]}']);

    client.rows = [{ document: { variables: [] } }];
    expect(await store.load('survey', 'config')).toEqual({ variables: [] });
    expect(client.calls[1]).toEqual({
      sql: 'SELECT document FROM project_documents WHERE project = $1 AND doc_key = $2',
      params: ['survey', 'config'],
    });
  });

  test('project store reports a failed save', async () => {
    client.failure = new Error('connection refused');
    expect(await new DatabaseProjectStore(db).save('survey', 'config', {})).toBe(false);
  });

  test('close ends the pool', async () => {
    await db.close();
    expect(client.ended).toBe(true);
  });
});

describe('createDatabase', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'coding-db-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('creates the SQLite directory on demand', async () => {
    const filename = path.join(dir, 'nested', 'coding.sqlite3');
    const db = createDatabase({ ...dbConfig, type: 'sqlite', sqlite: { filename } });

    expect(db).toBeInstanceOf(SQLiteDatabase);
    expect(fs.existsSync(path.join(dir, 'nested'))).toBe(true);
    expect(await db.run('CREATE TABLE t (x INTEGER)')).toBe(0);
    await db.close();
  });

  test('selects PostgreSQL from the settings', async () => {
    const db = createDatabase({ ...dbConfig, type: 'postgres' });

    expect(db.dialect).toBe('postgres');
    await db.close();
  });
});

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { Pool, type PoolConfig } from 'pg';
import { dbConfig } from '../config/database.js';

export type SqlParam = string | number | null;
export type SqlRow = Record<string, unknown>;
export type SqlDialect = 'sqlite' | 'postgres';

/**
 * The two calls the project store and migrations need. `run` resolves to the
 * number of rows changed.
 */
export interface DatabaseInterface {
  readonly dialect: SqlDialect;
  query(sql: string, params?: SqlParam[]): Promise<SqlRow[]>;
  run(sql: string, params?: SqlParam[]): Promise<number>;
  close(): Promise<void>;
}

// The part of a pg Pool the PostgreSQL backend talks to
export interface PgQueryable {
  query(sql: string, params: SqlParam[]): Promise<{ rows: SqlRow[]; rowCount: number | null }>;
  end(): Promise<void>;
}

function reportFailure(dialect: SqlDialect, sql: string, error: unknown): void {
  const statement = sql.trim().split('\n')[0];
  console.error(`❌ ${dialect} statement failed (${statement}):`, error);
}

export class SQLiteDatabase implements DatabaseInterface {
  readonly dialect = 'sqlite' as const;
  private db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
  }

  async query(sql: string, params: SqlParam[] = []): Promise<SqlRow[]> {
    try {
      return this.db.prepare<SqlParam[], SqlRow>(sql).all(...params);
    } catch (error) {
      reportFailure(this.dialect, sql, error);
      throw error;
    }
  }

  async run(sql: string, params: SqlParam[] = []): Promise<number> {
    try {
      return this.db.prepare<SqlParam[]>(sql).run(...params).changes;
    } catch (error) {
      reportFailure(this.dialect, sql, error);
      throw error;
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

export class PostgreSQLDatabase implements DatabaseInterface {
  readonly dialect = 'postgres' as const;

  constructor(private client: PgQueryable) {}

  static connect(config: PoolConfig): PostgreSQLDatabase {
    const pool = new Pool(config);
    return new PostgreSQLDatabase({
      query: async (sql, params) => {
        const result = await pool.query<SqlRow>(sql, params);
        return { rows: result.rows, rowCount: result.rowCount };
      },
      end: () => pool.end(),
    });
  }

  async query(sql: string, params: SqlParam[] = []): Promise<SqlRow[]> {
    try {
      return (await this.client.query(sql, params)).rows;
    } catch (error) {
      reportFailure(this.dialect, sql, error);
      throw error;
    }
  }

  async run(sql: string, params: SqlParam[] = []): Promise<number> {
    try {
      return (await this.client.query(sql, params)).rowCount ?? 0;
    } catch (error) {
      reportFailure(this.dialect, sql, error);
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

export type DatabaseSettings = typeof dbConfig;

/**
 * PostgreSQL in production, otherwise a SQLite file whose directory is created on demand
 */
export function createDatabase(settings: DatabaseSettings = dbConfig): DatabaseInterface {
  if (settings.type === 'postgres') {
    return PostgreSQLDatabase.connect(settings.postgres);
  }

  const dbDir = path.dirname(settings.sqlite.filename);
  if (!fs.existsSync(dbDir)) {
    fs.mkdirSync(dbDir, { recursive: true });
  }
  return new SQLiteDatabase(settings.sqlite.filename);
}

let dbInstance: DatabaseInterface | null = null;

export function getDatabase(): DatabaseInterface {
  if (!dbInstance) {
    dbInstance = createDatabase();
  }
  return dbInstance;
}

export async function closeDatabase(): Promise<void> {
  if (dbInstance) {
    await dbInstance.close();
    dbInstance = null;
  }
}

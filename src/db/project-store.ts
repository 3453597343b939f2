import type { DatabaseInterface } from './database.js';
import { isJsonValue } from '../types/coding.types.js';
import type { JsonValue } from '../types/coding.types.js';

export type ProjectDocumentKey = 'config' | 'coding_results' | 'reliability_results' | (string & {});

/**
 * Key-value persistence of JSON documents per project
 */
export interface ProjectStore {
  load(project: string, key: ProjectDocumentKey): Promise<JsonValue | null>;
  save(project: string, key: ProjectDocumentKey, document: JsonValue): Promise<boolean>;
}

export class DatabaseProjectStore implements ProjectStore {
  constructor(private db: DatabaseInterface) {}

  async load(project: string, key: ProjectDocumentKey): Promise<JsonValue | null> {
    const sql = this.db.dialect === 'postgres'
      ? 'SELECT document FROM project_documents WHERE project = $1 AND doc_key = $2'
      : 'SELECT document FROM project_documents WHERE project = ? AND doc_key = ?';

    try {
      const rows = await this.db.query(sql, [project, key]);
      if (rows.length === 0) {
        return null;
      }
      return this.decode(rows[0].document);
    } catch (error) {
      console.error(`❌ Failed to load ${key} for project ${project}:`, error);
      return null;
    }
  }

  async save(project: string, key: ProjectDocumentKey, document: JsonValue): Promise<boolean> {
    const sql = this.db.dialect === 'postgres'
      ? `INSERT INTO project_documents (project, doc_key, document, updated_at)
         VALUES ($1, $2, $3, NOW())
         ON CONFLICT (project, doc_key) DO UPDATE SET document = EXCLUDED.document, updated_at = NOW()`
      : `INSERT INTO project_documents (project, doc_key, document, updated_at)
         VALUES (?, ?, ?, CURRENT_TIMESTAMP)
         ON CONFLICT (project, doc_key) DO UPDATE SET document = excluded.document, updated_at = CURRENT_TIMESTAMP`;

    try {
      await this.db.run(sql, [project, key, JSON.stringify(document)]);
      return true;
    } catch (error) {
      console.error(`❌ Failed to save ${key} for project ${project}:`, error);
      return false;
    }
  }

  // SQLite hands back TEXT, PostgreSQL an already parsed JSONB value
  private decode(raw: unknown): JsonValue | null {
    if (typeof raw !== 'string') {
      return isJsonValue(raw) ? raw : null;
    }
    try {
      const parsed: JsonValue = JSON.parse(raw);
      return parsed;
    } catch (error) {
      console.warn('⚠️ Stored document is not valid JSON:', error);
      return null;
    }
  }
}

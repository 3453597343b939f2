import {
  BaseModelProvider,
  type ChatCompletionRequest,
  type ChatCompletionResult,
} from '../services/model-providers/base-provider.js';
import type { PgQueryable, SqlParam, SqlRow } from '../db/database.js';
import type { ProjectDocumentKey, ProjectStore } from '../db/project-store.js';
import type { JsonValue, TokenUsage } from '../types/coding.types.js';

export type ScriptedReply = string | Error;

/**
 * Replays scripted replies in order and records every request
 */
export class ScriptedProvider extends BaseModelProvider {
  readonly requests: ChatCompletionRequest[] = [];

  constructor(private replies: ScriptedReply[], private usage?: TokenUsage) {
    super();
  }

  async complete(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('No scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return {
      model: request.model,
      choices: [{ role: 'assistant', text: reply }],
      usage: this.usage,
    };
  }

  userPrompt(index: number): string {
    const message = this.requests[index]?.messages.find(m => m.role === 'user');
    if (!message) return '';
    if (typeof message.content === 'string') return message.content;
    return message.content.map(part => (part.type === 'text' ? part.text : `[image ${part.imageUrl.url}]`)).join('\n');
  }
}

/**
 * In-process ProjectStore; documents are stored as JSON copies
 */
export class MemoryProjectStore implements ProjectStore {
  failSaves = false;
  private documents = new Map<string, string>();

  async load(project: string, key: ProjectDocumentKey): Promise<JsonValue | null> {
    const stored = this.documents.get(`${project}/${key}`);
    if (stored === undefined) return null;
    const document: JsonValue = JSON.parse(stored);
    return document;
  }

  async save(project: string, key: ProjectDocumentKey, document: JsonValue): Promise<boolean> {
    if (this.failSaves) return false;
    this.documents.set(`${project}/${key}`, JSON.stringify(document));
    return true;
  }
}

/**
 * Stands in for a pg Pool: records statements, answers with canned rows
 */
export class RecordingPgClient implements PgQueryable {
  readonly calls: Array<{ sql: string; params: SqlParam[] }> = [];
  rows: SqlRow[] = [];
  rowCount: number | null = 1;
  failure: Error | null = null;
  ended = false;

  async query(sql: string, params: SqlParam[]): Promise<{ rows: SqlRow[]; rowCount: number | null }> {
    this.calls.push({ sql, params });
    if (this.failure) {
      throw this.failure;
    }
    return { rows: this.rows, rowCount: this.rowCount };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

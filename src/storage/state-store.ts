import { z } from 'zod';
import { loadEnvConfig } from '../config/env.js';
import { formatIssues } from '../config/schema.js';
import { createLogger } from '../utils/logger.js';
import { Schema, type StateRow, type StateVersionRow } from './schema.js';

export const translationStateSchema = z.object({
  texts: z.record(z.string()),
  translations: z.record(z.string()),
  checksums: z.record(z.string()),
  timestamp: z.number(),
  metadata: z
    .object({
      sourceLocale: z.string(),
      targetLocale: z.string(),
      version: z.string(),
    })
    .catchall(z.unknown()),
  tokenUsage: z
    .object({
      input: z.number(),
      output: z.number(),
      total: z.number(),
    })
    .optional(),
});

export type TranslationState = z.infer<typeof translationStateSchema>;

/** Where diff tracking keeps the last translated state per locale. */
export interface StateStore {
  get(key: string): Promise<TranslationState | undefined>;
  put(key: string, state: TranslationState): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

const log = createLogger('state-store');

function cloneState(state: TranslationState): TranslationState {
  return structuredClone(state);
}

export class MemoryStateStore implements StateStore {
  private readonly states = new Map<string, TranslationState>();

  async get(key: string): Promise<TranslationState | undefined> {
    const state = this.states.get(key);
    return state ? cloneState(state) : undefined;
  }

  async put(key: string, state: TranslationState): Promise<void> {
    this.states.set(key, cloneState(state));
  }

  async delete(key: string): Promise<void> {
    this.states.delete(key);
  }

  async clear(): Promise<void> {
    this.states.clear();
  }

  get size(): number {
    return this.states.size;
  }
}

export interface SqliteStateStoreOptions {
  /** History rows kept per key; 0 turns history off. */
  maxVersions?: number;
}

/**
 * better-sqlite3 backed store. Every put also appends to a history table,
 * pruned to the newest `maxVersions` rows per key.
 */
export class SqliteStateStore implements StateStore {
  private readonly schema: Schema;
  private readonly maxVersions: number;

  constructor(dbPath: string = ':memory:', options: SqliteStateStoreOptions = {}) {
    this.schema = new Schema(dbPath);
    this.maxVersions = options.maxVersions ?? 10;
  }

  async get(key: string): Promise<TranslationState | undefined> {
    const row = this.schema
      .getDatabase()
      .prepare<[string], Pick<StateRow, 'state'>>('SELECT state FROM translation_states WHERE key = ?')
      .get(key);
    return row ? this.decode(key, row.state) : undefined;
  }

  async put(key: string, state: TranslationState): Promise<void> {
    const db = this.schema.getDatabase();
    const now = Date.now();
    const serialized = JSON.stringify(state);

    const write = db.transaction(() => {
      db.prepare(
        `INSERT INTO translation_states (key, state, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET state = excluded.state, updated_at = excluded.updated_at`
      ).run(key, serialized, now);

      if (this.maxVersions > 0) {
        db.prepare('INSERT INTO translation_state_versions (key, state, created_at) VALUES (?, ?, ?)').run(
          key,
          serialized,
          now
        );
        db.prepare(
          `DELETE FROM translation_state_versions
           WHERE key = ? AND id NOT IN (
             SELECT id FROM translation_state_versions WHERE key = ? ORDER BY id DESC LIMIT ?
           )`
        ).run(key, key, this.maxVersions);
      }
    });
    write();
  }

  async delete(key: string): Promise<void> {
    const db = this.schema.getDatabase();
    db.transaction(() => {
      db.prepare('DELETE FROM translation_states WHERE key = ?').run(key);
      db.prepare('DELETE FROM translation_state_versions WHERE key = ?').run(key);
    })();
  }

  async clear(): Promise<void> {
    this.schema.getDatabase().exec('DELETE FROM translation_states; DELETE FROM translation_state_versions;');
  }

  /** Stored history for a key, newest first. */
  async versions(key: string): Promise<TranslationState[]> {
    const rows = this.schema
      .getDatabase()
      .prepare<[string], Pick<StateVersionRow, 'state'>>(
        'SELECT state FROM translation_state_versions WHERE key = ? ORDER BY id DESC'
      )
      .all(key);
    const states: TranslationState[] = [];
    for (const row of rows) {
      const state = this.decode(key, row.state);
      if (state) states.push(state);
    }
    return states;
  }

  close(): void {
    this.schema.close();
  }

  // A row that no longer matches the schema is treated as missing state.
  private decode(key: string, raw: string): TranslationState | undefined {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log.warn({ key, err: error }, 'Stored state is not valid JSON');
      return undefined;
    }
    const result = translationStateSchema.safeParse(parsed);
    if (!result.success) {
      log.warn({ key, issues: formatIssues(result.error) }, 'Stored state failed validation');
      return undefined;
    }
    return result.data;
  }
}

/** The store `AI_TRANSLATOR_STATE_DB` names: `:memory:` keeps state in process, anything else is a SQLite file. */
export function openStateStore(dbPath: string = loadEnvConfig().stateDbPath): StateStore {
  return dbPath === ':memory:' ? new MemoryStateStore() : new SqliteStateStore(dbPath);
}

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { RecordStoreError } from '../errors.js';
import { SUMMARY_TIERS } from './types.js';
import type {
  MemoryPatch,
  MemoryRecord,
  NewMemory,
  RecordStoreStatus,
  SummaryRecord,
  SummaryTier,
  TopicDeletion,
  TopicRecord,
  UpdatedMemory,
} from './types.js';

interface MemoryRow {
  id: string;
  content: string;
  topic: string;
  tags: string;
  created_at: string;
  updated_at: string;
  version: number;
  content_size: number;
}

interface SummaryRow {
  id: string;
  memory_id: string;
  summary_type: string;
  summary_text: string;
  created_at: string;
  updated_at: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS topics (
    name TEXT PRIMARY KEY,
    description TEXT,
    created_at TEXT NOT NULL,
    item_count INTEGER NOT NULL DEFAULT 0 CHECK (item_count >= 0)
  );

  CREATE TABLE IF NOT EXISTS memory_items (
    id TEXT PRIMARY KEY,
    content TEXT NOT NULL,
    topic TEXT NOT NULL REFERENCES topics(name) ON DELETE CASCADE,
    tags TEXT NOT NULL DEFAULT '[]',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    version INTEGER NOT NULL DEFAULT 1,
    content_size INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_memory_items_topic ON memory_items(topic);

  CREATE TABLE IF NOT EXISTS summaries (
    id TEXT PRIMARY KEY,
    memory_id TEXT NOT NULL REFERENCES memory_items(id) ON DELETE CASCADE,
    summary_type TEXT NOT NULL,
    summary_text TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_summaries_memory_id ON summaries(memory_id);
`;

/** Length in characters (code points), the unit the summary tiers are defined in. */
export function contentSize(content: string): number {
  return Array.from(content).length;
}

function parseTags(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.map(String) : [];
  } catch {
    // Rows written by hand or by older tooling may hold a comma list
    return raw.split(',').map(t => t.trim()).filter(t => t.length > 0);
  }
}

function isSummaryTier(value: string): value is SummaryTier {
  return (SUMMARY_TIERS as readonly string[]).includes(value);
}

function toMemory(row: MemoryRow): MemoryRecord {
  return { ...row, tags: parseTags(row.tags) };
}

function toSummary(row: SummaryRow): SummaryRecord {
  if (!isSummaryTier(row.summary_type)) {
    throw new RecordStoreError(`Summary ${row.id} has unknown type "${row.summary_type}"`);
  }
  return { ...row, summary_type: row.summary_type };
}

export interface RecordStoreOptions {
  now?: () => Date;
}

/**
 * Authoritative store for memories, topics and summaries.
 * Every public method is one SQLite transaction; nothing spans calls.
 */
export class RecordStore {
  private db: Database.Database;
  private now: () => Date;

  constructor(dbPath: string, options: RecordStoreOptions = {}) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA);
    this.now = options.now ?? (() => new Date());
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof RecordStoreError) throw err;
      throw new RecordStoreError(`Record store failed to ${action}`, err);
    }
  }

  initialize(reset = false): void {
    this.guard('initialize schema', () => {
      this.db.transaction(() => {
        if (reset) {
          this.db.exec('DROP TABLE IF EXISTS summaries');
          this.db.exec('DROP TABLE IF EXISTS memory_items');
          this.db.exec('DROP TABLE IF EXISTS topics');
        }
        this.db.exec(SCHEMA);
      })();
    });
  }

  /** Flush the WAL into the main file so a file-level copy is complete. */
  checkpoint(): void {
    this.guard('checkpoint', () => this.db.pragma('wal_checkpoint(TRUNCATE)'));
  }

  close(): void {
    this.db.close();
  }

  // ── Memories ──────────────────────────────────────────────────────────────

  createMemory(item: NewMemory): MemoryRecord {
    return this.guard(`store memory ${item.id}`, () => {
      this.db.transaction(() => {
        this.db
          .prepare(`
            INSERT INTO topics (name, created_at, item_count) VALUES (?, ?, 1)
            ON CONFLICT(name) DO UPDATE SET item_count = item_count + 1
          `)
          .run(item.topic, item.timestamp);
        this.db
          .prepare(`
            INSERT INTO memory_items (id, content, topic, tags, created_at, updated_at, version, content_size)
            VALUES (?, ?, ?, ?, ?, ?, 1, ?)
          `)
          .run(
            item.id,
            item.content,
            item.topic,
            JSON.stringify(item.tags),
            item.timestamp,
            item.timestamp,
            contentSize(item.content),
          );
      })();

      return {
        id: item.id,
        content: item.content,
        topic: item.topic,
        tags: [...item.tags],
        created_at: item.timestamp,
        updated_at: item.timestamp,
        version: 1,
        content_size: contentSize(item.content),
      };
    });
  }

  getMemory(id: string): MemoryRecord | null {
    return this.guard(`read memory ${id}`, () => {
      const row = this.db.prepare('SELECT * FROM memory_items WHERE id = ?').get(id) as MemoryRow | undefined;
      return row ? toMemory(row) : null;
    });
  }

  listMemories(): MemoryRecord[] {
    return this.guard('list memories', () => {
      const rows = this.db.prepare('SELECT * FROM memory_items ORDER BY created_at ASC, id ASC').all() as MemoryRow[];
      return rows.map(toMemory);
    });
  }

  /**
   * Apply a patch to the memory row only. When the topic changes the new topic row is
   * created with a zero count so the foreign key holds; counters move separately through
   * moveTopicMembership once this write has committed.
   */
  updateMemory(id: string, patch: MemoryPatch): UpdatedMemory | null {
    return this.guard(`update memory ${id}`, () =>
      this.db.transaction((): UpdatedMemory | null => {
        const row = this.db.prepare('SELECT * FROM memory_items WHERE id = ?').get(id) as MemoryRow | undefined;
        if (!row) return null;

        const now = this.timestamp();
        const content = patch.content ?? row.content;
        const topic = patch.topic ?? row.topic;
        const tags = patch.tags !== undefined ? JSON.stringify(patch.tags) : row.tags;

        if (topic !== row.topic) {
          this.db
            .prepare('INSERT INTO topics (name, created_at, item_count) VALUES (?, ?, 0) ON CONFLICT(name) DO NOTHING')
            .run(topic, now);
        }

        this.db
          .prepare(`
            UPDATE memory_items
            SET content = ?, topic = ?, tags = ?, updated_at = ?, version = version + 1, content_size = ?
            WHERE id = ?
          `)
          .run(content, topic, tags, now, contentSize(content), id);

        const updated = this.db.prepare('SELECT * FROM memory_items WHERE id = ?').get(id) as MemoryRow;
        return { record: toMemory(updated), previousTopic: row.topic };
      })(),
    );
  }

  /**
   * Remove the memory; its summaries go with it through the cascade. The topic counter
   * is decremented but the topic row stays until deleteTopicIfEmpty.
   */
  deleteMemory(id: string): boolean {
    return this.guard(`delete memory ${id}`, () =>
      this.db.transaction((): boolean => {
        const row = this.db.prepare('SELECT topic FROM memory_items WHERE id = ?').get(id) as
          | { topic: string }
          | undefined;
        if (!row) return false;

        this.db.prepare('DELETE FROM memory_items WHERE id = ?').run(id);
        this.db
          .prepare('UPDATE topics SET item_count = MAX(item_count - 1, 0) WHERE name = ?')
          .run(row.topic);
        return true;
      })(),
    );
  }

  // ── Topics ────────────────────────────────────────────────────────────────

  /**
   * Move one unit of membership from one topic to another. The source row is removed
   * when its count reaches zero, which would cascade to any memory still pointing at it,
   * so callers must have re-pointed the memory first.
   */
  moveTopicMembership(from: string, to: string): void {
    if (from === to) return;
    this.guard(`move topic membership ${from} -> ${to}`, () => {
      this.db.transaction(() => {
        this.db.prepare('UPDATE topics SET item_count = MAX(item_count - 1, 0) WHERE name = ?').run(from);
        this.db
          .prepare(`
            DELETE FROM topics
            WHERE name = ? AND item_count = 0
              AND NOT EXISTS (SELECT 1 FROM memory_items WHERE topic = topics.name)
          `)
          .run(from);
        this.db
          .prepare(`
            INSERT INTO topics (name, created_at, item_count) VALUES (?, ?, 1)
            ON CONFLICT(name) DO UPDATE SET item_count = item_count + 1
          `)
          .run(to, this.timestamp());
      })();
    });
  }

  getTopic(name: string): TopicRecord | null {
    return this.guard(`read topic ${name}`, () => {
      const row = this.db.prepare('SELECT * FROM topics WHERE name = ?').get(name) as TopicRecord | undefined;
      return row ?? null;
    });
  }

  listTopics(): TopicRecord[] {
    return this.guard('list topics', () =>
      this.db.prepare('SELECT * FROM topics ORDER BY item_count DESC, name ASC').all() as TopicRecord[],
    );
  }

  deleteTopicIfEmpty(name: string): TopicDeletion {
    return this.guard(`delete topic ${name}`, () =>
      this.db.transaction((): TopicDeletion => {
        const row = this.db.prepare('SELECT item_count FROM topics WHERE name = ?').get(name) as
          | { item_count: number }
          | undefined;
        if (!row) return 'not_found';
        if (row.item_count > 0 || this.countMemoriesInTopic(name) > 0) return 'not_empty';
        this.db.prepare('DELETE FROM topics WHERE name = ?').run(name);
        return 'deleted';
      })(),
    );
  }

  /** Live memory count for a topic, independent of the stored counter. */
  countMemoriesInTopic(name: string): number {
    return this.guard(`count topic ${name}`, () => {
      const row = this.db.prepare('SELECT COUNT(*) AS count FROM memory_items WHERE topic = ?').get(name) as {
        count: number;
      };
      return row.count;
    });
  }

  // ── Summaries ─────────────────────────────────────────────────────────────

  createSummary(id: string, memoryId: string, type: SummaryTier, text: string): SummaryRecord {
    return this.guard(`store summary ${id}`, () => {
      const now = this.timestamp();
      this.db
        .prepare(`
          INSERT INTO summaries (id, memory_id, summary_type, summary_text, created_at, updated_at)
          VALUES (?, ?, ?, ?, ?, ?)
        `)
        .run(id, memoryId, type, text, now, now);
      return { id, memory_id: memoryId, summary_type: type, summary_text: text, created_at: now, updated_at: now };
    });
  }

  getSummary(memoryId: string, type: SummaryTier): SummaryRecord | null {
    return this.guard(`read ${type} summary of ${memoryId}`, () => {
      const row = this.db
        .prepare('SELECT * FROM summaries WHERE memory_id = ? AND summary_type = ?')
        .get(memoryId, type) as SummaryRow | undefined;
      return row ? toSummary(row) : null;
    });
  }

  getSummaryById(id: string): SummaryRecord | null {
    return this.guard(`read summary ${id}`, () => {
      const row = this.db.prepare('SELECT * FROM summaries WHERE id = ?').get(id) as SummaryRow | undefined;
      return row ? toSummary(row) : null;
    });
  }

  /** Most recently written summary of any tier. */
  getAnySummary(memoryId: string): SummaryRecord | null {
    return this.guard(`read summary of ${memoryId}`, () => {
      const row = this.db
        .prepare('SELECT * FROM summaries WHERE memory_id = ? ORDER BY updated_at DESC LIMIT 1')
        .get(memoryId) as SummaryRow | undefined;
      return row ? toSummary(row) : null;
    });
  }

  listSummaries(memoryId?: string): SummaryRecord[] {
    return this.guard('list summaries', () => {
      const rows = memoryId === undefined
        ? this.db.prepare('SELECT * FROM summaries ORDER BY created_at ASC, id ASC').all()
        : this.db.prepare('SELECT * FROM summaries WHERE memory_id = ? ORDER BY created_at ASC, id ASC').all(memoryId);
      return (rows as SummaryRow[]).map(toSummary);
    });
  }

  updateSummary(id: string, text: string, type: SummaryTier): boolean {
    return this.guard(`update summary ${id}`, () => {
      const result = this.db
        .prepare('UPDATE summaries SET summary_text = ?, summary_type = ?, updated_at = ? WHERE id = ?')
        .run(text, type, this.timestamp(), id);
      return result.changes > 0;
    });
  }

  deleteSummaries(memoryId: string): number {
    return this.guard(`delete summaries of ${memoryId}`, () =>
      this.db.prepare('DELETE FROM summaries WHERE memory_id = ?').run(memoryId).changes,
    );
  }

  // ── Status ────────────────────────────────────────────────────────────────

  getStatus(): RecordStoreStatus {
    return this.guard('read status', () => {
      const count = (sql: string) => (this.db.prepare(sql).get() as { count: number }).count;
      const topTopics = this.db
        .prepare('SELECT name, item_count FROM topics ORDER BY item_count DESC, name ASC LIMIT 5')
        .all() as { name: string; item_count: number }[];
      const latest = this.db
        .prepare('SELECT created_at FROM memory_items ORDER BY created_at DESC LIMIT 1')
        .get() as { created_at: string } | undefined;

      return {
        total_memories: count('SELECT COUNT(*) AS count FROM memory_items'),
        total_topics: count('SELECT COUNT(*) AS count FROM topics'),
        total_summaries: count('SELECT COUNT(*) AS count FROM summaries'),
        top_topics: topTopics.map(t => ({ name: t.name, count: t.item_count })),
        latest_item_date: latest?.created_at ?? null,
      };
    });
  }
}

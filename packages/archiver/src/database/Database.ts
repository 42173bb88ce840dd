import BetterSqlite3 from 'better-sqlite3';
import { join, dirname } from 'path';
import { mkdirSync, readFileSync } from 'fs';
import type { JobSnapshot } from '@streamvault/shared';
import type { JobStore, SeenSet, StoredJob } from '../jobs/types';

export interface DatabaseConfig {
  // ':memory:' for a database that lives only as long as the process
  path: string;
}

export class Database implements JobStore, SeenSet {
  private db: BetterSqlite3.Database;

  constructor(config: DatabaseConfig) {
    if (config.path !== ':memory:') {
      mkdirSync(dirname(config.path), { recursive: true });
    }

    this.db = new BetterSqlite3(config.path);
    this.db.pragma('journal_mode = WAL');
    this.initializeSchema();
  }

  private initializeSchema(): void {
    const schemaPath = join(dirname(__filename), 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');

    try {
      this.db.exec(schema);
    } catch (error) {
      console.error('Error creating tables:', error);
      throw error;
    }
  }

  // ========== JOBS ==========

  getAll(): StoredJob[] {
    const stmt = this.db.prepare<[], StoredJob>('SELECT id, payload FROM jobs ORDER BY rowid');
    return stmt.all();
  }

  getJob(id: string): StoredJob | null {
    const stmt = this.db.prepare<[string], StoredJob>('SELECT id, payload FROM jobs WHERE id = ?');
    return stmt.get(id) ?? null;
  }

  upsert(id: string, snapshot: JobSnapshot): void {
    const stmt = this.db.prepare<[string, string]>(`
      INSERT INTO jobs (id, payload)
      VALUES (?, ?)
      ON CONFLICT(id) DO UPDATE SET
        payload = excluded.payload,
        updated_at = CURRENT_TIMESTAMP
    `);
    stmt.run(id, JSON.stringify(snapshot));
  }

  // ========== VIDEO HISTORY ==========

  containsOrInsert(id: string): boolean {
    const stmt = this.db.prepare<[string]>('INSERT OR IGNORE INTO video_history (id) VALUES (?)');
    return stmt.run(id).changes === 0;
  }

  hasSeen(id: string): boolean {
    const stmt = this.db.prepare<[string], { found: number }>(
      'SELECT EXISTS(SELECT 1 FROM video_history WHERE id = ?) AS found'
    );
    return stmt.get(id)?.found === 1;
  }

  remove(id: string): void {
    this.db.prepare<[string]>('DELETE FROM video_history WHERE id = ?').run(id);
  }

  close(): void {
    this.db.close();
  }
}

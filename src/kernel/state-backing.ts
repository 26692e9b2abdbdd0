/**
 * Durable backings for the state store.
 *
 * Both keep one record per domain key and replace it atomically:
 * the file backing through write-to-temp + rename, the SQLite backing
 * through a single-row INSERT OR REPLACE in WAL mode.
 */

import Database from 'better-sqlite3';
import { createHash } from 'node:crypto';
import { mkdirSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { StateCorruptionError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('state-backing');

const KEY_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

export interface StateBacking {
  readonly kind: string;
  /** Raw record text, or null when the key has never been written. */
  read(key: string): Promise<string | null>;
  /** Replace the record for `key` in one step. */
  write(key: string, text: string): Promise<void>;
  /** Move a corrupt record aside so it can be inspected later. */
  quarantine(key: string): Promise<void>;
  close(): void;
}

function assertKey(key: string): void {
  if (!KEY_PATTERN.test(key)) {
    throw new Error(`Invalid state key: ${key}`);
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ─── File backing ────────────────────────────────────────────────────────────

export class FileStateBacking implements StateBacking {
  readonly kind = 'file';

  constructor(private readonly dir: string) {}

  filePath(key: string): string {
    assertKey(key);
    return path.join(this.dir, `${key}.json`);
  }

  async read(key: string): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath(key), 'utf-8');
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
  }

  async write(key: string, text: string): Promise<void> {
    const filePath = this.filePath(key);
    await fs.mkdir(this.dir, { recursive: true, mode: 0o700 });

    // Atomic write: write to temp file, then rename
    const tempPath = `${filePath}.tmp`;
    await fs.writeFile(tempPath, text, { encoding: 'utf-8', mode: 0o600 });
    await fs.rename(tempPath, filePath);
  }

  async quarantine(key: string): Promise<void> {
    const filePath = this.filePath(key);
    const target = `${filePath}.corrupt-${Date.now()}`;
    try {
      await fs.rename(filePath, target);
      log.warn({ key, target }, 'Corrupt state file moved aside');
    } catch (error) {
      if (!isMissing(error)) throw error;
    }
  }

  close(): void {
    // nothing held open
  }
}

// ─── SQLite backing ──────────────────────────────────────────────────────────

interface StateRow {
  payload_json: string;
  payload_sha256: string;
}

function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

export class SqliteStateBacking implements StateBacking {
  readonly kind = 'sqlite';
  private db: Database.Database | null = null;
  private closed = false;

  constructor(private readonly dbPath: string) {}

  /**
   * Initialize (idempotent). Creates the database and tables if needed.
   * @throws Error once the backing has been closed
   */
  init(): Database.Database {
    if (this.db) return this.db;
    if (this.closed) {
      throw new Error(`State database is closed: ${this.dbPath}`);
    }

    if (this.dbPath !== ':memory:') {
      mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    const db = new Database(this.dbPath);
    db.pragma('journal_mode = WAL');

    db.prepare(`
      CREATE TABLE IF NOT EXISTS domain_state (
        state_key       TEXT PRIMARY KEY,
        payload_json    TEXT NOT NULL,
        payload_sha256  TEXT NOT NULL,
        updated_at      INTEGER NOT NULL
      )
    `).run();

    db.prepare(`
      CREATE TABLE IF NOT EXISTS quarantined_state (
        state_key       TEXT NOT NULL,
        payload_json    TEXT NOT NULL,
        payload_sha256  TEXT NOT NULL,
        quarantined_at  INTEGER NOT NULL
      )
    `).run();

    this.db = db;
    log.info({ dbPath: this.dbPath }, 'SQLite state backing initialized');
    return db;
  }

  async read(key: string): Promise<string | null> {
    assertKey(key);
    const row = this.init()
      .prepare<[string], StateRow>('SELECT payload_json, payload_sha256 FROM domain_state WHERE state_key = ?')
      .get(key);

    if (!row) return null;

    if (sha256(row.payload_json) !== row.payload_sha256) {
      throw new StateCorruptionError(key, 'SHA-256 mismatch');
    }
    return row.payload_json;
  }

  async write(key: string, text: string): Promise<void> {
    assertKey(key);
    this.init()
      .prepare(`
        INSERT OR REPLACE INTO domain_state (state_key, payload_json, payload_sha256, updated_at)
        VALUES (?, ?, ?, ?)
      `)
      .run(key, text, sha256(text), Date.now());
  }

  async quarantine(key: string): Promise<void> {
    assertKey(key);
    const db = this.init();
    const move = db.transaction((stateKey: string) => {
      db.prepare(`
        INSERT INTO quarantined_state (state_key, payload_json, payload_sha256, quarantined_at)
        SELECT state_key, payload_json, payload_sha256, ? FROM domain_state WHERE state_key = ?
      `).run(Date.now(), stateKey);
      db.prepare('DELETE FROM domain_state WHERE state_key = ?').run(stateKey);
    });
    move(key);
    log.warn({ key }, 'Corrupt state row quarantined');
  }

  /** Number of quarantined rows for a key. */
  quarantinedCount(key: string): number {
    const row = this.init()
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM quarantined_state WHERE state_key = ?')
      .get(key);
    return row?.count ?? 0;
  }

  close(): void {
    this.closed = true;
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}

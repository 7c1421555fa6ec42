/**
 * SQLite bootstrap shared by every tier.
 *
 * One physical database backs all logical stores; components either
 * receive an open handle from the facade or open their own.
 *
 * @module cortex-memory/database
 */

import { existsSync, mkdirSync } from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { CortexConfig, resolveDatabasePath } from './config.js';

export type BetterDatabase = Database.Database;

/**
 * Open (creating if needed) the brain database for a config
 */
export function openDatabase(config: CortexConfig): BetterDatabase {
  const dbPath = resolveDatabasePath(config);

  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);

  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
  }
  // Prevent SQLITE_BUSY when another process holds the write lock
  db.pragma('busy_timeout = 10000');
  db.pragma('foreign_keys = ON');

  if (config.verbose) {
    const versionRow = db.prepare<[], { version: string }>('SELECT sqlite_version() as version').get();
    console.log(`[Database] Opened ${dbPath} (SQLite ${versionRow?.version ?? 'unknown'})`);
  }

  return db;
}

/**
 * Holder for a database handle that a component may or may not own.
 * Owned handles are closed on release; borrowed ones are left open.
 */
export class DatabaseHandle {
  private owned: BetterDatabase | null = null;
  private readonly shared: BetterDatabase | null;

  constructor(private readonly config: CortexConfig, shared?: BetterDatabase) {
    this.shared = shared ?? null;
  }

  acquire(): BetterDatabase {
    if (this.shared) return this.shared;
    if (!this.owned) {
      this.owned = openDatabase(this.config);
    }
    return this.owned;
  }

  release(): void {
    if (this.owned) {
      this.owned.close();
      this.owned = null;
    }
  }
}

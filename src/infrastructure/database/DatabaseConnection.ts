import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

const IN_MEMORY = ':memory:';

/**
 * Database connection manager.
 * One instance per store; the composition root owns it and closes it on shutdown.
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'data/gateway.db') {
    this.dbPath = dbPath === IN_MEMORY ? dbPath : path.resolve(process.cwd(), dbPath);

    if (this.dbPath !== IN_MEMORY) {
      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    // WAL lets the scheduler read while a submission writes
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS work_items (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        priority INTEGER NOT NULL DEFAULT 0,
        data TEXT NOT NULL,
        state TEXT NOT NULL,
        retry_limit INTEGER NOT NULL DEFAULT 0,
        retry_delay REAL NOT NULL DEFAULT 0,
        retry_backoff INTEGER NOT NULL DEFAULT 0,
        retry_count INTEGER NOT NULL DEFAULT 0,
        attempts INTEGER NOT NULL DEFAULT 0,
        start_after INTEGER NOT NULL,
        expire_in_seconds REAL NOT NULL DEFAULT 0,
        keep_until INTEGER NOT NULL,
        on_complete INTEGER NOT NULL DEFAULT 0,
        executor TEXT,
        endpoint TEXT,
        created_at INTEGER NOT NULL,
        started_at INTEGER,
        completed_at INTEGER,
        result TEXT,
        error TEXT,
        dedupe_key TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_work_eligible ON work_items(state, start_after, priority);
      CREATE INDEX IF NOT EXISTS idx_work_keep_until ON work_items(keep_until);
      CREATE INDEX IF NOT EXISTS idx_work_dedupe ON work_items(dedupe_key);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  getDatabaseSize(): number {
    if (this.dbPath === IN_MEMORY) {
      return 0;
    }
    try {
      return fs.statSync(this.dbPath).size;
    } catch {
      // Not flushed to disk yet
      return 0;
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

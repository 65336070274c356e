import BetterSqlite3 from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import path from 'path';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Database');

const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001_quote_cache',
    sql: `
      CREATE TABLE IF NOT EXISTS floor_quotes (
          collection_slug TEXT PRIMARY KEY,
          floor_price REAL NOT NULL,
          currency TEXT NOT NULL,
          fetched_at INTEGER NOT NULL,
          fetch_count INTEGER NOT NULL DEFAULT 1,
          created_at INTEGER DEFAULT (unixepoch())
      );

      CREATE INDEX IF NOT EXISTS idx_floor_quotes_fetched ON floor_quotes(fetched_at);
    `,
  },
];

export class Database {
  private db: BetterSqlite3.Database | null = null;

  constructor(private dbPath: string) {}

  // Initialize database connection
  initialize(): void {
    if (this.db) {
      return;
    }

    const inMemory = this.dbPath === ':memory:';

    if (!inMemory) {
      const dir = path.dirname(this.dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
        logger.info(`Created database directory: ${dir}`);
      }
    }

    this.db = new BetterSqlite3(this.dbPath);
    if (!inMemory) {
      this.db.pragma('journal_mode = WAL');
    }

    logger.info(`Connected to database: ${this.dbPath}`);

    this.runMigrations();
  }

  private runMigrations(): void {
    const db = this.getDb();

    db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
          id INTEGER PRIMARY KEY,
          name TEXT NOT NULL UNIQUE,
          applied_at INTEGER DEFAULT (unixepoch())
      );
    `);

    const applied = new Set(
      db
        .prepare('SELECT name FROM migrations')
        .pluck()
        .all()
        .filter((name): name is string => typeof name === 'string')
    );

    for (const migration of MIGRATIONS) {
      if (applied.has(migration.name)) {
        continue;
      }
      this.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO migrations (name) VALUES (?)').run(migration.name);
      });
      logger.info(`Applied migration ${migration.name}`);
    }
  }

  getDb(): BetterSqlite3.Database {
    if (!this.db) {
      throw new Error('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  prepare(sql: string): BetterSqlite3.Statement {
    return this.getDb().prepare(sql);
  }

  transaction<T>(fn: () => T): T {
    return this.getDb().transaction(fn)();
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      logger.info('Database connection closed');
    }
  }
}

export default Database;

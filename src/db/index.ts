import Database from 'better-sqlite3';
import { type BetterSQLite3Database, drizzle } from 'drizzle-orm/better-sqlite3';
import { createLogger } from '../utils/logger.js';
import * as schema from './schema.js';

const log = createLogger('database');

export type AppDatabase = BetterSQLite3Database<typeof schema>;

let db: AppDatabase | undefined;
let sqlite: Database.Database | undefined;

export function getDb(): AppDatabase {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

export function initDatabase(dbPath = './data/backtester.db'): AppDatabase {
  log.info({ path: dbPath }, 'Initializing database');

  closeDatabase();
  sqlite = new Database(dbPath);

  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('busy_timeout = 5000');
  sqlite.pragma('synchronous = NORMAL');

  createTables(sqlite);

  db = drizzle(sqlite, { schema });
  log.info('Database initialized');
  return db;
}

export function closeDatabase(): void {
  if (sqlite) {
    sqlite.close();
    sqlite = undefined;
    db = undefined;
  }
}

function createTables(connection: Database.Database): void {
  connection.exec(`
    CREATE TABLE IF NOT EXISTS strategies (
      name TEXT PRIMARY KEY,
      config TEXT NOT NULL,
      createdAt TEXT NOT NULL,
      updatedAt TEXT
    );
  `);

  log.debug('All tables created/verified');
}

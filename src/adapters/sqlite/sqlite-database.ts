import Database from 'better-sqlite3';
import type { Logger } from '../../application/ports/driven/logger-port.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    email TEXT NOT NULL UNIQUE,
    age INTEGER NOT NULL CHECK (age >= 0 AND age <= 150),
    bio TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_users_name ON users(name);
`;

/**
 * Abre o banco SQLite e garante que a tabela users existe.
 * Use ':memory:' para um banco descartável (testes).
 */
export function openDatabase(path: string, logger: Logger): Database.Database {
  const db = new Database(path);

  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(SCHEMA);

  logger.info({ path }, 'Banco SQLite inicializado');
  return db;
}

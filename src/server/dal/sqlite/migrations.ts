import type Database from 'better-sqlite3';
import { z } from 'zod';
import { SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';

const versionRowSchema = z.object({ version: z.string() }).optional();

export function applySqliteMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at_utc TEXT NOT NULL
    );
  `);

  const exists = versionRowSchema.parse(
    db.prepare('SELECT version FROM schema_migrations WHERE version = ? LIMIT 1').get(SCHEMA_VERSION)
  );

  if (exists) {
    return;
  }

  db.exec(SCHEMA_SQL);

  db.prepare('INSERT INTO schema_migrations(version, applied_at_utc) VALUES(?, ?)').run(
    SCHEMA_VERSION,
    new Date().toISOString()
  );
}

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';

export type InboxDatabase = BetterSQLite3Database;

const IN_MEMORY = ':memory:';

export function findMigrationsFolder(): string {
  const startDir = path.dirname(fileURLToPath(import.meta.url));
  let rootDir = startDir;
  while (!fs.existsSync(path.join(rootDir, 'package.json'))) {
    const parent = path.dirname(rootDir);
    if (parent === rootDir) {
      rootDir = process.cwd();
      break;
    }
    rootDir = parent;
  }
  const migrationsFolder = path.join(rootDir, 'db', 'migrations');
  if (!fs.existsSync(migrationsFolder)) {
    throw new Error(`Migrations folder not found at ${migrationsFolder}`);
  }
  return migrationsFolder;
}

export function listMigrationFiles(migrationsFolder: string): string[] {
  return fs
    .readdirSync(migrationsFolder)
    .filter((file) => file.endsWith('.sql'))
    .sort();
}

function applyMigrations(
  sqlite: Database.Database,
  migrationsFolder: string,
): number {
  sqlite
    .prepare(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
        name TEXT PRIMARY KEY,
        applied_at TEXT NOT NULL
      )`,
    )
    .run();

  const applied = new Set(
    (
      sqlite.prepare('SELECT name FROM schema_migrations').all() as {
        name: string;
      }[]
    ).map((row) => row.name),
  );

  const record = sqlite.prepare(
    'INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)',
  );
  let count = 0;
  for (const file of listMigrationFiles(migrationsFolder)) {
    if (applied.has(file)) {
      continue;
    }
    const statements = fs.readFileSync(
      path.join(migrationsFolder, file),
      'utf8',
    );
    sqlite.transaction(() => {
      sqlite.exec(statements);
      record.run(file, new Date().toISOString());
    })();
    count += 1;
  }
  return count;
}

export function initDatabase(databasePath: string) {
  const inMemory = databasePath === IN_MEMORY;
  const resolved = inMemory ? IN_MEMORY : path.resolve(databasePath);
  if (!inMemory) {
    const dir = path.dirname(resolved);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const migrationsFolder = findMigrationsFolder();
  const sqlite = new Database(resolved);
  if (!inMemory) {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  const appliedNow = applyMigrations(sqlite, migrationsFolder);
  const db = drizzle(sqlite);

  if (process.env.NODE_ENV !== 'production' && !inMemory) {
    const rows = sqlite
      .prepare('SELECT COUNT(*) as count FROM schema_migrations')
      .get() as { count: number };
    console.log(
      `Migrations checked: ${rows.count} applied (${appliedNow} new) in ${resolved}`,
    );
  }

  return { db, sqlite };
}

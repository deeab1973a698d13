import Database from "better-sqlite3";

// ---------------------------------------------------------------------------
// SQLite singleton
// ---------------------------------------------------------------------------

let db: Database.Database | null = null;

export function openDb(path: string): Database.Database {
  const conn = new Database(path);

  // Pragmas
  conn.pragma("journal_mode = WAL");
  conn.pragma("busy_timeout = 5000");
  conn.pragma("synchronous = NORMAL");

  // Schema: one row per `<cluster_key>:<part>` key, value is JSON text
  conn.exec(`
    CREATE TABLE IF NOT EXISTS snapshots (
      key         TEXT PRIMARY KEY,
      value       TEXT NOT NULL,
      updated_at  INTEGER NOT NULL
    );
  `);

  return conn;
}

export function getDb(path = process.env.SQLITE_PATH ?? "./yarn-fleet-monitor.sqlite"): Database.Database {
  if (db) return db;
  db = openDb(path);
  console.log(`[db] SQLite initialized at ${path}`);
  return db;
}

export function closeDb(): void {
  if (!db) return;
  db.close();
  db = null;
}

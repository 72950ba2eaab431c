import type Database from 'better-sqlite3';

interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
}

const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: (db) => {
      // Documents table - one row per distinct content (keyed by sha256)
      db.prepare(`
        CREATE TABLE IF NOT EXISTS documents (
          digest TEXT PRIMARY KEY,
          store_relpath TEXT NOT NULL,
          byte_size INTEGER NOT NULL,
          first_seen_at INTEGER NOT NULL,
          last_seen_at INTEGER NOT NULL,
          page_count INTEGER,
          title TEXT,
          authors TEXT,
          subject TEXT,
          keywords TEXT,
          text_sample TEXT,
          meta_json TEXT,
          category TEXT,
          category_score REAL,
          category_reason TEXT,
          categorized_at INTEGER
        )
      `).run();

      // Source files table - every path a scan pass has observed
      db.prepare(`
        CREATE TABLE IF NOT EXISTS source_files (
          path TEXT PRIMARY KEY,
          basename TEXT,
          size INTEGER,
          mtime REAL,
          digest TEXT,
          first_seen_at INTEGER NOT NULL,
          last_seen_at INTEGER NOT NULL,
          status TEXT NOT NULL,
          error TEXT,
          FOREIGN KEY (digest) REFERENCES documents(digest)
        )
      `).run();

      db.prepare(`CREATE INDEX IF NOT EXISTS idx_source_files_digest ON source_files(digest)`).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_documents_category ON documents(category)`).run();
    },
  },
  {
    version: 2,
    name: 'add_last_seen_indexes',
    up: (db) => {
      // Both batch passes read in most-recently-seen order
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_documents_last_seen_at ON documents(last_seen_at)`).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_source_files_last_seen_at ON source_files(last_seen_at)`).run();
    },
  },
];

export function runMigrations(db: Database.Database): void {
  db.prepare(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `).run();

  const applied = new Set<number>();
  const rows = db.prepare(`SELECT version FROM schema_migrations`).pluck().all();
  for (const version of rows) {
    if (typeof version === 'number') {
      applied.add(version);
    }
  }

  const record = db.prepare(`
    INSERT INTO schema_migrations (version, name, applied_at)
    VALUES (?, ?, ?)
  `);

  for (const migration of migrations) {
    if (!applied.has(migration.version)) {
      console.log(`[Manifest] Applying migration ${migration.version}: ${migration.name}`);
      const apply = db.transaction(() => {
        migration.up(db);
        record.run(migration.version, migration.name, Date.now());
      });
      apply();
    }
  }
}

export function latestSchemaVersion(): number {
  return migrations[migrations.length - 1].version;
}

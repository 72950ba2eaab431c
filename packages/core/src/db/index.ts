import * as path from 'path';
import * as fs from 'fs';
import Database from 'better-sqlite3';
import { runMigrations } from './migrations';
import {
  DocumentRecordSchema,
  SourceRecordSchema,
  type Categorization,
  type DocumentMetadata,
  type DocumentRecord,
  type SourceRecord,
  type SourceStatus,
} from '../contracts';

export interface SourceUpsert {
  path: string;
  basename: string | null;
  size: number | null;
  mtime: number | null;
  digest: string | null;
  status: SourceStatus;
  error: string | null;
}

export interface DocumentSeen {
  digest: string;
  storeRelativePath: string;
  byteSize: number;
}

export interface ListDocumentsOptions {
  uncategorizedOnly?: boolean;
}

const DOCUMENT_COLUMNS = `
  digest, store_relpath, byte_size, first_seen_at, last_seen_at,
  page_count, title, authors, subject, keywords, text_sample, meta_json,
  category, category_score, category_reason, categorized_at
`;

const SOURCE_COLUMNS = `
  path, basename, size, mtime, digest, first_seen_at, last_seen_at, status, error
`;

/**
 * Persistent index of documents and the source paths they were seen at.
 *
 * Writes outside an explicit transaction commit immediately. The batch passes
 * wrap their work in {@link Manifest.runInTransaction}.
 */
export class Manifest {
  private db: InstanceType<typeof Database> | null = null;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
    this.init();
  }

  private init(): void {
    const dir = path.dirname(this.dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');

    runMigrations(this.db);
  }

  private ensureReady(): InstanceType<typeof Database> {
    if (!this.db) {
      throw new Error('Manifest is closed');
    }
    return this.db;
  }

  get path(): string {
    return this.dbPath;
  }

  // ============================================================================
  // Transactions
  // ============================================================================

  begin(): void {
    this.ensureReady().exec('BEGIN');
  }

  commit(): void {
    this.ensureReady().exec('COMMIT');
  }

  rollback(): void {
    const db = this.ensureReady();
    if (db.inTransaction) {
      db.exec('ROLLBACK');
    }
  }

  get inTransaction(): boolean {
    return this.ensureReady().inTransaction;
  }

  /**
   * Runs `work` inside one transaction: committed when it resolves, rolled back when it throws.
   */
  async runInTransaction<T>(work: () => Promise<T>): Promise<T> {
    this.begin();
    try {
      const result = await work();
      this.commit();
      return result;
    } catch (error) {
      this.rollback();
      throw error;
    }
  }

  // ============================================================================
  // Source files
  // ============================================================================

  async getSource(sourcePath: string): Promise<SourceRecord | undefined> {
    const db = this.ensureReady();
    const row = db.prepare(`SELECT ${SOURCE_COLUMNS} FROM source_files WHERE path = ?`).get(sourcePath);
    return row === undefined ? undefined : SourceRecordSchema.parse(row);
  }

  async touchSourceSeen(sourcePath: string, seenAt: number): Promise<void> {
    const db = this.ensureReady();
    db.prepare(`UPDATE source_files SET last_seen_at = ? WHERE path = ?`).run(seenAt, sourcePath);
  }

  /**
   * Inserts or replaces the observation for a path. `first_seen_at` survives updates.
   */
  async upsertSource(source: SourceUpsert, seenAt: number): Promise<void> {
    const db = this.ensureReady();
    db.prepare(`
      INSERT INTO source_files (path, basename, size, mtime, digest, first_seen_at, last_seen_at, status, error)
      VALUES (@path, @basename, @size, @mtime, @digest, @seenAt, @seenAt, @status, @error)
      ON CONFLICT(path) DO UPDATE SET
        basename = excluded.basename,
        size = excluded.size,
        mtime = excluded.mtime,
        digest = excluded.digest,
        last_seen_at = excluded.last_seen_at,
        status = excluded.status,
        error = excluded.error
    `).run({ ...source, seenAt });
  }

  async getLatestSourceForDigest(digest: string): Promise<SourceRecord | undefined> {
    const db = this.ensureReady();
    const row = db.prepare(`
      SELECT ${SOURCE_COLUMNS}
      FROM source_files
      WHERE digest = ?
      ORDER BY last_seen_at DESC, path ASC
      LIMIT 1
    `).get(digest);
    return row === undefined ? undefined : SourceRecordSchema.parse(row);
  }

  /**
   * Most recently seen source per digest, in one query.
   */
  async getLatestSourcesByDigest(): Promise<Map<string, SourceRecord>> {
    const db = this.ensureReady();
    const rows = db.prepare(`
      SELECT ${SOURCE_COLUMNS}
      FROM source_files
      WHERE digest IS NOT NULL
      ORDER BY last_seen_at DESC, path ASC
    `).all();

    const latest = new Map<string, SourceRecord>();
    for (const row of rows) {
      const source = SourceRecordSchema.parse(row);
      if (source.digest !== null && !latest.has(source.digest)) {
        latest.set(source.digest, source);
      }
    }
    return latest;
  }

  async countSources(status?: SourceStatus): Promise<number> {
    const db = this.ensureReady();
    const count = status === undefined
      ? db.prepare(`SELECT COUNT(*) FROM source_files`).pluck().get()
      : db.prepare(`SELECT COUNT(*) FROM source_files WHERE status = ?`).pluck().get(status);
    return typeof count === 'number' ? count : 0;
  }

  // ============================================================================
  // Documents
  // ============================================================================

  async getDocument(digest: string): Promise<DocumentRecord | undefined> {
    const db = this.ensureReady();
    const row = db.prepare(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE digest = ?`).get(digest);
    return row === undefined ? undefined : DocumentRecordSchema.parse(row);
  }

  /**
   * Creates the document on first sight, otherwise refreshes its location and last_seen_at.
   */
  async upsertDocumentSeen(doc: DocumentSeen, seenAt: number): Promise<void> {
    const db = this.ensureReady();
    db.prepare(`
      INSERT INTO documents (digest, store_relpath, byte_size, first_seen_at, last_seen_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(digest) DO UPDATE SET
        store_relpath = excluded.store_relpath,
        byte_size = excluded.byte_size,
        last_seen_at = excluded.last_seen_at
    `).run(doc.digest, doc.storeRelativePath, doc.byteSize, seenAt, seenAt);
  }

  async updateDocumentMetadata(digest: string, metadata: DocumentMetadata): Promise<void> {
    const db = this.ensureReady();
    db.prepare(`
      UPDATE documents SET
        page_count = ?,
        title = ?,
        authors = ?,
        subject = ?,
        keywords = ?,
        text_sample = ?,
        meta_json = ?
      WHERE digest = ?
    `).run(
      metadata.pageCount,
      metadata.title,
      metadata.authors,
      metadata.subject,
      metadata.keywords,
      metadata.textSample,
      metadata.metaJson,
      digest
    );
  }

  async updateDocumentCategory(digest: string, result: Categorization, categorizedAt: number): Promise<void> {
    const db = this.ensureReady();
    db.prepare(`
      UPDATE documents SET
        category = ?,
        category_score = ?,
        category_reason = ?,
        categorized_at = ?
      WHERE digest = ?
    `).run(result.category, result.score, result.reason, categorizedAt, digest);
  }

  /**
   * Documents ordered most recently seen first, digest ascending on ties.
   */
  async listDocuments(options: ListDocumentsOptions = {}): Promise<DocumentRecord[]> {
    const db = this.ensureReady();
    const where = options.uncategorizedOnly ? "WHERE category IS NULL OR category = ''" : '';
    const rows = db.prepare(`
      SELECT ${DOCUMENT_COLUMNS}
      FROM documents
      ${where}
      ORDER BY last_seen_at DESC, digest ASC
    `).all();
    return rows.map(row => DocumentRecordSchema.parse(row));
  }

  async countDocuments(): Promise<number> {
    const db = this.ensureReady();
    const count = db.prepare(`SELECT COUNT(*) FROM documents`).pluck().get();
    return typeof count === 'number' ? count : 0;
  }

  close(): void {
    if (this.db) {
      if (this.db.inTransaction) {
        this.db.exec('ROLLBACK');
      }
      this.db.close();
      this.db = null;
    }
  }
}

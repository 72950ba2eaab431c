import * as fs from 'fs';
import * as path from 'path';
import type { Manifest } from '../db';
import type { ContentStore, IngestResult } from '../store/content-store';
import type { Finder } from './finder';
import type { ScanProgress } from '../contracts';
import { errorMessage } from '../errors';

// Progress reporting interval (files)
const PROGRESS_INTERVAL = 100;

export interface ScanStats {
  discovered: number;
  skippedUnchanged: number;
  copiedNew: number;
  dedupedExisting: number;
  errors: number;
}

export interface ScanOptions {
  roots: string[];
  excludePrefixes: string[];
  limit?: number;
  /** Only discover; nothing is hashed, copied or recorded. */
  dryRun?: boolean;
  onProgress?: (progress: ScanProgress) => void;
  now?: () => number;
}

export function emptyScanStats(): ScanStats {
  return { discovered: 0, skippedUnchanged: 0, copiedNew: 0, dedupedExisting: 0, errors: 0 };
}

/**
 * One scan pass: finder → stat → change detection → vault → manifest.
 *
 * Per-file failures are recorded on the source row and counted; they never
 * stop the pass. The caller owns the transaction.
 */
export class Scanner {
  constructor(
    private manifest: Manifest,
    private store: ContentStore,
    private finder: Finder
  ) {}

  async scan(options: ScanOptions): Promise<ScanStats> {
    const stats = emptyScanStats();
    const seenAt = (options.now ?? Date.now)();
    const report = options.onProgress;

    for await (const sourcePath of this.finder.find(options.roots, options.excludePrefixes, options.limit)) {
      stats.discovered++;

      if (report && stats.discovered % PROGRESS_INTERVAL === 0) {
        report({
          status: 'scanning',
          currentFile: sourcePath,
          filesFound: stats.discovered,
          message: `Scanned ${stats.discovered} files...`,
        });
      }

      if (options.dryRun) {
        console.log(`[Scanner] dry-run: would copy ${sourcePath}`);
        continue;
      }

      await this.scanOne(sourcePath, seenAt, stats);
    }

    report?.({
      status: 'done',
      filesFound: stats.discovered,
      message: `Scan complete: ${stats.copiedNew} new, ${stats.dedupedExisting} deduped, ` +
        `${stats.skippedUnchanged} unchanged, ${stats.errors} errors`,
    });

    return stats;
  }

  private async scanOne(sourcePath: string, seenAt: number, stats: ScanStats): Promise<void> {
    const basename = path.basename(sourcePath);

    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(sourcePath);
    } catch (error) {
      stats.errors++;
      console.warn(`[Scanner] Cannot stat ${sourcePath}: ${errorMessage(error)}`);
      await this.manifest.upsertSource(
        { path: sourcePath, basename, size: null, mtime: null, digest: null, status: 'unreadable', error: errorMessage(error) },
        seenAt
      );
      return;
    }

    const existing = await this.manifest.getSource(sourcePath);
    if (existing && existing.status === 'ok' && existing.size === stat.size && existing.mtime === stat.mtimeMs) {
      stats.skippedUnchanged++;
      await this.manifest.touchSourceSeen(sourcePath, seenAt);
      return;
    }

    let ingested: IngestResult;
    try {
      ingested = await this.store.ingest(sourcePath);
    } catch (error) {
      stats.errors++;
      console.warn(`[Scanner] ${errorMessage(error)}`);
      await this.manifest.upsertSource(
        { path: sourcePath, basename, size: stat.size, mtime: stat.mtimeMs, digest: null, status: 'error', error: errorMessage(error) },
        seenAt
      );
      return;
    }

    await this.manifest.upsertDocumentSeen(
      { digest: ingested.digest, storeRelativePath: ingested.storeRelativePath, byteSize: ingested.bytesWritten },
      seenAt
    );
    await this.manifest.upsertSource(
      { path: sourcePath, basename, size: stat.size, mtime: stat.mtimeMs, digest: ingested.digest, status: 'ok', error: null },
      seenAt
    );

    if (ingested.wasNewCopy) {
      stats.copiedNew++;
    } else {
      stats.dedupedExisting++;
    }
  }
}

import * as path from 'path';
import * as fs from 'fs';
import type { DocumentRecord, SourceRecord } from '../contracts';
import { LinkCreationError, errorCode, errorMessage } from '../errors';
import { NAME_FALLBACK_DIGEST_LENGTH, VIEW_DIGEST_PREFIX_LENGTH } from '../planner/constants';
import { safeFilename } from './safe-filename';

/**
 * How an entry in the categorized view points at its vault file.
 */
export type LinkMode = 'symlink' | 'hardlink' | 'copy';

/**
 * Display name for a digest, without the .pdf extension.
 */
export type NameResolver = (digest: string) => string;

export type ViewDocument = Pick<DocumentRecord, 'digest' | 'store_relpath' | 'category'>;

export interface RebuildOptions {
  viewRoot: string;
  /** Root that `store_relpath` is relative to */
  libraryRoot: string;
  linkMode: LinkMode;
  /** Remove everything under viewRoot first */
  refresh: boolean;
  defaultCategory: string;
  nameResolver: NameResolver;
}

export interface RebuildResult {
  byCategory: Record<string, number>;
  totalLinks: number;
}

/**
 * Title, else the latest source basename without `.pdf`, else a short digest.
 */
export function createNameResolver(
  documents: Array<Pick<DocumentRecord, 'digest' | 'title'>>,
  latestSources: Map<string, Pick<SourceRecord, 'basename'>>
): NameResolver {
  const titles = new Map(documents.map((doc) => [doc.digest, doc.title ?? '']));

  return (digest: string): string => {
    const title = titles.get(digest) ?? '';
    if (title.trim()) return title;

    const basename = latestSources.get(digest)?.basename;
    if (basename) {
      return basename.toLowerCase().endsWith('.pdf') ? basename.slice(0, -4) : basename;
    }
    return digest.slice(0, NAME_FALLBACK_DIGEST_LENGTH);
  };
}

// ============================================================================
// Linkers
// ============================================================================

async function replaceEntry(linkPath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(linkPath), { recursive: true });
  await fs.promises.rm(linkPath, { force: true, recursive: true });
}

async function createSymlink(target: string, linkPath: string): Promise<void> {
  await replaceEntry(linkPath);
  await fs.promises.symlink(path.relative(path.dirname(linkPath), target), linkPath);
}

async function createHardlink(target: string, linkPath: string): Promise<void> {
  await replaceEntry(linkPath);
  await fs.promises.link(target, linkPath);
}

async function createCopy(target: string, linkPath: string): Promise<void> {
  await replaceEntry(linkPath);
  await fs.promises.copyFile(target, linkPath);
  const stats = await fs.promises.stat(target);
  await fs.promises.utimes(linkPath, stats.atime, stats.mtime);
}

function linkFailure(mode: LinkMode, target: string, linkPath: string, error: unknown): LinkCreationError {
  return new LinkCreationError(`Could not create ${mode} ${linkPath} -> ${target}: ${errorMessage(error)}`, {
    mode,
    target,
    linkPath,
    cause: error,
  });
}

// ============================================================================
// View builder
// ============================================================================

/**
 * Materializes `<viewRoot>/<Category>/<name>__<digest8>.pdf` for every document.
 *
 * The view is derived state: with the same documents in the same order a
 * rebuild produces the same entries. Names are claimed in document order, so
 * the suffix `__2`, `__3`, ... only depends on earlier documents of this run.
 */
export class ViewBuilder {
  async rebuild(documents: ViewDocument[], options: RebuildOptions): Promise<RebuildResult> {
    const { viewRoot, libraryRoot, linkMode, defaultCategory, nameResolver } = options;
    await fs.promises.mkdir(viewRoot, { recursive: true });

    if (options.refresh) {
      await this.clear(viewRoot);
    }

    const claimed = new Set<string>();
    const byCategory: Record<string, number> = {};
    let totalLinks = 0;

    for (const doc of documents) {
      const category = (doc.category ?? '').trim() || defaultCategory;
      const categoryDir = path.join(viewRoot, safeFilename(category));

      let baseName = safeFilename(nameResolver(doc.digest));
      if (!baseName.toLowerCase().endsWith('.pdf')) {
        baseName += '.pdf';
      }
      const stem = baseName.slice(0, -4);
      const prefix = doc.digest.slice(0, VIEW_DIGEST_PREFIX_LENGTH);

      let linkPath = path.join(categoryDir, `${stem}__${prefix}.pdf`);
      for (let n = 2; claimed.has(linkPath); n++) {
        linkPath = path.join(categoryDir, `${stem}__${prefix}__${n}.pdf`);
      }
      claimed.add(linkPath);

      await this.link(linkMode, path.join(libraryRoot, doc.store_relpath), linkPath);
      byCategory[category] = (byCategory[category] ?? 0) + 1;
      totalLinks++;
    }

    console.log(`[ViewBuilder] Linked ${totalLinks} documents into ${Object.keys(byCategory).length} categories`);
    return { byCategory, totalLinks };
  }

  private async clear(viewRoot: string): Promise<void> {
    const entries = await fs.promises.readdir(viewRoot);
    for (const entry of entries) {
      // rm on a symlink removes the link, never what it points at
      await fs.promises.rm(path.join(viewRoot, entry), { recursive: true, force: true });
    }
  }

  private async link(mode: LinkMode, target: string, linkPath: string): Promise<void> {
    switch (mode) {
      case 'symlink':
        try {
          await createSymlink(target, linkPath);
        } catch (error) {
          throw linkFailure(mode, target, linkPath, error);
        }
        return;
      case 'hardlink':
        try {
          await createHardlink(target, linkPath);
        } catch (error) {
          if (errorCode(error) !== 'EXDEV') {
            throw linkFailure(mode, target, linkPath, error);
          }
          console.warn(`[ViewBuilder] Cross-device hardlink for ${linkPath}, using a symlink`);
          await this.link('symlink', target, linkPath);
        }
        return;
      case 'copy':
        try {
          await createCopy(target, linkPath);
        } catch (error) {
          throw linkFailure(mode, target, linkPath, error);
        }
        return;
      default: {
        const unreachable: never = mode;
        throw new LinkCreationError(`Unknown link mode: ${String(unreachable)}`);
      }
    }
  }
}

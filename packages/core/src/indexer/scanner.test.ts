import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Library } from '../library';
import type { Manifest } from '../db';
import { ContentStore } from '../store/content-store';
import { WalkFinder, type Finder } from './finder';
import { Scanner } from './scanner';

describe('Scanner', () => {
  let tmpRoot: string;
  let docsDir: string;
  let library: Library;
  let manifest: Manifest;

  beforeEach(async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'pdfshelf-scanner-'));
    docsDir = path.join(tmpRoot, 'docs');
    await fs.mkdir(path.join(docsDir, 'nested'), { recursive: true });
    await fs.writeFile(path.join(docsDir, 'a.pdf'), 'alpha');
    await fs.writeFile(path.join(docsDir, 'nested', 'a-copy.pdf'), 'alpha');
    await fs.writeFile(path.join(docsDir, 'c.pdf'), 'gamma');

    library = new Library(path.join(tmpRoot, 'lib'));
    await library.ensureInitialized();
    manifest = library.openManifest();
  });

  afterEach(async () => {
    manifest.close();
    await fs.rm(tmpRoot, { recursive: true, force: true });
  });

  const makeScanner = (finder: Finder = new WalkFinder()) =>
    new Scanner(manifest, new ContentStore(library), finder);

  it('dedupes identical content into one document with two sources', async () => {
    const stats = await makeScanner().scan({ roots: [docsDir], excludePrefixes: [], now: () => 1000 });

    expect(stats).toEqual({ discovered: 3, skippedUnchanged: 0, copiedNew: 2, dedupedExisting: 1, errors: 0 });
    expect(await manifest.countDocuments()).toBe(2);

    const original = await manifest.getSource(path.join(docsDir, 'a.pdf'));
    const copy = await manifest.getSource(path.join(docsDir, 'nested', 'a-copy.pdf'));
    expect(original?.status).toBe('ok');
    expect(copy?.digest).toBe(original?.digest);
  });

  it('skips unchanged files on a second pass', async () => {
    const scanner = makeScanner();
    await scanner.scan({ roots: [docsDir], excludePrefixes: [], now: () => 1000 });
    const second = await scanner.scan({ roots: [docsDir], excludePrefixes: [], now: () => 2000 });

    expect(second).toEqual({ discovered: 3, skippedUnchanged: 3, copiedNew: 0, dedupedExisting: 0, errors: 0 });
    const source = await manifest.getSource(path.join(docsDir, 'c.pdf'));
    expect(source?.first_seen_at).toBe(1000);
    expect(source?.last_seen_at).toBe(2000);
  });

  it('re-ingests a file whose size changed', async () => {
    const scanner = makeScanner();
    await scanner.scan({ roots: [docsDir], excludePrefixes: [], now: () => 1000 });
    await fs.writeFile(path.join(docsDir, 'c.pdf'), 'gamma, revised');

    const second = await scanner.scan({ roots: [docsDir], excludePrefixes: [], now: () => 2000 });

    expect(second).toEqual({ discovered: 3, skippedUnchanged: 2, copiedNew: 1, dedupedExisting: 0, errors: 0 });
    expect(await manifest.countDocuments()).toBe(3);
  });

  it('records unreadable and failed sources without stopping', async () => {
    const missing = path.join(docsDir, 'gone.pdf');
    const directory = path.join(docsDir, 'folder.pdf');
    await fs.mkdir(directory);
    const finder: Finder = { find: () => [missing, directory, path.join(docsDir, 'c.pdf')] };

    const stats = await makeScanner(finder).scan({ roots: [docsDir], excludePrefixes: [], now: () => 1000 });

    expect(stats).toEqual({ discovered: 3, skippedUnchanged: 0, copiedNew: 1, dedupedExisting: 0, errors: 2 });
    expect((await manifest.getSource(missing))?.status).toBe('unreadable');
    const failed = await manifest.getSource(directory);
    expect(failed?.status).toBe('error');
    expect(failed?.digest).toBeNull();
  });

  it('only discovers in dry-run mode', async () => {
    const stats = await makeScanner().scan({ roots: [docsDir], excludePrefixes: [], dryRun: true });

    expect(stats).toEqual({ discovered: 3, skippedUnchanged: 0, copiedNew: 0, dedupedExisting: 0, errors: 0 });
    expect(await manifest.countSources()).toBe(0);
    expect(await fs.readdir(library.vaultDir)).toEqual([]);
  });

  it('reports completion through the progress callback', async () => {
    const messages: string[] = [];
    await makeScanner().scan({
      roots: [docsDir],
      excludePrefixes: [],
      onProgress: progress => messages.push(`${progress.status}:${progress.filesFound}`),
    });

    expect(messages).toEqual(['done:3']);
  });
});

import * as fsSync from 'fs';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LinkCreationError } from '../errors';
import { safeFilename } from './safe-filename';
import { ViewBuilder, createNameResolver, type LinkMode, type ViewDocument } from './view-builder';

const DIGEST_1 = 'aaaaaaaa' + '1'.repeat(56);
const DIGEST_2 = 'aaaaaaaa' + '2'.repeat(56);
const DIGEST_3 = 'b'.repeat(64);

function relpath(digest: string): string {
  return path.join('vault', digest.slice(0, 2), digest.slice(2, 4), `${digest}.pdf`);
}

const documents: ViewDocument[] = [
  { digest: DIGEST_1, store_relpath: relpath(DIGEST_1), category: 'Receipts & Invoices' },
  { digest: DIGEST_2, store_relpath: relpath(DIGEST_2), category: 'Receipts & Invoices' },
  { digest: DIGEST_3, store_relpath: relpath(DIGEST_3), category: null },
];

const nameResolver = createNameResolver(
  [
    { digest: DIGEST_1, title: 'Invoice 2025' },
    { digest: DIGEST_2, title: 'Invoice 2025' },
    { digest: DIGEST_3, title: '   ' },
  ],
  new Map([[DIGEST_3, { basename: 'scan.PDF' }]])
);

async function listTree(root: string): Promise<string[]> {
  const entries: string[] = [];
  for (const category of (await fs.readdir(root)).sort()) {
    for (const name of (await fs.readdir(path.join(root, category))).sort()) {
      entries.push(`${category}/${name}`);
    }
  }
  return entries;
}

// Entry name to link target, or to file contents for regular files
async function readTree(root: string): Promise<Record<string, string>> {
  const tree: Record<string, string> = {};
  for (const entry of await listTree(root)) {
    const full = path.join(root, entry);
    tree[entry] = (await fs.lstat(full)).isSymbolicLink()
      ? `-> ${await fs.readlink(full)}`
      : await fs.readFile(full, 'utf-8');
  }
  return tree;
}

describe('ViewBuilder', () => {
  let libraryRoot: string;
  let viewRoot: string;
  const builder = new ViewBuilder();

  const rebuild = (linkMode: LinkMode, refresh = true, docs = documents) =>
    builder.rebuild(docs, { viewRoot, libraryRoot, linkMode, refresh, defaultCategory: 'Unsorted', nameResolver });

  beforeEach(async () => {
    libraryRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'pdfshelf-view-'));
    viewRoot = path.join(libraryRoot, 'categorized');
    for (const doc of documents) {
      const file = path.join(libraryRoot, doc.store_relpath);
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, `content of ${doc.digest.slice(-1)}`);
    }
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(libraryRoot, { recursive: true, force: true });
  });

  it('links every document under its sanitized category with deterministic suffixes', async () => {
    const result = await rebuild('symlink');

    expect(result).toEqual({ byCategory: { 'Receipts & Invoices': 2, Unsorted: 1 }, totalLinks: 3 });
    expect(await listTree(viewRoot)).toEqual([
      'Receipts _ Invoices/Invoice 2025__aaaaaaaa.pdf',
      'Receipts _ Invoices/Invoice 2025__aaaaaaaa__2.pdf',
      'Unsorted/scan__bbbbbbbb.pdf',
    ]);

    const link = path.join(viewRoot, 'Receipts _ Invoices', 'Invoice 2025__aaaaaaaa.pdf');
    expect(await fs.readlink(link)).toBe(path.join('..', '..', relpath(DIGEST_1)));
    expect(await fs.readFile(link, 'utf-8')).toBe('content of 1');
  });

  it('reproduces the same view on a second rebuild', async () => {
    await rebuild('symlink');
    const first = await readTree(viewRoot);

    await rebuild('symlink');

    expect(await readTree(viewRoot)).toEqual(first);
    expect(first['Unsorted/scan__bbbbbbbb.pdf']).toBe(`-> ${path.join('..', '..', relpath(DIGEST_3))}`);
  });

  it('reproduces the same copied contents on a second rebuild', async () => {
    await rebuild('copy');
    const first = await readTree(viewRoot);

    await rebuild('copy');

    expect(await readTree(viewRoot)).toEqual(first);
    expect(first).toEqual({
      'Receipts _ Invoices/Invoice 2025__aaaaaaaa.pdf': 'content of 1',
      'Receipts _ Invoices/Invoice 2025__aaaaaaaa__2.pdf': 'content of 2',
      'Unsorted/scan__bbbbbbbb.pdf': 'content of b',
    });
  });

  it('replaces its own entries when not refreshing', async () => {
    await rebuild('symlink');
    await rebuild('symlink', false);

    expect(await listTree(viewRoot)).toHaveLength(3);
  });

  it('clears stale entries on refresh and keeps them otherwise', async () => {
    await fs.mkdir(path.join(viewRoot, 'Old'), { recursive: true });
    await fs.writeFile(path.join(viewRoot, 'Old', 'stale.pdf'), 'stale');

    await rebuild('symlink', false);
    expect(await listTree(viewRoot)).toContain('Old/stale.pdf');

    await rebuild('symlink', true);
    expect(await listTree(viewRoot)).not.toContain('Old/stale.pdf');
  });

  it('copies files in copy mode', async () => {
    await rebuild('copy');

    const entry = path.join(viewRoot, 'Unsorted', 'scan__bbbbbbbb.pdf');
    const stats = await fs.lstat(entry);
    expect(stats.isSymbolicLink()).toBe(false);
    expect(stats.isFile()).toBe(true);
    expect(await fs.readFile(entry, 'utf-8')).toBe('content of b');
  });

  it('shares the inode in hardlink mode', async () => {
    await rebuild('hardlink');

    const entry = await fs.stat(path.join(viewRoot, 'Unsorted', 'scan__bbbbbbbb.pdf'));
    const vault = await fs.stat(path.join(libraryRoot, relpath(DIGEST_3)));
    expect(entry.ino).toBe(vault.ino);
  });

  it('falls back to a symlink when a hardlink would cross devices', async () => {
    vi.spyOn(fsSync.promises, 'link').mockRejectedValue(
      Object.assign(new Error('cross-device link not permitted'), { code: 'EXDEV' })
    );

    const result = await rebuild('hardlink');

    expect(result.totalLinks).toBe(3);
    const entry = path.join(viewRoot, 'Unsorted', 'scan__bbbbbbbb.pdf');
    expect((await fs.lstat(entry)).isSymbolicLink()).toBe(true);
    expect(await fs.readFile(entry, 'utf-8')).toBe('content of b');
  });

  it('fails the run when a copy cannot be made', async () => {
    const missing: ViewDocument = { digest: 'c'.repeat(64), store_relpath: 'vault/cc/cc/missing.pdf', category: 'Tax' };

    await expect(rebuild('copy', true, [missing])).rejects.toBeInstanceOf(LinkCreationError);
  });

  it('fails the run when a hardlink fails for a reason other than crossing devices', async () => {
    const missing: ViewDocument = { digest: 'c'.repeat(64), store_relpath: 'vault/cc/cc/missing.pdf', category: 'Tax' };

    await expect(rebuild('hardlink', true, [missing])).rejects.toMatchObject({ code: 'link' });
  });
});

describe('createNameResolver', () => {
  it('prefers title, then basename, then a short digest', () => {
    const resolve = createNameResolver(
      [
        { digest: DIGEST_1, title: 'Annual Report' },
        { digest: DIGEST_2, title: null },
      ],
      new Map([[DIGEST_2, { basename: 'notes.pdf' }]])
    );

    expect(resolve(DIGEST_1)).toBe('Annual Report');
    expect(resolve(DIGEST_2)).toBe('notes');
    expect(resolve(DIGEST_3)).toBe('bbbbbbbbbbbb');
  });
});

describe('safeFilename', () => {
  it('replaces disallowed characters and collapses whitespace', () => {
    expect(safeFilename('Receipts & Invoices')).toBe('Receipts _ Invoices');
    expect(safeFilename('  a   b  c ')).toBe('a b c');
    expect(safeFilename('tab\there')).toBe('tab_here');
    expect(safeFilename('a/../b')).toBe('a_.._b');
    expect(safeFilename('Über')).toBe('_ber');
  });

  it('never returns an empty or dot-only name', () => {
    expect(safeFilename('')).toBe('untitled');
    expect(safeFilename('   ')).toBe('untitled');
    expect(safeFilename('..')).toBe('untitled');
  });

  it('caps the length', () => {
    expect(safeFilename('x'.repeat(200))).toBe('x'.repeat(160));
    expect(safeFilename('x'.repeat(159) + ' y')).toBe('x'.repeat(159));
  });
});

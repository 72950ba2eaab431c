import * as crypto from 'crypto';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { CategorizeProgress } from '../contracts';
import { Library } from '../library';
import { CompletionTransportError, ConfigurationError } from '../errors';
import { NoopMetadataExtractor } from '../extractors/types';
import type { CompletionProvider, CompletionRequest } from '../agents/llm-client';
import { categorizeLibrary, scanLibrary } from './index';

const INVOICE_BODY = 'invoice body';
const MANUAL_BODY = 'manual body';

function sha256(text: string): string {
  return crypto.createHash('sha256').update(text).digest('hex');
}

class ScriptedProvider implements CompletionProvider {
  readonly name = 'stub';
  readonly prompts: string[] = [];

  constructor(private answer: (prompt: string) => string) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.prompts.push(request.prompt);
    return this.answer(request.prompt);
  }
}

class FailingProvider implements CompletionProvider {
  readonly name = 'stub';

  async complete(): Promise<string> {
    throw new CompletionTransportError('Network error calling http://localhost:8000/chat/completions: refused');
  }
}

describe('catalog', () => {
  let root: string;
  let library: Library;
  let configPath: string;

  const scan = (extra: { dryRun?: boolean } = {}) =>
    scanLibrary(library, { roots: [root], excludePrefixes: [], method: 'walk', ...extra }, { homeDir: root });

  const deps = (completionProvider: CompletionProvider) => ({
    metadataExtractor: new NoopMetadataExtractor(),
    completionProvider,
    env: {},
    homeDir: root,
  });

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'pdfshelf-catalog-'));
    await fs.mkdir(path.join(root, 'inbox'));
    await fs.writeFile(path.join(root, 'inbox', 'Invoice_2025.pdf'), INVOICE_BODY);
    await fs.writeFile(path.join(root, 'inbox', 'Widget3000_Manual.pdf'), MANUAL_BODY);

    // Categories without keywords never match, so only the classifier decides
    configPath = path.join(root, 'rules.json');
    await fs.writeFile(
      configPath,
      JSON.stringify({
        default_category: 'Unsorted',
        min_score: 4,
        categories: [{ name: 'Receipts & Invoices' }, { name: 'Manuals & Guides' }],
      })
    );

    // The library lives inside the scanned root on purpose
    library = new Library(path.join(root, 'library'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('scanLibrary', () => {
    it('ingests new files and skips them on an unchanged re-scan', async () => {
      const first = await scan();
      const second = await scan();

      expect(first).toEqual({ discovered: 2, skippedUnchanged: 0, copiedNew: 2, dedupedExisting: 0, errors: 0 });
      expect(second).toEqual({ discovered: 2, skippedUnchanged: 2, copiedNew: 0, dedupedExisting: 0, errors: 0 });
    });

    it('stores duplicate content once', async () => {
      await fs.mkdir(path.join(root, 'inbox', 'copies'));
      await fs.writeFile(path.join(root, 'inbox', 'copies', 'Invoice_2025 (1).pdf'), INVOICE_BODY);

      const stats = await scan();

      expect(stats).toMatchObject({ discovered: 3, copiedNew: 2, dedupedExisting: 1 });
      const manifest = library.openManifest();
      try {
        expect(await manifest.countDocuments()).toBe(2);
        expect(await manifest.countSources('ok')).toBe(3);
      } finally {
        manifest.close();
      }
    });

    it('records nothing in a dry run', async () => {
      const stats = await scan({ dryRun: true });

      expect(stats).toMatchObject({ discovered: 2, copiedNew: 0 });
      const manifest = library.openManifest();
      try {
        expect(await manifest.countSources()).toBe(0);
      } finally {
        manifest.close();
      }
    });
  });

  describe('categorizeLibrary', () => {
    it('classifies through the LLM and builds one directory per category', async () => {
      await scan();
      const provider = new ScriptedProvider((prompt) =>
        prompt.includes('- filename: Invoice_2025.pdf')
          ? '{"category":"Receipts & Invoices","confidence":0.9}'
          : '{"category":"Manuals & Guides","confidence":0.85}'
      );
      const progress: CategorizeProgress[] = [];

      const summary = await categorizeLibrary(
        library,
        { configPath, llm: { mode: 'always' } },
        { ...deps(provider), onProgress: (update) => progress.push(update) }
      );

      expect(summary).toEqual({
        docsCategorized: 2,
        linksCreated: 2,
        llmCalls: 2,
        llmUsed: 2,
        llmFailed: 0,
        byCategory: { 'Receipts & Invoices': 1, 'Manuals & Guides': 1 },
      });
      expect(provider.prompts).toHaveLength(2);

      expect((await fs.readdir(library.categorizedDir)).sort()).toEqual(['Manuals _ Guides', 'Receipts _ Invoices']);
      expect(await fs.readdir(path.join(library.categorizedDir, 'Manuals _ Guides'))).toEqual([
        `Widget3000_Manual__${sha256(MANUAL_BODY).slice(0, 8)}.pdf`,
      ]);
      expect(await fs.readdir(path.join(library.categorizedDir, 'Receipts _ Invoices'))).toEqual([
        `Invoice_2025__${sha256(INVOICE_BODY).slice(0, 8)}.pdf`,
      ]);

      const manifest = library.openManifest();
      try {
        const invoice = await manifest.getDocument(sha256(INVOICE_BODY));
        expect(invoice?.category).toBe('Receipts & Invoices');
        expect(invoice?.category_score).toBeCloseTo(9);
        expect(invoice?.category_reason?.startsWith('llm:stub/qwen3-4b conf=0.90; ')).toBe(true);
      } finally {
        manifest.close();
      }

      expect(progress.at(-1)?.status).toBe('done');
    });

    it('only revisits uncategorized documents but always rebuilds the view', async () => {
      await scan();
      const provider = new ScriptedProvider(() => '{"category":"Manuals & Guides","confidence":0.9}');
      await categorizeLibrary(library, { configPath, llm: { mode: 'always' } }, deps(provider));

      const again = await categorizeLibrary(library, { configPath, llm: { mode: 'always' } }, deps(provider));

      expect(again).toMatchObject({ docsCategorized: 0, llmCalls: 0, linksCreated: 2 });
      expect(provider.prompts).toHaveLength(2);
    });

    it('keeps going when the provider is unreachable', async () => {
      await scan();

      const summary = await categorizeLibrary(library, { configPath, llm: { mode: 'fallback' } }, deps(new FailingProvider()));

      expect(summary).toMatchObject({
        docsCategorized: 2,
        llmCalls: 2,
        llmUsed: 0,
        llmFailed: 2,
        byCategory: { Unsorted: 2 },
      });

      const manifest = library.openManifest();
      try {
        const manual = await manifest.getDocument(sha256(MANUAL_BODY));
        expect(manual?.category_reason).toBe(
          'no rules matched | llm_error:Network error calling http://localhost:8000/chat/completions: refused'
        );
      } finally {
        manifest.close();
      }
    });

    it('categorizes with rules alone when no LLM is configured', async () => {
      await scan();
      await fs.writeFile(
        configPath,
        JSON.stringify({
          default_category: 'Unsorted',
          min_score: 2,
          categories: [{ name: 'Manuals & Guides', filename_keywords_any: ['manual'] }],
        })
      );
      const provider = new ScriptedProvider(() => '{}');

      const summary = await categorizeLibrary(library, { configPath, linkMode: 'copy' }, deps(provider));

      expect(summary.byCategory).toEqual({ 'Manuals & Guides': 1, Unsorted: 1 });
      expect(summary.llmCalls).toBe(0);
      expect(provider.prompts).toHaveLength(0);
    });

    it('rejects a malformed rule set before touching any document', async () => {
      await scan();
      await fs.writeFile(configPath, JSON.stringify({ categories: [{ name: '   ' }] }));

      await expect(
        categorizeLibrary(library, { configPath }, deps(new ScriptedProvider(() => '{}')))
      ).rejects.toBeInstanceOf(ConfigurationError);

      const manifest = library.openManifest();
      try {
        const docs = await manifest.listDocuments({ uncategorizedOnly: true });
        expect(docs).toHaveLength(2);
      } finally {
        manifest.close();
      }
    });
  });
});

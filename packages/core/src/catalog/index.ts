import * as os from 'os';
import * as path from 'path';
import type { Library } from '../library';
import type {
  CategorizeProgress,
  DocumentAttributes,
  DocumentMetadata,
  ScanProgress,
  SourceRecord,
} from '../contracts';
import { ContentStore } from '../store/content-store';
import { Scanner, type ScanStats } from '../indexer/scanner';
import { createFinder, defaultExcludes, defaultScanRoots, type Finder } from '../indexer/finder';
import type { MetadataExtractor } from '../extractors/types';
import { PdfMetadataExtractor } from '../extractors/pdf-extractor';
import { toDocumentMetadata } from '../extractors/extractor-utils';
import { OpenAICompatibleProvider, type CompletionProvider } from '../agents/llm-client';
import { LLMClassifier } from '../agents/llm-classifier';
import { loadCategoryRuleSet, type CategoryRuleSet } from '../planner/category-config';
import { CategorizationEngine, type LLMPolicy } from '../planner/categorization-engine';
import { ruleSetUsesText } from '../planner/rule-scorer';
import { ViewBuilder, createNameResolver } from '../virtual-tree/view-builder';
import {
  CategorizeOptionsSchema,
  ScanOptionsSchema,
  loadLibraryEnv,
  parsePassOptions,
  resolveLlmSettings,
  toPathDisclosure,
  type CategorizeLibraryOptions,
  type EnvSource,
  type ResolvedLlmOptions,
  type ScanLibraryOptions,
} from '../config/settings';

// Progress reporting interval (documents)
const CATEGORIZE_PROGRESS_INTERVAL = 25;

// ============================================================================
// Scan pass
// ============================================================================

export interface ScanDependencies {
  /** Overrides the finder the `method` option would pick */
  finder?: Finder;
  onProgress?: (progress: ScanProgress) => void;
  now?: () => number;
  homeDir?: string;
}

/**
 * Discovers files, copies new content into the vault and records every path.
 * The library root is always excluded so the vault never feeds itself.
 */
export async function scanLibrary(
  library: Library,
  options: ScanLibraryOptions = {},
  deps: ScanDependencies = {}
): Promise<ScanStats> {
  const resolved = parsePassOptions(ScanOptionsSchema, options, 'scan');
  const homeDir = deps.homeDir ?? os.homedir();

  await library.ensureInitialized();

  const roots = (resolved.roots ?? defaultScanRoots(homeDir)).map((root) => path.resolve(root));
  const excludePrefixes = [
    ...(resolved.excludePrefixes ?? defaultExcludes(homeDir)).map((prefix) => path.resolve(prefix)),
    library.root,
  ];

  const finder = deps.finder ?? createFinder(resolved.method);

  console.log(
    `[Catalog] Scanning ${roots.length} roots into ${library.root} via ${finder.constructor.name}` +
      `${resolved.dryRun ? ' (dry run)' : ''}`
  );

  const manifest = library.openManifest();
  try {
    const scanner = new Scanner(manifest, new ContentStore(library), finder);
    const stats = await manifest.runInTransaction(() =>
      scanner.scan({
        roots,
        excludePrefixes,
        limit: resolved.limit,
        dryRun: resolved.dryRun,
        onProgress: deps.onProgress,
        now: deps.now,
      })
    );

    console.log(
      `[Catalog] Scan done: ${stats.discovered} discovered, ${stats.copiedNew} new, ` +
        `${stats.dedupedExisting} deduped, ${stats.skippedUnchanged} unchanged, ${stats.errors} errors`
    );
    return stats;
  } finally {
    manifest.close();
  }
}

// ============================================================================
// Categorize pass
// ============================================================================

export interface CategorizeDependencies {
  metadataExtractor?: MetadataExtractor;
  completionProvider?: CompletionProvider;
  /** Defaults to process.env; `<library>/.env` fills what it leaves unset */
  env?: EnvSource;
  onProgress?: (progress: CategorizeProgress) => void;
  now?: () => number;
  homeDir?: string;
}

export interface CategorizeSummary {
  docsCategorized: number;
  linksCreated: number;
  llmCalls: number;
  llmUsed: number;
  llmFailed: number;
  byCategory: Record<string, number>;
}

function buildPolicy(
  library: Library,
  llm: ResolvedLlmOptions,
  deps: CategorizeDependencies
): LLMPolicy {
  const settings = resolveLlmSettings(loadLibraryEnv(library, deps.env ?? process.env));
  const provider = deps.completionProvider ?? new OpenAICompatibleProvider({ apiKey: settings.apiKey });
  const pathDisclosure = toPathDisclosure(llm);

  const classifier = new LLMClassifier({
    provider,
    baseURL: llm.baseURL ?? settings.baseURL,
    model: llm.model ?? settings.model,
    timeoutSeconds: llm.timeoutSeconds,
    maxOutputTokens: llm.maxOutputTokens,
    pathDisclosure,
    homeDir: deps.homeDir,
  });

  return {
    mode: llm.mode,
    minConfidence: llm.minConfidence,
    label: classifier.label,
    pathDisclosure,
    classifier,
  };
}

function toAttributes(
  vaultPath: string,
  source: SourceRecord | undefined,
  metadata: DocumentMetadata
): DocumentAttributes {
  return {
    sourcePath: source?.path ?? null,
    sourceBasename: source?.basename ?? path.basename(vaultPath),
    title: metadata.title,
    subject: metadata.subject,
    keywords: metadata.keywords,
    authors: metadata.authors,
    textSample: metadata.textSample,
    pageCount: metadata.pageCount,
  };
}

/**
 * Extracts metadata, categorizes documents and rebuilds the categorized view,
 * all in one transaction. Options and the rule set are validated before any
 * document is touched.
 */
export async function categorizeLibrary(
  library: Library,
  options: CategorizeLibraryOptions = {},
  deps: CategorizeDependencies = {}
): Promise<CategorizeSummary> {
  const resolved = parsePassOptions(CategorizeOptionsSchema, options, 'categorize');

  await library.ensureInitialized();
  const ruleSet: CategoryRuleSet = await loadCategoryRuleSet(resolved.configPath ?? library.categoriesConfigPath);
  const policy = resolved.llm ? buildPolicy(library, resolved.llm, deps) : null;

  const engine = new CategorizationEngine(ruleSet, policy);
  const extractor = deps.metadataExtractor ?? new PdfMetadataExtractor();
  const useText = (ruleSetUsesText(ruleSet) || policy !== null) && resolved.textSampleBytes > 0;
  const report = deps.onProgress;

  if (policy) {
    console.log(`[Catalog] LLM ${policy.mode} mode via ${policy.label}`);
  }

  const manifest = library.openManifest();
  try {
    return await manifest.runInTransaction(async () => {
      const latestSources = await manifest.getLatestSourcesByDigest();
      const documents = await manifest.listDocuments({ uncategorizedOnly: !resolved.recategorizeAll });
      const categorizedAt = (deps.now ?? Date.now)();

      for (const [index, doc] of documents.entries()) {
        const vaultPath = path.join(library.root, doc.store_relpath);

        const bag = await extractor.basicAttributes(vaultPath);
        const textSample = useText ? await extractor.textSample(vaultPath, resolved.textSampleBytes) : null;
        const metadata = toDocumentMetadata(bag, textSample);
        await manifest.updateDocumentMetadata(doc.digest, metadata);

        const attributes = toAttributes(vaultPath, latestSources.get(doc.digest), metadata);
        await engine.categorizeAndRecord(doc.digest, attributes, manifest, categorizedAt);

        if (report && (index + 1) % CATEGORIZE_PROGRESS_INTERVAL === 0) {
          report({
            status: 'categorizing',
            documentsProcessed: index + 1,
            documentsTotal: documents.length,
            message: `Categorized ${index + 1} of ${documents.length} documents...`,
          });
        }
      }

      const { updated, llmCalls, llmUsed, llmFailed } = engine.counters;
      report?.({
        status: 'linking',
        documentsProcessed: updated,
        documentsTotal: documents.length,
        message: 'Rebuilding categorized view...',
      });

      const allDocuments = await manifest.listDocuments();
      const view = await new ViewBuilder().rebuild(allDocuments, {
        viewRoot: library.categorizedDir,
        libraryRoot: library.root,
        linkMode: resolved.linkMode,
        refresh: resolved.refreshView,
        defaultCategory: ruleSet.defaultCategory,
        nameResolver: createNameResolver(allDocuments, latestSources),
      });

      console.log(
        `[Catalog] Categorized ${updated} documents (llm calls ${llmCalls}, used ${llmUsed}, failed ${llmFailed}), ` +
          `${view.totalLinks} links`
      );
      report?.({
        status: 'done',
        documentsProcessed: updated,
        documentsTotal: documents.length,
        message: `Categorized ${updated} documents`,
      });

      return {
        docsCategorized: updated,
        linksCreated: view.totalLinks,
        llmCalls,
        llmUsed,
        llmFailed,
        byCategory: view.byCategory,
      };
    });
  } finally {
    manifest.close();
  }
}

import * as os from 'os';
import * as path from 'path';
import type { DocumentAttributes } from '../contracts';
import type { CompletionProvider } from './llm-client';
import { extractResponseFields } from './response-extractor';
import { buildCategorizationPrompt } from './prompts/categorization-prompt';
import {
  LLM_DEFAULT_MAX_OUTPUT_TOKENS,
  LLM_DEFAULT_MODEL,
  LLM_DEFAULT_PATH_TAIL_PARTS,
  LLM_DEFAULT_TIMEOUT_SECONDS,
  LLM_MAX_REASON_LENGTH,
  REASON_INVALID_LLM_CATEGORY,
} from '../planner/constants';

// ============================================================================
// Path disclosure
// ============================================================================

/**
 * How much of the source path the completion provider gets to see.
 */
export type PathDisclosure =
  | { mode: 'basename' }
  | { mode: 'tail'; parts: number }
  | { mode: 'full' };

export const DEFAULT_PATH_DISCLOSURE: PathDisclosure = { mode: 'tail', parts: LLM_DEFAULT_PATH_TAIL_PARTS };

export function discloseSourcePath(
  sourcePath: string | null,
  disclosure: PathDisclosure,
  homeDir: string = os.homedir()
): string | null {
  if (!sourcePath) return null;

  switch (disclosure.mode) {
    case 'basename':
      return path.basename(sourcePath);
    case 'tail': {
      const segments = sourcePath.split(/[\\/]+/).filter((segment) => segment.length > 0);
      const tail = segments.slice(-Math.max(1, disclosure.parts));
      return `…/${tail.join('/')}`;
    }
    case 'full': {
      const home = homeDir.replace(/[\\/]+$/, '');
      if (home && sourcePath.startsWith(home + path.sep)) {
        return '~' + sourcePath.slice(home.length);
      }
      return sourcePath;
    }
    default: {
      const unreachable: never = disclosure;
      return unreachable;
    }
  }
}

// ============================================================================
// Classification
// ============================================================================

export type LLMClassification = {
  category: string;
  /** Always within [0, 1]. */
  confidence: number;
  reason: string;
  rawText: string;
};

/**
 * Anything that can put a document into one of the allowed categories.
 * Transport failures reject; unusable answers resolve to the default category.
 */
export interface DocumentClassifier {
  readonly label: string;
  classify(
    attributes: DocumentAttributes,
    allowedCategories: string[],
    defaultCategory: string,
    pathDisclosure?: PathDisclosure
  ): Promise<LLMClassification>;
}

export type LLMClassifierConfig = {
  provider: CompletionProvider;
  baseURL: string;
  model?: string;
  timeoutSeconds?: number;
  maxOutputTokens?: number;
  pathDisclosure?: PathDisclosure;
  homeDir?: string;
};

export function normalizeCategoryName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

function parseConfidence(raw: unknown): number {
  let value = Number.NaN;
  if (typeof raw === 'number') value = raw;
  else if (typeof raw === 'boolean') value = raw ? 1 : 0;
  else if (typeof raw === 'string' && raw.trim() !== '') value = Number(raw);
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function parseReason(raw: unknown): string {
  if (raw === undefined || raw === null) return '';
  const reason = String(raw).trim();
  return reason.length > LLM_MAX_REASON_LENGTH ? reason.slice(0, LLM_MAX_REASON_LENGTH).trimEnd() : reason;
}

export class LLMClassifier implements DocumentClassifier {
  readonly label: string;
  private provider: CompletionProvider;
  private baseURL: string;
  private model: string;
  private timeoutSeconds: number;
  private maxOutputTokens: number;
  private pathDisclosure: PathDisclosure;
  private homeDir: string;

  constructor(config: LLMClassifierConfig) {
    this.provider = config.provider;
    this.baseURL = config.baseURL;
    this.model = config.model ?? LLM_DEFAULT_MODEL;
    this.timeoutSeconds = config.timeoutSeconds ?? LLM_DEFAULT_TIMEOUT_SECONDS;
    this.maxOutputTokens = config.maxOutputTokens ?? LLM_DEFAULT_MAX_OUTPUT_TOKENS;
    this.pathDisclosure = config.pathDisclosure ?? DEFAULT_PATH_DISCLOSURE;
    this.homeDir = config.homeDir ?? os.homedir();
    this.label = `${this.provider.name}/${this.model}`;
  }

  async classify(
    attributes: DocumentAttributes,
    allowedCategories: string[],
    defaultCategory: string,
    pathDisclosure: PathDisclosure = this.pathDisclosure
  ): Promise<LLMClassification> {
    const allowed = [...new Set([...allowedCategories, defaultCategory])];
    const byNormalizedName = new Map<string, string>();
    for (const name of allowed) {
      const normalized = normalizeCategoryName(name);
      if (!byNormalizedName.has(normalized)) byNormalizedName.set(normalized, name);
    }

    // Scrub the path before it goes anywhere near the prompt
    const prompt = buildCategorizationPrompt({
      allowedCategories: allowed,
      defaultCategory,
      sourcePath: discloseSourcePath(attributes.sourcePath, pathDisclosure, this.homeDir),
      sourceBasename: attributes.sourceBasename,
      title: attributes.title,
      authors: attributes.authors,
      subject: attributes.subject,
      keywords: attributes.keywords,
      pageCount: attributes.pageCount,
      textSample: attributes.textSample,
    });

    const started = Date.now();
    const rawText = await this.provider.complete({
      baseURL: this.baseURL,
      model: this.model,
      prompt,
      timeoutSeconds: this.timeoutSeconds,
      maxOutputTokens: this.maxOutputTokens,
    });
    const elapsedSeconds = (Date.now() - started) / 1000;

    const fields = extractResponseFields(rawText);
    const category = typeof fields.category === 'string'
      ? byNormalizedName.get(normalizeCategoryName(fields.category))
      : undefined;

    if (category === undefined) {
      return { category: defaultCategory, confidence: 0, reason: REASON_INVALID_LLM_CATEGORY, rawText };
    }

    const reason = parseReason(fields.reason) || `llm classified in ${elapsedSeconds.toFixed(2)}s`;

    return { category, confidence: parseConfidence(fields.confidence), reason, rawText };
  }
}

/**
 * Utility functions for extractors
 */
import type { DocumentMetadata } from '../contracts';
import type { MetadataBag, MetadataValue } from './types';

/**
 * Execute an extraction with timeout protection
 * Notifies via console.warn if extraction takes longer than warningMs
 * Rejects if extraction takes longer than timeoutMs
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  warningMs: number,
  filePath: string
): Promise<T> {
  const startTime = Date.now();

  const warningTimer = setTimeout(() => {
    const elapsed = Date.now() - startTime;
    console.warn(
      `[Extractor] Extraction taking longer than expected: ${filePath} (${Math.round(elapsed / 1000)}s elapsed)`
    );
  }, warningMs);

  let timeoutTimer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutTimer = setTimeout(() => {
      reject(new Error(`Extraction timeout after ${timeoutMs}ms: ${filePath}`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(warningTimer);
    clearTimeout(timeoutTimer);
  }
}

/**
 * Cut text to at most maxBytes of UTF-8 without splitting a character.
 */
export function truncateUtf8(text: string, maxBytes: number): string {
  const buffer = Buffer.from(text, 'utf8');
  if (buffer.length <= maxBytes) return text;

  let end = Math.max(0, maxBytes);
  // Back off continuation bytes (10xxxxxx)
  while (end > 0 && (buffer[end] & 0xc0) === 0x80) {
    end--;
  }
  return buffer.subarray(0, end).toString('utf8');
}

function stringValue(value: MetadataValue | undefined): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function listValue(value: MetadataValue | undefined): string | null {
  if (Array.isArray(value)) {
    const joined = value.map((item) => item.trim()).filter(Boolean).join(', ');
    return joined || null;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return stringValue(value);
}

function pageCountValue(value: MetadataValue | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? Math.trunc(value) : null;
}

/**
 * Canonical JSON of the bag (sorted keys) for audit, or null for an empty bag.
 */
export function metadataJson(bag: MetadataBag): string | null {
  const keys = Object.keys(bag).sort();
  if (keys.length === 0) return null;
  const sorted: MetadataBag = {};
  for (const key of keys) sorted[key] = bag[key];
  return JSON.stringify(sorted);
}

/**
 * Maps an extractor's bag onto the persisted document columns.
 */
export function toDocumentMetadata(bag: MetadataBag, textSample: string | null): DocumentMetadata {
  return {
    pageCount: pageCountValue(bag.pageCount),
    title: stringValue(bag.title),
    authors: listValue(bag.authors),
    subject: stringValue(bag.subject),
    keywords: listValue(bag.keywords),
    textSample,
    metaJson: metadataJson(bag),
  };
}

import { z } from 'zod';

// ============================================================================
// Document Schema (one row per distinct content)
// ============================================================================

export const DocumentRecordSchema = z.object({
  digest: z.string(), // sha256 hex of the file bytes
  store_relpath: z.string(), // path of the vault copy relative to the library root
  byte_size: z.number(),
  first_seen_at: z.number(), // Unix timestamp in ms
  last_seen_at: z.number(),
  page_count: z.number().nullable(),
  title: z.string().nullable(),
  authors: z.string().nullable(),
  subject: z.string().nullable(),
  keywords: z.string().nullable(),
  text_sample: z.string().nullable(),
  meta_json: z.string().nullable(),
  category: z.string().nullable(),
  category_score: z.number().nullable(),
  category_reason: z.string().nullable(),
  categorized_at: z.number().nullable(),
});

export type DocumentRecord = z.infer<typeof DocumentRecordSchema>;

// ============================================================================
// Source Record Schema (one row per observed path)
// ============================================================================

export const SourceStatusSchema = z.enum(['ok', 'error', 'unreadable']);

export type SourceStatus = z.infer<typeof SourceStatusSchema>;

export const SourceRecordSchema = z.object({
  path: z.string(),
  basename: z.string().nullable(),
  size: z.number().nullable(),
  mtime: z.number().nullable(), // stat mtimeMs, compared as-is for change detection
  digest: z.string().nullable(), // null when the file could not be read
  first_seen_at: z.number(),
  last_seen_at: z.number(),
  status: SourceStatusSchema,
  error: z.string().nullable(),
});

export type SourceRecord = z.infer<typeof SourceRecordSchema>;

// ============================================================================
// Document metadata (as persisted)
// ============================================================================

export type DocumentMetadata = {
  pageCount: number | null;
  title: string | null;
  authors: string | null;
  subject: string | null;
  keywords: string | null;
  textSample: string | null;
  metaJson: string | null;
};

/**
 * Everything the scorer and the classifier get to see about one document.
 */
export type DocumentAttributes = {
  sourcePath: string | null;
  sourceBasename: string | null;
  title: string | null;
  subject: string | null;
  keywords: string | null;
  authors: string | null;
  textSample: string | null;
  pageCount: number | null;
};

export type Categorization = {
  category: string;
  score: number;
  reason: string;
};

// ============================================================================
// Pass progress
// ============================================================================

export const ScanProgressSchema = z.object({
  status: z.enum(['scanning', 'done']),
  currentFile: z.string().optional(),
  filesFound: z.number(),
  message: z.string(),
});

export type ScanProgress = z.infer<typeof ScanProgressSchema>;

export const CategorizeProgressSchema = z.object({
  status: z.enum(['categorizing', 'linking', 'done']),
  documentsProcessed: z.number(),
  documentsTotal: z.number(),
  message: z.string(),
});

export type CategorizeProgress = z.infer<typeof CategorizeProgressSchema>;

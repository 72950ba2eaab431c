/**
 * Types for metadata extraction
 */
export type MetadataValue = string | number | boolean | null | string[];

/**
 * Attribute bag for one file. Keys the pipeline reads: pageCount, title,
 * authors, subject, keywords. Anything else is kept for audit in meta_json.
 */
export type MetadataBag = Record<string, MetadataValue>;

/**
 * Both methods must be safe on files that are not parseable: they return an
 * empty bag or null instead of throwing for content reasons.
 */
export interface MetadataExtractor {
  readonly id: string;
  basicAttributes(filePath: string): Promise<MetadataBag>;
  textSample(filePath: string, maxBytes: number): Promise<string | null>;
}

/**
 * Used when no real extractor is available; documents are then scored on paths and names only.
 */
export class NoopMetadataExtractor implements MetadataExtractor {
  readonly id = 'noop';

  async basicAttributes(): Promise<MetadataBag> {
    return {};
  }

  async textSample(): Promise<string | null> {
    return null;
  }
}

import * as fs from 'fs';
import { createRequire } from 'module';
import type PdfParse from 'pdf-parse';
import type { MetadataBag, MetadataExtractor } from './types';
import { truncateUtf8, withTimeout } from './extractor-utils';
import { errorMessage } from '../errors';
import { MAX_PDF_SIZE_BYTES, PDF_PARSE_TIMEOUT_MS } from '../planner/constants';

const PDF_PARSE_WARNING_MS = 10000;

// The package entry runs a self-test when it has no parent module, which is
// the case under an ESM import. Going through require gives it one.
const requireFromHere = createRequire(import.meta.url);
let pdfParse: typeof PdfParse | null = null;

function loadPdfParse(): typeof PdfParse {
  if (!pdfParse) {
    const loaded: typeof PdfParse = requireFromHere('pdf-parse');
    pdfParse = loaded;
  }
  return pdfParse;
}

interface ParsedPdf {
  bag: MetadataBag;
  text: string;
}

function infoString(info: unknown, key: string): string | null {
  if (typeof info !== 'object' || info === null || !(key in info)) return null;
  const value: unknown = Reflect.get(info, key);
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

function splitList(value: string | null, separator: RegExp): string[] | null {
  if (!value) return null;
  const items = value.split(separator).map((item) => item.trim()).filter(Boolean);
  return items.length > 0 ? items : null;
}

/**
 * PDF metadata and text through pdf-parse.
 *
 * The last parse is cached because the pipeline asks for attributes and then
 * the text sample of the same vault file.
 */
export class PdfMetadataExtractor implements MetadataExtractor {
  readonly id = 'pdf-parse';
  private cached: { filePath: string; parsed: ParsedPdf | null } | null = null;

  async basicAttributes(filePath: string): Promise<MetadataBag> {
    const parsed = await this.parse(filePath);
    return parsed ? parsed.bag : {};
  }

  async textSample(filePath: string, maxBytes: number): Promise<string | null> {
    if (maxBytes <= 0) return null;
    const parsed = await this.parse(filePath);
    if (!parsed) return null;

    const text = truncateUtf8(parsed.text.trim(), maxBytes).trim();
    return text ? text : null;
  }

  private async parse(filePath: string): Promise<ParsedPdf | null> {
    if (this.cached && this.cached.filePath === filePath) {
      return this.cached.parsed;
    }

    const parsed = await this.parseUncached(filePath);
    this.cached = { filePath, parsed };
    return parsed;
  }

  private async parseUncached(filePath: string): Promise<ParsedPdf | null> {
    try {
      const stats = await fs.promises.stat(filePath);
      if (stats.size > MAX_PDF_SIZE_BYTES) {
        console.warn(`[PdfExtractor] PDF too large (${Math.round(stats.size / 1024 / 1024)}MB), skipping: ${filePath}`);
        return null;
      }

      const dataBuffer = await withTimeout(
        fs.promises.readFile(filePath),
        PDF_PARSE_TIMEOUT_MS,
        PDF_PARSE_WARNING_MS,
        filePath
      );
      const pdfData = await withTimeout(loadPdfParse()(dataBuffer), PDF_PARSE_TIMEOUT_MS, PDF_PARSE_WARNING_MS, filePath);

      const info: unknown = pdfData.info;
      const bag: MetadataBag = { pageCount: pdfData.numpages };

      const title = infoString(info, 'Title');
      if (title) bag.title = title;
      const authors = splitList(infoString(info, 'Author'), /[;,]/);
      if (authors) bag.authors = authors;
      const subject = infoString(info, 'Subject');
      if (subject) bag.subject = subject;
      const keywords = splitList(infoString(info, 'Keywords'), /[;,]/);
      if (keywords) bag.keywords = keywords;
      const creator = infoString(info, 'Creator');
      if (creator) bag.creator = creator;
      const producer = infoString(info, 'Producer');
      if (producer) bag.producer = producer;

      return { bag, text: pdfData.text ?? '' };
    } catch (error) {
      console.warn(`[PdfExtractor] Could not parse ${filePath}: ${errorMessage(error)}`);
      return null;
    }
  }
}

import { LLM_MAX_PROMPT_FIELD_LENGTH, LLM_MAX_PROMPT_SAMPLE_LENGTH } from '../../planner/constants';

export type CategorizationPromptInput = {
  allowedCategories: string[];
  defaultCategory: string;
  /** Already scrubbed according to the path disclosure mode. */
  sourcePath: string | null;
  sourceBasename: string | null;
  title: string | null;
  authors: string | null;
  subject: string | null;
  keywords: string | null;
  pageCount: number | null;
  textSample: string | null;
};

function bounded(value: string | null, maxLength: number): string | null {
  if (!value) return null;
  const collapsed = value.replace(/\s+/g, ' ').trim();
  if (!collapsed) return null;
  return collapsed.length > maxLength ? collapsed.slice(0, maxLength).trimEnd() : collapsed;
}

export function buildCategorizationPrompt(input: CategorizationPromptInput): string {
  const lines: string[] = [
    'You are a precise document librarian.',
    'Pick the single best category for this PDF from the allowed list.',
    'Return ONLY valid JSON (no markdown) with keys: category, confidence, reason.',
    `- category must be exactly one of: ${JSON.stringify(input.allowedCategories)}`,
    '- confidence must be a number between 0 and 1.',
    '- reason must be short (<= 140 chars).',
    `If unsure, use category=${JSON.stringify(input.defaultCategory)} with low confidence.`,
    '',
    'PDF info:',
  ];

  const fields: Array<[string, string | null]> = [
    ['source_path', bounded(input.sourcePath, LLM_MAX_PROMPT_FIELD_LENGTH)],
    ['filename', bounded(input.sourceBasename, LLM_MAX_PROMPT_FIELD_LENGTH)],
    ['title', bounded(input.title, LLM_MAX_PROMPT_FIELD_LENGTH)],
    ['authors', bounded(input.authors, LLM_MAX_PROMPT_FIELD_LENGTH)],
    ['subject', bounded(input.subject, LLM_MAX_PROMPT_FIELD_LENGTH)],
    ['keywords', bounded(input.keywords, LLM_MAX_PROMPT_FIELD_LENGTH)],
    ['pages', input.pageCount === null ? null : String(input.pageCount)],
    ['text_sample', bounded(input.textSample, LLM_MAX_PROMPT_SAMPLE_LENGTH)],
  ];

  for (const [label, value] of fields) {
    if (value !== null) {
      lines.push(`- ${label}: ${value}`);
    }
  }

  return lines.join('\n').trim() + '\n';
}

/**
 * ResponseExtractor - Tolerant parsing of classifier output
 *
 * Local models rarely return clean JSON. They wrap it in markdown fences, use
 * smart or single quotes, emit True/False/None, leave trailing commas, or talk
 * around the object. The strategies below are tried in order and the first one
 * that yields an object wins; the last one always succeeds, possibly with no fields.
 *
 * Nothing here throws. The classifier decides what missing fields mean.
 */

export type ExtractedFields = Record<string, unknown>;

export interface ExtractionStrategy {
  name: string;
  extract: (cleaned: string) => ExtractedFields | null;
}

const CODE_FENCE_RE = /^```(?:json)?\s*|\s*```$/gim;

function isRecord(value: unknown): value is ExtractedFields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseObject(text: string): ExtractedFields | null {
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Strip markdown fences and replace typographic quotes with ASCII ones.
 */
export function cleanModelOutput(text: string): string {
  return text
    .trim()
    .replace(CODE_FENCE_RE, '')
    .trim()
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'");
}

// ============================================================================
// Strategies
// ============================================================================

/**
 * The cleaned text is exactly one object.
 */
export const wholeObject: ExtractionStrategy = {
  name: 'whole-object',
  extract: (cleaned) => {
    if (!cleaned.startsWith('{') || !cleaned.endsWith('}')) return null;
    return parseObject(cleaned);
  },
};

/**
 * End index (inclusive) of the brace-balanced span starting at `start`, or -1.
 * Braces inside double-quoted strings are ignored.
 */
function balancedObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const c = text[i];
    if (inString) {
      if (escape) escape = false;
      else if (c === '\\') escape = true;
      else if (c === '"') inString = false;
      continue;
    }
    if (c === '"') inString = true;
    else if (c === '{') depth++;
    else if (c === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Parse an object from every `{`; prefer the first one carrying a string `category`.
 */
export const scanObjects: ExtractionStrategy = {
  name: 'scan-objects',
  extract: (cleaned) => {
    const candidates: ExtractedFields[] = [];
    for (let i = cleaned.indexOf('{'); i !== -1; i = cleaned.indexOf('{', i + 1)) {
      const end = balancedObjectEnd(cleaned, i);
      if (end === -1) continue;
      const parsed = parseObject(cleaned.slice(i, end + 1));
      if (parsed) candidates.push(parsed);
    }

    return candidates.find((candidate) => typeof candidate.category === 'string') ?? candidates[0] ?? null;
  },
};

const CAPITALIZED_LITERALS: Record<string, string> = { True: 'true', False: 'false', None: 'null' };

/**
 * Rewrite near-JSON into JSON: single-quoted strings, True/False/None,
 * unquoted keys, trailing commas and raw newlines inside strings.
 */
export function loosenToJson(text: string): string {
  let out = '';
  let i = 0;

  while (i < text.length) {
    const c = text[i];

    if (c === '"' || c === "'") {
      const quote = c;
      let value = '';
      i++;
      while (i < text.length && text[i] !== quote) {
        const ch = text[i];
        if (ch === '\\' && i + 1 < text.length) {
          const next = text[i + 1];
          value += next === "'" ? "'" : ch + next;
          i += 2;
          continue;
        }
        if (ch === '\n' || ch === '\r') value += ' ';
        else if (ch === '"') value += '\\"';
        else value += ch;
        i++;
      }
      i++; // closing quote
      out += `"${value}"`;
      continue;
    }

    if (/[A-Za-z_]/.test(c)) {
      let word = '';
      while (i < text.length && /[A-Za-z0-9_]/.test(text[i])) {
        word += text[i];
        i++;
      }
      const rest = text.slice(i).trimStart();
      if (rest.startsWith(':')) out += `"${word}"`;
      else out += CAPITALIZED_LITERALS[word] ?? word;
      continue;
    }

    if (c === ',') {
      const rest = text.slice(i + 1).trimStart();
      if (rest.startsWith('}') || rest.startsWith(']')) {
        i++;
        continue;
      }
    }

    out += c;
    i++;
  }

  return out;
}

/**
 * First `{` to last `}`: strict parse, then a loosened parse.
 */
export const braceSpan: ExtractionStrategy = {
  name: 'brace-span',
  extract: (cleaned) => {
    const start = cleaned.indexOf('{');
    const end = cleaned.lastIndexOf('}');
    if (start === -1 || end <= start) return null;

    const span = cleaned.slice(start, end + 1);
    return parseObject(span) ?? parseObject(loosenToJson(span));
  },
};

const CATEGORY_RE = /category["']?\s*[:=]\s*['"]([^'"]+)['"]/i;
const CONFIDENCE_RE = /confidence["']?\s*[:=]\s*["']?([0-9]*\.?[0-9]+)/i;
const REASON_RE = /reason["']?\s*[:=]\s*['"]([^'"]+)['"]/i;

/**
 * Pull each field out on its own. Always succeeds, possibly with no fields.
 */
export const regexFields: ExtractionStrategy = {
  name: 'regex-fields',
  extract: (cleaned) => {
    const fields: ExtractedFields = {};

    const category = CATEGORY_RE.exec(cleaned);
    if (category) fields.category = category[1].trim();

    const confidence = CONFIDENCE_RE.exec(cleaned);
    if (confidence) fields.confidence = Number.parseFloat(confidence[1]);

    const reason = REASON_RE.exec(cleaned);
    if (reason) fields.reason = reason[1].trim();

    return fields;
  },
};

export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [wholeObject, scanObjects, braceSpan, regexFields];

/**
 * Best-effort recovery of `{category, confidence, reason}` from free text.
 */
export function extractResponseFields(
  text: string,
  strategies: readonly ExtractionStrategy[] = EXTRACTION_STRATEGIES
): ExtractedFields {
  const cleaned = cleanModelOutput(text);
  if (!cleaned) return {};

  for (const strategy of strategies) {
    const fields = strategy.extract(cleaned);
    if (fields) return fields;
  }
  return {};
}

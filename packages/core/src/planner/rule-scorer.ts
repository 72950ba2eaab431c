import type { Categorization, DocumentAttributes } from '../contracts';
import type { CategoryRule, CategoryRuleSet } from './category-config';
import {
  RULE_EXTRA_HIT_BONUS,
  RULE_FILENAME_WEIGHT,
  RULE_METADATA_WEIGHT,
  RULE_PATH_WEIGHT,
  RULE_PRIORITY_TIEBREAK,
  RULE_TEXT_WEIGHT,
  REASON_BELOW_MIN_SCORE,
  REASON_NO_RULES_MATCHED,
} from './constants';

/**
 * Keyword-based scoring of one document against a rule set.
 * Pure: identical inputs always give the identical categorization.
 */

interface Channel {
  label: 'path' | 'filename' | 'meta' | 'text';
  weight: number;
  keywords: (rule: CategoryRule) => string[];
}

const CHANNELS: Channel[] = [
  { label: 'path', weight: RULE_PATH_WEIGHT, keywords: (rule) => rule.pathKeywords },
  { label: 'filename', weight: RULE_FILENAME_WEIGHT, keywords: (rule) => rule.filenameKeywords },
  { label: 'meta', weight: RULE_METADATA_WEIGHT, keywords: (rule) => rule.metadataKeywords },
  { label: 'text', weight: RULE_TEXT_WEIGHT, keywords: (rule) => rule.textKeywords },
];

function keywordHits(haystack: string, keywords: string[]): string[] {
  return keywords.filter((kw) => {
    const needle = kw.trim().toLowerCase();
    return needle.length > 0 && haystack.includes(needle);
  });
}

function withinPageBounds(rule: CategoryRule, pageCount: number | null): boolean {
  if (pageCount === null) return true;
  if (rule.minPages !== null && pageCount < rule.minPages) return false;
  if (rule.maxPages !== null && pageCount > rule.maxPages) return false;
  return true;
}

export function scoreDocument(attributes: DocumentAttributes, ruleSet: CategoryRuleSet): Categorization {
  const haystacks: Record<Channel['label'], string> = {
    path: (attributes.sourcePath ?? '').toLowerCase(),
    filename: (attributes.sourceBasename ?? '').toLowerCase(),
    meta: [attributes.title, attributes.subject, attributes.keywords, attributes.authors]
      .map((part) => (part ?? '').toLowerCase())
      .join(' '),
    text: (attributes.textSample ?? '').toLowerCase(),
  };

  let best: Categorization = { category: ruleSet.defaultCategory, score: 0, reason: REASON_NO_RULES_MATCHED };

  for (const rule of ruleSet.rules) {
    if (!withinPageBounds(rule, attributes.pageCount)) continue;

    let score = 0;
    const reasons: string[] = [];

    for (const channel of CHANNELS) {
      const hits = keywordHits(haystacks[channel.label], channel.keywords(rule));
      if (hits.length > 0) {
        score += channel.weight + RULE_EXTRA_HIT_BONUS * (hits.length - 1);
        reasons.push(`${channel.label}:${hits[0]}`);
      }
    }

    // A rule without any keyword hit never competes, whatever its priority
    if (reasons.length === 0) continue;

    score += rule.priority * RULE_PRIORITY_TIEBREAK;

    if (score > best.score) {
      best = { category: rule.name, score, reason: reasons.join(', ') };
    }
  }

  if (best.reason === REASON_NO_RULES_MATCHED) {
    return best;
  }

  if (best.score < ruleSet.minScore) {
    return { category: ruleSet.defaultCategory, score: best.score, reason: REASON_BELOW_MIN_SCORE };
  }

  return best;
}

/**
 * Whether any rule looks at the text sample, so callers can skip text extraction otherwise.
 */
export function ruleSetUsesText(ruleSet: CategoryRuleSet): boolean {
  return ruleSet.rules.some((rule) => rule.textKeywords.length > 0);
}

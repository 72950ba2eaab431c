import * as fs from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors';
import { DEFAULT_CATEGORY, DEFAULT_MIN_SCORE } from './constants';

// ============================================================================
// On-disk schema (categories.json)
// ============================================================================

const KeywordListSchema = z.array(z.string()).default([]);

const PageBoundSchema = z.number().int().nonnegative().nullable().optional();

export const CategoryRuleConfigSchema = z
  .object({
    name: z.string().trim().min(1),
    description: z.string().optional(),
    priority: z.number().default(0),
    min_pages: PageBoundSchema,
    max_pages: PageBoundSchema,
    path_keywords_any: KeywordListSchema,
    filename_keywords_any: KeywordListSchema,
    metadata_keywords_any: KeywordListSchema,
    text_keywords_any: KeywordListSchema,
  })
  .strict();

export const CategoriesConfigSchema = z
  .object({
    default_category: z.string().trim().min(1).default(DEFAULT_CATEGORY),
    min_score: z.number().nonnegative().default(DEFAULT_MIN_SCORE),
    categories: z.array(CategoryRuleConfigSchema).default([]),
  })
  .strict();

export type CategoriesConfig = z.infer<typeof CategoriesConfigSchema>;

// ============================================================================
// Typed rule set used by the scorer and the engine
// ============================================================================

export interface CategoryRule {
  name: string;
  priority: number;
  minPages: number | null;
  maxPages: number | null;
  pathKeywords: string[];
  filenameKeywords: string[];
  metadataKeywords: string[];
  textKeywords: string[];
}

export interface CategoryRuleSet {
  defaultCategory: string;
  minScore: number;
  rules: CategoryRule[];
}

function cleanKeywords(keywords: string[]): string[] {
  return keywords.map(kw => kw.trim()).filter(kw => kw.length > 0);
}

/**
 * Validates a parsed categories document and converts it into a rule set.
 * Unknown keys, blank names and non-numeric bounds are rejected here, never during scoring.
 */
export function parseCategoryRuleSet(raw: unknown, source = 'categories config'): CategoryRuleSet {
  const result = CategoriesConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid ${source}: ${issues.join('; ')}`, { source, issues });
  }

  const config = result.data;
  return {
    defaultCategory: config.default_category,
    minScore: config.min_score,
    rules: config.categories.map(category => ({
      name: category.name,
      priority: category.priority,
      minPages: category.min_pages ?? null,
      maxPages: category.max_pages ?? null,
      pathKeywords: cleanKeywords(category.path_keywords_any),
      filenameKeywords: cleanKeywords(category.filename_keywords_any),
      metadataKeywords: cleanKeywords(category.metadata_keywords_any),
      textKeywords: cleanKeywords(category.text_keywords_any),
    })),
  };
}

export async function loadCategoryRuleSet(configPath: string): Promise<CategoryRuleSet> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read categories config ${configPath}: ${errorMessage(error)}`, { configPath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Categories config ${configPath} is not valid JSON: ${errorMessage(error)}`, {
      configPath,
    });
  }

  return parseCategoryRuleSet(raw, configPath);
}

/**
 * Names the classifier may answer with, default last, duplicates dropped.
 */
export function allowedCategories(ruleSet: CategoryRuleSet): string[] {
  return [...new Set([...ruleSet.rules.map(rule => rule.name), ruleSet.defaultCategory])];
}

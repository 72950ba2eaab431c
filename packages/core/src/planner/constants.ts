/**
 * Configuration constants for the scorer, the classifier and the view builder.
 * All thresholds, weights and limits are defined here for easy adjustment.
 */

// ============================================================================
// RULE SCORING
// ============================================================================

/**
 * Base weight per channel when at least one keyword hits, plus a bonus per extra hit.
 */
export const RULE_PATH_WEIGHT = 2.0;
export const RULE_FILENAME_WEIGHT = 2.0;
export const RULE_METADATA_WEIGHT = 3.0;
export const RULE_TEXT_WEIGHT = 4.0;
export const RULE_EXTRA_HIT_BONUS = 0.25;

/**
 * Priority is added at this scale so it only breaks ties.
 */
export const RULE_PRIORITY_TIEBREAK = 1e-6;

export const DEFAULT_CATEGORY = 'Unsorted';
export const DEFAULT_MIN_SCORE = 4;

export const REASON_NO_RULES_MATCHED = 'no rules matched';
export const REASON_BELOW_MIN_SCORE = 'below min_score; defaulted';
export const REASON_INVALID_LLM_CATEGORY = 'missing/invalid category; defaulted';

// ============================================================================
// LLM SETTINGS
// ============================================================================

export const LLM_DEFAULT_BASE_URL = 'http://localhost:8000';
export const LLM_DEFAULT_MODEL = 'qwen3-4b';
export const LLM_DEFAULT_TIMEOUT_SECONDS = 30;
export const LLM_DEFAULT_MAX_OUTPUT_TOKENS = 200;
export const LLM_DEFAULT_MIN_CONFIDENCE = 0.6;
export const LLM_DEFAULT_PATH_TAIL_PARTS = 3;

/**
 * Accepted LLM confidence is rescaled onto the rule score range.
 */
export const LLM_SCORE_SCALE = 10;

/**
 * Prompt and storage bounds.
 */
export const LLM_MAX_REASON_LENGTH = 200; // Stored reason text
export const LLM_MAX_ERROR_LENGTH = 200; // Transport error appended to a rule reason
export const LLM_MAX_PROMPT_FIELD_LENGTH = 300; // title/authors/subject/keywords in prompts
export const LLM_MAX_PROMPT_SAMPLE_LENGTH = 4000; // text sample in prompts

// ============================================================================
// EXTRACTION & VIEW
// ============================================================================

export const DEFAULT_TEXT_SAMPLE_BYTES = 8192;
export const MAX_PDF_SIZE_BYTES = 50 * 1024 * 1024; // Skip parsing larger files
export const PDF_PARSE_TIMEOUT_MS = 60000;

export const SAFE_FILENAME_MAX_LENGTH = 160;
export const VIEW_DIGEST_PREFIX_LENGTH = 8;
export const NAME_FALLBACK_DIGEST_LENGTH = 12;

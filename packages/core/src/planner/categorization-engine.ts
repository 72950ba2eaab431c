import type { Categorization, DocumentAttributes } from '../contracts';
import type { Manifest } from '../db';
import type { DocumentClassifier, PathDisclosure } from '../agents/llm-classifier';
import { CompletionTransportError } from '../errors';
import { allowedCategories, type CategoryRuleSet } from './category-config';
import { scoreDocument } from './rule-scorer';
import { LLM_MAX_ERROR_LENGTH, LLM_SCORE_SCALE } from './constants';

/**
 * 'always' asks the classifier for every document; 'fallback' only when the
 * rules could not place it.
 */
export type LLMMode = 'always' | 'fallback';

export interface LLMPolicy {
  mode: LLMMode;
  minConfidence: number;
  /** Provider/model tag written into reasons */
  label: string;
  pathDisclosure: PathDisclosure;
  classifier: DocumentClassifier;
}

export interface EngineCounters {
  updated: number;
  llmCalls: number;
  llmUsed: number;
  llmFailed: number;
}

/**
 * Rules first, then the classifier where the policy asks for it.
 *
 * A transport failure from the classifier never escapes categorizeOne: the
 * rule result is kept with an audit note and the batch goes on.
 */
export class CategorizationEngine {
  readonly counters: EngineCounters = { updated: 0, llmCalls: 0, llmUsed: 0, llmFailed: 0 };
  private readonly allowed: string[];

  constructor(
    private readonly ruleSet: CategoryRuleSet,
    private readonly policy: LLMPolicy | null = null
  ) {
    this.allowed = allowedCategories(ruleSet);
  }

  shouldConsultLLM(ruleResult: Categorization): boolean {
    if (!this.policy) return false;

    switch (this.policy.mode) {
      case 'always':
        return true;
      case 'fallback':
        return (
          ruleResult.category === this.ruleSet.defaultCategory ||
          ruleResult.reason.startsWith('below min_score') ||
          ruleResult.score < this.ruleSet.minScore
        );
      default: {
        const unreachable: never = this.policy.mode;
        return unreachable;
      }
    }
  }

  async categorizeOne(attributes: DocumentAttributes): Promise<Categorization> {
    const ruleResult = scoreDocument(attributes, this.ruleSet);
    if (!this.policy || !this.shouldConsultLLM(ruleResult)) {
      return ruleResult;
    }

    const { classifier, label, minConfidence, pathDisclosure } = this.policy;
    this.counters.llmCalls++;

    try {
      const llm = await classifier.classify(attributes, this.allowed, this.ruleSet.defaultCategory, pathDisclosure);

      if (llm.confidence >= minConfidence) {
        this.counters.llmUsed++;
        return {
          category: llm.category,
          score: LLM_SCORE_SCALE * llm.confidence,
          reason: `llm:${label} conf=${llm.confidence.toFixed(2)}; ${llm.reason}`,
        };
      }

      return {
        ...ruleResult,
        reason: `${ruleResult.reason} | llm:${label} low_conf=${llm.confidence.toFixed(2)}`,
      };
    } catch (error) {
      if (!(error instanceof CompletionTransportError)) {
        throw error;
      }
      this.counters.llmFailed++;
      console.warn(`[CategorizationEngine] Classifier failed, keeping rule result: ${error.message}`);
      return {
        ...ruleResult,
        reason: `${ruleResult.reason} | llm_error:${error.message.slice(0, LLM_MAX_ERROR_LENGTH)}`,
      };
    }
  }

  /**
   * Categorize one document and persist the result.
   */
  async categorizeAndRecord(
    digest: string,
    attributes: DocumentAttributes,
    manifest: Manifest,
    categorizedAt: number = Date.now()
  ): Promise<Categorization> {
    const result = await this.categorizeOne(attributes);
    await manifest.updateDocumentCategory(digest, result, categorizedAt);
    this.counters.updated++;
    return result;
  }
}

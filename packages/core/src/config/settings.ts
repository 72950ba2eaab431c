import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import type { Library } from '../library';
import type { PathDisclosure } from '../agents/llm-classifier';
import { ConfigurationError } from '../errors';
import {
  DEFAULT_TEXT_SAMPLE_BYTES,
  LLM_DEFAULT_BASE_URL,
  LLM_DEFAULT_MAX_OUTPUT_TOKENS,
  LLM_DEFAULT_MIN_CONFIDENCE,
  LLM_DEFAULT_MODEL,
  LLM_DEFAULT_PATH_TAIL_PARTS,
  LLM_DEFAULT_TIMEOUT_SECONDS,
} from '../planner/constants';

export const ENV_FILE_NAME = '.env';

export type EnvSource = Record<string, string | undefined>;

// ============================================================================
// Environment
// ============================================================================

export type LlmSettings = {
  baseURL: string;
  model: string;
  apiKey?: string;
};

/**
 * Reads `<library>/.env` when present. Variables already set in `env` win.
 */
export function loadLibraryEnv(library: Library, env: EnvSource = process.env): EnvSource {
  const envPath = path.join(library.root, ENV_FILE_NAME);
  if (!fs.existsSync(envPath)) {
    return { ...env };
  }

  let fileValues: Record<string, string>;
  try {
    fileValues = dotenv.parse(fs.readFileSync(envPath));
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${envPath}`, { envPath, cause: error });
  }

  console.log(`[Settings] Loaded .env from: ${envPath}`);
  return { ...fileValues, ...env };
}

function envValue(env: EnvSource, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function resolveLlmSettings(env: EnvSource): LlmSettings {
  return {
    baseURL: envValue(env, 'LLM_BASE_URL') ?? LLM_DEFAULT_BASE_URL,
    model: envValue(env, 'LLM_MODEL') ?? LLM_DEFAULT_MODEL,
    apiKey: envValue(env, 'LLM_API_KEY'),
  };
}

// ============================================================================
// Pass options
// ============================================================================

export const ScanOptionsSchema = z
  .object({
    roots: z.array(z.string().min(1)).optional(),
    excludePrefixes: z.array(z.string().min(1)).optional(),
    limit: z.number().int().positive().optional(),
    dryRun: z.boolean().default(false),
    /** auto: Spotlight when mdfind exists, else the directory walk */
    method: z.enum(['auto', 'mdfind', 'walk']).default('auto'),
  })
  .strict();

export type ScanLibraryOptions = z.input<typeof ScanOptionsSchema>;
export type ResolvedScanOptions = z.output<typeof ScanOptionsSchema>;

export const LlmOptionsSchema = z
  .object({
    mode: z.enum(['always', 'fallback']).default('fallback'),
    minConfidence: z.number().min(0).max(1).default(LLM_DEFAULT_MIN_CONFIDENCE),
    baseURL: z.string().url().optional(),
    model: z.string().min(1).optional(),
    timeoutSeconds: z.number().positive().default(LLM_DEFAULT_TIMEOUT_SECONDS),
    maxOutputTokens: z.number().int().positive().default(LLM_DEFAULT_MAX_OUTPUT_TOKENS),
    pathDisclosure: z.enum(['basename', 'tail', 'full']).default('tail'),
    pathTailParts: z.number().int().positive().default(LLM_DEFAULT_PATH_TAIL_PARTS),
  })
  .strict();

export const CategorizeOptionsSchema = z
  .object({
    /** Defaults to the library's categories.json */
    configPath: z.string().min(1).optional(),
    linkMode: z.enum(['symlink', 'hardlink', 'copy']).default('symlink'),
    refreshView: z.boolean().default(true),
    recategorizeAll: z.boolean().default(false),
    textSampleBytes: z.number().int().nonnegative().default(DEFAULT_TEXT_SAMPLE_BYTES),
    /** Absent means rules only */
    llm: LlmOptionsSchema.optional(),
  })
  .strict();

export type CategorizeLibraryOptions = z.input<typeof CategorizeOptionsSchema>;
export type ResolvedCategorizeOptions = z.output<typeof CategorizeOptionsSchema>;
export type ResolvedLlmOptions = z.output<typeof LlmOptionsSchema>;

export function parsePassOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, pass: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid ${pass} options: ${issues.join('; ')}`, { pass, issues });
  }
  return result.data;
}

export function toPathDisclosure(options: Pick<ResolvedLlmOptions, 'pathDisclosure' | 'pathTailParts'>): PathDisclosure {
  switch (options.pathDisclosure) {
    case 'basename':
      return { mode: 'basename' };
    case 'tail':
      return { mode: 'tail', parts: options.pathTailParts };
    case 'full':
      return { mode: 'full' };
    default: {
      const unreachable: never = options.pathDisclosure;
      return unreachable;
    }
  }
}

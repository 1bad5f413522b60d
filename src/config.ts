/**
 * Environment configuration
 *
 * The MCP host passes its env (from mcp.json) through process.env; everything is
 * read once at the composition root and handed down explicitly.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LLMProvider } from './clients/llm.js';

export type FinderProvider = LLMProvider | 'perplexity';

const llmProvider = z.enum(['gemini', 'openai', 'anthropic', 'openrouter']);
const finderProvider = z.enum(['gemini', 'openai', 'anthropic', 'openrouter', 'perplexity']);

const optionalKey = z.string().trim().min(1).optional().catch(undefined);

const EnvSchema = z.object({
  RESEARCH_MAX_ITERATIONS: z.coerce.number().int().min(1).max(20).default(5),
  RESEARCH_QUALITY_THRESHOLD: z.coerce.number().int().min(1).max(10).default(5),
  FINDER_PROVIDER: finderProvider.default('openrouter'),
  FINDER_MODEL: z.string().min(1).optional(),
  CRITIC_PROVIDER: llmProvider.default('openrouter'),
  CRITIC_MODEL: z.string().min(1).optional(),
  OPENROUTER_API_KEY: optionalKey,
  GEMINI_API_KEY: optionalKey,
  OPENAI_API_KEY: optionalKey,
  ANTHROPIC_API_KEY: optionalKey,
  PERPLEXITY_API_KEY: optionalKey,
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  RESULT_INLINE_LIMIT_BYTES: z.coerce.number().int().positive().default(65536),
  RESULT_TTL_MS: z.coerce.number().int().positive().default(3600000),
});

// Models used when no override is configured
export const DEFAULT_MODELS: Record<FinderProvider, string> = {
  openrouter: 'google/gemini-2.5-flash',
  gemini: 'gemini-2.5-flash',
  openai: 'gpt-5-mini',
  anthropic: 'claude-haiku-4-5',
  perplexity: 'sonar',
};

export interface RoleConfig<P extends string> {
  provider: P;
  model: string;
  apiKey: string;
}

export interface AppConfig {
  maxIterations: number;
  qualityThreshold: number;
  finder: RoleConfig<FinderProvider>;
  critic: RoleConfig<LLMProvider>;
  llmTimeoutMs: number;
  resultInlineLimitBytes: number;
  resultTtlMs: number;
}

type ParsedEnv = z.infer<typeof EnvSchema>;

const API_KEY_NAMES: Record<FinderProvider, keyof ParsedEnv> = {
  openrouter: 'OPENROUTER_API_KEY',
  gemini: 'GEMINI_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  perplexity: 'PERPLEXITY_API_KEY',
};

function requireKey(env: ParsedEnv, provider: FinderProvider, role: string): string {
  const name = API_KEY_NAMES[provider];
  const value = env[name];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${name} is required for the ${role} (provider: ${provider})`, name);
  }
  return value;
}

/**
 * Parse and validate configuration from an env record
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path.join('.') ?? 'env';
    throw new ConfigError(`Invalid configuration for ${key}: ${issue?.message ?? 'unknown error'}`, key);
  }
  const parsed = result.data;

  return {
    maxIterations: parsed.RESEARCH_MAX_ITERATIONS,
    qualityThreshold: parsed.RESEARCH_QUALITY_THRESHOLD,
    finder: {
      provider: parsed.FINDER_PROVIDER,
      model: parsed.FINDER_MODEL ?? DEFAULT_MODELS[parsed.FINDER_PROVIDER],
      apiKey: requireKey(parsed, parsed.FINDER_PROVIDER, 'finder'),
    },
    critic: {
      provider: parsed.CRITIC_PROVIDER,
      model: parsed.CRITIC_MODEL ?? DEFAULT_MODELS[parsed.CRITIC_PROVIDER],
      apiKey: requireKey(parsed, parsed.CRITIC_PROVIDER, 'critic'),
    },
    llmTimeoutMs: parsed.LLM_TIMEOUT_MS,
    resultInlineLimitBytes: parsed.RESULT_INLINE_LIMIT_BYTES,
    resultTtlMs: parsed.RESULT_TTL_MS,
  };
}

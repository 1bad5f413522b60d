/**
 * Concrete Finder and Critic roles backed by LLM providers.
 * The research core only sees the Finder/Critic interfaces; this module is where
 * the composition root picks providers and models.
 */

import { callLLM, LLMConfig } from './clients/llm.js';
import { AppConfig, RoleConfig } from './config.js';
import { EVALUATION_INSTRUCTIONS, FINDER_INSTRUCTIONS, PLANNING_INSTRUCTIONS, SYNTHESIS_INSTRUCTIONS } from './prompts.js';
import { formatWithSources, perplexitySearch } from './services/perplexity.js';
import { Critic, CriticMode, Finder, TokenUsage } from './types/index.js';

export type UsageListener = (usage: TokenUsage, model: string) => void;

const CRITIC_INSTRUCTIONS: Record<CriticMode, string> = {
  planning: PLANNING_INSTRUCTIONS,
  evaluation: EVALUATION_INSTRUCTIONS,
  synthesis: SYNTHESIS_INSTRUCTIONS,
};

// Synthesis writes long reports; judging needs far less room
const CRITIC_OUTPUT_TOKENS: Record<CriticMode, number> = {
  planning: 4000,
  evaluation: 4000,
  synthesis: 32000,
};

export function createLLMFinder(config: LLMConfig, onUsage?: UsageListener): Finder {
  return {
    async find(query) {
      const response = await callLLM(query, config, { system: FINDER_INSTRUCTIONS, critical: true });
      if (response.usage) onUsage?.(response.usage, response.model);
      return response.content;
    },
  };
}

export function createPerplexityFinder(apiKey: string, onUsage?: UsageListener): Finder {
  return {
    async find(query) {
      const result = await perplexitySearch(query, apiKey, { system: FINDER_INSTRUCTIONS });
      if (result.usage) onUsage?.(result.usage, result.model);
      return formatWithSources(result);
    },
  };
}

export function createLLMCritic(config: LLMConfig, onUsage?: UsageListener): Critic {
  return {
    async evaluate(prompt, mode) {
      const response = await callLLM(
        prompt,
        {
          ...config,
          maxOutputTokens: CRITIC_OUTPUT_TOKENS[mode],
          temperature: mode === 'synthesis' ? 0.2 : 0.1,
        },
        { system: CRITIC_INSTRUCTIONS[mode], critical: true }
      );
      if (response.usage) onUsage?.(response.usage, response.model);
      return response.content;
    },
  };
}

export interface Roles {
  finder: Finder;
  critic: Critic;
}

function toLLMConfig<P extends LLMConfig['provider']>(role: RoleConfig<P>, timeout: number): LLMConfig {
  return { provider: role.provider, model: role.model, apiKey: role.apiKey, timeout };
}

/**
 * Build both roles from configuration
 */
export function createRoles(config: AppConfig, onUsage?: UsageListener): Roles {
  const { finder } = config;
  return {
    finder: finder.provider === 'perplexity'
      ? createPerplexityFinder(finder.apiKey, onUsage)
      : createLLMFinder(
          { provider: finder.provider, model: finder.model, apiKey: finder.apiKey, timeout: config.llmTimeoutMs },
          onUsage
        ),
    critic: createLLMCritic(toLLMConfig(config.critic, config.llmTimeoutMs), onUsage),
  };
}

/**
 * Direct Perplexity API integration
 * Uses the Perplexity Sonar API for web search
 */

import { z } from 'zod';
import { LLMError } from '../clients/llm.js';
import { createLogger } from '../logger.js';
import { TokenUsage } from '../types/index.js';

const log = createLogger('Perplexity');

export interface PerplexityResult {
  content: string;
  sources: string[];
  model: string;
  usage?: TokenUsage;
}

const PerplexityResponseSchema = z.object({
  model: z.string().optional(),
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }).optional(),
  })).optional(),
  citations: z.array(z.string()).optional(),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).optional(),
});

export async function perplexitySearch(
  query: string,
  apiKey: string | undefined,
  options?: { system?: string }
): Promise<PerplexityResult> {
  if (!apiKey) {
    throw new LLMError('PERPLEXITY_API_KEY is required', 'sonar');
  }

  try {
    const response = await fetch('https://api.perplexity.ai/chat/completions', {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: 'sonar',
        messages: [
          {
            role: 'system',
            content: options?.system ?? 'You are a helpful research assistant. Provide comprehensive, accurate information with sources.',
          },
          {
            role: 'user',
            content: query,
          },
        ],
        temperature: 0.2,
        max_tokens: 3000,
      }),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new LLMError(`Perplexity API error (${response.status}): ${errorText}`, 'sonar', undefined, response.status);
    }

    const data = PerplexityResponseSchema.parse(await response.json());
    const usage = data.usage
      ? { inputTokens: data.usage.prompt_tokens ?? 0, outputTokens: data.usage.completion_tokens ?? 0 }
      : undefined;

    return {
      content: data.choices?.[0]?.message?.content || 'No response from Perplexity',
      sources: data.citations ?? [],
      model: data.model ?? 'sonar',
      usage,
    };
  } catch (error) {
    log.error('Error:', error);
    if (error instanceof LLMError) throw error;
    throw new LLMError(`Perplexity search failed: ${error instanceof Error ? error.message : String(error)}`, 'sonar', error);
  }
}

/**
 * Findings text with the citation list appended
 */
export function formatWithSources(result: PerplexityResult): string {
  if (result.sources.length === 0) return result.content;
  const list = result.sources.map((url, i) => `${i + 1}. ${url}`).join('\n');
  return `${result.content}\n\n**Sources:**\n${list}`;
}

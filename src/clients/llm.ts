import { z } from 'zod';
import { createLogger } from '../logger.js';
import { TokenUsage } from '../types/index.js';

const log = createLogger('LLM');

export type LLMProvider = 'gemini' | 'openai' | 'anthropic' | 'openrouter';

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey: string;
  timeout?: number;  // Timeout in milliseconds (default: 30000)
  maxOutputTokens?: number;  // Max output tokens (default: 10000)
  temperature?: number;  // Temperature for sampling (default: 0.7)
}

export interface LLMResponse {
  model: string;
  content: string;
  usage?: TokenUsage;
  error?: string;
}

export interface LLMCallOptions {
  /** System instructions sent alongside the prompt */
  system?: string;
  /** If true, throw error instead of returning empty content on failure */
  critical?: boolean;
  /** Minimum content length to consider response valid (default: 10) */
  minContentLength?: number;
}

export class LLMError extends Error {
  constructor(
    message: string,
    public readonly model: string,
    cause?: unknown,
    public readonly status?: number
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LLMError';
  }
}

interface ProviderRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

interface ProviderResult {
  content: string;
  usage?: TokenUsage;
}

const GeminiResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).optional(),
    }).optional(),
  })).optional(),
  usageMetadata: z.object({
    promptTokenCount: z.number().optional(),
    candidatesTokenCount: z.number().optional(),
  }).optional(),
});

const ChatCompletionResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }).optional(),
  })).optional(),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).optional(),
});

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })).optional(),
  usage: z.object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional(),
  }).optional(),
});

function toUsage(input: number | undefined, output: number | undefined): TokenUsage | undefined {
  if (input === undefined && output === undefined) return undefined;
  return { inputTokens: input ?? 0, outputTokens: output ?? 0 };
}

function chatMessages(prompt: string, system?: string): Array<{ role: string; content: string }> {
  return system
    ? [{ role: 'system', content: system }, { role: 'user', content: prompt }]
    : [{ role: 'user', content: prompt }];
}

function buildRequest(prompt: string, config: LLMConfig, system: string | undefined, maxOutputTokens: number, temperature: number): ProviderRequest {
  switch (config.provider) {
    case 'gemini':
      return {
        url: `https://generativelanguage.googleapis.com/v1beta/models/${config.model}:generateContent?key=${config.apiKey}`,
        headers: { 'Content-Type': 'application/json' },
        body: {
          ...(system ? { systemInstruction: { parts: [{ text: system }] } } : {}),
          contents: [{ parts: [{ text: prompt }] }],
          generationConfig: { temperature, maxOutputTokens },
        },
      };
    case 'openai':
      return {
        url: 'https://api.openai.com/v1/chat/completions',
        headers: { Authorization: `Bearer ${config.apiKey}`, 'Content-Type': 'application/json' },
        body: {
          model: config.model,
          messages: chatMessages(prompt, system),
          max_completion_tokens: maxOutputTokens,
        },
      };
    case 'openrouter':
      return {
        url: 'https://openrouter.ai/api/v1/chat/completions',
        headers: { Authorization: `Bearer ${config.apiKey}`, 'Content-Type': 'application/json' },
        body: {
          model: config.model,
          messages: chatMessages(prompt, system),
          max_tokens: maxOutputTokens,
          temperature,
        },
      };
    case 'anthropic':
      return {
        url: 'https://api.anthropic.com/v1/messages',
        headers: {
          'x-api-key': config.apiKey,
          'anthropic-version': '2023-06-01',
          'Content-Type': 'application/json',
        },
        body: {
          model: config.model,
          ...(system ? { system } : {}),
          messages: [{ role: 'user', content: prompt }],
          max_tokens: maxOutputTokens,
          temperature,
        },
      };
  }
}

function readResponse(provider: LLMProvider, data: unknown): ProviderResult {
  switch (provider) {
    case 'gemini': {
      const parsed = GeminiResponseSchema.parse(data);
      return {
        content: parsed.candidates?.[0]?.content?.parts?.map(p => p.text ?? '').join('') ?? '',
        usage: toUsage(parsed.usageMetadata?.promptTokenCount, parsed.usageMetadata?.candidatesTokenCount),
      };
    }
    case 'openai':
    case 'openrouter': {
      const parsed = ChatCompletionResponseSchema.parse(data);
      return {
        content: parsed.choices?.[0]?.message?.content ?? '',
        usage: toUsage(parsed.usage?.prompt_tokens, parsed.usage?.completion_tokens),
      };
    }
    case 'anthropic': {
      const parsed = AnthropicResponseSchema.parse(data);
      return {
        content: parsed.content?.filter(c => c.type === undefined || c.type === 'text').map(c => c.text ?? '').join('') ?? '',
        usage: toUsage(parsed.usage?.input_tokens, parsed.usage?.output_tokens),
      };
    }
  }
}

async function callProvider(
  prompt: string,
  config: LLMConfig,
  options: { system?: string; timeout: number; maxOutputTokens: number; temperature: number }
): Promise<ProviderResult> {
  const request = buildRequest(prompt, config, options.system, options.maxOutputTokens, options.temperature);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeout);

  try {
    const response = await fetch(request.url, {
      method: 'POST',
      headers: request.headers,
      body: JSON.stringify(request.body),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new LLMError(
        `${config.provider} API error: ${response.status} ${response.statusText}`,
        config.model,
        undefined,
        response.status
      );
    }

    const data: unknown = await response.json();
    return readResponse(config.provider, data);
  } finally {
    clearTimeout(timeoutId);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Call a single LLM
 * @param options.critical - If true, throws LLMError on failure instead of returning empty content
 * @param options.minContentLength - Minimum content length to consider response valid (default: 10)
 */
export async function callLLM(
  prompt: string,
  config: LLMConfig,
  options?: LLMCallOptions
): Promise<LLMResponse> {
  const { critical = false, minContentLength = 10, system } = options || {};
  const timeout = config.timeout || 30000;
  const maxOutputTokens = config.maxOutputTokens || 10000;
  const temperature = config.temperature ?? 0.7;

  try {
    const { content, usage } = await callProvider(prompt, config, { system, timeout, maxOutputTokens, temperature });

    // Fail-fast: throw if content is too short and this is a critical call
    if (critical && content.length < minContentLength) {
      throw new LLMError(
        `Critical LLM call returned insufficient content (${content.length} chars, need ${minContentLength})`,
        config.model
      );
    }

    return { model: config.model, content, usage };
  } catch (error) {
    // If it's already an LLMError (from fail-fast or HTTP status), re-throw on critical calls
    if (error instanceof LLMError && critical) {
      throw error;
    }

    const message = errorMessage(error);
    log.error(`${config.model} failed: ${message}`);

    if (critical) {
      throw new LLMError(`Critical LLM call failed: ${message}`, config.model, error);
    }

    return {
      model: config.model,
      content: '',
      error: message,
    };
  }
}

/**
 * Verdict Parser
 *
 * Turns whatever the Critic returned into a usable Verdict. The Critic is told to
 * answer with a JSON object, but models wrap it in fences, prepend chatter or
 * follow it with a full report, so extraction tries several strategies:
 *
 * 1. Fenced block (```json ... ```)
 * 2. First top-level object found by a string-aware brace-depth scan
 * 3. The whole trimmed text when it looks like a bare object
 *
 * Nothing here throws. A response with no usable object yields the
 * default-optimistic verdict so a malformed answer can never stall research.
 */

import { z } from 'zod';
import { createLogger } from './logger.js';
import { SubtaskSpec, Verdict } from './types/index.js';

const log = createLogger('Parser');

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)\s*```/i;

export const DEFAULT_VERDICT_REASONING = 'Evaluation parsing failed, accepting research as satisfactory.';

export function createDefaultVerdict(): Verdict {
  return {
    isSatisfactory: true,
    qualityScore: 7,
    gaps: [],
    followUpQuestions: [],
    refinedQuery: null,
    reasoning: DEFAULT_VERDICT_REASONING,
  };
}

/**
 * Location of a JSON object inside a larger text (`end` is the index of the closing brace)
 */
export interface JsonSpan {
  start: number;
  end: number;
}

/**
 * Find the first top-level `{ ... }` in text.
 * Braces inside string literals (including escaped quotes) do not count toward depth.
 */
export function locateJsonObject(text: string): JsonSpan | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (escaped) {
      escaped = false;
      continue;
    }

    if (inString) {
      if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return { start, end: i };
      }
    }
  }

  // Unbalanced (usually a truncated response)
  return null;
}

/**
 * Return the prose that follows the JSON preamble of a Critic response.
 * Without a JSON object the text is returned unchanged; when nothing follows the
 * object, `fallback` is returned instead.
 */
export function extractTrailingProse(text: string, fallback: string): string {
  const span = locateJsonObject(text);
  if (!span) return text;

  const trailing = text
    .slice(span.end + 1)
    .replace(/^\s*```\s*/, '')   // closing fence of a ```json block
    .trim();

  return trailing.length > 0 ? trailing : fallback;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(candidate: string | null): Record<string, unknown> | null {
  if (!candidate) return null;
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Field names are matched case-insensitively ("IsSatisfactory", "subTasks", ...)
 */
function lowerKeys(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key.toLowerCase()] = value;
  }
  return out;
}

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform(items => items.filter((item): item is string => typeof item === 'string' && item.trim().length > 0));

// Integers may arrive quoted ("2"); anything else is not an integer
function toInteger(value: unknown): number | null {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null;
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return Number(value.trim());
  return null;
}

const integer = z.unknown().transform((value, ctx) => {
  const n = toInteger(value);
  if (n === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected an integer' });
    return z.NEVER;
  }
  return n;
});

const integerList = z
  .array(z.unknown())
  .catch([])
  .transform(items => items.map(toInteger).filter((item): item is number => item !== null));

const score = z.unknown().transform(value => {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
  return Number.isFinite(n) ? Math.round(n) : 0;
});

const flag = z.unknown().transform(value =>
  value === true || (typeof value === 'string' && value.trim().toLowerCase() === 'true')
);

const optionalQuery = z.unknown().transform(value =>
  typeof value === 'string' && value.trim().length > 0 ? value.trim() : null
);

const SubtaskSchema = z.object({
  id: integer,
  query: z.string().trim().min(1),
  rationale: z.string().catch(''),
  dependson: integerList,
  expectedoutcome: z.string().catch(''),
});

const VerdictSchema = z.object({
  issatisfactory: flag,
  qualityscore: score,
  gaps: stringList,
  followupquestions: stringList,
  refinedquery: optionalQuery,
  reasoning: z.string().catch(''),
});

function parseSubtasks(raw: unknown): SubtaskSpec[] {
  if (!Array.isArray(raw)) return [];

  const subtasks: SubtaskSpec[] = [];
  for (const entry of raw) {
    if (!isPlainObject(entry)) continue;
    const result = SubtaskSchema.safeParse(lowerKeys(entry));
    if (!result.success) {
      log.debug('Dropping malformed subtask entry');
      continue;
    }
    subtasks.push({
      id: result.data.id,
      query: result.data.query,
      rationale: result.data.rationale,
      dependsOn: result.data.dependson,
      expectedOutcome: result.data.expectedoutcome,
    });
  }
  return subtasks;
}

function toVerdict(obj: Record<string, unknown>): Verdict | null {
  const fields = lowerKeys(obj);
  const result = VerdictSchema.safeParse(fields);
  if (!result.success) return null;

  const verdict: Verdict = {
    isSatisfactory: result.data.issatisfactory,
    qualityScore: result.data.qualityscore,
    gaps: result.data.gaps,
    followUpQuestions: result.data.followupquestions,
    refinedQuery: result.data.refinedquery,
    reasoning: result.data.reasoning,
  };

  if ('subtasks' in fields) {
    verdict.subtasks = parseSubtasks(fields.subtasks);
  }

  return verdict;
}

/**
 * Parse a Critic response into a Verdict. Never throws.
 */
export function parseVerdict(text: string): Verdict {
  const strategies: Array<() => string | null> = [
    () => FENCED_BLOCK.exec(text)?.[1] ?? null,
    () => {
      const span = locateJsonObject(text);
      return span ? text.slice(span.start, span.end + 1) : null;
    },
    () => {
      const trimmed = text.trim();
      return trimmed.startsWith('{') && trimmed.endsWith('}') ? trimmed : null;
    },
  ];

  for (const strategy of strategies) {
    const obj = tryParseObject(strategy());
    if (!obj) continue;
    const verdict = toVerdict(obj);
    if (verdict) return verdict;
  }

  log.warn(`No JSON verdict found in ${text.length} chars, using default verdict`);
  return createDefaultVerdict();
}

/**
 * Synthesis Phase - combines completed subtask findings into one deliverable
 *
 * 0 completed → fixed message, 1 completed → its findings verbatim (no Critic
 * call, nothing can be lost), 2+ → Critic synthesis with the JSON preamble
 * stripped from the report.
 */

import { createLogger } from './logger.js';
import { ResearchPlan } from './plan.js';
import { buildSynthesisPrompt } from './prompts.js';
import { Critic } from './types/index.js';
import { extractTrailingProse } from './verdict-parser.js';

const log = createLogger('Synthesis');

export const NOTHING_COMPLETED_MESSAGE = 'No research subtasks were completed, so there are no findings to report.';

// Content-loss diagnostic thresholds
const MIN_RETAINED_RATIO = 0.5;
const MIN_RAW_BYTES_FOR_CHECK = 1000;

export interface SynthesisOutcome {
  text: string;
  rawBytes: number;
  extractedBytes: number;
  contentLossSuspected: boolean;
  criticCalled: boolean;
}

function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

/**
 * True when prose extraction kept less than half of a large response
 */
export function isContentLossSuspected(rawBytes: number, extractedBytes: number): boolean {
  return rawBytes > MIN_RAW_BYTES_FOR_CHECK && extractedBytes < rawBytes * MIN_RETAINED_RATIO;
}

export async function synthesizeWithDiagnostics(
  plan: ResearchPlan,
  critic: Critic
): Promise<SynthesisOutcome> {
  const completed = plan.subtasks.filter(st => st.isComplete);

  if (completed.length === 0) {
    log.info('No completed subtasks, returning fixed message');
    return { text: NOTHING_COMPLETED_MESSAGE, rawBytes: 0, extractedBytes: 0, contentLossSuspected: false, criticCalled: false };
  }

  if (completed.length === 1) {
    const findings = completed[0].findings ?? '';
    log.info(`Single completed subtask, returning its findings verbatim (${findings.length} chars)`);
    const bytes = byteLength(findings);
    return { text: findings, rawBytes: bytes, extractedBytes: bytes, contentLossSuspected: false, criticCalled: false };
  }

  log.info(`Synthesizing ${completed.length} subtasks...`);
  const prompt = buildSynthesisPrompt(plan.originalQuery, completed.length, plan.allFindings);
  const raw = await critic.evaluate(prompt, 'synthesis');
  const text = extractTrailingProse(raw, raw);

  const rawBytes = byteLength(raw);
  const extractedBytes = byteLength(text);
  const contentLossSuspected = isContentLossSuspected(rawBytes, extractedBytes);

  if (contentLossSuspected) {
    log.warn(`Possible content loss: extracted ${extractedBytes} of ${rawBytes} bytes (${Math.round((extractedBytes / rawBytes) * 100)}%)`);
  } else {
    log.info(`Synthesis complete: ${extractedBytes} bytes`);
  }

  return { text, rawBytes, extractedBytes, contentLossSuspected, criticCalled: true };
}

export async function synthesize(plan: ResearchPlan, critic: Critic): Promise<string> {
  const outcome = await synthesizeWithDiagnostics(plan, critic);
  return outcome.text;
}

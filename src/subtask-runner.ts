/**
 * Subtask Runner - refine-until-satisfactory loop for a single subtask
 *
 * Each iteration: Finder → Critic → log → accept or refine.
 * A subtask always ends complete unless the run is cancelled: when the Critic
 * stays unhappy the most recent findings are accepted anyway.
 */

import { createLogger } from './logger.js';
import { Subtask } from './plan.js';
import { buildEvaluationPrompt, buildRefinementPrompt } from './prompts.js';
import { ResearchState } from './research-state.js';
import { Critic, Finder, ProgressListener, ResearchSettings, Verdict } from './types/index.js';
import { parseVerdict } from './verdict-parser.js';

const log = createLogger('Subtask');

export interface RunContext {
  finder: Finder;
  critic: Critic;
  session: ResearchState;
  settings: ResearchSettings;
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

export type SubtaskOutcome =
  | 'accepted'            // met the quality threshold
  | 'no-refinement'       // Critic offered nothing to refine with
  | 'budget-exhausted'    // forced acceptance of the last attempt
  | 'cancelled';

/**
 * Ask the Critic to judge findings for one subtask
 */
export async function evaluateFindings(
  critic: Critic,
  originalQuery: string,
  subtask: Subtask,
  findings: string
): Promise<Verdict> {
  const prompt = buildEvaluationPrompt(originalQuery, subtask.query, subtask.expectedOutcome, findings);
  const response = await critic.evaluate(prompt, 'evaluation');
  return parseVerdict(response);
}

/**
 * The next query the Critic wants, or null when it offered none
 */
export function chooseNextQuery(verdict: Verdict): string | null {
  if (verdict.refinedQuery) return verdict.refinedQuery;
  return verdict.followUpQuestions[0] ?? null;
}

export async function runSubtask(originalQuery: string, subtask: Subtask, ctx: RunContext): Promise<SubtaskOutcome> {
  const { finder, critic, session, settings, signal, onProgress } = ctx;
  const maxIterations = Math.max(1, settings.maxIterations);

  let query = subtask.query;
  let lastFindings = '';
  let lastScore = 0;

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    if (signal?.aborted) {
      log.info(`Subtask ${subtask.id} cancelled before iteration ${iteration}`);
      return 'cancelled';
    }

    // Calls already under way run to completion; cancellation waits for the next iteration
    const findings = await finder.find(query);
    const verdict = await evaluateFindings(critic, originalQuery, subtask, findings);
    session.addIteration(query, findings, verdict, subtask.id);

    lastFindings = findings;
    lastScore = verdict.qualityScore;
    onProgress?.(`Subtask ${subtask.id} iteration ${iteration}: score ${verdict.qualityScore}/10`);
    log.debug(`Subtask ${subtask.id} iteration ${iteration}: satisfactory=${verdict.isSatisfactory}, score=${verdict.qualityScore}`);

    if (verdict.isSatisfactory && verdict.qualityScore >= settings.qualityThreshold) {
      subtask.complete(findings, verdict.qualityScore);
      return 'accepted';
    }

    const nextQuery = chooseNextQuery(verdict);
    if (!nextQuery) {
      log.info(`Subtask ${subtask.id}: no refinement suggested, accepting score ${verdict.qualityScore}`);
      subtask.complete(findings, verdict.qualityScore);
      return 'no-refinement';
    }

    query = buildRefinementPrompt(findings, verdict, nextQuery);
  }

  log.info(`Subtask ${subtask.id}: ${maxIterations} iteration(s) used, accepting last findings (score ${lastScore})`);
  subtask.complete(lastFindings, lastScore);
  return 'budget-exhausted';
}

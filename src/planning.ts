/**
 * Planning Phase - asks the Critic to decompose a query into a subtask graph
 *
 * A failed decomposition is not an error: `decompose` returns null and the
 * controller falls back to single-shot research on the original query.
 */

import { createLogger } from './logger.js';
import { ResearchPlan } from './plan.js';
import { buildPlanningPrompt } from './prompts.js';
import { Critic, SubtaskSpec } from './types/index.js';
import { parseVerdict } from './verdict-parser.js';

const log = createLogger('Planning');

/**
 * Drop duplicate ids and dependency ids that point outside the plan
 */
export function sanitizeSubtasks(specs: SubtaskSpec[]): SubtaskSpec[] {
  const seen = new Set<number>();
  const unique = specs.filter(spec => {
    if (seen.has(spec.id)) {
      log.warn(`Duplicate subtask id ${spec.id} dropped`);
      return false;
    }
    seen.add(spec.id);
    return true;
  });

  return unique.map(spec => {
    const dependsOn = spec.dependsOn.filter(dep => seen.has(dep));
    if (dependsOn.length !== spec.dependsOn.length) {
      log.warn(`Subtask ${spec.id}: removed unknown dependencies (${spec.dependsOn.join(', ')} -> ${dependsOn.join(', ') || 'none'})`);
    }
    return { ...spec, dependsOn };
  });
}

export async function decompose(query: string, critic: Critic): Promise<ResearchPlan | null> {
  const response = await critic.evaluate(buildPlanningPrompt(query), 'planning');
  const verdict = parseVerdict(response);

  if (!verdict.subtasks || verdict.subtasks.length === 0) {
    log.info('Critic returned no subtasks, falling back to single-shot research');
    return null;
  }

  const subtasks = sanitizeSubtasks(verdict.subtasks);
  log.info(`Decomposed into ${subtasks.length} subtask(s): ${subtasks.map(st => `${st.id}${st.dependsOn.length ? `<-[${st.dependsOn.join(',')}]` : ''}`).join(' ')}`);

  return ResearchPlan.fromSpecs(query, subtasks, verdict.reasoning);
}

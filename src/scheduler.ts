/**
 * Scheduler - drives the Subtask Runner over a plan, one subtask at a time.
 * Independent subtasks still run sequentially so the iteration log stays in a
 * strict order and the number of Finder/Critic calls is predictable.
 */

import { createLogger } from './logger.js';
import { ResearchPlan } from './plan.js';
import { RunContext, runSubtask } from './subtask-runner.js';

const log = createLogger('Scheduler');

export type ScheduleOutcome = 'completed' | 'stalled' | 'cancelled';

export async function runPlan(plan: ResearchPlan, ctx: RunContext): Promise<ScheduleOutcome> {
  while (!plan.allComplete) {
    if (ctx.signal?.aborted) {
      log.info(`Cancelled with ${plan.completedCount}/${plan.subtasks.length} subtasks complete`);
      return 'cancelled';
    }

    const next = plan.nextReady;
    if (!next) {
      const cycle = plan.findCycle();
      log.warn(
        `No runnable subtask, stopping with ${plan.completedCount}/${plan.subtasks.length} complete` +
        (cycle ? ` (dependency cycle: ${cycle.join(' -> ')})` : '')
      );
      return 'stalled';
    }

    log.info(`Running subtask ${next.id}: "${next.query}"`);
    ctx.onProgress?.(`Researching subtask ${next.id}/${plan.subtasks.length}: ${next.query}`);

    const outcome = await runSubtask(plan.originalQuery, next, ctx);
    if (outcome === 'cancelled') {
      return 'cancelled';
    }
  }

  return 'completed';
}

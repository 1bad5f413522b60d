import { TaskBroker } from './broker.js';
import { isTerminal, JobStore, ResearchJob, generateJobId } from './jobs.js';
import { createLogger } from './logger.js';
import { Clock, systemClock } from './types/index.js';

const log = createLogger('Jobs');

export const DEFAULT_AGENT_TYPE = 'research';

export interface StartResearchParams {
  query: string;
  agent_type?: string;
  output_path?: string;
}

export interface JobServices {
  broker: TaskBroker;
  jobs: JobStore;
  /** Cancels a task the worker is already running */
  worker: { cancel(taskId: string): boolean };
  clock?: Clock;
}

/**
 * Create a job, wire its broker subscriptions, and queue the task.
 * Returns as soon as the task is queued; the worker runs it in the background.
 */
export async function startResearchJob(params: StartResearchParams, services: JobServices): Promise<ResearchJob> {
  const { broker, jobs } = services;
  const clock = services.clock ?? systemClock;
  const agentType = params.agent_type ?? DEFAULT_AGENT_TYPE;

  const id = generateJobId(clock);
  const job = jobs.create(id, params.query, agentType, clock().getTime());

  const stopProgress = broker.subscribeToProgress(id, progress => jobs.applyProgress(progress));
  let stopResult: (() => void) | undefined;
  stopResult = broker.subscribeToResult(id, result => {
    jobs.applyResult(result);
    stopProgress();
    stopResult?.();
  });

  await broker.submitTask({
    taskId: id,
    agentType,
    prompt: params.query,
    submittedAt: clock(),
    ...(params.output_path ? { outputPath: params.output_path } : {}),
  });

  return job;
}

export type CancelOutcome = 'not-found' | 'already-finished' | 'cancelling' | 'cancelled';

/**
 * Cancel a job. A queued task is withdrawn and reported cancelled right away;
 * a running one stops at its next checkpoint.
 */
export async function cancelResearchJob(id: string, services: JobServices): Promise<CancelOutcome> {
  const { broker, jobs, worker } = services;
  const clock = services.clock ?? systemClock;

  const job = jobs.get(id);
  if (!job) return 'not-found';
  if (isTerminal(job.status)) return 'already-finished';

  if (worker.cancel(id)) {
    return 'cancelling';
  }

  if (broker.withdrawTask(id)) {
    await broker.publishResult({
      taskId: id,
      status: 'cancelled',
      data: null,
      error: 'Task was cancelled before it started.',
      completedAt: clock(),
    });
    return 'cancelled';
  }

  // Not queued and not running: its result is already being published
  log.warn(`Job ${id} is neither queued nor running`);
  return 'already-finished';
}

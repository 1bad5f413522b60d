import { createLogger } from './logger.js';
import { Clock, systemClock } from './types/index.js';
import { AgentTaskProgress, AgentTaskResult, AgentTaskStatus, ResearchResultData } from './types/tasks.js';

const log = createLogger('Jobs');

// Only the most recent progress lines are kept per job
export const PROGRESS_LOG_LIMIT = 50;

export interface ResearchJob {
  id: string;
  status: AgentTaskStatus;
  agentType: string;
  query: string;
  createdAt: number;
  completedAt?: number;
  progress?: string;
  progressLog: string[];
  inputTokens?: number;
  outputTokens?: number;
  result?: ResearchResultData;
  storageKey?: string;       // Set when the result was too large to keep inline
  error?: string;
  reportPath?: string;
}

/**
 * Generate unique job ID
 */
export function generateJobId(clock: Clock = systemClock): string {
  return `research-${clock().getTime()}-${Math.random().toString(36).slice(2, 8)}`;
}

export function isTerminal(status: AgentTaskStatus): boolean {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

/**
 * In-memory view of submitted jobs, fed by broker progress and result messages.
 * Nothing is persisted; jobs are gone after a restart.
 */
export class JobStore {
  private readonly jobs = new Map<string, ResearchJob>();

  create(id: string, query: string, agentType: string, createdAt: number): ResearchJob {
    const job: ResearchJob = {
      id,
      status: 'pending',
      agentType,
      query,
      createdAt,
      progress: 'Queued',
      progressLog: [],
    };
    this.jobs.set(id, job);
    log.info(`Created job ${id} for: "${query}"`);
    return job;
  }

  get(id: string): ResearchJob | undefined {
    return this.jobs.get(id);
  }

  get size(): number {
    return this.jobs.size;
  }

  applyProgress(progress: AgentTaskProgress): void {
    const job = this.jobs.get(progress.taskId);
    if (!job || isTerminal(job.status)) return;

    job.status = 'running';
    job.progress = progress.message;
    job.progressLog.push(progress.message);
    if (job.progressLog.length > PROGRESS_LOG_LIMIT) {
      job.progressLog.splice(0, job.progressLog.length - PROGRESS_LOG_LIMIT);
    }
    if (progress.inputTokens !== undefined) job.inputTokens = progress.inputTokens;
    if (progress.outputTokens !== undefined) job.outputTokens = progress.outputTokens;
  }

  applyResult(result: AgentTaskResult): void {
    const job = this.jobs.get(result.taskId);
    if (!job) {
      log.warn(`Result for unknown job ${result.taskId}`);
      return;
    }

    job.status = result.status;
    job.completedAt = result.completedAt.getTime();
    job.progress = result.status === 'completed' ? 'Complete' : result.status === 'cancelled' ? 'Cancelled' : 'Failed';
    if (result.error) job.error = result.error;

    if (result.data?.kind === 'inline') {
      job.result = result.data.value;
      job.reportPath = result.data.value.reportPath;
    } else if (result.data?.kind === 'stored') {
      job.storageKey = result.data.storageKey;
    }
    log.info(`Job ${job.id} ${result.status}`);
  }

  /**
   * Drop finished jobs older than maxAgeMs; returns how many were removed
   */
  prune(maxAgeMs: number, now: number): number {
    let removed = 0;
    for (const [id, job] of this.jobs) {
      if (job.completedAt !== undefined && now - job.completedAt > maxAgeMs) {
        this.jobs.delete(id);
        removed++;
      }
    }
    return removed;
  }
}

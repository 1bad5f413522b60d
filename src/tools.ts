/**
 * MCP tool handlers: start, poll and cancel research jobs.
 * Handlers are plain functions over explicit services so they can run without a transport.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { cancelResearchJob, CancelOutcome, JobServices, startResearchJob } from './job-orchestrator.js';
import { ResearchJob } from './jobs.js';
import { ResultStore } from './storage/result-store.js';
import { systemClock } from './types/index.js';
import { ResearchResultData } from './types/tasks.js';

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface ToolServices extends JobServices {
  resultStore: ResultStore<ResearchResultData>;
}

// Number of progress lines echoed back while a job runs
const RECENT_PROGRESS_LINES = 5;

function textResponse(text: string, isError = false): ToolResponse {
  return isError ? { content: [{ type: 'text', text }], isError } : { content: [{ type: 'text', text }] };
}

function jsonResponse(value: unknown, isError = false): ToolResponse {
  return textResponse(JSON.stringify(value, null, 2), isError);
}

export function withReportFooter(text: string, reportPath: string | undefined): string {
  return reportPath ? `${text}\n\n---\n**Report saved to**: \`${reportPath}\`` : text;
}

export async function handleStartResearch(
  params: { query: string; agent_type?: string; output_path?: string },
  services: ToolServices
): Promise<ToolResponse> {
  if (!params.query.trim()) {
    return jsonResponse({ error: 'Invalid query', message: 'query must not be empty' }, true);
  }

  const job = await startResearchJob(params, services);
  return jsonResponse({
    task_id: job.id,
    status: job.status,
    agent_type: job.agentType,
    message: 'Research job queued. Poll check_research_status every ~30 seconds until status is "completed", "failed" or "cancelled".',
    query: job.query,
  });
}

/**
 * Resolve a finished job's payload, pulling it from the result store when it was too large to keep inline
 */
function resolveResult(job: ResearchJob, resultStore: ResultStore<ResearchResultData>): ResearchResultData | null {
  if (job.result) return job.result;
  if (job.storageKey) return resultStore.retrieve(job.storageKey);
  return null;
}

export function handleCheckStatus(params: { task_id: string }, services: ToolServices): ToolResponse {
  const job = services.jobs.get(params.task_id);
  if (!job) {
    return jsonResponse({
      error: 'Job not found',
      message: `No job with ID "${params.task_id}". Jobs are kept in memory and do not survive a restart.`,
    }, true);
  }

  if (job.status === 'completed') {
    const result = resolveResult(job, services.resultStore);
    if (result) {
      return textResponse(withReportFooter(result.text, result.reportPath));
    }
    return jsonResponse({
      task_id: job.id,
      status: job.status,
      error: 'Result expired',
      message: 'The stored result is no longer available. Start the research again.',
    }, true);
  }

  const response: Record<string, unknown> = {
    task_id: job.id,
    status: job.status,
    agent_type: job.agentType,
    query: job.query,
    created_at: new Date(job.createdAt).toISOString(),
  };

  if (job.status === 'pending' || job.status === 'running') {
    response.progress = job.progress;
    response.recent_progress = job.progressLog.slice(-RECENT_PROGRESS_LINES);
  }
  if (job.inputTokens !== undefined || job.outputTokens !== undefined) {
    response.tokens = { input: job.inputTokens ?? 0, output: job.outputTokens ?? 0 };
  }
  if (job.completedAt !== undefined) {
    response.completed_at = new Date(job.completedAt).toISOString();
    response.duration_seconds = Math.round((job.completedAt - job.createdAt) / 1000);
  }
  if (job.error) {
    response.error = job.error;
  }

  return jsonResponse(response);
}

const CANCEL_MESSAGES: Record<CancelOutcome, string> = {
  'not-found': 'No job with that ID.',
  'already-finished': 'The job has already finished.',
  cancelling: 'Cancellation requested. The job stops at its next checkpoint.',
  cancelled: 'The job was cancelled before it started.',
};

export async function handleCancelResearch(params: { task_id: string }, services: ToolServices): Promise<ToolResponse> {
  const outcome = await cancelResearchJob(params.task_id, services);
  return jsonResponse(
    { task_id: params.task_id, outcome, message: CANCEL_MESSAGES[outcome] },
    outcome === 'not-found'
  );
}

export function registerResearchTools(server: McpServer, services: ToolServices): void {
  server.registerTool(
    'start_research',
    {
      title: 'Iterative Research (Async)',
      description: `Researches a question by decomposing it into dependency-ordered subtasks, refining each until a critic judges it good enough, then synthesizing one answer.

Returns a task_id immediately. Poll check_research_status for the result.

**Agent types:**
- research (default): full decompose → refine → synthesize loop
- quick-research: a single search with no planning or evaluation`,
      inputSchema: {
        query: z.string().describe('The research question. Example: "Compare approach A and approach B for caching API responses"'),
        agent_type: z
          .string()
          .optional()
          .describe('Agent to run: "research" (default) or "quick-research"'),
        output_path: z
          .string()
          .optional()
          .describe('Optional file path where the final markdown report is written'),
      },
    },
    async params => handleStartResearch(params, services)
  );

  server.registerTool(
    'check_research_status',
    {
      title: 'Check Research Job Status',
      description: `Check the status of a job started with start_research.

**Status values:**
- pending: queued behind other jobs
- running: research is in progress, recent progress lines are included
- completed: the synthesized answer is returned
- failed: the error is included
- cancelled: the job was stopped by cancel_research`,
      inputSchema: {
        task_id: z.string().describe('The task_id returned from start_research'),
      },
    },
    async params => handleCheckStatus(params, services)
  );

  server.registerTool(
    'cancel_research',
    {
      title: 'Cancel Research Job',
      description: 'Cancel a queued or running research job. A running job stops at its next checkpoint and reports status "cancelled".',
      inputSchema: {
        task_id: z.string().describe('The task_id returned from start_research'),
      },
    },
    async params => handleCancelResearch(params, services)
  );
}

/**
 * Periodic cleanup of finished jobs and expired stored results
 */
export function startJanitor(services: ToolServices, maxAgeMs: number, intervalMs = 5 * 60 * 1000): () => void {
  const clock = services.clock ?? systemClock;
  const timer = setInterval(() => {
    services.jobs.prune(maxAgeMs, clock().getTime());
    services.resultStore.evictExpired();
  }, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
}

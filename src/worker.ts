/**
 * Agent Worker - takes requests off the broker, runs them, publishes results
 *
 * Agent types are parsed into a closed union; an unknown type becomes a failed
 * result instead of an exception.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { TaskBroker } from './broker.js';
import { ResearchController, researchDirectly } from './controller.js';
import { ResearchCancelledError } from './errors.js';
import { createLogger } from './logger.js';
import { ResearchState } from './research-state.js';
import { Roles, UsageListener } from './roles.js';
import { ResultStore } from './storage/result-store.js';
import { AgentTaskContext } from './task-context.js';
import { Clock, ResearchSettings, systemClock } from './types/index.js';
import { AgentTaskData, AgentTaskRequest, AgentTaskResult, AgentTaskStatus, ResearchResultData } from './types/tasks.js';

const log = createLogger('Worker');

export type AgentKind =
  | { kind: 'research' }
  | { kind: 'quick-research' }
  | { kind: 'unsupported'; agentType: string };

export function parseAgentKind(agentType: string): AgentKind {
  switch (agentType.trim().toLowerCase()) {
    case 'research':
      return { kind: 'research' };
    case 'quick-research':
    case 'quick_research':
      return { kind: 'quick-research' };
    default:
      return { kind: 'unsupported', agentType };
  }
}

export type ReportWriter = (path: string, markdown: string) => Promise<void>;

const writeReportFile: ReportWriter = async (path, markdown) => {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, markdown, 'utf-8');
};

export interface AgentWorkerOptions {
  broker: TaskBroker;
  /** Builds fresh roles for a task; usage is routed to that task's context */
  createRoles: (onUsage: UsageListener) => Roles;
  settings: ResearchSettings;
  resultStore: ResultStore<ResearchResultData>;
  resultInlineLimitBytes: number;
  clock?: Clock;
  writeReport?: ReportWriter;
}

export function formatReport(session: ResearchState): string {
  return `# Research: ${session.originalQuery}\n\n${session.finalSynthesis ?? ''}\n`;
}

export function toResultData(session: ResearchState, agentType: string, timestamp: Date, reportPath?: string): ResearchResultData {
  return {
    agentType,
    text: session.finalSynthesis ?? '',
    iterations: session.iterations.map(it => ({
      iterationNumber: it.iterationNumber,
      subtaskId: it.subtaskId,
      query: it.query,
      qualityScore: it.evaluation.qualityScore,
      isSatisfactory: it.evaluation.isSatisfactory,
      timestamp: it.timestamp.toISOString(),
    })),
    subtasks: (session.plan?.subtasks ?? []).map(st => ({
      id: st.id,
      query: st.query,
      dependsOn: [...st.dependsOn],
      isComplete: st.isComplete,
      qualityScore: st.qualityScore,
    })),
    ...(reportPath ? { reportPath } : {}),
    timestamp: timestamp.toISOString(),
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class AgentWorker {
  private readonly broker: TaskBroker;
  private readonly clock: Clock;
  private readonly writeReport: ReportWriter;
  private readonly running = new Map<string, AbortController>();

  constructor(private readonly options: AgentWorkerOptions) {
    this.broker = options.broker;
    this.clock = options.clock ?? systemClock;
    this.writeReport = options.writeReport ?? writeReportFile;
  }

  /**
   * Subscribe to the task queue. Returns the unsubscribe function.
   */
  start(): () => void {
    log.info('Subscribing to task queue...');
    return this.broker.subscribeToTasks(async request => {
      await this.processTask(request);
    });
  }

  /**
   * Request cancellation of a running task. Takes effect at its next checkpoint.
   */
  cancel(taskId: string): boolean {
    const controller = this.running.get(taskId);
    if (!controller) return false;
    controller.abort();
    log.info(`Cancellation requested for ${taskId}`);
    return true;
  }

  isRunning(taskId: string): boolean {
    return this.running.has(taskId);
  }

  async processTask(request: AgentTaskRequest): Promise<AgentTaskResult> {
    log.info(`Processing task ${request.taskId} of type ${request.agentType}`);

    const controller = new AbortController();
    this.running.set(request.taskId, controller);
    const context = new AgentTaskContext(request.taskId, this.broker, this.clock);

    let result: AgentTaskResult;
    try {
      const agent = parseAgentKind(request.agentType);
      switch (agent.kind) {
        case 'research':
        case 'quick-research': {
          const session = await this.runAgent(agent.kind, request, context, controller.signal);
          const data = await this.packageResult(request, session);
          result = this.buildResult(request.taskId, 'completed', data, null);
          log.info(`Task ${request.taskId} completed successfully`);
          break;
        }
        case 'unsupported':
          result = this.buildResult(request.taskId, 'failed', null, `Unknown agent type: ${agent.agentType}`);
          log.error(`Task ${request.taskId} failed: unknown agent type ${agent.agentType}`);
          break;
        default: {
          const unreachable: never = agent;
          throw new Error(`Unhandled agent kind: ${JSON.stringify(unreachable)}`);
        }
      }
    } catch (error) {
      if (error instanceof ResearchCancelledError || controller.signal.aborted) {
        result = this.buildResult(request.taskId, 'cancelled', null, 'Task was cancelled.');
        log.info(`Task ${request.taskId} was cancelled`);
      } else {
        const message = errorMessage(error);
        result = this.buildResult(request.taskId, 'failed', null, message);
        log.error(`Task ${request.taskId} failed with error: ${message}`);
      }
    } finally {
      this.running.delete(request.taskId);
    }

    await this.broker.publishResult(result);
    return result;
  }

  private async runAgent(
    kind: 'research' | 'quick-research',
    request: AgentTaskRequest,
    context: AgentTaskContext,
    signal: AbortSignal
  ): Promise<ResearchState> {
    const roles = this.options.createRoles((usage, model) => context.addTokenUsage(usage, model));
    const report = (message: string) => {
      context.reportProgress(message).catch(err => log.error(`Failed to publish progress for ${context.taskId}:`, err));
    };

    if (kind === 'quick-research') {
      context.currentAgentName = 'Finder';
      report(`Researching: "${request.prompt}"`);
      if (signal.aborted) {
        throw new ResearchCancelledError('Research cancelled before it started');
      }
      const session = await researchDirectly(request.prompt, roles.finder, new ResearchState(request.prompt, this.clock));
      report('Research complete after 1 iteration(s).');
      return session;
    }

    context.currentAgentName = 'ResearchController';
    const researcher = new ResearchController({
      finder: roles.finder,
      critic: roles.critic,
      settings: this.options.settings,
      clock: this.clock,
    });
    return researcher.research(request.prompt, { signal, onProgress: report });
  }

  private async packageResult(request: AgentTaskRequest, session: ResearchState): Promise<AgentTaskData> {
    let reportPath: string | undefined;
    if (request.outputPath) {
      try {
        await this.writeReport(request.outputPath, formatReport(session));
        reportPath = request.outputPath;
        log.info(`Report saved to: ${request.outputPath}`);
      } catch (err) {
        log.error('Failed to save report:', err);
      }
    }

    const data = toResultData(session, request.agentType, this.clock(), reportPath);
    const bytes = Buffer.byteLength(JSON.stringify(data), 'utf8');
    if (bytes > this.options.resultInlineLimitBytes) {
      const storageKey = this.options.resultStore.store(request.taskId, data);
      return { kind: 'stored', storageKey, bytes };
    }
    return { kind: 'inline', value: data };
  }

  private buildResult(
    taskId: string,
    status: AgentTaskStatus,
    data: AgentTaskData | null,
    error: string | null
  ): AgentTaskResult {
    return { taskId, status, data, error, completedAt: this.clock() };
  }
}

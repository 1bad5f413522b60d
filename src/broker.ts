/**
 * In-process task broker: a FIFO work queue plus progress/result pub-sub.
 * Tasks are delivered to the single task subscriber one at a time.
 */

import { createLogger } from './logger.js';
import { AgentTaskProgress, AgentTaskRequest, AgentTaskResult } from './types/tasks.js';

const log = createLogger('Broker');

export type TaskHandler = (request: AgentTaskRequest) => Promise<void>;
export type ProgressHandler = (progress: AgentTaskProgress) => void;
export type ResultHandler = (result: AgentTaskResult) => void;

export interface TaskBroker {
  submitTask(request: AgentTaskRequest): Promise<void>;
  subscribeToTasks(handler: TaskHandler): () => void;
  /** Remove a task that has not been handed to the subscriber yet */
  withdrawTask(taskId: string): boolean;
  publishProgress(progress: AgentTaskProgress): Promise<void>;
  subscribeToProgress(taskId: string, handler: ProgressHandler): () => void;
  publishResult(result: AgentTaskResult): Promise<void>;
  subscribeToResult(taskId: string, handler: ResultHandler): () => void;
}

function removeFrom<T>(map: Map<string, T[]>, key: string, item: T): void {
  const list = map.get(key);
  if (!list) return;
  const index = list.indexOf(item);
  if (index > -1) list.splice(index, 1);
  if (list.length === 0) map.delete(key);
}

export class InMemoryTaskBroker implements TaskBroker {
  private readonly queue: AgentTaskRequest[] = [];
  private taskHandler: TaskHandler | null = null;
  private draining: Promise<void> | null = null;

  private readonly progressHandlers = new Map<string, ProgressHandler[]>();
  private readonly resultHandlers = new Map<string, ResultHandler[]>();
  private readonly results = new Map<string, AgentTaskResult>();

  constructor(private readonly maxStoredResults = 1000) {}

  async submitTask(request: AgentTaskRequest): Promise<void> {
    this.queue.push(request);
    log.info(`Queued task ${request.taskId} (${request.agentType}), ${this.queue.length} waiting`);
    this.startDraining();
  }

  subscribeToTasks(handler: TaskHandler): () => void {
    if (this.taskHandler) {
      throw new Error('A task handler is already subscribed');
    }
    this.taskHandler = handler;
    this.startDraining();

    return () => {
      if (this.taskHandler === handler) this.taskHandler = null;
    };
  }

  withdrawTask(taskId: string): boolean {
    const index = this.queue.findIndex(request => request.taskId === taskId);
    if (index === -1) return false;
    this.queue.splice(index, 1);
    log.info(`Withdrew queued task ${taskId}`);
    return true;
  }

  /**
   * Resolves once every queued task has been handled
   */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  private startDraining(): void {
    if (this.draining || !this.taskHandler || this.queue.length === 0) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
      // A task may have arrived while the last one was finishing
      this.startDraining();
    });
  }

  private async drain(): Promise<void> {
    let request = this.queue.shift();
    while (request) {
      const handler = this.taskHandler;
      if (!handler) {
        this.queue.unshift(request);
        return;
      }
      try {
        await handler(request);
      } catch (error) {
        log.error(`Task handler failed for ${request.taskId}:`, error);
      }
      request = this.queue.shift();
    }
  }

  async publishProgress(progress: AgentTaskProgress): Promise<void> {
    for (const handler of [...(this.progressHandlers.get(progress.taskId) ?? [])]) {
      try {
        handler(progress);
      } catch (error) {
        log.error(`Progress handler failed for ${progress.taskId}:`, error);
      }
    }
  }

  subscribeToProgress(taskId: string, handler: ProgressHandler): () => void {
    const list = this.progressHandlers.get(taskId) ?? [];
    list.push(handler);
    this.progressHandlers.set(taskId, list);
    return () => removeFrom(this.progressHandlers, taskId, handler);
  }

  async publishResult(result: AgentTaskResult): Promise<void> {
    this.results.set(result.taskId, result);
    if (this.results.size > this.maxStoredResults) {
      const oldest = this.results.keys().next().value;
      if (oldest !== undefined) this.results.delete(oldest);
    }

    for (const handler of [...(this.resultHandlers.get(result.taskId) ?? [])]) {
      try {
        handler(result);
      } catch (error) {
        log.error(`Result handler failed for ${result.taskId}:`, error);
      }
    }
  }

  /**
   * Subscribe to a task's result. A result published earlier is replayed immediately.
   */
  subscribeToResult(taskId: string, handler: ResultHandler): () => void {
    const existing = this.results.get(taskId);
    if (existing) {
      handler(existing);
      return () => {};
    }

    const list = this.resultHandlers.get(taskId) ?? [];
    list.push(handler);
    this.resultHandlers.set(taskId, list);
    return () => removeFrom(this.resultHandlers, taskId, handler);
  }
}

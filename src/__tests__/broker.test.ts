import { describe, it, expect } from 'vitest';
import { InMemoryTaskBroker } from '../broker.js';
import { AgentTaskContext } from '../task-context.js';
import { AgentTaskProgress, AgentTaskRequest, AgentTaskResult } from '../types/tasks.js';
import { steppingClock } from './helpers/fake-roles.js';

function request(taskId: string): AgentTaskRequest {
  return { taskId, agentType: 'research', prompt: `prompt ${taskId}`, submittedAt: new Date('2025-01-01T00:00:00.000Z') };
}

function result(taskId: string): AgentTaskResult {
  return { taskId, status: 'completed', data: null, error: null, completedAt: new Date('2025-01-01T00:00:00.000Z') };
}

describe('InMemoryTaskBroker tasks', () => {
  it('hands tasks to the subscriber one at a time in submission order', async () => {
    const broker = new InMemoryTaskBroker();
    const events: string[] = [];
    broker.subscribeToTasks(async req => {
      events.push(`start ${req.taskId}`);
      await new Promise(resolve => setTimeout(resolve, 5));
      events.push(`end ${req.taskId}`);
    });

    await broker.submitTask(request('a'));
    await broker.submitTask(request('b'));
    await broker.idle();

    expect(events).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('holds tasks until a subscriber arrives', async () => {
    const broker = new InMemoryTaskBroker();
    const seen: string[] = [];

    await broker.submitTask(request('a'));
    expect(broker.pendingCount).toBe(1);

    broker.subscribeToTasks(async req => {
      seen.push(req.taskId);
    });
    await broker.idle();

    expect(seen).toEqual(['a']);
    expect(broker.pendingCount).toBe(0);
  });

  it('allows only one task subscriber at a time', () => {
    const broker = new InMemoryTaskBroker();
    const unsubscribe = broker.subscribeToTasks(async () => {});

    expect(() => broker.subscribeToTasks(async () => {})).toThrow('A task handler is already subscribed');
    unsubscribe();
    expect(() => broker.subscribeToTasks(async () => {})).not.toThrow();
  });

  it('keeps draining after a handler throws', async () => {
    const broker = new InMemoryTaskBroker();
    const seen: string[] = [];
    broker.subscribeToTasks(async req => {
      seen.push(req.taskId);
      if (req.taskId === 'a') throw new Error('boom');
    });

    await broker.submitTask(request('a'));
    await broker.submitTask(request('b'));
    await broker.idle();

    expect(seen).toEqual(['a', 'b']);
  });

  it('withdraws a task that is still queued', async () => {
    const broker = new InMemoryTaskBroker();
    await broker.submitTask(request('a'));
    await broker.submitTask(request('b'));

    expect(broker.withdrawTask('a')).toBe(true);
    expect(broker.withdrawTask('a')).toBe(false);
    expect(broker.pendingCount).toBe(1);
  });
});

describe('InMemoryTaskBroker progress and results', () => {
  it('routes progress by task id until unsubscribed', async () => {
    const broker = new InMemoryTaskBroker();
    const seen: string[] = [];
    const unsubscribe = broker.subscribeToProgress('a', progress => seen.push(progress.message));
    const at = new Date('2025-01-01T00:00:00.000Z');

    await broker.publishProgress({ taskId: 'a', message: 'one', timestamp: at });
    await broker.publishProgress({ taskId: 'b', message: 'other task', timestamp: at });
    unsubscribe();
    await broker.publishProgress({ taskId: 'a', message: 'two', timestamp: at });

    expect(seen).toEqual(['one']);
  });

  it('replays a published result to a late subscriber', async () => {
    const broker = new InMemoryTaskBroker();
    await broker.publishResult(result('a'));

    const seen: AgentTaskResult[] = [];
    broker.subscribeToResult('a', r => seen.push(r));

    expect(seen.map(r => r.taskId)).toEqual(['a']);
  });

  it('forgets the oldest results beyond its capacity', async () => {
    const broker = new InMemoryTaskBroker(2);
    await broker.publishResult(result('a'));
    await broker.publishResult(result('b'));
    await broker.publishResult(result('c'));

    const seen: string[] = [];
    broker.subscribeToResult('a', r => seen.push(r.taskId));
    broker.subscribeToResult('c', r => seen.push(r.taskId));

    expect(seen).toEqual(['c']);
  });

  it('isolates a failing result handler', async () => {
    const broker = new InMemoryTaskBroker();
    const seen: string[] = [];
    broker.subscribeToResult('a', () => {
      throw new Error('handler broke');
    });
    broker.subscribeToResult('a', r => seen.push(r.status));

    await broker.publishResult(result('a'));

    expect(seen).toEqual(['completed']);
  });
});

describe('AgentTaskContext', () => {
  it('rejects an empty task id', () => {
    expect(() => new AgentTaskContext('  ', new InMemoryTaskBroker())).toThrow('taskId must not be empty');
  });

  it('publishes progress with accumulated token usage', async () => {
    const broker = new InMemoryTaskBroker();
    const seen: AgentTaskProgress[] = [];
    broker.subscribeToProgress('t1', progress => seen.push(progress));
    const context = new AgentTaskContext('t1', broker, steppingClock('2025-02-01T00:00:00.000Z'));
    context.currentAgentName = 'Finder';

    await context.reportProgress('before usage');
    context.addTokenUsage({ inputTokens: 10, outputTokens: 4 }, 'model-a');
    context.addTokenUsage({ inputTokens: 5, outputTokens: 1 });
    await context.reportProgress('after usage', 'search');

    expect(seen[0]).toEqual({
      taskId: 't1',
      message: 'before usage',
      timestamp: new Date('2025-02-01T00:00:00.000Z'),
      toolName: undefined,
      agentName: 'Finder',
      modelId: undefined,
      inputTokens: undefined,
      outputTokens: undefined,
    });
    expect(seen[1]).toMatchObject({
      message: 'after usage',
      toolName: 'search',
      modelId: 'model-a',
      inputTokens: 15,
      outputTokens: 5,
    });
  });
});

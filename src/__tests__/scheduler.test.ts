import { describe, it, expect } from 'vitest';
import { ResearchPlan } from '../plan.js';
import { ResearchState } from '../research-state.js';
import { runPlan } from '../scheduler.js';
import { RunContext } from '../subtask-runner.js';
import { FakeCritic, FakeFinder, spec, verdictJson } from './helpers/fake-roles.js';

const satisfied = () => verdictJson({ isSatisfactory: true, qualityScore: 8 });

function context(finder: FakeFinder, signal?: AbortSignal): RunContext & { progress: string[] } {
  const progress: string[] = [];
  return {
    finder,
    critic: new FakeCritic(satisfied),
    session: new ResearchState('q'),
    settings: { maxIterations: 3, qualityThreshold: 5 },
    signal,
    onProgress: message => progress.push(message),
    progress,
  };
}

describe('runPlan', () => {
  it('runs subtasks in dependency order', async () => {
    const plan = ResearchPlan.fromSpecs('q', [spec(1, 'Q1', [2]), spec(2, 'Q2'), spec(3, 'Q3', [1])], '');
    const finder = new FakeFinder();
    const ctx = context(finder);

    const outcome = await runPlan(plan, ctx);

    expect(outcome).toBe('completed');
    expect(finder.queries).toEqual(['Q2', 'Q1', 'Q3']);
    expect(plan.allComplete).toBe(true);
    expect(ctx.session.iterations.map(it => it.subtaskId)).toEqual([2, 1, 3]);
    expect(ctx.progress.filter(line => line.startsWith('Researching'))).toEqual([
      'Researching subtask 2/3: Q2',
      'Researching subtask 1/3: Q1',
      'Researching subtask 3/3: Q3',
    ]);
  });

  it('stops when the remaining subtasks wait on each other', async () => {
    const plan = ResearchPlan.fromSpecs('q', [spec(1, 'Q1', [2]), spec(2, 'Q2', [1]), spec(3, 'Q3')], '');
    const finder = new FakeFinder();

    const outcome = await runPlan(plan, context(finder));

    expect(outcome).toBe('stalled');
    expect(finder.queries).toEqual(['Q3']);
    expect(plan.completedCount).toBe(1);
  });

  it('stops before the next subtask once cancelled', async () => {
    const controller = new AbortController();
    const plan = ResearchPlan.fromSpecs('q', [spec(1, 'Q1'), spec(2, 'Q2')], '');
    const finder = new FakeFinder(query => {
      controller.abort();
      return `found ${query}`;
    });

    const outcome = await runPlan(plan, context(finder, controller.signal));

    expect(outcome).toBe('cancelled');
    expect(finder.queries).toEqual(['Q1']);
    expect(plan.getSubtask(1)?.isComplete).toBe(true);
    expect(plan.getSubtask(2)?.isComplete).toBe(false);
  });

  it('returns completed immediately for a finished plan', async () => {
    const plan = ResearchPlan.fromSpecs('q', [spec(1, 'Q1')], '');
    plan.getSubtask(1)?.complete('done', 9);
    const finder = new FakeFinder();

    expect(await runPlan(plan, context(finder))).toBe('completed');
    expect(finder.queries).toEqual([]);
  });
});

import { describe, it, expect } from 'vitest';
import { ResearchPlan, Subtask } from '../plan.js';
import { ResearchState } from '../research-state.js';
import { createDefaultVerdict } from '../verdict-parser.js';
import { spec, steppingClock } from './helpers/fake-roles.js';

describe('Subtask', () => {
  it('deduplicates dependency ids', () => {
    expect(new Subtask(spec(3, 'Q', [1, 1, 2])).dependsOn).toEqual([1, 2]);
  });

  it('completes exactly once', () => {
    const subtask = new Subtask(spec(1, 'Q'));
    subtask.complete('found it', 8);

    expect(subtask.isComplete).toBe(true);
    expect(subtask.findings).toBe('found it');
    expect(subtask.qualityScore).toBe(8);
    expect(() => subtask.complete('again', 9)).toThrow('Subtask 1 is already complete');
  });
});

describe('ResearchPlan', () => {
  it('picks the first subtask whose dependencies are complete', () => {
    const plan = ResearchPlan.fromSpecs('q', [spec(1, 'A', [2]), spec(2, 'B'), spec(3, 'C', [1])], '');

    expect(plan.nextReady?.id).toBe(2);
    plan.getSubtask(2)?.complete('b', 7);
    expect(plan.nextReady?.id).toBe(1);
    plan.getSubtask(1)?.complete('a', 7);
    expect(plan.nextReady?.id).toBe(3);
    plan.getSubtask(3)?.complete('c', 7);

    expect(plan.nextReady).toBeNull();
    expect(plan.allComplete).toBe(true);
    expect(plan.completedCount).toBe(3);
  });

  it('has nothing ready when a dependency can never complete', () => {
    const plan = ResearchPlan.fromSpecs('q', [spec(1, 'A', [9])], '');
    expect(plan.nextReady).toBeNull();
    expect(plan.allComplete).toBe(false);
    expect(plan.findCycle()).toBeNull();
  });

  it('reports a dependency cycle', () => {
    const plan = ResearchPlan.fromSpecs('q', [spec(1, 'A', [2]), spec(2, 'B', [1]), spec(3, 'C')], '');
    expect(plan.findCycle()).toEqual([1, 2]);
    expect(plan.nextReady?.id).toBe(3);
  });

  it('reports a self-dependency as a cycle', () => {
    const plan = ResearchPlan.fromSpecs('q', [spec(1, 'A', [1])], '');
    expect(plan.findCycle()).toEqual([1]);
  });

  it('returns null for an acyclic graph', () => {
    const plan = ResearchPlan.fromSpecs('q', [spec(1, 'A'), spec(2, 'B', [1]), spec(3, 'C', [1, 2])], '');
    expect(plan.findCycle()).toBeNull();
  });

  it('aggregates findings of completed subtasks in plan order', () => {
    const plan = ResearchPlan.fromSpecs('q', [spec(1, 'Q1'), spec(2, 'Q2'), spec(3, 'Q3'), spec(4, 'Q4')], '');
    plan.getSubtask(3)?.complete('F3', 6);
    plan.getSubtask(1)?.complete('  F1  ', 8);
    plan.getSubtask(2)?.complete('   ', 5);

    expect(plan.allFindings).toBe('## Subtask 1: Q1\n\nF1\n\n---\n\n## Subtask 3: Q3\n\nF3\n');
  });

  it('aggregates to an empty string when nothing is complete', () => {
    const plan = ResearchPlan.fromSpecs('q', [spec(1, 'Q1')], '');
    expect(plan.allFindings).toBe('');
  });
});

describe('ResearchState', () => {
  it('numbers iterations from 1 and stamps them with the clock', () => {
    const state = new ResearchState('q', steppingClock('2025-03-01T10:00:00.000Z'));
    const verdict = createDefaultVerdict();

    const first = state.addIteration('a', 'fa', verdict, 1);
    const second = state.addIteration('b', 'fb', verdict);

    expect(first.iterationNumber).toBe(1);
    expect(second.iterationNumber).toBe(2);
    expect(first.timestamp.toISOString()).toBe('2025-03-01T10:00:00.000Z');
    expect(second.timestamp.toISOString()).toBe('2025-03-01T10:00:01.000Z');
    expect(first.subtaskId).toBe(1);
    expect(second.subtaskId).toBeNull();
    expect(state.currentIteration).toBe(2);
    expect(state.latestEvaluation).toBe(verdict);
  });

  it('starts empty', () => {
    const state = new ResearchState('q');
    expect(state.iterations).toEqual([]);
    expect(state.latestEvaluation).toBeNull();
    expect(state.isComplete).toBe(false);
    expect(state.finalSynthesis).toBeNull();
  });
});

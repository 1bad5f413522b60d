/**
 * Research plan: the dependency-ordered subtask graph for one query
 */

import { SubtaskSpec } from './types/index.js';

export class Subtask implements SubtaskSpec {
  readonly id: number;
  readonly query: string;
  readonly rationale: string;
  readonly dependsOn: number[];
  readonly expectedOutcome: string;

  private _findings: string | null = null;
  private _qualityScore: number | null = null;
  private _isComplete = false;

  constructor(spec: SubtaskSpec) {
    this.id = spec.id;
    this.query = spec.query;
    this.rationale = spec.rationale;
    this.dependsOn = [...new Set(spec.dependsOn)];
    this.expectedOutcome = spec.expectedOutcome;
  }

  get findings(): string | null {
    return this._findings;
  }

  get qualityScore(): number | null {
    return this._qualityScore;
  }

  get isComplete(): boolean {
    return this._isComplete;
  }

  /**
   * Move to the terminal state. A subtask completes exactly once.
   */
  complete(findings: string, qualityScore: number): void {
    if (this._isComplete) {
      throw new Error(`Subtask ${this.id} is already complete`);
    }
    this._findings = findings;
    this._qualityScore = qualityScore;
    this._isComplete = true;
  }
}

export class ResearchPlan {
  readonly subtasks: readonly Subtask[];

  constructor(
    readonly originalQuery: string,
    subtasks: Subtask[],
    readonly rationale: string
  ) {
    this.subtasks = subtasks;
  }

  static fromSpecs(originalQuery: string, specs: SubtaskSpec[], rationale: string): ResearchPlan {
    return new ResearchPlan(originalQuery, specs.map(spec => new Subtask(spec)), rationale);
  }

  get allComplete(): boolean {
    return this.subtasks.every(st => st.isComplete);
  }

  get completedCount(): number {
    return this.subtasks.filter(st => st.isComplete).length;
  }

  getSubtask(id: number): Subtask | undefined {
    return this.subtasks.find(st => st.id === id);
  }

  /**
   * First incomplete subtask whose dependencies are all complete.
   * Returns null when the plan is done or when every remaining subtask waits on
   * something that cannot finish (a cycle or a missing id).
   */
  get nextReady(): Subtask | null {
    for (const subtask of this.subtasks) {
      if (subtask.isComplete) continue;

      const dependenciesMet = subtask.dependsOn.every(depId => this.getSubtask(depId)?.isComplete === true);
      if (dependenciesMet) {
        return subtask;
      }
    }
    return null;
  }

  /**
   * Findings of every completed subtask, one section each, for synthesis
   */
  get allFindings(): string {
    return this.subtasks
      .filter(st => st.isComplete && st.findings !== null && st.findings.trim().length > 0)
      .map(st => `## Subtask ${st.id}: ${st.query}\n\n${(st.findings ?? '').trim()}\n`)
      .join('\n---\n\n');
  }

  /**
   * Ids forming one dependency cycle, or null when the graph is acyclic.
   * Only used to explain a stalled schedule in the logs.
   */
  findCycle(): number[] | null {
    const state = new Map<number, 'visiting' | 'done'>();
    const stack: number[] = [];

    const visit = (id: number): number[] | null => {
      const mark = state.get(id);
      if (mark === 'done') return null;
      if (mark === 'visiting') {
        return stack.slice(stack.indexOf(id));
      }

      const subtask = this.getSubtask(id);
      if (!subtask) return null;

      state.set(id, 'visiting');
      stack.push(id);
      for (const dep of subtask.dependsOn) {
        const cycle = visit(dep);
        if (cycle) return cycle;
      }
      stack.pop();
      state.set(id, 'done');
      return null;
    };

    for (const subtask of this.subtasks) {
      const cycle = visit(subtask.id);
      if (cycle) return cycle;
    }
    return null;
  }
}

import { ResearchPlan } from './plan.js';
import { Clock, IterationRecord, Verdict, systemClock } from './types/index.js';

/**
 * State of one research session. Lives for a single `research()` call.
 * The iteration log is global across subtasks and append-only.
 */
export class ResearchState {
  private readonly _iterations: IterationRecord[] = [];

  isComplete = false;
  finalSynthesis: string | null = null;
  plan: ResearchPlan | null = null;

  constructor(
    readonly originalQuery: string,
    private readonly clock: Clock = systemClock
  ) {}

  get iterations(): readonly IterationRecord[] {
    return this._iterations;
  }

  get currentIteration(): number {
    return this._iterations.length;
  }

  get latestEvaluation(): Verdict | null {
    return this._iterations.at(-1)?.evaluation ?? null;
  }

  addIteration(query: string, findings: string, evaluation: Verdict, subtaskId: number | null = null): IterationRecord {
    const record: IterationRecord = {
      iterationNumber: this._iterations.length + 1,
      query,
      findings,
      evaluation,
      timestamp: this.clock(),
      subtaskId,
    };
    this._iterations.push(record);
    return record;
  }
}

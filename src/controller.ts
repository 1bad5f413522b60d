/**
 * Research Controller - single entry point of the research core
 * Flow: Planning → Schedule subtasks (refine until satisfactory) → Synthesis → Result
 *
 * Finder and Critic are injected; nothing is resolved from globals.
 */

import { ResearchCancelledError, ResearchInputError } from './errors.js';
import { createLogger } from './logger.js';
import { decompose } from './planning.js';
import { ResearchState } from './research-state.js';
import { runPlan } from './scheduler.js';
import { synthesize } from './synthesis.js';
import { Clock, Critic, Finder, ProgressListener, ResearchSettings, systemClock } from './types/index.js';
import { createDefaultVerdict } from './verdict-parser.js';

const log = createLogger('Research');

export const DEFAULT_SETTINGS: ResearchSettings = {
  maxIterations: 5,
  qualityThreshold: 5,
};

export interface ResearchControllerOptions {
  finder: Finder;
  critic: Critic;
  settings?: Partial<ResearchSettings>;
  clock?: Clock;
  onProgress?: ProgressListener;
}

export interface ResearchRunOptions {
  signal?: AbortSignal;
  /** Extra observer for this run only */
  onProgress?: ProgressListener;
}

/**
 * Single-shot research: one Finder call, recorded with the default verdict and
 * used as the final answer. No planning, evaluation or synthesis.
 */
export async function researchDirectly(query: string, finder: Finder, session: ResearchState): Promise<ResearchState> {
  const findings = await finder.find(query);
  session.addIteration(query, findings, createDefaultVerdict(), null);
  session.finalSynthesis = findings;
  session.isComplete = true;
  return session;
}

export class ResearchController {
  private readonly finder: Finder;
  private readonly critic: Critic;
  private readonly settings: ResearchSettings;
  private readonly clock: Clock;
  private readonly listeners = new Set<ProgressListener>();

  constructor(options: ResearchControllerOptions) {
    this.finder = options.finder;
    this.critic = options.critic;
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    this.clock = options.clock ?? systemClock;
    if (options.onProgress) this.listeners.add(options.onProgress);
  }

  getSettings(): ResearchSettings {
    return { ...this.settings };
  }

  /**
   * Register a progress observer. Returns an unsubscribe function.
   */
  addProgressListener(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(message: string, extra?: ProgressListener): void {
    const targets = extra ? [...this.listeners, extra] : [...this.listeners];
    for (const listener of targets) {
      try {
        listener(message);
      } catch (error) {
        log.error('Progress listener failed:', error);
      }
    }
  }

  async research(query: string, options: ResearchRunOptions = {}): Promise<ResearchState> {
    if (!query.trim()) {
      throw new ResearchInputError('Research query must not be empty');
    }

    const { signal } = options;
    const emit = (message: string) => this.emit(message, options.onProgress);
    const session = new ResearchState(query, this.clock);

    emit(`Starting research: "${query}"`);
    if (signal?.aborted) {
      throw new ResearchCancelledError('Research cancelled before planning');
    }

    emit('Planning research...');
    const plan = await decompose(query, this.critic);
    if (signal?.aborted) {
      throw new ResearchCancelledError('Research cancelled after planning');
    }

    if (!plan) {
      emit('Could not decompose the query, researching it directly');
      await researchDirectly(query, this.finder, session);
      emit('Research complete after 1 iteration(s).');
      return session;
    }

    session.plan = plan;
    emit(`Created ${plan.subtasks.length} subtask(s)`);

    const outcome = await runPlan(plan, {
      finder: this.finder,
      critic: this.critic,
      session,
      settings: this.settings,
      signal,
      onProgress: emit,
    });

    if (outcome === 'cancelled') {
      throw new ResearchCancelledError(
        `Research cancelled with ${plan.completedCount}/${plan.subtasks.length} subtasks complete`,
        plan.completedCount
      );
    }

    emit(`Synthesizing ${plan.completedCount} completed subtask(s)...`);
    session.finalSynthesis = await synthesize(plan, this.critic);
    session.isComplete = true;

    log.info(`Done: ${plan.completedCount}/${plan.subtasks.length} subtasks, ${session.currentIteration} iteration(s), outcome=${outcome}`);
    emit(`Research complete after ${session.currentIteration} iteration(s).`);
    return session;
  }
}

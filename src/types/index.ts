/**
 * Structured judgment returned by the Critic.
 * `subtasks` is only present when the Critic acted as planner.
 */
export interface Verdict {
  isSatisfactory: boolean;
  qualityScore: number;          // 1-10 by Critic convention, not clamped
  gaps: string[];
  followUpQuestions: string[];
  refinedQuery: string | null;
  reasoning: string;
  subtasks?: SubtaskSpec[];
}

/**
 * One node of the decomposition graph as emitted by the planner
 */
export interface SubtaskSpec {
  id: number;
  query: string;
  rationale: string;
  dependsOn: number[];
  expectedOutcome: string;
}

/**
 * One Finder + Critic round, logged permanently regardless of outcome
 */
export interface IterationRecord {
  iterationNumber: number;       // 1-based, global within a session
  query: string;                 // What was actually sent to the Finder
  findings: string;
  evaluation: Verdict;
  timestamp: Date;
  subtaskId: number | null;      // null for single-shot research
}

/**
 * Token usage reported by a provider for a single call
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * Which instruction set the Critic runs with
 */
export type CriticMode = 'planning' | 'evaluation' | 'synthesis';

/**
 * Turns a query into free-text findings. Tools used are opaque to the core.
 */
export interface Finder {
  find(query: string): Promise<string>;
}

/**
 * Turns a prompt into free text the verdict parser understands
 */
export interface Critic {
  evaluate(prompt: string, mode: CriticMode): Promise<string>;
}

export type ProgressListener = (message: string) => void;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface ResearchSettings {
  maxIterations: number;
  qualityThreshold: number;
}

/**
 * Messages exchanged through the task broker
 */

export type AgentTaskStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface AgentTaskRequest {
  taskId: string;
  agentType: string;            // Raw type from the caller, e.g. "research"
  prompt: string;
  submittedAt: Date;
  outputPath?: string;          // Where to write the markdown report, if anywhere
}

export interface AgentTaskProgress {
  taskId: string;
  message: string;
  timestamp: Date;
  toolName?: string;
  agentName?: string;
  modelId?: string;
  inputTokens?: number;
  outputTokens?: number;
}

/**
 * Result payload. Large payloads are replaced by a storage reference.
 */
export type AgentTaskData =
  | { kind: 'inline'; value: ResearchResultData }
  | { kind: 'stored'; storageKey: string; bytes: number };

export interface AgentTaskResult {
  taskId: string;
  status: AgentTaskStatus;
  data: AgentTaskData | null;
  error: string | null;
  completedAt: Date;
}

/**
 * Serializable summary of a finished research session
 */
export interface ResearchResultData {
  agentType: string;
  text: string;
  iterations: Array<{
    iterationNumber: number;
    subtaskId: number | null;
    query: string;
    qualityScore: number;
    isSatisfactory: boolean;
    timestamp: string;
  }>;
  subtasks: Array<{
    id: number;
    query: string;
    dependsOn: number[];
    isComplete: boolean;
    qualityScore: number | null;
  }>;
  reportPath?: string;
  timestamp: string;
}

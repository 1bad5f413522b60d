import { TaskBroker } from './broker.js';
import { Clock, TokenUsage, systemClock } from './types/index.js';

/**
 * Per-task reporting context. Passed explicitly down the call chain so that
 * concurrent tasks never share it.
 */
export class AgentTaskContext {
  currentAgentName: string | undefined;
  currentModelId: string | undefined;
  inputTokens = 0;
  outputTokens = 0;

  constructor(
    readonly taskId: string,
    private readonly broker: TaskBroker,
    private readonly clock: Clock = systemClock
  ) {
    if (!taskId.trim()) {
      throw new Error('taskId must not be empty');
    }
  }

  addTokenUsage(usage: TokenUsage, modelId?: string): void {
    this.inputTokens += usage.inputTokens;
    this.outputTokens += usage.outputTokens;
    if (modelId) this.currentModelId = modelId;
  }

  reportProgress(message: string, toolName?: string): Promise<void> {
    return this.broker.publishProgress({
      taskId: this.taskId,
      message,
      timestamp: this.clock(),
      toolName,
      agentName: this.currentAgentName,
      modelId: this.currentModelId,
      inputTokens: this.inputTokens > 0 ? this.inputTokens : undefined,
      outputTokens: this.outputTokens > 0 ? this.outputTokens : undefined,
    });
  }
}

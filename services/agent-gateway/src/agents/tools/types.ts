import { AgentInstance, ToolDefinition } from '../../types/index.js';

export interface ToolContext {
  instance: AgentInstance;
  sessionId: string;
}

export interface AgentTool {
  definition: ToolDefinition;
  /** Paragraph appended to the system prompt while the tool is enabled. */
  promptGuidance: string;
  /** Returns the text handed back to the model as the tool result. */
  execute(args: unknown, context: ToolContext): Promise<string>;
}

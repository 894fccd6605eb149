/**
 * System prompt assembly for chat agents
 */
import { AgentInstance } from '../types/index.js';
import { AgentTool } from './tools/types.js';

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful, friendly and professional assistant. Answer clearly and concisely, ask a clarifying question when a request is ambiguous, and say so when you do not know something.';

/**
 * Builds the system prompt for an instance
 * @param instance - Loaded agent instance
 * @param tools - Tools enabled for this instance
 * @returns The system prompt
 */
export function buildSystemPrompt(instance: AgentInstance, tools: AgentTool[]): string {
  let prompt = resolveBasePrompt(instance);

  prompt += `\n\nYou are ${instance.displayName}.`;

  for (const tool of tools) {
    prompt += `\n\n${tool.promptGuidance}`;
  }

  return prompt;
}

function resolveBasePrompt(instance: AgentInstance): string {
  if (instance.systemPrompt && instance.systemPrompt.trim().length > 0) {
    return instance.systemPrompt.trim();
  }

  const configured = instance.config['system_prompt'];
  if (typeof configured === 'string' && configured.trim().length > 0) {
    return configured.trim();
  }

  return DEFAULT_SYSTEM_PROMPT;
}

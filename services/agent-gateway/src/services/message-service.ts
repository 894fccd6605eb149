import { v7 as uuidv7 } from 'uuid';
import { ValidationError } from '../errors/index.js';
import { MessageRepository } from '../store/types.js';
import { JsonObject, MessageRecord, MessageRole } from '../types/index.js';

export interface SaveMessageInput {
  sessionId: string;
  role: MessageRole;
  content: string;
  agentInstanceId?: string | null;
  llmRequestId?: string | null;
  meta?: JsonObject;
}

export interface SaveMessagePairInput {
  sessionId: string;
  agentInstanceId: string | null;
  userMessage: string;
  assistantMessage: string;
  llmRequestId: string | null;
  meta?: JsonObject;
}

const CONTEXT_ROLES: MessageRole[] = ['user', 'assistant'];

export class MessageService {
  constructor(private readonly messages: MessageRepository) {}

  async saveMessage(input: SaveMessageInput): Promise<MessageRecord> {
    if (!input.content || input.content.trim().length === 0) {
      throw new ValidationError('Message content cannot be empty');
    }

    return this.messages.insert({
      id: uuidv7(),
      sessionId: input.sessionId,
      role: input.role,
      content: input.content,
      agentInstanceId: input.agentInstanceId ?? null,
      llmRequestId: input.llmRequestId ?? null,
      meta: input.meta ?? {},
    });
  }

  async getSessionMessages(
    sessionId: string,
    options: { limit?: number; offset?: number } = {}
  ): Promise<MessageRecord[]> {
    return this.messages.listBySession(sessionId, {
      limit: options.limit ?? 100,
      offset: options.offset ?? 0,
    });
  }

  /** Last `limit` user/assistant messages, oldest first, for building LLM context. */
  async getRecentContext(sessionId: string, limit: number): Promise<MessageRecord[]> {
    if (limit <= 0) return [];
    return this.messages.listRecent(sessionId, limit, CONTEXT_ROLES);
  }

  async getMessageCount(sessionId: string): Promise<number> {
    return this.messages.countBySession(sessionId);
  }

  /**
   * Persists one exchange: the user message, then the assistant reply linked
   * to its LLM request. Failures are logged and resolve to null.
   */
  async saveMessagePair(input: SaveMessagePairInput): Promise<{ user: MessageRecord; assistant: MessageRecord } | null> {
    try {
      const user = await this.saveMessage({
        sessionId: input.sessionId,
        role: 'user',
        content: input.userMessage,
        agentInstanceId: input.agentInstanceId,
      });
      const assistant = await this.saveMessage({
        sessionId: input.sessionId,
        role: 'assistant',
        content: input.assistantMessage,
        agentInstanceId: input.agentInstanceId,
        llmRequestId: input.llmRequestId,
        meta: input.meta,
      });
      return { user, assistant };
    } catch (error) {
      console.error(`[messages] Failed to save message pair for session ${input.sessionId}:`, error);
      return null;
    }
  }
}

export type CascadeValue = string | number | boolean;

export interface ParameterSpec<T extends CascadeValue = CascadeValue> {
  /** Dot path inside an instance or account config document. */
  agentPath: string;
  /** Dot path inside app.yaml; omitted when the parameter has no global default. */
  globalPath?: string;
  fallback: T;
}

export type ParameterSpecMap = Record<string, ParameterSpec>;

/** Namespace value meaning "not configured": isolation or the index default applies. */
export const DEFAULT_VECTOR_NAMESPACE = '__default__';

export const MODEL_PARAMETER_SPECS = {
  model: {
    agentPath: 'model_settings.model',
    globalPath: 'llm.model',
    fallback: 'deepseek/deepseek-chat-v3.1',
  },
  temperature: {
    agentPath: 'model_settings.temperature',
    globalPath: 'llm.temperature',
    fallback: 0.7,
  },
  max_tokens: {
    agentPath: 'model_settings.max_tokens',
    globalPath: 'llm.max_tokens',
    fallback: 1024,
  },
} satisfies ParameterSpecMap;

export const HISTORY_LIMIT_SPEC: ParameterSpec<number> = {
  agentPath: 'context_management.history_limit',
  globalPath: 'chat.history_limit',
  fallback: 50,
};

export const TOOL_PARAMETER_SPECS = {
  vector_search: {
    enabled: { agentPath: 'tools.vector_search.enabled', fallback: true },
    max_results: { agentPath: 'tools.vector_search.max_results', fallback: 5 },
    similarity_threshold: { agentPath: 'tools.vector_search.similarity_threshold', fallback: 0.7 },
    namespace_isolation: { agentPath: 'tools.vector_search.namespace_isolation', fallback: true },
    index_name: {
      agentPath: 'tools.vector_search.pinecone.index_name',
      globalPath: 'vector.index_name',
      fallback: 'agent-gateway',
    },
    namespace: { agentPath: 'tools.vector_search.pinecone.namespace', fallback: DEFAULT_VECTOR_NAMESPACE },
  },
  web_search: {
    enabled: { agentPath: 'tools.web_search.enabled', fallback: false },
    provider: { agentPath: 'tools.web_search.provider', fallback: 'exa' },
    max_results: { agentPath: 'tools.web_search.max_results', fallback: 10 },
  },
  conversation_management: {
    enabled: { agentPath: 'tools.conversation_management.enabled', fallback: true },
    auto_summarize_threshold: {
      agentPath: 'tools.conversation_management.auto_summarize_threshold',
      fallback: 10,
    },
  },
} satisfies Record<string, ParameterSpecMap>;

export type ToolName = keyof typeof TOOL_PARAMETER_SPECS;

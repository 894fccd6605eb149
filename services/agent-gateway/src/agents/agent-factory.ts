import { LlmClient } from '../clients/llm-client.js';
import { AppConfig } from '../config/app-config.js';
import { ConfigCascade } from '../config/cascade.js';
import { AgentInstance } from '../types/index.js';
import { ChatAgent } from './chat-agent.js';
import { buildInstanceTools, cascadeContextFor } from './tools/registry.js';
import { VectorSearchDependencies } from './tools/vector-search.js';

export type AgentFactory = (instance: AgentInstance) => Promise<ChatAgent>;

export interface AgentFactoryDependencies {
  llm: LlmClient;
  cascade: ConfigCascade;
  chatConfig: AppConfig['chat'];
  vectorSearch: VectorSearchDependencies | null;
}

export function createAgentFactory(deps: AgentFactoryDependencies): AgentFactory {
  return async (instance: AgentInstance): Promise<ChatAgent> => {
    const modelSettings = await deps.cascade.getModelSettings(cascadeContextFor(instance));
    const tools = await buildInstanceTools(instance, deps.cascade, deps.vectorSearch);

    console.log(
      `[agent-factory] Built ${instance.accountSlug}/${instance.instanceSlug} (${instance.agentType}, model ${modelSettings.model}, tools: ${
        tools.map(tool => tool.definition.name).join(', ') || 'none'
      })`
    );

    return new ChatAgent({
      instance,
      llm: deps.llm,
      modelSettings,
      tools,
      maxToolRounds: deps.chatConfig.max_tool_rounds,
    });
  };
}

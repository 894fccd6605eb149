import { CascadeContext, ConfigCascade } from '../../config/cascade.js';
import { AgentInstance } from '../../types/index.js';
import { AgentTool } from './types.js';
import { createVectorSearchTool, VectorSearchDependencies } from './vector-search.js';

export function cascadeContextFor(instance: AgentInstance): CascadeContext {
  return {
    agentType: instance.agentType,
    accountSlug: instance.accountSlug,
    instanceSlug: instance.instanceSlug,
    instanceConfig: instance.config,
    accountConfig: instance.accountConfig,
  };
}

/**
 * Executable tools enabled for an instance. A tool whose backing services
 * are not configured is left out even when its config enables it.
 */
export async function buildInstanceTools(
  instance: AgentInstance,
  cascade: ConfigCascade,
  vectorSearch: VectorSearchDependencies | null
): Promise<AgentTool[]> {
  const tools: AgentTool[] = [];

  const vectorConfig = await cascade.getVectorSearchConfig(cascadeContextFor(instance));
  if (vectorConfig.enabled) {
    if (vectorSearch) {
      tools.push(createVectorSearchTool(vectorSearch, vectorConfig));
    } else {
      console.warn(
        `[tools] vector_search enabled for ${instance.accountSlug}/${instance.instanceSlug} but no vector store is configured`
      );
    }
  }

  return tools;
}

/**
 * Agent Factory
 * Closed lookup from agent identity to facade constructor
 */

import type { AgentId, Result } from '../types/index.js';
import { AGENT_IDS, success, failure } from '../types/index.js';

import type { DataResearchAgent } from './data-research.agent.js';
import { createDataResearchAgent } from './data-research.agent.js';
import type { DiscoveryAgent } from './discovery.agent.js';
import { createDiscoveryAgent } from './discovery.agent.js';
import type { EngagementAgent } from './engagement.agent.js';
import { createEngagementAgent } from './engagement.agent.js';
import type {
  OrchestratorAgent,
  OrchestratorDeps,
} from './orchestrator.agent.js';
import { createOrchestratorAgent } from './orchestrator.agent.js';
import type { ProjectDeliveryAgent } from './project-delivery.agent.js';
import { createProjectDeliveryAgent } from './project-delivery.agent.js';
import type { SynthesisAgent } from './synthesis.agent.js';
import { createSynthesisAgent } from './synthesis.agent.js';

export interface AgentMap {
  data_research: DataResearchAgent;
  engagement: EngagementAgent;
  discovery: DiscoveryAgent;
  synthesis: SynthesisAgent;
  project_delivery: ProjectDeliveryAgent;
  orchestrator: OrchestratorAgent;
}

/**
 * Dependencies accepted by every constructor in the table
 */
export type AgentFactoryDeps = OrchestratorDeps;

const AGENT_FACTORIES: {
  [K in AgentId]: (deps: AgentFactoryDeps) => AgentMap[K];
} = {
  data_research: createDataResearchAgent,
  engagement: createEngagementAgent,
  discovery: createDiscoveryAgent,
  synthesis: createSynthesisAgent,
  project_delivery: createProjectDeliveryAgent,
  orchestrator: createOrchestratorAgent,
};

export function isAgentId(key: string): key is AgentId {
  return AGENT_IDS.some((id) => id === key);
}

/**
 * Validate an agent key coming from outside the type system
 */
export function parseAgentId(key: string): Result<AgentId, 'UNKNOWN_AGENT'> {
  if (!isAgentId(key)) {
    return failure('UNKNOWN_AGENT', `Unknown agent: ${key}`, {
      available: [...AGENT_IDS],
    });
  }
  return success(key);
}

export function createAgent<K extends AgentId>(
  id: K,
  deps: AgentFactoryDeps
): AgentMap[K] {
  return AGENT_FACTORIES[id](deps);
}

/**
 * Build one facade per identity, sharing the same dependencies
 */
export function createAgents(deps: AgentFactoryDeps): AgentMap {
  return {
    data_research: createAgent('data_research', deps),
    engagement: createAgent('engagement', deps),
    discovery: createAgent('discovery', deps),
    synthesis: createAgent('synthesis', deps),
    project_delivery: createAgent('project_delivery', deps),
    orchestrator: createAgent('orchestrator', deps),
  };
}

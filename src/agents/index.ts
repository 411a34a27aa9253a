/**
 * Agent Exports
 *
 * Six facades over the gateway:
 * - data_research, engagement, discovery, synthesis, project_delivery
 * - orchestrator (chat, pre-built task solving, custom workflows)
 */

export { createAgent, createAgents, parseAgentId, isAgentId } from './factory.js';
export type { AgentMap, AgentFactoryDeps } from './factory.js';
export {
  AGENT_PROFILES,
  AGENT_MAX_OUTPUT_TOKENS,
  ORCHESTRATOR_MAX_OUTPUT_TOKENS,
  modelFor,
} from './base.js';
export type { AgentDeps, AgentProfile, AgentBase } from './base.js';
export { createDataResearchAgent } from './data-research.agent.js';
export type { DataResearchAgent } from './data-research.agent.js';
export { createEngagementAgent } from './engagement.agent.js';
export type { EngagementAgent } from './engagement.agent.js';
export { createDiscoveryAgent } from './discovery.agent.js';
export type { DiscoveryAgent } from './discovery.agent.js';
export { createSynthesisAgent } from './synthesis.agent.js';
export type { SynthesisAgent } from './synthesis.agent.js';
export { createProjectDeliveryAgent } from './project-delivery.agent.js';
export type { ProjectDeliveryAgent } from './project-delivery.agent.js';
export { createOrchestratorAgent } from './orchestrator.agent.js';
export type {
  OrchestratorAgent,
  OrchestratorDeps,
} from './orchestrator.agent.js';
export {
  AGENT_INFO,
  TASK_TEMPLATES,
  getTaskTemplate,
  listTaskTemplates,
  formatAgentChain,
  isTaskKey,
  unknownTaskMessage,
} from './registry.js';
export {
  PROMPT_CATALOG,
  renderPrompt,
  formatPounds,
  DEFAULT_ANNUAL_REVENUE,
} from './catalog.js';
export type { PromptTemplate, RenderedPrompt } from './catalog.js';
export {
  NOT_CONFIGURED_MESSAGE,
  INVALID_KEY_MESSAGE,
  ORCHESTRATOR_NOT_CONFIGURED_MESSAGE,
  describeFailure,
  toDisplayText,
} from './display.js';

/**
 * Shared agent plumbing: identities, model selection and the one-call
 * operation runner every worker facade delegates to.
 */

import type {
  ActivityRecorder,
  AgentId,
  Gateway,
  ModelConfig,
  ModelTier,
} from '../types/index.js';

import type { RenderedPrompt } from './catalog.js';
import { toDisplayText } from './display.js';

/**
 * Token budget for worker facades
 */
export const AGENT_MAX_OUTPUT_TOKENS = 1000;

/**
 * Token budget for orchestrator calls
 */
export const ORCHESTRATOR_MAX_OUTPUT_TOKENS = 2000;

export interface AgentProfile {
  name: string; // e.g. 'Data/Research Agent'
  label: string; // activity log label
  tier: ModelTier;
}

export const AGENT_PROFILES: Readonly<Record<AgentId, AgentProfile>> =
  Object.freeze({
    data_research: {
      name: 'Data/Research Agent',
      label: 'Data Research',
      tier: 'default',
    },
    engagement: {
      name: 'Engagement Agent',
      label: 'Engagement',
      tier: 'default',
    },
    discovery: {
      name: 'Discovery Agent',
      label: 'Discovery',
      tier: 'analysis',
    },
    synthesis: {
      name: 'Synthesis Agent',
      label: 'Synthesis',
      tier: 'analysis',
    },
    project_delivery: {
      name: 'Project/Delivery Agent',
      label: 'Project Delivery',
      tier: 'default',
    },
    orchestrator: {
      name: 'Orchestrator Agent',
      label: 'Orchestrator',
      tier: 'analysis',
    },
  });

/**
 * Dependencies shared by every facade
 */
export interface AgentDeps {
  gateway: Gateway;
  models: ModelConfig;
  activity?: ActivityRecorder;
}

/**
 * Fields every facade exposes
 */
export interface AgentBase<K extends AgentId> {
  readonly id: K;
  readonly name: string;
  readonly model: string;
}

export function modelFor(id: AgentId, models: ModelConfig): string {
  return models[AGENT_PROFILES[id].tier];
}

/**
 * Build the identity fields for a facade
 */
export function agentBase<K extends AgentId>(
  id: K,
  models: ModelConfig
): AgentBase<K> {
  return {
    id,
    name: AGENT_PROFILES[id].name,
    model: modelFor(id, models),
  };
}

/**
 * Send one rendered catalog prompt through the gateway and return display
 * text. Records the outcome when an activity recorder is wired in.
 */
export async function runTemplate(
  deps: AgentDeps,
  id: AgentId,
  prompt: RenderedPrompt,
  action: string
): Promise<string> {
  const result = await deps.gateway.complete({
    model: modelFor(id, deps.models),
    systemInstruction: prompt.systemInstruction,
    userPrompt: prompt.userPrompt,
    maxOutputTokens: AGENT_MAX_OUTPUT_TOKENS,
  });

  deps.activity?.record({
    agent: AGENT_PROFILES[id].label,
    action,
    status: result.success ? 'success' : 'failure',
  });

  return toDisplayText(result);
}

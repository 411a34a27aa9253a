/**
 * Orchestrator Agent
 *
 * Chat about business tasks, solve pre-built task templates and recommend
 * custom workflows. Each operation is one gateway call; which agents to
 * combine is decided by the model, not by this code.
 */

import type {
  ActivityStatus,
  CredentialState,
  GatewayResult,
  TaskTemplate,
} from '../types/index.js';
import { filterHistory } from '../types/index.js';

import type { AgentBase, AgentDeps } from './base.js';
import {
  AGENT_PROFILES,
  ORCHESTRATOR_MAX_OUTPUT_TOKENS,
  agentBase,
} from './base.js';
import { PROMPT_CATALOG, renderPrompt } from './catalog.js';
import {
  CHAT_ERROR_PREFIX,
  ORCHESTRATOR_NOT_CONFIGURED_MESSAGE,
  toDisplayText,
} from './display.js';
import { buildOrchestrationGuide } from './orchestration-guide.js';
import {
  formatAgentChain,
  getTaskTemplate,
  listTaskTemplates,
} from './registry.js';

export interface OrchestratorDeps extends AgentDeps {
  credentials: CredentialState;
}

export interface OrchestratorAgent extends AgentBase<'orchestrator'> {
  /** Task templates this orchestrator describes to the model */
  readonly taskTemplates: readonly TaskTemplate[];

  chat(message: string, history: readonly unknown[]): Promise<string>;
  solveTask(taskKey: string, companyContext: string): Promise<string>;
  recommendWorkflow(scenario: string): Promise<string>;
}

export function createOrchestratorAgent(
  deps: OrchestratorDeps
): OrchestratorAgent {
  const { gateway, credentials } = deps;
  const base = agentBase('orchestrator', deps.models);
  const prompts = PROMPT_CATALOG.orchestrator;

  const taskTemplates = Object.freeze(listTaskTemplates());
  const systemInstruction = buildOrchestrationGuide(taskTemplates);

  function record(action: string, status: ActivityStatus): void {
    deps.activity?.record({
      agent: AGENT_PROFILES.orchestrator.label,
      action,
      status,
    });
  }

  function finish(
    result: GatewayResult,
    action: string,
    genericPrefix?: string
  ): string {
    record(action, result.success ? 'success' : 'failure');
    return toDisplayText(result, genericPrefix);
  }

  return {
    ...base,
    taskTemplates,

    async chat(message, history) {
      const action = 'Task solution generated';
      if (!credentials.resolved) {
        record(action, 'failure');
        return ORCHESTRATOR_NOT_CONFIGURED_MESSAGE;
      }

      const result = await gateway.converse({
        model: base.model,
        systemInstruction,
        history: filterHistory(history),
        userMessage: message,
        maxOutputTokens: ORCHESTRATOR_MAX_OUTPUT_TOKENS,
      });
      return finish(result, action, CHAT_ERROR_PREFIX);
    },

    async solveTask(taskKey, companyContext) {
      const action = `Solved ${taskKey} task`;
      if (!credentials.resolved) {
        record(action, 'failure');
        return ORCHESTRATOR_NOT_CONFIGURED_MESSAGE;
      }

      const lookup = getTaskTemplate(taskKey);
      if (!lookup.success) {
        record(action, 'failure');
        return lookup.error.message;
      }

      const task = lookup.data;
      const result = await gateway.complete({
        model: base.model,
        ...renderPrompt(
          prompts.solveTask,
          task.title,
          task.description,
          formatAgentChain(task),
          companyContext
        ),
        maxOutputTokens: ORCHESTRATOR_MAX_OUTPUT_TOKENS,
      });
      return finish(result, action);
    },

    async recommendWorkflow(scenario) {
      const action = 'Custom workflow recommended';
      if (!credentials.resolved) {
        record(action, 'failure');
        return ORCHESTRATOR_NOT_CONFIGURED_MESSAGE;
      }

      const result = await gateway.complete({
        model: base.model,
        ...renderPrompt(prompts.recommendWorkflow, scenario),
        maxOutputTokens: ORCHESTRATOR_MAX_OUTPUT_TOKENS,
      });
      return finish(result, action);
    },
  };
}

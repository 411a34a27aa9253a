/**
 * Project/Delivery Agent
 */

import type { ProjectPlanRecord } from '../types/index.js';

import type { AgentBase, AgentDeps } from './base.js';
import { agentBase, runTemplate } from './base.js';
import { PROMPT_CATALOG, renderPrompt } from './catalog.js';

export interface ProjectDeliveryAgent extends AgentBase<'project_delivery'> {
  createProjectPlan(
    projectName: string,
    scope: string
  ): Promise<ProjectPlanRecord>;
}

export function createProjectDeliveryAgent(
  deps: AgentDeps
): ProjectDeliveryAgent {
  const base = agentBase('project_delivery', deps.models);

  return {
    ...base,

    async createProjectPlan(projectName, scope) {
      const plan = await runTemplate(
        deps,
        base.id,
        renderPrompt(
          PROMPT_CATALOG.project_delivery.createProjectPlan,
          projectName,
          scope
        ),
        `Planned ${projectName}`
      );

      return {
        project: projectName,
        plan,
        model_used: base.model,
      };
    },
  };
}

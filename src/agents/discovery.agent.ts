/**
 * Discovery Agent
 */

import type { DiscoveryQuestionsRecord } from '../types/index.js';

import type { AgentBase, AgentDeps } from './base.js';
import { agentBase, runTemplate } from './base.js';
import { PROMPT_CATALOG, renderPrompt } from './catalog.js';

export interface DiscoveryAgent extends AgentBase<'discovery'> {
  /** Ten strategic discovery questions for the given company context */
  generateQuestions(companyContext: string): Promise<DiscoveryQuestionsRecord>;
}

export function createDiscoveryAgent(deps: AgentDeps): DiscoveryAgent {
  const base = agentBase('discovery', deps.models);

  return {
    ...base,

    async generateQuestions(companyContext) {
      const questions = await runTemplate(
        deps,
        base.id,
        renderPrompt(
          PROMPT_CATALOG.discovery.generateQuestions,
          companyContext
        ),
        'Generated questions'
      );

      return {
        context: companyContext,
        questions,
        model_used: base.model,
      };
    },
  };
}

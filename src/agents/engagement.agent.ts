/**
 * Engagement Agent
 * BANT lead qualification and outreach emails
 */

import type {
  LeadQualificationRecord,
  OutreachEmailRecord,
} from '../types/index.js';

import type { AgentBase, AgentDeps } from './base.js';
import { agentBase, runTemplate } from './base.js';
import { PROMPT_CATALOG, renderPrompt } from './catalog.js';

export interface EngagementAgent extends AgentBase<'engagement'> {
  qualifyLead(
    company: string,
    budget: string,
    timeline: string
  ): Promise<LeadQualificationRecord>;
  generateEmail(
    company: string,
    contactName: string
  ): Promise<OutreachEmailRecord>;
}

export function createEngagementAgent(deps: AgentDeps): EngagementAgent {
  const base = agentBase('engagement', deps.models);
  const prompts = PROMPT_CATALOG.engagement;

  return {
    ...base,

    async qualifyLead(company, budget, timeline) {
      const analysis = await runTemplate(
        deps,
        base.id,
        renderPrompt(prompts.qualifyLead, company, budget, timeline),
        `Qualified ${company}`
      );

      return {
        company,
        bant_analysis: analysis,
        model_used: base.model,
      };
    },

    async generateEmail(company, contactName) {
      const email = await runTemplate(
        deps,
        base.id,
        renderPrompt(prompts.generateEmail, company, contactName),
        `Email generated for ${contactName}`
      );

      return {
        recipient: `${contactName} @ ${company}`,
        email,
        model_used: base.model,
      };
    },
  };
}

/**
 * Synthesis Agent
 * Three-scenario ROI modelling
 */

import type { RoiAnalysisRecord } from '../types/index.js';

import type { AgentBase, AgentDeps } from './base.js';
import { agentBase, runTemplate } from './base.js';
import {
  DEFAULT_ANNUAL_REVENUE,
  PROMPT_CATALOG,
  formatPounds,
  renderPrompt,
} from './catalog.js';

export interface SynthesisAgent extends AgentBase<'synthesis'> {
  calculateRoi(
    investmentAmount: number,
    annualRevenue?: number
  ): Promise<RoiAnalysisRecord>;
}

export function createSynthesisAgent(deps: AgentDeps): SynthesisAgent {
  const base = agentBase('synthesis', deps.models);

  return {
    ...base,

    async calculateRoi(investmentAmount, annualRevenue = DEFAULT_ANNUAL_REVENUE) {
      const investment = formatPounds(investmentAmount);
      const analysis = await runTemplate(
        deps,
        base.id,
        renderPrompt(
          PROMPT_CATALOG.synthesis.calculateRoi,
          investmentAmount,
          annualRevenue
        ),
        `ROI calculated for ${investment}`
      );

      return {
        investment,
        roi_analysis: analysis,
        model_used: base.model,
      };
    },
  };
}

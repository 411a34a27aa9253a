/**
 * Data/Research Agent
 * Company enrichment and PII screening
 */

import type {
  CompanyProfileRecord,
  PiiScreeningRecord,
} from '../types/index.js';

import type { AgentBase, AgentDeps } from './base.js';
import { agentBase, runTemplate } from './base.js';
import { PROMPT_CATALOG, renderPrompt } from './catalog.js';

/**
 * Length of the echoed text sample in screening records
 */
const TEXT_SAMPLE_LENGTH = 100;

export interface DataResearchAgent extends AgentBase<'data_research'> {
  enrichCompany(companyName: string): Promise<CompanyProfileRecord>;
  screenPii(text: string): Promise<PiiScreeningRecord>;
}

/**
 * Cut on code points so a surrogate pair is never split
 */
export function truncateSample(text: string): string {
  const chars = Array.from(text);
  return chars.length > TEXT_SAMPLE_LENGTH
    ? `${chars.slice(0, TEXT_SAMPLE_LENGTH).join('')}...`
    : text;
}

export function createDataResearchAgent(deps: AgentDeps): DataResearchAgent {
  const base = agentBase('data_research', deps.models);
  const prompts = PROMPT_CATALOG.data_research;

  return {
    ...base,

    async enrichCompany(companyName) {
      const profile = await runTemplate(
        deps,
        base.id,
        renderPrompt(prompts.enrichCompany, companyName),
        `Enriched ${companyName}`
      );

      return {
        company_name: companyName,
        profile,
        model_used: base.model,
        timestamp: new Date().toISOString(),
      };
    },

    async screenPii(text) {
      const analysis = await runTemplate(
        deps,
        base.id,
        renderPrompt(prompts.screenPii, text),
        'PII screening'
      );

      return {
        text_sample: truncateSample(text),
        analysis,
        model_used: base.model,
      };
    },
  };
}

/**
 * Agent Domain Types
 *
 * SCOPE: agent identities, registry records and the result records each
 * facade operation returns
 */

// ─────────────────────────────────────────────────────────────
// IDENTITIES
// ─────────────────────────────────────────────────────────────

export const AGENT_IDS = [
  'data_research',
  'engagement',
  'discovery',
  'synthesis',
  'project_delivery',
  'orchestrator',
] as const;

export type AgentId = (typeof AGENT_IDS)[number];

/**
 * Roles the orchestrator describes to the model.
 * change_comms is advisory only and has no facade.
 */
export type AgentRole = Exclude<AgentId, 'orchestrator'> | 'change_comms';

/**
 * Which configured model tier an agent runs on
 */
export type ModelTier = 'default' | 'analysis';

// ─────────────────────────────────────────────────────────────
// REGISTRY RECORDS
// ─────────────────────────────────────────────────────────────

export interface AgentInfoEntry {
  name: string;
  description: string;
  tools: readonly string[];
  outputs: readonly string[];
}

export const TASK_KEYS = [
  'lead_gen',
  'reception_automation',
  'full_pipeline',
  'compliance_automation',
] as const;

export type TaskKey = (typeof TASK_KEYS)[number];

export interface TaskTemplate {
  key: TaskKey;
  title: string;
  description: string;
  agents: readonly AgentRole[];
  process: readonly string[];
  duration: string;
  effort: 'Low' | 'Medium' | 'High';
}

// ─────────────────────────────────────────────────────────────
// RESULT RECORDS
// ─────────────────────────────────────────────────────────────

export interface CompanyProfileRecord {
  company_name: string;
  profile: string;
  model_used: string;
  timestamp: string;
}

export interface PiiScreeningRecord {
  text_sample: string;
  analysis: string;
  model_used: string;
}

export interface LeadQualificationRecord {
  company: string;
  bant_analysis: string;
  model_used: string;
}

export interface OutreachEmailRecord {
  recipient: string;
  email: string;
  model_used: string;
}

export interface DiscoveryQuestionsRecord {
  context: string;
  questions: string;
  model_used: string;
}

export interface RoiAnalysisRecord {
  investment: string;
  roi_analysis: string;
  model_used: string;
}

export interface ProjectPlanRecord {
  project: string;
  plan: string;
  model_used: string;
}

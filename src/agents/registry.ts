/**
 * Orchestrator Task Registry
 *
 * Static agents-info table and task templates. Both are frozen at module load
 * and only ever interpolated into prompt text.
 */

import type {
  AgentInfoEntry,
  AgentRole,
  Result,
  TaskKey,
  TaskTemplate,
} from '../types/index.js';
import { TASK_KEYS, success, failure } from '../types/index.js';

export const AGENT_INFO: Readonly<Record<AgentRole, AgentInfoEntry>> =
  Object.freeze({
    data_research: {
      name: '📊 Data/Research',
      description: 'Company enrichment, PII screening, GDPR validation',
      tools: ['Companies House API', 'Clearbit', 'OpenAI'],
      outputs: ['enriched profiles', 'compliance reports', 'contact validation'],
    },
    engagement: {
      name: '🎯 Engagement',
      description: 'BANT qualification, outreach emails, lead scoring',
      tools: ['LinkedIn', 'SendGrid', 'OpenAI'],
      outputs: ['qualified leads', 'personalized outreach', 'lead scores'],
    },
    discovery: {
      name: '🔍 Discovery',
      description: 'Strategic questions, process mapping, compliance',
      tools: ['LinkedIn', 'Compliance APIs', 'OpenAI GPT-4-turbo'],
      outputs: [
        'discovery questions',
        'process maps',
        'compliance checklists',
      ],
    },
    synthesis: {
      name: '💡 Synthesis',
      description: 'ROI modeling, 3-scenario planning, business case',
      tools: ['Claude Sonnet', 'Financial APIs', 'OpenAI GPT-4-turbo'],
      outputs: ['ROI models', 'business cases', 'financial projections'],
    },
    project_delivery: {
      name: '📋 Project/Delivery',
      description: 'Timelines, risk assessment, contracts, resource planning',
      tools: ['DocuSign', 'AWS S3', 'OpenAI'],
      outputs: [
        'implementation plans',
        'risk assessments',
        'resource schedules',
      ],
    },
    change_comms: {
      name: '📢 Change/Comms',
      description: 'Training plans, communication, adoption tracking',
      tools: ['SendGrid', 'OpenAI'],
      outputs: ['training materials', 'comms plans', 'adoption metrics'],
    },
  });

export const TASK_TEMPLATES: Readonly<Record<TaskKey, TaskTemplate>> =
  Object.freeze({
    lead_gen: {
      key: 'lead_gen',
      title: 'Lead Generation Automation',
      description: 'Automated prospecting and lead qualification',
      agents: ['data_research', 'engagement', 'synthesis'],
      process: [
        'Enrich prospect data (research industry, company profile, pain points)',
        'Qualify leads using BANT framework',
        'Calculate ROI per lead',
        'Generate personalized outreach emails',
      ],
      duration: '3-4 weeks',
      effort: 'Medium',
    },
    reception_automation: {
      key: 'reception_automation',
      title: 'Reception/Intake Automation',
      description: 'Automated client intake and appointment scheduling',
      agents: ['discovery', 'data_research', 'project_delivery'],
      process: [
        'Map current reception workflow and pain points',
        'Identify automation opportunities (intake forms, data capture)',
        'Screen callers for compliance and qualification',
        'Auto-schedule appointments based on availability',
        'Create implementation roadmap',
      ],
      duration: '4-6 weeks',
      effort: 'High',
    },
    full_pipeline: {
      key: 'full_pipeline',
      title: 'Full Sales Pipeline Automation',
      description: 'End-to-end lead generation through deal closure',
      agents: [
        'data_research',
        'engagement',
        'discovery',
        'synthesis',
        'project_delivery',
        'change_comms',
      ],
      process: [
        'Research and enrich prospect database',
        'Engage & qualify inbound leads',
        'Run discovery calls with qualifying prospects',
        'Build ROI case and business proposal',
        'Create implementation plan',
        'Plan change management & training',
      ],
      duration: '8-12 weeks',
      effort: 'High',
    },
    compliance_automation: {
      key: 'compliance_automation',
      title: 'Compliance & Risk Screening',
      description: 'Automated compliance checks and risk assessment',
      agents: ['data_research', 'discovery'],
      process: [
        'Screen prospects against compliance databases',
        'Check PII and data protection requirements',
        'Validate regulatory compliance (GDPR, SCA, etc)',
        'Create compliance report and risk assessment',
      ],
      duration: '2-3 weeks',
      effort: 'Low',
    },
  });

export function isTaskKey(key: string): key is TaskKey {
  return TASK_KEYS.some((candidate) => candidate === key);
}

/**
 * Message listing every valid key, returned for unknown lookups
 */
export function unknownTaskMessage(): string {
  return `Unknown task. Available: ${TASK_KEYS.join(', ')}`;
}

/**
 * Look up a task template by key
 */
export function getTaskTemplate(
  key: string
): Result<TaskTemplate, 'UNKNOWN_TASK'> {
  if (!isTaskKey(key)) {
    return failure('UNKNOWN_TASK', unknownTaskMessage(), {
      available: [...TASK_KEYS],
    });
  }
  return success(TASK_TEMPLATES[key]);
}

export function listTaskTemplates(): TaskTemplate[] {
  return TASK_KEYS.map((key) => TASK_TEMPLATES[key]);
}

/**
 * Agent display names in template order, e.g. "📊 Data/Research → 🔍 Discovery"
 */
export function formatAgentChain(template: TaskTemplate): string {
  return template.agents.map((role) => AGENT_INFO[role].name).join(' → ');
}

/**
 * Agent Routes
 * One endpoint per worker facade operation
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { AgentMap } from '../../agents/index.js';
import { AGENT_PROFILES, parseAgentId } from '../../agents/index.js';
import type { AgentId } from '../../types/index.js';
import { AGENT_IDS } from '../../types/index.js';
import { errorResponse, parseBody, successResponse } from '../utils/response.js';

type WorkerAgents = Pick<
  AgentMap,
  | 'data_research'
  | 'engagement'
  | 'discovery'
  | 'synthesis'
  | 'project_delivery'
>;

interface AgentRoutesDeps {
  agents: WorkerAgents;

  /** Model per identity, for the listing endpoint */
  modelOf: (id: AgentId) => string;
}

function text(field: string) {
  return z
    .string({ required_error: `${field} is required` })
    .min(1, `${field} is required`);
}

// Zod Schemas
const enrichSchema = z.object({ companyName: text('companyName') });

const screenPiiSchema = z.object({ text: text('text') });

const qualifySchema = z.object({
  company: text('company'),
  budget: text('budget'),
  timeline: text('timeline'),
});

const emailSchema = z.object({
  company: text('company'),
  contactName: text('contactName'),
});

const questionsSchema = z.object({ companyContext: text('companyContext') });

const roiSchema = z.object({
  investmentAmount: z.number().finite().positive(),
  annualRevenue: z.number().finite().positive().optional(),
});

const planSchema = z.object({
  projectName: text('projectName'),
  scope: text('scope'),
});

/**
 * Create agent routes
 */
export function createAgentRoutes(deps: AgentRoutesDeps): Hono {
  const { agents, modelOf } = deps;
  const app = new Hono();

  /**
   * GET /agents
   * List agent identities with their display names and models
   */
  app.get('/agents', (c) => {
    return successResponse(
      c,
      AGENT_IDS.map((id) => ({
        id,
        name: AGENT_PROFILES[id].name,
        model: modelOf(id),
      }))
    );
  });

  /**
   * GET /agents/:id
   */
  app.get('/agents/:id', (c) => {
    const parsed = parseAgentId(c.req.param('id'));
    if (!parsed.success) {
      return errorResponse(c, parsed.error);
    }
    const id = parsed.data;
    return successResponse(c, {
      id,
      name: AGENT_PROFILES[id].name,
      model: modelOf(id),
    });
  });

  /**
   * POST /agents/data-research/enrich
   */
  app.post('/agents/data-research/enrich', async (c) => {
    const body = await parseBody(c, enrichSchema);
    if (!body.success) {
      return errorResponse(c, body.error);
    }
    const record = await agents.data_research.enrichCompany(
      body.data.companyName
    );
    return successResponse(c, record);
  });

  /**
   * POST /agents/data-research/screen-pii
   */
  app.post('/agents/data-research/screen-pii', async (c) => {
    const body = await parseBody(c, screenPiiSchema);
    if (!body.success) {
      return errorResponse(c, body.error);
    }
    const record = await agents.data_research.screenPii(body.data.text);
    return successResponse(c, record);
  });

  /**
   * POST /agents/engagement/qualify
   */
  app.post('/agents/engagement/qualify', async (c) => {
    const body = await parseBody(c, qualifySchema);
    if (!body.success) {
      return errorResponse(c, body.error);
    }
    const { company, budget, timeline } = body.data;
    const record = await agents.engagement.qualifyLead(
      company,
      budget,
      timeline
    );
    return successResponse(c, record);
  });

  /**
   * POST /agents/engagement/email
   */
  app.post('/agents/engagement/email', async (c) => {
    const body = await parseBody(c, emailSchema);
    if (!body.success) {
      return errorResponse(c, body.error);
    }
    const record = await agents.engagement.generateEmail(
      body.data.company,
      body.data.contactName
    );
    return successResponse(c, record);
  });

  /**
   * POST /agents/discovery/questions
   */
  app.post('/agents/discovery/questions', async (c) => {
    const body = await parseBody(c, questionsSchema);
    if (!body.success) {
      return errorResponse(c, body.error);
    }
    const record = await agents.discovery.generateQuestions(
      body.data.companyContext
    );
    return successResponse(c, record);
  });

  /**
   * POST /agents/synthesis/roi
   */
  app.post('/agents/synthesis/roi', async (c) => {
    const body = await parseBody(c, roiSchema);
    if (!body.success) {
      return errorResponse(c, body.error);
    }
    const record = await agents.synthesis.calculateRoi(
      body.data.investmentAmount,
      body.data.annualRevenue
    );
    return successResponse(c, record);
  });

  /**
   * POST /agents/project-delivery/plan
   */
  app.post('/agents/project-delivery/plan', async (c) => {
    const body = await parseBody(c, planSchema);
    if (!body.success) {
      return errorResponse(c, body.error);
    }
    const record = await agents.project_delivery.createProjectPlan(
      body.data.projectName,
      body.data.scope
    );
    return successResponse(c, record);
  });

  return app;
}

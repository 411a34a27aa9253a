/**
 * Agent Routes Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect } from 'vitest';

import { createAgents } from '@/agents/index.js';
import { createRequestIdMiddleware } from '@/api/middleware/request-id.js';
import { createAgentRoutes } from '@/api/routes/agents.js';
import { failure } from '@/types/index.js';
import type { GatewayResult } from '@/types/index.js';

import {
  RESOLVED_CREDENTIALS,
  TEST_MODELS,
  createMockGateway,
} from '../../mocks/index.js';

function createTestApp(result?: GatewayResult) {
  const mock = createMockGateway(result);
  const agents = createAgents({
    gateway: mock.gateway,
    models: TEST_MODELS,
    credentials: RESOLVED_CREDENTIALS,
  });

  const app = new Hono();
  app.use('*', createRequestIdMiddleware());
  app.route(
    '/api/v1',
    createAgentRoutes({ agents, modelOf: (id) => agents[id].model })
  );
  return { app, ...mock };
}

function post(app: Hono, path: string, body: unknown) {
  return app.request(`/api/v1${path}`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'X-Request-Id': 'req-123',
    },
    body: JSON.stringify(body),
  });
}

describe('Agent Routes', () => {
  describe('GET /agents', () => {
    it('should list every agent with its model', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/v1/agents', {
        headers: { 'X-Request-Id': 'req-123' },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: [
          { id: 'data_research', name: 'Data/Research Agent', model: 'test-default-model' },
          { id: 'engagement', name: 'Engagement Agent', model: 'test-default-model' },
          { id: 'discovery', name: 'Discovery Agent', model: 'test-analysis-model' },
          { id: 'synthesis', name: 'Synthesis Agent', model: 'test-analysis-model' },
          { id: 'project_delivery', name: 'Project/Delivery Agent', model: 'test-default-model' },
          { id: 'orchestrator', name: 'Orchestrator Agent', model: 'test-analysis-model' },
        ],
        meta: { requestId: 'req-123' },
      });
    });
  });

  describe('GET /agents/:id', () => {
    it('should return one agent', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/v1/agents/synthesis');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { id: 'synthesis', name: 'Synthesis Agent', model: 'test-analysis-model' },
      });
    });

    it('should return 404 UNKNOWN_AGENT for an unknown id', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/v1/agents/change_comms');

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({
        error: { code: 'UNKNOWN_AGENT', message: 'Unknown agent: change_comms' },
      });
    });
  });

  describe('POST /agents/data-research/enrich', () => {
    it('should return the profile record', async () => {
      const { app, callCount } = createTestApp();

      const res = await post(app, '/agents/data-research/enrich', {
        companyName: 'Acme Ltd',
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: {
          company_name: 'Acme Ltd',
          profile: 'stub response',
          model_used: 'test-default-model',
          timestamp: expect.any(String),
        },
        meta: { requestId: 'req-123' },
      });
      expect(callCount()).toBe(1);
    });

    it('should return 400 for a missing company name without calling the gateway', async () => {
      const { app, callCount } = createTestApp();

      const res = await post(app, '/agents/data-research/enrich', {});

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request body',
          details: {
            issues: [{ path: 'companyName', message: 'companyName is required' }],
          },
          requestId: 'req-123',
        },
      });
      expect(callCount()).toBe(0);
    });

    it('should return 400 for malformed JSON', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/v1/agents/data-research/enrich', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{not json',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request body must be valid JSON',
        },
      });
    });

    it('should return 200 with the error text when the provider fails', async () => {
      const { app } = createTestApp(
        failure('PROVIDER_ERROR', 'Request timed out.')
      );

      const res = await post(app, '/agents/data-research/enrich', {
        companyName: 'Acme Ltd',
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { profile: 'Error: Request timed out.' },
      });
    });
  });

  describe('POST /agents/data-research/screen-pii', () => {
    it('should return the screening record', async () => {
      const { app } = createTestApp();

      const res = await post(app, '/agents/data-research/screen-pii', {
        text: 'Call Jane on 01234 567890',
      });

      expect(await res.json()).toMatchObject({
        data: {
          text_sample: 'Call Jane on 01234 567890',
          analysis: 'stub response',
        },
      });
    });
  });

  describe('POST /agents/engagement/qualify', () => {
    it('should require budget and timeline', async () => {
      const { app } = createTestApp();

      const res = await post(app, '/agents/engagement/qualify', {
        company: 'Acme Ltd',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: {
          details: {
            issues: [
              { path: 'budget', message: 'budget is required' },
              { path: 'timeline', message: 'timeline is required' },
            ],
          },
        },
      });
    });

    it('should return the BANT record', async () => {
      const { app } = createTestApp();

      const res = await post(app, '/agents/engagement/qualify', {
        company: 'Acme Ltd',
        budget: '£100k',
        timeline: 'Q3',
      });

      expect(await res.json()).toMatchObject({
        data: { company: 'Acme Ltd', bant_analysis: 'stub response' },
      });
    });
  });

  describe('POST /agents/engagement/email', () => {
    it('should return the email record', async () => {
      const { app } = createTestApp();

      const res = await post(app, '/agents/engagement/email', {
        company: 'Acme Ltd',
        contactName: 'Jane Doe',
      });

      expect(await res.json()).toMatchObject({
        data: { recipient: 'Jane Doe @ Acme Ltd', email: 'stub response' },
      });
    });
  });

  describe('POST /agents/discovery/questions', () => {
    it('should return the questions record', async () => {
      const { app } = createTestApp();

      const res = await post(app, '/agents/discovery/questions', {
        companyContext: 'a dental practice',
      });

      expect(await res.json()).toMatchObject({
        data: {
          context: 'a dental practice',
          questions: 'stub response',
          model_used: 'test-analysis-model',
        },
      });
    });
  });

  describe('POST /agents/synthesis/roi', () => {
    it('should return the ROI record', async () => {
      const { app } = createTestApp();

      const res = await post(app, '/agents/synthesis/roi', {
        investmentAmount: 500000,
      });

      expect(await res.json()).toMatchObject({
        data: { investment: '£500,000', roi_analysis: 'stub response' },
      });
    });

    it('should reject a non-positive investment', async () => {
      const { app, callCount } = createTestApp();

      const res = await post(app, '/agents/synthesis/roi', {
        investmentAmount: 0,
      });

      expect(res.status).toBe(400);
      expect(callCount()).toBe(0);
    });

    it('should reject an investment that overflows to Infinity', async () => {
      const { app, callCount } = createTestApp();

      const res = await app.request('/api/v1/agents/synthesis/roi', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"investmentAmount":1e999}',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'VALIDATION_ERROR', message: 'Invalid request body' },
      });
      expect(callCount()).toBe(0);
    });

    it('should reject an annual revenue that overflows to Infinity', async () => {
      const { app, callCount } = createTestApp();

      const res = await app.request('/api/v1/agents/synthesis/roi', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"investmentAmount":500000,"annualRevenue":1e999}',
      });

      expect(res.status).toBe(400);
      expect(callCount()).toBe(0);
    });
  });

  describe('POST /agents/project-delivery/plan', () => {
    it('should return the plan record', async () => {
      const { app } = createTestApp();

      const res = await post(app, '/agents/project-delivery/plan', {
        projectName: 'CRM rollout',
        scope: 'Migrate 40 users',
      });

      expect(await res.json()).toMatchObject({
        data: { project: 'CRM rollout', plan: 'stub response' },
      });
    });
  });
});

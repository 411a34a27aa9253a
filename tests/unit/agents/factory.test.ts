/**
 * Agent Factory Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  createAgent,
  createAgents,
  isAgentId,
  parseAgentId,
} from '@/agents/index.js';
import { AGENT_IDS } from '@/types/index.js';

import {
  RESOLVED_CREDENTIALS,
  TEST_MODELS,
  createMockGateway,
} from '../../mocks/index.js';

describe('Agent Factory', () => {
  describe('createAgents()', () => {
    it('should build one facade per identity', () => {
      const { gateway } = createMockGateway();
      const agents = createAgents({
        gateway,
        models: TEST_MODELS,
        credentials: RESOLVED_CREDENTIALS,
      });

      expect(Object.keys(agents)).toEqual([...AGENT_IDS]);
      for (const id of AGENT_IDS) {
        expect(agents[id].id).toBe(id);
      }
    });

    it('should assign models by tier', () => {
      const { gateway } = createMockGateway();
      const agents = createAgents({
        gateway,
        models: TEST_MODELS,
        credentials: RESOLVED_CREDENTIALS,
      });

      expect(agents.data_research.model).toBe('test-default-model');
      expect(agents.engagement.model).toBe('test-default-model');
      expect(agents.project_delivery.model).toBe('test-default-model');
      expect(agents.discovery.model).toBe('test-analysis-model');
      expect(agents.synthesis.model).toBe('test-analysis-model');
      expect(agents.orchestrator.model).toBe('test-analysis-model');
    });
  });

  describe('createAgent()', () => {
    it('should build the facade for the given identity', async () => {
      const { gateway, callCount } = createMockGateway();
      const agent = createAgent('synthesis', {
        gateway,
        models: TEST_MODELS,
        credentials: RESOLVED_CREDENTIALS,
      });

      const record = await agent.calculateRoi(1000);

      expect(agent.name).toBe('Synthesis Agent');
      expect(record.investment).toBe('£1,000');
      expect(callCount()).toBe(1);
    });
  });

  describe('parseAgentId()', () => {
    it('should accept every known identity', () => {
      for (const id of AGENT_IDS) {
        expect(parseAgentId(id)).toEqual({ success: true, data: id });
      }
    });

    it('should reject unknown keys with UNKNOWN_AGENT', () => {
      const result = parseAgentId('change_comms');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('UNKNOWN_AGENT');
        expect(result.error.message).toBe('Unknown agent: change_comms');
      }
    });

    it('should narrow with isAgentId', () => {
      expect(isAgentId('orchestrator')).toBe(true);
      expect(isAgentId('Orchestrator')).toBe(false);
    });
  });
});

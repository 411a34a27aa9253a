/**
 * Orchestrator Routes
 * Task templates, task solving, custom workflows and session-backed chat
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { OrchestratorAgent } from '../../agents/index.js';
import { formatAgentChain, getTaskTemplate } from '../../agents/index.js';
import type { SessionService } from '../../services/index.js';
import type { TaskTemplate } from '../../types/index.js';
import { errorResponse, parseBody, successResponse } from '../utils/response.js';

/**
 * Message max length
 */
const MAX_MESSAGE_LENGTH = 32000;

interface OrchestratorRoutesDeps {
  orchestrator: Pick<
    OrchestratorAgent,
    'taskTemplates' | 'chat' | 'solveTask' | 'recommendWorkflow'
  >;
  sessionService: SessionService;
}

// Zod Schemas
const solveSchema = z.object({
  companyContext: z.string().min(1, 'companyContext is required'),
});

const workflowSchema = z.object({
  scenario: z
    .string()
    .refine((value) => value.trim() !== '', 'Please describe your scenario first'),
});

const chatSchema = z.object({
  message: z
    .string()
    .min(1, 'message is required')
    .max(MAX_MESSAGE_LENGTH, `message exceeds ${MAX_MESSAGE_LENGTH} characters`),
  sessionId: z.string().optional(),
});

function presentTask(task: TaskTemplate) {
  return {
    key: task.key,
    title: task.title,
    description: task.description,
    agents: [...task.agents],
    agentChain: formatAgentChain(task),
    process: [...task.process],
    duration: task.duration,
    effort: task.effort,
  };
}

/**
 * Create orchestrator routes
 */
export function createOrchestratorRoutes(deps: OrchestratorRoutesDeps): Hono {
  const { orchestrator, sessionService } = deps;
  const app = new Hono();

  /**
   * GET /orchestrator/tasks
   * List pre-built task templates
   */
  app.get('/orchestrator/tasks', (c) => {
    return successResponse(c, orchestrator.taskTemplates.map(presentTask));
  });

  /**
   * GET /orchestrator/tasks/:key
   */
  app.get('/orchestrator/tasks/:key', (c) => {
    const lookup = getTaskTemplate(c.req.param('key'));
    if (!lookup.success) {
      return errorResponse(c, lookup.error);
    }
    return successResponse(c, presentTask(lookup.data));
  });

  /**
   * POST /orchestrator/tasks/:key/solve
   * Unknown keys come back as the facade's listing message, not an error
   */
  app.post('/orchestrator/tasks/:key/solve', async (c) => {
    const taskKey = c.req.param('key');
    const body = await parseBody(c, solveSchema);
    if (!body.success) {
      return errorResponse(c, body.error);
    }

    const response = await orchestrator.solveTask(
      taskKey,
      body.data.companyContext
    );
    return successResponse(c, { task: taskKey, response });
  });

  /**
   * POST /orchestrator/workflow
   * Recommend an orchestration for a custom scenario
   */
  app.post('/orchestrator/workflow', async (c) => {
    const body = await parseBody(c, workflowSchema);
    if (!body.success) {
      return errorResponse(c, body.error);
    }

    const recommendation = await orchestrator.recommendWorkflow(
      body.data.scenario
    );
    return successResponse(c, { recommendation });
  });

  /**
   * POST /orchestrator/chat
   * Send a message; history is kept per session
   */
  app.post('/orchestrator/chat', async (c) => {
    const body = await parseBody(c, chatSchema);
    if (!body.success) {
      return errorResponse(c, body.error);
    }

    const session = sessionService.openSession(body.data.sessionId);
    if (!session.success) {
      return errorResponse(c, session.error);
    }
    const sessionId = session.data;

    const history = sessionService.getHistory(sessionId);
    if (!history.success) {
      return errorResponse(c, history.error);
    }

    const reply = await orchestrator.chat(body.data.message, history.data);

    const appended = sessionService.appendTurns(sessionId, [
      { role: 'user', content: body.data.message },
      { role: 'assistant', content: reply },
    ]);
    if (!appended.success) {
      return errorResponse(c, appended.error);
    }

    return successResponse(c, { sessionId, reply });
  });

  return app;
}

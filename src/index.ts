/**
 * Application Entry Point
 *
 * Wires together the gateway, agents and services and starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createAgents } from './agents/index.js';
import { createApp } from './api/index.js';
import { createGateway, createLLMClient } from './gateway/index.js';
import { loadConfig } from './lib/index.js';
import {
  createActivityService,
  createActivityServiceDb,
  createSessionService,
  createSessionServiceDb,
} from './services/index.js';

// Validate environment
const config = loadConfig();

if (!config.credentials.resolved) {
  console.error(
    `OPENAI_API_KEY is ${config.credentials.reason}; agent calls will return a configuration error`
  );
}

// Wire the gateway; the provider client is only built on first use
const gateway = createGateway({
  credentials: config.credentials,
  createClient: (apiKey) =>
    createLLMClient({
      apiKey,
      baseURL: config.baseURL,
      timeout: config.timeout,
    }),
});

// Wire all services
const activityService = createActivityService({
  db: createActivityServiceDb(),
});
const sessionService = createSessionService({ db: createSessionServiceDb() });

const agents = createAgents({
  gateway,
  models: config.models,
  activity: activityService,
  credentials: config.credentials,
});

// Create the API application
const app = createApp({
  credentials: config.credentials,
  agents,
  sessionService,
  activityService,
  allowedOrigins: config.allowedOrigins,
});

console.error(`Server starting on port ${config.port}`);
console.error(
  `Models: default=${config.models.default} analysis=${config.models.analysis}`
);

serve({
  fetch: app.fetch,
  port: config.port,
});

export { app };

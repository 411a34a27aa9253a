/**
 * Gateway Exports
 *
 * The gateway is the only component that talks to the chat-completion API.
 * - LLM client: thin mapping over the OpenAI SDK
 * - Gateway: credential check, single call, error classification
 *
 * Required env: OPENAI_API_KEY
 */

export { createLLMClient } from './llm-client.js';
export type { LLMClientConfig } from './llm-client.js';
export { createGateway, classifyProviderError, TEMPERATURE } from './gateway.js';
export type { GatewayDeps } from './gateway.js';

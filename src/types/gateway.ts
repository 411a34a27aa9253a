/**
 * Gateway Domain Types
 *
 * SCOPE: provider messages, the LLM client seam and the single-call gateway
 */

import type { ConversationTurn } from './conversation.js';
import type { Result } from './result.js';

// ─────────────────────────────────────────────────────────────
// LLM CLIENT TYPES
// ─────────────────────────────────────────────────────────────

/**
 * OpenAI-compatible message format
 */
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Chat completion request sent to the provider
 */
export interface LLMRequest {
  model: string;
  messages: LLMMessage[];
  max_tokens: number;
  temperature: number;
}

/**
 * Non-streaming LLM response
 */
export interface LLMResponse {
  id: string;
  model: string;
  choices: Array<{
    index: number;
    message: {
      role: 'assistant';
      content: string | null;
    };
    finish_reason: string | null;
  }>;
  usage: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

/**
 * LLM Client interface for making requests to the provider
 */
export interface LLMClient {
  /**
   * Send a chat completion request (non-streaming).
   * Rejects with the provider's error on any failure.
   */
  complete(request: LLMRequest): Promise<LLMResponse>;
}

// ─────────────────────────────────────────────────────────────
// GATEWAY TYPES
// ─────────────────────────────────────────────────────────────

/**
 * One-shot prompt: system instruction plus a single user prompt
 */
export interface PromptRequest {
  model: string;
  systemInstruction: string;
  userPrompt: string;
  maxOutputTokens: number;
}

/**
 * Multi-turn prompt used by the orchestrator chat
 */
export interface ChatRequest {
  model: string;
  systemInstruction: string;
  history: readonly ConversationTurn[];
  userMessage: string;
  maxOutputTokens: number;
}

/**
 * Failure kinds a gateway call can produce
 */
export type GatewayErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'AUTHENTICATION_ERROR'
  | 'PROVIDER_ERROR';

export type GatewayResult = Result<string, GatewayErrorCode>;

/**
 * Single point of contact with the chat-completion API
 */
export interface Gateway {
  complete(request: PromptRequest): Promise<GatewayResult>;
  converse(request: ChatRequest): Promise<GatewayResult>;
}

/**
 * LLM Client Implementation
 *
 * Wraps the OpenAI SDK. The base URL can point at any OpenAI-compatible
 * endpoint.
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import type {
  LLMClient,
  LLMMessage,
  LLMRequest,
  LLMResponse,
} from '../types/index.js';

/**
 * LLM Client configuration options
 */
export interface LLMClientConfig {
  /** Provider API key (required) */
  apiKey: string;

  /** Base URL override (default: the SDK's OpenAI endpoint) */
  baseURL?: string;

  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * Convert our LLMMessage to OpenAI's ChatCompletionMessageParam
 */
function toOpenAIMessage(msg: LLMMessage): ChatCompletionMessageParam {
  switch (msg.role) {
    case 'system':
      return { role: 'system', content: msg.content };
    case 'user':
      return { role: 'user', content: msg.content };
    case 'assistant':
      return { role: 'assistant', content: msg.content };
  }
}

/**
 * Create an LLM client
 */
export function createLLMClient(config: LLMClientConfig): LLMClient {
  // Validate API key
  if (!config.apiKey || config.apiKey.trim() === '') {
    throw new Error('API key is required');
  }

  const openai = new OpenAI({
    apiKey: config.apiKey,
    ...(config.baseURL !== undefined && { baseURL: config.baseURL }),
    timeout: config.timeout ?? 120000,
    maxRetries: 0,
  });

  return {
    /**
     * Send a non-streaming chat completion request
     */
    async complete(request: LLMRequest): Promise<LLMResponse> {
      const response = await openai.chat.completions.create({
        model: request.model,
        messages: request.messages.map(toOpenAIMessage),
        max_tokens: request.max_tokens,
        temperature: request.temperature,
        stream: false,
      });

      // Map OpenAI response to our LLMResponse type
      return {
        id: response.id,
        model: response.model,
        choices: (response.choices ?? []).map((choice) => ({
          index: choice.index,
          message: {
            role: 'assistant' as const,
            content: choice.message.content,
          },
          finish_reason: choice.finish_reason,
        })),
        usage: {
          prompt_tokens: response.usage?.prompt_tokens ?? 0,
          completion_tokens: response.usage?.completion_tokens ?? 0,
          total_tokens: response.usage?.total_tokens ?? 0,
        },
      };
    },
  };
}

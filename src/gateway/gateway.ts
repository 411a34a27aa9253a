/**
 * LLM Gateway
 *
 * One outbound chat-completion call per invocation. Never throws: every
 * outcome comes back as a GatewayResult. No retries, no caching.
 */

import type {
  CredentialState,
  Gateway,
  GatewayResult,
  LLMClient,
  LLMMessage,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

/**
 * Sampling temperature shared by every call
 */
export const TEMPERATURE = 0.7;

const AUTH_KEYWORDS = ['api_key', 'authentication'];

export interface GatewayDeps {
  credentials: CredentialState;

  /** Builds the provider client; called at most once, on first use */
  createClient: (apiKey: string) => LLMClient;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown provider error';
}

function errorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

/**
 * Map a thrown provider error to a gateway failure
 */
export function classifyProviderError(error: unknown): GatewayResult {
  const message = errorMessage(error);
  const lowered = message.toLowerCase();

  if (
    errorStatus(error) === 401 ||
    AUTH_KEYWORDS.some((keyword) => lowered.includes(keyword))
  ) {
    return failure('AUTHENTICATION_ERROR', message);
  }
  return failure('PROVIDER_ERROR', message);
}

/**
 * Create the gateway
 */
export function createGateway(deps: GatewayDeps): Gateway {
  const { credentials } = deps;
  let client: LLMClient | null = null;

  function getClient(apiKey: string): LLMClient {
    if (client === null) {
      client = deps.createClient(apiKey);
    }
    return client;
  }

  async function send(
    model: string,
    messages: LLMMessage[],
    maxOutputTokens: number
  ): Promise<GatewayResult> {
    if (!credentials.resolved) {
      return failure(
        'CONFIGURATION_ERROR',
        `OpenAI API key is ${credentials.reason}`
      );
    }

    try {
      const response = await getClient(credentials.apiKey).complete({
        model,
        messages,
        max_tokens: maxOutputTokens,
        temperature: TEMPERATURE,
      });

      const first = response.choices[0];
      if (first === undefined) {
        console.error(`Gateway: malformed response from ${model}`);
        return failure(
          'PROVIDER_ERROR',
          'Malformed response: no completion choices returned'
        );
      }
      return success(first.message.content ?? '');
    } catch (error) {
      const result = classifyProviderError(error);
      if (!result.success) {
        console.error(
          `Gateway: ${result.error.code} from ${model}:`,
          result.error.message
        );
      }
      return result;
    }
  }

  return {
    async complete(request) {
      return send(
        request.model,
        [
          { role: 'system', content: request.systemInstruction },
          { role: 'user', content: request.userPrompt },
        ],
        request.maxOutputTokens
      );
    },

    async converse(request) {
      const messages: LLMMessage[] = [
        { role: 'system', content: request.systemInstruction },
      ];
      for (const turn of request.history) {
        messages.push({ role: turn.role, content: turn.content });
      }
      messages.push({ role: 'user', content: request.userMessage });

      return send(request.model, messages, request.maxOutputTokens);
    },
  };
}

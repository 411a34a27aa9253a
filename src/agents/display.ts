/**
 * Display Messages
 *
 * Gateway failures become text here, at the facade boundary. Callers display
 * whatever string they receive.
 */

import type { GatewayErrorCode, GatewayResult } from '../types/index.js';

export const NOT_CONFIGURED_MESSAGE =
  '⚠️ Error: OpenAI API key not configured. Please add OPENAI_API_KEY to your environment or .env file';

export const INVALID_KEY_MESSAGE =
  '⚠️ Error: Invalid or missing OpenAI API key. Please check OPENAI_API_KEY in your environment';

export const ORCHESTRATOR_NOT_CONFIGURED_MESSAGE =
  'Error: OpenAI API key not configured';

export const GENERIC_ERROR_PREFIX = 'Error: ';

export const CHAT_ERROR_PREFIX = 'I encountered an error: ';

/**
 * Text for a gateway failure
 */
export function describeFailure(
  error: { code: GatewayErrorCode; message: string },
  genericPrefix: string = GENERIC_ERROR_PREFIX
): string {
  switch (error.code) {
    case 'CONFIGURATION_ERROR':
      return NOT_CONFIGURED_MESSAGE;
    case 'AUTHENTICATION_ERROR':
      return INVALID_KEY_MESSAGE;
    case 'PROVIDER_ERROR':
      return `${genericPrefix}${error.message}`;
  }
}

/**
 * Response text on success, failure text otherwise
 */
export function toDisplayText(
  result: GatewayResult,
  genericPrefix?: string
): string {
  if (result.success) {
    return result.data;
  }
  return describeFailure(result.error, genericPrefix);
}

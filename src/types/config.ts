/**
 * Configuration Types
 *
 * The configuration is built once at start-up and passed to every component
 * that needs it.
 */

/**
 * Outcome of resolving the provider credential
 */
export type CredentialState =
  | { resolved: true; apiKey: string }
  | { resolved: false; reason: 'missing' | 'blank' };

export interface ModelConfig {
  /** Cheaper model for routine extraction agents */
  default: string;

  /** Higher-capability model for analysis agents and the orchestrator */
  analysis: string;
}

export interface AppConfig {
  credentials: CredentialState;
  models: ModelConfig;

  /** Base URL override for an OpenAI-compatible endpoint */
  baseURL?: string;

  /** Provider request timeout in milliseconds */
  timeout: number;

  port: number;
  allowedOrigins: string[];
}

/**
 * Application Configuration
 * Parses the process environment once into an explicit AppConfig
 */

import { z } from 'zod';

import type { AppConfig, CredentialState } from '../types/index.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const ANALYSIS_MODEL = 'gpt-4-turbo';

const DEFAULT_ORIGINS = ['http://localhost:5173', 'http://localhost:3000'];

/**
 * A blank value reads as unset, as an empty line copied from .env.example would
 */
function blankAsUnset(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const envSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.preprocess(blankAsUnset, z.string().url().optional()),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  DEFAULT_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),
  ORCHESTRATOR_MODEL: z.string().trim().min(1).default(ANALYSIS_MODEL),
  PORT: z.coerce.number().int().positive().default(3000),
  ALLOWED_ORIGINS: z.string().optional(),
});

/**
 * Resolve the provider credential
 * Missing and blank are distinct, detectable conditions
 */
export function resolveCredentials(apiKey: string | undefined): CredentialState {
  if (apiKey === undefined) {
    return { resolved: false, reason: 'missing' };
  }
  if (apiKey.trim() === '') {
    return { resolved: false, reason: 'blank' };
  }
  return { resolved: true, apiKey: apiKey.trim() };
}

function parseOrigins(value: string | undefined): string[] {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_ORIGINS;
  }
  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

/**
 * Build the application configuration from environment variables
 *
 * Throws if a variable is present but malformed (e.g. PORT=abc); a missing
 * API key is not an error here and is reported through `credentials`.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const vars = parsed.data;

  const config: AppConfig = {
    credentials: resolveCredentials(vars.OPENAI_API_KEY),
    models: {
      default: vars.DEFAULT_MODEL,
      analysis: vars.ORCHESTRATOR_MODEL,
    },
    timeout: vars.OPENAI_TIMEOUT_MS,
    port: vars.PORT,
    allowedOrigins: parseOrigins(vars.ALLOWED_ORIGINS),
  };
  if (vars.OPENAI_BASE_URL !== undefined) {
    config.baseURL = vars.OPENAI_BASE_URL;
  }
  return config;
}

/**
 * Human-readable API status, as shown in the status endpoint
 */
export function describeApiStatus(credentials: CredentialState): {
  configured: boolean;
  status: 'Connected' | 'Not Configured';
} {
  return credentials.resolved
    ? { configured: true, status: 'Connected' }
    : { configured: false, status: 'Not Configured' };
}

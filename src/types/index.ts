/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { ErrorCode, Result, Success, Failure } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type {
  LLMMessage,
  LLMRequest,
  LLMResponse,
  LLMClient,
  PromptRequest,
  ChatRequest,
  Gateway,
  GatewayErrorCode,
  GatewayResult,
} from './gateway.js';
export type { ConversationRole, ConversationTurn } from './conversation.js';
export { conversationTurnSchema, filterHistory } from './conversation.js';
export type {
  AgentId,
  AgentRole,
  ModelTier,
  AgentInfoEntry,
  TaskKey,
  TaskTemplate,
  CompanyProfileRecord,
  PiiScreeningRecord,
  LeadQualificationRecord,
  OutreachEmailRecord,
  DiscoveryQuestionsRecord,
  RoiAnalysisRecord,
  ProjectPlanRecord,
} from './agent.js';
export { AGENT_IDS, TASK_KEYS } from './agent.js';
export type {
  ActivityStatus,
  ActivityEvent,
  ActivityEntry,
  ActivityRecorder,
} from './activity.js';
export type { CredentialState, ModelConfig, AppConfig } from './config.js';

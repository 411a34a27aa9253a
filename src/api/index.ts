/**
 * API Layer Exports
 *
 * API layer is thin - validates input and delegates to agents and services.
 */

export { createApp } from './app.js';
export type { AppOptions } from './app.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
export type { SuccessResponse, ErrorResponse, ErrorStatus } from './types.js';

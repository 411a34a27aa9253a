/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export {
  loadConfig,
  resolveCredentials,
  describeApiStatus,
  DEFAULT_MODEL,
  ANALYSIS_MODEL,
} from './config.js';

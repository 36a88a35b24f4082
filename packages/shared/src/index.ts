/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, serializeError, type LogContext, type LogLevel } from './logger';

// Config
export { config, parseDelayList, DEFAULT_RETRY_DELAYS_MS, type Config } from './config';

// Types
export * from './types';

// Errors
export * from './errors';

// Metrics
export {
  register,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  documentsParsedCounter,
  fallbackCounter,
  extractionDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateJobRecord,
  validatePatternTable,
  validateParseResponse,
  type ValidationResult,
} from './schemas';

// Templates
export { JOB_NOTICE_TEMPLATE, renderUserPrompt, type ExtractionTemplate } from './templates';

// Extraction
export * from './extractors';

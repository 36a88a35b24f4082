/**
 * Prometheus Metrics
 *
 * Metrics for model calls, extraction tiers and the HTTP boundary.
 */

import * as promClient from 'prom-client';
import { config } from './config';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
if (config.collectDefaultMetrics) {
  try {
    promClient.collectDefaultMetrics({ register });
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

// ============================================================================
// LLM Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'jobnotice_llm_requests_total',
  help: 'Total number of LLM requests by outcome',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'jobnotice_llm_request_duration_seconds',
  help: 'Duration of LLM requests in seconds',
  labelNames: ['model'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

// ============================================================================
// Extraction Metrics
// ============================================================================

export const documentsParsedCounter = new promClient.Counter({
  name: 'jobnotice_documents_parsed_total',
  help: 'Total number of documents parsed, by the tier that produced the record',
  labelNames: ['method', 'status'],
  registers: [register],
});

export const fallbackCounter = new promClient.Counter({
  name: 'jobnotice_fallbacks_total',
  help: 'Total number of parses that fell back to the regex tier',
  labelNames: ['reason'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'jobnotice_extraction_duration_seconds',
  help: 'Duration of a parse call in seconds, including retries',
  labelNames: ['method'],
  buckets: [0.01, 0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

// ============================================================================
// HTTP Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'jobnotice_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'jobnotice_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for metrics endpoint
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

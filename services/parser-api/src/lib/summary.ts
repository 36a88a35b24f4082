/**
 * Extraction Summary
 *
 * Derived from the JobRecord for the response envelope.
 */

import { JOB_FIELDS, NOT_SPECIFIED, type ExtractionSummary, type ParseOutcome } from '@jobnotice/shared';

export function buildExtractionSummary(outcome: ParseOutcome, processingTimeMs: number): ExtractionSummary {
  const fieldsMissing = JOB_FIELDS.filter((field) => outcome.record[field] === NOT_SPECIFIED);
  const fieldsExtracted = JOB_FIELDS.length - fieldsMissing.length;

  return {
    method: outcome.method,
    attempts: outcome.attempts,
    fallback_reason: outcome.fallbackReason ?? null,
    fields_extracted: fieldsExtracted,
    fields_missing: fieldsMissing,
    total_fields: JOB_FIELDS.length,
    completeness: Math.round((fieldsExtracted / JOB_FIELDS.length) * 100) / 100,
    processing_time_ms: Math.max(0, Math.round(processingTimeMs)),
  };
}

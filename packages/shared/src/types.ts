/**
 * Shared TypeScript Types
 *
 * Types for the job notice extraction pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Job Record
// ============================================================================

/** The seven schema fields, in the order they are reported. */
export const JOB_FIELDS = [
  'job_title',
  'department',
  'vacancies',
  'eligibility',
  'salary',
  'application_deadline',
  'application_url',
] as const;

export type JobField = (typeof JOB_FIELDS)[number];

/** Marks a field for which no information could be extracted. */
export const NOT_SPECIFIED = 'Not specified';

/** Length of the source-text snippet carried in every record. */
export const RAW_TEXT_SNIPPET_CHARS = 1000;

export type JobFields = Record<JobField, string>;

/**
 * Canonical output of both extraction tiers.
 * Every field is a non-empty string; missing data is NOT_SPECIFIED.
 */
export interface JobRecord extends JobFields {
  raw_text: string;
}

export function isJobField(key: string): key is JobField {
  return JOB_FIELDS.some((field) => field === key);
}

/**
 * First `maxChars` UTF-16 units of `text`, one fewer when the cut would split a surrogate pair
 */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;

  const last = text.charCodeAt(maxChars - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? maxChars - 1 : maxChars;
  return text.slice(0, Math.max(0, end));
}

/**
 * Build an immutable JobRecord. Fields absent from `fields` become NOT_SPECIFIED.
 */
export function createJobRecord(fields: Partial<JobFields>, sourceText: string): Readonly<JobRecord> {
  const pick = (field: JobField): string => {
    const value = fields[field];
    return value !== undefined && value.trim() !== '' ? value : NOT_SPECIFIED;
  };

  return Object.freeze({
    job_title: pick('job_title'),
    department: pick('department'),
    vacancies: pick('vacancies'),
    eligibility: pick('eligibility'),
    salary: pick('salary'),
    application_deadline: pick('application_deadline'),
    application_url: pick('application_url'),
    raw_text: truncateText(sourceText, RAW_TEXT_SNIPPET_CHARS),
  });
}

// ============================================================================
// Extraction Outcome
// ============================================================================

export type ExtractionMethod = 'llm' | 'regex';

export type FallbackReason =
  | 'model_unavailable'
  | 'safety_blocked'
  | 'retries_exhausted'
  | 'cancelled';

/**
 * Result of one parse call: the record plus how it was obtained.
 */
export interface ParseOutcome {
  record: Readonly<JobRecord>;
  method: ExtractionMethod;
  /** Number of model calls made (0 when the model was never tried) */
  attempts: number;
  fallbackReason?: FallbackReason;
  model?: string;
  requestId?: string;
  durationMs: number;
}

// ============================================================================
// API Types
// ============================================================================

export interface ExtractionSummary {
  method: ExtractionMethod | null;
  attempts: number;
  fallback_reason: FallbackReason | null;
  fields_extracted: number;
  fields_missing: JobField[];
  total_fields: number;
  completeness: number;
  processing_time_ms: number;
}

export interface ParseResponse {
  success: boolean;
  data: JobRecord | null;
  error: string | null;
  extraction_summary: ExtractionSummary | null;
}

export interface HealthResponse {
  status: 'healthy';
  service: string;
  model_configured: boolean;
  timestamp: string;
}

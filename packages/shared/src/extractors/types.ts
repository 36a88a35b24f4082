/**
 * Document Extractor Types
 *
 * Both extraction tiers implement DocumentExtractor over the same input
 * (the document's text) and produce the same JobRecord shape.
 */

import type { ExtractionMethod, JobRecord } from '../types';

/**
 * - 'llm': generative structured extraction, may fail
 * - 'regex': pattern table fallback, never fails on text input
 */
export type ExtractionStrategy = ExtractionMethod;

/**
 * Context passed to extractors during extraction
 */
export interface ExtractionContext {
  /** Cancels in-flight work (model request, backoff wait) */
  signal?: AbortSignal;
}

/**
 * Result returned by an extractor
 */
export interface ExtractorResult {
  record: Readonly<JobRecord>;
  /** How extraction was performed */
  extractionMethod: ExtractionStrategy;
  metadata: ExtractorMetadata;
}

/**
 * Metadata about an extraction operation
 */
export interface ExtractorMetadata {
  /** LLM model used (if any) */
  model?: string;
  /** LLM request ID (if any) */
  requestId?: string;
  /** Characters of document text sent to the model (if any) */
  promptChars?: number;
  /** Duration of extraction in milliseconds */
  durationMs?: number;
}

/**
 * Interface for the extraction tiers.
 */
export interface DocumentExtractor {
  /** Extraction strategy used by this extractor */
  readonly strategy: ExtractionStrategy;

  /** Human-readable description of what this extractor does */
  readonly description: string;

  /**
   * Extract a JobRecord from the full document text.
   */
  extract(text: string, ctx?: ExtractionContext): Promise<ExtractorResult>;
}

/**
 * Converts a binary document into one text blob, pages in order.
 * Fails with ExtractionError when the document cannot be read.
 */
export interface TextExtractor {
  extractText(data: Uint8Array): Promise<string>;
}

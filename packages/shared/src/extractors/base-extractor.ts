/**
 * Base Document Extractor
 *
 * Wraps every tier's extraction with timing and structured logging.
 */

import type { JobRecord } from '../types';
import { JOB_FIELDS, NOT_SPECIFIED } from '../types';
import type { DocumentExtractor, ExtractionContext, ExtractionStrategy, ExtractorResult } from './types';
import { logger } from '../logger';

/**
 * Count the schema fields holding real content
 */
export function countExtractedFields(record: JobRecord): number {
  return JOB_FIELDS.filter((field) => record[field] !== NOT_SPECIFIED).length;
}

export abstract class BaseExtractor implements DocumentExtractor {
  abstract readonly strategy: ExtractionStrategy;
  abstract readonly description: string;

  /**
   * Strategy-specific extraction. Errors propagate to extract().
   */
  protected abstract extractImpl(text: string, ctx: ExtractionContext): Promise<ExtractorResult>;

  async extract(text: string, ctx: ExtractionContext = {}): Promise<ExtractorResult> {
    const startTime = Date.now();

    logger.debug('Starting extraction', {
      strategy: this.strategy,
      text_length: text.length,
    });

    try {
      const result = await this.extractImpl(text, ctx);
      const durationMs = Date.now() - startTime;
      result.metadata.durationMs = durationMs;

      logger.info('Extraction complete', {
        strategy: this.strategy,
        extraction_method: result.extractionMethod,
        fields_extracted: countExtractedFields(result.record),
        model: result.metadata.model,
        duration_ms: durationMs,
      });

      return result;
    } catch (error) {
      logger.warn('Extraction failed', {
        strategy: this.strategy,
        duration_ms: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}

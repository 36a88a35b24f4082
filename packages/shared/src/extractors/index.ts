/**
 * Document Extractors
 *
 * Two tiers behind one interface, and the orchestrator that picks between them.
 */

import { createModelTransportFromConfig, LlmExtractor } from './llm-extraction';
import { JobNoticeParser } from './orchestrator';
import { RegexExtractor } from './regex-extraction';
import { config } from '../config';

// Types
export type {
  DocumentExtractor,
  ExtractionStrategy,
  ExtractionContext,
  ExtractorResult,
  ExtractorMetadata,
  TextExtractor,
} from './types';

// Base class
export { BaseExtractor, countExtractedFields } from './base-extractor';

// Field Matcher
export {
  matchField,
  compileFieldPattern,
  collapseWhitespace,
  FIELD_PATTERN_FLAGS,
  type FieldPattern,
  type FieldPatternSpec,
} from './field-matcher';

// Pattern table
export {
  compilePatternTable,
  loadPatternTable,
  getDefaultPatternTable,
  DEFAULT_PATTERN_FILE,
  type PatternTable,
  type PatternTableSpec,
} from './patterns';

// Regex tier
export { RegexExtractor, extractFallback, normalizeWhitespace } from './regex-extraction';

// Generative tier
export {
  LlmExtractor,
  OpenAiTransport,
  createModelTransportFromConfig,
  extractViaModel,
  requestModelExtraction,
  sanitizeModelPayload,
  parseModelContent,
  truncateForPrompt,
  type ModelTransport,
  type ModelRequest,
  type ModelReply,
  type OpenAiTransportOptions,
  type LlmExtractionOptions,
  type LlmExtractionResponse,
  type LlmExtractorOptions,
} from './llm-extraction';

// Orchestrator
export {
  JobNoticeParser,
  defaultSleep,
  type SleepFn,
  type ModelAttemptOutcome,
  type JobNoticeParserOptions,
  type ParseOptions,
} from './orchestrator';

/**
 * Build a parser wired from process configuration
 */
export function createJobNoticeParser(): JobNoticeParser {
  return new JobNoticeParser({
    llm: new LlmExtractor(createModelTransportFromConfig(), { promptMaxChars: config.promptMaxChars }),
    regex: new RegexExtractor(),
    retryDelaysMs: config.llmRetryDelaysMs,
  });
}

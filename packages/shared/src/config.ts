/**
 * Centralized Configuration
 *
 * Read once from the environment at process start. A missing OPENAI_API_KEY is
 * a valid state: the parser then goes straight to the regex tier.
 */

export interface Config {
  // Service
  projectName: string;
  port: number;
  debug: boolean;

  // Upload boundary
  maxUploadBytes: number;
  requestTimeoutMs: number;

  // LLM
  openaiApiKey: string;
  openaiBaseUrl: string | undefined;
  llmModel: string;
  llmRequestTimeoutMs: number;
  llmRetryDelaysMs: number[];
  promptMaxChars: number;

  // Extraction
  patternTablePath: string | undefined;

  // Metrics
  collectDefaultMetrics: boolean;
}

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

/**
 * Parse a comma-separated list of delays, e.g. "1000,2000,4000".
 * Invalid entries are dropped; an empty result means the default schedule.
 */
export function parseDelayList(value: string | undefined, fallback: number[]): number[] {
  if (!value) return fallback;

  const delays = value
    .split(',')
    .map((part) => parseInt(part.trim(), 10))
    .filter((delay) => Number.isFinite(delay) && delay >= 0);

  return delays.length > 0 ? delays : fallback;
}

export const DEFAULT_RETRY_DELAYS_MS = [1000, 2000, 4000, 8000, 16000];

export const config: Config = {
  // Service
  projectName: process.env.PROJECT_NAME || 'PDF Job Parser',
  port: parseInteger(process.env.PORT, 8080),
  debug: process.env.DEBUG === 'true',

  // Upload boundary
  maxUploadBytes: parseInteger(process.env.MAX_UPLOAD_BYTES, 10 * 1024 * 1024),
  requestTimeoutMs: parseInteger(process.env.REQUEST_TIMEOUT_MS, 300000),

  // LLM
  openaiApiKey: process.env.OPENAI_API_KEY || '',
  openaiBaseUrl: process.env.OPENAI_BASE_URL || undefined,
  llmModel: process.env.LLM_MODEL || 'gpt-4o-mini',
  llmRequestTimeoutMs: parseInteger(process.env.LLM_REQUEST_TIMEOUT_MS, 60000),
  llmRetryDelaysMs: parseDelayList(process.env.LLM_RETRY_DELAYS_MS, DEFAULT_RETRY_DELAYS_MS),
  promptMaxChars: parseInteger(process.env.PROMPT_MAX_CHARS, 30000),

  // Extraction
  patternTablePath: process.env.PATTERN_TABLE_PATH || undefined,

  // Metrics
  collectDefaultMetrics:
    process.env.COLLECT_DEFAULT_METRICS !== undefined
      ? process.env.COLLECT_DEFAULT_METRICS === 'true'
      : process.env.NODE_ENV !== 'test',
};

/**
 * Parser API
 *
 * POST /api/v1/parse-pdf - Extracts job posting fields from an uploaded PDF
 * GET  /health           - Liveness and model configuration
 * GET  /metrics          - Prometheus metrics
 */

import express, { Request, Response, NextFunction, type Express } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  runWithContextAsync,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  documentsParsedCounter,
  ExtractionError,
  type HealthResponse,
  type JobNoticeParser,
  type ParseResponse,
  type TextExtractor,
} from '@jobnotice/shared';
import { readSingleFileUpload, UploadError } from './lib/upload';
import { buildExtractionSummary } from './lib/summary';

export interface AppDependencies {
  parser: JobNoticeParser;
  textExtractor: TextExtractor;
  maxUploadBytes?: number;
  requestTimeoutMs?: number;
}

function failure(error: string): ParseResponse {
  return { success: false, data: null, error, extraction_summary: null };
}

export function createApp(deps: AppDependencies): Express {
  const { parser, textExtractor } = deps;
  const maxUploadBytes = deps.maxUploadBytes ?? config.maxUploadBytes;
  const requestTimeoutMs = deps.requestTimeoutMs ?? config.requestTimeoutMs;

  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    const body: HealthResponse = {
      status: 'healthy',
      service: config.projectName,
      model_configured: parser.modelConfigured,
      timestamp: new Date().toISOString(),
    };
    res.json(body);
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    try {
      const metrics = await getMetrics();
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(metrics);
    } catch (error) {
      logger.error('Failed to collect metrics', error);
      res.status(500).send('Failed to collect metrics');
    }
  });

  /**
   * POST /api/v1/parse-pdf
   * Multipart upload with a single `file` part
   */
  app.post('/api/v1/parse-pdf', async (req: Request, res: Response) => {
    const startTime = Date.now();

    // Aborts pending model calls and backoff waits; the regex tier still answers
    const controller = new AbortController();
    const timer = setTimeout(() => {
      logger.warn('Request timeout reached, cancelling model extraction', { timeout_ms: requestTimeoutMs });
      controller.abort();
    }, requestTimeoutMs);
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const file = await readSingleFileUpload(req, { maxBytes: maxUploadBytes });

      const body = await runWithContextAsync(
        { documentId: ulid(), sourceFilename: file.filename },
        async (): Promise<ParseResponse> => {
          logger.info('Parsing uploaded PDF', { size_bytes: file.data.length });

          const text = await textExtractor.extractText(file.data);
          const outcome = await parser.parse(text, { signal: controller.signal });

          return {
            success: true,
            data: { ...outcome.record },
            error: null,
            extraction_summary: buildExtractionSummary(outcome, Date.now() - startTime),
          };
        }
      );

      res.json(body);
    } catch (error) {
      if (error instanceof UploadError) {
        logger.warn('Upload rejected', { status: error.status, reason: error.message });
        res.status(error.status).json(failure(error.message));
        return;
      }

      if (error instanceof ExtractionError) {
        documentsParsedCounter.inc({ method: 'none', status: 'extraction_failed' });
        logger.warn('PDF text extraction failed', { reason: error.message });
        res.status(422).json(failure(error.message));
        return;
      }

      logger.error('Parse request failed', error);
      res.status(500).json(failure('Internal server error'));
    } finally {
      clearTimeout(timer);
    }
  });

  return app;
}

/**
 * Parser API tests
 *
 * Runs the express app in process on an ephemeral port. The PDF reader and
 * the model are in-process fakes.
 */

import type { Server } from 'http';
import type { Express } from 'express';
import {
  ExtractionError,
  JobNoticeParser,
  LlmExtractor,
  TransportError,
  config,
  extractFallback,
  validateParseResponse,
  type ModelTransport,
  type ParseResponse,
  type TextExtractor,
} from '@jobnotice/shared';
import { createApp } from '../../services/parser-api/src/app';
import { ScriptedTransport, contentReply, loadFixture } from './helpers';

class FakeTextExtractor implements TextExtractor {
  readonly received: Uint8Array[] = [];

  constructor(private readonly result: string | Error) {}

  async extractText(data: Uint8Array): Promise<string> {
    this.received.push(data);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

interface RunningServer {
  url: string;
  close(): Promise<void>;
}

function startServer(app: Express): Promise<RunningServer> {
  return new Promise((resolve) => {
    const server: Server = app.listen(0, () => {
      const address = server.address();
      const port = address && typeof address === 'object' ? address.port : 0;
      resolve({
        url: `http://127.0.0.1:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
  });
}

function pdfForm(content: string = '%PDF-1.4 test', filename = 'notice.pdf', type = 'application/pdf'): FormData {
  const form = new FormData();
  form.append('file', new Blob([content], { type }), filename);
  return form;
}

function isParseResponse(value: unknown): value is ParseResponse {
  return validateParseResponse(value).valid;
}

async function readEnvelope(response: Response): Promise<ParseResponse> {
  const body: unknown = await response.json();
  if (!isParseResponse(body)) {
    throw new Error(`Response does not match the envelope schema: ${JSON.stringify(body)}`);
  }
  return body;
}

function regexOnlyParser(): JobNoticeParser {
  return new JobNoticeParser({ llm: new LlmExtractor(null) });
}

describe('Parser API', () => {
  const noticeText = loadFixture();
  let textExtractor: FakeTextExtractor;
  let server: RunningServer;

  beforeAll(async () => {
    textExtractor = new FakeTextExtractor(noticeText);
    server = await startServer(createApp({ parser: regexOnlyParser(), textExtractor }));
  });

  afterAll(async () => {
    await server.close();
  });

  describe('POST /api/v1/parse-pdf', () => {
    it('should parse an uploaded PDF with the regex tier when no model is configured', async () => {
      const response = await fetch(`${server.url}/api/v1/parse-pdf`, { method: 'POST', body: pdfForm() });

      expect(response.status).toBe(200);
      const body = await readEnvelope(response);

      expect(body.success).toBe(true);
      expect(body.error).toBeNull();
      expect(body.data).toEqual({ ...extractFallback(noticeText) });
      expect(body.extraction_summary).toMatchObject({
        method: 'regex',
        attempts: 0,
        fallback_reason: 'model_unavailable',
        fields_extracted: 7,
        fields_missing: [],
        total_fields: 7,
        completeness: 1,
      });
    });

    it('should hand the uploaded bytes to the text extractor', async () => {
      const before = textExtractor.received.length;

      await fetch(`${server.url}/api/v1/parse-pdf`, { method: 'POST', body: pdfForm('%PDF-1.7 bytes') });

      expect(textExtractor.received).toHaveLength(before + 1);
      expect(Buffer.from(textExtractor.received[before]).toString('utf-8')).toBe('%PDF-1.7 bytes');
    });

    it('should accept a .pdf file sent as octet-stream', async () => {
      const response = await fetch(`${server.url}/api/v1/parse-pdf`, {
        method: 'POST',
        body: pdfForm('%PDF-1.4', 'scan.PDF', 'application/octet-stream'),
      });

      expect(response.status).toBe(200);
    });

    it('should echo the correlation ID', async () => {
      const response = await fetch(`${server.url}/api/v1/parse-pdf`, {
        method: 'POST',
        headers: { 'X-Correlation-Id': 'corr-test-1' },
        body: pdfForm(),
      });

      expect(response.headers.get('x-correlation-id')).toBe('corr-test-1');
    });

    it('should reject a non-PDF upload with 415', async () => {
      const response = await fetch(`${server.url}/api/v1/parse-pdf`, {
        method: 'POST',
        body: pdfForm('plain words', 'notes.txt', 'text/plain'),
      });

      expect(response.status).toBe(415);
      const body = await readEnvelope(response);
      expect(body.success).toBe(false);
      expect(body.data).toBeNull();
      expect(body.extraction_summary).toBeNull();
      expect(body.error).toMatch(/^Unsupported file type: text\/plain/);
    });

    it('should reject a request that is not multipart with 400', async () => {
      const response = await fetch(`${server.url}/api/v1/parse-pdf`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ file: 'notice.pdf' }),
      });

      expect(response.status).toBe(400);
      expect((await readEnvelope(response)).error).toBe('Expected multipart/form-data with a PDF file');
    });

    it('should reject a form without a file part with 400', async () => {
      const form = new FormData();
      form.append('comment', 'no file here');

      const response = await fetch(`${server.url}/api/v1/parse-pdf`, { method: 'POST', body: form });

      expect(response.status).toBe(400);
      expect((await readEnvelope(response)).error).toBe('Missing required file field: file');
    });

    it('should reject an empty file with 400', async () => {
      const response = await fetch(`${server.url}/api/v1/parse-pdf`, { method: 'POST', body: pdfForm('') });

      expect(response.status).toBe(400);
      expect((await readEnvelope(response)).error).toBe('Uploaded file is empty');
    });
  });

  describe('GET /health', () => {
    it('should report the service and model configuration', async () => {
      const response = await fetch(`${server.url}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        status: 'healthy',
        service: config.projectName,
        model_configured: false,
      });
    });
  });

  describe('GET /metrics', () => {
    it('should expose the parse counters', async () => {
      const response = await fetch(`${server.url}/metrics`);

      expect(response.status).toBe(200);
      expect(await response.text()).toContain('# HELP jobnotice_documents_parsed_total');
    });
  });
});

describe('Parser API failure modes', () => {
  let server: RunningServer | null = null;

  afterEach(async () => {
    if (server) await server.close();
    server = null;
  });

  it('should reject a file over the upload limit with 413', async () => {
    server = await startServer(
      createApp({ parser: regexOnlyParser(), textExtractor: new FakeTextExtractor('text'), maxUploadBytes: 16 })
    );

    const response = await fetch(`${server.url}/api/v1/parse-pdf`, {
      method: 'POST',
      body: pdfForm('%PDF-1.4 ' + 'a'.repeat(64)),
    });

    expect(response.status).toBe(413);
    expect((await readEnvelope(response)).error).toBe('File exceeds the maximum size of 16 bytes');
  });

  it('should answer 422 when the PDF cannot be read', async () => {
    const textExtractor = new FakeTextExtractor(new ExtractionError('Could not extract text from PDF: Invalid PDF structure'));
    server = await startServer(createApp({ parser: regexOnlyParser(), textExtractor }));

    const response = await fetch(`${server.url}/api/v1/parse-pdf`, { method: 'POST', body: pdfForm() });

    expect(response.status).toBe(422);
    const body = await readEnvelope(response);
    expect(body.success).toBe(false);
    expect(body.error).toBe('Could not extract text from PDF: Invalid PDF structure');
  });

  it('should answer 500 with a generic message for unexpected errors', async () => {
    server = await startServer(
      createApp({ parser: regexOnlyParser(), textExtractor: new FakeTextExtractor(new Error('disk on fire')) })
    );

    const response = await fetch(`${server.url}/api/v1/parse-pdf`, { method: 'POST', body: pdfForm() });

    expect(response.status).toBe(500);
    expect((await readEnvelope(response)).error).toBe('Internal server error');
  });

  it('should report the model tier when the model answers', async () => {
    const transport = new ScriptedTransport([
      contentReply({ job_title: 'Assistant Loco Pilot', vacancies: 5696 }, 'req_api'),
    ]);
    const parser = new JobNoticeParser({ llm: new LlmExtractor(transport), retryDelaysMs: [10] });
    server = await startServer(createApp({ parser, textExtractor: new FakeTextExtractor('notice text') }));

    const response = await fetch(`${server.url}/api/v1/parse-pdf`, { method: 'POST', body: pdfForm() });
    const body = await readEnvelope(response);

    expect(response.status).toBe(200);
    expect(body.data?.job_title).toBe('Assistant Loco Pilot');
    expect(body.data?.vacancies).toBe('5696');
    expect(body.data?.raw_text).toBe('notice text');
    expect(body.extraction_summary).toMatchObject({
      method: 'llm',
      attempts: 1,
      fallback_reason: null,
      fields_extracted: 2,
    });
  });

  it('should cancel a slow model call at the request timeout and still answer from the regex tier', async () => {
    const hanging: ModelTransport = {
      model: 'fake-model',
      complete: (request) =>
        new Promise((_resolve, reject) => {
          request.signal?.addEventListener('abort', () => reject(new TransportError('Request was aborted')));
        }),
    };
    const parser = new JobNoticeParser({ llm: new LlmExtractor(hanging), retryDelaysMs: [1000, 2000] });
    server = await startServer(
      createApp({ parser, textExtractor: new FakeTextExtractor('Total Vacancies: 7'), requestTimeoutMs: 50 })
    );

    const response = await fetch(`${server.url}/api/v1/parse-pdf`, { method: 'POST', body: pdfForm() });
    const body = await readEnvelope(response);

    expect(response.status).toBe(200);
    expect(body.data?.vacancies).toBe('7');
    expect(body.extraction_summary).toMatchObject({
      method: 'regex',
      attempts: 1,
      fallback_reason: 'cancelled',
    });
  });
});

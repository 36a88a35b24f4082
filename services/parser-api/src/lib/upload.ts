/**
 * Single-File Multipart Upload
 *
 * Streams one `file` part out of a multipart/form-data request with busboy,
 * enforcing the size limit and a PDF content-type check while reading.
 */

import busboy from 'busboy';
import type { Request } from 'express';

export interface UploadedFile {
  filename: string;
  mimeType: string;
  data: Buffer;
}

/** An upload rejected before extraction; `status` is the HTTP status to answer with */
export class UploadError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = 'UploadError';
  }
}

export interface UploadOptions {
  maxBytes: number;
  fieldName?: string;
}

const PDF_MIME_TYPES = new Set(['application/pdf', 'application/x-pdf']);

/**
 * PDF by declared type, or a generic binary type with a .pdf filename
 */
export function isPdfUpload(filename: string, mimeType: string): boolean {
  const type = mimeType.toLowerCase();
  if (PDF_MIME_TYPES.has(type)) return true;
  return type === 'application/octet-stream' && filename.toLowerCase().endsWith('.pdf');
}

export function readSingleFileUpload(req: Request, options: UploadOptions): Promise<UploadedFile> {
  const fieldName = options.fieldName ?? 'file';
  const contentType = req.headers['content-type'] || '';

  if (!contentType.toLowerCase().startsWith('multipart/form-data')) {
    return Promise.reject(new UploadError('Expected multipart/form-data with a PDF file', 400));
  }

  return new Promise<UploadedFile>((resolve, reject) => {
    let settled = false;
    let upload: UploadedFile | null = null;

    const bb = busboy({
      headers: req.headers,
      limits: { fileSize: options.maxBytes, files: 1 },
    });

    const fail = (error: UploadError) => {
      if (settled) return;
      settled = true;
      req.unpipe(bb);
      req.resume();
      reject(error);
    };

    bb.on('file', (name, stream, info) => {
      if (name !== fieldName) {
        stream.resume();
        return;
      }

      const filename = info.filename || 'upload.pdf';
      if (!isPdfUpload(filename, info.mimeType)) {
        stream.resume();
        fail(new UploadError(`Unsupported file type: ${info.mimeType}. Only PDF files are accepted`, 415));
        return;
      }

      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('limit', () => {
        fail(new UploadError(`File exceeds the maximum size of ${options.maxBytes} bytes`, 413));
      });
      stream.on('end', () => {
        if (!stream.truncated) {
          upload = { filename, mimeType: info.mimeType, data: Buffer.concat(chunks) };
        }
      });
    });

    bb.on('error', (error: unknown) => {
      fail(new UploadError(`Malformed multipart body: ${error instanceof Error ? error.message : String(error)}`, 400));
    });

    bb.on('close', () => {
      if (settled) return;
      if (!upload) {
        fail(new UploadError(`Missing required file field: ${fieldName}`, 400));
        return;
      }
      if (upload.data.length === 0) {
        fail(new UploadError('Uploaded file is empty', 400));
        return;
      }
      settled = true;
      resolve(upload);
    });

    req.pipe(bb);
  });
}

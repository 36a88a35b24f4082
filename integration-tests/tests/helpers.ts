/**
 * Test Helpers
 *
 * Fixtures and in-process stand-ins for the model and the PDF reader.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  TransportError,
  type ModelReply,
  type ModelRequest,
  type ModelTransport,
  type SleepFn,
} from '@jobnotice/shared';

export const NOTICE_FIXTURE = 'rrb-assistant-loco-pilot.txt';

/**
 * Read a text fixture from integration-tests/fixtures
 */
export function loadFixture(name: string = NOTICE_FIXTURE): string {
  return fs.readFileSync(path.join(__dirname, '../fixtures', name), 'utf-8');
}

/** Build a content reply the way the OpenAI transport would */
export function contentReply(content: string | object, requestId: string = 'req_test_1'): ModelReply {
  return {
    kind: 'content',
    content: typeof content === 'string' ? content : JSON.stringify(content),
    model: 'fake-model',
    requestId,
  };
}

export function blockedReply(reason: string = 'content_filter'): ModelReply {
  return { kind: 'blocked', reason, model: 'fake-model', requestId: 'req_blocked' };
}

/**
 * ModelTransport that replays a script of replies and errors, recording every request.
 * Runs out of script with a TransportError.
 */
export class ScriptedTransport implements ModelTransport {
  readonly model = 'fake-model';
  readonly requests: ModelRequest[] = [];
  private readonly script: Array<ModelReply | Error>;

  constructor(script: Array<ModelReply | Error>) {
    this.script = [...script];
  }

  async complete(request: ModelRequest): Promise<ModelReply> {
    this.requests.push(request);
    const next = this.script.shift();
    if (!next) throw new TransportError('Scripted transport has no more replies', 503);
    if (next instanceof Error) throw next;
    return next;
  }
}

/**
 * ModelTransport that always fails with a transient error
 */
export class FailingTransport implements ModelTransport {
  readonly model = 'fake-model';
  readonly requests: ModelRequest[] = [];

  async complete(request: ModelRequest): Promise<ModelReply> {
    this.requests.push(request);
    throw new TransportError('Service unavailable', 503);
  }
}

/**
 * Sleep that resolves immediately and records the requested delays
 */
export function recordingSleep(): { sleep: SleepFn; delays: number[] } {
  const delays: number[] = [];
  const sleep: SleepFn = async (ms) => {
    delays.push(ms);
  };
  return { sleep, delays };
}

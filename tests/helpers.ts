// ---------------------------------------------------------------------------
// Mail2SMS — Test Helpers
// ---------------------------------------------------------------------------
// Shared utilities for unit and integration tests.
// ---------------------------------------------------------------------------

import { ILogger } from '../src/core/types/module';
import { MailTransaction } from '../src/core/types/mail';
import { FetchFn } from '../src/modules/gateway.sms/client';
import {
  ISmsApiClient,
  SessionCredential,
  SmsRequest,
  SmsResult,
  SmsStatus,
} from '../src/modules/gateway.sms/types';
import { AuthError } from '../src/shared/errors';

/** A silent logger that swallows all output. */
export function createSilentLogger(): ILogger {
  const noop = () => {};
  const logger: ILogger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}

export interface CapturedEntry {
  level: string;
  message: string;
  context?: Record<string, unknown>;
}

/** A logger that records all calls for assertions. */
export function createCapturingLogger(): ILogger & { entries: CapturedEntry[] } {
  const entries: CapturedEntry[] = [];
  const logger = {
    entries,
    debug(msg: string, ctx?: Record<string, unknown>) { entries.push({ level: 'debug', message: msg, context: ctx }); },
    info(msg: string, ctx?: Record<string, unknown>) { entries.push({ level: 'info', message: msg, context: ctx }); },
    warn(msg: string, ctx?: Record<string, unknown>) { entries.push({ level: 'warn', message: msg, context: ctx }); },
    error(msg: string, _err?: Error, ctx?: Record<string, unknown>) { entries.push({ level: 'error', message: msg, context: ctx }); },
    child() { return logger; },
  };
  return logger;
}

/** Sleep helper for async tests. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ── Mail ───────────────────────────────────────────────────────────────────

export interface RawMailOptions {
  from?: string;
  to?: string;
  subject?: string;
  contentType?: string;
  /** Extra header lines, e.g. `Content-Transfer-Encoding: base64`. */
  headers?: string[];
  body: string;
}

/** Build an RFC 5322 message with CRLF line endings. */
export function buildRawMail(options: RawMailOptions): Buffer {
  const lines = [
    `From: ${options.from ?? 'alerts@example.com'}`,
    `To: ${options.to ?? '15551234567@gateway.local'}`,
    `Subject: ${options.subject ?? 'Test'}`,
    'MIME-Version: 1.0',
    `Content-Type: ${options.contentType ?? 'text/plain; charset=utf-8'}`,
    ...(options.headers ?? []),
    '',
    options.body,
  ];
  return Buffer.from(lines.join('\r\n'), 'utf-8');
}

export function createTransaction(overrides: Partial<MailTransaction> = {}): MailTransaction {
  return {
    id: 'session-1',
    sender: 'alerts@example.com',
    recipients: ['15551234567@gateway.local'],
    raw: buildRawMail({ body: 'Your code is 4821' }),
    receivedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

// ── SMS provider stand-ins ─────────────────────────────────────────────────

export const TEST_CREDENTIAL: SessionCredential = {
  userKey: 'user-1',
  sessionKey: 'session-a',
  acquiredAt: new Date('2026-01-01T00:00:00Z'),
};

/**
 * In-process `ISmsApiClient`. Logins hand out `session-a`, `session-b`, …
 * unless `loginError` is set; sends return queued results, then `Sent`.
 */
export class StubSmsClient implements ISmsApiClient {
  readonly logins: Array<{ username: string; password: string }> = [];
  readonly sends: Array<{ credential: SessionCredential; request: SmsRequest; signal?: AbortSignal }> = [];
  loginError: Error | null = null;
  /** Resolves pending logins when set; lets tests hold a login open. */
  loginGate: Promise<void> | null = null;
  private readonly results: SmsResult[] = [];

  queue(...results: SmsResult[]): this {
    this.results.push(...results);
    return this;
  }

  async login(username: string, password: string): Promise<SessionCredential> {
    this.logins.push({ username, password });
    const n = this.logins.length;
    if (this.loginGate) await this.loginGate;
    if (this.loginError) throw this.loginError;
    return {
      userKey: 'user-1',
      sessionKey: `session-${String.fromCharCode(96 + n)}`,
      acquiredAt: new Date('2026-01-01T00:00:00Z'),
    };
  }

  async sendSms(credential: SessionCredential, request: SmsRequest, signal?: AbortSignal): Promise<SmsResult> {
    this.sends.push({ credential, request, signal });
    return this.results.shift() ?? { status: SmsStatus.Sent, messageId: `order-${this.sends.length}` };
  }
}

export function loginRejected(status = 401): AuthError {
  return new AuthError('LoginRejected', `Login rejected with HTTP ${status}`, status);
}

// ── fetch stand-in ─────────────────────────────────────────────────────────

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
}

export type FakeRoute = (request: RecordedRequest, signal?: AbortSignal) => Response | Promise<Response>;

/**
 * A `fetch` replacement that answers by path suffix (`/login`, `/sms`)
 * and records every request.
 */
export function createFakeFetch(routes: Record<string, FakeRoute>): FetchFn & { requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fake = async (url: string, init: RequestInit): Promise<Response> => {
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const recorded: RecordedRequest = {
      url,
      method: init.method ?? 'GET',
      headers,
      body: typeof init.body === 'string' ? init.body : undefined,
    };
    requests.push(recorded);

    const pathname = new URL(url).pathname;
    const key = Object.keys(routes).find((suffix) => pathname.endsWith(suffix));
    if (!key) return new Response('not found', { status: 404 });
    return routes[key](recorded, init.signal ?? undefined);
  };
  return Object.assign(fake, { requests });
}

/** A route that never answers until its signal aborts. */
export function hangingRoute(): FakeRoute {
  return (_request, signal) =>
    new Promise<Response>((_resolve, reject) => {
      signal?.addEventListener('abort', () => {
        reject(new Error('This operation was aborted'));
      });
    });
}

// ---------------------------------------------------------------------------
// Mail2SMS — SMS API Client
// ---------------------------------------------------------------------------
// Talks to the provider's REST API:
//
//   GET  {base}/login?username=&password=   → "user_key;session_key"
//   POST {base}/sms  (user_key, Session_key headers, JSON body)
//                                           → 201 { "result": "OK", ... }
//
// Every call carries a timeout. Transport failures never escape `sendSms`;
// they come back as a ProviderError result.
// ---------------------------------------------------------------------------

import { AuthError, toError } from '../../shared/errors';
import {
  ISmsApiClient,
  MESSAGE_TYPE,
  SessionCredential,
  SmsRequest,
  SmsResult,
  SmsStatus,
} from './types';

/** The subset of `fetch` the client uses. Injected in tests. */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface SmsApiClientOptions {
  /** API root, e.g. `https://sms.example.com/API/v1.0/REST`. */
  baseUrl: string;
  timeoutMs: number;
  fetch?: FetchFn;
}

/** Wire body of `POST /sms`. */
export interface SmsWirePayload {
  message: string;
  message_type: string;
  returnCredits: boolean;
  recipient: string[];
  sender: string;
}

interface HttpResponse {
  status: number;
  body: string;
}

/** Why a request never produced a response. */
class TransportError extends Error {
  constructor(
    message: string,
    public readonly reason: 'timeout' | 'cancelled' | 'network',
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

const MAX_DETAIL_LENGTH = 200;

export class SmsApiClient implements ISmsApiClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;

  constructor(options: SmsApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  // ── Login ────────────────────────────────────────────────────────────────

  async login(username: string, password: string): Promise<SessionCredential> {
    const query = new URLSearchParams({ username, password });
    // The password is in the query string; never log `url`
    const url = `${this.baseUrl}/login?${query.toString()}`;

    let response: HttpResponse;
    try {
      response = await this.request(url, { method: 'GET' });
    } catch (err) {
      const error = toError(err);
      throw new AuthError('Unreachable', `Login request failed: ${error.message}`, undefined, error);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new AuthError(
        'LoginRejected',
        `Login rejected with HTTP ${response.status}`,
        response.status,
      );
    }

    const fields = response.body.trim().split(';');
    if (fields.length !== 2 || fields.some((f) => f.trim().length === 0)) {
      throw new AuthError(
        'MalformedResponse',
        `Login response has ${fields.length} field(s), expected "user_key;session_key"`,
        response.status,
      );
    }

    return {
      userKey: fields[0].trim(),
      sessionKey: fields[1].trim(),
      acquiredAt: new Date(),
    };
  }

  // ── Send ─────────────────────────────────────────────────────────────────

  async sendSms(
    credential: SessionCredential,
    request: SmsRequest,
    signal?: AbortSignal,
  ): Promise<SmsResult> {
    if (request.recipient.length === 0 || request.message.length === 0) {
      return { status: SmsStatus.MalformedRequest, detail: 'Recipient and message are required' };
    }

    let response: HttpResponse;
    try {
      response = await this.request(
        `${this.baseUrl}/sms`,
        {
          method: 'POST',
          headers: {
            user_key: credential.userKey,
            Session_key: credential.sessionKey,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(toWirePayload(request)),
        },
        signal,
      );
    } catch (err) {
      return { status: SmsStatus.ProviderError, detail: toError(err).message };
    }

    if (response.status === 401 || response.status === 403) {
      return {
        status: SmsStatus.AuthFailed,
        httpStatus: response.status,
        detail: clip(response.body),
      };
    }

    if (response.status !== 201) {
      return {
        status: SmsStatus.ProviderError,
        httpStatus: response.status,
        detail: `HTTP ${response.status}: ${clip(response.body)}`,
      };
    }

    return interpretSendResponse(response.body);
  }

  // ── HTTP ─────────────────────────────────────────────────────────────────

  /**
   * Issue one request and read its body, bounded by the timeout and by
   * the caller's `signal`.
   *
   * @throws TransportError
   */
  private async request(url: string, init: RequestInit, signal?: AbortSignal): Promise<HttpResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    const onCallerAbort = (): void => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      const body = await response.text();
      return { status: response.status, body };
    } catch (err) {
      if (timedOut) {
        throw new TransportError(`Request timed out after ${this.timeoutMs}ms`, 'timeout', toError(err));
      }
      if (signal?.aborted) {
        throw new TransportError('Request cancelled', 'cancelled', toError(err));
      }
      throw new TransportError(`Network error: ${toError(err).message}`, 'network', toError(err));
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

// ── Helpers ────────────────────────────────────────────────────────────────

export function toWirePayload(request: SmsRequest): SmsWirePayload {
  return {
    message: request.message,
    message_type: MESSAGE_TYPE[request.quality],
    returnCredits: request.returnCredits,
    recipient: [request.recipient],
    sender: request.sender,
  };
}

/** Map a 201 body to a result: `result: "OK"` is the only success. */
function interpretSendResponse(body: string): SmsResult {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return { status: SmsStatus.ProviderError, httpStatus: 201, detail: `Unparsable response: ${clip(body)}` };
  }

  if (data === null || typeof data !== 'object' || !('result' in data)) {
    return { status: SmsStatus.ProviderError, httpStatus: 201, detail: `Response has no "result" field: ${clip(body)}` };
  }

  if (data.result !== 'OK') {
    return { status: SmsStatus.ProviderError, httpStatus: 201, detail: String(data.result) };
  }

  const orderId = 'order_id' in data ? data.order_id : undefined;
  return typeof orderId === 'string' || typeof orderId === 'number'
    ? { status: SmsStatus.Sent, messageId: String(orderId) }
    : { status: SmsStatus.Sent };
}

function clip(text: string): string {
  return text.length > MAX_DETAIL_LENGTH ? `${text.slice(0, MAX_DETAIL_LENGTH)}…` : text;
}

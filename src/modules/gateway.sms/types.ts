// ---------------------------------------------------------------------------
// Mail2SMS — gateway.sms Types
// ---------------------------------------------------------------------------

/** Delivery quality offered by the provider. */
export type MessageQuality = 'high' | 'standard';

/** Provider wire value for each quality. */
export const MESSAGE_TYPE: Readonly<Record<MessageQuality, string>> = {
  high: 'N',
  standard: 'L',
};

/** One SMS, built once per mail transaction. */
export interface SmsRequest {
  /** Destination phone number: digits with an optional leading `+`. */
  readonly recipient: string;
  readonly message: string;
  readonly quality: MessageQuality;
  /** Display name shown as the SMS sender. */
  readonly sender: string;
  readonly returnCredits: boolean;
}

/** Provider-issued key pair authorizing SMS submission. */
export interface SessionCredential {
  readonly userKey: string;
  readonly sessionKey: string;
  readonly acquiredAt: Date;
}

export enum SmsStatus {
  Sent = 'sent',
  AuthFailed = 'auth_failed',
  ProviderError = 'provider_error',
  MalformedRequest = 'malformed_request',
}

export type SmsResult =
  | { status: SmsStatus.Sent; messageId?: string }
  | { status: SmsStatus.AuthFailed; httpStatus: number; detail?: string }
  | { status: SmsStatus.ProviderError; httpStatus?: number; detail: string }
  | { status: SmsStatus.MalformedRequest; detail: string };

/**
 * The SMS provider's HTTP API as seen by the session cache and the handler.
 */
export interface ISmsApiClient {
  /**
   * Open a provider session.
   * @throws AuthError when the provider refuses, answers garbage, or cannot be reached.
   */
  login(username: string, password: string): Promise<SessionCredential>;

  /** Submit one SMS. Never throws: every outcome is an `SmsResult`. */
  sendSms(
    credential: SessionCredential,
    request: SmsRequest,
    signal?: AbortSignal,
  ): Promise<SmsResult>;
}

/** Resolved `gateway.sms` configuration section. */
export interface SmsGatewayConfig {
  baseUrl: string;
  username: string;
  password: string;
  sender: string;
  messageQuality: MessageQuality;
  returnCredits: boolean;
  timeoutMs: number;
  sessionTtlMs: number;
  authRetries: number;
  maxMessageLength: number;
}

// ---------------------------------------------------------------------------
// Mail2SMS — Shared Event Payload Types
// ---------------------------------------------------------------------------
// Payload shapes for the events published while a transaction moves through
// the gateway. Every one of them carries the SMTP session ID as the event's
// `correlationId`.
// ---------------------------------------------------------------------------

import { ExtractionFailure } from './errors';

/** `mail.received` — a completed transaction reached the gateway. */
export interface MailReceivedPayload {
  sender: string;
  recipientCount: number;
  sizeBytes: number;
}

/** `mail.rejected` — the transaction could not be turned into an SMS. */
export interface MailRejectedPayload {
  reason: ExtractionFailure;
  detail: string;
}

/** `sms.sent` — the provider accepted the message. */
export interface SmsSentPayload {
  /** Masked destination number. */
  recipient: string;
  messageId?: string;
  /** Number of `sendSms` calls it took (2 after one auth retry). */
  attempts: number;
}

/** `sms.failed` — the provider could not be reached or refused the message. */
export interface SmsFailedPayload {
  recipient: string;
  status: 'auth_failed' | 'login_failed' | 'provider_error' | 'malformed_request' | 'cancelled';
  detail?: string;
  smtpCode: number;
}

// ---------------------------------------------------------------------------
// Mail2SMS — Gateway Handler
// ---------------------------------------------------------------------------
// One call per mail transaction:
//
//   extract → build SmsRequest → acquire session → sendSms → SMTP reply
//
// An auth failure invalidates the session and retries with a fresh one
// (`authRetries` times). Every outcome, including unexpected exceptions,
// resolves to a reply for this transaction only.
// ---------------------------------------------------------------------------

import { IMailHandler, MailTransaction, SmtpReply } from '../../core/types/mail';
import { IEventBus } from '../../core/types/events';
import { ILogger } from '../../core/types/module';
import {
  AuthError,
  ExtractionError,
  ExtractionFailure,
  toError,
} from '../../shared/errors';
import {
  MailReceivedPayload,
  MailRejectedPayload,
  SmsFailedPayload,
  SmsSentPayload,
} from '../../shared/events';
import { maskPhone } from '../../shared/utils';
import { ExtractedMessage, MailTransactionExtractor } from './extractor';
import { SessionCache } from './session-cache';
import {
  ISmsApiClient,
  MessageQuality,
  SessionCredential,
  SmsRequest,
  SmsStatus,
} from './types';

// ── SMTP replies ───────────────────────────────────────────────────────────

export const REPLY_OK: SmtpReply = { code: 250, message: 'OK' };

export const REPLY_TEMPORARY_FAILURE: SmtpReply = {
  code: 451,
  message: '4.3.0 SMS delivery temporarily unavailable, try again later',
};

const EXTRACTION_REPLIES: Readonly<Record<ExtractionFailure, SmtpReply>> = {
  NoRecipient: { code: 550, message: '5.1.3 No recipient phone number' },
  InvalidRecipientFormat: { code: 550, message: '5.1.3 Recipient local-part must be a phone number' },
  UnsupportedContentType: { code: 550, message: '5.6.0 Message has no text/plain part' },
  EmptyBody: { code: 550, message: '5.6.0 Message body is empty' },
};

const REPLY_MALFORMED_REQUEST: SmtpReply = {
  code: 550,
  message: '5.6.0 SMS request rejected as malformed',
};

// ── Handler ────────────────────────────────────────────────────────────────

export interface GatewayHandlerOptions {
  sender: string;
  quality: MessageQuality;
  returnCredits: boolean;
  /** Fresh-session retries after an auth failure. */
  authRetries: number;
}

export interface GatewayHandlerDeps {
  extractor: MailTransactionExtractor;
  sessions: SessionCache;
  client: ISmsApiClient;
  bus: IEventBus;
  logger: ILogger;
  /** Event `source`; the owning module's ID. */
  source: string;
}

export interface GatewayStats {
  received: number;
  sent: number;
  rejected: number;
  failed: number;
}

export class GatewayHandler implements IMailHandler {
  private readonly stats: GatewayStats = { received: 0, sent: 0, rejected: 0, failed: 0 };
  private lastFailure?: string;

  constructor(
    private readonly options: GatewayHandlerOptions,
    private readonly deps: GatewayHandlerDeps,
  ) {}

  async handle(transaction: MailTransaction, signal?: AbortSignal): Promise<SmtpReply> {
    try {
      return await this.process(transaction, signal);
    } catch (err) {
      this.stats.failed++;
      this.lastFailure = toError(err).message;
      this.deps.logger.error('Unexpected failure while handling mail', toError(err), {
        transactionId: transaction.id,
      });
      return REPLY_TEMPORARY_FAILURE;
    }
  }

  getStats(): GatewayStats {
    return { ...this.stats };
  }

  getLastFailure(): string | undefined {
    return this.lastFailure;
  }

  // ── Steps ────────────────────────────────────────────────────────────────

  private async process(tx: MailTransaction, signal?: AbortSignal): Promise<SmtpReply> {
    const { logger } = this.deps;
    this.stats.received++;

    logger.debug('Mail transaction received', {
      transactionId: tx.id,
      sender: tx.sender,
      recipients: tx.recipients.length,
      sizeBytes: tx.raw.length,
    });
    this.emit<MailReceivedPayload>('mail.received', tx.id, {
      sender: tx.sender,
      recipientCount: tx.recipients.length,
      sizeBytes: tx.raw.length,
    });

    let extracted: ExtractedMessage;
    try {
      extracted = await this.deps.extractor.extract(tx);
    } catch (err) {
      if (!(err instanceof ExtractionError)) throw err;
      return this.reject(tx, err);
    }

    const request: SmsRequest = {
      recipient: extracted.recipient,
      message: extracted.body,
      quality: this.options.quality,
      sender: this.options.sender,
      returnCredits: this.options.returnCredits,
    };

    return this.deliver(tx, request, signal);
  }

  private async deliver(tx: MailTransaction, request: SmsRequest, signal?: AbortSignal): Promise<SmtpReply> {
    const { logger, sessions, client } = this.deps;
    const recipient = maskPhone(request.recipient);
    const maxAttempts = 1 + Math.max(0, this.options.authRetries);

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        return this.fail(tx, recipient, 'cancelled', REPLY_TEMPORARY_FAILURE, 'Connection closed by client');
      }

      let credential: SessionCredential;
      try {
        credential = await sessions.acquire();
      } catch (err) {
        if (!(err instanceof AuthError)) throw err;
        return this.fail(tx, recipient, 'login_failed', REPLY_TEMPORARY_FAILURE, `${err.kind}: ${err.message}`);
      }

      const result = await client.sendSms(credential, request, signal);

      switch (result.status) {
        case SmsStatus.Sent:
          this.stats.sent++;
          logger.info('SMS sent', {
            transactionId: tx.id,
            recipient,
            messageId: result.messageId,
            attempts: attempt,
          });
          this.emit<SmsSentPayload>('sms.sent', tx.id, {
            recipient,
            messageId: result.messageId,
            attempts: attempt,
          });
          return REPLY_OK;

        case SmsStatus.AuthFailed:
          sessions.invalidate(credential);
          if (attempt >= maxAttempts) {
            return this.fail(tx, recipient, 'auth_failed', REPLY_TEMPORARY_FAILURE, `HTTP ${result.httpStatus}`);
          }
          logger.warn('SMS provider rejected session, retrying with a new one', {
            transactionId: tx.id,
            httpStatus: result.httpStatus,
            attempt,
          });
          continue;

        case SmsStatus.ProviderError:
          return this.fail(
            tx,
            recipient,
            signal?.aborted ? 'cancelled' : 'provider_error',
            REPLY_TEMPORARY_FAILURE,
            result.detail,
          );

        case SmsStatus.MalformedRequest:
          return this.fail(tx, recipient, 'malformed_request', REPLY_MALFORMED_REQUEST, result.detail);
      }
    }
  }

  // ── Outcomes ─────────────────────────────────────────────────────────────

  private reject(tx: MailTransaction, err: ExtractionError): SmtpReply {
    this.stats.rejected++;
    const reply = EXTRACTION_REPLIES[err.kind];
    this.deps.logger.warn('Mail rejected', {
      transactionId: tx.id,
      reason: err.kind,
      detail: err.message,
      smtpCode: reply.code,
    });
    this.emit<MailRejectedPayload>('mail.rejected', tx.id, { reason: err.kind, detail: err.message });
    return reply;
  }

  private fail(
    tx: MailTransaction,
    recipient: string,
    status: SmsFailedPayload['status'],
    reply: SmtpReply,
    detail: string,
  ): SmtpReply {
    this.stats.failed++;
    this.lastFailure = `${status}: ${detail}`;
    this.deps.logger.warn('SMS not sent', {
      transactionId: tx.id,
      recipient,
      status,
      detail,
      smtpCode: reply.code,
    });
    this.emit<SmsFailedPayload>('sms.failed', tx.id, { recipient, status, detail, smtpCode: reply.code });
    return reply;
  }

  private emit<T>(type: string, correlationId: string, payload: T): void {
    this.deps.bus
      .publish<T>({
        type,
        source: this.deps.source,
        timestamp: new Date(),
        correlationId,
        payload,
      })
      .catch((err) => {
        this.deps.logger.error('Failed to publish event', toError(err), { type });
      });
  }
}

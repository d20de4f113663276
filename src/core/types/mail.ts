// ---------------------------------------------------------------------------
// Mail2SMS — Mail Handling Contract
// ---------------------------------------------------------------------------
// The seam between the SMTP listener and whatever consumes completed mail
// transactions. The listener owns the socket and the protocol state machine;
// a handler only ever sees finished transactions and answers with a reply.
// ---------------------------------------------------------------------------

/**
 * One completed SMTP envelope + DATA exchange. Immutable once received.
 */
export interface MailTransaction {
  /**
   * SMTP session ID plus the transaction's number within that session
   * (`<session>-<n>`). Used as correlation ID.
   */
  readonly id: string;

  /** MAIL FROM address (empty string for the null sender `<>`). */
  readonly sender: string;

  /** RCPT TO addresses in the order they were accepted. */
  readonly recipients: readonly string[];

  /** Raw RFC 5322 message exactly as received after DATA. */
  readonly raw: Buffer;

  readonly receivedAt: Date;
}

/**
 * Final SMTP completion status for a transaction.
 *
 * `code` is the basic reply code (250, 4xx, 5xx); `message` is the text
 * after it, including an RFC 3463 enhanced status code for failures.
 */
export interface SmtpReply {
  readonly code: number;
  readonly message: string;
}

/**
 * Capability interface implemented by the mail consumer.
 *
 * `signal` is aborted when the client connection goes away before the
 * reply is written; implementations should abandon outstanding work.
 * Implementations must resolve for every transaction and never reject.
 */
export interface IMailHandler {
  handle(transaction: MailTransaction, signal?: AbortSignal): Promise<SmtpReply>;
}

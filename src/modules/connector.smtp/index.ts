// ---------------------------------------------------------------------------
// Mail2SMS — connector.smtp (SMTP Listener)
// ---------------------------------------------------------------------------
// Accepts mail over SMTP and hands each completed DATA phase to the
// configured mail handler. The handler's reply becomes the SMTP response
// to that transaction.
//
// Features:
//   - smtp-server listener, AUTH and STARTTLS disabled
//   - message size cap (552 when exceeded)
//   - per-connection cancellation: a client that hangs up aborts its
//     in-flight delivery
//   - health reporting with transaction and reply counts
// ---------------------------------------------------------------------------

import { Readable } from 'node:stream';
import { SMTPServer } from 'smtp-server';
import {
  IModule,
  ModuleManifest,
  ModuleType,
  ModuleContext,
  ModuleHealth,
} from '../../core/types/module';
import { IMailHandler, MailTransaction, SmtpReply } from '../../core/types/mail';
import { ModuleError, toError } from '../../shared/errors';
import configSchema from './schema.json';

// ── Types ──────────────────────────────────────────────────────────────────

interface SmtpConfig {
  host: string;
  port: number;
  maxMessageBytes: number;
  banner: string;
}

const DEFAULTS: SmtpConfig = {
  host: '127.0.0.1',
  port: 2525,
  maxMessageBytes: 1_048_576,
  banner: 'Mail2SMS gateway',
};

/** The parts of an smtp-server session the connector reads. */
export interface InboundSession {
  id: string;
  remoteAddress: string;
  envelope: {
    mailFrom: { address: string } | false;
    rcptTo: ReadonlyArray<{ address: string }>;
  };
}

/** DATA stream as smtp-server hands it over. */
export type InboundStream = Readable & { sizeExceeded?: boolean };

export type DataCallback = (err?: Error | null, message?: string) => void;

/** Error carrying the SMTP reply code smtp-server sends to the client. */
export class SmtpReplyError extends Error {
  constructor(
    public readonly responseCode: number,
    message: string,
  ) {
    super(message);
    this.name = 'SmtpReplyError';
  }
}

const REPLY_TOO_LARGE: SmtpReply = { code: 552, message: '5.3.4 Message exceeds maximum size' };
const REPLY_NO_HANDLER: SmtpReply = { code: 451, message: '4.3.0 Gateway not ready, try again later' };
const REPLY_INTERNAL: SmtpReply = { code: 451, message: '4.3.0 Local error in processing' };

// ── Module Implementation ──────────────────────────────────────────────────

export class SmtpConnector implements IModule {
  readonly manifest: ModuleManifest = {
    id: 'connector.smtp',
    name: 'SMTP Listener',
    version: '0.1.0',
    type: ModuleType.Connector,
    description: 'Accepts mail over SMTP and replies with the outcome of SMS delivery.',
    dependencies: ['gateway.sms'],
    configSchema: configSchema as Record<string, unknown>,
  };

  private ctx!: ModuleContext;
  private config!: SmtpConfig;
  private handler: IMailHandler | null = null;
  private server: SMTPServer | null = null;

  // In-flight deliveries, keyed by SMTP session ID
  private readonly inFlight = new Map<string, AbortController>();
  // Transactions seen per session; one connection may send several messages
  private readonly sequence = new Map<string, number>();

  // Metrics
  private transactions = 0;
  private accepted = 0;
  private refused = 0;
  private lastError?: string;

  // ── Dependency Injection ─────────────────────────────────────────────────

  /** Set the handler that turns transactions into replies. Call before `start()`. */
  setHandler(handler: IMailHandler): void {
    this.handler = handler;
  }

  // ── Lifecycle ────────────────────────────────────────────────────────────

  async initialize(context: ModuleContext): Promise<void> {
    this.ctx = context;
    const raw = context.config as Partial<SmtpConfig>;

    this.config = {
      host: raw.host ?? DEFAULTS.host,
      port: raw.port ?? DEFAULTS.port,
      maxMessageBytes: raw.maxMessageBytes ?? DEFAULTS.maxMessageBytes,
      banner: raw.banner ?? DEFAULTS.banner,
    };

    this.ctx.logger.info('Initialized', {
      host: this.config.host,
      port: this.config.port,
      maxMessageBytes: this.config.maxMessageBytes,
    });
  }

  async start(): Promise<void> {
    if (!this.handler) {
      throw new ModuleError('No mail handler set; call setHandler() before start()', this.manifest.id);
    }

    const server = new SMTPServer({
      banner: this.config.banner,
      size: this.config.maxMessageBytes,
      disabledCommands: ['AUTH', 'STARTTLS'],
      authOptional: true,
      logger: false,
      onData: (stream, session, callback) => this.onData(stream, session, callback),
      onClose: (session) => this.onClose(session),
    });

    server.on('error', (err) => {
      this.lastError = err.message;
      this.ctx.logger.error('SMTP server error', err);
    });

    await new Promise<void>((resolve, reject) => {
      const onStartupError = (err: Error): void => reject(err);
      server.once('error', onStartupError);
      server.listen(this.config.port, this.config.host, () => {
        server.removeListener('error', onStartupError);
        resolve();
      });
    });

    this.server = server;
    this.ctx.logger.info('Listening', { host: this.config.host, port: this.config.port });
  }

  async stop(): Promise<void> {
    for (const controller of this.inFlight.values()) {
      controller.abort();
    }
    this.inFlight.clear();
    this.sequence.clear();

    const server = this.server;
    if (server) {
      this.server = null;
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }

    this.ctx.logger.info('Stopped', {
      transactions: this.transactions,
      accepted: this.accepted,
      refused: this.refused,
    });
  }

  async destroy(): Promise<void> {
    this.server = null;
    this.handler = null;
  }

  health(): ModuleHealth {
    return {
      status: this.lastError ? 'degraded' : 'healthy',
      message: this.lastError,
      details: {
        host: this.config?.host,
        port: this.config?.port,
        listening: this.server !== null,
        inFlight: this.inFlight.size,
        transactions: this.transactions,
        accepted: this.accepted,
        refused: this.refused,
      },
      lastCheck: new Date(),
    };
  }

  // ── smtp-server callbacks ────────────────────────────────────────────────

  /** End of DATA: answer the transaction with the handler's reply. */
  onData(stream: InboundStream, session: InboundSession, callback: DataCallback): void {
    this.transactions++;
    this.receive(stream, session).then(
      (reply) => {
        if (reply.code < 300) {
          this.accepted++;
          callback(null, reply.message);
        } else {
          this.refused++;
          callback(new SmtpReplyError(reply.code, reply.message));
        }
      },
      (err) => {
        this.refused++;
        this.lastError = toError(err).message;
        this.ctx.logger.error('Failed to process mail transaction', toError(err), { sessionId: session.id });
        callback(new SmtpReplyError(REPLY_INTERNAL.code, REPLY_INTERNAL.message));
      },
    );
  }

  /** Connection closed: abort the session's delivery if one is still running. */
  onClose(session: Pick<InboundSession, 'id'>): void {
    this.sequence.delete(session.id);
    const controller = this.inFlight.get(session.id);
    if (controller) {
      this.ctx.logger.warn('Client disconnected during delivery', { sessionId: session.id });
      controller.abort();
      this.inFlight.delete(session.id);
    }
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  private async receive(stream: InboundStream, session: InboundSession): Promise<SmtpReply> {
    const raw = await readStream(stream);

    if (stream.sizeExceeded) {
      this.ctx.logger.warn('Message too large', {
        sessionId: session.id,
        limit: this.config.maxMessageBytes,
      });
      return REPLY_TOO_LARGE;
    }

    const handler = this.handler;
    if (!handler) return REPLY_NO_HANDLER;

    const seq = (this.sequence.get(session.id) ?? 0) + 1;
    this.sequence.set(session.id, seq);

    const { mailFrom, rcptTo } = session.envelope;
    const transaction: MailTransaction = Object.freeze({
      id: `${session.id}-${seq}`,
      sender: mailFrom ? mailFrom.address : '',
      recipients: Object.freeze(rcptTo.map((r) => r.address)),
      raw,
      receivedAt: new Date(),
    });

    this.ctx.logger.debug('DATA received', {
      transactionId: transaction.id,
      remoteAddress: session.remoteAddress,
      sizeBytes: raw.length,
    });

    const controller = new AbortController();
    this.inFlight.set(session.id, controller);
    try {
      return await handler.handle(transaction, controller.signal);
    } finally {
      if (this.inFlight.get(session.id) === controller) {
        this.inFlight.delete(session.id);
      }
    }
  }
}

async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

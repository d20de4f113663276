// ---------------------------------------------------------------------------
// Mail2SMS — gateway.sms (SMS Gateway)
// ---------------------------------------------------------------------------
// Turns accepted mail transactions into SMS submissions against the
// provider's session-keyed HTTP API and answers each with an SMTP reply.
//
// Owns:
//   - the HTTP client (login + sms endpoints)
//   - the shared session credential (TTL, single-flight login)
//   - the extraction → delivery pipeline (GatewayHandler)
//
// Logs in lazily on the first transaction, not at start.
// ---------------------------------------------------------------------------

import {
  IModule,
  ModuleManifest,
  ModuleType,
  ModuleContext,
  ModuleHealth,
} from '../../core/types/module';
import { IMailHandler, MailTransaction, SmtpReply } from '../../core/types/mail';
import { ConfigError } from '../../shared/errors';
import { FetchFn, SmsApiClient } from './client';
import { MailTransactionExtractor } from './extractor';
import { GatewayHandler, REPLY_TEMPORARY_FAILURE } from './handler';
import { SessionCache } from './session-cache';
import { ISmsApiClient, SmsGatewayConfig } from './types';
import configSchema from './schema.json';

type SmsGatewayDefaults = Omit<SmsGatewayConfig, 'baseUrl' | 'username' | 'password'>;

const DEFAULTS: SmsGatewayDefaults = {
  sender: 'Mail2SMS',
  messageQuality: 'high',
  returnCredits: false,
  timeoutMs: 10_000,
  sessionTtlMs: 600_000,
  authRetries: 1,
  maxMessageLength: 918,
};

export interface SmsGatewayOptions {
  /** Replaces the HTTP client (tests). */
  client?: ISmsApiClient;
  /** Replaces `fetch` inside the default HTTP client. */
  fetch?: FetchFn;
  /** Clock for the session cache, in epoch ms. */
  now?: () => number;
}

export class SmsGatewayModule implements IModule, IMailHandler {
  readonly manifest: ModuleManifest = {
    id: 'gateway.sms',
    name: 'SMS Gateway',
    version: '0.1.0',
    type: ModuleType.Gateway,
    description: 'Delivers accepted mail as SMS through the provider HTTP API.',
    configSchema: configSchema as Record<string, unknown>,
  };

  private ctx!: ModuleContext;
  private config!: SmsGatewayConfig;
  private sessions!: SessionCache;
  private handler: GatewayHandler | null = null;
  private started = false;

  constructor(private readonly options: SmsGatewayOptions = {}) {}

  // ── Lifecycle ────────────────────────────────────────────────────────────

  async initialize(context: ModuleContext): Promise<void> {
    this.ctx = context;
    const raw = context.config as Partial<SmsGatewayConfig>;

    const missing = (['baseUrl', 'username', 'password'] as const).filter((key) => !raw[key]);
    if (missing.length > 0) {
      throw new ConfigError(`gateway.sms: missing required setting(s): ${missing.join(', ')}`);
    }

    this.config = {
      baseUrl: raw.baseUrl ?? '',
      username: raw.username ?? '',
      password: raw.password ?? '',
      sender: raw.sender ?? DEFAULTS.sender,
      messageQuality: raw.messageQuality ?? DEFAULTS.messageQuality,
      returnCredits: raw.returnCredits ?? DEFAULTS.returnCredits,
      timeoutMs: raw.timeoutMs ?? DEFAULTS.timeoutMs,
      sessionTtlMs: raw.sessionTtlMs ?? DEFAULTS.sessionTtlMs,
      authRetries: raw.authRetries ?? DEFAULTS.authRetries,
      maxMessageLength: raw.maxMessageLength ?? DEFAULTS.maxMessageLength,
    };

    const client = this.options.client ?? new SmsApiClient({
      baseUrl: this.config.baseUrl,
      timeoutMs: this.config.timeoutMs,
      fetch: this.options.fetch,
    });

    this.sessions = new SessionCache(
      client,
      {
        username: this.config.username,
        password: this.config.password,
        ttlMs: this.config.sessionTtlMs,
        now: this.options.now,
      },
      context.logger.child('session'),
    );

    this.handler = new GatewayHandler(
      {
        sender: this.config.sender,
        quality: this.config.messageQuality,
        returnCredits: this.config.returnCredits,
        authRetries: this.config.authRetries,
      },
      {
        extractor: new MailTransactionExtractor({ maxMessageLength: this.config.maxMessageLength }),
        sessions: this.sessions,
        client,
        bus: context.bus,
        logger: context.logger,
        source: this.manifest.id,
      },
    );

    this.ctx.logger.info('Initialized', {
      baseUrl: this.config.baseUrl,
      sender: this.config.sender,
      messageQuality: this.config.messageQuality,
      sessionTtlMs: this.config.sessionTtlMs,
      authRetries: this.config.authRetries,
    });
  }

  async start(): Promise<void> {
    this.started = true;
    this.ctx.logger.info('Started');
  }

  async stop(): Promise<void> {
    this.started = false;
    this.ctx.logger.info('Stopped');
  }

  async destroy(): Promise<void> {
    this.sessions?.invalidate();
    this.handler = null;
  }

  // ── Mail handling ────────────────────────────────────────────────────────

  async handle(transaction: MailTransaction, signal?: AbortSignal): Promise<SmtpReply> {
    if (!this.handler || !this.started) {
      return REPLY_TEMPORARY_FAILURE;
    }
    return this.handler.handle(transaction, signal);
  }

  // ── Health ───────────────────────────────────────────────────────────────

  health(): ModuleHealth {
    const stats = this.handler?.getStats() ?? { received: 0, sent: 0, rejected: 0, failed: 0 };
    const lastFailure = this.handler?.getLastFailure();
    const degraded = stats.failed > 0 && stats.sent === 0;

    return {
      status: degraded ? 'degraded' : 'healthy',
      message: degraded ? `No SMS delivered yet; last failure: ${lastFailure}` : undefined,
      details: {
        ...stats,
        sessionActive: this.sessions?.hasCredential() ?? false,
        logins: this.sessions?.getLoginCount() ?? 0,
        lastFailure,
      },
      lastCheck: new Date(),
    };
  }
}

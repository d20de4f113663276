// ---------------------------------------------------------------------------
// Mail2SMS — SMTP Connector Tests
// ---------------------------------------------------------------------------
// Drives the smtp-server callbacks directly with synthetic sessions and
// DATA streams; no socket is opened.
// ---------------------------------------------------------------------------

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { Readable } from 'node:stream';
import { EventBus } from '../src/core/bus/EventBus';
import { IMailHandler, MailTransaction, SmtpReply } from '../src/core/types/mail';
import {
  InboundSession,
  InboundStream,
  SmtpConnector,
  SmtpReplyError,
} from '../src/modules/connector.smtp';
import { ModuleError } from '../src/shared/errors';
import { buildRawMail, createSilentLogger } from './helpers';

class RecordingHandler implements IMailHandler {
  readonly transactions: MailTransaction[] = [];
  readonly signals: AbortSignal[] = [];
  reply: SmtpReply = { code: 250, message: 'OK' };
  /** Holds `handle()` open until resolved. */
  gate: Promise<void> | null = null;

  async handle(transaction: MailTransaction, signal?: AbortSignal): Promise<SmtpReply> {
    this.transactions.push(transaction);
    if (signal) this.signals.push(signal);
    if (this.gate) await this.gate;
    return this.reply;
  }
}

function session(overrides: Partial<InboundSession> = {}): InboundSession {
  return {
    id: 'sess-1',
    remoteAddress: '127.0.0.1',
    envelope: {
      mailFrom: { address: 'alerts@example.com' },
      rcptTo: [{ address: '15551234567@gateway.local' }, { address: '15550000000@gateway.local' }],
    },
    ...overrides,
  };
}

function dataStream(raw: Buffer, sizeExceeded = false): InboundStream {
  return Object.assign(Readable.from([raw]), { sizeExceeded });
}

interface DataOutcome {
  err?: Error | null;
  message?: string;
}

function deliver(connector: SmtpConnector, stream: InboundStream, sess: InboundSession): Promise<DataOutcome> {
  return new Promise((resolve) => {
    connector.onData(stream, sess, (err, message) => resolve({ err, message }));
  });
}

describe('SmtpConnector', () => {
  let connector: SmtpConnector;
  let handler: RecordingHandler;

  beforeEach(async () => {
    connector = new SmtpConnector();
    handler = new RecordingHandler();
    connector.setHandler(handler);
    await connector.initialize({
      moduleId: 'connector.smtp',
      config: {},
      bus: new EventBus(createSilentLogger()),
      logger: createSilentLogger(),
    });
  });

  it('declares its dependency on the gateway', () => {
    assert.deepStrictEqual(connector.manifest.dependencies, ['gateway.sms']);
  });

  it('builds a transaction from the envelope and DATA', async () => {
    const raw = buildRawMail({ body: 'Your code is 4821' });

    const outcome = await deliver(connector, dataStream(raw), session());

    assert.deepStrictEqual(outcome, { err: null, message: 'OK' });
    assert.strictEqual(handler.transactions.length, 1);
    const tx = handler.transactions[0];
    assert.strictEqual(tx.id, 'sess-1-1');
    assert.strictEqual(tx.sender, 'alerts@example.com');
    assert.deepStrictEqual(tx.recipients, ['15551234567@gateway.local', '15550000000@gateway.local']);
    assert.ok(tx.raw.equals(raw));
  });

  it('numbers each transaction on a kept-alive connection', async () => {
    await deliver(connector, dataStream(buildRawMail({ body: 'first' })), session());
    await deliver(connector, dataStream(buildRawMail({ body: 'second' })), session());
    await deliver(connector, dataStream(buildRawMail({ body: 'other' })), session({ id: 'sess-2' }));

    assert.deepStrictEqual(
      handler.transactions.map((tx) => tx.id),
      ['sess-1-1', 'sess-1-2', 'sess-2-1'],
    );
  });

  it('restarts numbering once the connection closes', async () => {
    await deliver(connector, dataStream(buildRawMail({ body: 'first' })), session());
    connector.onClose({ id: 'sess-1' });
    await deliver(connector, dataStream(buildRawMail({ body: 'again' })), session());

    assert.deepStrictEqual(handler.transactions.map((tx) => tx.id), ['sess-1-1', 'sess-1-1']);
  });

  it('uses an empty sender for a null reverse-path', async () => {
    const sess = session({
      envelope: { mailFrom: false, rcptTo: [{ address: '15551234567@gateway.local' }] },
    });

    await deliver(connector, dataStream(buildRawMail({ body: 'x' })), sess);

    assert.strictEqual(handler.transactions[0].sender, '');
  });

  it('passes a 5xx reply back as an error carrying the response code', async () => {
    handler.reply = { code: 550, message: '5.1.3 No recipient phone number' };

    const outcome = await deliver(connector, dataStream(buildRawMail({ body: 'x' })), session());

    assert.ok(outcome.err instanceof SmtpReplyError);
    assert.strictEqual(outcome.err.responseCode, 550);
    assert.strictEqual(outcome.err.message, '5.1.3 No recipient phone number');
  });

  it('passes a 4xx reply back as an error carrying the response code', async () => {
    handler.reply = { code: 451, message: '4.3.0 try again later' };

    const outcome = await deliver(connector, dataStream(buildRawMail({ body: 'x' })), session());

    assert.ok(outcome.err instanceof SmtpReplyError);
    assert.strictEqual(outcome.err.responseCode, 451);
  });

  it('replies 552 without calling the handler when the message is too large', async () => {
    const outcome = await deliver(connector, dataStream(buildRawMail({ body: 'x' }), true), session());

    assert.ok(outcome.err instanceof SmtpReplyError);
    assert.strictEqual(outcome.err.responseCode, 552);
    assert.strictEqual(handler.transactions.length, 0);
  });

  it('replies 451 when the handler throws', async () => {
    handler.handle = async () => { throw new Error('boom'); };

    const outcome = await deliver(connector, dataStream(buildRawMail({ body: 'x' })), session());

    assert.ok(outcome.err instanceof SmtpReplyError);
    assert.strictEqual(outcome.err.responseCode, 451);
    assert.strictEqual(connector.health().status, 'degraded');
  });

  it('aborts the in-flight delivery when the client disconnects', async () => {
    let release: () => void = () => {};
    handler.gate = new Promise<void>((resolve) => { release = resolve; });

    const pending = deliver(connector, dataStream(buildRawMail({ body: 'x' })), session());
    // Let the stream drain and the handler start
    while (handler.signals.length === 0) {
      await new Promise((r) => setImmediate(r));
    }
    assert.strictEqual(connector.health().details?.inFlight, 1);

    connector.onClose({ id: 'sess-1' });
    assert.strictEqual(handler.signals[0].aborted, true);

    release();
    await pending;
    assert.strictEqual(connector.health().details?.inFlight, 0);
  });

  it('ignores a close for a session with nothing in flight', () => {
    connector.onClose({ id: 'unknown' });
    assert.strictEqual(connector.health().details?.inFlight, 0);
  });

  it('counts accepted and refused transactions', async () => {
    await deliver(connector, dataStream(buildRawMail({ body: 'x' })), session());
    handler.reply = { code: 550, message: '5.6.0 Message body is empty' };
    await deliver(connector, dataStream(buildRawMail({ body: ' ' })), session({ id: 'sess-2' }));

    const details = connector.health().details;
    assert.strictEqual(details?.transactions, 2);
    assert.strictEqual(details?.accepted, 1);
    assert.strictEqual(details?.refused, 1);
  });

  it('refuses to start without a handler', async () => {
    const bare = new SmtpConnector();
    await bare.initialize({
      moduleId: 'connector.smtp',
      config: {},
      bus: new EventBus(createSilentLogger()),
      logger: createSilentLogger(),
    });

    await assert.rejects(bare.start(), ModuleError);
  });
});

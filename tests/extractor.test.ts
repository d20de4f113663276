// ---------------------------------------------------------------------------
// Mail2SMS — Mail Transaction Extractor Tests
// ---------------------------------------------------------------------------

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  MailTransactionExtractor,
  extractPlainText,
  extractRecipient,
} from '../src/modules/gateway.sms/extractor';
import { ExtractionError, ExtractionFailure } from '../src/shared/errors';
import { buildRawMail, createTransaction } from './helpers';

function isExtractionError(kind: ExtractionFailure) {
  return (err: unknown): boolean => err instanceof ExtractionError && err.kind === kind;
}

describe('extractRecipient', () => {
  it('returns the local-part of the first recipient', () => {
    assert.strictEqual(extractRecipient(['15551234567@gateway.local']), '15551234567');
  });

  it('keeps a leading plus sign', () => {
    assert.strictEqual(extractRecipient(['+447700900123@sms.example']), '+447700900123');
  });

  it('ignores every recipient after the first', () => {
    assert.strictEqual(
      extractRecipient(['15550000001@gw.local', 'not-a-number@gw.local']),
      '15550000001',
    );
  });

  it('accepts an address without a domain', () => {
    assert.strictEqual(extractRecipient(['15551234567']), '15551234567');
  });

  it('trims surrounding whitespace', () => {
    assert.strictEqual(extractRecipient(['  15551234567@gw.local ']), '15551234567');
  });

  it('fails with NoRecipient on an empty list', () => {
    assert.throws(() => extractRecipient([]), isExtractionError('NoRecipient'));
  });

  it('fails with InvalidRecipientFormat on an empty local-part', () => {
    assert.throws(() => extractRecipient(['@gw.local']), isExtractionError('InvalidRecipientFormat'));
  });

  it('fails with InvalidRecipientFormat on a non-numeric local-part', () => {
    assert.throws(() => extractRecipient(['john.doe@gw.local']), isExtractionError('InvalidRecipientFormat'));
    assert.throws(() => extractRecipient(['555-1234@gw.local']), isExtractionError('InvalidRecipientFormat'));
    assert.throws(() => extractRecipient(['+@gw.local']), isExtractionError('InvalidRecipientFormat'));
  });
});

describe('extractPlainText', () => {
  it('returns a text/plain body without its trailing line breaks', async () => {
    const text = await extractPlainText(buildRawMail({ body: 'Your code is 4821\r\n\r\n' }));
    assert.strictEqual(text, 'Your code is 4821');
  });

  it('keeps the leading indentation the sender wrote', async () => {
    const text = await extractPlainText(buildRawMail({ body: '  Code:\n    4821' }));
    assert.strictEqual(text, '  Code:\n    4821');
  });

  it('decodes quoted-printable content', async () => {
    const raw = buildRawMail({
      headers: ['Content-Transfer-Encoding: quoted-printable'],
      body: 'Caf=C3=A9 is open',
    });
    assert.strictEqual(await extractPlainText(raw), 'Café is open');
  });

  it('decodes base64 content', async () => {
    const raw = buildRawMail({
      headers: ['Content-Transfer-Encoding: base64'],
      body: Buffer.from('Server rebooted', 'utf-8').toString('base64'),
    });
    assert.strictEqual(await extractPlainText(raw), 'Server rebooted');
  });

  it('takes the text/plain part of multipart/alternative mail', async () => {
    const raw = buildRawMail({
      contentType: 'multipart/alternative; boundary="b1"',
      body: [
        '--b1',
        'Content-Type: text/plain; charset=utf-8',
        '',
        'Plain version',
        '--b1',
        'Content-Type: text/html; charset=utf-8',
        '',
        '<p>HTML version</p>',
        '--b1--',
        '',
      ].join('\r\n'),
    });
    assert.strictEqual(await extractPlainText(raw), 'Plain version');
  });

  it('takes only the first text/plain part of multipart/mixed mail', async () => {
    const raw = buildRawMail({
      contentType: 'multipart/mixed; boundary="m1"',
      body: [
        '--m1',
        'Content-Type: text/plain; charset=utf-8',
        '',
        'Your code is 4821',
        '--m1',
        'Content-Type: text/plain; charset=utf-8',
        '',
        'Footer: sent by portal',
        '--m1--',
        '',
      ].join('\r\n'),
    });
    assert.strictEqual(await extractPlainText(raw), 'Your code is 4821');
  });

  it('finds the text/plain part of an alternative nested in multipart/mixed', async () => {
    const raw = buildRawMail({
      contentType: 'multipart/mixed; boundary="outer"',
      body: [
        '--outer',
        'Content-Type: multipart/alternative; boundary="inner"',
        '',
        '--inner',
        'Content-Type: text/plain; charset=utf-8',
        'Content-Transfer-Encoding: quoted-printable',
        '',
        'Caf=C3=A9 code 7730',
        '--inner',
        'Content-Type: text/html; charset=utf-8',
        '',
        '<p>Caf&eacute; code 7730</p>',
        '--inner--',
        '',
        '--outer',
        'Content-Type: text/plain; charset=utf-8',
        'Content-Disposition: attachment; filename="terms.txt"',
        '',
        'Terms and conditions',
        '--outer--',
        '',
      ].join('\r\n'),
    });
    assert.strictEqual(await extractPlainText(raw), 'Café code 7730');
  });

  it('skips a text/plain attachment that comes before the inline text', async () => {
    const raw = buildRawMail({
      contentType: 'multipart/mixed; boundary="m2"',
      body: [
        '--m2',
        'Content-Type: text/plain; charset=utf-8',
        'Content-Disposition: attachment; filename="log.txt"',
        '',
        'attached log line',
        '--m2',
        'Content-Type: text/plain; charset=utf-8',
        '',
        'Disk almost full',
        '--m2--',
        '',
      ].join('\r\n'),
    });
    assert.strictEqual(await extractPlainText(raw), 'Disk almost full');
  });

  it('fails with UnsupportedContentType when text/plain only comes as an attachment', async () => {
    const raw = buildRawMail({
      contentType: 'multipart/mixed; boundary="m3"',
      body: [
        '--m3',
        'Content-Type: text/html; charset=utf-8',
        '',
        '<p>See attached</p>',
        '--m3',
        'Content-Type: text/plain; charset=utf-8',
        'Content-Disposition: attachment; filename="code.txt"',
        '',
        'Your code is 4821',
        '--m3--',
        '',
      ].join('\r\n'),
    });
    await assert.rejects(extractPlainText(raw), isExtractionError('UnsupportedContentType'));
  });

  it('fails with UnsupportedContentType on HTML-only mail', async () => {
    const raw = buildRawMail({ contentType: 'text/html; charset=utf-8', body: '<p>Hello</p>' });
    await assert.rejects(extractPlainText(raw), isExtractionError('UnsupportedContentType'));
  });

  it('fails with EmptyBody on a whitespace-only text body', async () => {
    const raw = buildRawMail({ body: '   \r\n   ' });
    await assert.rejects(extractPlainText(raw), isExtractionError('EmptyBody'));
  });
});

describe('MailTransactionExtractor', () => {
  it('extracts recipient and body together', async () => {
    const extractor = new MailTransactionExtractor({ maxMessageLength: 918 });
    const result = await extractor.extract(createTransaction());
    assert.deepStrictEqual(result, { recipient: '15551234567', body: 'Your code is 4821' });
  });

  it('truncates bodies longer than maxMessageLength', async () => {
    const extractor = new MailTransactionExtractor({ maxMessageLength: 5 });
    const result = await extractor.extract(createTransaction({ raw: buildRawMail({ body: 'Hello world' }) }));
    assert.strictEqual(result.body, 'Hello');
  });

  it('does not split a character outside the BMP when truncating', async () => {
    const extractor = new MailTransactionExtractor({ maxMessageLength: 3 });
    const result = await extractor.extract(createTransaction({ raw: buildRawMail({ body: 'ok😀 done' }) }));
    assert.strictEqual(result.body, 'ok😀');
  });

  it('checks the recipient before parsing the body', async () => {
    const extractor = new MailTransactionExtractor({ maxMessageLength: 918 });
    const tx = createTransaction({
      recipients: [],
      raw: buildRawMail({ contentType: 'text/html', body: '<p>x</p>' }),
    });
    await assert.rejects(extractor.extract(tx), isExtractionError('NoRecipient'));
  });
});

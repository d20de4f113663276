// ---------------------------------------------------------------------------
// Mail2SMS — Mail Transaction Extractor
// ---------------------------------------------------------------------------
// Turns a mail transaction into (destination number, SMS text):
//
//   - number: local-part of the FIRST envelope recipient; the rest are ignored
//   - text:   the first inline text/plain part, MIME-decoded by mailparser
//
// Messages without a plain-text part are refused rather than guessed at.
// ---------------------------------------------------------------------------

import { simpleParser, ParsedMail } from 'mailparser';
import { MimeNode, Splitter } from 'mailsplit';
import { MailTransaction } from '../../core/types/mail';
import { ExtractionError, toError } from '../../shared/errors';

const PHONE_NUMBER = /^\+?\d+$/;

export interface ExtractedMessage {
  recipient: string;
  body: string;
}

export interface ExtractorOptions {
  /** Bodies longer than this many characters are truncated. */
  maxMessageLength: number;
}

export class MailTransactionExtractor {
  constructor(private readonly options: ExtractorOptions) {}

  /**
   * @throws ExtractionError
   */
  async extract(transaction: MailTransaction): Promise<ExtractedMessage> {
    const recipient = extractRecipient(transaction.recipients);
    const text = await extractPlainText(transaction.raw);
    return { recipient, body: truncate(text, this.options.maxMessageLength) };
  }
}

/**
 * Destination number from the first recipient's local-part.
 *
 * @throws ExtractionError `NoRecipient` | `InvalidRecipientFormat`
 */
export function extractRecipient(recipients: readonly string[]): string {
  if (recipients.length === 0) {
    throw new ExtractionError('NoRecipient', 'Transaction has no recipients');
  }

  const address = recipients[0].trim();
  const at = address.lastIndexOf('@');
  const localPart = at === -1 ? address : address.slice(0, at);

  if (localPart.length === 0) {
    throw new ExtractionError('InvalidRecipientFormat', `Recipient "${address}" has an empty local-part`);
  }
  if (!PHONE_NUMBER.test(localPart)) {
    throw new ExtractionError(
      'InvalidRecipientFormat',
      `Recipient local-part "${localPart}" is not a phone number`,
    );
  }
  return localPart;
}

/**
 * Decoded text of the first inline text/plain part, trailing whitespace
 * removed. Later text parts (footers, forwarded copies) are not included.
 *
 * @throws ExtractionError `UnsupportedContentType` | `EmptyBody`
 */
export async function extractPlainText(raw: Buffer): Promise<string> {
  let parts: InlineTextParts;
  try {
    parts = await findInlineTextParts(raw);
  } catch (err) {
    throw new ExtractionError('UnsupportedContentType', 'Message could not be parsed', toError(err));
  }

  if (!parts.plain) {
    throw new ExtractionError('UnsupportedContentType', 'Message has no text/plain part');
  }

  const text = (await decodePart(parts.plain)).text ?? '';
  if (text.trim().length > 0) return text.trimEnd();

  // An empty text part next to a non-empty HTML one is HTML mail
  if (parts.html) {
    const html = (await decodePart(parts.html)).html;
    if (typeof html === 'string' && html.trim().length > 0) {
      throw new ExtractionError('UnsupportedContentType', 'Message has no usable text/plain part');
    }
  }
  throw new ExtractionError('EmptyBody', 'Plain-text body is empty');
}

// ── MIME tree walk ─────────────────────────────────────────────────────────

/** A leaf part as it appeared on the wire: its own header block and body. */
interface RawPart {
  headers: Buffer;
  body: Buffer[];
}

interface InlineTextParts {
  plain?: RawPart;
  html?: RawPart;
}

async function findInlineTextParts(raw: Buffer): Promise<InlineTextParts> {
  const found: InlineTextParts = {};
  const collecting = new Map<MimeNode, RawPart>();
  const splitter = new Splitter();

  splitter.end(raw);
  for await (const chunk of splitter) {
    if (chunk.type === 'node') {
      if (chunk.disposition === 'attachment') continue;
      // No Content-Type means text/plain
      const contentType = chunk.contentType || 'text/plain';
      if (contentType === 'text/plain' && !found.plain) {
        found.plain = { headers: chunk.getHeaders(), body: [] };
        collecting.set(chunk, found.plain);
      } else if (contentType === 'text/html' && !found.html) {
        found.html = { headers: chunk.getHeaders(), body: [] };
        collecting.set(chunk, found.html);
      }
    } else if (chunk.type === 'body') {
      collecting.get(chunk.node)?.body.push(chunk.value);
    }
  }
  return found;
}

/** Decode one part on its own, so charset and transfer encoding still apply. */
function decodePart(part: RawPart): Promise<ParsedMail> {
  const headers = part.headers.toString('binary').replace(/[\r\n]+$/, '');
  const head = Buffer.from(headers.length > 0 ? `${headers}\r\n\r\n` : '\r\n', 'binary');
  return simpleParser(Buffer.concat([head, ...part.body]), {
    skipHtmlToText: true,
    skipTextToHtml: true,
    skipTextLinks: true,
    skipImageLinks: true,
  });
}

/** Cut to `max` characters without splitting a surrogate pair. */
function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length <= max ? text : chars.slice(0, max).join('');
}

import PostalMime from 'postal-mime';
import { describeCause, MalformedMessageError } from './errors';
import { parseHeaderLines, type HeaderMap } from './headers';
import logger from './logger';
import type { ScannedMessage } from './mbox-scanner';
import type { MboxMessage } from './types';

interface AddressLike {
  name?: string;
  address?: string;
  group?: AddressLike[];
}

export interface DecodedAttachment {
  filename: string;
  size: number;
  mimeType: string;
  content: Buffer;
}

export interface DecodedMessage {
  subject: string;
  toRecipients: string;
  ccRecipients: string;
  bodyText: string;
  bodyHtml: string;
  attachments: DecodedAttachment[];
}

// ─── Helpers ──────────────────────────────────────────────────────────

function formatAddress(addr: AddressLike | AddressLike[] | undefined): {
  name: string;
  email: string;
} {
  if (!addr) return { name: '', email: '' };
  const first = Array.isArray(addr) ? addr[0] : addr;
  if (!first) return { name: '', email: '' };
  if (!first.address && first.group && first.group.length > 0) {
    return formatAddress(first.group);
  }
  return { name: first.name || '', email: first.address || '' };
}

function formatAddressList(addrs: AddressLike[] | undefined): string {
  if (!addrs || addrs.length === 0) return '';
  return addrs
    .flatMap((a) => (a.group && !a.address ? a.group : [a]))
    .map((a) => (a.name ? `${a.name} <${a.address || ''}>` : a.address || ''))
    .join('; ');
}

/** Best-effort split of a raw From header into display name and address. */
function parseRawSender(fromRaw: string): { name: string; email: string } {
  const match = fromRaw.match(/^"?([^"<]*?)"?\s*<([^>]+)>/);
  if (match) {
    return { name: match[1].trim(), email: match[2].trim() };
  }
  if (fromRaw.includes('@')) {
    return { name: '', email: fromRaw.trim() };
  }
  return { name: fromRaw.trim(), email: '' };
}

function toIsoDate(value: string | undefined): string {
  if (!value) return '';
  const d = new Date(value);
  return isNaN(d.getTime()) ? '' : d.toISOString();
}

function attachmentBytes(content: ArrayBuffer | Uint8Array | string): Buffer {
  if (typeof content === 'string') return Buffer.from(content, 'binary');
  if (content instanceof Uint8Array) return Buffer.from(content);
  return Buffer.from(content);
}

function hasMixedContent(headers: HeaderMap): boolean {
  return (headers.get('Content-Type') || '').toLowerCase().includes('multipart/mixed');
}

// ─── Index records ───────────────────────────────────────────────────

/**
 * Turn a scanned message into an index record. Encoded words in Subject and
 * From are decoded with postal-mime over the header block alone; if that
 * fails the raw header values are kept and the problem is recorded.
 */
export async function buildMessageRecord(
  scanned: ScannedMessage,
  index: number
): Promise<MboxMessage> {
  const { headers, problems } = parseHeaderLines(scanned.headerLines);
  problems.unshift(...scanned.problems);

  const rawSubject = headers.get('Subject') ?? '';
  let subject = rawSubject;
  let sender = parseRawSender(headers.get('From') ?? '');
  let date = toIsoDate(headers.get('Date'));

  if (scanned.headerLines.length > 0) {
    try {
      const parser = new PostalMime();
      const parsed = await parser.parse(scanned.headerLines.join('\r\n') + '\r\n\r\n');
      subject = parsed.subject ?? rawSubject;
      const from = formatAddress(parsed.from);
      if (from.name || from.email) sender = from;
      date = toIsoDate(parsed.date) || date;
    } catch (err) {
      const problem = new MalformedMessageError(
        scanned.offset,
        `undecodable headers (${describeCause(err)})`
      );
      logger.warn('[MBOX] Keeping raw header values', {
        offset: scanned.offset,
        error: problem.message,
      });
      problems.push(problem.message);
    }
  }

  if (problems.length > 0) {
    logger.debug('[MBOX] Message indexed with problems', {
      offset: scanned.offset,
      problems,
    });
  }

  return {
    index,
    offset: scanned.offset,
    headerOffset: scanned.headerOffset,
    bodyOffset: scanned.bodyOffset,
    end: scanned.end,
    envelope: scanned.envelope,
    headers,
    subject,
    senderName: sender.name,
    senderEmail: sender.email,
    date,
    messageId: headers.get('Message-ID') ?? '',
    hasAttachments: hasMixedContent(headers),
    problems,
  };
}

// ─── Bodies ──────────────────────────────────────────────────────────

/**
 * Parse a raw RFC 5322 message (headers and body, without the envelope line).
 */
export async function decodeMessage(raw: Buffer): Promise<DecodedMessage> {
  const parser = new PostalMime();
  const parsed = await parser.parse(raw);

  return {
    subject: parsed.subject || '',
    toRecipients: formatAddressList(parsed.to),
    ccRecipients: formatAddressList(parsed.cc),
    bodyText: parsed.text || '',
    bodyHtml: parsed.html || '',
    attachments: (parsed.attachments || []).map((att) => {
      const content = attachmentBytes(att.content);
      return {
        filename: att.filename || 'attachment',
        size: content.length,
        mimeType: att.mimeType || 'application/octet-stream',
        content,
      };
    }),
  };
}

/** The body the results view shows and body search matches against. */
export function displayBody(decoded: Pick<DecodedMessage, 'bodyText' | 'bodyHtml'>): string {
  return decoded.bodyHtml || decoded.bodyText;
}

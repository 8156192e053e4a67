import type { HeaderMap } from './headers';

/**
 * Lightweight index entry for one message. Only headers are kept in memory;
 * the body is read back from the archive by byte range when needed.
 */
export interface MboxMessage {
  index: number;
  /** Byte offset of the "From " envelope line */
  offset: number;
  /** First byte after the envelope line */
  headerOffset: number;
  /** First byte after the blank line that ends the headers */
  bodyOffset: number;
  /** Exclusive end: next envelope line or EOF */
  end: number;
  envelope: string;
  headers: HeaderMap;
  subject: string;
  senderName: string;
  senderEmail: string;
  /** ISO 8601, or '' */
  date: string;
  messageId: string;
  hasAttachments: boolean;
  /** Recoverable parse problems; the message is still searchable */
  problems: string[];
}

/** Which part of a message a search looks at. */
export type SearchField = 'subject' | 'body' | 'both';

export const SEARCH_FIELDS: readonly SearchField[] = ['subject', 'body', 'both'];

/**
 * Compact reference to one indexed message, used in result lists.
 * Carries enough to render a row without reading the body from disk.
 */
export interface MessageSummary {
  /** Position in the message index */
  index: number;
  /** Byte offset of the "From " envelope line */
  offset: number;
  subject: string;
  senderName: string;
  senderEmail: string;
  date: string; // ISO 8601, or '' when the Date header is missing or unparseable
  messageId: string;
  hasAttachments: boolean;
}

/** Full message view, read lazily from the archive when a result is opened. */
export interface MessageDetail extends MessageSummary {
  toRecipients: string;
  ccRecipients: string;
  bodyText: string;
  bodyHtml: string;
  /** HTML part when the message has one, otherwise the text part */
  body: string;
  isHtml: boolean;
  attachments: AttachmentInfo[];
}

/** Attachment metadata (no binary content). */
export interface AttachmentInfo {
  index: number;
  filename: string;
  size: number;
  mimeType: string;
}

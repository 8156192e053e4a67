import {
  formatDateTime,
  formatFileSize,
  truncate,
  type MessageDetail,
  type MessageSummary,
  type SearchField,
} from '@mbox-search/shared';

export interface CliOptions {
  filePath: string;
  caseSensitive: boolean;
  strictBoundaries: boolean;
}

export type MenuAction = SearchField | 'open' | 'exit';

export const MENU_CHOICES: { title: string; value: MenuAction }[] = [
  { title: 'Search in subject', value: 'subject' },
  { title: 'Search in body', value: 'body' },
  { title: 'Search in both', value: 'both' },
  { title: 'Open a message from the last results', value: 'open' },
  { title: 'Exit', value: 'exit' },
];

export function isMenuAction(value: unknown): value is MenuAction {
  return MENU_CHOICES.some((choice) => choice.value === value);
}

export const HELP_TEXT = `
Usage: mbox-search <file> [options]

Options:
  --case-sensitive      Match letter case exactly
  --loose-boundaries    Split on every "From " line outside a header block
  -h, --help            Show this help
`;

/** Returns null when help was asked for */
export function parseArgs(args: string[]): CliOptions | null {
  let filePath: string | undefined;
  let caseSensitive = false;
  let strictBoundaries = true;

  for (const arg of args) {
    if (arg === '-h' || arg === '--help') {
      return null;
    } else if (arg === '--case-sensitive') {
      caseSensitive = true;
    } else if (arg === '--loose-boundaries') {
      strictBoundaries = false;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (filePath === undefined) {
      filePath = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  if (!filePath) {
    throw new Error('mbox-search requires the path of an mbox file');
  }
  return { filePath, caseSensitive, strictBoundaries };
}

export function formatSender(message: Pick<MessageSummary, 'senderName' | 'senderEmail'>): string {
  if (message.senderName && message.senderEmail) {
    return `${message.senderName} <${message.senderEmail}>`;
  }
  return message.senderEmail || message.senderName || 'Unknown';
}

const COLUMNS = { number: 4, date: 16, from: 30, subject: 50 };

function cell(text: string, width: number): string {
  return truncate(text.replace(/\s+/g, ' ').trim(), width).padEnd(width);
}

function row(number: string, date: string, from: string, subject: string): string {
  return [
    cell(number, COLUMNS.number),
    cell(date, COLUMNS.date),
    cell(from, COLUMNS.from),
    cell(subject, COLUMNS.subject),
  ]
    .join('  ')
    .trimEnd();
}

/**
 * Plain-text results table. Rows are numbered from 1 so a message can be
 * opened by its number.
 */
export function formatResultsTable(results: MessageSummary[]): string {
  if (results.length === 0) return 'No results found';

  const lines = [
    `Search Results (${results.length})`,
    row('#', 'Date', 'From', 'Subject'),
    row(
      '-'.repeat(COLUMNS.number),
      '-'.repeat(COLUMNS.date),
      '-'.repeat(COLUMNS.from),
      '-'.repeat(COLUMNS.subject)
    ),
  ];
  results.forEach((message, i) => {
    lines.push(
      row(String(i + 1), formatDateTime(message.date), formatSender(message), message.subject)
    );
  });
  return lines.join('\n');
}

export function formatMessage(detail: MessageDetail): string {
  const lines = [
    `Subject: ${detail.subject || '(no subject)'}`,
    `From:    ${formatSender(detail)}`,
    `Date:    ${formatDateTime(detail.date)}`,
  ];
  if (detail.toRecipients) lines.push(`To:      ${detail.toRecipients}`);
  if (detail.ccRecipients) lines.push(`Cc:      ${detail.ccRecipients}`);
  if (detail.attachments.length > 0) {
    const names = detail.attachments.map((a) => `${a.filename} (${formatFileSize(a.size)})`);
    lines.push(`Files:   ${names.join(', ')}`);
  }
  // Text part first; raw HTML only when there is none
  lines.push('', (detail.bodyText || detail.body).trimEnd());
  return lines.join('\n');
}

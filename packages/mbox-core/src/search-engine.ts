import { SEARCH_FIELDS, type MessageSummary, type SearchField } from '@mbox-search/shared';
import { withMboxFile } from './body-reader';
import logger from './logger';
import { toSummary, type MessageIndexSnapshot } from './message-index';

export interface SearchOptions {
  /** Missing or empty means 'both' */
  field?: SearchField | null | '';
  /** Defaults to false */
  caseSensitive?: boolean;
  /** Stop after this many matches */
  limit?: number;
}

export function normalizeField(field: string | null | undefined): SearchField {
  if (!field) return 'both';
  const lower = field.toLowerCase();
  const known = SEARCH_FIELDS.find((f) => f === lower);
  if (!known) {
    throw new RangeError(`Unknown search field: ${field}`);
  }
  return known;
}

/**
 * Substring search over an index snapshot. Results keep file order.
 *
 * Subject matching only touches the in-memory records. Body matching reads
 * each candidate's body in one forward pass over the archive, through a
 * single file handle; in 'both' mode a subject hit skips the body read.
 * An empty query matches every message.
 */
export async function searchMessages(
  snapshot: MessageIndexSnapshot,
  query: string,
  options: SearchOptions = {}
): Promise<MessageSummary[]> {
  const field = normalizeField(options.field);
  const caseSensitive = options.caseSensitive ?? false;
  const limit = options.limit ?? Number.POSITIVE_INFINITY;
  const results: MessageSummary[] = [];

  if (limit <= 0 || snapshot.size === 0) return results;

  if (!query) {
    for (const message of snapshot) {
      if (results.length >= limit) break;
      results.push(toSummary(message));
    }
    return results;
  }

  const needle = caseSensitive ? query : query.toLowerCase();
  const matches = (text: string) => (caseSensitive ? text : text.toLowerCase()).includes(needle);
  const startTime = Date.now();

  if (field === 'subject') {
    for (const message of snapshot) {
      if (results.length >= limit) break;
      if (matches(message.subject)) results.push(toSummary(message));
    }
  } else {
    await withMboxFile(snapshot.filePath, async (file) => {
      for (const message of snapshot) {
        if (results.length >= limit) break;
        if (field === 'both' && matches(message.subject)) {
          results.push(toSummary(message));
          continue;
        }
        if (matches(await file.readBodyText(message))) {
          results.push(toSummary(message));
        }
      }
    });
  }

  logger.debug('[MBOX] Search finished', {
    field,
    caseSensitive,
    scanned: snapshot.size,
    matches: results.length,
    elapsedMs: Date.now() - startTime,
  });
  return results;
}

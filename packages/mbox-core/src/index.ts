import type { LoadStatus, MessageDetail, MessageSummary, SearchField } from '@mbox-search/shared';
import type { LoaderOptions } from './config';
import type { MboxSession } from './session';
import { MboxWorkspace, type MessageRef } from './workspace';

export { DEFAULT_LOADER_OPTIONS, resolveLoaderOptions, type LoaderOptions } from './config';
export * from './errors';
export { HeaderMap, parseHeaderLines, type HeaderField } from './headers';
export { default as logger, setLogLevel } from './logger';
export { withMboxFile, MboxFile } from './body-reader';
export { loadMbox, type LoadOptions, type LoadOutcome, type LoadResult } from './mbox-loader';
export { MboxScanner, type ScannedMessage } from './mbox-scanner';
export { MessageIndex, MessageIndexSnapshot, toSummary } from './message-index';
export { searchMessages, normalizeField, type SearchOptions } from './search-engine';
export { MboxSession, type LoadListener } from './session';
export type { MboxMessage } from './types';
export { MboxWorkspace, type BeginLoadOptions, type MessageRef } from './workspace';

// Process-wide workspace for single-window front ends
const defaultWorkspace = new MboxWorkspace();

export function beginLoad(
  filePath: string,
  options: Partial<LoaderOptions> = {}
): Promise<MboxSession> {
  return defaultWorkspace.beginLoad(filePath, options);
}

export function cancelLoad(sessionId: string): Promise<LoadStatus> {
  return defaultWorkspace.cancelLoad(sessionId);
}

export function search(
  query: string,
  field?: SearchField | null,
  caseSensitive = false
): Promise<MessageSummary[]> {
  return defaultWorkspace.search(query, field, caseSensitive);
}

export function getBody(ref: MessageRef): Promise<MessageDetail> {
  return defaultWorkspace.getBody(ref);
}

export function closeSession(sessionId: string): Promise<void> {
  return defaultWorkspace.closeSession(sessionId);
}

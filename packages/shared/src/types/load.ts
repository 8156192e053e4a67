/**
 * Lifecycle of one load session.
 * idle → loading → completed | cancelled | failed
 */
export type LoadState = 'idle' | 'loading' | 'completed' | 'cancelled' | 'failed';

export type TerminalLoadState = Extract<LoadState, 'completed' | 'cancelled' | 'failed'>;

export interface LoadProgress {
  bytesRead: number;
  totalBytes: number;
  messageCount: number;
}

export interface LoadErrorInfo {
  code: string;
  message: string;
}

export type LoadEvent =
  | { type: 'progress'; sessionId: string; progress: LoadProgress }
  | { type: 'completed'; sessionId: string; progress: LoadProgress }
  | { type: 'cancelled'; sessionId: string; progress: LoadProgress }
  | { type: 'failed'; sessionId: string; progress: LoadProgress; error: LoadErrorInfo };

export interface LoadStatus {
  sessionId: string;
  filePath: string;
  state: LoadState;
  progress: LoadProgress;
  error?: LoadErrorInfo;
}

export function isTerminalEvent(event: LoadEvent): boolean {
  return event.type !== 'progress';
}

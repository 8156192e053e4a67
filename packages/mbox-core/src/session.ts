import type {
  LoadErrorInfo,
  LoadEvent,
  LoadProgress,
  LoadState,
  LoadStatus,
  MessageDetail,
  TerminalLoadState,
} from '@mbox-search/shared';
import { v4 as uuidv4 } from 'uuid';
import { withMboxFile } from './body-reader';
import { DETAIL_CACHE_SIZE, type LoaderOptions } from './config';
import {
  describeCause,
  InvalidStateError,
  MessageNotFoundError,
  toLoadErrorInfo,
} from './errors';
import logger from './logger';
import { displayBody, type DecodedMessage } from './message-decoder';
import { MessageIndex, toSummary, type MessageIndexSnapshot } from './message-index';
import { loadMbox } from './mbox-loader';

export type LoadListener = (event: LoadEvent) => void;

const TRANSITIONS: Record<LoadState, readonly LoadState[]> = {
  idle: ['loading', 'cancelled'],
  loading: ['completed', 'cancelled', 'failed'],
  completed: [],
  cancelled: [],
  failed: [],
};

function createDeferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * One load of one archive.
 *
 * Owns the MessageIndex being built and is its only writer. Consumers get
 * events through subscribe() and read the index through snapshot(). The
 * terminal event (completed, cancelled or failed) is always the last one a
 * listener sees.
 */
export class MboxSession {
  readonly id: string;
  readonly index: MessageIndex;

  private currentState: LoadState = 'idle';
  private progress: LoadProgress = { bytesRead: 0, totalBytes: 0, messageCount: 0 };
  private error: LoadErrorInfo | undefined;
  private terminalEvent: LoadEvent | null = null;
  private readonly listeners = new Set<LoadListener>();
  private readonly abortController = new AbortController();
  private readonly finished = createDeferred<LoadStatus>();
  /** Decoded bodies, oldest first */
  private readonly detailCache = new Map<number, DecodedMessage>();

  constructor(
    readonly filePath: string,
    private readonly loaderOptions: Partial<LoaderOptions> = {}
  ) {
    this.id = uuidv4();
    this.index = new MessageIndex(filePath);
  }

  get state(): LoadState {
    return this.currentState;
  }

  get status(): LoadStatus {
    const status: LoadStatus = {
      sessionId: this.id,
      filePath: this.filePath,
      state: this.currentState,
      progress: { ...this.progress },
    };
    if (this.error) status.error = { ...this.error };
    return status;
  }

  /** Resolves with the terminal status; never rejects */
  get done(): Promise<LoadStatus> {
    return this.finished.promise;
  }

  start(): Promise<LoadStatus> {
    this.transition('loading');
    void this.run();
    return this.done;
  }

  /** Stop the load at the next chunk boundary. No-op once terminal. */
  cancel(): Promise<LoadStatus> {
    if (this.currentState === 'idle') {
      this.terminate('cancelled');
    } else if (this.currentState === 'loading') {
      this.abortController.abort();
    }
    return this.done;
  }

  /**
   * Receive load events. A listener added after the load ended gets the
   * terminal event straight away.
   */
  subscribe(listener: LoadListener): () => void {
    if (this.terminalEvent) {
      listener(this.terminalEvent);
      return () => undefined;
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): MessageIndexSnapshot {
    return this.index.snapshot();
  }

  async getDetail(index: number): Promise<MessageDetail> {
    const message = this.index.at(index);
    const decoded = await this.decode(index);
    const body = displayBody(decoded);

    return {
      ...toSummary(message),
      subject: message.subject || decoded.subject,
      toRecipients: decoded.toRecipients,
      ccRecipients: decoded.ccRecipients,
      bodyText: decoded.bodyText,
      bodyHtml: decoded.bodyHtml,
      body,
      isHtml: Boolean(decoded.bodyHtml),
      attachments: decoded.attachments.map((att, i) => ({
        index: i,
        filename: att.filename,
        size: att.size,
        mimeType: att.mimeType,
      })),
    };
  }

  async getAttachment(
    index: number,
    attachmentIndex: number
  ): Promise<{ buffer: Buffer; filename: string; mimeType: string }> {
    const decoded = await this.decode(index);
    const att = decoded.attachments[attachmentIndex];
    if (!att) throw new MessageNotFoundError(`attachment ${attachmentIndex} of #${index}`);
    return { buffer: att.content, filename: att.filename, mimeType: att.mimeType };
  }

  /** Drop cached bodies. The index itself goes with the session. */
  clearCache(): void {
    this.detailCache.clear();
  }

  private async decode(index: number): Promise<DecodedMessage> {
    const cached = this.detailCache.get(index);
    if (cached) return cached;

    const message = this.index.at(index);
    const decoded = await withMboxFile(this.filePath, (file) => file.decodeLenient(message));
    this.detailCache.set(index, decoded);

    // Evict the oldest entry
    if (this.detailCache.size > DETAIL_CACHE_SIZE) {
      const oldestKey = this.detailCache.keys().next().value;
      if (oldestKey !== undefined) {
        this.detailCache.delete(oldestKey);
      }
    }
    return decoded;
  }

  private async run(): Promise<void> {
    try {
      const result = await loadMbox(this.filePath, {
        ...this.loaderOptions,
        index: this.index,
        signal: this.abortController.signal,
        onProgress: (progress) => {
          this.progress = progress;
          this.emit({ type: 'progress', sessionId: this.id, progress });
        },
      });
      this.progress = result.progress;
      this.terminate(result.outcome);
    } catch (err) {
      const info = toLoadErrorInfo(err);
      logger.error(`[MBOX] Load failed: ${info.message}`, { sessionId: this.id, code: info.code });
      this.progress = { ...this.progress, messageCount: this.index.size };
      this.terminate('failed', info);
    }
  }

  private transition(next: LoadState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new InvalidStateError(`Cannot go from ${this.currentState} to ${next}`);
    }
    this.currentState = next;
  }

  private terminate(state: TerminalLoadState, error?: LoadErrorInfo): void {
    this.transition(state);
    this.error = error;

    const progress = { ...this.progress };
    let event: LoadEvent;
    if (state === 'failed') {
      event = {
        type: 'failed',
        sessionId: this.id,
        progress,
        error: error ?? { code: 'IO_FAILURE', message: 'Load failed' },
      };
    } else if (state === 'cancelled') {
      event = { type: 'cancelled', sessionId: this.id, progress };
    } else {
      event = { type: 'completed', sessionId: this.id, progress };
    }

    this.emit(event);
    this.terminalEvent = event;
    this.listeners.clear();
    this.finished.resolve(this.status);
  }

  private emit(event: LoadEvent): void {
    if (this.terminalEvent) return;
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (err) {
        logger.error('[MBOX] Load event listener threw', {
          sessionId: this.id,
          error: describeCause(err),
        });
      }
    }
  }
}

import { rm } from 'fs/promises';
import type { LoadStatus, MessageDetail, MessageSummary, SearchField } from '@mbox-search/shared';
import type { LoaderOptions } from './config';
import {
  describeCause,
  MessageNotFoundError,
  NoIndexLoadedError,
  SessionNotFoundError,
} from './errors';
import logger from './logger';
import { searchMessages } from './search-engine';
import { MboxSession } from './session';

/** A search result, or just its index */
export type MessageRef = number | Pick<MessageSummary, 'index' | 'offset'>;

export interface BeginLoadOptions {
  /** Delete the file once its session is replaced or closed (uploads) */
  temporary?: boolean;
}

/**
 * Holds the one active load session. Starting a new load cancels the
 * previous one, waits for it to stop, and replaces its index.
 */
export class MboxWorkspace {
  private current: MboxSession | null = null;
  /** Settles once every replaced or closed session has stopped */
  private stopping: Promise<void> = Promise.resolve();
  private readonly temporaryFiles = new WeakSet<MboxSession>();

  constructor(private readonly loaderOptions: Partial<LoaderOptions> = {}) {}

  get activeSession(): MboxSession | null {
    return this.current;
  }

  async beginLoad(
    filePath: string,
    overrides: Partial<LoaderOptions> = {},
    { temporary = false }: BeginLoadOptions = {}
  ): Promise<MboxSession> {
    const session = new MboxSession(filePath, { ...this.loaderOptions, ...overrides });
    if (temporary) this.temporaryFiles.add(session);
    const previous = this.current;
    this.current = session;

    if (previous) {
      logger.info(`[MBOX] Replacing session ${previous.id}`, { state: previous.state });
      this.retire(previous);
    }
    await this.stopping;

    // Another beginLoad took over while older sessions were stopping; it retired this one
    if (this.current !== session) return session;

    void session.start();
    logger.info(`[MBOX] Session ${session.id} loading ${filePath}`);
    return session;
  }

  async cancelLoad(sessionId: string): Promise<LoadStatus> {
    return this.getSession(sessionId).cancel();
  }

  getStatus(sessionId: string): LoadStatus {
    return this.getSession(sessionId).status;
  }

  getSession(sessionId: string): MboxSession {
    if (!this.current || this.current.id !== sessionId) {
      throw new SessionNotFoundError(sessionId);
    }
    return this.current;
  }

  /**
   * Search the current session: the whole index once loaded, or the prefix
   * loaded so far while loading, cancelled or failed.
   */
  async search(
    query: string,
    field?: SearchField | null,
    caseSensitive = false,
    limit?: number
  ): Promise<MessageSummary[]> {
    const session = this.requireLoaded();
    return searchMessages(session.snapshot(), query, { field, caseSensitive, limit });
  }

  async getBody(ref: MessageRef): Promise<MessageDetail> {
    const session = this.requireLoaded();
    return session.getDetail(this.resolveRef(session, ref));
  }

  async getAttachment(
    ref: MessageRef,
    attachmentIndex: number
  ): Promise<{ buffer: Buffer; filename: string; mimeType: string }> {
    const session = this.requireLoaded();
    return session.getAttachment(this.resolveRef(session, ref), attachmentIndex);
  }

  async closeSession(sessionId: string): Promise<void> {
    const session = this.getSession(sessionId);
    this.current = null;
    this.retire(session);
    await this.stopping;
    logger.info(`[MBOX] Closed session ${sessionId}`);
  }

  /** A load that failed before indexing anything leaves nothing to search */
  private requireLoaded(): MboxSession {
    const session = this.current;
    if (
      !session ||
      session.state === 'idle' ||
      (session.state === 'failed' && session.index.size === 0)
    ) {
      throw new NoIndexLoadedError();
    }
    return session;
  }

  private retire(session: MboxSession): void {
    const stopped = session.cancel().then(async () => {
      session.clearCache();
      if (this.temporaryFiles.has(session)) {
        this.temporaryFiles.delete(session);
        await this.removeFile(session.filePath);
      }
    });
    this.stopping = Promise.all([this.stopping, stopped]).then(() => undefined);
  }

  private async removeFile(filePath: string): Promise<void> {
    try {
      await rm(filePath, { force: true });
      logger.debug(`[MBOX] Removed ${filePath}`);
    } catch (err) {
      logger.warn(`[MBOX] Could not remove ${filePath}`, { error: describeCause(err) });
    }
  }

  /** A reference from an older session is rejected rather than misread */
  private resolveRef(session: MboxSession, ref: MessageRef): number {
    if (typeof ref === 'number') return ref;
    const message = session.index.at(ref.index);
    if (message.offset !== ref.offset) {
      throw new MessageNotFoundError(`#${ref.index} at byte ${ref.offset}`);
    }
    return ref.index;
  }
}

import type { LoadProgress } from '@mbox-search/shared';
import { withMboxFile } from './body-reader';
import { resolveLoaderOptions, type LoaderOptions } from './config';
import { InvalidStateError, IOFailureError } from './errors';
import logger from './logger';
import { buildMessageRecord } from './message-decoder';
import { MessageIndex } from './message-index';
import { MboxScanner, type ScannedMessage } from './mbox-scanner';

export interface LoadOptions extends Partial<LoaderOptions> {
  /** Checked before every chunk; aborting ends the load with outcome 'cancelled' */
  signal?: AbortSignal;
  onProgress?: (progress: LoadProgress) => void;
  /** Empty index to fill; one is created when omitted */
  index?: MessageIndex;
}

export type LoadOutcome = 'completed' | 'cancelled';

export interface LoadResult {
  index: MessageIndex;
  outcome: LoadOutcome;
  progress: LoadProgress;
}

/**
 * Stream an mbox archive into a MessageIndex.
 *
 * The file is read through a single handle in `chunkSize` pieces, so memory
 * stays bounded by the chunk size plus the header records. Bodies are not
 * kept; each record stores the byte range to read them back from.
 *
 * Rejects with IOFailureError when the file cannot be opened or read. In
 * that case, and on cancellation, the index keeps every message that was
 * completely scanned before the stop.
 */
export async function loadMbox(filePath: string, options: LoadOptions = {}): Promise<LoadResult> {
  const settings = resolveLoaderOptions(options);
  const { signal, onProgress } = options;
  const index = options.index ?? new MessageIndex(filePath);

  if (index.filePath !== filePath) {
    throw new InvalidStateError(`Index belongs to ${index.filePath}, not ${filePath}`);
  }
  if (index.size > 0) {
    throw new InvalidStateError('loadMbox needs an empty index');
  }

  logger.info(`[MBOX] Building index for ${filePath}...`);
  const startTime = Date.now();

  return withMboxFile(filePath, async (file) => {
    const totalBytes = await file.size();
    const scanner = new MboxScanner(settings);
    const buf = Buffer.alloc(Math.max(1, Math.min(settings.chunkSize, totalBytes)));

    let filePos = 0;
    let reportedBytes = 0;
    let reportedMessages = 0;

    const progress = (): LoadProgress => ({
      bytesRead: filePos,
      totalBytes,
      messageCount: index.size,
    });

    const report = (force: boolean) => {
      if (filePos <= reportedBytes) return;
      const due =
        force ||
        filePos - reportedBytes >= settings.progressIntervalBytes ||
        index.size - reportedMessages >= settings.progressIntervalMessages;
      if (!due) return;
      reportedBytes = filePos;
      reportedMessages = index.size;
      const snapshot = progress();
      logger.debug('[MBOX] Progress', { ...snapshot });
      onProgress?.(snapshot);
    };

    // A record decoded after an abort is dropped, so a cancelled index is a strict prefix
    const appendAll = async (scanned: ScannedMessage[]) => {
      for (const entry of scanned) {
        const record = await buildMessageRecord(entry, index.size);
        if (signal?.aborted) return;
        index.append(record);
      }
    };

    const stop = (outcome: LoadOutcome): LoadResult => {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      logger.info(
        `[MBOX] ${outcome === 'completed' ? 'Indexed' : 'Cancelled after'} ${index.size} messages in ${elapsed}s`,
        { filePath, bytesRead: filePos, totalBytes }
      );
      return { index, outcome, progress: progress() };
    };

    while (filePos < totalBytes) {
      if (signal?.aborted) return stop('cancelled');

      const toRead = Math.min(buf.length, totalBytes - filePos);
      const bytesRead = await file.readInto(buf, toRead, filePos);
      if (bytesRead === 0) {
        throw new IOFailureError(filePath, `file ended at byte ${filePos} of ${totalBytes}`);
      }
      filePos += bytesRead;

      await appendAll(scanner.feed(buf.subarray(0, bytesRead)));
      report(false);
    }

    if (signal?.aborted) return stop('cancelled');

    await appendAll(scanner.finish());
    if (signal?.aborted) return stop('cancelled');
    if (scanner.preambleBytes > 0) {
      logger.debug(`[MBOX] Skipped ${scanner.preambleBytes} bytes before the first message`);
    }
    report(true);
    return stop('completed');
  });
}

/** Tuning for the streaming loader. Every field has a default. */
export interface LoaderOptions {
  /** Bytes per read from the archive */
  chunkSize: number;
  /** Report progress at least this many bytes apart */
  progressIntervalBytes: number;
  /** ...or at least this many new messages apart, whichever comes first */
  progressIntervalMessages: number;
  /** Header blocks (and single lines) are cut off past this size */
  maxHeaderBytes: number;
  /**
   * true: a "From " line only starts a message at file start or after an
   * empty line. false: any "From " line outside a header block does.
   */
  strictBoundaries: boolean;
}

export const DEFAULT_LOADER_OPTIONS: Readonly<LoaderOptions> = {
  chunkSize: 4 * 1024 * 1024, // 4 MB chunks
  progressIntervalBytes: 8 * 1024 * 1024,
  progressIntervalMessages: 1000,
  maxHeaderBytes: 256 * 1024,
  strictBoundaries: true,
};

/** Maximum number of decoded message bodies kept per session */
export const DETAIL_CACHE_SIZE = 200;

export function resolveLoaderOptions(overrides: Partial<LoaderOptions> = {}): LoaderOptions {
  const merged: LoaderOptions = {
    chunkSize: overrides.chunkSize ?? DEFAULT_LOADER_OPTIONS.chunkSize,
    progressIntervalBytes:
      overrides.progressIntervalBytes ?? DEFAULT_LOADER_OPTIONS.progressIntervalBytes,
    progressIntervalMessages:
      overrides.progressIntervalMessages ?? DEFAULT_LOADER_OPTIONS.progressIntervalMessages,
    maxHeaderBytes: overrides.maxHeaderBytes ?? DEFAULT_LOADER_OPTIONS.maxHeaderBytes,
    strictBoundaries: overrides.strictBoundaries ?? DEFAULT_LOADER_OPTIONS.strictBoundaries,
  };
  if (!Number.isInteger(merged.chunkSize) || merged.chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${merged.chunkSize}`);
  }
  if (merged.maxHeaderBytes < 64) {
    throw new RangeError(`maxHeaderBytes must be at least 64, got ${merged.maxHeaderBytes}`);
  }
  return merged;
}

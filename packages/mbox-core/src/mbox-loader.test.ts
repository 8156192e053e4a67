import type { LoadProgress } from '@mbox-search/shared';
import * as path from 'path';
import PostalMime from 'postal-mime';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { withMboxFile } from './body-reader';
import { InvalidStateError, IOFailureError } from './errors';
import { loadMbox } from './mbox-loader';
import { MessageIndex, toSummary } from './message-index';
import { buildMbox, createTempDir, type FixtureMessage, type TempMbox } from './test-helpers';

const tenMessages: FixtureMessage[] = Array.from({ length: 10 }, (_, i) => ({
  subject: `Status ${i + 1}`,
}));

describe('loadMbox', () => {
  let tmp: TempMbox;

  beforeEach(async () => {
    tmp = await createTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await tmp.cleanup();
  });

  it('indexes one record per message in file order', async () => {
    const { mbox, offsets } = buildMbox([
      { subject: 'Invoice' },
      { subject: 'invoice copy' },
      { subject: 'Meeting' },
    ]);
    const filePath = await tmp.write('inbox.mbox', mbox);
    const total = Buffer.byteLength(mbox);

    const result = await loadMbox(filePath);
    const messages = [...result.index.snapshot()];

    expect(result.outcome).toBe('completed');
    expect(result.progress).toEqual({ bytesRead: total, totalBytes: total, messageCount: 3 });
    expect(messages.map((m) => m.offset)).toEqual(offsets);
    expect(messages.map((m) => m.index)).toEqual([0, 1, 2]);
    expect(messages.map((m) => m.subject)).toEqual(['Invoice', 'invoice copy', 'Meeting']);
    expect(messages[1].senderEmail).toBe('sender2@example.com');
  });

  it('gives the same index for any chunk size', async () => {
    const { mbox } = buildMbox(tenMessages);
    const filePath = await tmp.write('inbox.mbox', mbox);

    const whole = await loadMbox(filePath);
    const tiny = await loadMbox(filePath, { chunkSize: 7 });

    const summaries = (index: MessageIndex) => [...index.snapshot()].map(toSummary);
    expect(summaries(tiny.index)).toEqual(summaries(whole.index));
    expect(tiny.index.size).toBe(10);
  });

  it('is repeatable on an unchanged file', async () => {
    const { mbox } = buildMbox(tenMessages);
    const filePath = await tmp.write('inbox.mbox', mbox);

    const first = await loadMbox(filePath, { chunkSize: 64 });
    const second = await loadMbox(filePath, { chunkSize: 64 });

    expect([...second.index.snapshot()].map((m) => m.headers.toJSON())).toEqual(
      [...first.index.snapshot()].map((m) => m.headers.toJSON())
    );
  });

  it('records byte ranges that read back to the original messages', async () => {
    const fixtures: FixtureMessage[] = [
      { subject: 'First', body: 'alpha' },
      { subject: 'Second', body: 'beta\nFrom the desk of nobody' },
      { subject: 'Third', body: 'gamma' },
    ];
    const { mbox, offsets } = buildMbox(fixtures);
    const bytes = Buffer.from(mbox, 'utf-8');
    const filePath = await tmp.write('inbox.mbox', bytes);

    const { index } = await loadMbox(filePath, { chunkSize: 16 });
    const ends = [...offsets.slice(1), bytes.length];

    await withMboxFile(filePath, async (file) => {
      for (const message of index.snapshot()) {
        const expected = bytes.subarray(offsets[message.index], ends[message.index]);
        expect((await file.readMessageBytes(message)).equals(expected)).toBe(true);
      }
      const body = await file.readBodyBytes(index.at(1));
      expect(body.toString('utf-8')).toBe('beta\nFrom the desk of nobody\n\n');
    });
  });

  it('reports progress with strictly increasing byte counts', async () => {
    const { mbox } = buildMbox(tenMessages);
    const filePath = await tmp.write('inbox.mbox', mbox);
    const total = Buffer.byteLength(mbox);
    const events: LoadProgress[] = [];

    const result = await loadMbox(filePath, {
      chunkSize: 64,
      progressIntervalBytes: 128,
      progressIntervalMessages: 1000,
      onProgress: (p) => events.push(p),
    });

    expect(events).toHaveLength(Math.ceil(total / 128));
    for (let i = 1; i < events.length; i++) {
      expect(events[i].bytesRead).toBeGreaterThan(events[i - 1].bytesRead);
      expect(events[i].messageCount).toBeGreaterThanOrEqual(events[i - 1].messageCount);
    }
    expect(events[events.length - 1]).toMatchObject({ bytesRead: total, totalBytes: total });
    expect(result.progress.messageCount).toBe(10);
  });

  it('reports progress every N messages', async () => {
    const { mbox } = buildMbox(tenMessages);
    const filePath = await tmp.write('inbox.mbox', mbox);
    const counts: number[] = [];

    await loadMbox(filePath, {
      chunkSize: 32,
      progressIntervalBytes: Number.MAX_SAFE_INTEGER,
      progressIntervalMessages: 5,
      onProgress: (p) => counts.push(p.messageCount),
    });

    expect(counts).toEqual([5, 10]);
  });

  it('keeps a valid prefix when cancelled', async () => {
    const { mbox } = buildMbox(tenMessages);
    const filePath = await tmp.write('inbox.mbox', mbox);
    const full = await loadMbox(filePath);

    const controller = new AbortController();
    const result = await loadMbox(filePath, {
      chunkSize: 64,
      progressIntervalBytes: 64,
      signal: controller.signal,
      onProgress: (p) => {
        if (p.messageCount >= 2) controller.abort();
      },
    });

    expect(result.outcome).toBe('cancelled');
    expect(result.index.size).toBeGreaterThanOrEqual(2);
    expect(result.index.size).toBeLessThan(10);
    const prefix = [...full.index.snapshot()].slice(0, result.index.size).map(toSummary);
    expect([...result.index.snapshot()].map(toSummary)).toEqual(prefix);
  });

  it('drops the last record when cancelled while decoding it', async () => {
    const { mbox } = buildMbox(tenMessages.slice(0, 2));
    const filePath = await tmp.write('inbox.mbox', mbox);
    const parse = vi.spyOn(PostalMime.prototype, 'parse');
    const controller = new AbortController();
    let armed = false;

    const result = await loadMbox(filePath, {
      progressIntervalBytes: 1,
      signal: controller.signal,
      onProgress: () => {
        if (armed) return;
        armed = true;
        parse.mockImplementationOnce(() => {
          controller.abort();
          return Promise.reject(new Error('interrupted'));
        });
      },
    });

    expect(result.outcome).toBe('cancelled');
    expect([...result.index.snapshot()].map((m) => m.subject)).toEqual(['Status 1']);
    expect(result.progress.messageCount).toBe(1);
  });

  it('stops before reading when the signal is already aborted', async () => {
    const { mbox } = buildMbox(tenMessages);
    const filePath = await tmp.write('inbox.mbox', mbox);
    const controller = new AbortController();
    controller.abort();

    const result = await loadMbox(filePath, { signal: controller.signal });

    expect(result.outcome).toBe('cancelled');
    expect(result.index.size).toBe(0);
    expect(result.progress.bytesRead).toBe(0);
  });

  it('completes with no messages for an empty file', async () => {
    const filePath = await tmp.write('empty.mbox', '');
    const events: LoadProgress[] = [];

    const result = await loadMbox(filePath, { onProgress: (p) => events.push(p) });

    expect(result.outcome).toBe('completed');
    expect(result.index.size).toBe(0);
    expect(events).toEqual([]);
  });

  it('completes with no messages when there is no envelope line', async () => {
    const filePath = await tmp.write('notes.txt', 'just some text\nwith no mail\n');
    const result = await loadMbox(filePath);
    expect(result.outcome).toBe('completed');
    expect(result.index.size).toBe(0);
  });

  it('rejects with IOFailureError when the file is missing', async () => {
    const missing = path.join(tmp.dir, 'missing.mbox');
    const err = await loadMbox(missing).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(IOFailureError);
    expect(err).toMatchObject({ code: 'IO_FAILURE', filePath: missing });
  });

  it('refuses an index that already holds messages', async () => {
    const { mbox } = buildMbox(tenMessages.slice(0, 2));
    const filePath = await tmp.write('inbox.mbox', mbox);
    const { index } = await loadMbox(filePath);

    await expect(loadMbox(filePath, { index })).rejects.toBeInstanceOf(InvalidStateError);
  });

  it('refuses an index built for another file', async () => {
    const filePath = await tmp.write('inbox.mbox', '');
    const index = new MessageIndex(path.join(tmp.dir, 'other.mbox'));
    await expect(loadMbox(filePath, { index })).rejects.toBeInstanceOf(InvalidStateError);
  });
});

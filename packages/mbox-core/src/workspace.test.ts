import { access } from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MboxFile } from './body-reader';
import {
  IOFailureError,
  MessageNotFoundError,
  NoIndexLoadedError,
  SessionNotFoundError,
} from './errors';
import { buildMbox, createTempDir, type TempMbox } from './test-helpers';
import { MboxWorkspace } from './workspace';

describe('MboxWorkspace', () => {
  let tmp: TempMbox;
  let inbox: string;
  let archive: string;

  beforeEach(async () => {
    tmp = await createTempDir();
    inbox = await tmp.write(
      'inbox.mbox',
      buildMbox([{ subject: 'Invoice' }, { subject: 'invoice copy' }, { subject: 'Meeting' }]).mbox
    );
    archive = await tmp.write(
      'archive.mbox',
      buildMbox([{ subject: 'Old invoice' }, { subject: 'Holiday plans' }]).mbox
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await tmp.cleanup();
  });

  it('refuses to search before anything is loaded', async () => {
    const workspace = new MboxWorkspace();
    await expect(workspace.search('invoice')).rejects.toBeInstanceOf(NoIndexLoadedError);
    await expect(workspace.getBody(0)).rejects.toBeInstanceOf(NoIndexLoadedError);
  });

  it('searches the loaded archive', async () => {
    const workspace = new MboxWorkspace();
    const session = await workspace.beginLoad(inbox);
    await session.done;

    const results = await workspace.search('invoice', 'subject');
    expect(results.map((r) => r.subject)).toEqual(['Invoice', 'invoice copy']);
    expect(workspace.getStatus(session.id).state).toBe('completed');
  });

  it('replaces the active session on a new load', async () => {
    const workspace = new MboxWorkspace({ chunkSize: 16 });
    const first = await workspace.beginLoad(inbox);
    const second = await workspace.beginLoad(archive);

    expect(first.state).toBe('cancelled');
    expect(first.index.size).toBe(0);
    expect(workspace.activeSession).toBe(second);
    expect(() => workspace.getSession(first.id)).toThrow(SessionNotFoundError);

    await second.done;
    const results = await workspace.search('invoice');
    expect(results.map((r) => r.subject)).toEqual(['Old invoice']);
  });

  it('applies per-load option overrides', async () => {
    const workspace = new MboxWorkspace();
    const session = await workspace.beginLoad(inbox, { chunkSize: 8, progressIntervalBytes: 8 });
    const counts: number[] = [];
    session.subscribe((e) => counts.push(e.progress.bytesRead));
    await session.done;

    expect(counts.length).toBeGreaterThan(10);
  });

  it('opens a message by index or by search result', async () => {
    const workspace = new MboxWorkspace();
    await (await workspace.beginLoad(inbox)).done;
    const [hit] = await workspace.search('meeting', 'subject');

    const byRef = await workspace.getBody(hit);
    const byIndex = await workspace.getBody(2);

    expect(byRef.subject).toBe('Meeting');
    expect(byIndex.bodyText.trim()).toBe('Body of message 3');
  });

  it('rejects a search result from another archive', async () => {
    const workspace = new MboxWorkspace();
    await (await workspace.beginLoad(inbox)).done;
    const [, second] = await workspace.search('', null);

    await (await workspace.beginLoad(archive)).done;

    await expect(workspace.getBody(second)).rejects.toBeInstanceOf(MessageNotFoundError);
  });

  it('cancels and closes sessions by id', async () => {
    const workspace = new MboxWorkspace();
    const session = await workspace.beginLoad(inbox);
    await session.done;

    await expect(workspace.cancelLoad('nope')).rejects.toBeInstanceOf(SessionNotFoundError);
    expect((await workspace.cancelLoad(session.id)).state).toBe('completed');

    await workspace.closeSession(session.id);
    expect(workspace.activeSession).toBeNull();
    await expect(workspace.search('')).rejects.toBeInstanceOf(NoIndexLoadedError);
  });

  it('refuses to search a load that failed before indexing anything', async () => {
    const workspace = new MboxWorkspace();
    const session = await workspace.beginLoad(`${inbox}.missing`);
    const status = await session.done;

    expect(status.state).toBe('failed');
    expect(status.error?.code).toBe('IO_FAILURE');
    await expect(workspace.search('')).rejects.toBeInstanceOf(NoIndexLoadedError);
  });

  it('searches the loaded prefix of a failed load', async () => {
    const readInto = vi.spyOn(MboxFile.prototype, 'readInto');
    const workspace = new MboxWorkspace({ chunkSize: 64, progressIntervalBytes: 64 });
    const session = await workspace.beginLoad(inbox);
    let broken = false;
    session.subscribe((event) => {
      if (event.type === 'progress' && event.progress.messageCount > 0 && !broken) {
        broken = true;
        readInto.mockRejectedValueOnce(new IOFailureError(inbox, 'disk gone'));
      }
    });

    const status = await session.done;
    const results = await workspace.search('');

    expect(status.state).toBe('failed');
    expect(status.error?.message).toBe(`Cannot read ${inbox}: disk gone`);
    expect(session.index.size).toBeGreaterThan(0);
    expect(session.index.size).toBeLessThan(3);
    expect(results.map((r) => r.subject)).toEqual(
      ['Invoice', 'invoice copy', 'Meeting'].slice(0, session.index.size)
    );
  });

  it('never runs two loads at once', async () => {
    const big = await tmp.write(
      'big.mbox',
      buildMbox(Array.from({ length: 200 }, (_, i) => ({ subject: `Bulk ${i + 1}` }))).mbox
    );
    const workspace = new MboxWorkspace({ chunkSize: 64 });

    const first = await workspace.beginLoad(big);
    const pendingSecond = workspace.beginLoad(big);
    const third = await workspace.beginLoad(big);
    const second = await pendingSecond;

    expect(first.state).toBe('cancelled');
    expect(second.state).toBe('cancelled');
    expect(second.status.progress.bytesRead).toBe(0);
    expect(third.state).toBe('loading');
    expect(workspace.activeSession).toBe(third);

    const status = await third.done;
    expect(status.state).toBe('completed');
    expect(third.index.size).toBe(200);
  });

  it('removes a temporary file once its session is replaced', async () => {
    const upload = await tmp.write('upload.mbox', buildMbox([{ subject: 'Uploaded' }]).mbox);
    const workspace = new MboxWorkspace();
    const session = await workspace.beginLoad(upload, {}, { temporary: true });
    await session.done;

    await (await workspace.beginLoad(inbox)).done;

    await expect(access(upload)).rejects.toMatchObject({ code: 'ENOENT' });
    await expect(access(inbox)).resolves.toBeUndefined();
  });

  it('removes a temporary file when its session is closed', async () => {
    const upload = await tmp.write('upload.mbox', buildMbox([{ subject: 'Uploaded' }]).mbox);
    const workspace = new MboxWorkspace();
    const session = await workspace.beginLoad(upload, {}, { temporary: true });
    await session.done;

    await workspace.closeSession(session.id);

    await expect(access(upload)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});

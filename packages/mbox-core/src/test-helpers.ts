import { mkdtemp, rm, writeFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

export interface FixtureMessage {
  subject?: string;
  from?: string;
  date?: string;
  body?: string;
  /** Extra raw header lines, written after the standard ones */
  headers?: string[];
  /** Envelope sender on the "From " line */
  envelopeSender?: string;
}

export function renderMessage(m: FixtureMessage, i: number, eol = '\n'): string {
  const lines = [
    `From ${m.envelopeSender ?? `sender${i + 1}@example.com`} Thu Jan  4 10:0${i % 10}:00 2024`,
    `From: ${m.from ?? `Sender ${i + 1} <sender${i + 1}@example.com>`}`,
    `Subject: ${m.subject ?? `Message ${i + 1}`}`,
    `Date: ${m.date ?? `Thu, 04 Jan 2024 10:0${i % 10}:00 +0000`}`,
    `Message-ID: <msg${i + 1}@example.com>`,
    ...(m.headers ?? []),
    '',
    m.body ?? `Body of message ${i + 1}`,
    '',
  ];
  return lines.join(eol) + eol;
}

/**
 * Render messages as a classic mbox: envelope line, headers, blank line,
 * body, and a blank separator line before the next envelope. Also returns
 * the byte offset of every envelope line.
 */
export function buildMbox(
  messages: FixtureMessage[],
  eol = '\n'
): { mbox: string; offsets: number[] } {
  const offsets: number[] = [];
  let mbox = '';
  messages.forEach((m, i) => {
    offsets.push(Buffer.byteLength(mbox, 'utf-8'));
    mbox += renderMessage(m, i, eol);
  });
  return { mbox, offsets };
}

export interface TempMbox {
  dir: string;
  write(name: string, contents: string | Buffer): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createTempDir(): Promise<TempMbox> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'mbox-search-'));
  return {
    dir,
    async write(name, contents) {
      const filePath = path.join(dir, name);
      await writeFile(filePath, contents);
      return filePath;
    },
    async cleanup() {
      await rm(dir, { recursive: true, force: true });
    },
  };
}

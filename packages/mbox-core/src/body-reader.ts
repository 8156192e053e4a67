import { open, type FileHandle } from 'fs/promises';
import { describeCause, IOFailureError, MboxError } from './errors';
import logger from './logger';
import { decodeMessage, displayBody, type DecodedMessage } from './message-decoder';
import type { MboxMessage } from './types';

type ByteRange = Pick<MboxMessage, 'offset' | 'headerOffset' | 'bodyOffset' | 'end'>;

/**
 * Read-only access to an archive by byte range. Only obtained through
 * withMboxFile, which owns the file handle.
 */
export class MboxFile {
  constructor(
    readonly filePath: string,
    private readonly handle: FileHandle
  ) {}

  async size(): Promise<number> {
    try {
      return (await this.handle.stat()).size;
    } catch (err) {
      throw new IOFailureError(this.filePath, err);
    }
  }

  /** Fill up to `length` bytes of `buf` from `position`; returns the count read. */
  async readInto(buf: Buffer, length: number, position: number): Promise<number> {
    try {
      const { bytesRead } = await this.handle.read(buf, 0, length, position);
      return bytesRead;
    } catch (err) {
      throw new IOFailureError(this.filePath, err);
    }
  }

  async readRange(start: number, end: number): Promise<Buffer> {
    const length = Math.max(0, end - start);
    const buf = Buffer.alloc(length);
    let filled = 0;
    try {
      while (filled < length) {
        const { bytesRead } = await this.handle.read(buf, filled, length - filled, start + filled);
        if (bytesRead === 0) break;
        filled += bytesRead;
      }
    } catch (err) {
      throw new IOFailureError(this.filePath, err);
    }
    if (filled < length) {
      throw new IOFailureError(
        this.filePath,
        `expected ${length} bytes at offset ${start}, file ended after ${filled}`
      );
    }
    return buf;
  }

  /** Everything from the envelope line up to the next one */
  readMessageBytes(message: ByteRange): Promise<Buffer> {
    return this.readRange(message.offset, message.end);
  }

  readBodyBytes(message: ByteRange): Promise<Buffer> {
    return this.readRange(message.bodyOffset, message.end);
  }

  async decode(message: ByteRange): Promise<DecodedMessage> {
    return decodeMessage(await this.readRange(message.headerOffset, message.end));
  }

  /**
   * Like decode, but a message postal-mime cannot parse comes back as its
   * raw body text. Read errors still reject.
   */
  async decodeLenient(message: ByteRange): Promise<DecodedMessage> {
    try {
      return await this.decode(message);
    } catch (err) {
      if (err instanceof MboxError) throw err;
      logger.warn('[MBOX] Could not decode message, using raw body', {
        offset: message.offset,
        error: describeCause(err),
      });
      return {
        subject: '',
        toRecipients: '',
        ccRecipients: '',
        bodyText: (await this.readBodyBytes(message)).toString('utf-8'),
        bodyHtml: '',
        attachments: [],
      };
    }
  }

  /** The body search matches against: HTML part if any, else text */
  async readBodyText(message: ByteRange): Promise<string> {
    return displayBody(await this.decodeLenient(message));
  }
}

/**
 * Open `filePath` for the duration of `fn`. The handle is closed however
 * `fn` finishes.
 */
export async function withMboxFile<T>(
  filePath: string,
  fn: (file: MboxFile) => Promise<T>
): Promise<T> {
  let handle: FileHandle;
  try {
    handle = await open(filePath, 'r');
  } catch (err) {
    throw new IOFailureError(filePath, err);
  }
  try {
    return await fn(new MboxFile(filePath, handle));
  } finally {
    await handle.close();
  }
}

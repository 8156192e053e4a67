import type { MessageSummary } from '@mbox-search/shared';
import { InvalidStateError, MessageNotFoundError } from './errors';
import type { MboxMessage } from './types';

export function toSummary(message: MboxMessage): MessageSummary {
  return {
    index: message.index,
    offset: message.offset,
    subject: message.subject,
    senderName: message.senderName,
    senderEmail: message.senderEmail,
    date: message.date,
    messageId: message.messageId,
    hasAttachments: message.hasAttachments,
  };
}

/**
 * Fixed-length, read-only view over the prefix of an index. Appends made
 * after the snapshot was taken are not visible through it.
 */
export class MessageIndexSnapshot implements Iterable<MboxMessage> {
  constructor(
    readonly filePath: string,
    private readonly messages: readonly MboxMessage[],
    readonly size: number
  ) {}

  at(index: number): MboxMessage {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new MessageNotFoundError(`#${index}`);
    }
    return this.messages[index];
  }

  *[Symbol.iterator](): Iterator<MboxMessage> {
    for (let i = 0; i < this.size; i++) {
      yield this.messages[i];
    }
  }
}

/**
 * Messages of one archive in file order. Append-only: a cancelled or failed
 * load leaves the records appended so far untouched.
 */
export class MessageIndex {
  private readonly messages: MboxMessage[] = [];

  constructor(readonly filePath: string) {}

  get size(): number {
    return this.messages.length;
  }

  /** Offset of the last appended message, or -1 */
  get lastOffset(): number {
    const last = this.messages[this.messages.length - 1];
    return last ? last.offset : -1;
  }

  append(message: MboxMessage): void {
    if (message.index !== this.messages.length) {
      throw new InvalidStateError(
        `Expected message #${this.messages.length}, got #${message.index}`
      );
    }
    if (message.offset <= this.lastOffset) {
      throw new InvalidStateError(
        `Message offsets must increase: ${message.offset} after ${this.lastOffset}`
      );
    }
    this.messages.push(message);
  }

  at(index: number): MboxMessage {
    return this.snapshot().at(index);
  }

  snapshot(): MessageIndexSnapshot {
    return new MessageIndexSnapshot(this.filePath, this.messages, this.messages.length);
  }
}

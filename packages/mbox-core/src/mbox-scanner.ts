const LF = 0x0a;
const CR = 0x0d;
/** "From " */
const FROM_MARKER = Buffer.from('From ');

/**
 * Byte layout of one message inside the archive.
 *
 *   offset        "From sender date\n"      (envelope line)
 *   headerOffset  "Subject: ...\n" ... "\n"
 *   bodyOffset    body bytes ...
 *   end           next envelope line, or EOF
 */
export interface ScannedMessage {
  offset: number;
  headerOffset: number;
  bodyOffset: number;
  end: number;
  /** Envelope line text after "From " */
  envelope: string;
  /** Raw header lines, line terminators stripped, not yet unfolded */
  headerLines: string[];
  problems: string[];
}

export interface ScannerOptions {
  strictBoundaries: boolean;
  maxHeaderBytes: number;
}

interface OpenMessage {
  offset: number;
  headerOffset: number;
  /** null while still inside the header block */
  bodyOffset: number | null;
  envelope: string;
  headerLines: string[];
  headerBytes: number;
  problems: string[];
}

function startsWithFrom(line: Buffer): boolean {
  if (line.length < FROM_MARKER.length) return false;
  for (let i = 0; i < FROM_MARKER.length; i++) {
    if (line[i] !== FROM_MARKER[i]) return false;
  }
  return true;
}

function decodeLine(line: Buffer): string {
  const end = line.length > 0 && line[line.length - 1] === CR ? line.length - 1 : line.length;
  return line.toString('utf-8', 0, end);
}

/**
 * Incremental mbox splitter. Feed it consecutive chunks of the file; it
 * returns every message whose end has been seen. A line that straddles two
 * chunks is carried over (only its first `maxHeaderBytes` bytes are kept, which
 * is all the boundary and header checks need).
 */
export class MboxScanner {
  private position = 0;
  private lineStart = 0;
  private pendingParts: Buffer[] = [];
  private pendingKept = 0;
  private pendingLength = 0;
  /** File start counts as following an empty line */
  private previousBlank = true;
  private current: OpenMessage | null = null;
  private skipped = 0;

  constructor(private readonly options: ScannerOptions) {}

  /** Bytes consumed so far */
  get bytesScanned(): number {
    return this.position;
  }

  /** Bytes before the first envelope line, which belong to no message */
  get preambleBytes(): number {
    return this.skipped;
  }

  feed(chunk: Buffer): ScannedMessage[] {
    const finished: ScannedMessage[] = [];
    let pos = 0;

    while (pos < chunk.length) {
      const nl = chunk.indexOf(LF, pos);
      if (nl === -1) {
        this.keepPartial(chunk.subarray(pos));
        break;
      }

      const segment = chunk.subarray(pos, nl);
      let line: Buffer;
      let length: number;
      if (this.pendingLength > 0) {
        this.keepPartial(segment);
        line = Buffer.concat(this.pendingParts, this.pendingKept);
        length = this.pendingLength;
      } else {
        line = segment.subarray(0, this.options.maxHeaderBytes);
        length = segment.length;
      }

      const nextLineStart = this.position + nl + 1;
      this.handleLine(line, length, nextLineStart, finished);
      this.resetPending(nextLineStart);
      pos = nl + 1;
    }

    this.position += chunk.length;
    return finished;
  }

  /** Call once at end of file to flush the last line and message. */
  finish(): ScannedMessage[] {
    const finished: ScannedMessage[] = [];
    if (this.pendingLength > 0) {
      const line = Buffer.concat(this.pendingParts, this.pendingKept);
      this.handleLine(line, this.pendingLength, this.position, finished);
      this.resetPending(this.position);
    }
    if (this.current) {
      finished.push(this.close(this.position));
    }
    return finished;
  }

  private keepPartial(segment: Buffer): void {
    this.pendingLength += segment.length;
    const room = this.options.maxHeaderBytes - this.pendingKept;
    if (room > 0 && segment.length > 0) {
      // Copy: the caller may reuse the chunk buffer
      const kept = Buffer.from(segment.subarray(0, room));
      this.pendingParts.push(kept);
      this.pendingKept += kept.length;
    }
  }

  private resetPending(nextLineStart: number): void {
    this.lineStart = nextLineStart;
    this.pendingParts = [];
    this.pendingKept = 0;
    this.pendingLength = 0;
  }

  private isBoundary(line: Buffer): boolean {
    if (!startsWithFrom(line)) return false;
    // The first envelope line opens the mailbox even after stray preamble bytes
    if (this.previousBlank || this.current === null) return true;
    if (this.options.strictBoundaries) return false;
    // Relaxed rule: any "From " line outside a header block
    return this.current.bodyOffset !== null;
  }

  private handleLine(
    line: Buffer,
    length: number,
    nextLineStart: number,
    finished: ScannedMessage[]
  ): void {
    const lineStart = this.lineStart;
    const blank = length === 0 || (length === 1 && line[0] === CR);

    if (this.isBoundary(line)) {
      if (this.current) {
        finished.push(this.close(lineStart));
      }
      this.current = {
        offset: lineStart,
        headerOffset: nextLineStart,
        bodyOffset: null,
        envelope: decodeLine(line).slice(FROM_MARKER.length).trim(),
        headerLines: [],
        headerBytes: 0,
        problems: [],
      };
    } else if (this.current) {
      const msg = this.current;
      if (msg.bodyOffset === null) {
        if (blank) {
          msg.bodyOffset = nextLineStart;
        } else if (msg.headerBytes + length > this.options.maxHeaderBytes) {
          msg.problems.push(`header block exceeds ${this.options.maxHeaderBytes} bytes`);
          msg.bodyOffset = lineStart;
        } else {
          msg.headerLines.push(decodeLine(line));
          msg.headerBytes += length;
        }
      }
    } else {
      this.skipped += nextLineStart - lineStart;
    }

    this.previousBlank = blank;
  }

  private close(end: number): ScannedMessage {
    const msg = this.current;
    if (!msg) {
      throw new Error('MboxScanner.close called with no open message');
    }
    this.current = null;
    return {
      offset: msg.offset,
      headerOffset: Math.min(msg.headerOffset, end),
      bodyOffset: Math.min(msg.bodyOffset ?? end, end),
      end,
      envelope: msg.envelope,
      headerLines: msg.headerLines,
      problems: msg.problems,
    };
  }
}

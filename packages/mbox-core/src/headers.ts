export interface HeaderField {
  /** Header name as written in the message */
  name: string;
  /** Unfolded raw value, not decoded */
  value: string;
}

/**
 * Case-insensitive header multimap. Repeated headers (Received, X-Gmail-Labels
 * and friends) are all kept, in the order they appear in the message.
 */
export class HeaderMap implements Iterable<HeaderField> {
  private readonly fields: HeaderField[] = [];

  add(name: string, value: string): void {
    this.fields.push({ name, value });
  }

  /** First occurrence of `name` */
  get(name: string): string | undefined {
    const key = name.toLowerCase();
    return this.fields.find((f) => f.name.toLowerCase() === key)?.value;
  }

  getAll(name: string): string[] {
    const key = name.toLowerCase();
    return this.fields.filter((f) => f.name.toLowerCase() === key).map((f) => f.value);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  get size(): number {
    return this.fields.length;
  }

  /** Appends folded text to the most recently added header. */
  appendToLast(text: string): boolean {
    const last = this.fields[this.fields.length - 1];
    if (!last) return false;
    last.value = last.value ? `${last.value} ${text}` : text;
    return true;
  }

  [Symbol.iterator](): Iterator<HeaderField> {
    return this.fields.map((f) => ({ ...f }))[Symbol.iterator]();
  }

  toJSON(): HeaderField[] {
    return this.fields.map((f) => ({ ...f }));
  }
}

export interface ParsedHeaderBlock {
  headers: HeaderMap;
  problems: string[];
}

function isContinuation(line: string): boolean {
  return line.startsWith(' ') || line.startsWith('\t');
}

/**
 * Parse raw header lines (no line terminators) into a HeaderMap.
 * Continuation lines are folded into the previous header with one space,
 * matching how list views show them. Lines that are neither a header nor a
 * continuation are reported as problems and skipped.
 */
export function parseHeaderLines(lines: readonly string[]): ParsedHeaderBlock {
  const headers = new HeaderMap();
  const problems: string[] = [];

  for (const line of lines) {
    if (isContinuation(line)) {
      const text = line.trim();
      if (!text) continue;
      if (!headers.appendToLast(text)) {
        problems.push('continuation line before the first header');
      }
      continue;
    }

    const colon = line.indexOf(':');
    const name = colon > 0 ? line.slice(0, colon).trim() : '';
    if (!name || /\s/.test(name)) {
      problems.push(`header line without a name: "${line.slice(0, 60)}"`);
      continue;
    }
    headers.add(name, line.slice(colon + 1).trim());
  }

  return { headers, problems };
}

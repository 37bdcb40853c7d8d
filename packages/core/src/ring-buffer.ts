/**
 * Sliding-window line retention for long text streams (job logs and the
 * like): keeps the last N lines of a stream in a fixed circular buffer and
 * counts every line seen, so callers can report "last N of TOTAL lines".
 */

import { LogReadError } from "./errors.js";

/** Per-line ceiling, in UTF-8 bytes. */
export const MAX_LINE_LENGTH = 10 * 1024 * 1024;
/** Upper bound on `maxLines`. */
export const MAX_RETAINED_LINES = 100_000;
export const LINE_TRUNCATED_MARKER = "[LINE TRUNCATED - exceeded maximum line length of 10MB]";

const TRUNCATED_PREFIX_LENGTH = 1000;
const TRUNCATED_SUFFIX = "... [TRUNCATED]";

export type LineSource = AsyncIterable<Uint8Array | string>;

export interface RingBufferResult {
  /** Retained lines, oldest first, joined with "\n" */
  content: string;
  /** Every line observed, including the ones overwritten */
  totalLines: number;
}

export interface RingBufferOptions {
  /** Override the per-line ceiling. */
  maxLineLength?: number;
}

class LineRing {
  private readonly lines: string[];
  private readonly valid: boolean[];
  private writeIndex = 0;
  totalLines = 0;

  constructor(private readonly capacity: number) {
    this.lines = new Array<string>(capacity).fill("");
    this.valid = new Array<boolean>(capacity).fill(false);
  }

  push(line: string): void {
    this.lines[this.writeIndex] = line;
    this.valid[this.writeIndex] = true;
    this.writeIndex = (this.writeIndex + 1) % this.capacity;
    this.totalLines++;
  }

  join(): string {
    const count = Math.min(this.totalLines, this.capacity);
    const start = this.totalLines > this.capacity ? this.writeIndex : 0;
    const result: string[] = [];
    for (let i = 0; i < count; i++) {
      const idx = (start + i) % this.capacity;
      const line = this.lines[idx];
      if (this.valid[idx] && line !== undefined) {
        result.push(line);
      }
    }
    return result.join("\n");
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

// A UTF-16 code unit encodes to between one and three UTF-8 bytes.
function exceedsBytes(text: string, limit: number): boolean {
  if (text.length > limit) return true;
  if (text.length * 3 <= limit) return false;
  return Buffer.byteLength(text, "utf8") > limit;
}

function clampCapacity(maxLines: number): number {
  if (!Number.isFinite(maxLines) || maxLines < 1) return 1;
  return Math.min(Math.floor(maxLines), MAX_RETAINED_LINES);
}

/**
 * Read `stream` to the end, keeping only the last `maxLines` lines.
 *
 * Lines are split on "\n" (a trailing "\r" is dropped). The ceiling is
 * measured in UTF-8 bytes. The first line longer than it is recorded as
 * {@link LINE_TRUNCATED_MARKER} and reading continues in a slower pass that caps how much of each further
 * line it holds; over-long lines there keep their first 1000 characters.
 */
export async function processAsRingBuffer(
  stream: LineSource,
  maxLines: number,
  options: RingBufferOptions = {},
): Promise<RingBufferResult> {
  const maxLineLength = options.maxLineLength ?? MAX_LINE_LENGTH;
  const ring = new LineRing(clampCapacity(maxLines));
  const decoder = new TextDecoder();
  const iterator = stream[Symbol.asyncIterator]();

  let pending = "";

  try {
    for (;;) {
      const next = await iterator.next();
      if (next.done) break;

      pending += typeof next.value === "string"
        ? next.value
        : decoder.decode(next.value, { stream: true });

      let newline = pending.indexOf("\n");
      while (newline !== -1) {
        const line = pending.slice(0, newline);
        const rest = pending.slice(newline + 1);
        if (exceedsBytes(line, maxLineLength)) {
          ring.push(LINE_TRUNCATED_MARKER);
          await processLongLines(iterator, decoder, ring, rest, false, maxLineLength);
          return { content: ring.join(), totalLines: ring.totalLines };
        }
        ring.push(stripCarriageReturn(line));
        pending = rest;
        newline = pending.indexOf("\n");
      }

      if (exceedsBytes(pending, maxLineLength)) {
        ring.push(LINE_TRUNCATED_MARKER);
        await processLongLines(iterator, decoder, ring, "", true, maxLineLength);
        return { content: ring.join(), totalLines: ring.totalLines };
      }
    }

    pending += decoder.decode();
  } catch (err) {
    if (err instanceof LogReadError) throw err;
    throw new LogReadError(err);
  }

  if (pending.length > 0) {
    ring.push(stripCarriageReturn(pending));
  }

  return { content: ring.join(), totalLines: ring.totalLines };
}

/**
 * Fallback pass once an over-long line has been seen. Never holds more than
 * the ceiling plus the display prefix for any one line.
 *
 * `skipping` is true while the rest of the line that triggered the fallback
 * is still being consumed.
 */
async function processLongLines(
  iterator: AsyncIterator<Uint8Array | string>,
  decoder: InstanceType<typeof TextDecoder>,
  ring: LineRing,
  initial: string,
  skipping: boolean,
  maxLineLength: number,
): Promise<void> {
  const holdLimit = maxLineLength + TRUNCATED_PREFIX_LENGTH;
  let current = "";
  let currentLength = 0;

  const finishLine = (): void => {
    if (skipping) {
      skipping = false;
    } else {
      const line = currentLength > maxLineLength
        ? current.slice(0, TRUNCATED_PREFIX_LENGTH) + TRUNCATED_SUFFIX
        : stripCarriageReturn(current);
      ring.push(line);
    }
    current = "";
    currentLength = 0;
  };

  const consume = (text: string): void => {
    let start = 0;
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) !== 10) continue;
      append(text.slice(start, i));
      finishLine();
      start = i + 1;
    }
    append(text.slice(start));
  };

  const append = (piece: string): void => {
    if (skipping || piece.length === 0) return;
    if (current.length < holdLimit) {
      current += piece.slice(0, holdLimit - current.length);
    }
    currentLength += Buffer.byteLength(piece, "utf8");
  };

  try {
    consume(initial);
    for (;;) {
      const next = await iterator.next();
      if (next.done) break;
      consume(typeof next.value === "string" ? next.value : decoder.decode(next.value, { stream: true }));
    }
    consume(decoder.decode());
  } catch (err) {
    throw new LogReadError(err);
  }

  if (!skipping && currentLength > 0) {
    finishLine();
  }
}

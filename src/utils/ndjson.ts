/**
 * NDJSON (Newline-Delimited JSON) framing for the TCP control channel.
 *
 * Requests and responses are one JSON object per line. Data arrives in
 * arbitrary chunks that may split a line or a UTF-8 multi-byte character, so
 * the line buffer keeps the partial tail between reads.
 */

/**
 * Serialize a value to an NDJSON line (JSON + newline delimiter).
 */
export function serializeNDJSON(value: unknown): string {
  return `${JSON.stringify(value)}\n`;
}

export type NDJSONFrame =
  | { kind: "line"; line: string }
  /** A line exceeded the size limit and was dropped up to its newline; `length` is in bytes. */
  | { kind: "overflow"; length: number };

export interface NDJSONLineBufferOptions {
  /** Longest accepted line in UTF-8 bytes, newline excluded (default: unlimited). */
  maxLineBytes?: number;
}

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const EMPTY = new Uint8Array(0);

/**
 * Line buffer for stream-based NDJSON.
 *
 * Splits on the newline byte before decoding; a UTF-8 multi-byte sequence
 * never contains 0x0a, so a character split across chunks stays intact.
 * Lines longer than `maxLineBytes` are discarded as they stream in, up to
 * their terminating newline, and reported once as an overflow frame.
 */
export class NDJSONLineBuffer {
  private pending: Uint8Array = EMPTY;
  private readonly decoder = new TextDecoder("utf-8", { fatal: false });
  private readonly maxLineBytes: number;
  private discarding = false;
  private discardedBytes = 0;

  constructor(options: NDJSONLineBufferOptions = {}) {
    this.maxLineBytes = options.maxLineBytes ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Feed raw bytes or a string into the buffer.
   * Returns complete non-empty lines and overflow notices, in stream order.
   */
  feed(chunk: string | Uint8Array): NDJSONFrame[] {
    const bytes: Uint8Array = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    const frames: NDJSONFrame[] = [];

    let start = 0;
    let newlineIdx = bytes.indexOf(NEWLINE, start);
    while (newlineIdx !== -1) {
      const segment = bytes.subarray(start, newlineIdx);
      start = newlineIdx + 1;
      newlineIdx = bytes.indexOf(NEWLINE, start);

      if (this.discarding) {
        frames.push({ kind: "overflow", length: this.discardedBytes + segment.length });
        this.discarding = false;
        this.discardedBytes = 0;
        continue;
      }

      const line = this.pending.length > 0 ? Buffer.concat([this.pending, segment]) : segment;
      this.pending = EMPTY;

      // Strip trailing \r for \r\n
      const end = line[line.length - 1] === CARRIAGE_RETURN ? line.length - 1 : line.length;
      if (end > this.maxLineBytes) {
        frames.push({ kind: "overflow", length: end });
        continue;
      }

      const trimmed = this.decoder.decode(line.subarray(0, end)).trim();
      if (trimmed) {
        frames.push({ kind: "line", line: trimmed });
      }
    }

    const tail = bytes.subarray(start);
    if (this.discarding) {
      this.discardedBytes += tail.length;
    } else if (this.pending.length + tail.length > this.maxLineBytes) {
      this.discarding = true;
      this.discardedBytes = this.pending.length + tail.length;
      this.pending = EMPTY;
    } else if (tail.length > 0) {
      this.pending = Buffer.concat([this.pending, tail]);
    }

    return frames;
  }

  /** Reset the buffer, discarding any accumulated partial data. */
  reset(): void {
    this.pending = EMPTY;
    this.discarding = false;
    this.discardedBytes = 0;
  }

  /** Bytes of the partial line held for the next chunk. */
  get size(): number {
    return this.pending.length;
  }
}

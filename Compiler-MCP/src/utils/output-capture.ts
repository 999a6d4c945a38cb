/**
 * Bounded head+tail output capture.
 *
 * Subprocess output is streamed in chunk by chunk. The first `head` bytes are
 * kept as they arrive, after that only a rolling window of the last `tail`
 * bytes is retained. Memory stays at head + tail (+ one chunk) no matter how
 * much a program prints. When bytes were dropped, the rendered text carries a
 * separator naming how many.
 */

/** Bytes in the UTF-8 sequence introduced by `lead`, 1 for anything else */
function sequenceLength(lead: number): number {
  if (lead >= 0xf0 && lead <= 0xf7) return 4;
  if (lead >= 0xe0) return 3;
  if (lead >= 0xc0) return 2;
  return 1;
}

function isContinuation(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

/** Length of `buf` without a trailing, incomplete UTF-8 sequence */
function completePrefix(buf: Buffer): number {
  for (let i = buf.length - 1; i >= Math.max(0, buf.length - 4); i--) {
    const byte = buf[i];
    if (byte === undefined || isContinuation(byte)) continue;
    return i + sequenceLength(byte) > buf.length ? i : buf.length;
  }
  return buf.length;
}

/** Offset of the first byte in `buf` that does not continue a cut sequence */
function firstBoundary(buf: Buffer): number {
  let i = 0;
  while (i < Math.min(buf.length, 3)) {
    const byte = buf[i];
    if (byte === undefined || !isContinuation(byte)) break;
    i++;
  }
  return i;
}

export interface CaptureLimits {
  head: number;
  tail: number;
}

export interface CapturedText {
  text: string;
  truncated: boolean;
  totalBytes: number;
}

export class OutputCapture {
  private readonly headChunks: Buffer[] = [];
  private headBytes = 0;
  private tailChunks: Buffer[] = [];
  private tailBytes = 0;
  private dropped = 0;

  constructor(private readonly limits: CaptureLimits) {}

  append(chunk: Buffer): void {
    let rest = chunk;

    const headRoom = this.limits.head - this.headBytes;
    if (headRoom > 0) {
      const taken = rest.subarray(0, headRoom);
      this.headChunks.push(Buffer.from(taken));
      this.headBytes += taken.length;
      rest = rest.subarray(taken.length);
    }
    if (rest.length === 0) return;

    this.tailChunks.push(Buffer.from(rest));
    this.tailBytes += rest.length;
    this.trimTail();
  }

  get totalBytes(): number {
    return this.headBytes + this.tailBytes + this.dropped;
  }

  get truncated(): boolean {
    return this.dropped > 0;
  }

  render(): CapturedText {
    if (this.dropped === 0) {
      const text = Buffer.concat([...this.headChunks, ...this.tailChunks]).toString('utf-8');
      return { text, truncated: false, totalBytes: this.totalBytes };
    }

    // Cut at code point boundaries so neither side renders a split character
    const head = Buffer.concat(this.headChunks);
    const tail = Buffer.concat(this.tailChunks);
    const headEnd = completePrefix(head);
    const tailStart = firstBoundary(tail);
    const omitted = this.dropped + (head.length - headEnd) + tailStart;

    const separator = `\n\n[... truncated ${omitted} bytes ...]\n\n`;
    const text =
      head.subarray(0, headEnd).toString('utf-8') + separator + tail.subarray(tailStart).toString('utf-8');
    return { text, truncated: true, totalBytes: this.totalBytes };
  }

  private trimTail(): void {
    let excess = this.tailBytes - this.limits.tail;
    while (excess > 0) {
      const first = this.tailChunks[0];
      if (first === undefined) return;
      if (first.length <= excess) {
        this.tailChunks.shift();
        this.tailBytes -= first.length;
        this.dropped += first.length;
        excess -= first.length;
      } else {
        this.tailChunks[0] = first.subarray(excess);
        this.tailBytes -= excess;
        this.dropped += excess;
        excess = 0;
      }
    }
  }
}

const encoder = new TextEncoder();

/**
 * Append-only receive buffer for one connection.
 *
 * Bytes are appended as they arrive and dropped from the front once a frame
 * has been decoded from them. Consumed space is reclaimed before growing.
 */
export class RespBuffer {
  private data: Uint8Array;
  private start = 0;
  private end = 0;

  constructor(initialCapacity = 4096) {
    this.data = new Uint8Array(initialCapacity);
  }

  static from(input: string | Uint8Array): RespBuffer {
    const bytes = typeof input === "string" ? encoder.encode(input) : input;
    const buffer = new RespBuffer(Math.max(bytes.length, 16));
    buffer.append(bytes);
    return buffer;
  }

  get length(): number {
    return this.end - this.start;
  }

  /** View of the unconsumed bytes; invalidated by the next append or advance. */
  get bytes(): Uint8Array {
    return this.data.subarray(this.start, this.end);
  }

  append(chunk: Uint8Array): void {
    if (this.end + chunk.length > this.data.length) {
      const needed = this.length + chunk.length;
      if (needed <= this.data.length) {
        this.data.copyWithin(0, this.start, this.end);
      } else {
        const grown = new Uint8Array(Math.max(needed, this.data.length * 2));
        grown.set(this.bytes);
        this.data = grown;
      }
      this.end = this.length;
      this.start = 0;
    }
    this.data.set(chunk, this.end);
    this.end += chunk.length;
  }

  advance(n: number): void {
    if (n < 0 || n > this.length) {
      throw new RangeError(`Cannot advance ${n} bytes, ${this.length} buffered`);
    }
    this.start += n;
    if (this.start === this.end) {
      this.start = 0;
      this.end = 0;
    }
  }
}

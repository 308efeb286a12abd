const INITIAL_SIZE = 64;

/**
 * Growable byte array. The decoder reuses one across string parses as its
 * scratch space; the encoder writes into one for byte output.
 */
export class ByteBuffer {
  private data: Uint8Array;
  private size = 0;

  constructor(capacity = INITIAL_SIZE) {
    this.data = new Uint8Array(capacity);
  }

  get length(): number {
    return this.size;
  }

  clear(): void {
    this.size = 0;
  }

  push(byte: number): void {
    this.reserve(1);
    this.data[this.size++] = byte;
  }

  pushAll(bytes: Uint8Array): void {
    this.reserve(bytes.length);
    this.data.set(bytes, this.size);
    this.size += bytes.length;
  }

  /** A view valid until the next mutation. */
  view(): Uint8Array {
    return this.data.subarray(0, this.size);
  }

  toBytes(): Uint8Array {
    return this.data.slice(0, this.size);
  }

  private reserve(extra: number): void {
    const needed = this.size + extra;
    if (needed <= this.data.length) {
      return;
    }
    const grown = new Uint8Array(Math.max(needed, this.data.length * 2));
    grown.set(this.view());
    this.data = grown;
  }
}

import { SexpError } from "../error/error.js";
import { ByteBuffer } from "../io/byteBuffer.js";

const SINK_BUFFER_SIZE = 8 * 1024;

const utf8 = new TextEncoder();

/** Where formatted text goes. */
export interface Output {
  write(text: string): void;
  flush(): void;
}

export class StringOutput implements Output {
  private readonly parts: string[] = [];

  write(text: string): void {
    this.parts.push(text);
  }

  flush(): void {
    // Nothing is buffered.
  }

  toString(): string {
    return this.parts.join("");
  }
}

export class ByteBufferOutput implements Output {
  private readonly buffer = new ByteBuffer(256);

  write(text: string): void {
    this.buffer.pushAll(utf8.encode(text));
  }

  flush(): void {
    // Nothing is buffered.
  }

  toBytes(): Uint8Array {
    return this.buffer.toBytes();
  }
}

/** A blocking byte sink, such as a file descriptor. */
export interface ByteSink {
  write(bytes: Uint8Array): void;
}

/**
 * Buffers text and hands it to a {@link ByteSink} in UTF-8 chunks. Sink
 * failures surface as `Io` errors.
 */
export class SinkOutput implements Output {
  private pending: string[] = [];
  private pendingLength = 0;

  constructor(
    private readonly sink: ByteSink,
    private readonly bufferSize = SINK_BUFFER_SIZE
  ) {}

  write(text: string): void {
    this.pending.push(text);
    this.pendingLength += text.length;
    if (this.pendingLength >= this.bufferSize) {
      this.flush();
    }
  }

  flush(): void {
    if (this.pendingLength === 0) {
      return;
    }
    const bytes = utf8.encode(this.pending.join(""));
    this.pending = [];
    this.pendingLength = 0;
    try {
      this.sink.write(bytes);
    } catch (cause) {
      throw SexpError.io(cause);
    }
  }
}

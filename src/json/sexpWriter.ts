import { once } from "node:events";
import type { Writable } from "node:stream";
import { Encoder } from "../encoder/encoder.js";
import { CompactFormatter, PrettyFormatter } from "../encoder/formatter.js";
import type { Output } from "../encoder/output.js";
import type { JsonEventWriter } from "../parser/streamParser.js";
import { I64_MIN, U64_MAX } from "../value/number.js";

export type WriterStats = {
  tokens: {
    objects: number;
    arrays: number;
    keys: number;
    strings: number;
    numbers: number;
    booleans: number;
    nulls: number;
  };
  bytesWritten: number;
};

export type SexpWriterOptions = {
  pretty?: boolean;
  /** Indent unit for the pretty layout. */
  indent?: string;
};

const DEFAULT_BUFFER_SIZE = 64 * 1024;

const INTEGER_TEXT = /^-?\d+$/;

type Container =
  | { type: "root"; count: number }
  | { type: "object"; first: boolean; pendingKey: boolean }
  | { type: "array"; first: boolean };

class BufferedStreamWriter {
  private readonly buffer: Buffer;
  private offset = 0;

  constructor(
    private readonly stream: Writable,
    private readonly size = DEFAULT_BUFFER_SIZE
  ) {
    this.buffer = Buffer.allocUnsafe(this.size);
  }

  private async flushBuffer(): Promise<void> {
    if (this.offset === 0) {
      return;
    }
    // The stream may hold on to the chunk, so hand it a copy.
    const chunk = Buffer.from(this.buffer.subarray(0, this.offset));
    this.offset = 0;
    await this.writeThrough(chunk);
  }

  private async writeThrough(chunk: Buffer): Promise<void> {
    if (!this.stream.write(chunk)) {
      await once(this.stream, "drain");
    }
  }

  write(chunk: Buffer): void | Promise<void> {
    if (chunk.length >= this.size) {
      return this.flushBuffer().then(() => this.writeThrough(chunk));
    }
    const available = this.size - this.offset;
    if (chunk.length > available) {
      chunk.copy(this.buffer, this.offset, 0, available);
      this.offset += available;
      const rest = chunk.subarray(available);
      return this.flushBuffer().then(() => this.write(rest));
    }
    chunk.copy(this.buffer, this.offset);
    this.offset += chunk.length;
  }

  async end(): Promise<void> {
    await this.flushBuffer();
  }
}

/** Collects the text of one event before it goes to the stream. */
class EventOutput implements Output {
  private parts: string[] = [];

  write(text: string): void {
    this.parts.push(text);
  }

  flush(): void {
    // Drained by the writer after every event.
  }

  take(): string {
    const text = this.parts.join("");
    this.parts = [];
    return text;
  }
}

/**
 * Writes JSON events as S-expression text: objects become association
 * lists, arrays become lists, `null` becomes `#nil`. Several top-level
 * documents are separated by newlines.
 */
export class SexpStreamWriter implements JsonEventWriter {
  private readonly output = new EventOutput();
  private readonly encoder: Encoder;
  private readonly streamWriter: BufferedStreamWriter;
  private readonly containers: Container[] = [{ type: "root", count: 0 }];
  private finalized = false;

  private stats: WriterStats = {
    tokens: {
      objects: 0,
      arrays: 0,
      keys: 0,
      strings: 0,
      numbers: 0,
      booleans: 0,
      nulls: 0,
    },
    bytesWritten: 0,
  };

  constructor(stream: Writable, options: SexpWriterOptions = {}) {
    const formatter = options.pretty ? new PrettyFormatter(options.indent) : new CompactFormatter();
    this.encoder = new Encoder(this.output, formatter);
    this.streamWriter = new BufferedStreamWriter(stream);
  }

  getStats(): WriterStats {
    return this.stats;
  }

  private currentContainer(): Container {
    return this.containers[this.containers.length - 1];
  }

  private beforeValue(): void {
    const container = this.currentContainer();
    const { formatter } = this.encoder;
    switch (container.type) {
      case "root":
        if (container.count > 0) {
          this.output.write("\n");
        }
        container.count += 1;
        return;
      case "array":
        formatter.beginArrayValue(this.output, container.first);
        container.first = false;
        return;
      case "object":
        if (!container.pendingKey) {
          throw new Error("Object value without a key");
        }
        return;
    }
  }

  private afterValue(): void {
    const container = this.currentContainer();
    const { formatter } = this.encoder;
    if (container.type === "array") {
      formatter.endArrayValue(this.output);
    } else if (container.type === "object") {
      formatter.endObjectValue(this.output);
      container.pendingKey = false;
    }
  }

  private emit(): void | Promise<void> {
    const text = this.output.take();
    if (text.length === 0) {
      return;
    }
    const chunk = Buffer.from(text, "utf8");
    this.stats.bytesWritten += chunk.length;
    return this.streamWriter.write(chunk);
  }

  writeStartObject(): void | Promise<void> {
    this.beforeValue();
    this.stats.tokens.objects += 1;
    this.encoder.formatter.beginObject(this.output);
    this.containers.push({ type: "object", first: true, pendingKey: false });
    return this.emit();
  }

  writeEndObject(): void | Promise<void> {
    const container = this.containers.pop();
    if (!container || container.type !== "object" || container.pendingKey) {
      throw new Error("Unbalanced object");
    }
    this.encoder.formatter.endObject(this.output);
    this.afterValue();
    return this.emit();
  }

  writeStartArray(): void | Promise<void> {
    this.beforeValue();
    this.stats.tokens.arrays += 1;
    this.encoder.formatter.beginArray(this.output);
    this.containers.push({ type: "array", first: true });
    return this.emit();
  }

  writeEndArray(): void | Promise<void> {
    const container = this.containers.pop();
    if (!container || container.type !== "array") {
      throw new Error("Unbalanced array");
    }
    this.encoder.formatter.endArray(this.output);
    this.afterValue();
    return this.emit();
  }

  writeKey(key: string): void | Promise<void> {
    const container = this.currentContainer();
    if (container.type !== "object" || container.pendingKey) {
      throw new Error("Key outside of an object");
    }
    this.stats.tokens.keys += 1;
    const { formatter } = this.encoder;
    formatter.beginObjectKey(this.output, container.first);
    this.encoder.writeString(key);
    formatter.beginObjectValue(this.output);
    container.first = false;
    container.pendingKey = true;
    return this.emit();
  }

  writeString(value: string): void | Promise<void> {
    this.beforeValue();
    this.stats.tokens.strings += 1;
    this.encoder.serializeStr(value);
    this.afterValue();
    return this.emit();
  }

  /**
   * Integers inside the 64-bit ranges keep their digits; anything else is
   * written as a float without exponent, or `#nil` when it overflows.
   */
  writeNumber(value: string): void | Promise<void> {
    this.beforeValue();
    this.stats.tokens.numbers += 1;
    if (INTEGER_TEXT.test(value)) {
      const integer = BigInt(value);
      if (integer >= 0n && integer <= U64_MAX) {
        this.encoder.serializeU64(integer);
      } else if (integer < 0n && integer >= I64_MIN) {
        this.encoder.serializeI64(integer);
      } else {
        this.encoder.serializeF64(Number(value));
      }
    } else {
      this.encoder.serializeF64(Number(value));
    }
    this.afterValue();
    return this.emit();
  }

  writeBoolean(value: boolean): void | Promise<void> {
    this.beforeValue();
    this.stats.tokens.booleans += 1;
    this.encoder.serializeBool(value);
    this.afterValue();
    return this.emit();
  }

  writeNull(): void | Promise<void> {
    this.beforeValue();
    this.stats.tokens.nulls += 1;
    this.encoder.serializeUnit();
    this.afterValue();
    return this.emit();
  }

  /** Ends the last document with a newline and flushes. The stream stays open. */
  async finalize(): Promise<void> {
    if (this.finalized) {
      return;
    }
    if (this.containers.length !== 1) {
      throw new Error("Unbalanced document");
    }
    this.finalized = true;
    const root = this.currentContainer();
    if (root.type === "root" && root.count > 0) {
      this.output.write("\n");
      await this.emit();
    }
    await this.streamWriter.end();
  }
}

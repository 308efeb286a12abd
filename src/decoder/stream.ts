import type { Deserialize } from "../binding/binding.js";
import { sexp } from "../binding/shapes.js";
import { ErrorCode } from "../error/error.js";
import type { Sexp } from "../value/sexp.js";
import { Byte } from "./chars.js";
import { decoderFor } from "./decode.js";
import type { Source } from "./decode.js";
import type { Decoder } from "./decoder.js";

/**
 * Iterates the top-level lists of a source one at a time.
 *
 * {@link byteOffset} is the number of bytes consumed through the end of
 * the last value produced. When a value fails to decode, the offset still
 * points past the last good one, so the caller can decode
 * `input.subarray(offset)` again once more input is available.
 */
export class StreamDecoder<T> implements IterableIterator<T> {
  private offset = 0;
  private finished = false;

  constructor(
    private readonly decoder: Decoder,
    private readonly shape: Deserialize<T>
  ) {}

  byteOffset(): number {
    return this.offset;
  }

  next(): IteratorResult<T> {
    if (this.finished) {
      return { done: true, value: undefined };
    }
    try {
      const peek = this.decoder.parseWhitespace();
      if (peek === null) {
        this.finished = true;
        this.offset = this.decoder.byteOffset();
        return { done: true, value: undefined };
      }
      if (peek !== Byte.OpenParen) {
        throw this.decoder.peekError(ErrorCode.ExpectedList);
      }
      const value = this.shape.deserialize(this.decoder);
      this.offset = this.decoder.byteOffset();
      return { done: false, value };
    } catch (error) {
      this.finished = true;
      throw error;
    }
  }

  [Symbol.iterator](): StreamDecoder<T> {
    return this;
  }
}

export const streamDecoder = <T>(source: Source, shape: Deserialize<T>): StreamDecoder<T> =>
  new StreamDecoder(decoderFor(source), shape);

/** {@link streamDecoder} producing dynamic values. */
export const streamValues = (source: Source): StreamDecoder<Sexp> => streamDecoder(source, sexp);

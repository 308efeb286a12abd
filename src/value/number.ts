export const U64_MAX = 0xffff_ffff_ffff_ffffn;
export const I64_MAX = 0x7fff_ffff_ffff_ffffn;
export const I64_MIN = -0x8000_0000_0000_0000n;

type NumberRepr =
  | { type: "posInt"; value: bigint }
  | { type: "negInt"; value: bigint }
  | { type: "float"; value: number };

/**
 * A number as it appears in an S-expression: an unsigned 64-bit integer, a
 * negative signed 64-bit integer, or a finite double.
 *
 * NaN and the infinities are not representable; {@link SexpNumber.fromF64}
 * returns `undefined` for them.
 */
export class SexpNumber {
  private constructor(private readonly repr: NumberRepr) {}

  static fromU64(value: bigint): SexpNumber {
    if (value < 0n || value > U64_MAX) {
      throw new RangeError(`${value} is outside the u64 range`);
    }
    return new SexpNumber({ type: "posInt", value });
  }

  static fromI64(value: bigint): SexpNumber {
    if (value < I64_MIN || value > I64_MAX) {
      throw new RangeError(`${value} is outside the i64 range`);
    }
    return value < 0n
      ? new SexpNumber({ type: "negInt", value })
      : new SexpNumber({ type: "posInt", value });
  }

  static fromF64(value: number): SexpNumber | undefined {
    return Number.isFinite(value) ? new SexpNumber({ type: "float", value }) : undefined;
  }

  /**
   * Bigints and safe integers widen into the integer variants, choosing
   * signed or unsigned by sign; other numbers become floats.
   */
  static from(value: number | bigint): SexpNumber | undefined {
    if (typeof value === "bigint") {
      return value < 0n ? SexpNumber.fromI64(value) : SexpNumber.fromU64(value);
    }
    if (Number.isSafeInteger(value)) {
      return SexpNumber.from(BigInt(value));
    }
    return SexpNumber.fromF64(value);
  }

  isU64(): boolean {
    return this.repr.type === "posInt";
  }

  isI64(): boolean {
    switch (this.repr.type) {
      case "posInt":
        return this.repr.value <= I64_MAX;
      case "negInt":
        return true;
      case "float":
        return false;
    }
  }

  isF64(): boolean {
    return this.repr.type === "float";
  }

  asU64(): bigint | undefined {
    return this.repr.type === "posInt" ? this.repr.value : undefined;
  }

  asI64(): bigint | undefined {
    return this.isI64() && this.repr.type !== "float" ? this.repr.value : undefined;
  }

  asF64(): number {
    return Number(this.repr.value);
  }

  /** Visits the underlying representation. */
  match<T>(cases: {
    posInt: (value: bigint) => T;
    negInt: (value: bigint) => T;
    float: (value: number) => T;
  }): T {
    switch (this.repr.type) {
      case "posInt":
        return cases.posInt(this.repr.value);
      case "negInt":
        return cases.negInt(this.repr.value);
      case "float":
        return cases.float(this.repr.value);
    }
  }

  equals(other: SexpNumber): boolean {
    return this.repr.type === other.repr.type && this.repr.value === other.repr.value;
  }

  toString(): string {
    return String(this.repr.value);
  }
}

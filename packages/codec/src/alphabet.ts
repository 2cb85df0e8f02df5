/**
 * Digit alphabet: an ordered set of digit characters plus sign and padding
 * characters. Immutable once built and safe to share.
 */
import { Effect } from "effect";
import { AlphabetError, WIDTHS, fingerprint, type IntegerKind } from "@radix/core";

export const MIN_RADIX = 2;
export const MAX_RADIX = 94;

/** Characters the float layouts use that a negative sign must never be. */
const RESERVED_SIGNS = new Set([".", "e", "E"]);

export interface AlphabetSpec {
  readonly digits: string;
  readonly caseInsensitive?: boolean;
  readonly padding?: string;
  readonly positiveSign?: string;
  readonly negativeSign?: string;
}

function fold(ch: string, caseInsensitive: boolean): string {
  if (!caseInsensitive) return ch;
  const upper = ch.toUpperCase();
  return upper.length === 1 ? upper : ch;
}

/** Smallest L with radix^L >= 2^bits. */
function fixedLength(radix: number, bits: number): number {
  const limit = 1n << BigInt(bits);
  const r = BigInt(radix);
  let length = 0;
  for (let span = 1n; span < limit; span *= r) length++;
  return length;
}

export class Alphabet {
  readonly digits: string;
  readonly radix: number;
  readonly caseInsensitive: boolean;
  readonly padding: string;
  readonly positiveSign: string;
  readonly negativeSign: string;

  /** char code -> digit value, with both cases present when case-insensitive */
  private readonly _values = new Map<number, number>();
  private readonly _lengths: { readonly [K in IntegerKind]: number };

  constructor(spec: AlphabetSpec) {
    const {
      digits,
      caseInsensitive = false,
      padding = "$",
      positiveSign = "+",
      negativeSign = "-",
    } = spec;

    if (digits.length < MIN_RADIX || digits.length > MAX_RADIX) {
      throw new AlphabetError({
        message: `radix must be in [${MIN_RADIX}, ${MAX_RADIX}], got ${digits.length}`,
      });
    }
    for (const [name, ch] of [["padding", padding], ["positiveSign", positiveSign], ["negativeSign", negativeSign]]) {
      if (ch.length !== 1) {
        throw new AlphabetError({ message: `${name} must be a single character, got "${ch}"` });
      }
    }
    if (RESERVED_SIGNS.has(negativeSign)) {
      throw new AlphabetError({ message: `negativeSign must not be ".", "e" or "E", got "${negativeSign}"` });
    }

    const seen = new Map<string, number>();
    for (let i = 0; i < digits.length; i++) {
      const ch = digits[i];
      if (ch === ".") {
        throw new AlphabetError({ message: `"." is reserved and cannot be a digit (index ${i})` });
      }
      const key = fold(ch, caseInsensitive);
      const prior = seen.get(key);
      if (prior !== undefined) {
        throw new AlphabetError({ message: `duplicate digit "${ch}" at index ${i} (first at ${prior})` });
      }
      seen.set(key, i);
    }

    const specials = [padding, positiveSign, negativeSign];
    for (const ch of specials) {
      if (seen.has(fold(ch, caseInsensitive))) {
        throw new AlphabetError({ message: `"${ch}" is used both as a digit and as a sign or padding character` });
      }
    }
    if (new Set(specials.map((ch) => fold(ch, caseInsensitive))).size !== specials.length) {
      throw new AlphabetError({
        message: `padding, positiveSign and negativeSign must differ, got "${padding}", "${positiveSign}", "${negativeSign}"`,
      });
    }

    this.digits = digits;
    this.radix = digits.length;
    this.caseInsensitive = caseInsensitive;
    this.padding = padding;
    this.positiveSign = positiveSign;
    this.negativeSign = negativeSign;

    for (let i = 0; i < digits.length; i++) {
      const ch = digits[i];
      this._values.set(ch.charCodeAt(0), i);
      if (caseInsensitive) {
        for (const variant of [ch.toUpperCase(), ch.toLowerCase()]) {
          if (variant.length === 1) this._values.set(variant.charCodeAt(0), i);
        }
      }
    }

    this._lengths = {
      byte: fixedLength(this.radix, WIDTHS.byte.bits),
      short: fixedLength(this.radix, WIDTHS.short.bits),
      char: fixedLength(this.radix, WIDTHS.char.bits),
      int: fixedLength(this.radix, WIDTHS.int.bits),
      long: fixedLength(this.radix, WIDTHS.long.bits),
    };
  }

  static make(spec: AlphabetSpec): Effect.Effect<Alphabet, AlphabetError> {
    return Effect.try({
      try: () => new Alphabet(spec),
      catch: (cause) =>
        cause instanceof AlphabetError
          ? cause
          : new AlphabetError({ message: "Failed to build alphabet", cause }),
    });
  }

  // ── Digits ───────────────────────────────────────────────────────────────

  /** Digit value of a UTF-16 code unit, or -1 when it is not a digit. */
  valueOf(code: number): number {
    return this._values.get(code) ?? -1;
  }

  digit(value: number): string {
    return this.digits[value];
  }

  get zero(): string {
    return this.digits[0];
  }

  /** Length of every unsigned encoding of `kind` under this radix. */
  unsignedLength(kind: IntegerKind): number {
    return this._lengths[kind];
  }

  // ── Serialization ────────────────────────────────────────────────────────

  /** digits, then '1' or '0' for case-insensitivity, padding, positive sign, negative sign */
  serialize(): string {
    return `${this.digits}${this.caseInsensitive ? "1" : "0"}${this.padding}${this.positiveSign}${this.negativeSign}`;
  }

  static deserialize(data: string): Alphabet {
    if (data.length < 5) {
      throw new AlphabetError({ message: `serialized alphabet is too short (${data.length} characters)` });
    }
    const n = data.length;
    return new Alphabet({
      digits: data.slice(0, n - 4),
      caseInsensitive: data[n - 4] === "1",
      padding: data[n - 3],
      positiveSign: data[n - 2],
      negativeSign: data[n - 1],
    });
  }

  equals(other: Alphabet): boolean {
    return this.serialize() === other.serialize();
  }

  fingerprint(): string {
    return fingerprint(this.serialize());
  }

  toString(): string {
    return `Alphabet(radix ${this.radix}, ${this.digits})`;
  }
}

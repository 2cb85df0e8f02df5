/**
 * Lenient integer readers.
 *
 * A reader never throws. It takes an optional single sign followed by digits
 * of the alphabet; an empty range, a foreign character, a second sign or a
 * value that does not fit the width reads as 0. Both signed and unsigned text
 * are accepted: the digits are read as a magnitude, the sign applied, and the
 * result wrapped to the width, so an unsigned encoding comes back as its
 * two's-complement value.
 */
import { WIDTHS, wrapInt, type IntKind } from "@radix/core";
import type { Alphabet } from "./alphabet.js";

interface Range {
  readonly from: number;
  readonly to: number;
  readonly negative: boolean;
}

/** Clamp the range and consume one leading sign; undefined when nothing is left. */
function digitRange(alphabet: Alphabet, text: string, start: number, end: number): Range | undefined {
  let from = Math.max(0, start);
  const to = Math.min(text.length, end);
  if (from >= to) return undefined;
  let negative = false;
  const first = text[from];
  if (first === alphabet.negativeSign) {
    negative = true;
    from++;
  } else if (first === alphabet.positiveSign) {
    from++;
  }
  if (from >= to) return undefined;
  return { from, to, negative };
}

export function readInteger(alphabet: Alphabet, text: string, kind: IntKind = "int", start = 0, end = text.length): number {
  const range = digitRange(alphabet, text, start, end);
  if (range === undefined) return 0;
  const limit = 2 ** WIDTHS[kind].bits;
  const radix = alphabet.radix;
  let value = 0;
  for (let i = range.from; i < range.to; i++) {
    const d = alphabet.valueOf(text.charCodeAt(i));
    if (d < 0) return 0;
    value = value * radix + d;
    if (value >= limit) return 0;
  }
  return wrapInt(range.negative ? -value : value, kind);
}

export function readLong(alphabet: Alphabet, text: string, start = 0, end = text.length): bigint {
  const range = digitRange(alphabet, text, start, end);
  if (range === undefined) return 0n;
  const limit = 1n << 64n;
  const radix = BigInt(alphabet.radix);
  let value = 0n;
  for (let i = range.from; i < range.to; i++) {
    const d = alphabet.valueOf(text.charCodeAt(i));
    if (d < 0) return 0n;
    value = value * radix + BigInt(d);
    if (value >= limit) return 0n;
  }
  return BigInt.asIntN(64, range.negative ? -value : value);
}

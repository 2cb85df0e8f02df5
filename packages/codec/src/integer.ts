/**
 * Integer encodings.
 *
 * `signed` is variable length: minimal digits, negative values prefixed with
 * the alphabet's negative sign. `unsigned` is fixed length: the bit pattern
 * read as a non-negative number, left-padded with the zero digit to the width
 * every value of that kind needs. char is unsigned in both forms.
 */
import { TextBuffer, wrapInt, type IntKind } from "@radix/core";
import type { Alphabet } from "./alphabet.js";

const UNSIGNED_MASK: { readonly [K in IntKind]: (value: number) => number } = {
  byte: (v) => v & 0xff,
  short: (v) => v & 0xffff,
  char: (v) => v & 0xffff,
  int: (v) => v >>> 0,
};

// ── Digit emission ─────────────────────────────────────────────────────────

function digitsOf(alphabet: Alphabet, magnitude: number, minLength: number): string {
  const radix = alphabet.radix;
  const out: string[] = [];
  let v = magnitude;
  do {
    out.push(alphabet.digit(v % radix));
    v = Math.floor(v / radix);
  } while (v > 0);
  while (out.length < minLength) out.push(alphabet.zero);
  return out.reverse().join("");
}

function digitsOfBig(alphabet: Alphabet, magnitude: bigint, minLength: number): string {
  const radix = BigInt(alphabet.radix);
  const out: string[] = [];
  let v = magnitude;
  do {
    out.push(alphabet.digit(Number(v % radix)));
    v /= radix;
  } while (v > 0n);
  while (out.length < minLength) out.push(alphabet.zero);
  return out.reverse().join("");
}

// ── 8/16/32-bit ────────────────────────────────────────────────────────────

export function appendSigned(alphabet: Alphabet, buffer: TextBuffer, value: number, kind: IntKind = "int"): TextBuffer {
  const v = wrapInt(value, kind);
  if (v < 0) buffer.append(alphabet.negativeSign);
  // |MIN_VALUE| is exact in a JS number, so the magnitude never overflows
  return buffer.append(digitsOf(alphabet, Math.abs(v), 1));
}

export function appendUnsigned(alphabet: Alphabet, buffer: TextBuffer, value: number, kind: IntKind = "int"): TextBuffer {
  const bits = UNSIGNED_MASK[kind](Math.trunc(value));
  return buffer.append(digitsOf(alphabet, bits, alphabet.unsignedLength(kind)));
}

export function signed(alphabet: Alphabet, value: number, kind: IntKind = "int"): string {
  return appendSigned(alphabet, new TextBuffer(), value, kind).toString();
}

export function unsigned(alphabet: Alphabet, value: number, kind: IntKind = "int"): string {
  return appendUnsigned(alphabet, new TextBuffer(), value, kind).toString();
}

// ── 64-bit ─────────────────────────────────────────────────────────────────

export function appendSignedLong(alphabet: Alphabet, buffer: TextBuffer, value: bigint): TextBuffer {
  const v = BigInt.asIntN(64, value);
  if (v < 0n) buffer.append(alphabet.negativeSign);
  return buffer.append(digitsOfBig(alphabet, v < 0n ? -v : v, 1));
}

export function appendUnsignedLong(alphabet: Alphabet, buffer: TextBuffer, value: bigint): TextBuffer {
  return buffer.append(digitsOfBig(alphabet, BigInt.asUintN(64, value), alphabet.unsignedLength("long")));
}

export function signedLong(alphabet: Alphabet, value: bigint): string {
  return appendSignedLong(alphabet, new TextBuffer(), value).toString();
}

export function unsignedLong(alphabet: Alphabet, value: bigint): string {
  return appendUnsignedLong(alphabet, new TextBuffer(), value).toString();
}

/**
 * Bit-exact float encodings.
 *
 * The signed form writes the IEEE bit pattern with its bytes reversed as a
 * signed integer, so common values such as 1.0 stay short. The unsigned form
 * writes '.' followed by the raw bit pattern at fixed width. The readers tell
 * the two apart by that leading '.'.
 */
import {
  TextBuffer,
  doubleToRawLongBits,
  doubleToReversedLongBits,
  floatToRawIntBits,
  floatToReversedIntBits,
  longBitsToDouble,
  reversedLongBitsToDouble,
  intBitsToFloat,
  reversedIntBitsToFloat,
} from "@radix/core";
import type { Alphabet } from "./alphabet.js";
import { appendSigned, appendSignedLong, appendUnsigned, appendUnsignedLong } from "./integer.js";
import { readInteger, readLong } from "./lenient.js";

export const RAW_BITS_MARKER = ".";

// ── binary64 ───────────────────────────────────────────────────────────────

export function appendSignedDouble(alphabet: Alphabet, buffer: TextBuffer, value: number): TextBuffer {
  return appendSignedLong(alphabet, buffer, doubleToReversedLongBits(value));
}

export function appendUnsignedDouble(alphabet: Alphabet, buffer: TextBuffer, value: number): TextBuffer {
  return appendUnsignedLong(alphabet, buffer.append(RAW_BITS_MARKER), doubleToRawLongBits(value));
}

export function readDoubleExact(alphabet: Alphabet, text: string, start = 0, end = text.length): number {
  const from = Math.max(0, start);
  if (text[from] === RAW_BITS_MARKER) {
    return longBitsToDouble(readLong(alphabet, text, from + 1, end));
  }
  return reversedLongBitsToDouble(readLong(alphabet, text, from, end));
}

// ── binary32 ───────────────────────────────────────────────────────────────

export function appendSignedFloat(alphabet: Alphabet, buffer: TextBuffer, value: number): TextBuffer {
  return appendSigned(alphabet, buffer, floatToReversedIntBits(value), "int");
}

export function appendUnsignedFloat(alphabet: Alphabet, buffer: TextBuffer, value: number): TextBuffer {
  return appendUnsigned(alphabet, buffer.append(RAW_BITS_MARKER), floatToRawIntBits(value), "int");
}

export function readFloatExact(alphabet: Alphabet, text: string, start = 0, end = text.length): number {
  const from = Math.max(0, start);
  if (text[from] === RAW_BITS_MARKER) {
    return intBitsToFloat(readInteger(alphabet, text, "int", from + 1, end));
  }
  return reversedIntBitsToFloat(readInteger(alphabet, text, "int", from, end));
}

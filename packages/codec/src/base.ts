/**
 * `Base`: one alphabet plus every encoding, reader and batch operation bound
 * to it. Instances are immutable and may be shared freely.
 */
import { Effect } from "effect";
import {
  TextBuffer,
  fnv1a,
  type AlphabetError,
  type ElementArray,
  type ElementKind,
  type FloatKind,
  type IntKind,
  type KindArrays,
  type Rng,
} from "@radix/core";
import {
  decimal,
  friendly,
  general,
  readDecimal,
  readDecimalFloat,
  scientific,
  type DecimalOptions,
  type FormatOptions,
} from "@radix/ryu";
import { Alphabet, type AlphabetSpec } from "./alphabet.js";
import {
  appendJoined2DWith,
  appendJoinedWith,
  count,
  countDelimiters,
  split2DWith,
  splitWith,
} from "./batch.js";
import {
  READABLE_CODECS,
  decimalCodecs,
  exactCodecs,
  generalCodecs,
  type CodecMap,
  type FloatCodecMap,
} from "./codecs.js";
import {
  appendSignedDouble,
  appendSignedFloat,
  appendUnsignedDouble,
  appendUnsignedFloat,
  readDoubleExact,
  readFloatExact,
} from "./exact.js";
import { appendSigned, appendSignedLong, appendUnsigned, appendUnsignedLong } from "./integer.js";
import { readInteger, readLong } from "./lenient.js";
import * as presets from "./presets.js";
import { readableChar, readableDouble, readableFloat, readableInt, readableLong } from "./readable.js";
import { scramble, scrambledAlphabet } from "./scramble.js";

/** Kinds a plain JS number can carry. */
export type NumberKind = Exclude<ElementKind, "long">;

function appendJoinedAny(
  codecs: CodecMap,
  buffer: TextBuffer,
  delimiter: string,
  array: ElementArray,
  start?: number,
  length?: number,
): TextBuffer {
  if (array instanceof Int8Array) return appendJoinedWith(codecs.byte, buffer, delimiter, array, start, length);
  if (array instanceof Int16Array) return appendJoinedWith(codecs.short, buffer, delimiter, array, start, length);
  if (array instanceof Uint16Array) return appendJoinedWith(codecs.char, buffer, delimiter, array, start, length);
  if (array instanceof Int32Array) return appendJoinedWith(codecs.int, buffer, delimiter, array, start, length);
  if (array instanceof BigInt64Array) return appendJoinedWith(codecs.long, buffer, delimiter, array, start, length);
  if (array instanceof Float32Array) return appendJoinedWith(codecs.float, buffer, delimiter, array, start, length);
  return appendJoinedWith(codecs.double, buffer, delimiter, array, start, length);
}

function appendJoinedFloats(
  codecs: FloatCodecMap,
  buffer: TextBuffer,
  delimiter: string,
  array: Float32Array | Float64Array,
  start?: number,
  length?: number,
): TextBuffer {
  if (array instanceof Float32Array) return appendJoinedWith(codecs.float, buffer, delimiter, array, start, length);
  return appendJoinedWith(codecs.double, buffer, delimiter, array, start, length);
}

export class Base {
  readonly alphabet: Alphabet;
  private readonly _exact: CodecMap;
  private readonly _general: CodecMap;

  constructor(alphabet: Alphabet) {
    this.alphabet = alphabet;
    this._exact = exactCodecs(alphabet);
    this._general = generalCodecs(alphabet);
  }

  // ── Presets ──────────────────────────────────────────────────────────────

  static readonly BASE2 = new Base(presets.BASE2);
  static readonly BASE8 = new Base(presets.BASE8);
  static readonly BASE10 = new Base(presets.BASE10);
  static readonly BASE16 = new Base(presets.BASE16);
  static readonly BASE36 = new Base(presets.BASE36);
  static readonly BASE64 = new Base(presets.BASE64);
  static readonly URI_SAFE = new Base(presets.URI_SAFE);
  static readonly SIMPLE64 = new Base(presets.SIMPLE64);
  static readonly BASE86 = new Base(presets.BASE86);

  static readonly PRESETS: readonly Base[] = [
    Base.BASE2, Base.BASE8, Base.BASE10, Base.BASE16, Base.BASE36,
    Base.BASE64, Base.URI_SAFE, Base.SIMPLE64, Base.BASE86,
  ];

  // ── Construction ─────────────────────────────────────────────────────────

  /** Throws `AlphabetError` when the digits or signs are unusable. */
  static from(spec: AlphabetSpec): Base {
    return new Base(new Alphabet(spec));
  }

  static make(spec: AlphabetSpec): Effect.Effect<Base, AlphabetError> {
    return Effect.map(Alphabet.make(spec), (alphabet) => new Base(alphabet));
  }

  static deserialize(data: string): Base {
    return new Base(Alphabet.deserialize(data));
  }

  static scrambled(random: Rng): Base {
    return new Base(scrambledAlphabet(random));
  }

  scramble(random: Rng): Base {
    return new Base(scramble(this.alphabet, random));
  }

  serialize(): string {
    return this.alphabet.serialize();
  }

  get radix(): number {
    return this.alphabet.radix;
  }

  equals(other: Base): boolean {
    return this.alphabet.equals(other.alphabet);
  }

  hashCode(): number {
    return fnv1a(this.serialize()) | 0;
  }

  toString(): string {
    return `Base(${this.alphabet.radix}: ${this.alphabet.digits})`;
  }

  // ── Encoding ─────────────────────────────────────────────────────────────

  private _appendSigned(buffer: TextBuffer, value: number | bigint, kind: NumberKind): TextBuffer {
    if (typeof value === "bigint") return appendSignedLong(this.alphabet, buffer, value);
    switch (kind) {
      case "double": return appendSignedDouble(this.alphabet, buffer, value);
      case "float": return appendSignedFloat(this.alphabet, buffer, value);
      default: return appendSigned(this.alphabet, buffer, value, kind);
    }
  }

  private _appendUnsigned(buffer: TextBuffer, value: number | bigint, kind: NumberKind): TextBuffer {
    if (typeof value === "bigint") return appendUnsignedLong(this.alphabet, buffer, value);
    switch (kind) {
      case "double": return appendUnsignedDouble(this.alphabet, buffer, value);
      case "float": return appendUnsignedFloat(this.alphabet, buffer, value);
      default: return appendUnsigned(this.alphabet, buffer, value, kind);
    }
  }

  /**
   * Minimal digits with a leading negative sign. A bigint is a 64-bit long;
   * "float" and "double" write the bit-exact form read by `readFloatExact`
   * and `readDoubleExact`.
   */
  signed(value: bigint): string;
  signed(value: number, kind?: NumberKind): string;
  signed(value: number | bigint, kind: NumberKind = "int"): string {
    return this._appendSigned(new TextBuffer(), value, kind).toString();
  }

  /** Fixed-width digits of the bit pattern; floats get a leading '.'. */
  unsigned(value: bigint): string;
  unsigned(value: number, kind?: NumberKind): string;
  unsigned(value: number | bigint, kind: NumberKind = "int"): string {
    return this._appendUnsigned(new TextBuffer(), value, kind).toString();
  }

  appendSigned(buffer: TextBuffer, value: bigint): TextBuffer;
  appendSigned(buffer: TextBuffer, value: number, kind?: NumberKind): TextBuffer;
  appendSigned(buffer: TextBuffer, value: number | bigint, kind: NumberKind = "int"): TextBuffer {
    return this._appendSigned(buffer, value, kind);
  }

  appendUnsigned(buffer: TextBuffer, value: bigint): TextBuffer;
  appendUnsigned(buffer: TextBuffer, value: number, kind?: NumberKind): TextBuffer;
  appendUnsigned(buffer: TextBuffer, value: number | bigint, kind: NumberKind = "int"): TextBuffer {
    return this._appendUnsigned(buffer, value, kind);
  }

  // ── Lenient readers ──────────────────────────────────────────────────────

  read(text: string, kind: IntKind, start = 0, end = text.length): number {
    return readInteger(this.alphabet, text, kind, start, end);
  }

  readInt(text: string, start = 0, end = text.length): number {
    return readInteger(this.alphabet, text, "int", start, end);
  }

  readLong(text: string, start = 0, end = text.length): bigint {
    return readLong(this.alphabet, text, start, end);
  }

  readShort(text: string, start = 0, end = text.length): number {
    return readInteger(this.alphabet, text, "short", start, end);
  }

  readByte(text: string, start = 0, end = text.length): number {
    return readInteger(this.alphabet, text, "byte", start, end);
  }

  readChar(text: string, start = 0, end = text.length): number {
    return readInteger(this.alphabet, text, "char", start, end);
  }

  readDoubleExact(text: string, start = 0, end = text.length): number {
    return readDoubleExact(this.alphabet, text, start, end);
  }

  readFloatExact(text: string, start = 0, end = text.length): number {
    return readFloatExact(this.alphabet, text, start, end);
  }

  // ── Decimal modes ────────────────────────────────────────────────────────
  // Decimal text always uses ASCII digits, '-' and '.', whatever the alphabet.

  general(value: number, options?: FormatOptions): string {
    return general(value, options);
  }

  friendly(value: number, options?: FormatOptions): string {
    return friendly(value, options);
  }

  scientific(value: number, options?: FormatOptions): string {
    return scientific(value, options);
  }

  decimal(value: number, options?: DecimalOptions): string {
    return decimal(value, options);
  }

  appendGeneral(buffer: TextBuffer, value: number, options?: FormatOptions): TextBuffer {
    return buffer.append(general(value, options));
  }

  appendFriendly(buffer: TextBuffer, value: number, options?: FormatOptions): TextBuffer {
    return buffer.append(friendly(value, options));
  }

  appendScientific(buffer: TextBuffer, value: number, options?: FormatOptions): TextBuffer {
    return buffer.append(scientific(value, options));
  }

  appendDecimal(buffer: TextBuffer, value: number, options?: DecimalOptions): TextBuffer {
    return buffer.append(decimal(value, options));
  }

  readDouble(text: string, start = 0, end = text.length): number {
    return readDecimal(text, start, end);
  }

  readFloat(text: string, start = 0, end = text.length): number {
    return readDecimalFloat(text, start, end);
  }

  // ── Batch ────────────────────────────────────────────────────────────────

  /** Integers as signed text, floats in the general decimal layout. */
  join(delimiter: string, array: ElementArray, start?: number, length?: number): string {
    return this.appendJoined(new TextBuffer(), delimiter, array, start, length).toString();
  }

  appendJoined(buffer: TextBuffer, delimiter: string, array: ElementArray, start?: number, length?: number): TextBuffer {
    return appendJoinedAny(this._general, buffer, delimiter, array, start, length);
  }

  /** Like {@link join}, but floats use the bit-exact encoding. */
  joinExact(delimiter: string, array: ElementArray, start?: number, length?: number): string {
    return this.appendJoinedExact(new TextBuffer(), delimiter, array, start, length).toString();
  }

  appendJoinedExact(buffer: TextBuffer, delimiter: string, array: ElementArray, start?: number, length?: number): TextBuffer {
    return appendJoinedAny(this._exact, buffer, delimiter, array, start, length);
  }

  /** Floats in plain decimal, each cut or padded to exactly `lengthLimit` characters. */
  joinDecimal(delimiter: string, lengthLimit: number, array: Float32Array | Float64Array, start?: number, length?: number): string {
    return this.appendJoinedDecimal(new TextBuffer(), delimiter, lengthLimit, array, start, length).toString();
  }

  appendJoinedDecimal(
    buffer: TextBuffer,
    delimiter: string,
    lengthLimit: number,
    array: Float32Array | Float64Array,
    start?: number,
    length?: number,
  ): TextBuffer {
    return appendJoinedFloats(decimalCodecs(lengthLimit), buffer, delimiter, array, start, length);
  }

  split<K extends ElementKind>(kind: K, text: string, delimiter: string, start = 0, end = text.length): KindArrays[K] {
    return splitWith(this._general[kind], text, delimiter, start, end);
  }

  splitExact<K extends ElementKind>(kind: K, text: string, delimiter: string, start = 0, end = text.length): KindArrays[K] {
    return splitWith(this._exact[kind], text, delimiter, start, end);
  }

  join2D<K extends ElementKind>(kind: K, major: string, minor: string, rows: readonly KindArrays[K][]): string {
    return this.appendJoined2D(new TextBuffer(), kind, major, minor, rows).toString();
  }

  /** Throws `ConfigError` when the delimiters are empty or equal. */
  appendJoined2D<K extends ElementKind>(
    buffer: TextBuffer,
    kind: K,
    major: string,
    minor: string,
    rows: readonly KindArrays[K][],
  ): TextBuffer {
    return appendJoined2DWith(this._general[kind], buffer, major, minor, rows);
  }

  joinExact2D<K extends ElementKind>(kind: K, major: string, minor: string, rows: readonly KindArrays[K][]): string {
    return this.appendJoinedExact2D(new TextBuffer(), kind, major, minor, rows).toString();
  }

  appendJoinedExact2D<K extends ElementKind>(
    buffer: TextBuffer,
    kind: K,
    major: string,
    minor: string,
    rows: readonly KindArrays[K][],
  ): TextBuffer {
    return appendJoined2DWith(this._exact[kind], buffer, major, minor, rows);
  }

  split2D<K extends ElementKind>(
    kind: K,
    text: string,
    major: string,
    minor: string,
    start = 0,
    end = text.length,
  ): KindArrays[K][] {
    return split2DWith(this._general[kind], text, major, minor, start, end);
  }

  splitExact2D<K extends ElementKind>(
    kind: K,
    text: string,
    major: string,
    minor: string,
    start = 0,
    end = text.length,
  ): KindArrays[K][] {
    return split2DWith(this._exact[kind], text, major, minor, start, end);
  }

  static count(text: string, delimiter: string, start = 0, end = -1): number {
    return count(text, delimiter, start, end);
  }

  static countDelimiters(text: string, delimiter: string, start = 0, end = -1): number {
    return countDelimiters(text, delimiter, start, end);
  }

  // ── Readable literals ────────────────────────────────────────────────────

  static readable(value: bigint): string;
  static readable(value: number, kind?: NumberKind): string;
  static readable(value: number | bigint, kind: NumberKind = "int"): string {
    if (typeof value === "bigint") return readableLong(value);
    switch (kind) {
      case "double": return readableDouble(value);
      case "float": return readableFloat(value);
      case "char": return readableChar(value);
      default: return readableInt(value, kind);
    }
  }

  static joinReadable(delimiter: string, array: ElementArray, start?: number, length?: number): string {
    return appendJoinedAny(READABLE_CODECS, new TextBuffer(), delimiter, array, start, length).toString();
  }

  static splitReadable<K extends ElementKind>(kind: K, text: string, delimiter: string, start = 0, end = text.length): KindArrays[K] {
    return splitWith(READABLE_CODECS[kind], text, delimiter, start, end);
  }
}

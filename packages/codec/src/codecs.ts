/**
 * Element codecs for every kind, in each text style the batch layer supports.
 */
import type { ElementKind, KindArrays, TextBuffer } from "@radix/core";
import { decimal, general, readDecimal, readDecimalFloat } from "@radix/ryu";
import type { Alphabet } from "./alphabet.js";
import type { ElementCodec } from "./batch.js";
import { appendSigned, appendSignedLong } from "./integer.js";
import { readInteger, readLong } from "./lenient.js";
import {
  appendSignedDouble,
  appendSignedFloat,
  readDoubleExact,
  readFloatExact,
} from "./exact.js";
import {
  readableChar,
  readableDouble,
  readableFloat,
  readableInt,
  readableLong,
  readReadableChar,
  readReadableDouble,
  readReadableFloat,
  readReadableInt,
  readReadableLong,
} from "./readable.js";

export type CodecMap = { readonly [K in ElementKind]: ElementCodec<KindArrays[K]> };

export type FloatCodecMap = {
  readonly float: ElementCodec<Float32Array>;
  readonly double: ElementCodec<Float64Array>;
};

function integerCodecs(alphabet: Alphabet): Omit<CodecMap, "float" | "double"> {
  return {
    byte: {
      create: (n) => new Int8Array(n),
      size: (a) => a.length,
      append: (buf, a, i) => { appendSigned(alphabet, buf, a[i], "byte"); },
      assign: (a, i, text, s, e) => { a[i] = readInteger(alphabet, text, "byte", s, e); },
    },
    short: {
      create: (n) => new Int16Array(n),
      size: (a) => a.length,
      append: (buf, a, i) => { appendSigned(alphabet, buf, a[i], "short"); },
      assign: (a, i, text, s, e) => { a[i] = readInteger(alphabet, text, "short", s, e); },
    },
    char: {
      create: (n) => new Uint16Array(n),
      size: (a) => a.length,
      append: (buf, a, i) => { appendSigned(alphabet, buf, a[i], "char"); },
      assign: (a, i, text, s, e) => { a[i] = readInteger(alphabet, text, "char", s, e); },
    },
    int: {
      create: (n) => new Int32Array(n),
      size: (a) => a.length,
      append: (buf, a, i) => { appendSigned(alphabet, buf, a[i], "int"); },
      assign: (a, i, text, s, e) => { a[i] = readInteger(alphabet, text, "int", s, e); },
    },
    long: {
      create: (n) => new BigInt64Array(n),
      size: (a) => a.length,
      append: (buf, a, i) => { appendSignedLong(alphabet, buf, a[i]); },
      assign: (a, i, text, s, e) => { a[i] = readLong(alphabet, text, s, e); },
    },
  };
}

function floatCodecs(
  write: (buf: TextBuffer, value: number, kind: "float" | "double") => void,
  readFloat: (text: string, s: number, e: number) => number,
  readDouble: (text: string, s: number, e: number) => number,
): FloatCodecMap {
  return {
    float: {
      create: (n) => new Float32Array(n),
      size: (a) => a.length,
      append: (buf, a, i) => write(buf, a[i], "float"),
      assign: (a, i, text, s, e) => { a[i] = readFloat(text, s, e); },
    },
    double: {
      create: (n) => new Float64Array(n),
      size: (a) => a.length,
      append: (buf, a, i) => write(buf, a[i], "double"),
      assign: (a, i, text, s, e) => { a[i] = readDouble(text, s, e); },
    },
  };
}

/** Integers signed in the alphabet, floats as bit-exact encodings. */
export function exactCodecs(alphabet: Alphabet): CodecMap {
  return {
    ...integerCodecs(alphabet),
    ...floatCodecs(
      (buf, v, kind) => {
        if (kind === "float") appendSignedFloat(alphabet, buf, v);
        else appendSignedDouble(alphabet, buf, v);
      },
      (text, s, e) => readFloatExact(alphabet, text, s, e),
      (text, s, e) => readDoubleExact(alphabet, text, s, e),
    ),
  };
}

/** Integers signed in the alphabet, floats in the general decimal layout. */
export function generalCodecs(alphabet: Alphabet): CodecMap {
  return {
    ...integerCodecs(alphabet),
    ...floatCodecs(
      (buf, v, kind) => { buf.append(general(v, { kind })); },
      (text, s, e) => readDecimalFloat(text, s, e),
      (text, s, e) => readDecimal(text, s, e),
    ),
  };
}

/** Floats in plain decimal cut or padded to `lengthLimit` characters. */
export function decimalCodecs(lengthLimit: number): FloatCodecMap {
  return floatCodecs(
    (buf, v, kind) => { buf.append(decimal(v, { kind, lengthLimit })); },
    (text, s, e) => readDecimalFloat(text, s, e),
    (text, s, e) => readDecimal(text, s, e),
  );
}

/** Source-literal text for every kind. */
export const READABLE_CODECS: CodecMap = {
  byte: {
    create: (n) => new Int8Array(n),
    size: (a) => a.length,
    append: (buf, a, i) => { buf.append(readableInt(a[i], "byte")); },
    assign: (a, i, text, s, e) => { a[i] = readReadableInt(text, "byte", s, e); },
  },
  short: {
    create: (n) => new Int16Array(n),
    size: (a) => a.length,
    append: (buf, a, i) => { buf.append(readableInt(a[i], "short")); },
    assign: (a, i, text, s, e) => { a[i] = readReadableInt(text, "short", s, e); },
  },
  char: {
    create: (n) => new Uint16Array(n),
    size: (a) => a.length,
    append: (buf, a, i) => { buf.append(readableChar(a[i])); },
    assign: (a, i, text, s, e) => { a[i] = readReadableChar(text, s, e); },
  },
  int: {
    create: (n) => new Int32Array(n),
    size: (a) => a.length,
    append: (buf, a, i) => { buf.append(readableInt(a[i], "int")); },
    assign: (a, i, text, s, e) => { a[i] = readReadableInt(text, "int", s, e); },
  },
  long: {
    create: (n) => new BigInt64Array(n),
    size: (a) => a.length,
    append: (buf, a, i) => { buf.append(readableLong(a[i])); },
    assign: (a, i, text, s, e) => { a[i] = readReadableLong(text, s, e); },
  },
  ...floatCodecs(
    (buf, v, kind) => { buf.append(kind === "float" ? readableFloat(v) : readableDouble(v)); },
    (text, s, e) => readReadableFloat(text, s, e),
    (text, s, e) => readReadableDouble(text, s, e),
  ),
};

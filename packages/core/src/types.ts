/**
 * Element kinds shared by the integer codec, the float formatter and the
 * batch join/split layer.
 */

// ── Kinds ──────────────────────────────────────────────────────────────────
export type IntKind = "byte" | "short" | "char" | "int";
export type FloatKind = "float" | "double";
export type ElementKind = IntKind | "long" | FloatKind;

/** Every fixed-width integer kind, including the 64-bit one. */
export type IntegerKind = IntKind | "long";

export const ELEMENT_KINDS: readonly ElementKind[] = ["byte", "short", "char", "int", "long", "float", "double"];

export function isElementKind(name: string): name is ElementKind {
  return ELEMENT_KINDS.some((kind) => kind === name);
}

// ── Widths ─────────────────────────────────────────────────────────────────
export interface Width {
  readonly bits: number;
  /** False only for char, which never carries a sign. */
  readonly signed: boolean;
}

export const WIDTHS: { readonly [K in IntegerKind]: Width } = {
  byte: { bits: 8, signed: true },
  short: { bits: 16, signed: true },
  char: { bits: 16, signed: false },
  int: { bits: 32, signed: true },
  long: { bits: 64, signed: true },
};

// ── Arrays ─────────────────────────────────────────────────────────────────
export interface KindArrays {
  byte: Int8Array;
  short: Int16Array;
  char: Uint16Array;
  int: Int32Array;
  long: BigInt64Array;
  float: Float32Array;
  double: Float64Array;
}

export interface KindValues {
  byte: number;
  short: number;
  char: number;
  int: number;
  long: bigint;
  float: number;
  double: number;
}

export type ElementArray = KindArrays[ElementKind];

/** Wrap a JS number to the two's-complement (or, for char, unsigned) range of a 32-bit-or-narrower kind. */
export function wrapInt(value: number, kind: IntKind): number {
  switch (kind) {
    case "byte": return (value << 24) >> 24;
    case "short": return (value << 16) >> 16;
    case "char": return value & 0xffff;
    case "int": return value | 0;
  }
}

/**
 * Conversions between command-line value text and typed element arrays.
 */
import type { ElementArray, ElementKind, FloatKind } from "@radix/core";
import { general } from "@radix/ryu";
import { parseLong, parseNumber } from "./parse.js";

export function toArray(kind: ElementKind, values: readonly string[]): ElementArray {
  switch (kind) {
    case "byte": return Int8Array.from(values, parseNumber);
    case "short": return Int16Array.from(values, parseNumber);
    case "char": return Uint16Array.from(values, parseNumber);
    case "int": return Int32Array.from(values, parseNumber);
    case "long": return BigInt64Array.from(values, parseLong);
    case "float": return Float32Array.from(values, parseNumber);
    case "double": return Float64Array.from(values, parseNumber);
  }
}

export function renderFloat(value: number, kind: FloatKind): string {
  return general(value, { kind });
}

export function renderArray(array: ElementArray): string[] {
  if (array instanceof BigInt64Array) return Array.from(array, (v) => v.toString());
  if (array instanceof Float32Array) return Array.from(array, (v) => renderFloat(v, "float"));
  if (array instanceof Float64Array) return Array.from(array, (v) => renderFloat(v, "double"));
  return Array.from(array, (v) => String(v));
}

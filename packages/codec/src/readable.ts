/**
 * Source-literal text: `-1`, `-1L`, `1.23`, `1.23f`, `'\n'`.
 *
 * Integers are plain base-10, longs carry an `L` suffix, doubles use the
 * general layout, floats the general layout plus `f`, and chars are quoted
 * with C-family escapes (`\uXXXX` for anything outside printable ASCII).
 */
import { TextBuffer, wrapInt, type IntKind } from "@radix/core";
import { general, readDecimal, readDecimalFloat } from "@radix/ryu";

const CHAR_ESCAPES = new Map<number, string>([
  [8, "\\b"],
  [9, "\\t"],
  [10, "\\n"],
  [12, "\\f"],
  [13, "\\r"],
  [39, "\\'"],
  [92, "\\\\"],
]);

const UNESCAPES = new Map<string, number>([
  ["b", 8],
  ["t", 9],
  ["n", 10],
  ["f", 12],
  ["r", 13],
  ["'", 39],
  ['"', 34],
  ["\\", 92],
  ["0", 0],
]);

// ── Writers ────────────────────────────────────────────────────────────────

export function readableInt(value: number, kind: Exclude<IntKind, "char"> = "int"): string {
  return String(wrapInt(value, kind));
}

export function readableLong(value: bigint): string {
  return `${BigInt.asIntN(64, value)}L`;
}

export function readableDouble(value: number): string {
  return general(value);
}

export function readableFloat(value: number): string {
  return `${general(value, { kind: "float" })}f`;
}

export function readableChar(code: number): string {
  const c = code & 0xffff;
  const escape = CHAR_ESCAPES.get(c);
  if (escape !== undefined) return `'${escape}'`;
  if (c > 0x20 && c < 0x7f) return `'${String.fromCharCode(c)}'`;
  return `'\\u${c.toString(16).toUpperCase().padStart(4, "0")}'`;
}

export function appendReadableChar(buffer: TextBuffer, code: number): TextBuffer {
  return buffer.append(readableChar(code));
}

// ── Readers ────────────────────────────────────────────────────────────────

function trimmed(text: string, start: number, end: number): string {
  return text.slice(Math.max(0, start), Math.min(text.length, end)).trim();
}

/** Reads `-12` (any `L` suffix is ignored) as a 32-bit-or-narrower integer; malformed reads as 0. */
export function readReadableInt(text: string, kind: IntKind = "int", start = 0, end = text.length): number {
  const body = trimmed(text, start, end).replace(/[lL]$/, "");
  if (!/^[-+]?\d+$/.test(body)) return 0;
  const value = Number(body);
  if (Math.abs(value) >= 2 ** 32) return 0;
  return wrapInt(value, kind);
}

export function readReadableLong(text: string, start = 0, end = text.length): bigint {
  const body = trimmed(text, start, end).replace(/[lL]$/, "");
  if (!/^[-+]?\d+$/.test(body)) return 0n;
  const value = BigInt(body);
  if (value >= 1n << 64n || value <= -(1n << 64n)) return 0n;
  return BigInt.asIntN(64, value);
}

export function readReadableDouble(text: string, start = 0, end = text.length): number {
  const body = trimmed(text, start, end).replace(/[dD]$/, "");
  return readDecimal(body);
}

export function readReadableFloat(text: string, start = 0, end = text.length): number {
  const body = trimmed(text, start, end).replace(/[fF]$/, "");
  return readDecimalFloat(body);
}

/** Reads a quoted char literal; anything malformed reads as 0. */
export function readReadableChar(text: string, start = 0, end = text.length): number {
  const body = trimmed(text, start, end);
  if (body.length < 3 || body[0] !== "'" || body[body.length - 1] !== "'") return 0;
  const inner = body.slice(1, -1);
  if (inner.length === 1) return inner.charCodeAt(0);
  if (inner[0] !== "\\") return 0;
  if (inner.length === 2) return UNESCAPES.get(inner[1]) ?? 0;
  if (/^\\u[0-9a-fA-F]{4}$/.test(inner)) return parseInt(inner.slice(2), 16);
  return 0;
}

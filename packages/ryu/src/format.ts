/**
 * Text layouts over the shortest expansion: general, friendly, scientific,
 * plain decimal with optional precision and length limit.
 */
import type { FloatKind } from "@radix/core";
import { expandDouble } from "./double.js";
import { expandFloat } from "./float.js";
import {
  DEFAULT_EXPONENT_MARKER,
  FRIENDLY_WINDOW,
  GENERAL_WINDOW,
  type Expansion,
  type Notation,
  type Window,
} from "./notation.js";

export interface FormatOptions {
  /** Read the value as binary32 ("float") or binary64 ("double", the default). */
  readonly kind?: FloatKind;
  readonly exponentMarker?: string;
}

export interface DecimalOptions extends FormatOptions {
  /** Exact number of fractional digits, rounded half-to-even from the shortest digits. */
  readonly precision?: number;
  /** Exact output length; longer text is cut, shorter text is padded. */
  readonly lengthLimit?: number;
}

// ── Expansion and rendering ────────────────────────────────────────────────

export function expand(value: number, kind: FloatKind, notation: Notation): Expansion {
  return kind === "float" ? expandFloat(value, notation) : expandDouble(value, notation);
}

function nonFinite(value: number): string | undefined {
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "Infinity";
  if (value === -Infinity) return "-Infinity";
  return undefined;
}

export function renderScientific(x: Expansion, marker: string = DEFAULT_EXPONENT_MARKER): string {
  const sign = x.negative ? "-" : "";
  const tail = x.digits.length > 1 ? x.digits.slice(1) : "0";
  return `${sign}${x.digits[0]}.${tail}${marker}${x.exponent}`;
}

export function renderPlain(x: Expansion): string {
  const sign = x.negative ? "-" : "";
  const { digits, exponent } = x;
  if (exponent < 0) {
    return `${sign}0.${"0".repeat(-exponent - 1)}${digits}`;
  }
  if (exponent + 1 >= digits.length) {
    return `${sign}${digits}${"0".repeat(exponent + 1 - digits.length)}.0`;
  }
  return `${sign}${digits.slice(0, exponent + 1)}.${digits.slice(exponent + 1)}`;
}

// ── Modes ──────────────────────────────────────────────────────────────────

/** Shortest text, scientific outside `window`. */
export function windowed(value: number, window: Window, options: FormatOptions = {}): string {
  const special = nonFinite(value);
  if (special !== undefined) return special;
  if (value === 0) return Object.is(value, -0) ? "-0.0" : "0.0";
  const x = expand(value, options.kind ?? "double", window);
  return x.scientific ? renderScientific(x, options.exponentMarker) : renderPlain(x);
}

export function general(value: number, options: FormatOptions = {}): string {
  return windowed(value, GENERAL_WINDOW, options);
}

export function friendly(value: number, options: FormatOptions = {}): string {
  return windowed(value, FRIENDLY_WINDOW, options);
}

export function scientific(value: number, options: FormatOptions = {}): string {
  const special = nonFinite(value);
  if (special !== undefined) return special;
  const marker = options.exponentMarker ?? DEFAULT_EXPONENT_MARKER;
  if (value === 0) return `${Object.is(value, -0) ? "-" : ""}0.0${marker}0`;
  return renderScientific(expand(value, options.kind ?? "double", "scientific"), marker);
}

export function decimal(value: number, options: DecimalOptions = {}): string {
  const { precision, lengthLimit } = options;
  const special = nonFinite(value);
  if (special !== undefined) {
    return lengthLimit === undefined ? special : fitLength(special, lengthLimit, " ");
  }
  const x: Expansion = value === 0
    ? { negative: Object.is(value, -0), digits: "0", exponent: 0, scientific: false }
    : expand(value, options.kind ?? "double", "plain");
  const text = precision === undefined ? renderPlain(x) : renderFixed(x, Math.max(0, Math.floor(precision)));
  if (lengthLimit === undefined) return text;
  if (text.length < lengthLimit && !text.includes(".")) {
    return fitLength(`${text}.`, lengthLimit, "0");
  }
  return fitLength(text, lengthLimit, "0");
}

function fitLength(text: string, limit: number, pad: string): string {
  const size = Math.max(0, Math.floor(limit));
  if (text.length >= size) return text.slice(0, size);
  return text + pad.repeat(size - text.length);
}

// ── Fixed precision ────────────────────────────────────────────────────────

/** Add one to a string of ASCII digits. */
function incrementDigits(digits: string): string {
  const out = digits.split("");
  let i = out.length - 1;
  while (i >= 0) {
    if (out[i] === "9") {
      out[i] = "0";
      i--;
    } else {
      out[i] = String.fromCharCode(out[i].charCodeAt(0) + 1);
      return out.join("");
    }
  }
  return `1${out.join("")}`;
}

function renderFixed(x: Expansion, precision: number): string {
  const sign = x.negative ? "-" : "";
  let whole: string;
  let fraction: string;
  if (x.exponent >= 0) {
    whole = x.digits.slice(0, x.exponent + 1).padEnd(x.exponent + 1, "0");
    fraction = x.digits.slice(x.exponent + 1);
  } else {
    whole = "0";
    fraction = "0".repeat(-x.exponent - 1) + x.digits;
  }

  if (fraction.length > precision) {
    const kept = whole + fraction.slice(0, precision);
    const dropped = fraction.slice(precision);
    const first = dropped.charCodeAt(0) - 48;
    const tie = first === 5 && /^5?0*$/.test(dropped);
    const lastKept = kept.charCodeAt(kept.length - 1) - 48;
    const roundUp = first > 5 || (first === 5 && (!tie || lastKept % 2 === 1));
    const rounded = roundUp ? incrementDigits(kept) : kept;
    const wholeLength = rounded.length - precision;
    whole = rounded.slice(0, wholeLength);
    fraction = rounded.slice(wholeLength);
  } else {
    fraction = fraction.padEnd(precision, "0");
  }
  return precision === 0 ? `${sign}${whole}` : `${sign}${whole}.${fraction}`;
}

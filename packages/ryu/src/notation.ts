/**
 * Output-mode policy: when a formatted value switches to scientific notation.
 */

/** Plain notation is used when the decimal exponent lies in [low, high). */
export interface Window {
  readonly low: number;
  readonly high: number;
}

export type Notation = Window | "scientific" | "plain";

/** Double.toString-compatible switch points. */
export const GENERAL_WINDOW: Window = { low: -3, high: 7 };

/** Wider window for human-facing output. */
export const FRIENDLY_WINDOW: Window = { low: -10, high: 10 };

export const DEFAULT_EXPONENT_MARKER = "E";

export function usesScientific(notation: Notation, exponent: number): boolean {
  if (notation === "scientific") return true;
  if (notation === "plain") return false;
  return !(exponent >= notation.low && exponent < notation.high);
}

/**
 * Decimal intermediate form of a finite, non-zero value: `digits` are the
 * significant ASCII digits, most significant first, and `exponent` is the
 * power of ten of the first one.
 */
export interface Expansion {
  readonly negative: boolean;
  readonly digits: string;
  readonly exponent: number;
  readonly scientific: boolean;
}

export function lowDigits(output: bigint | number, length: number): string {
  const text = output.toString();
  if (text.length > length) return text.slice(text.length - length);
  return text.padStart(length, "0");
}

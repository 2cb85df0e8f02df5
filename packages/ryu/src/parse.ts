/**
 * Lenient decimal reader for every layout `format.ts` produces.
 *
 * Accepts an optional sign, digits with at most one '.', an optional exponent
 * introduced by 'e', 'E' or a custom marker, and the NaN/Infinity literals.
 * Spaces around the number are ignored. Anything else reads as 0.
 */
import { DEFAULT_EXPONENT_MARKER } from "./notation.js";

function isDigit(code: number): boolean {
  return code >= 48 && code <= 57;
}

/** Returns the normalized literal, or undefined when the range is malformed. */
function scan(text: string, start: number, end: number, marker: string): string | undefined {
  let i = start;
  let to = end;
  while (i < to && text.charCodeAt(i) === 32) i++;
  while (to > i && text.charCodeAt(to - 1) === 32) to--;
  if (i >= to) return undefined;

  let sign = "";
  const first = text[i];
  if (first === "-" || first === "+") {
    sign = first === "-" ? "-" : "";
    i++;
  }
  const body = text.slice(i, to);
  if (body === "NaN") return "NaN";
  if (body === "Infinity") return `${sign}Infinity`;

  let mantissa = "";
  let digitCount = 0;
  let seenDot = false;
  while (i < to) {
    const code = text.charCodeAt(i);
    if (isDigit(code)) {
      digitCount++;
    } else if (code === 46 && !seenDot) {
      seenDot = true;
    } else {
      break;
    }
    mantissa += text[i];
    i++;
  }
  if (digitCount === 0) return undefined;
  if (i === to) return sign + mantissa;

  const c = text[i];
  if (c !== "e" && c !== "E" && c !== marker) return undefined;
  i++;
  let exponent = "";
  if (i < to && (text[i] === "-" || text[i] === "+")) {
    exponent = text[i];
    i++;
  }
  const digitsStart = i;
  while (i < to && isDigit(text.charCodeAt(i))) i++;
  if (i === digitsStart || i !== to) return undefined;
  return `${sign}${mantissa}e${exponent}${text.slice(digitsStart, to)}`;
}

export function readDecimal(
  text: string,
  start = 0,
  end = text.length,
  marker: string = DEFAULT_EXPONENT_MARKER,
): number {
  const literal = scan(text, Math.max(0, start), Math.min(text.length, end), marker);
  return literal === undefined ? 0 : Number(literal);
}

/** As {@link readDecimal}, rounded to binary32. */
export function readDecimalFloat(
  text: string,
  start = 0,
  end = text.length,
  marker: string = DEFAULT_EXPONENT_MARKER,
): number {
  return Math.fround(readDecimal(text, start, end, marker));
}

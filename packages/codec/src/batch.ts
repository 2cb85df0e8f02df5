/**
 * Delimited join/split over any element codec.
 *
 * 1-D text is `e0<delim>e1<delim>...`. 2-D text writes the major delimiter
 * before every row, so `[[1, 2], [], [3]]` joined with `;` and `,` is
 * `;1,2;;3`. Splitting never throws: malformed fields read as 0 and the
 * remaining fields are still read.
 */
import { ConfigError, TextBuffer } from "@radix/core";

/** How one element kind is written to and read from text. */
export interface ElementCodec<A> {
  create(size: number): A;
  size(array: A): number;
  append(buffer: TextBuffer, array: A, index: number): void;
  /** Read `text[start, end)` into `array[index]`. */
  assign(array: A, index: number, text: string, start: number, end: number): void;
}

// ── Counting ───────────────────────────────────────────────────────────────

function clampEnd(text: string, end: number): number {
  return end < 0 || end > text.length ? text.length : end;
}

/** Occurrences of `delimiter` starting inside [start, end); a negative end means the end of the text. */
export function countDelimiters(text: string, delimiter: string, start = 0, end = -1): number {
  const to = clampEnd(text, end);
  if (delimiter.length === 0 || start >= to) return 0;
  let count = 0;
  let at = text.indexOf(delimiter, Math.max(0, start));
  while (at >= 0 && at < to) {
    count++;
    at = text.indexOf(delimiter, at + delimiter.length);
  }
  return count;
}

/** Number of delimiter-separated fields in [start, end); 0 for an empty range. */
export function count(text: string, delimiter: string, start = 0, end = -1): number {
  const to = clampEnd(text, end);
  if (Math.max(0, start) >= to) return 0;
  return countDelimiters(text, delimiter, start, to) + 1;
}

// ── 1-D ────────────────────────────────────────────────────────────────────

export function appendJoinedWith<A>(
  codec: ElementCodec<A>,
  buffer: TextBuffer,
  delimiter: string,
  array: A,
  start = 0,
  length = codec.size(array),
): TextBuffer {
  const from = Math.max(0, start);
  const to = Math.min(codec.size(array), from + Math.max(0, length));
  for (let i = from; i < to; i++) {
    if (i > from) buffer.append(delimiter);
    codec.append(buffer, array, i);
  }
  return buffer;
}

export function splitWith<A>(codec: ElementCodec<A>, text: string, delimiter: string, start = 0, end = text.length): A {
  const from = Math.max(0, start);
  const to = clampEnd(text, end);
  if (delimiter.length === 0 || from >= to) return codec.create(0);
  const fields = countDelimiters(text, delimiter, from, to) + 1;
  const out = codec.create(fields);
  let fieldStart = from;
  for (let i = 0; i < fields - 1; i++) {
    const at = text.indexOf(delimiter, fieldStart);
    codec.assign(out, i, text, fieldStart, at);
    fieldStart = at + delimiter.length;
  }
  codec.assign(out, fields - 1, text, fieldStart, to);
  return out;
}

// ── 2-D ────────────────────────────────────────────────────────────────────

function requireDistinct(major: string, minor: string): void {
  if (major.length === 0 || minor.length === 0 || major === minor) {
    throw new ConfigError({
      message: `major and minor delimiters must be non-empty and different, got "${major}" and "${minor}"`,
    });
  }
}

export function appendJoined2DWith<A>(
  codec: ElementCodec<A>,
  buffer: TextBuffer,
  major: string,
  minor: string,
  rows: readonly A[],
): TextBuffer {
  requireDistinct(major, minor);
  for (const row of rows) {
    buffer.append(major);
    appendJoinedWith(codec, buffer, minor, row);
  }
  return buffer;
}

export function split2DWith<A>(
  codec: ElementCodec<A>,
  text: string,
  major: string,
  minor: string,
  start = 0,
  end = text.length,
): A[] {
  if (major.length === 0 || minor.length === 0 || major === minor) return [];
  const to = clampEnd(text, end);
  let at = text.indexOf(major, Math.max(0, start));
  if (at < 0 || at >= to) return [];
  const rows: A[] = [];
  while (at >= 0 && at < to) {
    const rowStart = at + major.length;
    const next = text.indexOf(major, rowStart);
    const rowEnd = next >= 0 && next < to ? next : to;
    rows.push(splitWith(codec, text, minor, rowStart, rowEnd));
    at = rowEnd === to ? -1 : next;
  }
  return rows;
}

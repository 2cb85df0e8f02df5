/**
 * IEEE-754 bit reinterpretation.
 *
 * Every call works on its own DataView; nothing here holds state between calls.
 */

const CANONICAL_FLOAT_NAN = 0x7fc00000;
const CANONICAL_DOUBLE_NAN = 0x7ff8000000000000n;

// ── binary32 ───────────────────────────────────────────────────────────────

export function floatToRawIntBits(value: number): number {
  const view = new DataView(new ArrayBuffer(4));
  view.setFloat32(0, value);
  return view.getInt32(0);
}

/** Like {@link floatToRawIntBits} but every NaN maps to the canonical quiet NaN. */
export function floatToIntBits(value: number): number {
  return Number.isNaN(value) ? CANONICAL_FLOAT_NAN : floatToRawIntBits(value);
}

export function intBitsToFloat(bits: number): number {
  const view = new DataView(new ArrayBuffer(4));
  view.setInt32(0, bits | 0);
  return view.getFloat32(0);
}

/** The float's bits with their four bytes in reverse order. */
export function floatToReversedIntBits(value: number): number {
  const view = new DataView(new ArrayBuffer(4));
  view.setFloat32(0, value, true);
  return view.getInt32(0, false);
}

export function reversedIntBitsToFloat(bits: number): number {
  const view = new DataView(new ArrayBuffer(4));
  view.setInt32(0, bits | 0, false);
  return view.getFloat32(0, true);
}

// ── binary64 ───────────────────────────────────────────────────────────────

export function doubleToRawLongBits(value: number): bigint {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  return view.getBigInt64(0);
}

export function doubleToLongBits(value: number): bigint {
  return Number.isNaN(value) ? CANONICAL_DOUBLE_NAN : doubleToRawLongBits(value);
}

export function longBitsToDouble(bits: bigint): number {
  const view = new DataView(new ArrayBuffer(8));
  view.setBigInt64(0, BigInt.asIntN(64, bits));
  return view.getFloat64(0);
}

export function doubleToReversedLongBits(value: number): bigint {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value, true);
  return view.getBigInt64(0, false);
}

export function reversedLongBitsToDouble(bits: bigint): number {
  const view = new DataView(new ArrayBuffer(8));
  view.setBigInt64(0, BigInt.asIntN(64, bits), false);
  return view.getFloat64(0, true);
}

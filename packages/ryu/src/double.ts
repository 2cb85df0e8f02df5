/**
 * Shortest round-trip decimal expansion of IEEE-754 binary64 values (Ryu).
 */
import { doubleToLongBits } from "@radix/core";
import { DOUBLE_TABLES, mulShift } from "./tables.js";
import { lowDigits, usesScientific, type Expansion, type Notation } from "./notation.js";

const MANTISSA_BITS = 52;
const EXPONENT_BIAS = 1023;
const MANTISSA_MASK = (1n << 52n) - 1n;
const IMPLICIT_BIT = 1n << 52n;

/** bitLength(5^e) for 0 <= e <= 3528. */
export function pow5bitsDouble(e: number): number {
  return (Math.imul(e, 1217359) >>> 19) + 1;
}

function pow5Factor(value: bigint): number {
  let count = 0;
  let v = value;
  while (v > 0n && v % 5n === 0n) {
    v /= 5n;
    count++;
  }
  return count;
}

function multipleOfPowerOf5(value: bigint, q: number): boolean {
  return pow5Factor(value) >= q;
}

/**
 * Expand a finite, non-zero double into its shortest digit string.
 *
 * With a scientific layout at least two significant digits are kept, so
 * `1e21` expands to "10" rather than "1".
 */
export function expandDouble(value: number, notation: Notation): Expansion {
  const bits = BigInt.asUintN(64, doubleToLongBits(value));
  const negative = bits >> 63n === 1n;
  const ieeeExponent = Number((bits >> BigInt(MANTISSA_BITS)) & 0x7ffn);
  const ieeeMantissa = bits & MANTISSA_MASK;

  let e2: number;
  let m2: bigint;
  if (ieeeExponent === 0) {
    e2 = 1 - EXPONENT_BIAS - MANTISSA_BITS;
    m2 = ieeeMantissa;
  } else {
    e2 = ieeeExponent - EXPONENT_BIAS - MANTISSA_BITS;
    m2 = ieeeMantissa | IMPLICIT_BIT;
  }

  // ── Interval of legal representations ────────────────────────────────────
  const even = (m2 & 1n) === 0n;
  const mv = 4n * m2;
  const mp = mv + 2n;
  const mmShift = m2 !== IMPLICIT_BIT || ieeeExponent === 1 ? 1n : 0n;
  const mm = mv - 1n - mmShift;
  e2 -= 2;

  // ── Convert to a decimal power base ──────────────────────────────────────
  let dv: bigint;
  let dp: bigint;
  let dm: bigint;
  let e10: number;
  let dmIsTrailingZeros = false;
  let dvIsTrailingZeros = false;
  const { pow5, pow5Inv, pow5Bits, pow5InvBits } = DOUBLE_TABLES;
  if (e2 >= 0) {
    const q = Math.max(0, ((e2 * 78913) >>> 18) - 1);
    const k = pow5InvBits + pow5bitsDouble(q) - 1;
    const i = -e2 + q + k;
    const factor = pow5Inv[q];
    dv = mulShift(mv, factor, i);
    dp = mulShift(mp, factor, i);
    dm = mulShift(mm, factor, i);
    e10 = q;
    if (q <= 21) {
      if (mv % 5n === 0n) {
        dvIsTrailingZeros = multipleOfPowerOf5(mv, q);
      } else if (even) {
        dmIsTrailingZeros = multipleOfPowerOf5(mm, q);
      } else if (multipleOfPowerOf5(mp, q)) {
        dp -= 1n;
      }
    }
  } else {
    const q = Math.max(0, ((-e2 * 732923) >>> 20) - 1);
    const i = -e2 - q;
    const k = pow5bitsDouble(i) - pow5Bits;
    const j = q - k;
    const factor = pow5[i];
    dv = mulShift(mv, factor, j);
    dp = mulShift(mp, factor, j);
    dm = mulShift(mm, factor, j);
    e10 = q + e2;
    if (q <= 1) {
      dvIsTrailingZeros = true;
      if (even) {
        dmIsTrailingZeros = mmShift === 1n;
      } else {
        dp -= 1n;
      }
    } else if (q < 63) {
      dvIsTrailingZeros = (mv & ((1n << BigInt(q - 1)) - 1n)) === 0n;
    }
  }

  // ── Shortest digits inside the interval ──────────────────────────────────
  const vplength = dp.toString().length;
  const exponent = e10 + vplength - 1;
  const scientific = usesScientific(notation, exponent);

  let removed = 0;
  let lastRemovedDigit = 0n;
  let output: bigint;
  if (dmIsTrailingZeros || dvIsTrailingZeros) {
    while (dp / 10n > dm / 10n) {
      if (dp < 100n && scientific) break;
      dmIsTrailingZeros = dmIsTrailingZeros && dm % 10n === 0n;
      dvIsTrailingZeros = dvIsTrailingZeros && lastRemovedDigit === 0n;
      lastRemovedDigit = dv % 10n;
      dp /= 10n;
      dv /= 10n;
      dm /= 10n;
      removed++;
    }
    if (dmIsTrailingZeros) {
      while (dm > 0n && dm % 10n === 0n) {
        if (dp < 100n && scientific) break;
        dvIsTrailingZeros = dvIsTrailingZeros && lastRemovedDigit === 0n;
        lastRemovedDigit = dv % 10n;
        dp /= 10n;
        dv /= 10n;
        dm /= 10n;
        removed++;
      }
    }
    if (dvIsTrailingZeros && lastRemovedDigit === 5n && (dv & 1n) === 0n) {
      // exact value ends in ...50..0: round half to even
      lastRemovedDigit = 4n;
    }
    output = dv + ((dv === dm && !dmIsTrailingZeros) || lastRemovedDigit >= 5n ? 1n : 0n);
  } else {
    while (dp / 10n > dm / 10n) {
      if (dp < 100n && scientific) break;
      lastRemovedDigit = dv % 10n;
      dp /= 10n;
      dv /= 10n;
      dm /= 10n;
      removed++;
    }
    output = dv + (dv === dm || lastRemovedDigit >= 5n ? 1n : 0n);
  }

  return {
    negative,
    digits: lowDigits(output, vplength - removed),
    exponent,
    scientific,
  };
}

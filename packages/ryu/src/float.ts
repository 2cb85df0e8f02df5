/**
 * Shortest round-trip decimal expansion of IEEE-754 binary32 values.
 *
 * Same search as the binary64 version, but with 32-bit intermediates and a
 * lookahead for the last removed digit.
 */
import { floatToIntBits } from "@radix/core";
import { FLOAT_TABLES, mulShift } from "./tables.js";
import { lowDigits, usesScientific, type Expansion, type Notation } from "./notation.js";

const MANTISSA_BITS = 23;
const EXPONENT_BIAS = 127;
const MANTISSA_MASK = (1 << MANTISSA_BITS) - 1;
const IMPLICIT_BIT = 1 << MANTISSA_BITS;

// log10(2), log10(5) and log2(5), scaled by 1e7 and truncated
const LOG10_2_NUMERATOR = 3010299;
const LOG10_5_NUMERATOR = 6989700;
const LOG2_5_NUMERATOR = 23219280;
const LOG_DENOMINATOR = 10000000;

export function pow5bitsFloat(e: number): number {
  return e === 0 ? 1 : Math.floor((e * LOG2_5_NUMERATOR + LOG_DENOMINATOR - 1) / LOG_DENOMINATOR);
}

function pow5Factor(value: number): number {
  let count = 0;
  let v = value;
  while (v > 0 && v % 5 === 0) {
    v = Math.floor(v / 5);
    count++;
  }
  return count;
}

function mulPow5(m: number, i: number, j: number): number {
  return Number(mulShift(BigInt(m), FLOAT_TABLES.pow5[i], j));
}

function mulPow5Inv(m: number, q: number, j: number): number {
  return Number(mulShift(BigInt(m), FLOAT_TABLES.pow5Inv[q], j));
}

function div10(v: number): number {
  return Math.floor(v / 10);
}

/** Expand a finite, non-zero float (any number is first rounded to binary32). */
export function expandFloat(value: number, notation: Notation): Expansion {
  const bits = floatToIntBits(value);
  const negative = bits < 0;
  const ieeeExponent = (bits >>> MANTISSA_BITS) & 0xff;
  const ieeeMantissa = bits & MANTISSA_MASK;

  let e2: number;
  let m2: number;
  if (ieeeExponent === 0) {
    e2 = 1 - EXPONENT_BIAS - MANTISSA_BITS;
    m2 = ieeeMantissa;
  } else {
    e2 = ieeeExponent - EXPONENT_BIAS - MANTISSA_BITS;
    m2 = ieeeMantissa | IMPLICIT_BIT;
  }

  const even = (m2 & 1) === 0;
  const mv = m2 * 4;
  const mp = mv + 2;
  const mm = mv - (m2 !== IMPLICIT_BIT || ieeeExponent === 1 ? 2 : 1);
  e2 -= 2;

  let dv: number;
  let dp: number;
  let dm: number;
  let e10: number;
  let dpIsTrailingZeros: boolean;
  let dvIsTrailingZeros: boolean;
  let dmIsTrailingZeros: boolean;
  let lastRemovedDigit = 0;
  const { pow5Bits, pow5InvBits } = FLOAT_TABLES;
  if (e2 >= 0) {
    const q = Math.floor((e2 * LOG10_2_NUMERATOR) / LOG_DENOMINATOR);
    const k = pow5InvBits + pow5bitsFloat(q) - 1;
    const i = -e2 + q + k;
    dv = mulPow5Inv(mv, q, i);
    dp = mulPow5Inv(mp, q, i);
    dm = mulPow5Inv(mm, q, i);
    if (q !== 0 && div10(dp - 1) <= div10(dm)) {
      // one removed digit is needed even when the loop below never runs
      const l = pow5InvBits + pow5bitsFloat(q - 1) - 1;
      lastRemovedDigit = mulPow5Inv(mv, q - 1, -e2 + q - 1 + l) % 10;
    }
    e10 = q;
    dpIsTrailingZeros = pow5Factor(mp) >= q;
    dvIsTrailingZeros = pow5Factor(mv) >= q;
    dmIsTrailingZeros = pow5Factor(mm) >= q;
  } else {
    const q = Math.floor((-e2 * LOG10_5_NUMERATOR) / LOG_DENOMINATOR);
    const i = -e2 - q;
    const k = pow5bitsFloat(i) - pow5Bits;
    let j = q - k;
    dv = mulPow5(mv, i, j);
    dp = mulPow5(mp, i, j);
    dm = mulPow5(mm, i, j);
    if (q !== 0 && div10(dp - 1) <= div10(dm)) {
      j = q - 1 - (pow5bitsFloat(i + 1) - pow5Bits);
      lastRemovedDigit = mulPow5(mv, i + 1, j) % 10;
    }
    e10 = q + e2;
    dpIsTrailingZeros = q <= 1;
    dvIsTrailingZeros = q > 0 && q < MANTISSA_BITS && (mv & ((1 << (q - 1)) - 1)) === 0;
    dmIsTrailingZeros = (~mm & 1) >= q;
  }

  const dplength = dp.toString().length;
  const exponent = e10 + dplength - 1;
  const scientific = usesScientific(notation, exponent);

  let removed = 0;
  if (dpIsTrailingZeros && !even) {
    dp--;
  }
  while (div10(dp) > div10(dm)) {
    if (dp < 100 && scientific) break;
    dmIsTrailingZeros = dmIsTrailingZeros && dm % 10 === 0;
    dp = div10(dp);
    lastRemovedDigit = dv % 10;
    dv = div10(dv);
    dm = div10(dm);
    removed++;
  }
  if (dmIsTrailingZeros && even) {
    while (dm > 0 && dm % 10 === 0) {
      if (dp < 100 && scientific) break;
      dp = div10(dp);
      lastRemovedDigit = dv % 10;
      dv = div10(dv);
      dm = div10(dm);
      removed++;
    }
  }
  if (dvIsTrailingZeros && lastRemovedDigit === 5 && dv % 2 === 0) {
    lastRemovedDigit = 4;
  }
  const output = dv + ((dv === dm && !(dmIsTrailingZeros && even)) || lastRemovedDigit >= 5 ? 1 : 0);

  return {
    negative,
    digits: lowDigits(output, dplength - removed),
    exponent,
    scientific,
  };
}

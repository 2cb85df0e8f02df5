/**
 * Power-of-five multiplier tables for the shortest-decimal search.
 *
 * POW5[i] holds the top `pow5Bits` bits of 5^i and POW5_INV[i] holds
 * floor(2^(bitLength(5^i) - 1 + invBits) / 5^i) + 1. Both are built once with
 * BigInt at module load and are read-only afterwards.
 */

export interface Pow5Tables {
  readonly pow5: readonly bigint[];
  readonly pow5Inv: readonly bigint[];
  readonly pow5Bits: number;
  readonly pow5InvBits: number;
}

export function bitLength(value: bigint): number {
  return value === 0n ? 0 : value.toString(2).length;
}

function buildTables(posSize: number, invSize: number, pow5Bits: number, pow5InvBits: number): Pow5Tables {
  const pow5: bigint[] = [];
  const pow5Inv: bigint[] = [];
  let pow = 1n;
  for (let i = 0; i < posSize; i++) {
    const len = bitLength(pow);
    const shift = len - pow5Bits;
    pow5.push(shift >= 0 ? pow >> BigInt(shift) : pow << BigInt(-shift));
    if (i < invSize) {
      pow5Inv.push((1n << BigInt(len - 1 + pow5InvBits)) / pow + 1n);
    }
    pow *= 5n;
  }
  return { pow5, pow5Inv, pow5Bits, pow5InvBits };
}

export const DOUBLE_TABLES = buildTables(326, 291, 121, 122);

// One extra positive entry: the float search peeks at POW5[i + 1] for the deepest subnormals.
export const FLOAT_TABLES = buildTables(48, 31, 61, 59);

/** floor(m * factor / 2^shift), exact. */
export function mulShift(m: bigint, factor: bigint, shift: number): bigint {
  return (m * factor) >> BigInt(shift);
}

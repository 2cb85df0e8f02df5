import { describe, it, expect } from "vitest";
import {
  Base,
  readableChar,
  readReadableChar,
  readReadableDouble,
  readReadableFloat,
  readReadableInt,
  readReadableLong,
} from "@radix/codec";

describe("readable writers", () => {
  it("writes source-style literals", () => {
    expect(Base.readable(5)).toBe("5");
    expect(Base.readable(200, "byte")).toBe("-56");
    expect(Base.readable(-1n)).toBe("-1L");
    expect(Base.readable(0.1, "double")).toBe("0.1");
    expect(Base.readable(0.1, "float")).toBe("0.1f");
    expect(Base.readable(1e7, "double")).toBe("1.0E7");
  });

  it("quotes and escapes chars", () => {
    expect(readableChar(97)).toBe("'a'");
    expect(readableChar(10)).toBe("'\\n'");
    expect(readableChar(39)).toBe("'\\''");
    expect(readableChar(92)).toBe("'\\\\'");
    expect(readableChar(32)).toBe("'\\u0020'");
    expect(readableChar(0x7f)).toBe("'\\u007F'");
    expect(readableChar(0xe9)).toBe("'\\u00E9'");
    expect(Base.readable(65, "char")).toBe("'A'");
  });
});

describe("readable readers", () => {
  it("reads integers with or without a suffix", () => {
    expect(readReadableInt("-12")).toBe(-12);
    expect(readReadableInt(" 12L ")).toBe(12);
    expect(readReadableInt("200", "byte")).toBe(-56);
    expect(readReadableInt("x")).toBe(0);
    expect(readReadableLong("9223372036854775807L")).toBe(9223372036854775807n);
    expect(readReadableLong("18446744073709551615")).toBe(-1n);
    expect(readReadableLong("1.5")).toBe(0n);
  });

  it("reads floats with a type suffix", () => {
    expect(readReadableFloat("1.5f")).toBe(1.5);
    expect(readReadableFloat("0.1f")).toBe(Math.fround(0.1));
    expect(readReadableDouble("2.5d")).toBe(2.5);
    expect(readReadableDouble("1.0E7")).toBe(1e7);
  });

  it("reads quoted chars and escapes", () => {
    expect(readReadableChar("'a'")).toBe(97);
    expect(readReadableChar("'\\n'")).toBe(10);
    expect(readReadableChar("'\\u00e9'")).toBe(0xe9);
    expect(readReadableChar("'\\\\'")).toBe(92);
    expect(readReadableChar("'ab'")).toBe(0);
    expect(readReadableChar("a")).toBe(0);
  });
});

describe("readable batches", () => {
  it("joins every kind", () => {
    expect(Base.joinReadable(",", Int32Array.of(-1, 2))).toBe("-1,2");
    expect(Base.joinReadable(",", BigInt64Array.of(-1n, 2n))).toBe("-1L,2L");
    expect(Base.joinReadable(",", Float32Array.of(1.5))).toBe("1.5f");
    expect(Base.joinReadable(" ", Uint16Array.of(97, 10, 0xe9))).toBe("'a' '\\n' '\\u00E9'");
  });

  it("splits back", () => {
    expect(Array.from(Base.splitReadable("char", "'a' '\\n' '\\u00E9'", " "))).toEqual([97, 10, 0xe9]);
    expect(Array.from(Base.splitReadable("long", "-1L,2L", ","))).toEqual([-1n, 2n]);
    expect(Array.from(Base.splitReadable("float", "1.5f,x", ","))).toEqual([1.5, 0]);
  });
});

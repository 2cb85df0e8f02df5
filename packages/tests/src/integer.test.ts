import { describe, it, expect } from "vitest";
import { TextBuffer } from "@radix/core";
import { Base } from "@radix/codec";

describe("signed encoding", () => {
  it("writes minimal digits with a leading sign", () => {
    expect(Base.BASE16.signed(255)).toBe("FF");
    expect(Base.BASE16.signed(-1)).toBe("-1");
    expect(Base.BASE16.signed(0)).toBe("0");
    expect(Base.BASE36.signed(2147483647)).toBe("ZIK0ZJ");
    expect(Base.BASE64.signed(63)).toBe("/");
    expect(Base.BASE64.signed(64)).toBe("BA");
  });

  it("handles the most negative int", () => {
    expect(Base.BASE10.signed(-2147483648)).toBe("-2147483648");
    expect(Base.BASE16.signed(-2147483648)).toBe("-80000000");
  });

  it("wraps values to the requested width", () => {
    expect(Base.BASE10.signed(2147483648)).toBe("-2147483648");
    expect(Base.BASE10.signed(200, "byte")).toBe("-56");
    expect(Base.BASE10.signed(40000, "short")).toBe("-25536");
    expect(Base.BASE10.signed(-1, "char")).toBe("65535");
  });

  it("uses the alphabet's own negative sign", () => {
    expect(Base.URI_SAFE.signed(-1)).toBe("!B");
  });

  it("encodes 64-bit values", () => {
    expect(Base.BASE16.signed(-9223372036854775808n)).toBe("-8000000000000000");
    expect(Base.BASE36.signed(-36n)).toBe("-10");
  });
});

describe("unsigned encoding", () => {
  it("writes the bit pattern at fixed width", () => {
    expect(Base.BASE16.unsigned(0x12345678)).toBe("12345678");
    expect(Base.BASE16.unsigned(-1)).toBe("FFFFFFFF");
    expect(Base.BASE16.unsigned(10)).toBe("0000000A");
    expect(Base.BASE10.unsigned(5)).toBe("0000000005");
    expect(Base.BASE10.unsigned(-1)).toBe("4294967295");
  });

  it("sizes narrow kinds by their own width", () => {
    expect(Base.BASE10.unsigned(-1, "byte")).toBe("255");
    expect(Base.BASE10.unsigned(-1, "short")).toBe("65535");
    expect(Base.BASE2.unsigned(5, "byte")).toBe("00000101");
  });

  it("encodes 64-bit patterns", () => {
    expect(Base.BASE16.unsigned(-1n)).toBe("FFFFFFFFFFFFFFFF");
    expect(Base.BASE10.unsigned(-1n)).toBe("18446744073709551615");
    expect(Base.BASE16.unsigned(1n)).toBe("0000000000000001");
  });

  it("appends into a caller-owned buffer", () => {
    const buffer = new TextBuffer("x=");
    Base.BASE16.appendUnsigned(buffer, 255, "byte");
    Base.BASE16.appendSigned(buffer.append(","), -2n);
    expect(buffer.toString()).toBe("x=FF,-2");
    expect(buffer.length).toBe(7);
  });
});

describe("lenient readers", () => {
  it("reads signed and unsigned text", () => {
    expect(Base.BASE16.readInt("FF")).toBe(255);
    expect(Base.BASE16.readInt("-1")).toBe(-1);
    expect(Base.BASE16.readInt("FFFFFFFF")).toBe(-1);
    expect(Base.BASE36.readInt("zik0zj")).toBe(2147483647);
    expect(Base.BASE16.readInt("+7f")).toBe(127);
  });

  it("wraps the signed magnitude", () => {
    expect(Base.BASE16.readInt("-FFFFFFFF")).toBe(1);
    expect(Base.BASE16.readByte("FF")).toBe(-1);
    expect(Base.BASE10.readChar("-1")).toBe(65535);
    expect(Base.BASE10.readShort("40000")).toBe(-25536);
  });

  it("reads malformed text as 0", () => {
    expect(Base.BASE16.readInt("")).toBe(0);
    expect(Base.BASE16.readInt("-")).toBe(0);
    expect(Base.BASE16.readInt("--1")).toBe(0);
    expect(Base.BASE16.readInt("1G")).toBe(0);
    expect(Base.BASE10.readInt(" 1")).toBe(0);
    expect(Base.BASE16.readInt("100000000")).toBe(0);
    expect(Base.BASE10.readByte("256")).toBe(0);
  });

  it("honors the range bounds", () => {
    expect(Base.BASE10.readInt("xx123yy", 2, 5)).toBe(123);
    expect(Base.BASE10.readInt("123", 1)).toBe(23);
    expect(Base.BASE10.readInt("123", 3)).toBe(0);
  });

  it("reads 64-bit text", () => {
    expect(Base.BASE16.readLong("FFFFFFFFFFFFFFFF")).toBe(-1n);
    expect(Base.BASE16.readLong("-8000000000000000")).toBe(-9223372036854775808n);
    expect(Base.BASE16.readLong("10000000000000000")).toBe(0n);
    expect(Base.BASE36.readLong("-10")).toBe(-36n);
  });

  it("reads back what every preset writes", () => {
    const values = [0, 1, -1, 12345, 2147483647, -2147483648];
    for (const base of Base.PRESETS) {
      for (const v of values) {
        expect(base.readInt(base.signed(v))).toBe(v);
        expect(base.readInt(base.unsigned(v))).toBe(v);
      }
      expect(base.readLong(base.signed(-9223372036854775808n))).toBe(-9223372036854775808n);
      expect(base.readLong(base.unsigned(-5n))).toBe(-5n);
    }
  });
});

import { describe, it, expect } from "vitest";
import { Effect, Either } from "effect";
import { AlphabetError } from "@radix/core";
import { Alphabet, BASE2, BASE10, BASE16, BASE36, BASE64, alphabetRegistry } from "@radix/codec";

describe("Alphabet validation", () => {
  it("accepts a minimal two-digit alphabet", () => {
    const a = new Alphabet({ digits: "xy" });
    expect(a.radix).toBe(2);
    expect(a.padding).toBe("$");
    expect(a.positiveSign).toBe("+");
    expect(a.negativeSign).toBe("-");
  });

  it("rejects radix out of range", () => {
    expect(() => new Alphabet({ digits: "0" })).toThrow(AlphabetError);
    const tooMany = Array.from({ length: 95 }, (_, i) => String.fromCharCode(0x100 + i)).join("");
    expect(() => new Alphabet({ digits: tooMany })).toThrow(/radix must be in \[2, 94\]/);
  });

  it("rejects duplicate digits", () => {
    expect(() => new Alphabet({ digits: "0120" })).toThrow(/duplicate digit "0" at index 3/);
  });

  it("folds case when case-insensitive", () => {
    expect(() => new Alphabet({ digits: "aA" })).not.toThrow();
    expect(() => new Alphabet({ digits: "aA", caseInsensitive: true })).toThrow(AlphabetError);
  });

  it("reserves '.' and keeps e/E out of the negative sign", () => {
    expect(() => new Alphabet({ digits: "0.1" })).toThrow(/"\." is reserved/);
    expect(() => new Alphabet({ digits: "01", negativeSign: "e" })).toThrow(AlphabetError);
    expect(() => new Alphabet({ digits: "01", negativeSign: "E" })).toThrow(AlphabetError);
  });

  it("requires single, distinct, non-digit specials", () => {
    expect(() => new Alphabet({ digits: "01", padding: "ab" })).toThrow(/padding must be a single character/);
    expect(() => new Alphabet({ digits: "01+" })).toThrow(/used both as a digit/);
    expect(() => new Alphabet({ digits: "01", padding: "-" })).toThrow(/must differ/);
  });

  it("make surfaces AlphabetError in the error channel", () => {
    const result = Effect.runSync(Effect.either(Alphabet.make({ digits: "z" })));
    expect(Either.isLeft(result)).toBe(true);
    expect(Either.isLeft(result) && result.left._tag).toBe("AlphabetError");
  });
});

describe("Alphabet digits", () => {
  it("maps both cases when case-insensitive", () => {
    expect(BASE16.valueOf("a".charCodeAt(0))).toBe(10);
    expect(BASE16.valueOf("A".charCodeAt(0))).toBe(10);
    expect(BASE16.valueOf("g".charCodeAt(0))).toBe(-1);
    expect(BASE64.valueOf("a".charCodeAt(0))).toBe(26);
    expect(BASE64.valueOf("A".charCodeAt(0))).toBe(0);
  });

  it("computes fixed unsigned widths", () => {
    expect(BASE2.unsignedLength("int")).toBe(32);
    expect(BASE16.unsignedLength("int")).toBe(8);
    expect(BASE16.unsignedLength("long")).toBe(16);
    expect(BASE10.unsignedLength("byte")).toBe(3);
    expect(BASE10.unsignedLength("char")).toBe(5);
    expect(BASE10.unsignedLength("int")).toBe(10);
    expect(BASE10.unsignedLength("long")).toBe(20);
    expect(BASE36.unsignedLength("int")).toBe(7);
    expect(BASE36.unsignedLength("long")).toBe(13);
    expect(BASE64.unsignedLength("int")).toBe(6);
    expect(BASE64.unsignedLength("long")).toBe(11);
  });
});

describe("Alphabet serialization", () => {
  it("writes digits, case flag, padding and signs", () => {
    expect(BASE16.serialize()).toBe("0123456789ABCDEF1p+-");
    expect(new Alphabet({ digits: "ab", padding: "#", positiveSign: "p", negativeSign: "n" }).serialize()).toBe("ab0#pn");
  });

  it("reads back an equal alphabet", () => {
    const back = Alphabet.deserialize(BASE64.serialize());
    expect(back.equals(BASE64)).toBe(true);
    expect(back.fingerprint()).toBe(BASE64.fingerprint());
    expect(back.equals(BASE16)).toBe(false);
  });

  it("rejects short or invalid data", () => {
    expect(() => Alphabet.deserialize("01+-")).toThrow(/too short/);
    expect(() => Alphabet.deserialize("0000$+-")).toThrow(AlphabetError);
  });
});

describe("alphabetRegistry", () => {
  it("looks up presets case-insensitively", () => {
    expect(alphabetRegistry.get("base16")).toBe(BASE16);
    expect(alphabetRegistry.has("Base36")).toBe(true);
    expect(alphabetRegistry.find("nope")).toBeUndefined();
  });

  it("lists the known names on a miss", () => {
    expect(() => alphabetRegistry.get("nope")).toThrow(/\[alphabets\] Unknown name "nope"/);
  });
});

import { describe, it, expect } from "vitest";
import { Effect, Either, Layer } from "effect";
import { SeededRng } from "@radix/core";
import { Base, SCRAMBLE_POOL, SCRAMBLED_RADIX, scrambledAlphabet } from "@radix/codec";
import { BaseFromSpec, BasePreset, BaseScrambled, BaseService, RngLive } from "@radix/effect-runtime";
import { scrambleProgram } from "@radix/cli";

describe("scrambledAlphabet", () => {
  it("uses every pool character exactly once", () => {
    expect(SCRAMBLE_POOL.length).toBe(75);
    const a = scrambledAlphabet(new SeededRng(7));
    expect(a.radix).toBe(SCRAMBLED_RADIX);
    expect(a.caseInsensitive).toBe(false);
    const used = [...a.digits, a.padding, a.positiveSign, a.negativeSign].sort();
    expect(used).toEqual([...SCRAMBLE_POOL].sort());
  });

  it("never picks e or E as the negative sign", () => {
    for (let seed = 0; seed < 200; seed++) {
      const a = scrambledAlphabet(new SeededRng(seed));
      expect(["e", "E"]).not.toContain(a.negativeSign);
    }
  });

  it("is determined by the seed", () => {
    const a = scrambledAlphabet(new SeededRng(11));
    const b = scrambledAlphabet(new SeededRng(11));
    const c = scrambledAlphabet(new SeededRng(12));
    expect(a.equals(b)).toBe(true);
    expect(a.equals(c)).toBe(false);
  });
});

describe("Base.scramble", () => {
  it("keeps signs, padding and the digit set", () => {
    const base = Base.BASE36.scramble(new SeededRng(3));
    expect(base.radix).toBe(36);
    expect(base.alphabet.negativeSign).toBe("-");
    expect(base.alphabet.caseInsensitive).toBe(true);
    expect([...base.alphabet.digits].sort()).toEqual([...Base.BASE36.alphabet.digits].sort());
  });

  it("round-trips values through a scrambled base", () => {
    const base = Base.scrambled(new SeededRng(5));
    for (const v of [0, 1, -1, 987654321, -2147483648]) {
      expect(base.readInt(base.signed(v))).toBe(v);
    }
    expect(base.readDoubleExact(base.signed(0.1, "double"))).toBe(0.1);
    expect(Base.deserialize(base.serialize()).equals(base)).toBe(true);
  });
});

describe("layers", () => {
  it("scrambleProgram draws from the context's random source", () => {
    const drawn = Effect.runSync(scrambleProgram(undefined).pipe(Effect.provide(RngLive(7))));
    expect(drawn.equals(Base.scrambled(new SeededRng(7)))).toBe(true);

    const shuffled = Effect.runSync(scrambleProgram(Base.BASE16).pipe(Effect.provide(RngLive(7))));
    expect(shuffled.equals(Base.BASE16.scramble(new SeededRng(7)))).toBe(true);
  });

  it("BaseScrambled builds a radix-72 base from RngService", () => {
    const layer = BaseScrambled.pipe(Layer.provide(RngLive(3)));
    const base = Effect.runSync(BaseService.pipe(Effect.provide(layer)));
    expect(base.radix).toBe(72);
  });

  it("BasePreset resolves names case-insensitively", () => {
    const base = Effect.runSync(BaseService.pipe(Effect.provide(BasePreset("base16"))));
    expect(base.equals(Base.BASE16)).toBe(true);
  });

  it("BaseFromSpec fails with AlphabetError", () => {
    const result = Effect.runSync(Effect.either(BaseService.pipe(Effect.provide(BaseFromSpec({ digits: "00" })))));
    expect(Either.isLeft(result) && result.left._tag).toBe("AlphabetError");
  });
});

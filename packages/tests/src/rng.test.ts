import { describe, it, expect } from "vitest";
import { SeededRng } from "@radix/core";

describe("SeededRng", () => {
  it("produces deterministic sequences", () => {
    const rng1 = new SeededRng(42);
    const rng2 = new SeededRng(42);

    const seq1 = Array.from({ length: 10 }, () => rng1.next());
    const seq2 = Array.from({ length: 10 }, () => rng2.next());

    expect(seq1).toEqual(seq2);
  });

  it("produces values in [0, 1)", () => {
    const rng = new SeededRng(123);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("nextInt stays inside its bound", () => {
    const rng = new SeededRng(7);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const v = rng.nextInt(5);
      expect(Number.isInteger(v)).toBe(true);
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(5);
      seen.add(v);
    }
    expect(seen.size).toBe(5);
    expect(rng.nextInt(0)).toBe(0);
  });

  it("nextUint32 covers the 32-bit range", () => {
    const rng = new SeededRng(3);
    for (let i = 0; i < 100; i++) {
      const v = rng.nextUint32();
      expect(Number.isInteger(v)).toBe(true);
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(0x100000000);
    }
  });

  it("reseeding restarts the sequence", () => {
    const rng = new SeededRng(9);
    const first = [rng.next(), rng.next()];
    rng.seed(9);
    expect([rng.next(), rng.next()]).toEqual(first);
    expect(rng.state()).toBe(9);
  });

  it("different seeds give different sequences", () => {
    const rng1 = new SeededRng(1);
    const rng2 = new SeededRng(2);
    const v1 = rng1.next();
    const v2 = rng2.next();
    expect(v1).not.toBe(v2);
  });
});

/**
 * Service interfaces (ports) shared across packages.
 */
import { Context } from "effect";

// ── Random source ──────────────────────────────────────────────────────────
export interface Rng {
  /** Uniform in [0, 1). */
  next(): number;
  /** Uniform integer in [0, bound). */
  nextInt(bound: number): number;
  state(): number;
  seed(s: number): void;
}

export class RngService extends Context.Tag("RngService")<
  RngService,
  Rng
>() {}

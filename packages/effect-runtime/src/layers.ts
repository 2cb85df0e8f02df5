/**
 * Effect layers for dependency injection.
 *
 * Commands read the active `Base` and random source from the context, so
 * tests can swap in a fixed alphabet or seed.
 */
import { Context, Effect, Layer } from "effect";
import { RngService, SeededRng, type AlphabetError, type Rng } from "@radix/core";
import { Base, alphabetRegistry, type AlphabetSpec } from "@radix/codec";

export class BaseService extends Context.Tag("BaseService")<
  BaseService,
  Base
>() {}

// ── RNG Layer ──────────────────────────────────────────────────────────────

export const RngLive = (seed: number): Layer.Layer<RngService> =>
  Layer.succeed(RngService, new SeededRng(seed));

export const RngFrom = (rng: Rng): Layer.Layer<RngService> =>
  Layer.succeed(RngService, rng);

// ── Base Layer ─────────────────────────────────────────────────────────────

export const BaseFrom = (base: Base): Layer.Layer<BaseService> =>
  Layer.succeed(BaseService, base);

/** A preset looked up by name; unknown names are defects. */
export const BasePreset = (name: string): Layer.Layer<BaseService> =>
  Layer.sync(BaseService, () => new Base(alphabetRegistry.get(name)));

export const BaseFromSpec = (spec: AlphabetSpec): Layer.Layer<BaseService, AlphabetError> =>
  Layer.effect(BaseService, Base.make(spec));

/** A scrambled alphabet drawn from the context's random source. */
export const BaseScrambled: Layer.Layer<BaseService, never, RngService> = Layer.effect(
  BaseService,
  Effect.gen(function* () {
    const rng = yield* RngService;
    return Base.scrambled(rng);
  }),
);

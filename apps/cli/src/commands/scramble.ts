/**
 * Command: radix scramble
 *
 * Usage:
 *   radix scramble --seed=7                          (fresh radix-72 alphabet)
 *   radix scramble --seed=7 --from=BASE36 --out=keys/save.json
 *
 * Prints the serialized alphabet; with --out it is also saved for later use
 * through `--alphabet=keys/save.json`.
 */
import { Effect } from "effect";
import { RngService } from "@radix/core";
import { Base, alphabetRegistry, saveAlphabet } from "@radix/codec";
import { RngLive } from "@radix/effect-runtime";
import { parseKV } from "../parse.js";
import { loadRadixCliConfig } from "../config/load.js";
import { runCommand } from "../resolve.js";

/** Scramble `from`, or draw a fresh alphabet when it is undefined. */
export const scrambleProgram = (from: Base | undefined): Effect.Effect<Base, never, RngService> =>
  Effect.gen(function* () {
    const rng = yield* RngService;
    return from ? from.scramble(rng) : Base.scrambled(rng);
  });

export async function scrambleCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const config = await loadRadixCliConfig(kv);
  const fromName = kv["from"];
  const from = fromName ? new Base(alphabetRegistry.get(fromName)) : undefined;
  const out = kv["out"];

  const program = Effect.gen(function* () {
    const base = yield* scrambleProgram(from);
    yield* Effect.logInfo(`scrambled radix ${base.radix} alphabet (seed ${config.seed}, fingerprint ${base.alphabet.fingerprint()})`);
    console.log(base.serialize());
    if (out) {
      yield* saveAlphabet(out, fromName ? `${fromName}-scrambled` : "scrambled", base.alphabet);
      yield* Effect.logInfo(`saved to ${out}`);
    }
  }).pipe(Effect.provide(RngLive(config.seed)));
  await runCommand("scramble", program, config);
}

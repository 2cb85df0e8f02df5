/**
 * Resolve the alphabet and runtime layers a command runs with.
 */
import { Effect, Layer } from "effect";
import type { PersistError } from "@radix/core";
import { Base, alphabetRegistry, loadAlphabet } from "@radix/codec";
import { BasePreset, BaseService, loggerLayer, parseLogLevel, withSpan } from "@radix/effect-runtime";
import type { RadixCliConfig } from "./config/schema.js";

export function resolveBaseLayer(config: RadixCliConfig): Layer.Layer<BaseService, PersistError> {
  if (config.alphabet) {
    return Layer.effect(BaseService, Effect.map(loadAlphabet(config.alphabet), (alphabet) => new Base(alphabet)));
  }
  return BasePreset(config.base);
}

/** Run a command program with the configured alphabet and logger. */
export function runCommand<A, E>(
  name: string,
  program: Effect.Effect<A, E, BaseService>,
  config: RadixCliConfig,
): Promise<A> {
  return Effect.runPromise(
    withSpan(name, program).pipe(
      Effect.provide(resolveBaseLayer(config)),
      Effect.provide(loggerLayer(parseLogLevel(config.logLevel))),
    ),
  );
}

export function listBases(): string {
  return alphabetRegistry
    .list()
    .map((name) => {
      const alphabet = alphabetRegistry.get(name);
      return `${name.padEnd(9)} radix ${String(alphabet.radix).padStart(2)}  ${alphabet.digits}`;
    })
    .join("\n");
}

/**
 * Commands: radix join, radix split
 *
 * Usage:
 *   radix join --base=BASE36 --kind=int --delimiter=, 1 -1 2147483647
 *   radix split --base=BASE36 --kind=int --delimiter=, "1,-1,ZIK0ZJ"
 *   radix join --kind=double --exact 0.5 -0.0
 */
import { Effect } from "effect";
import type { ElementKind } from "@radix/core";
import type { Base } from "@radix/codec";
import { BaseService } from "@radix/effect-runtime";
import { boolArg, parseKV, positional } from "../parse.js";
import { loadRadixCliConfig } from "../config/load.js";
import { runCommand } from "../resolve.js";
import { renderArray, toArray } from "../values.js";

export function joinValues(base: Base, kind: ElementKind, delimiter: string, values: readonly string[], exact: boolean): string {
  const array = toArray(kind, values);
  return exact ? base.joinExact(delimiter, array) : base.join(delimiter, array);
}

export function splitText(base: Base, kind: ElementKind, delimiter: string, text: string, exact: boolean): string[] {
  return renderArray(exact ? base.splitExact(kind, text, delimiter) : base.split(kind, text, delimiter));
}

export async function joinCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const config = await loadRadixCliConfig(kv);
  const exact = boolArg(kv, "exact", false);
  const values = positional(args);

  const program = Effect.gen(function* () {
    const base = yield* BaseService;
    yield* Effect.logDebug(`joining ${values.length} ${config.kind} value(s) with "${config.delimiter}"`);
    console.log(joinValues(base, config.kind, config.delimiter, values, exact));
  });
  await runCommand("join", program, config);
}

export async function splitCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const config = await loadRadixCliConfig(kv);
  const exact = boolArg(kv, "exact", false);
  const texts = positional(args);

  const program = Effect.gen(function* () {
    const base = yield* BaseService;
    for (const text of texts) {
      const fields = splitText(base, config.kind, config.delimiter, text, exact);
      yield* Effect.logDebug(`split ${fields.length} field(s)`);
      for (const field of fields) console.log(field);
    }
  });
  await runCommand("split", program, config);
}

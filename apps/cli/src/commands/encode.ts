/**
 * Command: radix encode
 *
 * Usage:
 *   radix encode --base=BASE16 --kind=int 305419896 -1
 *   radix encode --base=BASE36 --kind=long --form=unsigned -- -9000000000
 *   radix encode --kind=double 1.5          (bit-exact float text)
 */
import { Effect } from "effect";
import { ConfigError, type ElementKind } from "@radix/core";
import type { Base } from "@radix/codec";
import { BaseService } from "@radix/effect-runtime";
import { parseKV, parseLong, parseNumber, positional, strArg } from "../parse.js";
import { loadRadixCliConfig } from "../config/load.js";
import { runCommand } from "../resolve.js";

export type EncodeForm = "signed" | "unsigned";

export function parseForm(text: string): EncodeForm {
  if (text === "signed" || text === "unsigned") return text;
  throw new ConfigError({ message: `form must be signed or unsigned, got "${text}"` });
}

export function encodeValue(base: Base, kind: ElementKind, form: EncodeForm, text: string): string {
  if (kind === "long") {
    const value = parseLong(text);
    return form === "signed" ? base.signed(value) : base.unsigned(value);
  }
  const value = parseNumber(text);
  return form === "signed" ? base.signed(value, kind) : base.unsigned(value, kind);
}

export async function encodeCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const config = await loadRadixCliConfig(kv);
  const form = parseForm(strArg(kv, "form", "signed"));
  const values = positional(args);

  const program = Effect.gen(function* () {
    const base = yield* BaseService;
    yield* Effect.logDebug(`encoding ${values.length} ${config.kind} value(s) ${form} in radix ${base.radix}`);
    for (const value of values) {
      console.log(encodeValue(base, config.kind, form, value));
    }
  });
  await runCommand("encode", program, config);
}

/**
 * Command: radix decode
 *
 * Reads text written by `radix encode` (signed or unsigned) and prints the
 * values in base 10. Malformed text prints 0.
 */
import { Effect } from "effect";
import type { ElementKind } from "@radix/core";
import type { Base } from "@radix/codec";
import { BaseService } from "@radix/effect-runtime";
import { parseKV, positional } from "../parse.js";
import { loadRadixCliConfig } from "../config/load.js";
import { runCommand } from "../resolve.js";
import { renderFloat } from "../values.js";

export function decodeText(base: Base, kind: ElementKind, text: string): string {
  switch (kind) {
    case "long": return base.readLong(text).toString();
    case "double": return renderFloat(base.readDoubleExact(text), "double");
    case "float": return renderFloat(base.readFloatExact(text), "float");
    default: return String(base.read(text, kind));
  }
}

export async function decodeCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const config = await loadRadixCliConfig(kv);
  const texts = positional(args);

  const program = Effect.gen(function* () {
    const base = yield* BaseService;
    yield* Effect.logDebug(`decoding ${texts.length} ${config.kind} value(s) in radix ${base.radix}`);
    for (const text of texts) {
      console.log(decodeText(base, config.kind, text));
    }
  });
  await runCommand("decode", program, config);
}

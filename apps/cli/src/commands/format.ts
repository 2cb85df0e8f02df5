/**
 * Command: radix format
 *
 * Usage:
 *   radix format --mode=general 1234567 0.001
 *   radix format --mode=decimal --precision=3 --limit=8 0.1
 *   radix format --mode=scientific --kind=float --marker=e 6.02e23
 */
import { Effect } from "effect";
import { ConfigError, type FloatKind } from "@radix/core";
import { decimal, friendly, general, scientific } from "@radix/ryu";
import { optionalIntArg, parseKV, parseNumber, positional, strArg } from "../parse.js";
import { loadRadixCliConfig } from "../config/load.js";
import { runCommand } from "../resolve.js";

export type FormatMode = "general" | "friendly" | "scientific" | "decimal";

export interface FormatSettings {
  readonly mode: FormatMode;
  readonly kind: FloatKind;
  readonly exponentMarker: string;
  readonly precision?: number;
  readonly lengthLimit?: number;
}

export function parseMode(text: string): FormatMode {
  switch (text) {
    case "general":
    case "friendly":
    case "scientific":
    case "decimal":
      return text;
    default:
      throw new ConfigError({ message: `mode must be general, friendly, scientific or decimal, got "${text}"` });
  }
}

export function formatValue(settings: FormatSettings, text: string): string {
  const value = parseNumber(text);
  const options = { kind: settings.kind, exponentMarker: settings.exponentMarker };
  switch (settings.mode) {
    case "general": return general(value, options);
    case "friendly": return friendly(value, options);
    case "scientific": return scientific(value, options);
    case "decimal":
      return decimal(value, { ...options, precision: settings.precision, lengthLimit: settings.lengthLimit });
  }
}

export async function formatCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const config = await loadRadixCliConfig({ kind: "double", ...kv });
  if (config.kind !== "float" && config.kind !== "double") {
    throw new ConfigError({ message: `format needs --kind=float or --kind=double, got "${config.kind}"` });
  }
  const settings: FormatSettings = {
    mode: parseMode(strArg(kv, "mode", "general")),
    kind: config.kind,
    exponentMarker: strArg(kv, "marker", config.exponentMarker),
    precision: optionalIntArg(kv, "precision"),
    lengthLimit: optionalIntArg(kv, "limit"),
  };
  const values = positional(args);

  const program = Effect.gen(function* () {
    yield* Effect.logDebug(`formatting ${values.length} value(s) in ${settings.mode} mode`);
    for (const value of values) {
      console.log(formatValue(settings, value));
    }
  });
  await runCommand("format", program, config);
}

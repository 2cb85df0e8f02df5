/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax; everything else is positional.
 */
import { ConfigError } from "@radix/core";

export function parseKV(args: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function positional(args: readonly string[]): string[] {
  return args.filter((arg) => !arg.startsWith("--"));
}

export function requireArg(kv: Record<string, string>, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new ConfigError({ message: `Missing required argument: --${key}${label ? ` (${label})` : ""}` });
  }
  return val;
}

export function intArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const parsed = parseInt(val, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigError({ message: `--${key} must be an integer, got "${val}"` });
  }
  return parsed;
}

export function optionalIntArg(kv: Record<string, string>, key: string): number | undefined {
  return kv[key] ? intArg(kv, key, 0) : undefined;
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

export function boolArg(kv: Record<string, string>, key: string, defaultVal: boolean): boolean {
  const val = kv[key];
  if (!val) return defaultVal;
  return val === "true" || val === "1";
}

/** Read a value argument as a JS number; NaN and Infinity literals are allowed. */
export function parseNumber(text: string): number {
  const value = Number(text);
  if (Number.isNaN(value) && text !== "NaN") {
    throw new ConfigError({ message: `not a number: "${text}"` });
  }
  return value;
}

export function parseLong(text: string): bigint {
  try {
    return BigInt(text);
  } catch (cause) {
    throw new ConfigError({ message: `not an integer: "${text}"`, cause });
  }
}

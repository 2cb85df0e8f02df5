/**
 * Load and validate RadixCliConfig from a JSON file plus CLI flags.
 */
import { readFile } from "node:fs/promises";
import { ConfigError, isElementKind } from "@radix/core";
import { alphabetRegistry } from "@radix/codec";
import { isLogLevelName } from "@radix/effect-runtime";
import { defaultRadixCliConfig, type RadixCliConfig } from "./schema.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(raw: Record<string, unknown>, key: string, fallback: string): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string") {
    throw new ConfigError({ message: `${key} must be a string, got ${typeof value}` });
  }
  return value;
}

function numberField(raw: Record<string, unknown>, key: string, fallback: number): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed)) {
    throw new ConfigError({ message: `${key} must be a finite number, got ${JSON.stringify(value)}` });
  }
  return parsed;
}

/** Build a config from untyped fields, falling back to the defaults. */
export function configFromRecord(raw: Record<string, unknown>): RadixCliConfig {
  const kind = stringField(raw, "kind", defaultRadixCliConfig.kind);
  if (!isElementKind(kind)) {
    throw new ConfigError({ message: `kind must be one of byte, short, char, int, long, float, double, got "${kind}"` });
  }
  const logLevel = stringField(raw, "logLevel", defaultRadixCliConfig.logLevel);
  if (!isLogLevelName(logLevel)) {
    throw new ConfigError({ message: `logLevel must be one of debug, info, warn, error, none, got "${logLevel}"` });
  }
  const alphabet = raw["alphabet"] === undefined ? undefined : stringField(raw, "alphabet", "");
  const config: RadixCliConfig = {
    base: stringField(raw, "base", defaultRadixCliConfig.base),
    ...(alphabet ? { alphabet } : {}),
    kind,
    delimiter: stringField(raw, "delimiter", defaultRadixCliConfig.delimiter),
    logLevel,
    seed: numberField(raw, "seed", defaultRadixCliConfig.seed),
    exponentMarker: stringField(raw, "exponentMarker", defaultRadixCliConfig.exponentMarker),
  };
  validateRadixCliConfig(config);
  return config;
}

/** Validate a RadixCliConfig, throwing ConfigError on invalid values. */
export function validateRadixCliConfig(config: RadixCliConfig): void {
  if (!config.alphabet && !alphabetRegistry.has(config.base)) {
    throw new ConfigError({
      message: `base must be one of ${alphabetRegistry.list().join(", ")}, got "${config.base}"`,
    });
  }
  if (config.delimiter.length === 0) {
    throw new ConfigError({ message: "delimiter must not be empty" });
  }
  if (!Number.isInteger(config.seed)) {
    throw new ConfigError({ message: `seed must be an integer, got ${config.seed}` });
  }
  if (config.exponentMarker.length !== 1) {
    throw new ConfigError({ message: `exponentMarker must be a single character, got "${config.exponentMarker}"` });
  }
}

/** Merge `--config=file.json` (if given) under the CLI flags and validate. */
export async function loadRadixCliConfig(kv: Record<string, string>): Promise<RadixCliConfig> {
  const path = kv["config"];
  if (!path) return configFromRecord(kv);

  const raw = await readFile(path, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (cause) {
    throw new ConfigError({ message: `Failed to parse radix config at ${path}: invalid JSON`, cause });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError({ message: `radix config at ${path} must be a JSON object` });
  }
  return configFromRecord({ ...parsed, ...kv });
}

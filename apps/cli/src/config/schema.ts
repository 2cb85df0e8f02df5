/**
 * Settings shared by every `radix` command. A `--config=file.json` supplies
 * them, and CLI flags override the file.
 */
import type { ElementKind } from "@radix/core";
import type { LogLevelName } from "@radix/effect-runtime";

export interface RadixCliConfig {
  /** Preset alphabet name (see `radix bases`). */
  readonly base: string;
  /** Saved alphabet document; takes precedence over `base`. */
  readonly alphabet?: string;
  readonly kind: ElementKind;
  readonly delimiter: string;
  readonly logLevel: LogLevelName;
  readonly seed: number;
  readonly exponentMarker: string;
}

export const defaultRadixCliConfig: RadixCliConfig = {
  base: "BASE10",
  kind: "int",
  delimiter: " ",
  logLevel: "info",
  seed: 42,
  exponentMarker: "E",
};

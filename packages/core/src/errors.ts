/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

/** An alphabet could not be built: bad digits, radix out of range, or a sign collision. */
export class AlphabetError extends Data.TaggedError("AlphabetError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class PersistError extends Data.TaggedError("PersistError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

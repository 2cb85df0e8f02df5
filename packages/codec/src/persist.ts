/**
 * Persistence helpers for alphabets.
 *
 * An alphabet is stored as a small JSON document holding its serialized form,
 * so scrambled alphabets survive between runs. Every I/O step is wrapped in
 * `Effect.tryPromise` and fails with a typed `PersistError`.
 */
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import { PersistError } from "@radix/core";
import { Alphabet } from "./alphabet.js";

export interface AlphabetDocument {
  readonly name: string;
  readonly radix: number;
  readonly serialized: string;
}

export function toDocument(name: string, alphabet: Alphabet): AlphabetDocument {
  return { name, radix: alphabet.radix, serialized: alphabet.serialize() };
}

/**
 * Write an alphabet to a JSON file, creating parent directories as needed.
 */
export function saveAlphabet(
  path: string,
  name: string,
  alphabet: Alphabet,
): Effect.Effect<void, PersistError> {
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, JSON.stringify(toDocument(name, alphabet), null, 2), "utf-8");
    },
    catch: (cause) =>
      new PersistError({
        message: `Failed to save alphabet to "${path}"`,
        cause,
      }),
  });
}

/** Parse a document produced by {@link toDocument}; throws on anything else. */
export function fromDocument(data: unknown): Alphabet {
  if (typeof data !== "object" || data === null) {
    throw new Error("Alphabet document must be a JSON object");
  }
  const serialized = "serialized" in data ? data.serialized : undefined;
  if (typeof serialized !== "string") {
    throw new Error("Missing or invalid 'serialized' field");
  }
  return Alphabet.deserialize(serialized);
}

export function loadAlphabet(path: string): Effect.Effect<Alphabet, PersistError> {
  return Effect.tryPromise({
    try: async () => {
      const raw = await readFile(path, "utf-8");
      const data: unknown = JSON.parse(raw);
      return fromDocument(data);
    },
    catch: (cause) =>
      new PersistError({
        message: `Failed to load alphabet from "${path}"`,
        cause,
      }),
  });
}

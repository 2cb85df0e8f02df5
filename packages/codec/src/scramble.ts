/**
 * Randomized alphabets for lightly obfuscating persisted numbers.
 */
import type { Rng } from "@radix/core";
import { Alphabet } from "./alphabet.js";

/** 75 candidates: 72 become digits, the last three padding and signs. */
export const SCRAMBLE_POOL = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789?!@#$%^&*-|=+";
export const SCRAMBLED_RADIX = 72;

function shuffle(chars: string[], random: Rng): string[] {
  for (let i = chars.length - 1; i > 0; i--) {
    const j = random.nextInt(i + 1);
    const tmp = chars[i];
    chars[i] = chars[j];
    chars[j] = tmp;
  }
  return chars;
}

/** A case-sensitive radix-72 alphabet drawn from {@link SCRAMBLE_POOL}. */
export function scrambledAlphabet(random: Rng): Alphabet {
  const options = shuffle([...SCRAMBLE_POOL], random);
  const leftovers = options.slice(SCRAMBLED_RADIX);
  // e and E may not be a negative sign, and at most two of the three leftovers can be one of them
  let minusAt = leftovers.length - 1;
  while (minusAt > 0 && (leftovers[minusAt] === "e" || leftovers[minusAt] === "E")) minusAt--;
  const negativeSign = leftovers[minusAt];
  const [padding, positiveSign] = leftovers.filter((_, i) => i !== minusAt);
  return new Alphabet({
    digits: options.slice(0, SCRAMBLED_RADIX).join(""),
    caseInsensitive: false,
    padding,
    positiveSign,
    negativeSign,
  });
}

/** Same digits, signs and padding as `alphabet`, with the digit order shuffled. */
export function scramble(alphabet: Alphabet, random: Rng): Alphabet {
  return new Alphabet({
    digits: shuffle([...alphabet.digits], random).join(""),
    caseInsensitive: alphabet.caseInsensitive,
    padding: alphabet.padding,
    positiveSign: alphabet.positiveSign,
    negativeSign: alphabet.negativeSign,
  });
}

/**
 * Named alphabets.
 */
import { Registry } from "@radix/core";
import { Alphabet } from "./alphabet.js";

const UPPER = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const LOWER = "abcdefghijklmnopqrstuvwxyz";
const DECIMAL = "0123456789";

export const BASE2 = new Alphabet({ digits: "01", caseInsensitive: true });
export const BASE8 = new Alphabet({ digits: "01234567", caseInsensitive: true });
export const BASE10 = new Alphabet({ digits: DECIMAL, caseInsensitive: true });
export const BASE16 = new Alphabet({ digits: `${DECIMAL}ABCDEF`, caseInsensitive: true, padding: "p" });
export const BASE36 = new Alphabet({ digits: DECIMAL + UPPER, caseInsensitive: true });

/** RFC 4648 digit order; '+' is a digit, so '*' is the positive sign. */
export const BASE64 = new Alphabet({
  digits: `${UPPER}${LOWER}${DECIMAL}+/`,
  padding: "=",
  positiveSign: "*",
});

/** Safe inside URLs and file names. */
export const URI_SAFE = new Alphabet({
  digits: `${UPPER}${LOWER}${DECIMAL}+-`,
  positiveSign: "*",
  negativeSign: "!",
});

/** Base-64 that extends base-36 order: digits, upper, lower, then '!' and '?'. */
export const SIMPLE64 = new Alphabet({ digits: `${DECIMAL}${UPPER}${LOWER}!?` });

export const BASE86 = new Alphabet({
  digits: `${DECIMAL}${UPPER}${LOWER}'/!@#$%^&*()[]{}<>:?;|_=`,
  padding: "\\",
});

export const alphabetRegistry = new Registry<Alphabet>("alphabets")
  .register("BASE2", () => BASE2)
  .register("BASE8", () => BASE8)
  .register("BASE10", () => BASE10)
  .register("BASE16", () => BASE16)
  .register("BASE36", () => BASE36)
  .register("BASE64", () => BASE64)
  .register("URI_SAFE", () => URI_SAFE)
  .register("SIMPLE64", () => SIMPLE64)
  .register("BASE86", () => BASE86);

export { AlphabetError, ConfigError, PersistError } from "./errors.js";
export {
  ELEMENT_KINDS,
  WIDTHS,
  isElementKind,
  wrapInt,
  type IntKind,
  type FloatKind,
  type ElementKind,
  type IntegerKind,
  type Width,
  type KindArrays,
  type KindValues,
  type ElementArray,
} from "./types.js";
export {
  floatToRawIntBits,
  floatToIntBits,
  intBitsToFloat,
  floatToReversedIntBits,
  reversedIntBitsToFloat,
  doubleToRawLongBits,
  doubleToLongBits,
  longBitsToDouble,
  doubleToReversedLongBits,
  reversedLongBitsToDouble,
} from "./bits.js";
export { TextBuffer } from "./buffer.js";
export { SeededRng } from "./rng.js";
export { RngService, type Rng } from "./interfaces.js";
export { Registry } from "./registry.js";
export { fnv1a, fingerprint } from "./hash.js";

export {
  GENERAL_WINDOW,
  FRIENDLY_WINDOW,
  DEFAULT_EXPONENT_MARKER,
  usesScientific,
  type Window,
  type Notation,
  type Expansion,
} from "./notation.js";
export { DOUBLE_TABLES, FLOAT_TABLES, bitLength, mulShift, type Pow5Tables } from "./tables.js";
export { expandDouble, pow5bitsDouble } from "./double.js";
export { expandFloat, pow5bitsFloat } from "./float.js";
export {
  expand,
  renderScientific,
  renderPlain,
  windowed,
  general,
  friendly,
  scientific,
  decimal,
  type FormatOptions,
  type DecimalOptions,
} from "./format.js";
export { readDecimal, readDecimalFloat } from "./parse.js";

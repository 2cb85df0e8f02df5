export { Alphabet, MIN_RADIX, MAX_RADIX, type AlphabetSpec } from "./alphabet.js";
export {
  signed,
  unsigned,
  signedLong,
  unsignedLong,
  appendSigned,
  appendUnsigned,
  appendSignedLong,
  appendUnsignedLong,
} from "./integer.js";
export { readInteger, readLong } from "./lenient.js";
export {
  RAW_BITS_MARKER,
  appendSignedDouble,
  appendUnsignedDouble,
  appendSignedFloat,
  appendUnsignedFloat,
  readDoubleExact,
  readFloatExact,
} from "./exact.js";
export {
  readableInt,
  readableLong,
  readableDouble,
  readableFloat,
  readableChar,
  appendReadableChar,
  readReadableInt,
  readReadableLong,
  readReadableDouble,
  readReadableFloat,
  readReadableChar,
} from "./readable.js";
export {
  count,
  countDelimiters,
  appendJoinedWith,
  splitWith,
  appendJoined2DWith,
  split2DWith,
  type ElementCodec,
} from "./batch.js";
export {
  exactCodecs,
  generalCodecs,
  decimalCodecs,
  READABLE_CODECS,
  type CodecMap,
  type FloatCodecMap,
} from "./codecs.js";
export { SCRAMBLE_POOL, SCRAMBLED_RADIX, scrambledAlphabet, scramble } from "./scramble.js";
export {
  BASE2,
  BASE8,
  BASE10,
  BASE16,
  BASE36,
  BASE64,
  URI_SAFE,
  SIMPLE64,
  BASE86,
  alphabetRegistry,
} from "./presets.js";
export { saveAlphabet, loadAlphabet, toDocument, fromDocument, type AlphabetDocument } from "./persist.js";
export { Base, type NumberKind } from "./base.js";

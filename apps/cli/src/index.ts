export * from "./config/schema.js";
export * from "./config/load.js";
export * from "./parse.js";
export * from "./values.js";
export { resolveBaseLayer, runCommand, listBases } from "./resolve.js";
export { encodeValue, parseForm, type EncodeForm } from "./commands/encode.js";
export { decodeText } from "./commands/decode.js";
export { formatValue, parseMode, type FormatMode, type FormatSettings } from "./commands/format.js";
export { joinValues, splitText } from "./commands/batch.js";
export { scrambleProgram } from "./commands/scramble.js";

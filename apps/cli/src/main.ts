#!/usr/bin/env tsx
/**
 * radix CLI: the main entry point.
 *
 * Commands: encode, decode, format, join, split, scramble, bases
 */
import { encodeCmd } from "./commands/encode.js";
import { decodeCmd } from "./commands/decode.js";
import { formatCmd } from "./commands/format.js";
import { joinCmd, splitCmd } from "./commands/batch.js";
import { scrambleCmd } from "./commands/scramble.js";
import { listBases } from "./resolve.js";

const USAGE = `
radix: compact text encodings for numbers in arbitrary bases

Commands:
  encode           Write integers (or exact floats) in the chosen base
  decode           Read encoded text back to base 10
  format           Shortest round-trip decimal text for floats
  join             Join values into one delimited string
  split            Split delimited text back into values
  scramble         Draw a shuffled alphabet from a seed
  bases            List the preset alphabets

Options:
  --base=NAME      Preset alphabet (default BASE10)
  --alphabet=FILE  Alphabet saved by "scramble --out"
  --kind=KIND      byte, short, char, int, long, float or double
  --delimiter=STR  Field delimiter for join/split (default " ")
  --config=FILE    JSON file with any of the options above
  --logLevel=LVL   debug, info, warn, error or none
  --help, -h       Show this help

Examples:
  radix encode --base=BASE16 305419896 -1
  radix decode --base=BASE36 --kind=long ZIK0ZJ
  radix format --mode=scientific 12345678
  radix format --mode=decimal --precision=2 --limit=8 3.14159
  radix join --base=BASE64 --delimiter=, 1 2 3
  radix scramble --seed=7 --out=keys/alphabet.json
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];
  const rest = args.slice(1);

  if (command === "encode") {
    await encodeCmd(rest);
  } else if (command === "decode") {
    await decodeCmd(rest);
  } else if (command === "format") {
    await formatCmd(rest);
  } else if (command === "join") {
    await joinCmd(rest);
  } else if (command === "split") {
    await splitCmd(rest);
  } else if (command === "scramble") {
    await scrambleCmd(rest);
  } else if (command === "bases") {
    console.log(listBases());
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});

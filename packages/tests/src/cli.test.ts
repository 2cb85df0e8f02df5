import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import { ConfigError } from "@radix/core";
import { Base } from "@radix/codec";
import { BaseService } from "@radix/effect-runtime";
import {
  configFromRecord,
  decodeText,
  defaultRadixCliConfig,
  encodeValue,
  formatValue,
  joinValues,
  listBases,
  loadRadixCliConfig,
  parseForm,
  parseKV,
  parseLong,
  parseMode,
  parseNumber,
  positional,
  runCommand,
  splitText,
  toArray,
  type RadixCliConfig,
} from "@radix/cli";

let dir = "";

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "radix-cli-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("argument parsing", () => {
  it("separates flags from positional values", () => {
    const args = ["--base=BASE16", "--exact", "1", "-2"];
    expect(parseKV(args)).toEqual({ base: "BASE16", exact: "true" });
    expect(positional(args)).toEqual(["1", "-2"]);
  });

  it("parses numbers strictly", () => {
    expect(parseNumber("1.5")).toBe(1.5);
    expect(Number.isNaN(parseNumber("NaN"))).toBe(true);
    expect(() => parseNumber("abc")).toThrow(ConfigError);
    expect(parseLong("-9000000000")).toBe(-9000000000n);
    expect(() => parseLong("1.5")).toThrow(/not an integer/);
  });

  it("validates enumerated options", () => {
    expect(parseForm("unsigned")).toBe("unsigned");
    expect(() => parseForm("both")).toThrow(ConfigError);
    expect(parseMode("friendly")).toBe("friendly");
    expect(() => parseMode("hex")).toThrow(/mode must be/);
  });
});

describe("config", () => {
  it("defaults every field", () => {
    expect(configFromRecord({})).toEqual(defaultRadixCliConfig);
  });

  it("coerces flag strings", () => {
    const config = configFromRecord({ seed: "7", kind: "long", base: "base36" });
    expect(config.seed).toBe(7);
    expect(config.kind).toBe("long");
    expect(config.base).toBe("base36");
  });

  it("rejects invalid values", () => {
    expect(() => configFromRecord({ base: "nope" })).toThrow(/base must be one of BASE2/);
    expect(() => configFromRecord({ kind: "word" })).toThrow(ConfigError);
    expect(() => configFromRecord({ logLevel: "loud" })).toThrow(ConfigError);
    expect(() => configFromRecord({ delimiter: "" })).toThrow(/delimiter must not be empty/);
    expect(() => configFromRecord({ seed: "1.5" })).toThrow(/seed must be an integer/);
    expect(() => configFromRecord({ exponentMarker: "ee" })).toThrow(ConfigError);
    expect(() => configFromRecord({ delimiter: 3 })).toThrow(/delimiter must be a string/);
  });

  it("skips the preset check when an alphabet file is named", () => {
    expect(configFromRecord({ base: "custom", alphabet: "keys/a.json" }).alphabet).toBe("keys/a.json");
  });

  it("merges a JSON file under the flags", async () => {
    const path = join(dir, "radix.json");
    await writeFile(path, JSON.stringify({ base: "BASE36", delimiter: "," }), "utf-8");
    const config = await loadRadixCliConfig({ config: path, delimiter: ";" });
    expect(config.base).toBe("BASE36");
    expect(config.delimiter).toBe(";");
  });

  it("rejects a config file that is not an object", async () => {
    const path = join(dir, "list.json");
    await writeFile(path, "[1, 2]", "utf-8");
    await expect(loadRadixCliConfig({ config: path })).rejects.toThrow(/must be a JSON object/);
  });
});

describe("command helpers", () => {
  it("encodes and decodes values", () => {
    expect(encodeValue(Base.BASE16, "int", "unsigned", "-1")).toBe("FFFFFFFF");
    expect(encodeValue(Base.BASE36, "long", "signed", "-36")).toBe("-10");
    expect(encodeValue(Base.BASE16, "double", "signed", "1")).toBe("F03F");
    expect(decodeText(Base.BASE16, "int", "FFFFFFFF")).toBe("-1");
    expect(decodeText(Base.BASE36, "long", "-10")).toBe("-36");
    expect(decodeText(Base.BASE16, "double", ".3FF0000000000000")).toBe("1.0");
    expect(decodeText(Base.BASE16, "float", "803F")).toBe("1.0");
  });

  it("formats values in each mode", () => {
    expect(formatValue({ mode: "scientific", kind: "double", exponentMarker: "e" }, "1234.5")).toBe("1.2345e3");
    expect(formatValue({ mode: "decimal", kind: "double", exponentMarker: "E", precision: 2 }, "3.14159")).toBe("3.14");
    expect(formatValue({ mode: "general", kind: "float", exponentMarker: "E" }, "0.1")).toBe("0.1");
  });

  it("joins and splits", () => {
    expect(joinValues(Base.BASE10, "int", ",", ["1", "-2"], false)).toBe("1,-2");
    expect(joinValues(Base.BASE16, "float", ",", ["1"], true)).toBe("803F");
    expect(splitText(Base.BASE10, "double", ",", "1.5,x", false)).toEqual(["1.5", "0.0"]);
    expect(splitText(Base.BASE16, "long", " ", "-1 FF", false)).toEqual(["-1", "255"]);
    expect(splitText(Base.BASE16, "float", ",", "803F", true)).toEqual(["1.0"]);
  });

  it("converts text to typed arrays with wrapping", () => {
    expect(Array.from<number | bigint>(toArray("byte", ["200"]))).toEqual([-56]);
    expect(toArray("double", ["0.5"])).toBeInstanceOf(Float64Array);
  });

  it("lists the presets", () => {
    const lines = listBases().split("\n");
    expect(lines).toHaveLength(9);
    expect(lines[0]).toBe("BASE2     radix  2  01");
  });

  it("runs a program against the configured base", async () => {
    const config: RadixCliConfig = { ...defaultRadixCliConfig, base: "BASE16", logLevel: "none" };
    const radix = await runCommand("test", Effect.map(BaseService, (base) => base.radix), config);
    expect(radix).toBe(16);
  });
});

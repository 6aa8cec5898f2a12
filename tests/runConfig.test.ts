import { describe, it, expect, afterEach } from "vitest";
import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import { parsePositiveInt } from "../src/util/numbers.js";
import { mergeRunConfig, parseRunConfig, parseSwitchAssignments, readRunConfig } from "../src/util/runConfig.js";

describe("parseRunConfig", () => {
  it("normalizes blank strings and empty monitor lists", () => {
    expect(parseRunConfig({ cycles: 5, switches: { a: 1 }, monitors: [" x ", ""], outdir: "  " })).toEqual({
      cycles: 5,
      switches: { a: 1 },
      monitors: ["x"],
    });
    expect(parseRunConfig({ monitors: [" "] })).toEqual({});
  });

  it("rejects invalid values with the offending path", () => {
    expect(() => parseRunConfig({ cycles: 0 })).toThrow(/^Invalid config JSON: cycles: /);
    expect(() => parseRunConfig({ switches: { a: 2 } })).toThrow(/^Invalid config JSON: switches\.a: /);
  });

  it("rejects unknown keys", () => {
    expect(() => parseRunConfig({ cycle: 3 })).toThrow(/^Invalid config JSON: <root>: Unrecognized key/);
  });
});

describe("parseSwitchAssignments", () => {
  it("parses name=0|1 pairs", () => {
    expect(parseSwitchAssignments(["a=1", " b = 0 "])).toEqual({ a: 1, b: 0 });
  });

  it("rejects anything else", () => {
    expect(() => parseSwitchAssignments(["a"])).toThrow("Invalid switch setting 'a' (expected name=0 or name=1)");
    expect(() => parseSwitchAssignments(["a=2"])).toThrow("Invalid switch setting 'a=2'");
  });
});

describe("parsePositiveInt", () => {
  it("accepts digit strings of at least 1", () => {
    expect(parsePositiveInt("12")).toBe(12);
    expect(parsePositiveInt(" 3 ")).toBe(3);
  });

  it("rejects everything else", () => {
    expect([undefined, "", "0", "-1", "1.5", "5x"].map(parsePositiveInt)).toEqual([
      undefined,
      undefined,
      undefined,
      undefined,
      undefined,
      undefined,
    ]);
  });
});

describe("mergeRunConfig", () => {
  const cfg = { circuitPath: "c.txt", cycles: 3, switches: { a: 0 as const }, monitors: ["m1"], outdir: "out" };

  it("lets explicit flags win and extends lists", () => {
    const merged = mergeRunConfig(
      { circuit: "x.txt", cycles: "7", switch: ["b=1"], monitor: ["m2"], maxSettle: "9", graph: true },
      cfg,
    );
    expect(merged).toEqual({
      circuitPath: "x.txt",
      cycles: 7,
      switches: { a: 0, b: 1 },
      monitors: ["m1", "m2"],
      outdir: "out",
      maxSettlePasses: 9,
      graph: true,
    });
  });

  it("keeps the file's values when flags are absent or blank", () => {
    expect(mergeRunConfig({ switch: [], monitor: [], circuit: " " }, cfg)).toEqual(cfg);
  });

  it("rejects counts that are not positive integers", () => {
    expect(() => mergeRunConfig({ cycles: "abc" }, cfg)).toThrow(
      "Invalid --cycles value 'abc' (expected a positive integer)",
    );
    expect(() => mergeRunConfig({ cycles: "-2" }, cfg)).toThrow("Invalid --cycles value '-2'");
    expect(() => mergeRunConfig({ maxSettle: "0" }, cfg)).toThrow("Invalid --max-settle value '0'");
  });
});

describe("readRunConfig", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await fs.remove(dir);
    dir = undefined;
  });

  it("reads and validates a config file", async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "logicsim-config-"));
    const file = path.join(dir, "run.json");
    await fs.writeJson(file, { circuitPath: "circuits/divider.txt", cycles: 8, graph: true });
    expect(await readRunConfig(file)).toEqual({ circuitPath: "circuits/divider.txt", cycles: 8, graph: true });
  });

  it("reports a missing file", async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "logicsim-config-"));
    const missing = path.join(dir, "missing.json");
    await expect(readRunConfig(missing)).rejects.toThrow(`Config file not found: ${missing}`);
  });
});

import { describe, it, expect } from "vitest";
import { NameTable } from "../src/circuit/names.js";
import { UnknownIdError } from "../src/errors.js";

describe("NameTable", () => {
  it("allocates dense ids in first-seen order", () => {
    const names = new NameTable();
    expect(names.lookup(["a", "b", "a"])).toEqual([0, 1, 0]);
    expect(names.intern("c")).toBe(2);
    expect(names.size).toBe(3);
  });

  it("round-trips ids to strings", () => {
    const names = new NameTable();
    const [sw, clk] = names.lookup(["sw", "clk"]);
    expect(names.getString(sw)).toBe("sw");
    expect(names.getString(clk)).toBe("clk");
  });

  it("queries without allocating", () => {
    const names = new NameTable();
    names.intern("x");
    expect(names.query("x")).toBe(0);
    expect(names.query("y")).toBeUndefined();
    expect(names.size).toBe(1);
  });

  it("rejects ids that were never allocated", () => {
    const names = new NameTable();
    names.intern("x");
    expect(() => names.getString(1)).toThrow(UnknownIdError);
    expect(() => names.getString(-1)).toThrow("Unknown name id: -1");
    expect(() => names.getString(0.5)).toThrow(UnknownIdError);
  });
});

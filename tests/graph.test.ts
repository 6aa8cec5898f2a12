import { describe, it, expect } from "vitest";
import { buildNetwork } from "../src/circuit/parser.js";
import { circuitToDot } from "../src/circuit/graph.js";

const SOURCE = [
  "DEVICES: SWITCH a 1, DTYPE ff, AND g 1;",
  "CONNECT: a > ff.DATA, a > ff.CLK, a > ff.SET, a > ff.CLEAR, ff.Q > g.I1;",
  "MONITOR: g;",
  "END;",
].join("\n");

describe("circuitToDot", () => {
  const built = buildNetwork(SOURCE);
  if (!built.ok) throw new Error("circuit should build");
  const dot = circuitToDot(built.circuit);
  const lines = dot.split("\n");

  it("wraps the graph in a digraph", () => {
    expect(lines[0]).toBe("digraph circuit {");
    expect(dot.endsWith("}\n")).toBe(true);
  });

  it("emits one node per device with a shape per kind", () => {
    expect(lines).toContain('  dev_a [label="a\\nSWITCH", shape=invtriangle];');
    expect(lines).toContain('  dev_ff [label="{<in> ff\\nDTYPE|{<Q> Q|<QBAR> QBAR}}", shape=record];');
    expect(lines).toContain('  dev_g [label="g\\nAND", shape=box];');
  });

  it("labels each connection with the input pin", () => {
    const edges = lines.filter((l) => l.includes(" -> ") && !l.includes("mon_"));
    expect(edges).toEqual([
      '  dev_a -> dev_ff [label="DATA"];',
      '  dev_a -> dev_ff [label="CLK"];',
      '  dev_a -> dev_ff [label="SET"];',
      '  dev_a -> dev_ff [label="CLEAR"];',
      '  dev_ff:Q -> dev_g [label="I1"];',
    ]);
  });

  it("attaches monitors as dashed notes", () => {
    expect(lines).toContain('  mon_g [label="g", shape=note];');
    expect(lines).toContain("  dev_g -> mon_g [style=dashed];");
  });
});

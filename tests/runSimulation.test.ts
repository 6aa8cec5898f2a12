import { describe, it, expect, afterEach } from "vitest";
import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import { runSimulation } from "../src/runSimulation.js";
import { memoryLogger } from "../src/util/logger.js";

const DIVIDER = `DEVICES: CLOCK clk 1, DTYPE ff, SWITCH low 0;
CONNECT: clk > ff.CLK, ff.QBAR > ff.DATA, low > ff.SET, low > ff.CLEAR;
MONITOR: clk, ff.Q;
END;
`;

describe("runSimulation", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await fs.remove(dir);
    dir = undefined;
  });

  it("runs inline source without writing anything", async () => {
    const logger = memoryLogger();
    const result = await runSimulation({ circuitText: DIVIDER, cycles: 4 }, logger);
    expect(result.ok).toBe(true);
    expect(result.run).toEqual({ ok: true, cycles: 4 });
    expect(result.waveforms).toEqual(["clk  : -_-_", "ff.Q : --__"]);
    expect(result.runDir).toBeUndefined();
    expect(logger.lines).toEqual(["info: Running 4 cycle(s)..."]);
  });

  it("applies switches and extra monitors before running", async () => {
    const logger = memoryLogger();
    const result = await runSimulation(
      { circuitText: DIVIDER, cycles: 3, switches: { low: 1 }, monitors: ["ff.QBAR"] },
      logger,
    );
    expect(result.traces).toEqual([
      { signal: "clk", samples: [1, 0, 1] },
      { signal: "ff.Q", samples: [1, 1, 1] },
      { signal: "ff.QBAR", samples: [0, 0, 0] },
    ]);
  });

  it("warns about settings it cannot apply", async () => {
    const logger = memoryLogger();
    await runSimulation({ circuitText: DIVIDER, cycles: 1, switches: { clk: 1 }, monitors: ["nope"] }, logger);
    expect(logger.lines).toEqual([
      "warn: Cannot monitor 'nope': no such output",
      "warn: 'clk' is not a switch; setting ignored.",
      "info: Running 1 cycle(s)...",
    ]);
  });

  it("logs diagnostics and stops on an invalid circuit", async () => {
    const logger = memoryLogger();
    const result = await runSimulation({ circuitText: "DEVICES: ;\nCONNECT: ;\nMONITOR: ;\nEND;" }, logger);
    expect(result.ok).toBe(false);
    expect(result.run).toBeUndefined();
    expect(logger.lines).toEqual([
      "error: Line 1, column 10: error: There must be at least one device\n  DEVICES: ;\n           ^",
      "error: Circuit rejected with 1 error(s).",
    ]);
  });

  it("reports a run that stops early", async () => {
    const logger = memoryLogger();
    const result = await runSimulation(
      { circuitText: "DEVICES: SWITCH a 0, AND g 2;\nCONNECT: a > g.I1;\nMONITOR: g;\nEND;", cycles: 2 },
      logger,
    );
    expect(result.ok).toBe(false);
    expect(result.run?.cycles).toBe(0);
    expect(logger.lines.at(-1)).toBe("error: Simulation stopped after 0 cycle(s): Input g.I2 is not connected");
  });

  it("requires a circuit", async () => {
    await expect(runSimulation({}, memoryLogger())).rejects.toThrow(
      "Missing circuit input (provide circuitPath or circuitText)",
    );
    await expect(runSimulation({ circuitPath: "no/such/circuit.txt" }, memoryLogger())).rejects.toThrow(
      "Circuit file not found: no/such/circuit.txt",
    );
  });

  it("writes traces into a run directory named after the circuit file", async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "logicsim-run-"));
    const circuitPath = path.join(dir, "divider.txt");
    await fs.writeFile(circuitPath, DIVIDER, "utf-8");

    const result = await runSimulation({ circuitPath, cycles: 4, outdir: path.join(dir, "runs") }, memoryLogger());
    const runDir = result.runDir ?? "";
    expect(path.basename(runDir)).toMatch(/^divider_\d{8}_\d{6}$/);
    expect(await fs.readFile(path.join(runDir, "trace.txt"), "utf-8")).toBe("clk  : -_-_\nff.Q : --__\n");
    expect(await fs.readFile(path.join(runDir, "circuit.txt"), "utf-8")).toBe(DIVIDER);
    expect(await fs.readJson(path.join(runDir, "trace.json"))).toEqual({
      cycles: 4,
      completed: true,
      traces: [
        { signal: "clk", samples: [1, 0, 1, 0] },
        { signal: "ff.Q", samples: [1, 1, 0, 0] },
      ],
    });
    expect(await fs.pathExists(path.join(runDir, "diagnostics.txt"))).toBe(false);
    expect(result.outputs?.circuitDot).toBeUndefined();
  });
});

import { describe, it, expect, beforeEach } from "vitest";
import { Simulator } from "../src/sim/simulator.js";
import { SHELL_HELP, executeCommand } from "../src/shell.js";

const DIVIDER = `
DEVICES: CLOCK clk 1, DTYPE ff, SWITCH low 0;
CONNECT: clk > ff.CLK, ff.QBAR > ff.DATA, low > ff.SET, low > ff.CLEAR;
MONITOR: clk, ff.Q;
END;
`;

describe("executeCommand", () => {
  let sim: Simulator;

  beforeEach(() => {
    const loaded = Simulator.load(DIVIDER);
    if (!loaded.ok) throw new Error("circuit should load");
    sim = loaded.simulator;
  });

  it("shows help and quits", () => {
    expect(executeCommand(sim, "h").lines).toEqual(SHELL_HELP);
    expect(executeCommand(sim, "q")).toEqual({ lines: [], problems: [], quit: true });
    expect(executeCommand(sim, "   ")).toEqual({ lines: [], problems: [] });
  });

  it("runs and continues, printing the waveforms", () => {
    expect(executeCommand(sim, "r 4").lines).toEqual(["Ran 4 cycle(s)", "clk  : -_-_", "ff.Q : --__"]);
    expect(executeCommand(sim, "c 2").lines).toEqual(["Continued 2 cycle(s)", "clk  : -_-_-_", "ff.Q : --__--"]);
  });

  it("needs a run before continuing", () => {
    expect(executeCommand(sim, "c 2").problems).toEqual(["Nothing to continue; use 'r' first"]);
  });

  it("validates cycle counts", () => {
    expect(executeCommand(sim, "r x").problems).toEqual(["Expected a positive number of cycles"]);
    expect(executeCommand(sim, "r 0").problems).toEqual(["Expected a positive number of cycles"]);
    expect(executeCommand(sim, "r").problems).toEqual(["Expected a positive number of cycles"]);
  });

  it("sets switches", () => {
    expect(executeCommand(sim, "s low 1").lines).toEqual(["Switch low set to 1"]);
    expect(executeCommand(sim, "s clk 1").problems).toEqual(["'clk' is not a switch"]);
    expect(executeCommand(sim, "s low 2").problems).toEqual(["Usage: s <switch> 0|1"]);
    expect(executeCommand(sim, "l").lines[0]).toBe("Switches: low=1");
  });

  it("monitors and zaps signals", () => {
    expect(executeCommand(sim, "m ff.QBAR").lines).toEqual(["Monitoring ff.QBAR"]);
    expect(executeCommand(sim, "m ff").problems).toEqual(["Cannot monitor 'ff': not an output"]);
    expect(executeCommand(sim, "z clk").lines).toEqual(["Stopped monitoring clk"]);
    expect(executeCommand(sim, "z clk").problems).toEqual(["Cannot zap 'clk': not monitored"]);
    expect(executeCommand(sim, "m").problems).toEqual(["Usage: m <signal>"]);
  });

  it("lists switches and outputs", () => {
    expect(executeCommand(sim, "l").lines).toEqual(["Switches: low=0", "Outputs: clk ff.Q ff.QBAR low"]);
  });

  it("reports a failing run", () => {
    const loaded = Simulator.load("DEVICES: SWITCH a 0, AND g 2;\nCONNECT: a > g.I1;\nMONITOR: g;\nEND;");
    if (!loaded.ok) throw new Error("circuit should load");
    expect(executeCommand(loaded.simulator, "r 2")).toEqual({
      lines: ["Ran 0 cycle(s)", "g : "],
      problems: ["Input g.I2 is not connected"],
    });
  });

  it("rejects unknown commands", () => {
    expect(executeCommand(sim, "x").problems).toEqual(["Unknown command 'x'; type h for help"]);
  });
});

import { describe, it, expect, beforeEach } from "vitest";
import { buildNetwork, type Circuit } from "../src/circuit/parser.js";

const SOURCE = [
  "DEVICES: SWITCH a 1, SWITCH b 0, DTYPE ff;",
  "CONNECT: a > ff.DATA, b > ff.CLK, b > ff.SET, b > ff.CLEAR;",
  "MONITOR: ;",
  "END;",
].join("\n");

describe("Monitors", () => {
  let circuit: Circuit;
  let a: number;
  let b: number;
  let ff: number;

  beforeEach(() => {
    const built = buildNetwork(SOURCE);
    if (!built.ok) throw new Error("circuit should build");
    circuit = built.circuit;
    [a, b, ff] = ["a", "b", "ff"].map((n) => circuit.names.query(n) ?? -1);
  });

  it("registers outputs once, in order", () => {
    const { monitors, devices } = circuit;
    expect(monitors.makeMonitor(a, null)).toEqual({ ok: true });
    expect(monitors.makeMonitor(ff, devices.pins.Q)).toEqual({ ok: true });
    expect(monitors.makeMonitor(a, null)).toEqual({ ok: false, error: "MONITOR_PRESENT" });
    expect(monitors.entries().map((e) => monitors.signalName(e))).toEqual(["a", "ff.Q"]);
  });

  it("rejects things that are not outputs", () => {
    const { monitors, devices } = circuit;
    expect(monitors.makeMonitor(ff, null)).toEqual({ ok: false, error: "NOT_OUTPUT" });
    expect(monitors.makeMonitor(a, devices.pins.Q)).toEqual({ ok: false, error: "NOT_OUTPUT" });
    expect(monitors.makeMonitor(999, null)).toEqual({ ok: false, error: "DEVICE_ABSENT" });
  });

  it("removes monitors", () => {
    const { monitors } = circuit;
    monitors.makeMonitor(a, null);
    expect(monitors.removeMonitor(b, null)).toEqual({ ok: false, error: "NOT_MONITORED" });
    expect(monitors.removeMonitor(a, null)).toEqual({ ok: true });
    expect(monitors.isMonitored(a, null)).toBe(false);
  });

  it("records one sample per cycle", () => {
    const { monitors, network, devices } = circuit;
    monitors.makeMonitor(a, null);
    monitors.makeMonitor(ff, devices.pins.Q);
    for (let i = 0; i < 2; i++) {
      network.executeCycle();
      monitors.recordCycle();
    }
    expect(monitors.toJSON()).toEqual([
      { signal: "a", samples: [1, 1] },
      { signal: "ff.Q", samples: [0, 0] },
    ]);
    expect(monitors.getMargin()).toBe(4);
    expect(monitors.displaySignals()).toEqual(["a    : --", "ff.Q : __"]);
  });

  it("clears histories on reset but keeps the monitors", () => {
    const { monitors, network } = circuit;
    monitors.makeMonitor(a, null);
    network.executeCycle();
    monitors.recordCycle();
    monitors.resetMonitors();
    expect(monitors.toJSON()).toEqual([{ signal: "a", samples: [] }]);
  });

  it("hands out histories that later cycles do not change", () => {
    const { monitors, network } = circuit;
    monitors.makeMonitor(a, null);
    network.executeCycle();
    monitors.recordCycle();
    const [taken] = monitors.entries();
    network.executeCycle();
    monitors.recordCycle();
    expect(taken?.history).toEqual([true]);
    expect(monitors.entries()[0]?.history).toEqual([true, true]);
  });

  it("starts a late monitor with an empty history", () => {
    const { monitors, network } = circuit;
    monitors.makeMonitor(a, null);
    network.executeCycle();
    monitors.recordCycle();
    monitors.makeMonitor(b, null);
    network.executeCycle();
    monitors.recordCycle();
    expect(monitors.toJSON()).toEqual([
      { signal: "a", samples: [1, 1] },
      { signal: "b", samples: [0] },
    ]);
  });

  it("splits signal names into monitored and unmonitored", () => {
    const { monitors, devices } = circuit;
    monitors.makeMonitor(a, null);
    monitors.makeMonitor(ff, devices.pins.Q);
    expect(monitors.getSignalNames()).toEqual({ monitored: ["a", "ff.Q"], unmonitored: ["b", "ff.QBAR"] });
  });
});

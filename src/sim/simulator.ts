import { buildNetwork, type Circuit } from "../circuit/parser.js";
import type { Diagnostic } from "../circuit/diagnostics.js";
import type { SimulationError } from "../errors.js";
import type { Outcome, SignalRef } from "../types.js";
import type { NetworkOptions } from "./network.js";
import type { MonitorError, MonitorTrace } from "./monitors.js";

export type SimulatorOptions = NetworkOptions;

export type LoadResult =
  | { ok: true; diagnostics: Diagnostic[]; simulator: Simulator }
  | { ok: false; diagnostics: Diagnostic[]; simulator?: undefined };

export type RunResult = { ok: true; cycles: number } | { ok: false; cycles: number; error: SimulationError };

export type SignalError = "BAD_SIGNAL" | MonitorError | "NOT_MONITORED";

export const SIGNAL_ERROR_MESSAGES: Record<SignalError, string> = {
  BAD_SIGNAL: "no such output",
  DEVICE_ABSENT: "no such device",
  NOT_OUTPUT: "not an output",
  MONITOR_PRESENT: "already monitored",
  NOT_MONITORED: "not monitored",
};

/**
 * Drives one loaded circuit: running and continuing, switch changes and
 * monitor selection. Signals are addressed by their source spelling, `dev` or `dev.Q`.
 */
export class Simulator {
  private completed = 0;
  /** Switch states chosen by the user; they survive `run` but not an explicit cold start. */
  private readonly switchSettings = new Map<number, boolean>();

  private constructor(readonly circuit: Circuit) {}

  static load(source: string, opts: SimulatorOptions = {}): LoadResult {
    const built = buildNetwork(source, opts);
    if (!built.ok) return { ok: false, diagnostics: built.diagnostics };
    return { ok: true, diagnostics: built.diagnostics, simulator: new Simulator(built.circuit) };
  }

  /** Cycles run since the last cold start. */
  get cyclesCompleted(): number {
    return this.completed;
  }

  /** Restores every device, switches included, to its declared state; monitor histories are left alone. */
  coldStartup(): void {
    this.switchSettings.clear();
    this.circuit.devices.coldStartup();
    this.completed = 0;
  }

  resetMonitors(): void {
    this.circuit.monitors.resetMonitors();
  }

  /** Restarts from time zero keeping the user's switch settings, clears the traces, then runs. */
  run(cycles: number): RunResult {
    const { devices } = this.circuit;
    devices.coldStartup();
    for (const [id, on] of this.switchSettings) devices.setSwitch(id, on);
    this.completed = 0;
    this.resetMonitors();
    return this.continue(cycles);
  }

  /** Runs further cycles, recording monitors after each. Stops at the first failing cycle. */
  continue(cycles: number): RunResult {
    const { network, monitors } = this.circuit;
    for (let i = 0; i < cycles; i++) {
      const result = network.executeCycle();
      if (!result.ok) return { ok: false, cycles: i, error: result.error };
      monitors.recordCycle();
      this.completed++;
    }
    return { ok: true, cycles };
  }

  /** Resolves `dev` or `dev.PIN` to ids without creating names. */
  resolveSignal(signal: string): SignalRef | undefined {
    const m = /^\s*([A-Za-z][A-Za-z0-9_]*)(?:\.([A-Z][A-Z0-9]*))?\s*$/.exec(signal);
    if (!m) return undefined;
    const { names } = this.circuit;
    const device = names.query(m[1]);
    if (device === undefined || !this.circuit.devices.getDevice(device)) return undefined;
    if (m[2] === undefined) return { device, pin: null };
    const pin = names.query(m[2]);
    return pin === undefined ? undefined : { device, pin };
  }

  /** Sets a switch for the following cycles. Returns false if `name` is not a switch. */
  setSwitch(name: string, on: boolean): boolean {
    const id = this.circuit.names.query(name.trim());
    if (id === undefined || !this.circuit.devices.setSwitch(id, on)) return false;
    this.switchSettings.set(id, on);
    return true;
  }

  monitor(signal: string): Outcome<SignalError> {
    const ref = this.resolveSignal(signal);
    if (!ref) return { ok: false, error: "BAD_SIGNAL" };
    return this.circuit.monitors.makeMonitor(ref.device, ref.pin);
  }

  zap(signal: string): Outcome<SignalError> {
    const ref = this.resolveSignal(signal);
    if (!ref) return { ok: false, error: "BAD_SIGNAL" };
    return this.circuit.monitors.removeMonitor(ref.device, ref.pin);
  }

  listSwitches(): Array<{ name: string; on: boolean }> {
    const { devices, names } = this.circuit;
    return devices.findDevices("SWITCH").flatMap((id) => {
      const s = devices.getDevice(id)?.state;
      return s?.kind === "SWITCH" ? [{ name: names.getString(id), on: s.on }] : [];
    });
  }

  listOutputs(): string[] {
    const { monitored, unmonitored } = this.circuit.monitors.getSignalNames();
    return [...monitored, ...unmonitored];
  }

  /** Current value of an output, or undefined if `signal` does not name one. */
  readSignal(signal: string): boolean | undefined {
    const ref = this.resolveSignal(signal);
    return ref ? this.circuit.network.getOutputSignal(ref.device, ref.pin) : undefined;
  }

  getSignals(): MonitorTrace[] {
    return this.circuit.monitors.toJSON();
  }

  displaySignals(): string[] {
    return this.circuit.monitors.displaySignals();
  }
}

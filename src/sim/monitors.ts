import type { Outcome, SignalRef } from "../types.js";
import type { Devices } from "./devices.js";
import type { Network } from "./network.js";

export type MonitorError = "DEVICE_ABSENT" | "NOT_OUTPUT" | "MONITOR_PRESENT";

export interface MonitorEntry {
  readonly device: number;
  readonly pin: number | null;
  /** One sample per cycle completed since the monitor was made. */
  readonly history: readonly boolean[];
}

type Recording = MonitorEntry & { readonly history: boolean[] };

export type MonitorTrace = {
  signal: string;
  samples: number[];
};

const keyOf = (device: number, pin: number | null) => `${device}:${pin ?? ""}`;

/**
 * Records the value of selected outputs after every cycle.
 * Iteration follows registration order.
 */
export class Monitors {
  private readonly entriesByKey = new Map<string, Recording>();

  constructor(
    private readonly devices: Devices,
    private readonly network: Network,
  ) {}

  makeMonitor(device: number, pin: number | null): Outcome<MonitorError> {
    const d = this.devices.getDevice(device);
    if (!d) return { ok: false, error: "DEVICE_ABSENT" };
    if (!d.outputs.has(pin)) return { ok: false, error: "NOT_OUTPUT" };
    const key = keyOf(device, pin);
    if (this.entriesByKey.has(key)) return { ok: false, error: "MONITOR_PRESENT" };
    this.entriesByKey.set(key, { device, pin, history: [] });
    return { ok: true };
  }

  removeMonitor(device: number, pin: number | null): Outcome<"NOT_MONITORED"> {
    if (!this.entriesByKey.delete(keyOf(device, pin))) return { ok: false, error: "NOT_MONITORED" };
    return { ok: true };
  }

  isMonitored(device: number, pin: number | null): boolean {
    return this.entriesByKey.has(keyOf(device, pin));
  }

  /** Monitored outputs in registration order, each with a copy of its history. */
  entries(): MonitorEntry[] {
    return Array.from(this.entriesByKey.values(), (e) => ({ ...e, history: e.history.slice() }));
  }

  recordCycle(): void {
    for (const e of this.entriesByKey.values()) {
      e.history.push(this.network.getOutputSignal(e.device, e.pin) ?? false);
    }
  }

  resetMonitors(): void {
    for (const e of this.entriesByKey.values()) e.history.length = 0;
  }

  signalName(ref: SignalRef): string {
    const names = this.devices.names;
    const device = names.getString(ref.device);
    return ref.pin === null ? device : `${device}.${names.getString(ref.pin)}`;
  }

  /** Names of monitored outputs, and of every other output in the circuit. */
  getSignalNames(): { monitored: string[]; unmonitored: string[] } {
    const monitored = this.entries().map((e) => this.signalName(e));
    const unmonitored: string[] = [];
    for (const d of this.devices.all()) {
      for (const pin of d.outputs.keys()) {
        if (!this.isMonitored(d.id, pin)) unmonitored.push(this.signalName({ device: d.id, pin }));
      }
    }
    return { monitored, unmonitored };
  }

  /** Longest monitored signal name, used to align the text waveforms. */
  getMargin(): number {
    return this.entries().reduce((m, e) => Math.max(m, this.signalName(e).length), 0);
  }

  /** One line per monitor: the padded name, then `-` for high and `_` for low samples. */
  displaySignals(): string[] {
    const margin = this.getMargin();
    return this.entries().map((e) => {
      const trace = e.history.map((v) => (v ? "-" : "_")).join("");
      return `${this.signalName(e).padEnd(margin)} : ${trace}`;
    });
  }

  toJSON(): MonitorTrace[] {
    return this.entries().map((e) => ({
      signal: this.signalName(e),
      samples: e.history.map((v) => (v ? 1 : 0)),
    }));
  }
}

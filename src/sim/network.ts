import { FloatingInputError, OscillationError, type SimulationError } from "../errors.js";
import type { Device, Devices } from "./devices.js";

export const MIN_SETTLE_PASSES = 20;

export type NetworkOptions = {
  /** Passes allowed for the combinational logic to settle before the cycle fails. */
  maxSettlePasses?: number;
};

export type CycleResult = { ok: true } | { ok: false; error: SimulationError };

function assertNever(x: never): never {
  throw new Error(`Unhandled device state: ${JSON.stringify(x)}`);
}

/**
 * Evaluates the devices of a registry one cycle at a time.
 *
 * A cycle updates the sources (switches, clocks, signal generators, RC
 * one-shots), settles the gates, latches every D-type once, and settles again.
 * The first cycle after a cold start settles the time-zero state beforehand so
 * each D-type knows the CLK level it starts from.
 * Connectivity is read from the devices' input maps by id, so feedback loops
 * are ordinary data.
 */
export class Network {
  private readonly maxSettlePasses?: number;

  constructor(
    readonly devices: Devices,
    opts: NetworkOptions = {},
  ) {
    this.maxSettlePasses = opts.maxSettlePasses;
  }

  get settleLimit(): number {
    return this.maxSettlePasses ?? Math.max(MIN_SETTLE_PASSES, 2 * this.devices.count);
  }

  /** Value currently on an output; undefined if the device or pin does not exist. */
  getOutputSignal(deviceId: number, pin: number | null): boolean | undefined {
    return this.devices.getDevice(deviceId)?.outputs.get(pin);
  }

  /** Value arriving at an input; undefined if it is unconnected. */
  getInputSignal(deviceId: number, pin: number): boolean | undefined {
    const source = this.devices.getDevice(deviceId)?.inputs.get(pin);
    if (!source) return undefined;
    return this.getOutputSignal(source.device, source.pin);
  }

  /** True when every input of every device has a source. */
  checkNetwork(): boolean {
    return this.devices.unconnectedInputs().length === 0;
  }

  executeCycle(): CycleResult {
    const floating = this.devices.unconnectedInputs()[0];
    if (floating) {
      const names = this.devices.names;
      return {
        ok: false,
        error: new FloatingInputError(names.getString(floating.device), names.getString(floating.pin)),
      };
    }

    const before = this.devices.snapshot();
    const all = this.devices.all();

    let settled = true;
    if (all.some((d) => d.state.kind === "DTYPE" && d.state.lastClock === null)) {
      settled = this.settle(all);
      if (settled) for (const d of all) this.sampleClock(d);
    }
    if (settled) {
      for (const d of all) this.updateSource(d);
      settled = this.settle(all);
    }
    if (settled) {
      for (const d of all) this.latch(d);
      settled = this.settle(all);
    }
    if (!settled) {
      this.devices.restore(before);
      return { ok: false, error: new OscillationError(this.settleLimit) };
    }
    return { ok: true };
  }

  private input(d: Device, pin: number): boolean {
    return this.getInputSignal(d.id, pin) ?? false;
  }

  private setOutput(d: Device, pin: number | null, value: boolean): boolean {
    if (d.outputs.get(pin) === value) return false;
    d.outputs.set(pin, value);
    return true;
  }

  /** Advances the devices whose output depends on time rather than inputs. */
  private updateSource(d: Device): void {
    const s = d.state;
    switch (s.kind) {
      case "SWITCH":
        this.setOutput(d, null, s.on);
        return;
      case "CLOCK": {
        const counter = s.counter + 1;
        if (counter >= s.halfPeriod) {
          d.state = { ...s, counter: 0 };
          this.setOutput(d, null, !d.outputs.get(null));
        } else {
          d.state = { ...s, counter };
        }
        return;
      }
      case "SIGGEN":
        this.setOutput(d, null, s.waveform[s.cursor] ?? false);
        d.state = { ...s, cursor: (s.cursor + 1) % s.waveform.length };
        return;
      case "RC":
        this.setOutput(d, null, s.remaining > 0);
        if (s.remaining > 0) d.state = { ...s, remaining: s.remaining - 1 };
        return;
      case "AND":
      case "OR":
      case "NAND":
      case "NOR":
      case "XOR":
      case "DTYPE":
        return;
      default:
        assertNever(s);
    }
  }

  /** Recomputes one device from its inputs; returns whether an output changed. */
  private evaluate(d: Device): boolean {
    const s = d.state;
    switch (s.kind) {
      case "AND":
      case "NAND":
      case "OR":
      case "NOR": {
        const values = this.devices.inputPins(s).map((p) => this.input(d, p));
        const base = s.kind === "AND" || s.kind === "NAND" ? values.every(Boolean) : values.some(Boolean);
        const inverted = s.kind === "NAND" || s.kind === "NOR";
        return this.setOutput(d, null, inverted ? !base : base);
      }
      case "XOR": {
        const [a, b] = this.devices.inputPins(s).map((p) => this.input(d, p));
        return this.setOutput(d, null, a !== b);
      }
      case "DTYPE": {
        const q = this.setOutput(d, this.devices.pins.Q, s.q);
        const qbar = this.setOutput(d, this.devices.pins.QBAR, !s.q);
        return q || qbar;
      }
      case "SWITCH":
      case "CLOCK":
      case "RC":
      case "SIGGEN":
        return false;
      default:
        return assertNever(s);
    }
  }

  /** Passes over all devices until nothing changes; false if the limit is reached first. */
  private settle(all: Device[]): boolean {
    const limit = this.settleLimit;
    for (let pass = 0; pass < limit; pass++) {
      let changed = false;
      for (const d of all) {
        if (this.evaluate(d)) changed = true;
      }
      if (!changed) return true;
    }
    return false;
  }

  private latch(d: Device): void {
    const s = d.state;
    if (s.kind !== "DTYPE") return;
    const { pins } = this.devices;
    const clock = this.input(d, pins.CLK);
    let q = s.q;
    if (this.input(d, pins.SET)) q = true;
    else if (this.input(d, pins.CLEAR)) q = false;
    else if (clock && s.lastClock === false) q = this.input(d, pins.DATA);
    d.state = { ...s, q, lastClock: clock };
  }

  /** Seeds the previous CLK level from the settled time-zero state. */
  private sampleClock(d: Device): void {
    const s = d.state;
    if (s.kind !== "DTYPE" || s.lastClock !== null) return;
    d.state = { ...s, lastClock: this.input(d, this.devices.pins.CLK) };
  }
}

import type { NameTable } from "../circuit/names.js";
import type { DeviceKind, GateKind, Outcome, SignalRef } from "../types.js";
import { parsePositiveInt } from "../util/numbers.js";

export const MAX_GATE_INPUTS = 16;

export const DEVICE_KINDS: readonly DeviceKind[] = [
  "SWITCH",
  "CLOCK",
  "AND",
  "OR",
  "NAND",
  "NOR",
  "XOR",
  "DTYPE",
  "RC",
  "SIGGEN",
];

export const GATE_KINDS: readonly GateKind[] = ["AND", "OR", "NAND", "NOR"];

export const DTYPE_INPUTS = ["DATA", "CLK", "SET", "CLEAR"] as const;
export const DTYPE_OUTPUTS = ["Q", "QBAR"] as const;

/** Hidden state per kind; gates carry nothing beyond their configuration. */
export type DeviceState =
  | { kind: "SWITCH"; initial: boolean; on: boolean }
  | { kind: "CLOCK"; halfPeriod: number; counter: number }
  | { kind: GateKind; inputCount: number }
  | { kind: "XOR" }
  /** `lastClock` is null until the first cycle after a cold start samples the settled CLK level. */
  | { kind: "DTYPE"; q: boolean; lastClock: boolean | null }
  | { kind: "RC"; period: number; remaining: number }
  | { kind: "SIGGEN"; waveform: readonly boolean[]; cursor: number };

export interface Device {
  readonly id: number;
  state: DeviceState;
  /** Input pin id to its source; null while unconnected. */
  readonly inputs: Map<number, SignalRef | null>;
  /** Output pin id (null for the single unnamed output) to its current value. */
  readonly outputs: Map<number | null, boolean>;
}

export type CreateError = "DEVICE_PRESENT" | "INVALID_PARAMETER";
export type ConnectError = "DEVICE_ABSENT" | "INPUT_ABSENT" | "OUTPUT_ABSENT" | "INPUT_CONNECTED";

export type DeviceSnapshot = ReadonlyArray<{
  state: DeviceState;
  outputs: Array<[number | null, boolean]>;
}>;

export function isGateKind(kind: DeviceKind): kind is GateKind {
  return GATE_KINDS.some((k) => k === kind);
}

export function isDeviceKind(text: string): text is DeviceKind {
  return DEVICE_KINDS.some((k) => k === text);
}

type PinIds = {
  inputs: number[];
  DATA: number;
  CLK: number;
  SET: number;
  CLEAR: number;
  Q: number;
  QBAR: number;
};

type ParsedParameter = { ok: true; state: DeviceState } | { ok: false; detail: string };

function parseParameter(kind: DeviceKind, parameter: string | undefined): ParsedParameter {
  const missing = (what: string): ParsedParameter => ({ ok: false, detail: `${kind} requires ${what}` });

  switch (kind) {
    case "SWITCH":
      if (parameter === "0" || parameter === "1") {
        const on = parameter === "1";
        return { ok: true, state: { kind, initial: on, on } };
      }
      return missing("an initial state of 0 or 1");
    case "CLOCK": {
      const halfPeriod = parsePositiveInt(parameter);
      if (halfPeriod === undefined) return missing("a positive half-period");
      return { ok: true, state: { kind, halfPeriod, counter: 0 } };
    }
    case "RC": {
      const period = parsePositiveInt(parameter);
      if (period === undefined) return missing("a positive period");
      return { ok: true, state: { kind, period, remaining: period } };
    }
    case "AND":
    case "OR":
    case "NAND":
    case "NOR": {
      const inputCount = parsePositiveInt(parameter);
      if (inputCount === undefined || inputCount > MAX_GATE_INPUTS) {
        return missing(`between 1 and ${MAX_GATE_INPUTS} inputs`);
      }
      return { ok: true, state: { kind, inputCount } };
    }
    case "SIGGEN":
      if (parameter === undefined || !/^[01]+$/.test(parameter)) return missing("a waveform of 0s and 1s");
      return { ok: true, state: { kind, waveform: [...parameter].map((c) => c === "1"), cursor: 0 } };
    case "XOR":
    case "DTYPE":
      if (parameter !== undefined) return { ok: false, detail: `${kind} takes no parameter` };
      return kind === "XOR"
        ? { ok: true, state: { kind } }
        : { ok: true, state: { kind, q: false, lastClock: null } };
  }
}

function copyState(state: DeviceState): DeviceState {
  return { ...state };
}

/**
 * Owns every device of one circuit, keyed by the device name's id.
 * Devices are created while parsing and never removed.
 */
export class Devices {
  private readonly byId = new Map<number, Device>();
  readonly pins: PinIds;

  constructor(readonly names: NameTable) {
    const inputs = names.lookup(Array.from({ length: MAX_GATE_INPUTS }, (_, i) => `I${i + 1}`));
    const [DATA, CLK, SET, CLEAR, Q, QBAR] = names.lookup([...DTYPE_INPUTS, ...DTYPE_OUTPUTS]);
    this.pins = { inputs, DATA, CLK, SET, CLEAR, Q, QBAR };
  }

  /**
   * Creates a device. `parameter` is the literal from the source: a switch
   * state, a period, an input count or a waveform.
   */
  create(kind: DeviceKind, id: number, parameter?: string | number): Outcome<CreateError> {
    if (this.byId.has(id)) return { ok: false, error: "DEVICE_PRESENT" };
    const parsed = parseParameter(kind, parameter === undefined ? undefined : String(parameter));
    if (!parsed.ok) return { ok: false, error: "INVALID_PARAMETER", detail: parsed.detail };

    const device: Device = {
      id,
      state: parsed.state,
      inputs: new Map(this.inputPins(parsed.state).map((p) => [p, null])),
      outputs: new Map(this.outputPins(parsed.state).map((p) => [p, false])),
    };
    this.byId.set(id, device);
    this.resetDevice(device);
    return { ok: true };
  }

  connectInput(
    deviceId: number,
    inputPin: number,
    sourceDevice: number,
    sourcePin: number | null,
  ): Outcome<ConnectError> {
    const target = this.byId.get(deviceId);
    const source = this.byId.get(sourceDevice);
    if (!target || !source) return { ok: false, error: "DEVICE_ABSENT" };
    if (!source.outputs.has(sourcePin)) return { ok: false, error: "OUTPUT_ABSENT" };
    if (!target.inputs.has(inputPin)) return { ok: false, error: "INPUT_ABSENT" };
    if (target.inputs.get(inputPin)) return { ok: false, error: "INPUT_CONNECTED" };
    target.inputs.set(inputPin, { device: sourceDevice, pin: sourcePin });
    return { ok: true };
  }

  getDevice(id: number): Device | undefined {
    return this.byId.get(id);
  }

  /** Device ids in creation order, optionally only those of one kind. */
  findDevices(kind?: DeviceKind): number[] {
    const ids: number[] = [];
    for (const d of this.byId.values()) {
      if (!kind || d.state.kind === kind) ids.push(d.id);
    }
    return ids;
  }

  all(): Device[] {
    return Array.from(this.byId.values());
  }

  get count(): number {
    return this.byId.size;
  }

  /** Changes a switch's state. Returns false if `id` is not a switch. */
  setSwitch(id: number, on: boolean): boolean {
    const d = this.byId.get(id);
    if (!d || d.state.kind !== "SWITCH") return false;
    d.state = { ...d.state, on };
    return true;
  }

  coldStartup(): void {
    for (const d of this.byId.values()) this.resetDevice(d);
  }

  unconnectedInputs(): Array<{ device: number; pin: number }> {
    const out: Array<{ device: number; pin: number }> = [];
    for (const d of this.byId.values()) {
      for (const [pin, source] of d.inputs) {
        if (!source) out.push({ device: d.id, pin });
      }
    }
    return out;
  }

  snapshot(): DeviceSnapshot {
    return this.all().map((d) => ({ state: copyState(d.state), outputs: Array.from(d.outputs) }));
  }

  restore(snapshot: DeviceSnapshot): void {
    this.all().forEach((d, i) => {
      const saved = snapshot[i];
      if (!saved) return;
      d.state = copyState(saved.state);
      for (const [pin, value] of saved.outputs) d.outputs.set(pin, value);
    });
  }

  /** Input pin ids a device of this configuration accepts, in declaration order. */
  inputPins(state: DeviceState): number[] {
    switch (state.kind) {
      case "AND":
      case "OR":
      case "NAND":
      case "NOR":
        return this.pins.inputs.slice(0, state.inputCount);
      case "XOR":
        return this.pins.inputs.slice(0, 2);
      case "DTYPE":
        return [this.pins.DATA, this.pins.CLK, this.pins.SET, this.pins.CLEAR];
      case "SWITCH":
      case "CLOCK":
      case "RC":
      case "SIGGEN":
        return [];
    }
  }

  outputPins(state: DeviceState): Array<number | null> {
    return state.kind === "DTYPE" ? [this.pins.Q, this.pins.QBAR] : [null];
  }

  private resetDevice(d: Device): void {
    const s = d.state;
    switch (s.kind) {
      case "SWITCH":
        d.state = { ...s, on: s.initial };
        d.outputs.set(null, s.initial);
        return;
      case "CLOCK":
        d.state = { ...s, counter: 0 };
        d.outputs.set(null, false);
        return;
      case "RC":
        d.state = { ...s, remaining: s.period };
        d.outputs.set(null, true);
        return;
      case "SIGGEN":
        d.state = { ...s, cursor: 0 };
        d.outputs.set(null, false);
        return;
      case "DTYPE":
        d.state = { ...s, q: false, lastClock: null };
        d.outputs.set(this.pins.Q, false);
        d.outputs.set(this.pins.QBAR, true);
        return;
      case "AND":
      case "OR":
      case "NAND":
      case "NOR":
      case "XOR":
        d.outputs.set(null, false);
        return;
    }
  }
}

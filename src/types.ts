export type DeviceKind = "SWITCH" | "CLOCK" | "AND" | "OR" | "NAND" | "NOR" | "XOR" | "DTYPE" | "RC" | "SIGGEN";

export type GateKind = "AND" | "OR" | "NAND" | "NOR";

/** Result of a registry operation that can be refused without being a fault. */
export type Outcome<E extends string> = { ok: true } | { ok: false; error: E; detail?: string };

/**
 * A device output, written `device` or `device.PIN` in source text.
 * A null pin is the device's single unnamed output.
 */
export interface SignalRef {
  device: number;
  pin: number | null;
}

export type Logger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export class UnknownIdError extends Error {
  constructor(readonly id: number) {
    super(`Unknown name id: ${id}`);
    this.name = "UnknownIdError";
  }
}

/** Raised by a cycle when a device input has no source. */
export class FloatingInputError extends Error {
  constructor(
    readonly device: string,
    readonly pin: string,
  ) {
    super(`Input ${device}.${pin} is not connected`);
    this.name = "FloatingInputError";
  }
}

/** Raised by a cycle when combinational logic does not settle. */
export class OscillationError extends Error {
  constructor(readonly passes: number) {
    super(`Circuit did not settle after ${passes} passes; it oscillates`);
    this.name = "OscillationError";
  }
}

export type SimulationError = FloatingInputError | OscillationError;

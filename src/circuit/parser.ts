/**
 * Recursive-descent parser for circuit definition files.
 *
 *   circuit = DEVICES: device {, device} ;
 *             CONNECT: [connection {, connection}] ;
 *             MONITOR: [monitor {, monitor}] ;
 *             END;
 *
 * Syntax errors are recovered by skipping to the next ',' or ';' so one pass
 * reports every independent problem. Statements that parse cleanly are checked
 * semantically and applied to fresh registries as they are read.
 */

import { Devices, DTYPE_INPUTS, DTYPE_OUTPUTS, MAX_GATE_INPUTS, isDeviceKind } from "../sim/devices.js";
import { Monitors } from "../sim/monitors.js";
import { Network, type NetworkOptions } from "../sim/network.js";
import type { DeviceKind } from "../types.js";
import type { Diagnostic, DiagnosticCategory, DiagnosticCode, SemanticCode, SyntaxCode } from "./diagnostics.js";
import { NameTable } from "./names.js";
import { Scanner, SECTION_KEYWORDS, type Token } from "./scanner.js";

export type Circuit = {
  names: NameTable;
  devices: Devices;
  network: Network;
  monitors: Monitors;
};

export type BuildResult =
  | { ok: true; diagnostics: Diagnostic[]; circuit: Circuit }
  | { ok: false; diagnostics: Diagnostic[]; circuit?: undefined };

type SectionKeyword = (typeof SECTION_KEYWORDS)[number];

const INPUT_PINS: ReadonlySet<string> = new Set([
  ...Array.from({ length: MAX_GATE_INPUTS }, (_, i) => `I${i + 1}`),
  ...DTYPE_INPUTS,
]);
const OUTPUT_PINS: ReadonlySet<string> = new Set(DTYPE_OUTPUTS);

const PARAMETER_HINTS: Record<DeviceKind, string> = {
  CLOCK: "a CLOCK needs a half-period, e.g. CLOCK clk 2",
  RC: "an RC needs a period, e.g. RC rc1 5",
  SWITCH: "a SWITCH needs an initial state of 0 or 1",
  AND: "an AND needs a number of inputs from 1 to 16",
  NAND: "a NAND needs a number of inputs from 1 to 16",
  OR: "an OR needs a number of inputs from 1 to 16",
  NOR: "a NOR needs a number of inputs from 1 to 16",
  SIGGEN: "a SIGGEN needs a waveform of 0s and 1s, e.g. SIGGEN sig 0011",
  XOR: "",
  DTYPE: "",
};

/** Index of the first character that breaks the device-name rule, with the reason. */
function badNameCharacter(name: string): { index: number; reason: string } | undefined {
  if (!/^[a-z]/.test(name)) return { index: 0, reason: "device names must start with a lowercase letter" };
  const m = /[^a-z0-9_]/.exec(name);
  if (m) return { index: m.index, reason: "device names may only contain lowercase letters, digits and '_'" };
  return undefined;
}

/** Offset of the first digit in a SIGGEN waveform that is not 0 or 1; 0 otherwise. */
function badWaveformIndex(kind: DeviceKind, text: string): number {
  if (kind !== "SIGGEN") return 0;
  return /[^01]/.exec(text)?.index ?? 0;
}

class Parser {
  private token: Token;
  private readonly diagnostics: Diagnostic[] = [];
  private eofReported = false;
  /** Names that reached a declaration, valid or not. */
  private readonly declared = new Set<number>();
  /** Declared names whose device could not be created; references to them stay quiet. */
  private readonly rejected = new Set<number>();

  constructor(
    private readonly scanner: Scanner,
    private readonly circuit: Circuit,
  ) {
    this.token = this.read();
  }

  parse(): Diagnostic[] {
    if (this.sectionHeader("DEVICES")) this.list(() => this.device(), "device", false);
    if (this.sectionHeader("CONNECT")) this.list(() => this.connection(), "connection", true);
    if (this.sectionHeader("MONITOR")) this.list(() => this.monitor(), "monitor", true);
    this.end();
    return this.diagnostics;
  }

  // ==================== Tokens ====================

  /** Next token, reporting and dropping invalid characters on the way. */
  private read(): Token {
    let t = this.scanner.next();
    while (t.kind === "INVALID") {
      if (t.unterminatedComment) {
        this.report("lexical", "UNTERMINATED_COMMENT", "Block comment opened with '!' is never closed", t);
      } else {
        this.report("lexical", "INVALID_CHARACTER", `Invalid character '${t.text}'`, t);
      }
      t = this.scanner.next();
    }
    return t;
  }

  private advance(): void {
    this.token = this.read();
  }

  private isKeyword(word: string): boolean {
    return this.token.kind === "KEYWORD" && this.token.text === word;
  }

  private atSectionKeyword(): boolean {
    return this.token.kind === "KEYWORD" && SECTION_KEYWORDS.some((k) => k === this.token.text);
  }

  private isPin(pins: ReadonlySet<string>): boolean {
    return this.token.kind === "NAME" && pins.has(this.token.text);
  }

  // ==================== Diagnostics ====================

  private report(
    category: DiagnosticCategory,
    code: DiagnosticCode,
    message: string,
    at: { line: number; column: number },
    severity: Diagnostic["severity"] = "error",
  ): void {
    this.diagnostics.push({
      severity,
      category,
      code,
      message,
      line: at.line,
      column: at.column,
      lineText: this.scanner.lineText(at.line),
    });
  }

  /** Records a syntax error at the current token. Always returns false. */
  private syntaxError(code: SyntaxCode, message: string, at: { line: number; column: number } = this.token): false {
    if (this.token.kind === "EOF") {
      if (this.eofReported) return false;
      this.eofReported = true;
      this.report("syntax", "UNEXPECTED_EOF", `File ends too early: ${message.charAt(0).toLowerCase()}${message.slice(1)}`, this.token);
      return false;
    }
    this.report("syntax", code, message, at);
    return false;
  }

  private semanticError(code: SemanticCode, message: string, at: { line: number; column: number }): void {
    this.report("semantic", code, message, at, code === "DUPLICATE_MONITOR" ? "warning" : "error");
  }

  // ==================== Sections ====================

  /** Consumes `KEYWORD :`. Returns false when the section is missing and should be skipped. */
  private sectionHeader(keyword: SectionKeyword): boolean {
    if (this.isKeyword(keyword)) {
      this.advance();
      if (this.token.kind === "COLON") this.advance();
      else this.syntaxError("EXPECTED_COLON", `Expected ':' after '${keyword}'`);
      return true;
    }

    this.syntaxError("EXPECTED_KEYWORD", `Expected '${keyword}'`);
    const later = SECTION_KEYWORDS.slice(SECTION_KEYWORDS.indexOf(keyword) + 1);
    if (this.token.kind === "EOF" || later.some((k) => this.isKeyword(k))) return false;
    // A capitalised name cannot start a statement, so treat it as a misspelt keyword.
    if (this.token.kind === "NAME" && /^[A-Z]/.test(this.token.text)) this.advance();
    if (this.token.kind === "COLON") this.advance();
    return true;
  }

  private list(item: () => boolean, what: string, allowEmpty: boolean): void {
    if (this.token.kind === "SEMICOLON") {
      if (!allowEmpty) this.syntaxError("MISSING_DEVICES", "There must be at least one device");
      this.advance();
      return;
    }

    while (true) {
      if (!item()) {
        this.skipToSeparator();
      } else if (this.token.kind !== "COMMA" && this.token.kind !== "SEMICOLON") {
        this.syntaxError("EXPECTED_SEPARATOR", `Expected ',' or ';' after ${what}`);
        this.skipToSeparator();
      }

      if (this.token.kind === "COMMA") {
        this.advance();
        continue;
      }
      if (this.token.kind === "SEMICOLON") this.advance();
      return;
    }
  }

  private skipToSeparator(): void {
    while (
      this.token.kind !== "COMMA" &&
      this.token.kind !== "SEMICOLON" &&
      this.token.kind !== "EOF" &&
      !this.atSectionKeyword()
    ) {
      this.advance();
    }
  }

  private end(): void {
    if (!this.isKeyword("END")) {
      this.syntaxError("EXPECTED_KEYWORD", "Expected 'END'");
      while (this.token.kind !== "EOF" && !this.isKeyword("END")) this.advance();
      if (this.token.kind === "EOF") return;
    }
    this.advance();
    if (this.token.kind !== "SEMICOLON") {
      this.syntaxError("EXPECTED_SEPARATOR", "Expected ';' after 'END'");
      return;
    }
    this.advance();
    if (this.token.kind !== "EOF") this.syntaxError("TRAILING_INPUT", "Unexpected input after 'END;'");
  }

  // ==================== Statements ====================

  private deviceName(): Token | undefined {
    const t = this.token;
    if (t.kind === "KEYWORD") {
      this.syntaxError("INVALID_DEVICE_NAME", `'${t.text}' is a keyword and cannot name a device`);
      return undefined;
    }
    if (t.kind !== "NAME") {
      this.syntaxError("EXPECTED_NAME", "Expected a device name");
      return undefined;
    }
    const bad = badNameCharacter(t.text);
    if (bad) {
      this.syntaxError("INVALID_DEVICE_NAME", `Invalid device name '${t.text}': ${bad.reason}`, {
        line: t.line,
        column: t.column + bad.index,
      });
      return undefined;
    }
    return t;
  }

  private device(): boolean {
    const kind = this.token.text;
    if (this.token.kind !== "KEYWORD" || !isDeviceKind(kind)) {
      return this.syntaxError(
        "EXPECTED_DEVICE_KIND",
        "Expected a device kind: CLOCK, SWITCH, AND, NAND, OR, NOR, DTYPE, XOR, RC or SIGGEN",
      );
    }
    this.advance();

    const name = this.deviceName();
    if (!name) return false;
    this.advance();

    let parameter: Token | undefined;
    if (kind !== "DTYPE" && kind !== "XOR") {
      if (this.token.kind !== "NUMBER") {
        this.rejected.add(this.idOf(name));
        return this.syntaxError("EXPECTED_NUMBER", `Expected a number: ${PARAMETER_HINTS[kind]}`);
      }
      const counted = kind !== "SWITCH" && kind !== "SIGGEN";
      if (counted && /^0\d/.test(this.token.text)) {
        this.rejected.add(this.idOf(name));
        return this.syntaxError("INVALID_NUMBER", `Number '${this.token.text}' must not have leading zeros`);
      }
      parameter = this.token;
      this.advance();
    }

    this.declareDevice(kind, name, parameter);
    return true;
  }

  private connection(): boolean {
    const from = this.deviceName();
    if (!from) return false;
    this.advance();

    let fromPin: Token | undefined;
    if (this.token.kind === "DOT") {
      this.advance();
      if (!this.isPin(OUTPUT_PINS)) return this.syntaxError("INVALID_OUTPUT_PIN", "Output pins can only be Q or QBAR");
      fromPin = this.token;
      this.advance();
    }

    if (this.token.kind !== "ARROW") return this.syntaxError("EXPECTED_ARROW", "Expected '>' between output and input");
    this.advance();

    const to = this.deviceName();
    if (!to) return false;
    this.advance();

    if (this.token.kind !== "DOT") return this.syntaxError("EXPECTED_DOT", `Expected '.' and an input pin after '${to.text}'`);
    this.advance();
    if (!this.isPin(INPUT_PINS)) {
      return this.syntaxError("INVALID_INPUT_PIN", "Input pins are I1 to I16, DATA, CLK, SET and CLEAR");
    }
    const toPin = this.token;
    this.advance();

    this.makeConnection(from, fromPin, to, toPin);
    return true;
  }

  private monitor(): boolean {
    const device = this.deviceName();
    if (!device) return false;
    this.advance();

    let pin: Token | undefined;
    if (this.token.kind === "DOT") {
      this.advance();
      if (!this.isPin(OUTPUT_PINS)) return this.syntaxError("INVALID_OUTPUT_PIN", "Output pins can only be Q or QBAR");
      pin = this.token;
      this.advance();
    }

    this.addMonitor(device, pin);
    return true;
  }

  // ==================== Semantics ====================

  private idOf(t: Token): number {
    return t.id ?? this.circuit.names.intern(t.text);
  }

  private declareDevice(kind: DeviceKind, name: Token, parameter: Token | undefined): void {
    const id = this.idOf(name);
    if (this.declared.has(id)) {
      this.semanticError("DUPLICATE_DEVICE", `Device '${name.text}' is already defined`, name);
      return;
    }
    this.declared.add(id);

    const created = this.circuit.devices.create(kind, id, parameter?.text);
    if (!created.ok) {
      this.rejected.add(id);
      this.semanticError(
        "INVALID_ARGUMENT",
        `Invalid argument for ${kind} '${name.text}': ${created.detail ?? created.error}`,
        parameter ? { line: parameter.line, column: parameter.column + badWaveformIndex(kind, parameter.text) } : name,
      );
    }
  }

  /** Reports an undefined device unless its declaration already failed. Returns whether it exists. */
  private requireDevice(t: Token): boolean {
    const id = this.idOf(t);
    if (this.circuit.devices.getDevice(id)) return true;
    if (!this.rejected.has(id)) this.semanticError("UNDEFINED_DEVICE", `Device '${t.text}' is not defined`, t);
    return false;
  }

  /** Checks that `pin` (or the unnamed output) is an output of the device; reports if not. */
  private requireOutput(device: Token, pin: Token | undefined): boolean {
    const d = this.circuit.devices.getDevice(this.idOf(device));
    const pinId = pin ? this.idOf(pin) : null;
    if (d?.outputs.has(pinId)) return true;
    if (pin) {
      this.semanticError("INVALID_PIN", `Device '${device.text}' has no output pin ${pin.text}`, pin);
    } else {
      this.semanticError(
        "INVALID_PIN",
        `Device '${device.text}' has no unnamed output; use ${device.text}.Q or ${device.text}.QBAR`,
        device,
      );
    }
    return false;
  }

  private makeConnection(from: Token, fromPin: Token | undefined, to: Token, toPin: Token): void {
    const fromOk = this.requireDevice(from);
    const toOk = this.requireDevice(to);
    if (!fromOk || !toOk) return;

    const { devices, names } = this.circuit;
    const outputOk = this.requireOutput(from, fromPin);
    const target = devices.getDevice(this.idOf(to));
    const inputOk = Boolean(target?.inputs.has(this.idOf(toPin)));
    if (!inputOk) this.semanticError("INVALID_PIN", `Device '${to.text}' has no input pin ${toPin.text}`, toPin);
    if (!outputOk || !inputOk) return;

    const result = devices.connectInput(this.idOf(to), this.idOf(toPin), this.idOf(from), fromPin ? this.idOf(fromPin) : null);
    if (result.ok) return;
    if (result.error === "INPUT_CONNECTED") {
      const existing = target?.inputs.get(this.idOf(toPin));
      const by = existing ? ` to ${names.getString(existing.device)}${existing.pin === null ? "" : `.${names.getString(existing.pin)}`}` : "";
      this.semanticError(
        "INPUT_CONNECTED",
        `Input ${to.text}.${toPin.text} is already connected${by}; an input takes only one signal`,
        toPin,
      );
      return;
    }
    this.semanticError("INVALID_PIN", `Cannot connect ${from.text} to ${to.text}.${toPin.text}`, toPin);
  }

  private addMonitor(device: Token, pin: Token | undefined): void {
    if (!this.requireDevice(device)) return;
    if (!this.requireOutput(device, pin)) return;
    const signal = pin ? `${device.text}.${pin.text}` : device.text;
    const made = this.circuit.monitors.makeMonitor(this.idOf(device), pin ? this.idOf(pin) : null);
    if (!made.ok && made.error === "MONITOR_PRESENT") {
      this.semanticError("DUPLICATE_MONITOR", `'${signal}' is already monitored`, pin ?? device);
    }
  }
}

/**
 * Parses `source` into a freshly built circuit. The circuit is returned only
 * when no error was found; warnings are returned either way.
 */
export function buildNetwork(source: string, opts: NetworkOptions = {}): BuildResult {
  const names = new NameTable();
  const devices = new Devices(names);
  const network = new Network(devices, opts);
  const monitors = new Monitors(devices, network);
  const circuit: Circuit = { names, devices, network, monitors };

  const diagnostics = new Parser(new Scanner(source, names), circuit).parse();
  if (diagnostics.some((d) => d.severity === "error")) return { ok: false, diagnostics };

  devices.coldStartup();
  return { ok: true, diagnostics, circuit };
}

import path from "node:path";
import { execa } from "execa";

import { formatDiagnostic, type Diagnostic } from "./circuit/diagnostics.js";
import { circuitToDot } from "./circuit/graph.js";
import { SIGNAL_ERROR_MESSAGES, Simulator, type RunResult } from "./sim/simulator.js";
import type { MonitorTrace } from "./sim/monitors.js";
import type { Logger } from "./types.js";
import { readCircuitFile, writeJson, writeText } from "./util/io.js";
import { consoleLogger } from "./util/logger.js";
import { makeRunDir } from "./util/runDir.js";

export const DEFAULT_CYCLES = 10;

export type RunSimulationOptions = {
  circuitPath?: string;
  /** Circuit source given inline; wins over `circuitPath`. */
  circuitText?: string;
  cycles?: number;
  switches?: Record<string, 0 | 1>;
  /** Signals monitored in addition to the circuit's MONITOR section. */
  monitors?: string[];
  maxSettlePasses?: number;
  /** Output root; when omitted nothing is written to disk. */
  outdir?: string;
  /** Also write circuit.dot and try to render it with Graphviz. */
  graph?: boolean;
};

export type RunSimulationResult = {
  ok: boolean;
  diagnostics: Diagnostic[];
  run?: RunResult;
  traces: MonitorTrace[];
  waveforms: string[];
  runDir?: string;
  outputs?: {
    traceJson: string;
    traceTxt: string;
    circuitDot?: string;
    circuitSvg?: string;
  };
};

async function loadSource(opts: RunSimulationOptions): Promise<{ text: string; label: string }> {
  if (opts.circuitText?.trim()) return { text: opts.circuitText, label: "inline" };
  if (!opts.circuitPath) throw new Error("Missing circuit input (provide circuitPath or circuitText)");
  const text = await readCircuitFile(opts.circuitPath);
  return { text, label: path.basename(opts.circuitPath, path.extname(opts.circuitPath)) };
}

async function renderGraph(dotPath: string, svgPath: string, logger: Logger): Promise<string | undefined> {
  try {
    await execa("dot", ["-Tsvg", dotPath, "-o", svgPath]);
    logger.info("Rendered circuit.svg via Graphviz.");
    return svgPath;
  } catch (e: unknown) {
    const code = e instanceof Error && "code" in e ? String(e.code) : "";
    if (code === "ENOENT") logger.warn("Graphviz 'dot' not found; wrote circuit.dot only.");
    else logger.warn("Graphviz failed to render circuit.svg; wrote circuit.dot only.");
    return undefined;
  }
}

/** Loads a circuit, runs it from cold, and optionally writes the traces into a fresh run directory. */
export async function runSimulation(
  opts: RunSimulationOptions,
  logger: Logger = consoleLogger(),
): Promise<RunSimulationResult> {
  const source = await loadSource(opts);
  const loaded = Simulator.load(source.text, { maxSettlePasses: opts.maxSettlePasses });
  for (const d of loaded.diagnostics) {
    const text = formatDiagnostic(d);
    if (d.severity === "error") logger.error(text);
    else logger.warn(text);
  }
  if (!loaded.ok) {
    logger.error(`Circuit rejected with ${loaded.diagnostics.filter((d) => d.severity === "error").length} error(s).`);
    return { ok: false, diagnostics: loaded.diagnostics, traces: [], waveforms: [] };
  }

  const sim = loaded.simulator;
  for (const signal of opts.monitors ?? []) {
    const made = sim.monitor(signal);
    if (!made.ok) logger.warn(`Cannot monitor '${signal}': ${SIGNAL_ERROR_MESSAGES[made.error]}`);
  }
  for (const [name, state] of Object.entries(opts.switches ?? {})) {
    if (!sim.setSwitch(name, state === 1)) logger.warn(`'${name}' is not a switch; setting ignored.`);
  }

  const cycles = opts.cycles ?? DEFAULT_CYCLES;
  logger.info(`Running ${cycles} cycle(s)...`);
  const run = sim.run(cycles);
  if (!run.ok) logger.error(`Simulation stopped after ${run.cycles} cycle(s): ${run.error.message}`);

  const result: RunSimulationResult = {
    ok: run.ok,
    diagnostics: loaded.diagnostics,
    run,
    traces: sim.getSignals(),
    waveforms: sim.displaySignals(),
  };
  if (!opts.outdir) return result;

  const runDir = await makeRunDir(opts.outdir, source.label);
  logger.info(`Run directory: ${runDir}`);

  const traceJson = path.join(runDir, "trace.json");
  const traceTxt = path.join(runDir, "trace.txt");
  await writeText(path.join(runDir, "circuit.txt"), source.text);
  if (loaded.diagnostics.length) {
    await writeText(path.join(runDir, "diagnostics.txt"), loaded.diagnostics.map(formatDiagnostic).join("\n\n") + "\n");
  }
  await writeJson(traceJson, {
    cycles: run.cycles,
    completed: run.ok,
    error: run.ok ? undefined : { name: run.error.name, message: run.error.message },
    traces: result.traces,
  });
  await writeText(traceTxt, result.waveforms.join("\n") + "\n");

  let circuitDot: string | undefined;
  let circuitSvg: string | undefined;
  if (opts.graph) {
    circuitDot = path.join(runDir, "circuit.dot");
    await writeText(circuitDot, circuitToDot(sim.circuit));
    circuitSvg = await renderGraph(circuitDot, path.join(runDir, "circuit.svg"), logger);
  }

  return { ...result, runDir, outputs: { traceJson, traceTxt, circuitDot, circuitSvg } };
}

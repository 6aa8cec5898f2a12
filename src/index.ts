#!/usr/bin/env node
import "dotenv/config";
import path from "node:path";
import { Command } from "commander";
import chalk from "chalk";
import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

import { buildNetwork } from "./circuit/parser.js";
import { circuitToDot } from "./circuit/graph.js";
import { describeSummary, formatDiagnostic, summarize, type Diagnostic } from "./circuit/diagnostics.js";
import { Simulator } from "./sim/simulator.js";
import { DEFAULT_CYCLES, runSimulation } from "./runSimulation.js";
import { executeCommand } from "./shell.js";
import { readCircuitFile, writeText } from "./util/io.js";
import { consoleLogger } from "./util/logger.js";
import { parsePositiveInt, positiveIntOption } from "./util/numbers.js";
import { mergeRunConfig, readRunConfig, type RunConfig } from "./util/runConfig.js";

function printDiagnostics(diagnostics: readonly Diagnostic[]): void {
  for (const d of diagnostics) {
    const text = formatDiagnostic(d);
    console.error(d.severity === "error" ? chalk.red(text) : chalk.yellow(text));
  }
}

type RunCommandOptions = {
  config?: string;
  cycles?: string;
  switch: string[];
  monitor: string[];
  outdir?: string;
  maxSettle?: string;
  graph?: boolean;
  json: boolean;
  save: boolean;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function fail(e: unknown): void {
  console.error(chalk.red(e instanceof Error ? e.message : String(e)));
  process.exitCode = 2;
}

const program = new Command();

program
  .name("logicsim")
  .description("Check and simulate logic circuits written in the DEVICES/CONNECT/MONITOR language.")
  .version("0.1.0");

program
  .command("check")
  .description("Validate a circuit file and report every problem found.")
  .argument("<file>", "Circuit definition file")
  .action(async (file: string) => {
    try {
      const built = buildNetwork(await readCircuitFile(file));
      printDiagnostics(built.diagnostics);
      const summary = describeSummary(summarize(built.diagnostics));
      console.log(built.ok ? chalk.green(summary) : chalk.red(summary));
      if (!built.ok) process.exitCode = 1;
    } catch (e: unknown) {
      fail(e);
    }
  });

program
  .command("run")
  .description("Simulate a circuit for a number of cycles and print the monitored waveforms.")
  .argument("[file]", "Circuit definition file (or circuitPath in --config)")
  .option("--config <path>", "JSON config file containing run options")
  .option("-n, --cycles <n>", `Cycles to simulate (default ${DEFAULT_CYCLES})`)
  .option("-s, --switch <name=0|1>", "Set a switch before running (repeatable)", collect, [])
  .option("-m, --monitor <signal>", "Monitor an extra signal (repeatable)", collect, [])
  .option("--outdir <path>", "Output directory root (default $LOGICSIM_OUTDIR or runs)")
  .option("--max-settle <n>", "Settling passes allowed per cycle before reporting oscillation")
  .option("--graph", "Also write circuit.dot and render it with Graphviz")
  .option("--json", "Print traces as JSON instead of waveforms", false)
  .option("--no-save", "Do not write a run directory")
  .action(async (file: string | undefined, opts: RunCommandOptions) => {
    try {
      const cfg: RunConfig = opts.config ? await readRunConfig(opts.config) : {};
      const merged = mergeRunConfig({ ...opts, circuit: file }, cfg);
      if (!merged.circuitPath) {
        console.error(chalk.red("Missing required input. Provide a circuit file or --config <path>."));
        process.exitCode = 2;
        return;
      }

      const outdir = merged.outdir ?? process.env.LOGICSIM_OUTDIR ?? "runs";
      const result = await runSimulation(
        {
          circuitPath: merged.circuitPath,
          cycles: merged.cycles,
          switches: merged.switches,
          monitors: merged.monitors,
          maxSettlePasses: merged.maxSettlePasses ?? parsePositiveInt(process.env.LOGICSIM_MAX_SETTLE),
          outdir: opts.save ? outdir : undefined,
          graph: merged.graph,
        },
        consoleLogger(),
      );
      if (!result.run) {
        process.exitCode = 1;
        return;
      }

      if (opts.json) console.log(JSON.stringify(result.traces, null, 2));
      else for (const line of result.waveforms) console.log(line);

      if (result.outputs) {
        console.log(chalk.cyan("Outputs:"));
        console.log(`- ${result.outputs.traceTxt}`);
        console.log(`- ${result.outputs.traceJson}`);
        if (result.outputs.circuitDot) {
          console.log(`- ${result.outputs.circuitDot}${result.outputs.circuitSvg ? " + circuit.svg" : ""}`);
        }
      }
      if (!result.ok) process.exitCode = 1;
    } catch (e: unknown) {
      fail(e);
    }
  });

program
  .command("graph")
  .description("Write the circuit's connectivity as a Graphviz DOT file.")
  .argument("<file>", "Circuit definition file")
  .option("-o, --out <path>", "Output .dot path (default: beside the circuit file)")
  .action(async (file: string, opts: { out?: string }) => {
    try {
      const built = buildNetwork(await readCircuitFile(file));
      printDiagnostics(built.diagnostics);
      if (!built.ok) {
        process.exitCode = 1;
        return;
      }
      const out = opts.out ?? path.join(path.dirname(file), `${path.basename(file, path.extname(file))}.dot`);
      await writeText(out, circuitToDot(built.circuit));
      console.log(chalk.green(`Wrote ${out}`));
    } catch (e: unknown) {
      fail(e);
    }
  });

program
  .command("shell")
  .description("Interactive simulation shell (run, continue, switches, monitors).")
  .argument("<file>", "Circuit definition file")
  .option("--max-settle <n>", "Settling passes allowed per cycle before reporting oscillation")
  .action(async (file: string, opts: { maxSettle?: string }) => {
    try {
      const maxSettlePasses = positiveIntOption(opts.maxSettle, "--max-settle") ?? parsePositiveInt(process.env.LOGICSIM_MAX_SETTLE);
      const loaded = Simulator.load(await readCircuitFile(file), { maxSettlePasses });
      printDiagnostics(loaded.diagnostics);
      if (!loaded.ok) {
        process.exitCode = 1;
        return;
      }

      const sim = loaded.simulator;
      const rl = createInterface({ input, output });
      console.log(chalk.cyan(`Loaded ${file}.`));
      console.log(chalk.dim("Type h for commands. Use q to quit."));
      try {
        while (true) {
          const line = await rl.question(chalk.green("# "));
          const res = executeCommand(sim, line);
          for (const l of res.lines) console.log(l);
          for (const p of res.problems) console.log(chalk.yellow(p));
          if (res.quit) break;
        }
      } finally {
        rl.close();
      }
    } catch (e: unknown) {
      fail(e);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? (err.stack ?? err.message) : String(err)));
  process.exit(1);
});

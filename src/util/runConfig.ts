import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";
import { positiveIntOption } from "./numbers.js";

const RunConfigSchema = z
  .object({
    circuitPath: z.string().optional(),
    cycles: z.number().int().positive().optional(),
    /** Switch name to the state it is set to before the run. */
    switches: z.record(z.string(), z.union([z.literal(0), z.literal(1)])).optional(),
    /** Extra signals to monitor on top of the file's MONITOR section. */
    monitors: z.array(z.string()).optional(),
    outdir: z.string().optional(),
    maxSettlePasses: z.number().int().positive().optional(),
    graph: z.boolean().optional(),
  })
  .strict();

export type RunConfig = z.infer<typeof RunConfigSchema>;

function cleanString(v: unknown): string | undefined {
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  return s ? s : undefined;
}

export function parseRunConfig(raw: unknown): RunConfig {
  const parsed = RunConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new Error(`Invalid config JSON: ${msg}`);
  }

  // Normalize: convert blank strings to undefined.
  const cfg = parsed.data;
  const monitors = cfg.monitors?.map((m) => m.trim()).filter(Boolean);
  return {
    circuitPath: cleanString(cfg.circuitPath),
    cycles: cfg.cycles,
    switches: cfg.switches,
    monitors: monitors?.length ? monitors : undefined,
    outdir: cleanString(cfg.outdir),
    maxSettlePasses: cfg.maxSettlePasses,
    graph: cfg.graph,
  };
}

export async function readRunConfig(configPath: string): Promise<RunConfig> {
  const abs = path.resolve(configPath);
  const ok = await fs.pathExists(abs);
  if (!ok) throw new Error(`Config file not found: ${configPath}`);
  return parseRunConfig(await fs.readJson(abs));
}

/** Parses repeated `name=0|1` flags. */
export function parseSwitchAssignments(items: readonly string[]): Record<string, 0 | 1> {
  const out: Record<string, 0 | 1> = {};
  for (const item of items) {
    const m = /^\s*([^=\s]+)\s*=\s*([01])\s*$/.exec(item);
    if (!m) throw new Error(`Invalid switch setting '${item}' (expected name=0 or name=1)`);
    out[m[1]] = m[2] === "1" ? 1 : 0;
  }
  return out;
}

export function mergeRunConfig(
  cli: {
    circuit?: unknown;
    cycles?: unknown;
    switch?: unknown;
    monitor?: unknown;
    outdir?: unknown;
    maxSettle?: unknown;
    graph?: unknown;
  },
  cfg: RunConfig,
): RunConfig {
  // CLI wins when explicitly set (including booleans)
  const merged: RunConfig = {
    ...cfg,
  };

  const circuit = cleanString(cli.circuit);
  if (circuit) merged.circuitPath = circuit;

  const cycles = positiveIntOption(cli.cycles, "--cycles");
  if (cycles) merged.cycles = cycles;

  if (Array.isArray(cli.switch) && cli.switch.length) {
    merged.switches = { ...cfg.switches, ...parseSwitchAssignments(cli.switch.map(String)) };
  }

  if (Array.isArray(cli.monitor) && cli.monitor.length) {
    merged.monitors = [...(cfg.monitors ?? []), ...cli.monitor.map(String)];
  }

  const outdir = cleanString(cli.outdir);
  if (outdir) merged.outdir = outdir;

  const maxSettle = positiveIntOption(cli.maxSettle, "--max-settle");
  if (maxSettle) merged.maxSettlePasses = maxSettle;

  if (typeof cli.graph === "boolean") merged.graph = cli.graph;

  return merged;
}

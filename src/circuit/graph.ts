import type { Circuit } from "./parser.js";

const SHAPES: Record<string, string> = {
  SWITCH: "invtriangle",
  CLOCK: "invtriangle",
  SIGGEN: "invtriangle",
  RC: "invtriangle",
  DTYPE: "record",
};

export function circuitToDot(circuit: Circuit): string {
  const { devices, names, monitors } = circuit;
  const sanitize = (s: string) => s.replace(/[^a-zA-Z0-9_]/g, "_");

  let dot = "digraph circuit {\n";
  dot += "  rankdir=LR;\n";
  dot += "  graph [splines=true, overlap=false];\n";
  dot += "  node  [fontsize=10];\n\n";

  dot += "  // Devices\n";
  for (const d of devices.all()) {
    const name = names.getString(d.id);
    const kind = d.state.kind;
    const label = kind === "DTYPE" ? `{<in> ${name}\\nDTYPE|{<Q> Q|<QBAR> QBAR}}` : `${name}\\n${kind}`;
    const shape = SHAPES[kind] ?? "box";
    dot += `  dev_${sanitize(name)} [label="${label}", shape=${shape}];\n`;
  }

  dot += "\n  // Connections (output -> input)\n";
  for (const d of devices.all()) {
    for (const [pin, source] of d.inputs) {
      if (!source) continue;
      const from = `dev_${sanitize(names.getString(source.device))}` + (source.pin === null ? "" : `:${names.getString(source.pin)}`);
      dot += `  ${from} -> dev_${sanitize(names.getString(d.id))} [label="${names.getString(pin)}"];\n`;
    }
  }

  const watched = monitors.entries();
  if (watched.length) {
    dot += "\n  // Monitors\n";
    for (const e of watched) {
      const signal = monitors.signalName(e);
      const monitorNode = `mon_${sanitize(signal)}`;
      const from = `dev_${sanitize(names.getString(e.device))}` + (e.pin === null ? "" : `:${names.getString(e.pin)}`);
      dot += `  ${monitorNode} [label="${signal}", shape=note];\n`;
      dot += `  ${from} -> ${monitorNode} [style=dashed];\n`;
    }
  }

  dot += "}\n";
  return dot;
}

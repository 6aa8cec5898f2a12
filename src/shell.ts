import { parsePositiveInt } from "./util/numbers.js";
import { SIGNAL_ERROR_MESSAGES, type Simulator } from "./sim/simulator.js";

export type ShellReply = {
  lines: string[];
  /** Lines that describe a failed command; the CLI prints them in yellow. */
  problems: string[];
  quit?: boolean;
};

export const SHELL_HELP = [
  "Commands:",
  "  r N        Run N cycles from cold start",
  "  c N        Continue for N more cycles",
  "  s X N      Set switch X to N (0 or 1)",
  "  m X        Monitor signal X (dev or dev.PIN)",
  "  z X        Zap (remove) the monitor on X",
  "  l          List switches and outputs",
  "  d          Display the monitored waveforms",
  "  h          Show this help",
  "  q          Quit",
];

function reply(lines: string[] = [], problems: string[] = []): ShellReply {
  return { lines, problems };
}

/** Interprets one line of the interactive shell against a loaded simulator. */
export function executeCommand(sim: Simulator, raw: string): ShellReply {
  const [cmd, ...args] = raw.trim().split(/\s+/);
  switch (cmd) {
    case "":
      return reply();
    case "h":
      return reply(SHELL_HELP);
    case "q":
      return { lines: [], problems: [], quit: true };
    case "r":
    case "c": {
      const n = parsePositiveInt(args[0]);
      if (n === undefined) return reply([], ["Expected a positive number of cycles"]);
      if (cmd === "c" && sim.cyclesCompleted === 0) return reply([], ["Nothing to continue; use 'r' first"]);
      const result = cmd === "r" ? sim.run(n) : sim.continue(n);
      const head = `${cmd === "r" ? "Ran" : "Continued"} ${result.cycles} cycle(s)`;
      if (!result.ok) return reply([head, ...sim.displaySignals()], [result.error.message]);
      return reply([head, ...sim.displaySignals()]);
    }
    case "s": {
      const [name, value] = args;
      if (!name || (value !== "0" && value !== "1")) return reply([], ["Usage: s <switch> 0|1"]);
      if (!sim.setSwitch(name, value === "1")) return reply([], [`'${name}' is not a switch`]);
      return reply([`Switch ${name} set to ${value}`]);
    }
    case "m":
    case "z": {
      const [signal] = args;
      if (!signal) return reply([], [`Usage: ${cmd} <signal>`]);
      const result = cmd === "m" ? sim.monitor(signal) : sim.zap(signal);
      if (!result.ok) return reply([], [`Cannot ${cmd === "m" ? "monitor" : "zap"} '${signal}': ${SIGNAL_ERROR_MESSAGES[result.error]}`]);
      return reply([`${cmd === "m" ? "Monitoring" : "Stopped monitoring"} ${signal}`]);
    }
    case "l": {
      const switches = sim.listSwitches().map((s) => `${s.name}=${s.on ? 1 : 0}`);
      return reply([
        `Switches: ${switches.length ? switches.join(" ") : "(none)"}`,
        `Outputs: ${sim.listOutputs().join(" ")}`,
      ]);
    }
    case "d":
      return reply(sim.displaySignals());
    default:
      return reply([], [`Unknown command '${cmd}'; type h for help`]);
  }
}

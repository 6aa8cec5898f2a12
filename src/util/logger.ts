import chalk from "chalk";
import type { Logger } from "../types.js";

export function consoleLogger(): Logger {
  return {
    info: (m) => console.log(m),
    warn: (m) => console.warn(chalk.yellow(m)),
    error: (m) => console.error(chalk.red(m)),
  };
}

/** Collects messages instead of printing them. */
export function memoryLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (m) => lines.push(`info: ${m}`),
    warn: (m) => lines.push(`warn: ${m}`),
    error: (m) => lines.push(`error: ${m}`),
  };
}

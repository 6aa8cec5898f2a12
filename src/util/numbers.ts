/** Parses a decimal string of digits as an integer of at least 1. */
export function parsePositiveInt(text: string | undefined): number | undefined {
  const s = text?.trim();
  if (!s || !/^\d+$/.test(s)) return undefined;
  const n = Number.parseInt(s, 10);
  return n >= 1 ? n : undefined;
}

/** Like `parsePositiveInt`, but an option that was given and does not parse is an error. */
export function positiveIntOption(value: unknown, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = parsePositiveInt(String(value));
  if (n === undefined) throw new Error(`Invalid ${flag} value '${String(value)}' (expected a positive integer)`);
  return n;
}

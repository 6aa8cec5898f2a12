import path from "node:path";
import fs from "fs-extra";

/** Creates `<baseDir>/<label>_<YYYYMMDD_HHMMSS>` and returns its path. */
export async function makeRunDir(baseDir = "runs", label = "run"): Promise<string> {
  const now = new Date();
  const pad = (n: number) => String(n).padStart(2, "0");
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;

  const safeLabel = label.replace(/[^a-zA-Z0-9._-]/g, "_") || "run";
  const full = path.join(baseDir, `${safeLabel}_${stamp}`);
  await fs.mkdirp(full);
  return full;
}

import fs from "node:fs";
import path from "node:path";

// Dotfiles are not always available in deploy workspaces, so each app reads `env.local` from its own directory.
// Values already present in process.env win.
export function loadEnvLocal(appDir: string): void {
  const envPath = path.resolve(appDir, "env.local");
  if (!fs.existsSync(envPath)) return;
  const raw = fs.readFileSync(envPath, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const idx = s.indexOf("=");
    if (idx < 0) continue;
    const key = s.slice(0, idx).trim();
    const value = s.slice(idx + 1).trim();
    if (!key) continue;
    if (process.env[key] === undefined && value !== "") {
      process.env[key] = value;
    }
  }
}

export function parseIdList(input: string | undefined): Set<number> {
  const ids = new Set<number>();
  for (const part of (input || "").split(",")) {
    const s = part.trim();
    if (/^\d+$/.test(s)) ids.add(Number(s));
  }
  return ids;
}

export function parsePositiveInt(input: string | undefined, fallback: number): number {
  const n = Number(input);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

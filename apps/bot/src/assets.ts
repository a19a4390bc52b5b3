import fs from "node:fs";
import path from "node:path";

const EXTENSIONS = ["jpg", "png"] as const;

/** Path of the picture for `level` inside the one assets directory, or null when there is none. */
export function resolveLevelImage(dir: string, level: number): string | null {
  if (!Number.isInteger(level) || level < 1) return null;
  for (const ext of EXTENSIONS) {
    const file = path.join(dir, `level_${level}.${ext}`);
    if (fs.existsSync(file)) return file;
  }
  return null;
}

import { MAX_LEVEL, type DbLevel } from "@awaken/shared";

// Placeholder content, mirrored by the seed in supabase/migrations/001_init.sql.
export function defaultLevels(): DbLevel[] {
  const levels: DbLevel[] = [];
  for (let n = 1; n <= MAX_LEVEL; n++) {
    levels.push({ level_number: n, content: `Контент для уровня ${n}`, rules: `Правила уровня ${n}`, image_ref: null });
  }
  return levels;
}

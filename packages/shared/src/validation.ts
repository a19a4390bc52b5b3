import { fail, type Result } from "./result.js";

export const MIN_DONATION_AMOUNT = 1;
export const MAX_DONATION_AMOUNT = 1_000_000;

export function validateName(input: string): boolean {
  const s = input.trim();
  if (!s || s.length > 64) return false;
  return /^\p{L}+(?:[ -]\p{L}+)*$/u.test(s);
}

/**
 * Accepts "DD.MM.YYYY" for a real calendar date between 1900-01-01 and `now`.
 * Returns the ISO date (YYYY-MM-DD) or null.
 */
export function parseBirthdate(input: string, now = new Date()): string | null {
  const m = input.trim().match(/^(\d{2})\.(\d{2})\.(\d{4})$/);
  if (!m) return null;
  const day = Number(m[1]);
  const month = Number(m[2]);
  const year = Number(m[3]);
  if (year < 1900) return null;
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  if (d.getTime() > now.getTime()) return null;
  return d.toISOString().slice(0, 10);
}

export function validateLocation(input: string): boolean {
  const s = input.trim();
  return s.length > 0 && s.length <= 128;
}

// "500", "500.5", "1 000,50" -> rubles rounded to kopeks
export function parseDonationAmount(input: string): Result<{ amount: number }, "validation"> {
  const s = input.replace(/\s+/g, "").replace(",", ".");
  if (!/^\d+(?:\.\d+)?$/.test(s)) return fail("validation", "not_a_number");
  const amount = Math.round(Number(s) * 100) / 100;
  if (!Number.isFinite(amount)) return fail("validation", "not_a_number");
  if (amount < MIN_DONATION_AMOUNT) return fail("validation", "too_small");
  if (amount > MAX_DONATION_AMOUNT) return fail("validation", "too_large");
  return { ok: true, amount };
}

const DISPLAY_TZ = "Europe/Moscow";

function localParts(date: Date, timeZone: string) {
  const fmt = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hour12: false
  });
  const parts = fmt.formatToParts(date);
  const get = (type: string) => parts.find((p) => p.type === type)?.value ?? "00";
  return { year: get("year"), month: get("month"), day: get("day"), hour: get("hour"), minute: get("minute") };
}

/** "20.10.2026 15:00 МСК" */
export function formatMoscowTime(iso: string): string {
  const p = localParts(new Date(iso), DISPLAY_TZ);
  return `${p.day}.${p.month}.${p.year} ${p.hour}:${p.minute} МСК`;
}

/** Whole hours and minutes, rounded down: "23 ч 59 мин". */
export function formatRemaining(ms: number): string {
  const totalMinutes = Math.max(0, Math.floor(ms / 60_000));
  return `${Math.floor(totalMinutes / 60)} ч ${totalMinutes % 60} мин`;
}

/** Rubles with kopeks only when present: 500 -> "500", 99.5 -> "99.50". */
export function formatRub(amount: number): string {
  return Number.isInteger(amount) ? String(amount) : amount.toFixed(2);
}

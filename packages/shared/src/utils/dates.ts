const DAY_MS = 24 * 60 * 60 * 1000;
const KST_OFFSET_MS = 9 * 60 * 60 * 1000;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

/** Normalises `YYYYMMDD` or `YYYY-MM-DD` to `YYYY-MM-DD`; returns undefined for anything else. */
export function toIsoDate(value: string): string | undefined {
  const trimmed = value.trim();
  const match = ISO_DATE.exec(trimmed) ?? COMPACT_DATE.exec(trimmed);
  if (!match) {
    return undefined;
  }

  const iso = `${match[1]}-${match[2]}-${match[3]}`;
  const parsed = new Date(`${iso}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== iso) {
    return undefined;
  }
  return iso;
}

export function addDays(isoDate: string, days: number): string {
  const time = new Date(`${isoDate}T00:00:00Z`).getTime() + days * DAY_MS;
  return new Date(time).toISOString().slice(0, 10);
}

export function isWeekend(isoDate: string): boolean {
  const day = new Date(`${isoDate}T00:00:00Z`).getUTCDay();
  return day === 0 || day === 6;
}

/** Calendar date in Korea for the given instant. */
export function kstDate(nowMs: number = Date.now()): string {
  return new Date(nowMs + KST_OFFSET_MS).toISOString().slice(0, 10);
}

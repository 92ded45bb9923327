const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

export type DateParts = {
  year: number;
  month: number;
  day: number;
};

export function isIsoDate(value: string): boolean {
  const match = value.match(ISO_DATE);
  if (!match) return false;
  const [, y, m, d] = match;
  const parsed = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    parsed.getUTCFullYear() === Number(y) &&
    parsed.getUTCMonth() === Number(m) - 1 &&
    parsed.getUTCDate() === Number(d)
  );
}

export function formatIsoDate(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

export function addDaysUtc(dateIso: string, days: number): string {
  const { year, month, day } = toDateParts(dateIso);
  const utc = Date.UTC(year, month - 1, day);
  return formatIsoDate(new Date(utc + days * 24 * 60 * 60 * 1000));
}

export function yesterdayUtc(now: Date = new Date()): string {
  return addDaysUtc(formatIsoDate(now), -1);
}

export function toDateParts(dateIso: string): DateParts {
  const match = dateIso.match(ISO_DATE);
  if (!match) throw new Error(`Invalid date (expected YYYY-MM-DD): ${dateIso}`);
  return { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
}

// Report API dates come back as YYYYMMDD; anything else is left as delivered.
export function compactToIsoDate(raw: string): string {
  const match = raw.match(COMPACT_DATE);
  if (!match) return raw;
  return `${match[1]}-${match[2]}-${match[3]}`;
}

export function toCompactDate(dateIso: string): string {
  return dateIso.replace(/-/g, "");
}

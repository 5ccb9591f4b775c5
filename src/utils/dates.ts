const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Calendar-valid YYYY-MM-DD check (rejects 2024-02-30)
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;

  const [, year, month, day] = match;
  const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return (
    parsed.getUTCFullYear() === Number(year) &&
    parsed.getUTCMonth() === Number(month) - 1 &&
    parsed.getUTCDate() === Number(day)
  );
}

export function compareIsoDates(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function nowIso(now: Date = new Date()): string {
  return now.toISOString();
}

export function formatDate(d: Date): string {
  const y = d.getUTCFullYear();
  const m = String(d.getUTCMonth() + 1).padStart(2, "0");
  const day = String(d.getUTCDate()).padStart(2, "0");
  return `${y}-${m}-${day}`;
}

/** Start of a window of `days` calendar days ending at `end`. */
export function windowStart(end: Date, days: number): Date {
  const start = new Date(end);
  start.setUTCDate(end.getUTCDate() - Math.max(0, days));
  return start;
}

const pad = (n: number) => String(n).padStart(2, "0");

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

const LOCAL_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * Parses an ISO-8601 timestamp. Values without an offset (`2025-01-31`,
 * `2025-01-31 18:00`) are read as local time. Returns undefined when invalid.
 */
export function parseTimestamp(value: string): Date | undefined {
  const trimmed = value.trim();
  if (!trimmed) return undefined;

  const m = trimmed.match(LOCAL_DATE_TIME);
  if (m) {
    const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
    const date = new Date(
      year,
      month - 1,
      day,
      Number(m[4] ?? 0),
      Number(m[5] ?? 0),
      Number(m[6] ?? 0)
    );
    // Rejects rollover such as 2025-02-30.
    if (date.getMonth() !== month - 1 || date.getDate() !== day) return undefined;
    return date;
  }

  if (!/^\d{4}-\d{2}-\d{2}T.*(Z|[+-]\d{2}:?\d{2})$/i.test(trimmed)) return undefined;
  const date = new Date(trimmed);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

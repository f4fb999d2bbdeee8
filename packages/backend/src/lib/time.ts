// Date, optionally followed by a time, with no zone designator
const NAIVE_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?))?$/;

// Date and time with Z or a ±hh:mm offset
const ZONED_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:\d{2})$/i;

// Date.parse rolls 2024-02-30 over into March
function is_calendar_date(date: string): boolean {
  const parsed = new Date(`${date}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === date;
}

/**
 * Parse an ISO 8601 timestamp, reading offset-less strings as UTC.
 * Returns null for anything else, including strings the host would read
 * in its local timezone.
 */
export function parse_timestamp(value: string | Date): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }

  const trimmed = value.trim();
  const naive = NAIVE_TIMESTAMP.exec(trimmed);
  const zoned = naive ? null : ZONED_TIMESTAMP.exec(trimmed);

  let date: string;
  let normalized: string;
  if (naive?.[1] !== undefined) {
    date = naive[1];
    normalized = `${date}T${naive[2] ?? '00:00:00'}Z`;
  } else if (zoned?.[1] !== undefined && zoned[2] !== undefined && zoned[3] !== undefined) {
    date = zoned[1];
    normalized = `${date}T${zoned[2]}${zoned[3].toUpperCase()}`;
  } else {
    return null;
  }

  if (!is_calendar_date(date)) {
    return null;
  }

  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function hours_between(earlier: Date, later: Date): number {
  return (later.getTime() - earlier.getTime()) / 3_600_000;
}

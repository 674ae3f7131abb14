import { DateTime } from 'luxon';

// Meridiem tokens are locale dependent; extracts always use AM/PM.
const PARSE_OPTIONS = { locale: 'en-US' };

/**
 * Parses an extract timestamp into an ISO calendar date (`yyyy-MM-dd`).
 * Formats are tried in order, then ISO 8601 as a fallback.
 */
export function parseFactDate(value: string, formats: readonly string[]): string | null {
  const text = value.trim();
  if (!text) return null;

  for (const format of formats) {
    const parsed = DateTime.fromFormat(text, format, PARSE_OPTIONS);
    if (parsed.isValid) {
      return parsed.toISODate();
    }
  }

  const iso = DateTime.fromISO(text, PARSE_OPTIONS);
  return iso.isValid ? iso.toISODate() : null;
}

export function laterDate(a: string | null, b: string | null): string | null {
  if (a == null) return b;
  if (b == null) return a;
  return b > a ? b : a;
}

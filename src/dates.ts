const DATE_PATTERN = /^(\d{4})[/-](\d{1,2})[/-](\d{1,2})(?:[ T].*)?$/;
const MS_PER_DAY = 86_400_000;

/**
 * Normalizes a Goodreads date ("2025/12/06", "2025-12-06", optionally with a
 * time) to a YYYY-MM-DD key. Returns undefined for anything that is not a real
 * calendar day.
 */
export function parseDateKey(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const match = value.trim().match(DATE_PATTERN);
  if (!match) return undefined;

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const candidate = new Date(Date.UTC(year, month - 1, day));
  if (
    candidate.getUTCFullYear() !== year ||
    candidate.getUTCMonth() !== month - 1 ||
    candidate.getUTCDate() !== day
  ) {
    return undefined;
  }
  return formatDateKey(year, month, day);
}

export function formatDateKey(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

/** Days since the epoch for a key produced by parseDateKey. */
export function dayNumber(dateKey: string): number {
  const [year, month, day] = dateKey.split("-").map(Number);
  return Math.round(Date.UTC(year, month - 1, day) / MS_PER_DAY);
}

export function yearOf(dateKey: string): number {
  return parseInt(dateKey.slice(0, 4), 10);
}

// YYYY-MM
export function monthOf(dateKey: string): string {
  return dateKey.slice(0, 7);
}

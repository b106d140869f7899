import { dayNumber, parseDateKey } from "./dates.js";
import { COLUMNS } from "./goodreads.js";
import { requireColumns } from "./insights.js";
import type { ReadingTable, StreakSummary } from "./types.js";

export function findStreaks(dates: Iterable<string | undefined>): StreakSummary {
  const perDay = new Map<string, number>();
  for (const value of dates) {
    const key = parseDateKey(value);
    if (key) perDay.set(key, (perDay.get(key) || 0) + 1);
  }

  const days = [...perDay.keys()].sort();
  if (days.length === 0) {
    return {
      longestStreakDays: 0,
      streakStart: undefined,
      streakEnd: undefined,
      maxBooksInOneDay: 0,
      maxDay: undefined,
    };
  }

  let run = 1;
  let runStart = days[0];
  let best = { length: 1, start: days[0], end: days[0] };
  let maxDay = days[0];

  for (let i = 1; i < days.length; i++) {
    if (dayNumber(days[i]) - dayNumber(days[i - 1]) === 1) {
      run++;
    } else {
      run = 1;
      runStart = days[i];
    }
    // strictly greater: the earliest run of a given length wins
    if (run > best.length) {
      best = { length: run, start: runStart, end: days[i] };
    }
    if ((perDay.get(days[i]) ?? 0) > (perDay.get(maxDay) ?? 0)) {
      maxDay = days[i];
    }
  }

  return {
    longestStreakDays: best.length,
    streakStart: best.start,
    streakEnd: best.end,
    maxBooksInOneDay: perDay.get(maxDay) ?? 0,
    maxDay,
  };
}

export function readingStreaks(table: ReadingTable): StreakSummary {
  requireColumns(table, COLUMNS.dateRead);
  return findStreaks(table.records.map((r) => r.dateRead));
}

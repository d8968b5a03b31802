import { addDays, format, getISODay, getISOWeek, getISOWeekYear, parseISO, startOfISOWeek } from "date-fns";
import { weekdayLabels, type WeekdayLabel } from "@health-analytics/contracts";

const DAY_FORMAT = "yyyy-MM-dd";

/** Parse a YYYY-MM-DD key as a local calendar day. */
export function parseDay(date: string): Date {
  return parseISO(date);
}

export function formatDay(date: Date): string {
  return format(date, DAY_FORMAT);
}

export function shiftDay(date: string, days: number): string {
  return formatDay(addDays(parseDay(date), days));
}

/** ISO week key, e.g. "2026-W03". Uses the ISO week-numbering year. */
export function isoWeekKey(date: string): string {
  const d = parseDay(date);
  return `${getISOWeekYear(d)}-W${String(getISOWeek(d)).padStart(2, "0")}`;
}

export function weekdayLabel(date: string): WeekdayLabel {
  return weekdayLabels[getISODay(parseDay(date)) - 1] ?? "Mon";
}

/** Monday of the ISO week containing `date`. */
export function weekStart(date: string): string {
  return formatDay(startOfISOWeek(parseDay(date)));
}

/** Inclusive list of day keys from `start` to `end`. */
export function dayRange(start: string, end: string): string[] {
  const days: string[] = [];
  for (let day = start; day <= end; day = shiftDay(day, 1)) {
    days.push(day);
  }
  return days;
}

export function monthKey(date: string): string {
  return date.slice(0, 7);
}

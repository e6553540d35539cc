export const REPORT_MODES = ["weekly", "biweekly", "monthly"] as const;

export type ReportMode = (typeof REPORT_MODES)[number];

/**
 * Inclusive date bounds as YYYY-MM-DD strings. Either bound may be missing
 * for an explicit custom range.
 */
export interface DateRange {
  start?: string;
  end?: string;
}

export interface ResolvedRange {
  start: string;
  end: string;
}

// Rolling windows ending today; monthly is the last 30 days, not the calendar month.
const MODE_LOOKBACK_DAYS: Record<ReportMode, number> = {
  weekly: 6,
  biweekly: 13,
  monthly: 30,
};

const MONTH_NAMES = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];
const DAY_NAMES = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isReportMode(value: string): value is ReportMode {
  return (REPORT_MODES as readonly string[]).includes(value);
}

export function formatDateKey(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/**
 * Parses a YYYY-MM-DD string into a local-midnight Date. Returns null for
 * malformed strings and for dates that do not exist (2024-02-30).
 */
export function parseDateKey(value: string): Date | null {
  const match = DATE_KEY_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

export function isValidDateKey(value: string): boolean {
  return parseDateKey(value) !== null;
}

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addDays(date: Date, days: number): Date {
  const d = new Date(date);
  d.setDate(d.getDate() + days);
  return d;
}

export function todayKey(now: Date = new Date()): string {
  return formatDateKey(startOfDay(now));
}

export function getDateRange(mode: ReportMode, now: Date = new Date()): ResolvedRange {
  const today = startOfDay(now);
  const start = addDays(today, -MODE_LOOKBACK_DAYS[mode]);
  return { start: formatDateKey(start), end: formatDateKey(today) };
}

export function isWithinRange(dateKey: string, range: DateRange): boolean {
  if (range.start && dateKey < range.start) return false;
  if (range.end && dateKey > range.end) return false;
  return true;
}

/**
 * Formats a YYYY-MM-DD key with a pattern made of the tokens YYYY, MMM
 * (short month name), MM, DD and ddd (short weekday name). Anything else
 * in the pattern is copied through.
 */
export function formatDisplayDate(dateKey: string, pattern: string): string {
  const date = parseDateKey(dateKey);
  if (!date) {
    return dateKey;
  }
  return pattern.replace(/YYYY|MMM|MM|DD|ddd/g, (token) => {
    switch (token) {
      case "YYYY":
        return String(date.getFullYear());
      case "MMM":
        return MONTH_NAMES[date.getMonth()];
      case "MM":
        return String(date.getMonth() + 1).padStart(2, "0");
      case "DD":
        return String(date.getDate()).padStart(2, "0");
      default:
        return DAY_NAMES[date.getDay()];
    }
  });
}

const PATTERN_EXAMPLE_DATE = "2024-03-15";

/** Human-readable form of a date pattern, used in AI instructions. */
export function describeDatePattern(pattern: string): string {
  return `${pattern} (e.g. ${formatDisplayDate(PATTERN_EXAMPLE_DATE, pattern)})`;
}

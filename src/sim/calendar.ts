import type { ClockSnapshot, HourOfDay, Season, SimMinute, TimeOfDay, WorkWindow } from "./types";

export const MINUTES_PER_HOUR = 60;
export const HOURS_PER_DAY = 24;
export const MINUTES_PER_DAY = MINUTES_PER_HOUR * HOURS_PER_DAY;
export const DAYS_PER_MONTH = 30;
export const MONTHS_PER_YEAR = 12;
export const DAYS_PER_YEAR = DAYS_PER_MONTH * MONTHS_PER_YEAR;
export const DAYS_PER_SEASON = DAYS_PER_YEAR / 4;

export const SEASONS: readonly Season[] = ["spring", "summer", "autumn", "winter"];

export const MONTH_NAMES: readonly string[] = [
  "Thawmonth",
  "Seedmonth",
  "Bloommonth",
  "Sunmonth",
  "Highsun",
  "Harvestide",
  "Goldleaf",
  "Fallow",
  "Mistmonth",
  "Frostmonth",
  "Deepwinter",
  "Yearsend"
];

// [startHour, bucket], ascending. The last bucket runs to midnight.
const TIME_OF_DAY_STARTS: ReadonlyArray<readonly [HourOfDay, TimeOfDay]> = [
  [0, "night"],
  [6, "dawn"],
  [8, "morning"],
  [12, "afternoon"],
  [17, "dusk"],
  [19, "evening"]
];

const DAYTIME_START_HOUR = 6;
const DAYTIME_END_HOUR = 19;

export function dayIndex(total: SimMinute): number {
  return Math.floor(total / MINUTES_PER_DAY);
}

export function seasonIndexOf(total: SimMinute): number {
  return Math.floor(dayIndex(total) / DAYS_PER_SEASON);
}

export function yearOf(total: SimMinute): number {
  return Math.floor(dayIndex(total) / DAYS_PER_YEAR) + 1;
}

export function seasonForDayOfYear(dayOfYear: number): Season {
  // dayOfYear is 1-based
  const idx = Math.min(3, Math.max(0, Math.floor((dayOfYear - 1) / DAYS_PER_SEASON)));
  return SEASONS[idx];
}

export function timeOfDayForHour(hour: HourOfDay): TimeOfDay {
  let bucket: TimeOfDay = "night";
  for (const [start, name] of TIME_OF_DAY_STARTS) {
    if (hour >= start) bucket = name;
  }
  return bucket;
}

export function isDaytimeHour(hour: HourOfDay): boolean {
  return hour >= DAYTIME_START_HOUR && hour < DAYTIME_END_HOUR;
}

/** Half-open [start, end); a window whose end is not after its start wraps past midnight. */
export function isWithinWindow(hour: HourOfDay, window: WorkWindow): boolean {
  const { startHour, endHour } = window;
  if (startHour === endHour) return false;
  if (startHour < endHour) return hour >= startHour && hour < endHour;
  return hour >= startHour || hour < endHour;
}

export function calendarAt(total: SimMinute): ClockSnapshot {
  const day = dayIndex(total);
  const minuteOfDay = total - day * MINUTES_PER_DAY;
  const hour = Math.floor(minuteOfDay / MINUTES_PER_HOUR);
  const minute = minuteOfDay % MINUTES_PER_HOUR;
  const dayOfYear = (day % DAYS_PER_YEAR) + 1;
  const month = Math.floor((dayOfYear - 1) / DAYS_PER_MONTH) + 1;
  const dayOfMonth = ((dayOfYear - 1) % DAYS_PER_MONTH) + 1;

  return {
    totalMinutes: total,
    year: yearOf(total),
    month,
    dayOfMonth,
    dayOfYear,
    day,
    hour,
    minute,
    season: seasonForDayOfYear(dayOfYear),
    timeOfDay: timeOfDayForHour(hour),
    isDaytime: isDaytimeHour(hour)
  };
}

// ---------------------------------------------------------------------------
// Period boundaries
// ---------------------------------------------------------------------------

export type Period = "hour" | "day" | "month" | "season" | "year";

const PERIOD_MINUTES: Record<Period, number> = {
  hour: MINUTES_PER_HOUR,
  day: MINUTES_PER_DAY,
  month: DAYS_PER_MONTH * MINUTES_PER_DAY,
  season: DAYS_PER_SEASON * MINUTES_PER_DAY,
  year: DAYS_PER_YEAR * MINUTES_PER_DAY
};

/** Always > 0: exactly on a boundary, the next one is a full period away. */
export function minutesUntilNext(total: SimMinute, period: Period): number {
  const len = PERIOD_MINUTES[period];
  return len - (total % len);
}

/** Minutes from `total` to the next occurrence of hh:mm; a full day when already there. */
export function minutesUntilTime(total: SimMinute, hour: HourOfDay, minute: number): number {
  const target = hour * MINUTES_PER_HOUR + minute;
  const now = total % MINUTES_PER_DAY;
  const diff = (target - now + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  return diff === 0 ? MINUTES_PER_DAY : diff;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

const pad2 = (n: number) => String(n).padStart(2, "0");

export function formatTime(c: ClockSnapshot): string {
  return `${pad2(c.hour)}:${pad2(c.minute)}`;
}

export function formatDate(c: ClockSnapshot): string {
  return `${c.dayOfMonth} ${MONTH_NAMES[c.month - 1]}, Year ${c.year}`;
}

export function formatDateTime(c: ClockSnapshot): string {
  return `${formatDate(c)} ${formatTime(c)} (${c.season}, ${c.timeOfDay})`;
}

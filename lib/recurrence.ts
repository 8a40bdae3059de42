/**
 * Recurrence Expansion
 *
 * A deliberately small RRULE interpreter: FREQ=DAILY and FREQ=WEEKLY with
 * UNTIL, COUNT, BYDAY, INTERVAL and EXDATE. Any other frequency is passed
 * through as the single master event.
 */

import { parseCalendarDate, type CalendarEvent } from "./ics-parser.js";
import { overlaps, type TimeInterval } from "./interval-algebra.js";
import { DAY_MS, addDays, formatDateKey, startOfDay } from "./time-format.js";

// ============================================================================
// Types
// ============================================================================

export type Weekday = "SU" | "MO" | "TU" | "WE" | "TH" | "FR" | "SA";

export interface RecurrenceRule {
  freq: string;
  until: Date | null;
  count: number | null;
  interval: number;
  byDay: Weekday[];
}

const WEEKDAYS: readonly Weekday[] = ["SU", "MO", "TU", "WE", "TH", "FR", "SA"];

/** Guards against malformed rules that would never terminate. */
export const MAX_RECURRENCE_ITERATIONS = 5000;

function isWeekday(value: string): value is Weekday {
  return WEEKDAYS.some(w => w === value);
}

export function weekdayOf(date: Date): Weekday {
  return WEEKDAYS[date.getDay()];
}

// ============================================================================
// Rule Parsing
// ============================================================================

/**
 * Parse an RRULE value. Returns null when the value has no FREQ.
 */
export function parseRecurrenceRule(raw: string): RecurrenceRule | null {
  const parts = new Map<string, string>();
  for (const part of raw.trim().split(";")) {
    const eq = part.indexOf("=");
    if (eq > 0) parts.set(part.slice(0, eq).trim().toUpperCase(), part.slice(eq + 1).trim());
  }

  const freq = (parts.get("FREQ") ?? "").toUpperCase();
  if (freq.length === 0) return null;

  let until: Date | null = null;
  const untilRaw = parts.get("UNTIL");
  if (untilRaw) {
    const parsed = parseCalendarDate(untilRaw);
    // A date-only UNTIL includes the whole day
    until = parsed.dateOnly ? new Date(addDays(parsed.date, 1).getTime() - 1) : parsed.date;
  }

  const countRaw = parts.get("COUNT");
  const count = countRaw !== undefined && /^\d+$/.test(countRaw) ? Number(countRaw) : null;

  const intervalRaw = parts.get("INTERVAL");
  const interval = intervalRaw !== undefined && /^\d+$/.test(intervalRaw) ? Math.max(1, Number(intervalRaw)) : 1;

  const byDay = (parts.get("BYDAY") ?? "")
    .split(",")
    // Ordinal prefixes such as 1MO only matter for monthly rules
    .map(d => d.trim().toUpperCase().replace(/^[+-]?\d+/, ""))
    .filter(isWeekday);

  return { freq, until, count, interval, byDay };
}

// ============================================================================
// Expansion
// ============================================================================

function daysBetween(from: Date, to: Date): number {
  return Math.round((startOfDay(to).getTime() - startOfDay(from).getTime()) / DAY_MS);
}

function withTimeOf(day: Date, time: Date): Date {
  return new Date(
    day.getFullYear(),
    day.getMonth(),
    day.getDate(),
    time.getHours(),
    time.getMinutes(),
    time.getSeconds()
  );
}

/**
 * Expand one recurring master event into the concrete occurrences that
 * overlap `window`.
 *
 * `skipDays` holds extra YYYY-MM-DD keys to leave out, such as dates that
 * have an override instance (RECURRENCE-ID) of their own.
 */
export function expandOccurrences(
  event: CalendarEvent,
  window: TimeInterval,
  skipDays: ReadonlySet<string> = new Set()
): CalendarEvent[] {
  const rule = event.rrule ? parseRecurrenceRule(event.rrule) : null;
  if (!rule) {
    return overlaps(event, window) ? [event] : [];
  }

  if (rule.freq !== "DAILY" && rule.freq !== "WEEKLY") {
    return overlaps(event, window) ? [event] : [];
  }

  const byDay: Weekday[] =
    rule.byDay.length > 0 ? rule.byDay : rule.freq === "WEEKLY" ? [weekdayOf(event.start)] : [];
  const excluded = new Set([...event.exceptionDates.map(formatDateKey), ...skipDays]);
  const durationMs = event.end.getTime() - event.start.getTime();

  const inInterval = (day: Date): boolean => {
    if (rule.interval <= 1) return true;
    const delta = daysBetween(event.start, day);
    return rule.freq === "DAILY"
      ? delta % rule.interval === 0
      : Math.floor(delta / 7) % rule.interval === 0;
  };

  // Without COUNT nothing before the window matters, so start just before it.
  let current = event.start;
  if (rule.count === null) {
    const dayBeforeWindow = withTimeOf(addDays(startOfDay(window.start), -1), event.start);
    if (dayBeforeWindow.getTime() > current.getTime()) current = dayBeforeWindow;
  }

  const occurrences: CalendarEvent[] = [];
  let emitted = 0;

  for (let i = 0; i < MAX_RECURRENCE_ITERATIONS; i++) {
    if (current.getTime() >= window.end.getTime()) break;
    if (rule.until && current.getTime() > rule.until.getTime()) break;
    if (rule.count !== null && emitted >= rule.count) break;

    const matchesDay = byDay.length === 0 || byDay.includes(weekdayOf(current));
    if (inInterval(current) && matchesDay && !excluded.has(formatDateKey(current))) {
      emitted++;
      const occurrence: CalendarEvent = {
        ...event,
        start: current,
        end: new Date(current.getTime() + durationMs),
        exceptionDates: [],
      };
      if (overlaps(occurrence, window)) occurrences.push(occurrence);
    }

    // Calendar-day stepping keeps the wall-clock time across DST shifts
    current = addDays(current, 1);
  }

  return occurrences;
}

/**
 * Expand every event against a window. Single events pass through when they
 * overlap it; override instances suppress their master's occurrence on the
 * same day.
 */
export function expandEvents(events: readonly CalendarEvent[], window: TimeInterval): CalendarEvent[] {
  const overriddenDays = new Map<string, Set<string>>();
  for (const e of events) {
    if (e.recurrenceId && e.uid) {
      const days = overriddenDays.get(e.uid) ?? new Set<string>();
      days.add(formatDateKey(e.recurrenceId));
      overriddenDays.set(e.uid, days);
    }
  }

  const out: CalendarEvent[] = [];
  for (const e of events) {
    const isMaster = e.rrule !== null && e.rrule.trim().length > 0 && e.recurrenceId === null;
    if (!isMaster) {
      if (overlaps(e, window)) out.push(e);
      continue;
    }
    const skip = (e.uid && overriddenDays.get(e.uid)) || new Set<string>();
    out.push(...expandOccurrences(e, window, skip));
  }

  return out.sort((a, b) => a.start.getTime() - b.start.getTime());
}

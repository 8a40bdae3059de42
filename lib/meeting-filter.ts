/**
 * Meeting Filter
 *
 * Decides which calendar events count as meetings that cut into attendance
 * time. Every candidate goes through the same predicate; the range query
 * path additionally applies `rejectsParticipation`.
 */

import type { CalendarEvent } from "./ics-parser.js";
import { HOUR_MS, formatDateKey } from "./time-format.js";

// ============================================================================
// Types
// ============================================================================

export type MeetingRejection =
  | "cancelled"
  | "all-day"
  | "crosses-midnight"
  | "too-long"
  | "transparent"
  | "busy-status"
  | "no-attendees"
  | "untitled"
  | "non-meeting-hint";

const MAX_MEETING_MS = 10 * HOUR_MS;

const CANCELLED_TITLE_WORDS = ["cancelled", "canceled", "abgesagt"];

const NON_BLOCKING_BUSY_STATUSES = new Set(["FREE", "WORKINGELSEWHERE", "OOF", "TENTATIVE"]);

const ACCEPTING_PARTSTATS = new Set(["NEEDS-ACTION", "ACCEPTED"]);

const ABSENCE_TITLE_WORDS = ["urlaub", "feiertag", "krank", "abwesend", "vacation", "holiday", "sick", "out of office"];
const ON_DUTY_TITLE_WORDS = ["homeoffice", "home office", "an anderem ort", "working elsewhere"];

// ============================================================================
// Hints
// ============================================================================

/**
 * Trim and lower-case hints, dropping empty entries.
 */
export function normalizeHints(hints: readonly string[]): string[] {
  return hints.map(h => h.trim().toLowerCase()).filter(h => h.length > 0);
}

// ============================================================================
// Predicates
// ============================================================================

export function isCancelled(event: CalendarEvent): boolean {
  if ((event.status ?? "").toUpperCase().includes("CANCELLED")) return true;
  const title = event.title.toLowerCase();
  return CANCELLED_TITLE_WORDS.some(w => title.includes(w));
}

export function crossesMidnight(event: CalendarEvent): boolean {
  return formatDateKey(event.start) !== formatDateKey(event.end) || event.end.getTime() < event.start.getTime();
}

/**
 * An all-day entry that marks the person as away for the day.
 */
export function isAllDayAbsence(event: CalendarEvent): boolean {
  if (!event.allDay) return false;
  const title = event.title.toLowerCase();
  if (ON_DUTY_TITLE_WORDS.some(w => title.includes(w))) return false;
  if (ABSENCE_TITLE_WORDS.some(w => title.includes(w))) return true;
  return (event.busyStatus ?? "").toUpperCase() === "OOF";
}

/**
 * Why an event is not a meeting, or null when it is one.
 * `hints` must already be normalized.
 */
export function meetingRejection(event: CalendarEvent, hints: readonly string[]): MeetingRejection | null {
  if (isCancelled(event)) return "cancelled";
  if (event.allDay) return "all-day";
  if (crossesMidnight(event)) return "crosses-midnight";
  if (event.end.getTime() - event.start.getTime() > MAX_MEETING_MS) return "too-long";
  if ((event.transparency ?? "").toUpperCase() === "TRANSPARENT") return "transparent";
  if (NON_BLOCKING_BUSY_STATUSES.has((event.busyStatus ?? "").toUpperCase())) return "busy-status";
  // Moved occurrences often carry no attendee lines of their own
  if (event.attendeeCount === 0 && event.recurrenceId === null) return "no-attendees";

  const title = event.title.trim().toLowerCase();
  if (title.length === 0) return "untitled";
  if (hints.some(h => title.includes(h))) return "non-meeting-hint";

  return null;
}

export function isMeeting(event: CalendarEvent, hints: readonly string[]): boolean {
  return meetingRejection(event, hints) === null;
}

/**
 * True when the configured identity has answered the invitation with
 * anything other than needs-action or accepted. Events without a retained
 * status pass.
 */
export function rejectsParticipation(event: CalendarEvent): boolean {
  if (event.selfPartstat === null) return false;
  return !ACCEPTING_PARTSTATS.has(event.selfPartstat.toUpperCase());
}

/**
 * Shared fixtures for the reconciliation tests.
 */

import type { AttendanceRow } from "../lib/attendance.js";
import type { CalendarEvent } from "../lib/ics-parser.js";
import type { RemoteWorklogRecord } from "../lib/remote-worklogs.js";

/** Monday, 23 February 2026, at the given local time */
export function at(hour: number, minute = 0, day = 23): Date {
  return new Date(2026, 1, day, hour, minute);
}

export function createEvent(overrides: Partial<CalendarEvent> = {}): CalendarEvent {
  return {
    uid: "event-1",
    title: "Planning",
    start: at(10),
    end: at(11),
    allDay: false,
    status: "CONFIRMED",
    transparency: "OPAQUE",
    busyStatus: "BUSY",
    attendeeCount: 3,
    selfPartstat: null,
    rrule: null,
    exceptionDates: [],
    recurrenceId: null,
    categories: [],
    description: null,
    ...overrides,
  };
}

export function createRow(overrides: Partial<AttendanceRow> = {}): AttendanceRow {
  const start = overrides.start === undefined ? at(8) : overrides.start;
  const end = overrides.end === undefined ? at(17) : overrides.end;
  return {
    description: "Arbeitszeit",
    day: new Date(2026, 1, 23),
    start,
    end,
    durationMinutes: start && end ? Math.round((end.getTime() - start.getTime()) / 60000) : 0,
    pauseMinutes: 0,
    pauses: [],
    paidNonWorkMinutes: 0,
    sickDays: 0,
    holidayDays: 0,
    vacationMinutes: 0,
    timeCompensationMinutes: 0,
    ...overrides,
  };
}

let recordCounter = 0;

export function createRecord(
  ticket: string,
  start: Date,
  end: Date,
  overrides: Partial<RemoteWorklogRecord> = {}
): RemoteWorklogRecord {
  recordCounter++;
  return { id: `wl-${recordCounter}`, ticket, authorId: "acc-1", start, end, ...overrides };
}

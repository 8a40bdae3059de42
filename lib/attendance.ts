/**
 * Attendance
 *
 * Ground truth from the attendance export: work windows, day envelope,
 * canonical pauses and absence detection. Rows arrive already parsed.
 */

import * as fs from "fs";
import { ParseError, errorMessage } from "./errors.js";
import { isRecord } from "./json-fields.js";
import {
  mergeAttendanceWindows,
  sortByStart,
  subtractAll,
  type TimeInterval,
} from "./interval-algebra.js";
import { formatDateKey, isSameDay, parseDateKey } from "./time-format.js";

// ============================================================================
// Types
// ============================================================================

export interface AttendanceRow {
  description: string;
  /** Local day the row belongs to */
  day: Date;
  start: Date | null;
  end: Date | null;
  durationMinutes: number;
  pauseMinutes: number;
  pauses: TimeInterval[];
  /** Recorded away-from-desk time such as a medical appointment */
  paidNonWorkMinutes: number;
  sickDays: number;
  holidayDays: number;
  vacationMinutes: number;
  timeCompensationMinutes: number;
}

export interface AttendanceHints {
  /** Descriptions marking a whole row as absence */
  absence: readonly string[];
  /** Descriptions marking a row as not productive work (pauses, appointments) */
  nonProductive: readonly string[];
}

export interface GroundTruth {
  day: Date;
  start: Date;
  end: Date;
  pauses: TimeInterval[];
  pauseMinutes: number;
  paidNonWorkMinutes: number;
  /** Gross row durations minus recorded pauses */
  netMinutes: number;
}

export const DEFAULT_ATTENDANCE_HINTS: AttendanceHints = {
  absence: [
    "urlaub",
    "feiertag",
    "krank",
    "abwesen",
    "zeitausgleich",
    "arzt",
    "pflege",
    "sonder",
    "eltern",
    "papamonat",
  ],
  nonProductive: ["pause", "arzt", "nichtleistung", "nicht-leistung"],
};

// ============================================================================
// Row Classification
// ============================================================================

function mentionsAny(text: string, hints: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return hints.some(h => h.length > 0 && lower.includes(h.toLowerCase()));
}

export function isAbsenceRow(row: AttendanceRow, hints: AttendanceHints = DEFAULT_ATTENDANCE_HINTS): boolean {
  return mentionsAny(row.description, hints.absence);
}

type TimedRow = AttendanceRow & { start: Date; end: Date };

function isTimedWorkRow(row: AttendanceRow, hints: AttendanceHints): row is TimedRow {
  return row.start !== null && row.end !== null && !isAbsenceRow(row, hints);
}

export function rowsForDay(rows: readonly AttendanceRow[], day: Date): AttendanceRow[] {
  return rows.filter(r => isSameDay(r.day, day));
}

/**
 * Distinct local days that have at least one row, in order.
 */
export function attendanceDays(rows: readonly AttendanceRow[]): Date[] {
  const byKey = new Map<string, Date>();
  for (const row of rows) {
    const key = formatDateKey(row.day);
    if (!byKey.has(key)) byKey.set(key, row.day);
  }
  return [...byKey.entries()].sort(([a], [b]) => a.localeCompare(b)).map(([, d]) => d);
}

// ============================================================================
// Work Windows
// ============================================================================

/**
 * Confirmed working time for a day: timed productive rows minus every
 * recorded pause, merged under the attendance (touching) policy.
 */
export function workWindowsForDay(
  rows: readonly AttendanceRow[],
  day: Date,
  hints: AttendanceHints = DEFAULT_ATTENDANCE_HINTS
): TimeInterval[] {
  const dayRows = rowsForDay(rows, day);
  const windows: TimeInterval[] = dayRows
    .filter((r): r is TimedRow => isTimedWorkRow(r, hints) && !mentionsAny(r.description, hints.nonProductive))
    .map(r => ({ start: r.start, end: r.end }));
  const pauses = dayRows.flatMap(r => r.pauses);
  return mergeAttendanceWindows(subtractAll(windows, pauses));
}

// ============================================================================
// Ground Truth
// ============================================================================

/**
 * Day envelope over non-absence rows. Null when no such row has both a
 * start and an end.
 */
export function groundTruthForDay(
  rows: readonly AttendanceRow[],
  day: Date,
  hints: AttendanceHints = DEFAULT_ATTENDANCE_HINTS
): GroundTruth | null {
  let start: Date | null = null;
  let end: Date | null = null;
  const pauses: TimeInterval[] = [];
  let pauseMinutes = 0;
  let paidNonWorkMinutes = 0;
  let netMinutes = 0;

  for (const row of rowsForDay(rows, day)) {
    if (isAbsenceRow(row, hints)) continue;
    if (row.start && (start === null || row.start < start)) start = row.start;
    if (row.end && (end === null || row.end > end)) end = row.end;
    pauses.push(...row.pauses);
    pauseMinutes += row.pauseMinutes;
    paidNonWorkMinutes += row.paidNonWorkMinutes;
    netMinutes += row.durationMinutes - row.pauseMinutes;
  }

  if (start === null || end === null) return null;

  return {
    day,
    start,
    end,
    pauses: sortByStart(pauses),
    pauseMinutes,
    paidNonWorkMinutes,
    netMinutes,
  };
}

/**
 * An absence is recorded (sick, holiday, more than an hour of vacation or
 * time compensation, or an absence description) and no regular work is.
 */
export function isFullAbsenceDay(
  rows: readonly AttendanceRow[],
  day: Date,
  hints: AttendanceHints = DEFAULT_ATTENDANCE_HINTS
): boolean {
  const dayRows = rowsForDay(rows, day);
  const hasWork = dayRows.some(r => isTimedWorkRow(r, hints));
  const hasAbsence = dayRows.some(
    r =>
      r.sickDays > 0 ||
      r.holidayDays > 0 ||
      r.vacationMinutes > 60 ||
      r.timeCompensationMinutes > 60 ||
      isAbsenceRow(r, hints)
  );
  return hasAbsence && !hasWork;
}

/**
 * Whether meetings should be ignored for the day: nothing productive was
 * recorded, or a row describes an absence.
 */
export function ignoresMeetings(
  rows: readonly AttendanceRow[],
  day: Date,
  hints: AttendanceHints = DEFAULT_ATTENDANCE_HINTS
): boolean {
  if (workWindowsForDay(rows, day, hints).length === 0) return true;
  return rowsForDay(rows, day).some(r => isAbsenceRow(r, hints));
}

/**
 * Paid-non-work minutes to trim from the end of the day. Zero whenever a
 * sick day, holiday, vacation or time compensation is already recorded.
 */
export function paidNonWorkBudgetMinutes(rows: readonly AttendanceRow[], day: Date): number {
  const dayRows = rowsForDay(rows, day);
  const structuredAbsence = dayRows.some(
    r => r.sickDays > 0 || r.holidayDays > 0 || r.vacationMinutes > 0 || r.timeCompensationMinutes > 0
  );
  if (structuredAbsence) return 0;
  return dayRows.reduce((sum, r) => sum + r.paidNonWorkMinutes, 0);
}

// ============================================================================
// Loading
// ============================================================================

function readNumber(record: Record<string, unknown>, key: string): number {
  const value = record[key];
  if (value === undefined || value === null) return 0;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ParseError(`"${key}" must be a number`);
  }
  return value;
}

function readDate(record: Record<string, unknown>, key: string): Date | null {
  const value = record[key];
  if (value === undefined || value === null || value === "") return null;
  if (typeof value !== "string") throw new ParseError(`"${key}" must be a date string`);
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) throw new ParseError(`"${key}" is not a valid date: ${value}`);
  return date;
}

/**
 * Revive one row from its JSON form. `day` is a YYYY-MM-DD key; times are
 * ISO strings; durations are minutes.
 */
export function parseAttendanceRow(value: unknown): AttendanceRow {
  if (!isRecord(value)) throw new ParseError("Attendance row must be an object");

  const dayRaw = value["day"];
  const day = typeof dayRaw === "string" ? parseDateKey(dayRaw) : null;
  if (!day) throw new ParseError(`Attendance row has no valid "day": ${String(dayRaw)}`);

  const start = readDate(value, "start");
  const end = readDate(value, "end");
  if (start && end && end <= start) throw new ParseError(`Attendance row on ${dayRaw} ends before it starts`);

  const pausesRaw = value["pauses"] ?? [];
  if (!Array.isArray(pausesRaw)) throw new ParseError('"pauses" must be a list');
  const pauses = pausesRaw.map((p: unknown) => {
    if (!isRecord(p)) throw new ParseError("Pause must be an object");
    const pStart = readDate(p, "start");
    const pEnd = readDate(p, "end");
    if (!pStart || !pEnd || pEnd <= pStart) throw new ParseError("Pause needs a start before its end");
    return { start: pStart, end: pEnd };
  });

  const description = typeof value["description"] === "string" ? value["description"] : "";
  const durationMinutes =
    value["durationMinutes"] !== undefined
      ? readNumber(value, "durationMinutes")
      : start && end
        ? Math.round((end.getTime() - start.getTime()) / 60000)
        : 0;

  return {
    description,
    day,
    start,
    end,
    durationMinutes,
    pauseMinutes: readNumber(value, "pauseMinutes"),
    pauses,
    paidNonWorkMinutes: readNumber(value, "paidNonWorkMinutes"),
    sickDays: readNumber(value, "sickDays"),
    holidayDays: readNumber(value, "holidayDays"),
    vacationMinutes: readNumber(value, "vacationMinutes"),
    timeCompensationMinutes: readNumber(value, "timeCompensationMinutes"),
  };
}

/**
 * Parse a JSON array of rows. Malformed rows are skipped and returned as
 * errors.
 */
export function parseAttendanceRows(json: string): { rows: AttendanceRow[]; errors: ParseError[] } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return { rows: [], errors: [new ParseError(`Attendance file is not JSON: ${errorMessage(error)}`, { cause: error })] };
  }
  if (!Array.isArray(parsed)) {
    return { rows: [], errors: [new ParseError("Attendance file must contain a list of rows")] };
  }

  const rows: AttendanceRow[] = [];
  const errors: ParseError[] = [];
  parsed.forEach((item: unknown, index) => {
    try {
      rows.push(parseAttendanceRow(item));
    } catch (error) {
      errors.push(new ParseError(`Skipped attendance row #${index + 1}: ${errorMessage(error)}`, { cause: error }));
    }
  });
  return { rows, errors };
}

export function loadAttendanceRows(filePath: string): { rows: AttendanceRow[]; errors: ParseError[] } {
  return parseAttendanceRows(fs.readFileSync(filePath, "utf-8"));
}

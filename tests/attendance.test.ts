/**
 * Attendance Ground Truth Tests
 */

import { describe, it, expect } from "vitest";
import {
  attendanceDays,
  groundTruthForDay,
  ignoresMeetings,
  isFullAbsenceDay,
  paidNonWorkBudgetMinutes,
  parseAttendanceRows,
  workWindowsForDay,
} from "../lib/attendance.js";
import { at, createRow } from "./helpers.js";

const day = new Date(2026, 1, 23);

describe("workWindowsForDay", () => {
  it("subtracts pauses and merges touching rows", () => {
    const rows = [
      createRow({ start: at(8), end: at(12), pauses: [{ start: at(10), end: at(10, 15) }] }),
      createRow({ start: at(12), end: at(16) }),
    ];
    expect(workWindowsForDay(rows, day)).toEqual([
      { start: at(8), end: at(10) },
      { start: at(10, 15), end: at(16) },
    ]);
  });

  it("skips absence and non-productive rows", () => {
    const rows = [
      createRow({ start: at(8), end: at(12) }),
      createRow({ description: "Arztbesuch", start: at(12), end: at(13) }),
      createRow({ description: "Zeitausgleich", start: at(13), end: at(17) }),
    ];
    expect(workWindowsForDay(rows, day)).toEqual([{ start: at(8), end: at(12) }]);
  });

  it("ignores other days", () => {
    expect(workWindowsForDay([createRow()], new Date(2026, 1, 24))).toEqual([]);
  });
});

describe("groundTruthForDay", () => {
  it("builds the envelope over non-absence rows", () => {
    const rows = [
      createRow({
        start: at(8),
        end: at(12, 30),
        pauseMinutes: 30,
        pauses: [{ start: at(12), end: at(12, 30) }],
      }),
      createRow({ start: at(12, 30), end: at(17), paidNonWorkMinutes: 45 }),
      createRow({ description: "Urlaub", start: at(6), end: at(7), durationMinutes: 60 }),
    ];
    expect(groundTruthForDay(rows, day)).toEqual({
      day,
      start: at(8),
      end: at(17),
      pauses: [{ start: at(12), end: at(12, 30) }],
      pauseMinutes: 30,
      paidNonWorkMinutes: 45,
      netMinutes: 270 - 30 + 270,
    });
  });

  it("is null without a timed row", () => {
    expect(groundTruthForDay([createRow({ start: null, end: null })], day)).toBeNull();
  });
});

describe("absence handling", () => {
  it("treats a sick day without work as full absence", () => {
    expect(isFullAbsenceDay([createRow({ start: null, end: null, sickDays: 1 })], day)).toBe(true);
  });

  it("is not full absence when regular work is recorded", () => {
    const rows = [createRow({ start: at(8), end: at(12) }), createRow({ start: null, end: null, vacationMinutes: 240 })];
    expect(isFullAbsenceDay(rows, day)).toBe(false);
  });

  it("ignores up to an hour of vacation", () => {
    expect(isFullAbsenceDay([createRow({ start: null, end: null, vacationMinutes: 60 })], day)).toBe(false);
  });

  it("ignores meetings when any row is an absence", () => {
    const rows = [createRow({ start: at(8), end: at(12) }), createRow({ description: "Urlaub halbtags", start: null, end: null })];
    expect(ignoresMeetings(rows, day)).toBe(true);
    expect(ignoresMeetings([createRow()], day)).toBe(false);
  });

  it("ignores meetings when nothing productive was recorded", () => {
    expect(ignoresMeetings([createRow({ description: "Pause", start: at(12), end: at(13) })], day)).toBe(true);
  });
});

describe("paidNonWorkBudgetMinutes", () => {
  it("sums paid non-work time", () => {
    const rows = [createRow({ paidNonWorkMinutes: 30 }), createRow({ start: null, end: null, paidNonWorkMinutes: 15 })];
    expect(paidNonWorkBudgetMinutes(rows, day)).toBe(45);
  });

  it("is zero when a structured absence is recorded", () => {
    const rows = [createRow({ paidNonWorkMinutes: 30 }), createRow({ start: null, end: null, timeCompensationMinutes: 10 })];
    expect(paidNonWorkBudgetMinutes(rows, day)).toBe(0);
  });
});

describe("parseAttendanceRows", () => {
  it("revives rows and skips malformed ones", () => {
    const json = JSON.stringify([
      {
        description: "Arbeitszeit",
        day: "2026-02-23",
        start: at(8).toISOString(),
        end: at(16).toISOString(),
        pauseMinutes: 30,
        pauses: [{ start: at(12).toISOString(), end: at(12, 30).toISOString() }],
      },
      { day: "23.02.2026" },
      { day: "2026-02-24", pauseMinutes: "lots" },
    ]);
    const { rows, errors } = parseAttendanceRows(json);

    expect(rows).toHaveLength(1);
    expect(rows[0].durationMinutes).toBe(480);
    expect(rows[0].pauses).toEqual([{ start: at(12), end: at(12, 30) }]);
    expect(rows[0].sickDays).toBe(0);
    expect(errors.map(e => e.message)).toEqual([
      'Skipped attendance row #2: Attendance row has no valid "day": 23.02.2026',
      'Skipped attendance row #3: "pauseMinutes" must be a number',
    ]);
  });

  it("reports a file that is not a list", () => {
    expect(parseAttendanceRows("{}").errors[0].message).toBe("Attendance file must contain a list of rows");
  });

  it("lists the distinct days in order", () => {
    const rows = [createRow({ day: new Date(2026, 1, 24) }), createRow(), createRow()];
    expect(attendanceDays(rows)).toEqual([new Date(2026, 1, 23), new Date(2026, 1, 24)]);
  });
});

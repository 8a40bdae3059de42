/**
 * Time Comparator
 *
 * Read-only comparison of attendance ground truth with remote worklog
 * records, per day. Full mode compares start, end, pause and net duration;
 * outlier mode lists remote records outside working time or inside pauses.
 */

import {
  DEFAULT_ATTENDANCE_HINTS,
  groundTruthForDay,
  isFullAbsenceDay,
  rowsForDay,
  type AttendanceHints,
  type AttendanceRow,
  type GroundTruth,
} from "./attendance.js";
import type { TimeInterval } from "./interval-algebra.js";
import type { RemoteWorklogRecord } from "./remote-worklogs.js";
import { MINUTE_MS, formatClock, formatDateKey, formatDuration, isWeekend } from "./time-format.js";

// ============================================================================
// Types
// ============================================================================

export type ComparisonMode = "full" | "outliers";

export type DifferenceType =
  | "start"
  | "end"
  | "pause"
  | "duration"
  | "remote-before-work"
  | "remote-after-work"
  | "remote-during-break";

export interface TimeDifference {
  type: DifferenceType;
  localTime: Date | null;
  remoteTime: Date | null;
  localMinutes: number | null;
  remoteMinutes: number | null;
  ticket: string | null;
  details: string | null;
}

export interface DayComparison {
  day: Date;
  differences: TimeDifference[];
  hasLocalData: boolean;
  hasRemoteData: boolean;
  remoteOnly: boolean;
  pauseMinutes: number;
  paidNonWorkMinutes: number;
  remotePauseMinutes: number;
}

export interface CompareInput {
  days: readonly Date[];
  rows: readonly AttendanceRow[];
  remoteByDay: ReadonlyMap<string, readonly RemoteWorklogRecord[]>;
  mode?: ComparisonMode;
  hints?: AttendanceHints;
}

const TIME_TOLERANCE_MINUTES = 1;
const DURATION_TOLERANCE_MINUTES = 2;

// ============================================================================
// Helpers
// ============================================================================

function epochMinute(date: Date): number {
  return Math.floor(date.getTime() / MINUTE_MS);
}

function sameTime(a: Date, b: Date): boolean {
  return Math.abs(epochMinute(a) - epochMinute(b)) <= TIME_TOLERANCE_MINUTES;
}

function sameDuration(a: number, b: number): boolean {
  return Math.abs(a - b) <= DURATION_TOLERANCE_MINUTES;
}

function difference(type: DifferenceType, fields: Partial<Omit<TimeDifference, "type">>): TimeDifference {
  return {
    type,
    localTime: null,
    remoteTime: null,
    localMinutes: null,
    remoteMinutes: null,
    ticket: null,
    details: null,
    ...fields,
  };
}

function recordMinutes(record: TimeInterval): number {
  return Math.floor((record.end.getTime() - record.start.getTime()) / MINUTE_MS);
}

/**
 * Gaps between consecutive records on whole minutes. Gaps over one minute
 * are pause; shorter ones are credited back to working time.
 */
export function remoteGaps(records: readonly TimeInterval[]): { pauseMinutes: number; ignoredMinutes: number } {
  const sorted = [...records].sort((a, b) => a.start.getTime() - b.start.getTime());
  let pauseMinutes = 0;
  let ignoredMinutes = 0;
  for (let i = 1; i < sorted.length; i++) {
    const gap = epochMinute(sorted[i].start) - epochMinute(sorted[i - 1].end);
    if (gap > 1) pauseMinutes += gap;
    else if (gap > 0) ignoredMinutes += gap;
  }
  return { pauseMinutes, ignoredMinutes };
}

function flagAll(records: readonly RemoteWorklogRecord[], details: string): TimeDifference[] {
  return records.map(r =>
    difference("remote-during-break", {
      remoteTime: r.start,
      remoteMinutes: recordMinutes(r),
      ticket: r.ticket,
      details,
    })
  );
}

// ============================================================================
// Full Comparison
// ============================================================================

export function compareDay(truth: GroundTruth, records: readonly RemoteWorklogRecord[]): TimeDifference[] {
  const differences: TimeDifference[] = [];
  if (records.length === 0) return differences;

  const remoteStart = records.reduce((min, r) => (r.start < min ? r.start : min), records[0].start);
  const remoteEnd = records.reduce((max, r) => (r.end > max ? r.end : max), records[0].end);
  const { pauseMinutes, ignoredMinutes } = remoteGaps(records);
  const remoteNet = Math.floor(records.reduce((sum, r) => sum + (r.end.getTime() - r.start.getTime()), 0) / MINUTE_MS);

  if (!sameTime(truth.start, remoteStart)) {
    differences.push(difference("start", { localTime: truth.start, remoteTime: remoteStart }));
  }

  // A remote end earlier by exactly the paid non-work time is accepted
  const paidNonWorkMs = truth.paidNonWorkMinutes * MINUTE_MS;
  const endMatches =
    sameTime(truth.end, remoteEnd) ||
    (paidNonWorkMs > 0 && sameTime(truth.end, new Date(remoteEnd.getTime() + paidNonWorkMs)));
  if (!endMatches) {
    differences.push(difference("end", { localTime: truth.end, remoteTime: remoteEnd }));
  }

  if (!sameDuration(truth.pauseMinutes, pauseMinutes)) {
    differences.push(difference("pause", { localMinutes: truth.pauseMinutes, remoteMinutes: pauseMinutes }));
  }

  const adjustedNet = remoteNet + ignoredMinutes;
  if (!sameDuration(truth.netMinutes, adjustedNet)) {
    differences.push(difference("duration", { localMinutes: truth.netMinutes, remoteMinutes: adjustedNet }));
  }

  return differences;
}

// ============================================================================
// Outliers
// ============================================================================

/**
 * Remote records starting before work, ending after it, or reaching into a
 * pause. Touching a pause boundary is not an outlier. Each record is
 * reported at most once.
 */
export function findOutliers(truth: GroundTruth, records: readonly RemoteWorklogRecord[]): TimeDifference[] {
  const outliers: TimeDifference[] = [];
  const workStart = epochMinute(truth.start);
  const workEnd = epochMinute(truth.end);
  const pauses = truth.pauses.map(p => ({ start: epochMinute(p.start), end: epochMinute(p.end), source: p }));

  for (const record of records) {
    const start = epochMinute(record.start);
    const end = epochMinute(record.end);
    const base = { remoteTime: record.start, remoteMinutes: recordMinutes(record), ticket: record.ticket };

    if (start < workStart - TIME_TOLERANCE_MINUTES) {
      outliers.push(
        difference("remote-before-work", {
          ...base,
          localTime: truth.start,
          details: `Remote ${formatClock(record.start)} before work start ${formatClock(truth.start)}`,
        })
      );
      continue;
    }

    if (end > workEnd + TIME_TOLERANCE_MINUTES) {
      outliers.push(
        difference("remote-after-work", {
          ...base,
          localTime: truth.end,
          remoteTime: record.end,
          details: `Remote ${formatClock(record.end)} after work end ${formatClock(truth.end)}`,
        })
      );
      continue;
    }

    const hit = pauses.find(p => {
      const startsInPause = start >= p.start && start < p.end;
      const endsInPause = end > p.start && end <= p.end;
      const containsPause = start < p.start && end > p.end;
      return startsInPause || endsInPause || containsPause;
    });
    if (hit) {
      outliers.push(
        difference("remote-during-break", {
          ...base,
          details: `Remote ${formatClock(record.start)}-${formatClock(record.end)} during pause ${formatClock(hit.source.start)}-${formatClock(hit.source.end)}`,
        })
      );
    }
  }

  return outliers;
}

// ============================================================================
// Range Comparison
// ============================================================================

export function compareDays(input: CompareInput): DayComparison[] {
  const mode = input.mode ?? "full";
  const hints = input.hints ?? DEFAULT_ATTENDANCE_HINTS;
  const outlierMode = mode === "outliers";
  const results: DayComparison[] = [];

  const days = [...input.days].sort((a, b) => a.getTime() - b.getTime());

  for (const day of days) {
    const records = [...(input.remoteByDay.get(formatDateKey(day)) ?? [])].sort(
      (a, b) => a.start.getTime() - b.start.getTime()
    );
    const hasRemoteData = records.length > 0;
    const dayRows = rowsForDay(input.rows, day);

    const base: DayComparison = {
      day,
      differences: [],
      hasLocalData: false,
      hasRemoteData,
      remoteOnly: false,
      pauseMinutes: 0,
      paidNonWorkMinutes: 0,
      remotePauseMinutes: remoteGaps(records).pauseMinutes,
    };

    if (isFullAbsenceDay(input.rows, day, hints)) {
      if (outlierMode && hasRemoteData) {
        const description = dayRows[0]?.description ?? "absence";
        results.push({ ...base, hasLocalData: true, differences: flagAll(records, `Absence day (${description})`) });
      }
      continue;
    }

    if (isWeekend(day) && !hasRemoteData) continue;

    const truth = groundTruthForDay(input.rows, day, hints);

    if (!truth && !hasRemoteData) continue;

    if (!truth) {
      results.push({
        ...base,
        remoteOnly: true,
        differences: outlierMode ? flagAll(records, "No attendance entry") : [],
      });
      continue;
    }

    const withTruth: DayComparison = {
      ...base,
      hasLocalData: true,
      pauseMinutes: truth.pauseMinutes,
      paidNonWorkMinutes: truth.paidNonWorkMinutes,
    };

    if (!hasRemoteData) {
      if (!outlierMode) results.push(withTruth);
      continue;
    }

    const differences = outlierMode ? findOutliers(truth, records) : compareDay(truth, records);
    if (outlierMode && differences.length === 0) continue;
    results.push({ ...withTruth, differences });
  }

  return results;
}

// ============================================================================
// Formatting
// ============================================================================

const DIFFERENCE_LABELS: Record<DifferenceType, string> = {
  start: "Work start",
  end: "Work end",
  pause: "Pause",
  duration: "Net duration",
  "remote-before-work": "Booked before work start",
  "remote-after-work": "Booked after work end",
  "remote-during-break": "Booked during a break",
};

export function describeDifference(d: TimeDifference): string {
  const label = DIFFERENCE_LABELS[d.type];
  if (d.details) return `${label}${d.ticket ? ` [${d.ticket}]` : ""}: ${d.details}`;
  if (d.type === "pause" || d.type === "duration") {
    return `${label}: local ${formatDuration(d.localMinutes ?? 0)}, remote ${formatDuration(d.remoteMinutes ?? 0)}`;
  }
  const local = d.localTime ? formatClock(d.localTime) : "n/a";
  const remote = d.remoteTime ? formatClock(d.remoteTime) : "n/a";
  return `${label}: local ${local}, remote ${remote}`;
}

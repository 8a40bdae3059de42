/**
 * Adjustment Planner
 *
 * Computes the edit script that makes a day's remote worklog records match
 * attendance ground truth:
 *
 *   1. move-start  first record starts at the attendance start
 *   2. move-end    last record ends at the attendance end
 *   3. per pause   delete / shorten-before / shorten-after / split
 *   4. close-gap   extend records before unjustified gaps, largest first,
 *                  while remote gaps exceed the recorded pause
 *
 * Operations are computed against a working copy of every record, so
 * several operations on one record compose and applying them in order
 * reproduces the planned state. An already reconciled day yields no
 * operations.
 */

import {
  DEFAULT_ATTENDANCE_HINTS,
  groundTruthForDay,
  type AttendanceHints,
  type AttendanceRow,
  type GroundTruth,
} from "./attendance.js";
import { errorMessage } from "./errors.js";
import type { WriteResult } from "./jira-client.js";
import {
  clip,
  durationMs,
  mergeAttendanceWindows,
  overlaps,
  type TimeInterval,
} from "./interval-algebra.js";
import type { RemoteWorklogRecord } from "./remote-worklogs.js";
import { MINUTE_MS, formatClock, formatDuration, sameMinute } from "./time-format.js";

// ============================================================================
// Types
// ============================================================================

interface OperationBase {
  record: RemoteWorklogRecord;
}

export interface MoveStartOperation extends OperationBase {
  type: "move-start";
  /** The record's interval after the operation */
  interval: TimeInterval;
  previous: TimeInterval;
}

export interface MoveEndOperation extends OperationBase {
  type: "move-end";
  interval: TimeInterval;
  previous: TimeInterval;
  reason: "envelope" | "close-gap";
}

export interface ShortenOperation extends OperationBase {
  type: "shorten-before" | "shorten-after";
  interval: TimeInterval;
  previous: TimeInterval;
  pause: TimeInterval;
}

export interface SplitOperation extends OperationBase {
  type: "split";
  /** First half, kept on the existing record */
  interval: TimeInterval;
  previous: TimeInterval;
  /** New records; usually one, more when later pauses cut the second half again */
  created: TimeInterval[];
  pause: TimeInterval;
}

export interface DeleteOperation extends OperationBase {
  type: "delete";
  previous: TimeInterval;
  pause: TimeInterval;
}

export type AdjustmentOperation =
  | MoveStartOperation
  | MoveEndOperation
  | ShortenOperation
  | SplitOperation
  | DeleteOperation;

export type AdjustmentType = AdjustmentOperation["type"];

export interface DayAdjustmentPlan {
  day: Date;
  operations: AdjustmentOperation[];
  pauseMinutes: number;
  paidNonWorkMinutes: number;
  /** Gap time between remote records before any operation */
  remotePauseMinutes: number;
}

export interface GeneratePlanInput {
  day: Date;
  rows: readonly AttendanceRow[];
  records: readonly RemoteWorklogRecord[];
  hints?: AttendanceHints;
}

/**
 * A piece of remote time in the working copy: either an existing record or
 * a record a split will create.
 */
interface Piece {
  start: Date;
  end: Date;
  record: RemoteWorklogRecord;
  split: SplitOperation | null;
  /** Index into split.created when this piece is a created record */
  createdIndex: number;
}

// ============================================================================
// Helpers
// ============================================================================

function epochMinute(date: Date): number {
  return Math.floor(date.getTime() / MINUTE_MS);
}

function snapshot(i: TimeInterval): TimeInterval {
  return { start: i.start, end: i.end };
}

function isValid(start: Date, end: Date): boolean {
  return end.getTime() > start.getTime();
}

/**
 * Gap minutes between consecutive intervals, counted on whole minutes.
 */
export function remotePauseMinutes(intervals: readonly TimeInterval[]): number {
  const sorted = [...intervals].sort((a, b) => a.start.getTime() - b.start.getTime());
  let total = 0;
  for (let i = 1; i < sorted.length; i++) {
    const gap = epochMinute(sorted[i].start) - epochMinute(sorted[i - 1].end);
    if (gap > 0) total += gap;
  }
  return total;
}

// ============================================================================
// Planner
// ============================================================================

class PlanBuilder {
  readonly operations: AdjustmentOperation[] = [];
  pieces: Piece[];

  constructor(records: readonly RemoteWorklogRecord[]) {
    this.pieces = [...records]
      .sort((a, b) => a.start.getTime() - b.start.getTime())
      .map(record => ({ start: record.start, end: record.end, record, split: null, createdIndex: -1 }));
  }

  sorted(): Piece[] {
    return [...this.pieces].sort((a, b) => a.start.getTime() - b.start.getTime());
  }

  /** Re-time a piece; existing records get an operation, created ones are amended in place. */
  retime(
    piece: Piece,
    start: Date,
    end: Date,
    makeOperation: (interval: TimeInterval, previous: TimeInterval) => AdjustmentOperation
  ): void {
    const previous = snapshot(piece);
    piece.start = start;
    piece.end = end;
    if (piece.split) {
      piece.split.created[piece.createdIndex] = { start, end };
      return;
    }
    this.operations.push(makeOperation({ start, end }, previous));
  }

  remove(piece: Piece, pause: TimeInterval): void {
    this.pieces = this.pieces.filter(p => p !== piece);
    const split = piece.split;
    if (!split) {
      this.operations.push({ type: "delete", record: piece.record, previous: snapshot(piece), pause });
      return;
    }

    split.created.splice(piece.createdIndex, 1);
    for (const p of this.pieces) {
      if (p.split === split && p.createdIndex > piece.createdIndex) p.createdIndex--;
    }
    if (split.created.length === 0) {
      // Nothing left to create: the split degrades to a plain shorten
      const index = this.operations.indexOf(split);
      this.operations[index] = {
        type: "shorten-before",
        record: split.record,
        interval: split.interval,
        previous: split.previous,
        pause: split.pause,
      };
    }
  }

  cutAtPause(piece: Piece, pause: TimeInterval): void {
    const startsBefore = piece.start < pause.start;
    const endsAfter = piece.end > pause.end;

    if (!startsBefore && !endsAfter) {
      this.remove(piece, pause);
      return;
    }

    if (startsBefore && !endsAfter) {
      this.retime(piece, piece.start, pause.start, (interval, previous) => ({
        type: "shorten-before",
        record: piece.record,
        interval,
        previous,
        pause,
      }));
      return;
    }

    if (!startsBefore && endsAfter) {
      this.retime(piece, pause.end, piece.end, (interval, previous) => ({
        type: "shorten-after",
        record: piece.record,
        interval,
        previous,
        pause,
      }));
      return;
    }

    // Spans the whole pause
    const tail: TimeInterval = { start: pause.end, end: piece.end };
    if (piece.split) {
      const split = piece.split;
      split.created[piece.createdIndex] = { start: piece.start, end: pause.start };
      piece.end = pause.start;
      split.created.push(tail);
      this.pieces.push({ ...tail, record: piece.record, split, createdIndex: split.created.length - 1 });
      return;
    }

    const operation: SplitOperation = {
      type: "split",
      record: piece.record,
      interval: { start: piece.start, end: pause.start },
      previous: snapshot(piece),
      created: [tail],
      pause,
    };
    this.operations.push(operation);
    piece.end = pause.start;
    this.pieces.push({ ...tail, record: piece.record, split: operation, createdIndex: 0 });
  }
}

/**
 * Build the day's adjustment plan. Days without remote records or without
 * a timed attendance envelope produce an empty plan.
 */
export function generatePlan(input: GeneratePlanInput): DayAdjustmentPlan {
  const truth = groundTruthForDay(input.rows, input.day, input.hints ?? DEFAULT_ATTENDANCE_HINTS);
  return generatePlanFromTruth(input.day, truth, input.records);
}

export function generatePlanFromTruth(
  day: Date,
  truth: GroundTruth | null,
  records: readonly RemoteWorklogRecord[]
): DayAdjustmentPlan {
  const empty: DayAdjustmentPlan = {
    day,
    operations: [],
    pauseMinutes: truth?.pauseMinutes ?? 0,
    paidNonWorkMinutes: truth?.paidNonWorkMinutes ?? 0,
    remotePauseMinutes: remotePauseMinutes(records),
  };
  if (!truth || records.length === 0) return empty;

  const builder = new PlanBuilder(records);

  // 1. Start of the day
  const first = builder.sorted()[0];
  if (!sameMinute(first.start, truth.start) && isValid(truth.start, first.end)) {
    builder.retime(first, truth.start, first.end, (interval, previous) => ({
      type: "move-start",
      record: first.record,
      interval,
      previous,
    }));
  }

  // 2. End of the day. The attendance end already excludes paid non-work time.
  const sortedAfterStart = builder.sorted();
  const last = sortedAfterStart[sortedAfterStart.length - 1];
  if (!sameMinute(last.end, truth.end) && isValid(last.start, truth.end)) {
    builder.retime(last, last.start, truth.end, (interval, previous) => ({
      type: "move-end",
      record: last.record,
      interval,
      previous,
      reason: "envelope",
    }));
  }

  // 3. Canonical pauses
  const pauses = mergeAttendanceWindows(truth.pauses.map(snapshot));
  for (const pause of pauses) {
    for (const piece of builder.sorted()) {
      if (overlaps(piece, pause)) builder.cutAtPause(piece, pause);
    }
  }

  // 4. Close gaps beyond the recorded pause
  const canonicalPause = truth.pauseMinutes + truth.paidNonWorkMinutes;
  let excess = remotePauseMinutes(builder.pieces) - canonicalPause;

  if (excess > 0) {
    const ordered = builder.sorted();
    const gaps = ordered.slice(1).map((next, i) => {
      const before = ordered[i];
      const gap: TimeInterval = { start: before.end, end: next.start };
      const gapMinutes = epochMinute(next.start) - epochMinute(before.end);
      const justifiedMs = pauses.reduce((sum, p) => {
        const shared = clip(gap, p);
        return shared ? sum + durationMs(shared) : sum;
      }, 0);
      const unjustified = Math.max(0, gapMinutes - Math.floor(justifiedMs / MINUTE_MS));
      return { before, unjustified };
    });

    gaps.sort((a, b) => b.unjustified - a.unjustified);

    for (const gap of gaps) {
      if (excess <= 0) break;
      if (gap.unjustified <= 0) continue;
      const close = Math.min(gap.unjustified, excess);
      const piece = gap.before;
      builder.retime(piece, piece.start, new Date(piece.end.getTime() + close * MINUTE_MS), (interval, previous) => ({
        type: "move-end",
        record: piece.record,
        interval,
        previous,
        reason: "close-gap",
      }));
      excess -= close;
    }
  }

  return { ...empty, operations: builder.operations };
}

// ============================================================================
// Description
// ============================================================================

function span(i: TimeInterval): string {
  return `${formatClock(i.start)}-${formatClock(i.end)}`;
}

export function describeOperation(op: AdjustmentOperation): string {
  const key = op.record.ticket;
  switch (op.type) {
    case "move-start":
      return `${key}: start ${formatClock(op.previous.start)} → ${formatClock(op.interval.start)}`;
    case "move-end": {
      const base = `${key}: end ${formatClock(op.previous.end)} → ${formatClock(op.interval.end)}`;
      if (op.reason === "envelope") return base;
      const closed = Math.round((op.interval.end.getTime() - op.previous.end.getTime()) / MINUTE_MS);
      return `${base} (close gap ${formatDuration(closed)})`;
    }
    case "shorten-before":
    case "shorten-after":
      return `${key}: ${span(op.previous)} → ${span(op.interval)}`;
    case "split":
      return `${key}: ${span(op.previous)} → ${[op.interval, ...op.created].map(span).join(" + ")}`;
    case "delete":
      return `${key}: ${span(op.previous)} delete`;
  }
}

// ============================================================================
// Apply
// ============================================================================

export interface WorklogWriter {
  updateWorklog(issue: string, worklogId: string, started: Date, timeSpentSeconds: number): Promise<WriteResult>;
  createWorklog(issue: string, started: Date, timeSpentSeconds: number, comment?: string): Promise<WriteResult>;
  deleteWorklog(issue: string, worklogId: string): Promise<boolean>;
}

export type ApplyStatus = "ok" | "failed" | "partial-failure";

export interface ApplyOutcome {
  operation: AdjustmentOperation;
  status: ApplyStatus;
  message: string;
}

function seconds(i: TimeInterval): number {
  return Math.round(durationMs(i) / 1000);
}

async function applyOne(op: AdjustmentOperation, writer: WorklogWriter): Promise<ApplyOutcome> {
  const description = describeOperation(op);
  const { ticket, id } = op.record;

  if (op.type === "delete") {
    const deleted = await writer.deleteWorklog(ticket, id);
    return { operation: op, status: deleted ? "ok" : "failed", message: deleted ? description : `${description}: delete failed` };
  }

  const updated = await writer.updateWorklog(ticket, id, op.interval.start, seconds(op.interval));
  if (!updated.ok) {
    return { operation: op, status: "failed", message: `${description}: ${updated.body ?? "update failed"}` };
  }

  if (op.type === "split") {
    for (const part of op.created) {
      const created = await writer.createWorklog(ticket, part.start, seconds(part));
      if (!created.ok) {
        // The original record is already shortened at this point
        return {
          operation: op,
          status: "partial-failure",
          message: `${description}: first part updated, creating ${span(part)} failed: ${created.body ?? "unknown error"}`,
        };
      }
    }
  }

  return { operation: op, status: "ok", message: description };
}

/**
 * Apply operations in order, one call at a time. A failing operation is
 * reported and the rest still run.
 */
export async function applyPlan(plan: DayAdjustmentPlan, writer: WorklogWriter): Promise<ApplyOutcome[]> {
  const outcomes: ApplyOutcome[] = [];
  for (const op of plan.operations) {
    try {
      outcomes.push(await applyOne(op, writer));
    } catch (error) {
      outcomes.push({ operation: op, status: "failed", message: `${describeOperation(op)}: ${errorMessage(error)}` });
    }
  }
  return outcomes;
}

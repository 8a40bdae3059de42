/**
 * Segmenter
 *
 * Partitions one day's attendance into ticket-labelled draft segments:
 *
 * 1. Meetings (merged when they touch) are clipped against each work window
 *    and booked on the ticket of the first matching meeting rule. Title
 *    rules may reword the label; the ticket follows the original title.
 * 2. The rest of the attendance time is trimmed from the end by the
 *    paid-non-work budget.
 * 3. Remaining pieces follow the commit timeline: the latest ticket at or
 *    before a piece opens it, later ticket changes inside the piece split it.
 *    Without any earlier commit the next one forward-fills the piece.
 */

import type { Classification } from "./delta-classifier.js";
import { ReconciliationInconsistency, traceError, type Trace } from "./errors.js";
import {
  MIN_PIECE_MS,
  clip,
  durationMs,
  joinTitles,
  mergeAttendanceWindows,
  sortByStart,
  subtractAll,
  type TimeInterval,
  type TitledInterval,
} from "./interval-algebra.js";
import type { TicketTimeline } from "./ticket-keys.js";
import { MINUTE_MS, formatClock, formatDateKey } from "./time-format.js";

// ============================================================================
// Types
// ============================================================================

export type SegmentKind = "meeting" | "work";

export interface DraftSegment extends TimeInterval {
  ticket: string;
  label: string;
  kind: SegmentKind;
  classification: Classification;
}

export interface MeetingRule {
  /** Case-insensitive substring of the meeting title */
  pattern: string;
  ticket: string;
}

/**
 * Rewords meeting titles: every occurrence of `trigger` (any case) becomes
 * one of `replacements`, picked at random per title.
 */
export interface TitleRule {
  trigger: string;
  replacements: string[];
}

export interface TitleReplacement {
  title: string;
  /** Set only when the title changed */
  originalTitle: string | null;
}

/** Index in [0, count) */
export type ReplacementPicker = (count: number) => number;

export interface TicketPiece extends TimeInterval {
  ticket: string;
}

export interface DaySegmentationInput {
  day: Date;
  workWindows: readonly TimeInterval[];
  meetings: readonly TitledInterval[];
  timeline: TicketTimeline;
  meetingRules: readonly MeetingRule[];
  titleRules?: readonly TitleRule[];
  pickReplacement?: ReplacementPicker;
  defaultMeetingTicket: string;
  paidNonWorkMinutes: number;
  trace?: Trace;
}

export const WORK_LABEL = "Work";

// ============================================================================
// Meetings
// ============================================================================

/**
 * Ticket for a meeting title: first rule whose pattern occurs in the title,
 * else the default meeting ticket.
 */
export function resolveMeetingTicket(
  title: string,
  rules: readonly MeetingRule[],
  defaultTicket: string
): string {
  const lower = title.toLowerCase();
  for (const rule of rules) {
    const pattern = rule.pattern.trim().toLowerCase();
    if (pattern.length > 0 && lower.includes(pattern)) return rule.ticket;
  }
  return defaultTicket;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const randomPick: ReplacementPicker = count => Math.floor(Math.random() * count);

/**
 * Apply the first title rule that changes the title. Rules with an empty
 * trigger or no replacements are skipped.
 */
export function applyTitleRules(
  title: string,
  rules: readonly TitleRule[],
  pick: ReplacementPicker = randomPick
): TitleReplacement {
  const lower = title.toLowerCase();
  for (const rule of rules) {
    if (rule.trigger.length === 0 || rule.replacements.length === 0) continue;
    if (!lower.includes(rule.trigger.toLowerCase())) continue;

    const index = Math.min(Math.max(0, pick(rule.replacements.length)), rule.replacements.length - 1);
    const replacement = rule.replacements[index];
    const replaced = title.replace(new RegExp(escapeRegExp(rule.trigger), "gi"), () => replacement);
    if (replaced !== title) return { title: replaced, originalTitle: title };
  }
  return { title, originalTitle: null };
}

export function meetingLabel(start: Date, end: Date, title: string): string {
  const base = `Meeting ${formatClock(start)}-${formatClock(end)}`;
  return title.trim().length > 0 ? `${base} - ${title.trim()}` : base;
}

// ============================================================================
// Trimming
// ============================================================================

/**
 * Remove `cutMs` from the end of a chronological list of pieces: whole
 * pieces are dropped while the budget lasts, the last one touched is
 * shortened from its end.
 */
export function trimFromEnd(pieces: readonly TimeInterval[], cutMs: number): TimeInterval[] {
  if (cutMs <= 0 || pieces.length === 0) return [...pieces];

  const kept: TimeInterval[] = [];
  let remaining = cutMs;
  const ordered = sortByStart(pieces);

  for (let i = ordered.length - 1; i >= 0; i--) {
    const piece = ordered[i];
    const length = durationMs(piece);
    if (remaining <= 0) {
      kept.push(piece);
    } else if (remaining >= length) {
      remaining -= length;
    } else {
      kept.push({ start: piece.start, end: new Date(piece.end.getTime() - remaining) });
      remaining = 0;
    }
  }

  return sortByStart(kept.filter(p => durationMs(p) >= MIN_PIECE_MS));
}

// ============================================================================
// Ticket Assignment
// ============================================================================

/**
 * Split pieces by the commit timeline. Pieces with no commit before or after
 * them cannot be attributed and are dropped with an inconsistency entry.
 */
export function assignPiecesToTickets(
  pieces: readonly TimeInterval[],
  timeline: TicketTimeline,
  trace?: Trace
): TicketPiece[] {
  const assigned: TicketPiece[] = [];

  for (const piece of pieces) {
    let ticket = timeline.latestAtOrBefore(piece.start)?.ticket ?? null;

    if (ticket === null) {
      const next = timeline.earliestAtOrAfter(piece.start);
      if (next) {
        ticket = next.ticket;
        if (next.timestamp > piece.start && next.timestamp < piece.end) {
          trace?.log(`  Forward-fill ${formatClock(piece.start)}-${formatClock(next.timestamp)} with [${ticket}]`);
        }
      }
    }

    if (ticket === null) {
      if (trace) {
        traceError(
          trace,
          new ReconciliationInconsistency(
            `No commit to attribute work ${formatClock(piece.start)}-${formatClock(piece.end)} on ${formatDateKey(piece.start)}; dropped`
          )
        );
      }
      continue;
    }

    let segmentStart = piece.start;
    for (const event of timeline.strictlyWithin(piece.start, piece.end)) {
      if (event.ticket === ticket) continue;
      if (event.timestamp > segmentStart) {
        assigned.push({ start: segmentStart, end: event.timestamp, ticket });
      }
      ticket = event.ticket;
      segmentStart = event.timestamp;
    }
    if (piece.end > segmentStart) {
      assigned.push({ start: segmentStart, end: piece.end, ticket });
    }
  }

  return assigned;
}

// ============================================================================
// Day Segmentation
// ============================================================================

function keepSegment(segment: DraftSegment): boolean {
  return durationMs(segment) >= MIN_PIECE_MS;
}

/**
 * Draft segments for one day, sorted and pairwise non-overlapping.
 */
export function segmentDay(input: DaySegmentationInput): DraftSegment[] {
  const { workWindows, timeline, trace } = input;

  const mergedMeetings = mergeAttendanceWindows([...input.meetings], joinTitles);

  const meetingDrafts: DraftSegment[] = [];
  for (const meeting of mergedMeetings) {
    const ticket = resolveMeetingTicket(meeting.title, input.meetingRules, input.defaultMeetingTicket);
    const { title, originalTitle } = applyTitleRules(meeting.title, input.titleRules ?? [], input.pickReplacement);
    if (originalTitle !== null) {
      trace?.log(`  Title "${originalTitle}" booked as "${title}"`);
    }
    for (const window of workWindows) {
      const clipped = clip(meeting, window);
      if (!clipped) continue;
      meetingDrafts.push({
        start: clipped.start,
        end: clipped.end,
        ticket,
        label: meetingLabel(clipped.start, clipped.end, title),
        kind: "meeting",
        classification: { kind: "new" },
      });
    }
  }

  const leftover = subtractAll(workWindows, mergedMeetings);
  const trimmed = trimFromEnd(leftover, input.paidNonWorkMinutes * MINUTE_MS);
  if (input.paidNonWorkMinutes > 0) {
    trace?.log(`  Paid non-work: trimmed ${input.paidNonWorkMinutes}m from the end of the day`);
  }

  const workDrafts: DraftSegment[] = assignPiecesToTickets(trimmed, timeline, trace).map((piece): DraftSegment => ({
    start: piece.start,
    end: piece.end,
    ticket: piece.ticket,
    label: WORK_LABEL,
    kind: "work",
    classification: { kind: "new" },
  }));

  return sortByStart([...meetingDrafts, ...workDrafts].filter(keepSegment));
}

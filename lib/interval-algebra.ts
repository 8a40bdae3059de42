/**
 * Interval Algebra
 *
 * Subtract, merge and clip over half-open [start, end) time intervals.
 *
 * Two merge primitives exist on purpose and must not be unified:
 * - attendance windows merge when they touch (next.start <= last.end)
 * - meeting windows merge only on a strict overlap (next.start < last.end)
 */

import { MINUTE_MS } from "./time-format.js";

// ============================================================================
// Types
// ============================================================================

export interface TimeInterval {
  start: Date;
  end: Date;
}

export interface TitledInterval extends TimeInterval {
  title: string;
}

/** Pieces shorter than this are treated as noise. */
export const MIN_PIECE_MS = MINUTE_MS;

// ============================================================================
// Basics
// ============================================================================

export function interval(start: Date, end: Date): TimeInterval {
  return { start, end };
}

export function durationMs(i: TimeInterval): number {
  return i.end.getTime() - i.start.getTime();
}

export function totalDurationMs(intervals: readonly TimeInterval[]): number {
  return intervals.reduce((sum, i) => sum + durationMs(i), 0);
}

export function isValidInterval(i: TimeInterval): boolean {
  return i.end.getTime() > i.start.getTime();
}

/**
 * Strict half-open intersection test. Touching intervals do not overlap.
 */
export function overlaps(a: TimeInterval, b: TimeInterval): boolean {
  return a.end.getTime() > b.start.getTime() && b.end.getTime() > a.start.getTime();
}

export function contains(outer: TimeInterval, inner: TimeInterval): boolean {
  return outer.start.getTime() <= inner.start.getTime() && outer.end.getTime() >= inner.end.getTime();
}

function maxDate(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}

function minDate(a: Date, b: Date): Date {
  return a.getTime() <= b.getTime() ? a : b;
}

export function sortByStart<T extends TimeInterval>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => a.start.getTime() - b.start.getTime() || a.end.getTime() - b.end.getTime());
}

// ============================================================================
// Clip
// ============================================================================

/**
 * Intersection of two intervals, or null when they do not overlap.
 */
export function clip(a: TimeInterval, b: TimeInterval): TimeInterval | null {
  const start = maxDate(a.start, b.start);
  const end = minDate(a.end, b.end);
  return end.getTime() > start.getTime() ? { start, end } : null;
}

// ============================================================================
// Subtract
// ============================================================================

/**
 * Parts of `base` not covered by any cutter, sorted by start.
 * Pieces shorter than a minute are dropped.
 */
export function subtract(base: TimeInterval, cutters: readonly TimeInterval[]): TimeInterval[] {
  let remainder: TimeInterval[] = isValidInterval(base) ? [{ start: base.start, end: base.end }] : [];

  for (const cutter of cutters) {
    const next: TimeInterval[] = [];
    for (const piece of remainder) {
      if (!overlaps(piece, cutter)) {
        next.push(piece);
        continue;
      }
      if (cutter.start.getTime() > piece.start.getTime()) {
        next.push({ start: piece.start, end: cutter.start });
      }
      if (cutter.end.getTime() < piece.end.getTime()) {
        next.push({ start: cutter.end, end: piece.end });
      }
    }
    remainder = next;
  }

  return sortByStart(remainder.filter(p => durationMs(p) >= MIN_PIECE_MS));
}

/**
 * Subtract the cutters from every base interval.
 */
export function subtractAll(bases: readonly TimeInterval[], cutters: readonly TimeInterval[]): TimeInterval[] {
  return sortByStart(bases.flatMap(base => subtract(base, cutters)));
}

// ============================================================================
// Merge
// ============================================================================

type Combine<T> = (last: T, next: T) => T;

function extend<T extends TimeInterval>(last: T, next: T): T {
  return { ...last, end: maxDate(last.end, next.end) };
}

function fold<T extends TimeInterval>(
  items: readonly T[],
  shouldMerge: (last: T, next: T) => boolean,
  combine: Combine<T>
): T[] {
  const merged: T[] = [];
  for (const item of sortByStart(items)) {
    const last = merged[merged.length - 1];
    if (last !== undefined && shouldMerge(last, item)) {
      merged[merged.length - 1] = combine(last, item);
    } else {
      merged.push(item);
    }
  }
  return merged;
}

/**
 * Attendance-merge policy: touching endpoints are unioned.
 */
export function mergeAttendanceWindows<T extends TimeInterval>(
  items: readonly T[],
  combine: Combine<T> = extend
): T[] {
  return fold(items, (last, next) => next.start.getTime() <= last.end.getTime(), combine);
}

export function joinTitles<T extends TitledInterval>(last: T, next: T): T {
  return { ...last, end: maxDate(last.end, next.end), title: `${last.title} + ${next.title}` };
}

/**
 * Meeting-merge policy: only a strict overlap unions two meetings, and their
 * titles are joined with " + ". Meetings that exactly touch stay separate.
 */
export function mergeMeetingWindows<T extends TitledInterval>(items: readonly T[]): T[] {
  return fold(items, (last, next) => next.start.getTime() < last.end.getTime(), joinTitles);
}

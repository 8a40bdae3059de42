/**
 * Calendar Normalizer
 *
 * Owns the parsed calendar, the non-meeting hint list and two caches:
 *
 * - Day cache: filtered and merged meetings plus an all-day absence flag,
 *   computed on first access per local day.
 * - Range cache: per-day meeting buckets for one (identity, fromDay, toDay)
 *   triple, built explicitly with `prepareRange`. This path also drops
 *   events the identity has declined or only tentatively accepted.
 *
 * Both caches remember the hint version they were built with and are
 * discarded lazily when `setNonMeetingHints` bumps it. Querying the range
 * cache for a day or identity it was not built for returns an empty list.
 */

import { parseCalendar, type CalendarEvent, type ParseCalendarOptions } from "./ics-parser.js";
import { clip, mergeMeetingWindows, type TitledInterval } from "./interval-algebra.js";
import { isAllDayAbsence, isMeeting, normalizeHints, rejectsParticipation } from "./meeting-filter.js";
import { expandEvents } from "./recurrence.js";
import { addDays, eachDay, formatDateKey, startOfDay } from "./time-format.js";
import type { ParseError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export interface Meeting extends TitledInterval {
  uid: string | null;
}

export interface DayCalendar {
  meetings: Meeting[];
  hasAllDayAbsence: boolean;
}

export interface CalendarNormalizerOptions {
  events?: CalendarEvent[];
  nonMeetingHints?: readonly string[];
}

interface RangeCache {
  identity: string;
  fromKey: string;
  toKey: string;
  version: number;
  buckets: Map<string, Meeting[]>;
}

function normalizeIdentity(identity: string): string {
  return identity.trim().toLowerCase();
}

function dayWindow(day: Date): { start: Date; end: Date } {
  const start = startOfDay(day);
  return { start, end: addDays(start, 1) };
}

function toMeeting(event: CalendarEvent, window: { start: Date; end: Date }): Meeting | null {
  const clipped = clip(event, window);
  if (!clipped) return null;
  return { start: clipped.start, end: clipped.end, title: event.title.trim(), uid: event.uid };
}

// ============================================================================
// Normalizer
// ============================================================================

export class CalendarNormalizer {
  private events: CalendarEvent[];
  private hints: string[];
  private hintsVersion = 0;

  private dayCache = new Map<string, DayCalendar>();
  private dayCacheVersion = 0;
  private rangeCache: RangeCache | null = null;

  constructor(options: CalendarNormalizerOptions = {}) {
    this.events = options.events ?? [];
    this.hints = normalizeHints(options.nonMeetingHints ?? []);
  }

  /**
   * Parse calendar text and build a normalizer over its events.
   */
  static fromText(
    text: string,
    options: ParseCalendarOptions & { nonMeetingHints?: readonly string[] } = {}
  ): { normalizer: CalendarNormalizer; errors: ParseError[] } {
    const { events, errors } = parseCalendar(text, { identity: options.identity });
    return {
      normalizer: new CalendarNormalizer({ events, nonMeetingHints: options.nonMeetingHints }),
      errors,
    };
  }

  getEvents(): readonly CalendarEvent[] {
    return this.events;
  }

  /** Replace the calendar. Both caches are dropped immediately. */
  setEvents(events: CalendarEvent[]): void {
    this.events = events;
    this.clearCaches();
  }

  getNonMeetingHints(): readonly string[] {
    return this.hints;
  }

  /** Replace the hint list. Caches notice the new version on next access. */
  setNonMeetingHints(hints: readonly string[]): void {
    this.hints = normalizeHints(hints);
    this.hintsVersion++;
  }

  clearCaches(): void {
    this.dayCache.clear();
    this.rangeCache = null;
  }

  // ==========================================================================
  // Day Query
  // ==========================================================================

  /**
   * Meetings on one local day, clipped to the day and merged on strict
   * overlap, plus whether an all-day absence is on the calendar.
   */
  meetingsForDay(day: Date): DayCalendar {
    if (this.dayCacheVersion !== this.hintsVersion) {
      this.dayCache.clear();
      this.dayCacheVersion = this.hintsVersion;
    }

    const key = formatDateKey(day);
    const cached = this.dayCache.get(key);
    if (cached) return { meetings: [...cached.meetings], hasAllDayAbsence: cached.hasAllDayAbsence };

    const window = dayWindow(day);
    const candidates = expandEvents(this.events, window);

    const meetings = candidates
      .filter(e => isMeeting(e, this.hints))
      .map(e => toMeeting(e, window))
      .filter((m): m is Meeting => m !== null);

    const result: DayCalendar = {
      meetings: mergeMeetingWindows(meetings),
      hasAllDayAbsence: candidates.some(isAllDayAbsence),
    };
    this.dayCache.set(key, result);
    return { meetings: [...result.meetings], hasAllDayAbsence: result.hasAllDayAbsence };
  }

  // ==========================================================================
  // Range Query
  // ==========================================================================

  /**
   * Precompute per-day meeting buckets for `identity` over [from, to], both
   * days inclusive. Replaces any previously prepared range.
   */
  prepareRange(identity: string, from: Date, to: Date): void {
    const first = startOfDay(from);
    const last = startOfDay(to);
    const buckets = new Map<string, Meeting[]>();

    const candidates = expandEvents(this.events, { start: first, end: addDays(last, 1) }).filter(
      e => isMeeting(e, this.hints) && !rejectsParticipation(e)
    );

    for (const day of eachDay(first, last)) {
      const window = dayWindow(day);
      const meetings = candidates
        .map(e => toMeeting(e, window))
        .filter((m): m is Meeting => m !== null);
      if (meetings.length > 0) buckets.set(formatDateKey(day), mergeMeetingWindows(meetings));
    }

    this.rangeCache = {
      identity: normalizeIdentity(identity),
      fromKey: formatDateKey(first),
      toKey: formatDateKey(last),
      version: this.hintsVersion,
      buckets,
    };
  }

  /**
   * Whether the prepared range is current and covers `day` for `identity`.
   */
  rangeCovers(day: Date, identity: string): boolean {
    const cache = this.rangeCache;
    if (!cache) return false;
    if (cache.version !== this.hintsVersion) return false;
    if (cache.identity !== normalizeIdentity(identity)) return false;
    const key = formatDateKey(day);
    // YYYY-MM-DD keys compare chronologically
    return key >= cache.fromKey && key <= cache.toKey;
  }

  meetingsForRange(day: Date, identity: string): Meeting[] {
    if (!this.rangeCovers(day, identity)) return [];
    return [...(this.rangeCache?.buckets.get(formatDateKey(day)) ?? [])];
  }
}

/**
 * ICS Parser
 *
 * Turns raw iCalendar text into CalendarEvent records:
 * - unfolds continuation lines
 * - reads VEVENT blocks only
 * - supports date-only, floating, TZID-qualified and UTC start/end values
 * - keeps the participation status of one configured identity
 *
 * Malformed events are skipped and reported as ParseErrors; they never fail
 * the whole calendar.
 */

import { ParseError, errorMessage } from "./errors.js";
import { addDays } from "./time-format.js";
import type { TimeInterval } from "./interval-algebra.js";

// ============================================================================
// Types
// ============================================================================

export type ParticipationStatus =
  | "NEEDS-ACTION"
  | "ACCEPTED"
  | "DECLINED"
  | "TENTATIVE"
  | "DELEGATED"
  | (string & {});

export interface CalendarEvent extends TimeInterval {
  uid: string | null;
  title: string;
  allDay: boolean;
  status: string | null;
  transparency: string | null;
  busyStatus: string | null;
  attendeeCount: number;
  /** Participation status of the configured identity, when it is an attendee */
  selfPartstat: ParticipationStatus | null;
  rrule: string | null;
  exceptionDates: Date[];
  recurrenceId: Date | null;
  categories: string[];
  description: string | null;
}

export interface ParseCalendarOptions {
  /** E-mail address whose PARTSTAT is retained */
  identity?: string;
}

export interface ParseCalendarResult {
  events: CalendarEvent[];
  errors: ParseError[];
}

interface ContentLine {
  name: string;
  params: Record<string, string>;
  value: string;
}

export interface CalendarDate {
  date: Date;
  dateOnly: boolean;
}

// ============================================================================
// Line Handling
// ============================================================================

/**
 * Join folded lines: a line starting with a space or tab continues the
 * previous one.
 */
export function unfoldLines(text: string): string[] {
  const lines: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    if ((line.startsWith(" ") || line.startsWith("\t")) && lines.length > 0) {
      lines[lines.length - 1] += line.slice(1);
    } else if (line.length > 0) {
      lines.push(line);
    }
  }
  return lines;
}

/**
 * Split "NAME;PARAM=x;PARAM2="a:b":value" into its parts. Colons inside
 * quoted parameter values do not end the parameter section.
 */
export function parseContentLine(line: string): ContentLine | null {
  let inQuotes = false;
  let colon = -1;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') inQuotes = !inQuotes;
    if (ch === ":" && !inQuotes) {
      colon = i;
      break;
    }
  }
  if (colon <= 0) return null;

  const head = line.slice(0, colon);
  const value = line.slice(colon + 1);
  const [name, ...paramParts] = head.split(";");
  const params: Record<string, string> = {};
  for (const part of paramParts) {
    const eq = part.indexOf("=");
    if (eq <= 0) continue;
    params[part.slice(0, eq).trim().toUpperCase()] = part.slice(eq + 1).trim().replace(/^"(.*)"$/, "$1");
  }

  return { name: name.trim().toUpperCase(), params, value };
}

function unescapeText(value: string): string {
  return value.replace(/\\([\\;,nN])/g, (_match, ch: string) => (ch === "n" || ch === "N" ? "\n" : ch));
}

// ============================================================================
// Date Values
// ============================================================================

/**
 * Parse an iCalendar DATE or DATE-TIME value.
 *
 * Date-only and floating/TZID values are read as local wall-clock time;
 * values ending in Z are UTC instants.
 */
export function parseCalendarDate(raw: string): CalendarDate {
  const value = raw.trim();

  const dateOnly = /^(\d{4})(\d{2})(\d{2})$/.exec(value);
  if (dateOnly) {
    return {
      date: new Date(Number(dateOnly[1]), Number(dateOnly[2]) - 1, Number(dateOnly[3])),
      dateOnly: true,
    };
  }

  const basic = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})?(Z)?$/.exec(value);
  if (basic) {
    const [, y, mo, d, h, mi, s, z] = basic;
    const parts = [Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s ?? "0")] as const;
    return {
      date: z ? new Date(Date.UTC(...parts)) : new Date(...parts),
      dateOnly: false,
    };
  }

  const iso = new Date(value);
  if (value.length > 0 && !Number.isNaN(iso.getTime())) {
    return { date: iso, dateOnly: false };
  }

  throw new ParseError(`Unrecognized date value "${value}"`);
}

// ============================================================================
// Event Assembly
// ============================================================================

interface EventDraft {
  props: Map<string, ContentLine>;
  attendeeCount: number;
  selfPartstat: string | null;
  exceptionDates: Date[];
  recurrenceId: Date | null;
}

function emptyDraft(): EventDraft {
  return { props: new Map(), attendeeCount: 0, selfPartstat: null, exceptionDates: [], recurrenceId: null };
}

function isDateOnly(line: ContentLine): boolean {
  return line.params["VALUE"]?.toUpperCase() === "DATE" || /^\d{8}$/.test(line.value.trim());
}

function attendeeEmail(value: string): string {
  const lower = value.trim().toLowerCase();
  return lower.startsWith("mailto:") ? lower.slice("mailto:".length).trim() : lower;
}

function finishEvent(draft: EventDraft): CalendarEvent {
  const dtStart = draft.props.get("DTSTART");
  if (!dtStart) throw new ParseError("VEVENT without DTSTART");

  const start = parseCalendarDate(dtStart.value);
  const allDay = isDateOnly(dtStart) || start.dateOnly;

  const dtEnd = draft.props.get("DTEND");
  let end: Date;
  if (dtEnd) {
    end = parseCalendarDate(dtEnd.value).date;
  } else if (allDay) {
    end = addDays(start.date, 1);
  } else {
    throw new ParseError("VEVENT without DTEND");
  }

  if (end.getTime() < start.date.getTime()) {
    throw new ParseError("VEVENT ends before it starts");
  }

  const text = (name: string): string | null => {
    const line = draft.props.get(name);
    return line ? unescapeText(line.value) : null;
  };

  const categories = text("CATEGORIES");

  return {
    uid: text("UID"),
    title: text("SUMMARY") ?? "",
    start: start.date,
    end,
    allDay,
    status: text("STATUS"),
    transparency: text("TRANSP"),
    busyStatus: text("X-MICROSOFT-CDO-BUSYSTATUS") ?? text("BUSYSTATUS"),
    attendeeCount: draft.attendeeCount,
    selfPartstat: draft.selfPartstat,
    rrule: draft.props.get("RRULE")?.value ?? null,
    exceptionDates: draft.exceptionDates,
    recurrenceId: draft.recurrenceId,
    categories: categories
      ? categories.split(",").map(c => c.trim()).filter(c => c.length > 0)
      : [],
    description: text("DESCRIPTION"),
  };
}

function applyLine(draft: EventDraft, line: ContentLine, identity: string): void {
  switch (line.name) {
    case "ATTENDEE": {
      draft.attendeeCount++;
      if (identity.length > 0 && attendeeEmail(line.value) === identity) {
        draft.selfPartstat = line.params["PARTSTAT"]?.toUpperCase() ?? null;
      }
      return;
    }
    case "EXDATE": {
      for (const part of line.value.split(",")) {
        if (part.trim().length > 0) draft.exceptionDates.push(parseCalendarDate(part).date);
      }
      return;
    }
    case "RECURRENCE-ID": {
      draft.recurrenceId = parseCalendarDate(line.value).date;
      return;
    }
    default:
      // First occurrence wins
      if (!draft.props.has(line.name)) draft.props.set(line.name, line);
  }
}

// ============================================================================
// Parser
// ============================================================================

export function parseCalendar(text: string, options: ParseCalendarOptions = {}): ParseCalendarResult {
  const identity = (options.identity ?? "").trim().toLowerCase();
  const events: CalendarEvent[] = [];
  const errors: ParseError[] = [];

  let draft: EventDraft | null = null;
  let broken: unknown = null;
  let index = 0;

  for (const raw of unfoldLines(text)) {
    const upper = raw.trim().toUpperCase();

    if (upper === "BEGIN:VEVENT") {
      draft = emptyDraft();
      broken = null;
      index++;
      continue;
    }

    if (upper === "END:VEVENT") {
      if (draft) {
        try {
          if (broken !== null) throw broken;
          events.push(finishEvent(draft));
        } catch (error) {
          const summary = draft.props.get("SUMMARY")?.value ?? "untitled";
          errors.push(new ParseError(`Skipped event #${index} (${summary}): ${errorMessage(error)}`, { cause: error }));
        }
      }
      draft = null;
      continue;
    }

    if (!draft) continue;

    const line = parseContentLine(raw);
    if (!line) continue;

    try {
      applyLine(draft, line, identity);
    } catch (error) {
      broken = error;
    }
  }

  return { events, errors };
}

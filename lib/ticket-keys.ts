/**
 * Ticket Keys
 *
 * Extracts ticket keys (PROJ-123) from commit messages and keeps commit
 * ticket events in a single time-sorted sequence for segmentation lookups.
 */

// ============================================================================
// Types
// ============================================================================

export interface Commit {
  id: string;
  projectId: string;
  timestamp: Date;
  message: string;
  authorEmail: string | null;
  committerEmail: string | null;
}

export interface CommitTicketEvent {
  timestamp: Date;
  ticket: string;
  projectId: string;
  firstLine: string;
}

// ============================================================================
// Extraction
// ============================================================================

const LEADING_NOISE = /^[^\w\[]+/;
const LEADING_KEY = /^\[?([A-Za-z][A-Za-z0-9]+-\d+)\]?:?/i;
const ANY_KEY = /([A-Za-z][A-Za-z0-9]+-\d+)/i;

export function firstLine(text: string): string {
  return text.split("\n")[0].trim();
}

/**
 * Ticket key at the start of the first line, else the first key anywhere on
 * it. Merge commits never yield a key.
 */
export function extractTicketKey(message: string): string | null {
  if (message.length === 0) return null;
  if (message.toLowerCase().startsWith("merge")) return null;

  const line = message.split("\n")[0].trimStart();
  const leading = LEADING_KEY.exec(line.replace(LEADING_NOISE, ""));
  if (leading) return leading[1].toUpperCase();

  const anywhere = ANY_KEY.exec(line);
  return anywhere ? anywhere[1].toUpperCase() : null;
}

/**
 * Keep commits authored or committed by one of `emails`. An empty set keeps
 * everything.
 */
export function filterCommitsByAuthor(commits: readonly Commit[], emails: ReadonlySet<string>): Commit[] {
  if (emails.size === 0) return [...commits];
  return commits.filter(c => {
    const author = c.authorEmail?.toLowerCase();
    const committer = c.committerEmail?.toLowerCase();
    return (author !== undefined && emails.has(author)) || (committer !== undefined && emails.has(committer));
  });
}

/**
 * Split a comma or whitespace separated e-mail list into a lower-cased set.
 */
export function parseEmailList(raw: string | readonly string[]): Set<string> {
  const parts = typeof raw === "string" ? raw.split(/[,\s]+/) : raw;
  return new Set(parts.map(p => p.trim().toLowerCase()).filter(p => p.includes("@")));
}

export function toTicketEvents(commits: readonly Commit[]): CommitTicketEvent[] {
  const events: CommitTicketEvent[] = [];
  for (const commit of commits) {
    const ticket = extractTicketKey(commit.message);
    if (!ticket) continue;
    events.push({
      timestamp: commit.timestamp,
      ticket,
      projectId: commit.projectId,
      firstLine: firstLine(commit.message),
    });
  }
  return events;
}

// ============================================================================
// Timeline
// ============================================================================

/**
 * Commit ticket events sorted by timestamp.
 */
export class TicketTimeline {
  private readonly events: CommitTicketEvent[];

  constructor(events: readonly CommitTicketEvent[]) {
    this.events = [...events].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  static fromCommits(commits: readonly Commit[]): TicketTimeline {
    return new TicketTimeline(toTicketEvents(commits));
  }

  get size(): number {
    return this.events.length;
  }

  all(): readonly CommitTicketEvent[] {
    return this.events;
  }

  /**
   * Latest event at or before `t` (binary search).
   */
  latestAtOrBefore(t: Date): CommitTicketEvent | null {
    const target = t.getTime();
    let lo = 0;
    let hi = this.events.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (this.events[mid].timestamp.getTime() > target) {
        hi = mid - 1;
      } else {
        found = mid;
        lo = mid + 1;
      }
    }
    return found >= 0 ? this.events[found] : null;
  }

  /**
   * Earliest event at or after `t`.
   */
  earliestAtOrAfter(t: Date): CommitTicketEvent | null {
    const target = t.getTime();
    let lo = 0;
    let hi = this.events.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (this.events[mid].timestamp.getTime() < target) {
        lo = mid + 1;
      } else {
        found = mid;
        hi = mid - 1;
      }
    }
    return found >= 0 ? this.events[found] : null;
  }

  /**
   * Events strictly inside (start, end).
   */
  strictlyWithin(start: Date, end: Date): CommitTicketEvent[] {
    const s = start.getTime();
    const e = end.getTime();
    return this.events.filter(ev => ev.timestamp.getTime() > s && ev.timestamp.getTime() < e);
  }

  /**
   * Events on the same local day as `day`.
   */
  onDay(day: Date): CommitTicketEvent[] {
    const from = new Date(day.getFullYear(), day.getMonth(), day.getDate());
    const to = new Date(day.getFullYear(), day.getMonth(), day.getDate() + 1);
    return this.events.filter(ev => ev.timestamp >= from && ev.timestamp < to);
  }
}

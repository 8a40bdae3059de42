/**
 * Remote Worklogs
 *
 * Previously submitted worklog records of one author, fetched issue by issue
 * and grouped by local day.
 */

import { runUnit, type Trace, type UnitOutcome } from "./errors.js";
import type { TimeInterval } from "./interval-algebra.js";
import { formatDateKey, startOfDay, addDays } from "./time-format.js";

export interface RemoteWorklogRecord extends TimeInterval {
  id: string;
  ticket: string;
  authorId: string;
}

export interface WorklogSource {
  searchKeys(jql: string, maxResults?: number): Promise<string[]>;
  fetchWorklogs(issue: string): Promise<RemoteWorklogRecord[]>;
}

export interface RemoteWorklogsForPeriod {
  byDay: Map<string, RemoteWorklogRecord[]>;
  outcomes: UnitOutcome[];
}

export function worklogPeriodJql(accountId: string, from: Date, to: Date): string {
  return `worklogAuthor = "${accountId}" AND worklogDate >= "${formatDateKey(from)}" AND worklogDate <= "${formatDateKey(to)}"`;
}

export function groupByDay(records: readonly RemoteWorklogRecord[]): Map<string, RemoteWorklogRecord[]> {
  const byDay = new Map<string, RemoteWorklogRecord[]>();
  for (const record of records) {
    const key = formatDateKey(record.start);
    const list = byDay.get(key) ?? [];
    list.push(record);
    byDay.set(key, list);
  }
  for (const list of byDay.values()) {
    list.sort((a, b) => a.start.getTime() - b.start.getTime());
  }
  return byDay;
}

/**
 * Every record by `accountId` starting on a day in [from, to]. Issues are
 * read one at a time; a failing issue is recorded and skipped.
 */
export async function fetchRemoteWorklogsForPeriod(
  source: WorklogSource,
  accountId: string,
  from: Date,
  to: Date,
  trace: Trace
): Promise<RemoteWorklogsForPeriod> {
  const outcomes: UnitOutcome[] = [];
  const rangeStart = startOfDay(from);
  const rangeEnd = addDays(startOfDay(to), 1);

  const keys =
    (await runUnit("worklog-search", outcomes, trace, () =>
      source.searchKeys(worklogPeriodJql(accountId, from, to), 200)
    )) ?? [];

  const records: RemoteWorklogRecord[] = [];
  for (const key of keys) {
    const issueRecords = await runUnit(`worklogs:${key}`, outcomes, trace, () => source.fetchWorklogs(key));
    if (!issueRecords) continue;
    for (const record of issueRecords) {
      if (record.authorId !== accountId) continue;
      if (record.start < rangeStart || record.start >= rangeEnd) continue;
      records.push(record);
    }
  }

  trace.log(`Remote worklogs: ${records.length} records on ${keys.length} issues`);
  return { byDay: groupByDay(records), outcomes };
}

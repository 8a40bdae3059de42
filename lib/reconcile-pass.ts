/**
 * Reconciliation Pass
 *
 * Orchestrates one run over a day range:
 *
 *   config check → calendar range cache → commits → per-day segmentation
 *   → ticket summaries → remote worklogs → classification
 *
 * Plus the maintenance passes over existing remote records: adjustment
 * planning, read-only comparison and bulk deletion on selected days. External calls happen one at a time;
 * a failed unit is recorded and the pass moves on. Only a configuration
 * problem stops a pass before it starts.
 */

import {
  applyPlan,
  generatePlan,
  type ApplyOutcome,
  type DayAdjustmentPlan,
  type WorklogWriter,
} from "./adjustment-planner.js";
import {
  DEFAULT_ATTENDANCE_HINTS,
  attendanceDays,
  groundTruthForDay,
  ignoresMeetings,
  paidNonWorkBudgetMinutes,
  workWindowsForDay,
  type AttendanceHints,
  type AttendanceRow,
} from "./attendance.js";
import type { CalendarNormalizer } from "./calendar-normalizer.js";
import { commitAuthorEmails, validateConfiguration, type ReconcileConfig } from "./config.js";
import { classifyDrafts, countByClassification } from "./delta-classifier.js";
import {
  ConfigurationError,
  NetworkError,
  countFailures,
  createTrace,
  errorMessage,
  runUnit,
  traceError,
  type Trace,
  type UnitOutcome,
} from "./errors.js";
import type { TitledInterval } from "./interval-algebra.js";
import type { WriteResult } from "./jira-client.js";
import { fetchRemoteWorklogsForPeriod, type RemoteWorklogRecord, type WorklogSource } from "./remote-worklogs.js";
import { WORK_LABEL, segmentDay, type DraftSegment } from "./segmenter.js";
import { TicketTimeline, filterCommitsByAuthor, type Commit } from "./ticket-keys.js";
import { compareDays, type ComparisonMode, type DayComparison } from "./time-comparator.js";
import { addDays, eachDay, formatDateKey, startOfDay } from "./time-format.js";

// ============================================================================
// Collaborators
// ============================================================================

export interface CommitSource {
  fetchCommits(projectId: string, since: Date, until: Date): Promise<Commit[]>;
}

export interface TicketService extends WorklogSource {
  fetchMyAccountId(): Promise<string | null>;
  fetchSummaries(
    keys: Iterable<string>,
    onBatchError?: (batch: string[], error: unknown) => void
  ): Promise<Record<string, string>>;
}

export interface WorklogDeleter {
  deleteWorklog(issue: string, worklogId: string): Promise<boolean>;
}

export interface DraftSubmitter {
  resolveId(keyOrId: string): Promise<string | null>;
  createWorklog(issue: string, started: Date, timeSpentSeconds: number, comment?: string): Promise<WriteResult>;
}

// ============================================================================
// Types
// ============================================================================

interface PassInputBase {
  config: ReconcileConfig;
  from: Date;
  to: Date;
  attendance: readonly AttendanceRow[];
  tickets: TicketService;
  onProgress?: (message: string) => void;
}

export interface ReconcileInput extends PassInputBase {
  /** Null when no calendar was given: every day is meeting-free */
  calendar: CalendarNormalizer | null;
  /** Null when no commit history is configured */
  commits: CommitSource | null;
}

export interface ReconcileResult {
  drafts: DraftSegment[];
  /** False when booked worklogs could not be read; such drafts are not submitted */
  remoteChecked: boolean;
  outcomes: UnitOutcome[];
  trace: string[];
}

export interface PlanResult {
  plans: DayAdjustmentPlan[];
  outcomes: UnitOutcome[];
  trace: string[];
}

export interface CompareInput extends PassInputBase {
  mode: ComparisonMode;
}

export interface CompareResult {
  days: DayComparison[];
  outcomes: UnitOutcome[];
  trace: string[];
}

export interface DeleteInput {
  config: ReconcileConfig;
  /** Calendar days whose worklogs go; order and duplicates do not matter */
  days: readonly Date[];
  tickets: TicketService;
  onProgress?: (message: string) => void;
}

export interface DeletionPreview {
  records: RemoteWorklogRecord[];
  outcomes: UnitOutcome[];
  trace: string[];
}

export interface DeleteResult extends DeletionPreview {
  deleted: number;
  failed: number;
}

export interface SubmitResult {
  submitted: number;
  failed: number;
  outcomes: UnitOutcome[];
}

// ============================================================================
// Shared Steps
// ============================================================================

function ensureConfiguration(config: ReconcileConfig): void {
  const validation = validateConfiguration(config);
  if (!validation.ok) throw new ConfigurationError(validation.problems);
}

function attendanceHints(config: ReconcileConfig): AttendanceHints {
  return { absence: config.absenceHints, nonProductive: DEFAULT_ATTENDANCE_HINTS.nonProductive };
}

/**
 * The user's remote records by day, or null when the account id is unknown.
 */
async function fetchRemoteRecords(
  tickets: TicketService,
  from: Date,
  to: Date,
  outcomes: UnitOutcome[],
  trace: Trace
): Promise<Map<string, RemoteWorklogRecord[]> | null> {
  const accountId = await runUnit("account", outcomes, trace, () => tickets.fetchMyAccountId());
  if (!accountId) {
    trace.log("No ticketing account id; remote worklogs not fetched");
    return null;
  }
  const remote = await fetchRemoteWorklogsForPeriod(tickets, accountId, from, to, trace);
  outcomes.push(...remote.outcomes);
  return remote.byDay;
}

async function fetchTimeline(
  input: ReconcileInput,
  outcomes: UnitOutcome[],
  trace: Trace
): Promise<TicketTimeline> {
  const { config, commits } = input;
  if (!commits || config.gitlab.projectIds.length === 0) {
    trace.log("No commit history configured; work time cannot be attributed");
    return new TicketTimeline([]);
  }

  const since = addDays(startOfDay(input.from), -config.commitLookbackDays);
  const until = addDays(startOfDay(input.to), 1);
  const all: Commit[] = [];
  for (const projectId of config.gitlab.projectIds) {
    const fetched = await runUnit(`commits:${projectId}`, outcomes, trace, () =>
      commits.fetchCommits(projectId, since, until)
    );
    if (fetched) all.push(...fetched);
  }

  const own = filterCommitsByAuthor(all, new Set(commitAuthorEmails(config)));
  const timeline = TicketTimeline.fromCommits(own);
  trace.log(`Commits: ${all.length} fetched, ${own.length} by you, ${timeline.size} with a ticket key`);
  return timeline;
}

function meetingsFor(input: ReconcileInput, day: Date, hints: AttendanceHints): TitledInterval[] {
  const { calendar, config } = input;
  if (!calendar) return [];
  if (ignoresMeetings(input.attendance, day, hints)) return [];
  if (calendar.meetingsForDay(day).hasAllDayAbsence) return [];
  return calendar.meetingsForRange(day, config.identity);
}

// ============================================================================
// Draft Pass
// ============================================================================

/**
 * Build classified draft segments for every day in [from, to].
 */
export async function runReconciliation(input: ReconcileInput): Promise<ReconcileResult> {
  ensureConfiguration(input.config);

  const { config } = input;
  const trace = createTrace(input.onProgress);
  const outcomes: UnitOutcome[] = [];
  const hints = attendanceHints(config);

  input.calendar?.prepareRange(config.identity, input.from, input.to);
  const timeline = await fetchTimeline(input, outcomes, trace);

  let drafts: DraftSegment[] = [];
  for (const day of eachDay(input.from, input.to)) {
    const workWindows = workWindowsForDay(input.attendance, day, hints);
    if (workWindows.length === 0) continue;

    const meetings = meetingsFor(input, day, hints);
    trace.log(`${formatDateKey(day)}: ${workWindows.length} work windows, ${meetings.length} meetings`);
    drafts.push(
      ...segmentDay({
        day,
        workWindows,
        meetings,
        timeline,
        meetingRules: config.meetingRules,
        titleRules: config.titleRules,
        defaultMeetingTicket: config.meetingTicket,
        paidNonWorkMinutes: paidNonWorkBudgetMinutes(input.attendance, day),
        trace,
      })
    );
  }

  const workTickets = [...new Set(drafts.filter(d => d.kind === "work").map(d => d.ticket))];
  if (workTickets.length > 0) {
    const summaries =
      (await runUnit("summaries", outcomes, trace, () =>
        input.tickets.fetchSummaries(workTickets, (batch, error) => {
          outcomes.push({ unit: `summaries:${batch.join(",")}`, status: "failed", message: errorMessage(error) });
          traceError(trace, error);
        })
      )) ?? {};
    drafts = drafts.map(d => {
      const summary = summaries[d.ticket];
      return d.kind === "work" && summary ? { ...d, label: `${WORK_LABEL} - ${summary}` } : d;
    });
  }

  const remoteByDay = await fetchRemoteRecords(input.tickets, input.from, input.to, outcomes, trace);
  drafts = classifyDrafts(drafts, remoteByDay ? [...remoteByDay.values()].flat() : []);
  if (!remoteByDay) {
    trace.log("Drafts were not checked against booked worklogs; they cannot be submitted");
  }

  const counts = countByClassification(drafts);
  trace.log(
    `Drafts: ${drafts.length} (${counts.new} new, ${counts.duplicate} duplicate, ${counts.overlap} overlap); ${countFailures(outcomes)} failed units`
  );
  return { drafts, remoteChecked: remoteByDay !== null, outcomes, trace: trace.lines };
}

/**
 * Book every draft classified as new, one at a time. Drafts never checked
 * against booked worklogs are refused.
 */
export async function submitDrafts(
  result: Pick<ReconcileResult, "drafts" | "remoteChecked">,
  submitter: DraftSubmitter,
  onProgress?: (message: string) => void
): Promise<SubmitResult> {
  if (!result.remoteChecked) {
    throw new ConfigurationError(["ticketing account id unknown; drafts were not checked against booked worklogs"]);
  }

  const { drafts } = result;
  const trace = createTrace(onProgress);
  const outcomes: UnitOutcome[] = [];
  const ids = new Map<string, string>();
  let submitted = 0;
  let failed = 0;

  for (const draft of drafts) {
    if (draft.classification.kind !== "new") continue;
    const unit = `submit:${draft.ticket}@${draft.start.toISOString()}`;

    let issue = ids.get(draft.ticket);
    if (issue === undefined) {
      const resolved = await runUnit(`resolve:${draft.ticket}`, outcomes, trace, () => submitter.resolveId(draft.ticket));
      issue = resolved ?? draft.ticket;
      ids.set(draft.ticket, issue);
    }

    const seconds = Math.round((draft.end.getTime() - draft.start.getTime()) / 1000);
    const target = issue;
    const result = await runUnit(unit, outcomes, trace, async () => {
      const written = await submitter.createWorklog(target, draft.start, seconds, draft.label);
      if (!written.ok) throw new NetworkError(`Booking ${draft.ticket} failed: ${written.body ?? "no response body"}`);
      return written;
    });
    if (result) submitted++;
    else failed++;
  }

  trace.log(`Submitted ${submitted}, failed ${failed}`);
  return { submitted, failed, outcomes };
}

// ============================================================================
// Maintenance Passes
// ============================================================================

/**
 * Adjustment plans for each attendance day in range that has remote
 * records. Nothing is written.
 */
export async function planAdjustments(input: PassInputBase): Promise<PlanResult> {
  ensureConfiguration(input.config);

  const trace = createTrace(input.onProgress);
  const outcomes: UnitOutcome[] = [];
  const hints = attendanceHints(input.config);
  const remoteByDay = await fetchRemoteRecords(input.tickets, input.from, input.to, outcomes, trace);

  const plans: DayAdjustmentPlan[] = [];
  for (const day of eachDay(input.from, input.to)) {
    const records = remoteByDay?.get(formatDateKey(day)) ?? [];
    if (records.length === 0) continue;
    if (!groundTruthForDay(input.attendance, day, hints)) continue;
    const plan = generatePlan({ day, rows: input.attendance, records, hints });
    trace.log(`${formatDateKey(day)}: ${plan.operations.length} operations`);
    plans.push(plan);
  }

  return { plans, outcomes, trace: trace.lines };
}

/**
 * Apply plans day by day. Every operation gets an outcome.
 */
export async function applyAdjustments(
  plans: readonly DayAdjustmentPlan[],
  writer: WorklogWriter
): Promise<ApplyOutcome[]> {
  const outcomes: ApplyOutcome[] = [];
  for (const plan of plans) {
    outcomes.push(...(await applyPlan(plan, writer)));
  }
  return outcomes;
}

/**
 * Compare attendance with remote records for every day in range, or with
 * `mode: "outliers"` list only misplaced records.
 */
export async function compareRange(input: CompareInput): Promise<CompareResult> {
  ensureConfiguration(input.config);

  const trace = createTrace(input.onProgress);
  const outcomes: UnitOutcome[] = [];
  const remoteByDay = await fetchRemoteRecords(input.tickets, input.from, input.to, outcomes, trace);

  const days = [...eachDay(input.from, input.to)];
  const compared = compareDays({
    days,
    rows: input.attendance,
    remoteByDay: remoteByDay ?? new Map<string, RemoteWorklogRecord[]>(),
    mode: input.mode,
    hints: attendanceHints(input.config),
  });
  trace.log(`Compared ${compared.length} of ${days.length} days`);
  return { days: compared, outcomes, trace: trace.lines };
}

// ============================================================================
// Delete Pass
// ============================================================================

async function selectRecordsForDays(
  input: DeleteInput,
  outcomes: UnitOutcome[],
  trace: Trace
): Promise<RemoteWorklogRecord[]> {
  ensureConfiguration(input.config);

  const keys = new Set(input.days.map(formatDateKey));
  const ordered = [...input.days].sort((a, b) => a.getTime() - b.getTime());
  if (ordered.length === 0) return [];

  const remoteByDay = await fetchRemoteRecords(input.tickets, ordered[0], ordered[ordered.length - 1], outcomes, trace);
  const records: RemoteWorklogRecord[] = [];
  for (const [key, dayRecords] of remoteByDay ?? new Map<string, RemoteWorklogRecord[]>()) {
    if (keys.has(key)) records.push(...dayRecords);
  }
  trace.log(`Selected ${records.length} worklogs on ${keys.size} days`);
  return records;
}

/**
 * The user's own remote records on the given days. Nothing is deleted.
 */
export async function previewDeletion(input: DeleteInput): Promise<DeletionPreview> {
  const trace = createTrace(input.onProgress);
  const outcomes: UnitOutcome[] = [];
  const records = await selectRecordsForDays(input, outcomes, trace);
  return { records, outcomes, trace: trace.lines };
}

/**
 * Delete the user's own remote records on the given days, one at a time.
 * A rejected deletion is counted and the pass moves on.
 */
export async function deleteWorklogsForDays(input: DeleteInput, deleter: WorklogDeleter): Promise<DeleteResult> {
  const trace = createTrace(input.onProgress);
  const outcomes: UnitOutcome[] = [];
  const records = await selectRecordsForDays(input, outcomes, trace);
  let deleted = 0;
  let failed = 0;

  for (const record of records) {
    const removed = await runUnit(`delete:${record.ticket}/${record.id}`, outcomes, trace, async () => {
      if (!(await deleter.deleteWorklog(record.ticket, record.id))) {
        throw new NetworkError(`Deleting worklog ${record.id} on ${record.ticket} failed`);
      }
      return true;
    });
    if (removed) deleted++;
    else failed++;
  }

  trace.log(`Deleted ${deleted}, failed ${failed}`);
  return { records, deleted, failed, outcomes, trace: trace.lines };
}

/**
 * Default range when none is given: the days the attendance export covers.
 */
export function attendanceRange(rows: readonly AttendanceRow[]): { from: Date; to: Date } | null {
  const days = attendanceDays(rows);
  if (days.length === 0) return null;
  return { from: days[0], to: days[days.length - 1] };
}

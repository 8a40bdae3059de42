#!/usr/bin/env node
/**
 * Worklog Reconciler CLI
 *
 * Builds worklog drafts from attendance, calendar and commit history, and
 * checks existing worklogs against attendance.
 *
 * Usage:
 *   npx tsx scripts/reconcile.ts --attendance data/attendance.json --calendar cal.ics
 *   npx tsx scripts/reconcile.ts --attendance data/attendance.json --submit
 *   npx tsx scripts/reconcile.ts --attendance data/attendance.json --plan --apply
 *   npx tsx scripts/reconcile.ts --attendance data/attendance.json --compare --outliers
 *   npx tsx scripts/reconcile.ts --delete --days 2026-02-23,2026-02-24 --yes
 */

import * as fs from "fs";
import { loadAttendanceRows } from "../lib/attendance.js";
import { CalendarNormalizer } from "../lib/calendar-normalizer.js";
import { loadReconcileConfig } from "../lib/config.js";
import { ConfigurationError, errorMessage, type UnitOutcome } from "../lib/errors.js";
import { GitLabClient } from "../lib/gitlab-client.js";
import { JiraClient } from "../lib/jira-client.js";
import {
  applyAdjustments,
  attendanceRange,
  compareRange,
  deleteWorklogsForDays,
  planAdjustments,
  previewDeletion,
  runReconciliation,
  submitDrafts,
} from "../lib/reconcile-pass.js";
import { closeDatabase, getRecentRuns, initDatabase, recordRun, type RunKind } from "../lib/reconcile-db.js";
import {
  formatApplyMarkdown,
  formatComparisonMarkdown,
  formatDeletionMarkdown,
  formatDraftsMarkdown,
  formatOutcomesMarkdown,
  formatPlansMarkdown,
} from "../lib/report.js";
import { eachDay, parseDateKey } from "../lib/time-format.js";

function printHelp(): void {
  console.log(`
Worklog Reconciler CLI

Turns a day's attendance into ticket worklog drafts (meetings from the
calendar, the rest attributed by commit history), and checks booked
worklogs against attendance.

Usage:
  npx tsx scripts/reconcile.ts --attendance <json> [options]

Options:
  --attendance <file>     Attendance rows (JSON list), required
  --calendar <file>       Calendar export (.ics)
  --from <date>           Start date (YYYY-MM-DD), default: first attendance day
  --to <date>             End date (YYYY-MM-DD), default: last attendance day
  --config <file>         Config file (default: config/reconcile.json)
  --submit                Book drafts classified as new
  --plan                  Show adjustments to existing worklogs
  --apply                 With --plan: write the adjustments
  --compare               Compare attendance with existing worklogs
  --outliers              With --compare: list only misplaced worklogs
  --delete                List your worklogs on the selected days
  --days <dates>          With --delete: comma-separated days (YYYY-MM-DD),
                          default: every day from --from to --to
  --yes                   With --delete: actually delete them
  --history               Show recent runs from the journal
  --json                  Output as JSON instead of markdown
  --verbose, -v           Print the trace while running
  --help, -h              Show this help message

Environment:
  JIRA_API_TOKEN          Ticketing API token (required)
  GITLAB_TOKEN            Commit history token
  JIRA_BASE_URL, JIRA_EMAIL, GITLAB_BASE_URL override the config file

Journal Location:
  data/reconcile.db
  `);
}

interface CliOptions {
  attendance: string | null;
  calendar: string | null;
  configPath: string | undefined;
  from: Date | null;
  to: Date | null;
  submit: boolean;
  plan: boolean;
  apply: boolean;
  compare: boolean;
  outliers: boolean;
  delete: boolean;
  days: Date[];
  yes: boolean;
  history: boolean;
  json: boolean;
  verbose: boolean;
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    attendance: null,
    calendar: null,
    configPath: undefined,
    from: null,
    to: null,
    submit: false,
    plan: false,
    apply: false,
    compare: false,
    outliers: false,
    delete: false,
    days: [],
    yes: false,
    history: false,
    json: false,
    verbose: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];

    if (arg === "--help" || arg === "-h") {
      printHelp();
      process.exit(0);
    }

    if ((arg === "--from" || arg === "--to") && value) {
      const date = parseDateKey(value);
      if (!date) fail(`Invalid ${arg} date. Use YYYY-MM-DD format.`);
      if (arg === "--from") options.from = date;
      else options.to = date;
      i++;
      continue;
    }

    if (arg === "--days" && value) {
      for (const part of value.split(",")) {
        const date = parseDateKey(part.trim());
        if (!date) fail(`Invalid --days entry "${part}". Use YYYY-MM-DD format.`);
        options.days.push(date);
      }
      i++;
      continue;
    }

    if (arg === "--attendance" && value) {
      options.attendance = value;
      i++;
      continue;
    }
    if (arg === "--calendar" && value) {
      options.calendar = value;
      i++;
      continue;
    }
    if (arg === "--config" && value) {
      options.configPath = value;
      i++;
      continue;
    }

    if (arg === "--submit") options.submit = true;
    else if (arg === "--plan") options.plan = true;
    else if (arg === "--apply") options.apply = true;
    else if (arg === "--compare") options.compare = true;
    else if (arg === "--outliers") options.outliers = true;
    else if (arg === "--delete") options.delete = true;
    else if (arg === "--yes") options.yes = true;
    else if (arg === "--history") options.history = true;
    else if (arg === "--json") options.json = true;
    else if (arg === "--verbose" || arg === "-v") options.verbose = true;
    else {
      console.error(`Error: Unknown argument: ${arg}`);
      console.error("Run with --help for usage information.");
      process.exit(1);
    }
  }

  if (options.apply && !options.plan) fail("--apply requires --plan.");
  if (options.outliers && !options.compare) fail("--outliers requires --compare.");
  if ((options.yes || options.days.length > 0) && !options.delete) fail("--days and --yes require --delete.");
  if ([options.submit, options.plan, options.compare, options.delete].filter(Boolean).length > 1) {
    fail("Use only one of --submit, --plan, --compare and --delete.");
  }
  if (options.from && options.to && options.from > options.to) fail("--from date must be before --to date.");
  return options;
}

function print(options: CliOptions, markdown: string, value: unknown): void {
  console.log(options.json ? JSON.stringify(value, null, 2) : markdown);
}

async function showHistory(options: CliOptions): Promise<void> {
  const runs = await getRecentRuns(20);
  if (options.json) {
    console.log(JSON.stringify(runs, null, 2));
    return;
  }
  console.log("# Recent Runs\n");
  console.log("| Started | Kind | Range | OK | Failed |");
  console.log("|---------|------|-------|----|--------|");
  for (const run of runs) {
    console.log(`| ${run.started_at} | ${run.kind} | ${run.range_from} to ${run.range_to} | ${run.ok_count} | ${run.failed_count} |`);
  }
}

async function runDelete(options: CliOptions): Promise<void> {
  let days = options.days;
  if (days.length === 0) {
    if (!options.from || !options.to) fail("--delete needs --days or both --from and --to.");
    days = [...eachDay(options.from, options.to)];
  }
  const ordered = [...days].sort((a, b) => a.getTime() - b.getTime());

  const config = loadReconcileConfig(options.configPath);
  const jira = new JiraClient({ baseUrl: config.jira.baseUrl, email: config.jira.email, apiToken: config.jira.apiToken });
  const onProgress = options.verbose ? (message: string) => console.error(message) : undefined;
  const input = { config, days, tickets: jira, onProgress };
  const startedAt = new Date();

  if (!options.yes) {
    const preview = await previewDeletion(input);
    print(options, formatDeletionMarkdown(preview.records, null), preview.records);
    if (preview.records.length > 0 && !options.json) console.log("Run again with --yes to delete.");
    return;
  }

  const result = await deleteWorklogsForDays(input, jira);
  print(options, formatDeletionMarkdown(result.records, result), result);
  await recordRun({
    kind: "delete",
    from: ordered[0],
    to: ordered[ordered.length - 1],
    startedAt,
    finishedAt: new Date(),
    outcomes: result.outcomes,
  });
  const failures = formatOutcomesMarkdown(result.outcomes);
  if (failures && !options.json) console.log(`\n${failures}`);
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  await initDatabase();

  if (options.history) {
    await showHistory(options);
    return;
  }

  if (options.delete) {
    await runDelete(options);
    return;
  }

  if (!options.attendance) fail("--attendance is required.");
  const { rows, errors } = loadAttendanceRows(options.attendance);
  for (const error of errors) console.error(`Warning: ${error.message}`);

  const range = attendanceRange(rows);
  const from = options.from ?? range?.from ?? null;
  const to = options.to ?? range?.to ?? null;
  if (!from || !to) fail("No date range: pass --from and --to or an attendance file with rows.");

  const config = loadReconcileConfig(options.configPath);
  const jira = new JiraClient({ baseUrl: config.jira.baseUrl, email: config.jira.email, apiToken: config.jira.apiToken });
  const onProgress = options.verbose ? (message: string) => console.error(message) : undefined;
  const startedAt = new Date();

  const journal = async (kind: RunKind, outcomes: readonly UnitOutcome[]): Promise<void> => {
    await recordRun({ kind, from, to, startedAt, finishedAt: new Date(), outcomes });
    const failures = formatOutcomesMarkdown(outcomes);
    if (failures && !options.json) console.log(`\n${failures}`);
  };

  if (options.compare) {
    const mode = options.outliers ? "outliers" : "full";
    const result = await compareRange({ config, from, to, attendance: rows, tickets: jira, mode, onProgress });
    print(options, formatComparisonMarkdown(result.days, options.outliers), result.days);
    await journal("compare", result.outcomes);
    return;
  }

  if (options.plan) {
    const result = await planAdjustments({ config, from, to, attendance: rows, tickets: jira, onProgress });
    print(options, formatPlansMarkdown(result.plans), result.plans);
    await journal("plan", result.outcomes);

    if (options.apply) {
      const applied = await applyAdjustments(result.plans, jira);
      print(options, formatApplyMarkdown(applied), applied);
      await journal(
        "apply",
        applied.map((o): UnitOutcome => ({
          unit: `${o.operation.type}:${o.operation.record.ticket}/${o.operation.record.id}`,
          status: o.status === "ok" ? "ok" : "failed",
          message: o.message,
        }))
      );
    }
    return;
  }

  let calendar: CalendarNormalizer | null = null;
  if (options.calendar) {
    const parsed = CalendarNormalizer.fromText(fs.readFileSync(options.calendar, "utf-8"), {
      identity: config.identity,
      nonMeetingHints: config.nonMeetingHints,
    });
    for (const error of parsed.errors) console.error(`Warning: ${error.message}`);
    calendar = parsed.normalizer;
  }

  const commits =
    config.gitlab.baseUrl && config.gitlab.token
      ? new GitLabClient({ baseUrl: config.gitlab.baseUrl, token: config.gitlab.token })
      : null;

  const result = await runReconciliation({
    config,
    from,
    to,
    attendance: rows,
    calendar,
    commits,
    tickets: jira,
    onProgress,
  });
  print(options, formatDraftsMarkdown(result.drafts), result.drafts);
  await journal("drafts", result.outcomes);

  if (options.submit) {
    const submitted = await submitDrafts(result, jira, onProgress);
    console.log(`\nSubmitted ${submitted.submitted}, failed ${submitted.failed}`);
    await journal("submit", submitted.outcomes);
  }
}

main()
  .catch(error => {
    if (error instanceof ConfigurationError) {
      console.error("Configuration problems:");
      for (const problem of error.problems) console.error(`  - ${problem}`);
    } else {
      console.error("Reconciliation failed:", errorMessage(error));
    }
    process.exitCode = 1;
  })
  .finally(() => {
    closeDatabase();
  });

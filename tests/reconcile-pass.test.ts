/**
 * Reconciliation Pass Tests
 *
 * Collaborators are in-process fakes behind the pass interfaces.
 */

import { describe, it, expect, vi } from "vitest";
import type { WorklogWriter } from "../lib/adjustment-planner.js";
import type { AttendanceRow } from "../lib/attendance.js";
import { CalendarNormalizer } from "../lib/calendar-normalizer.js";
import { resolveReconcileConfig, type ReconcileConfig } from "../lib/config.js";
import type { Classification } from "../lib/delta-classifier.js";
import { ConfigurationError, NetworkError } from "../lib/errors.js";
import {
  applyAdjustments,
  attendanceRange,
  compareRange,
  deleteWorklogsForDays,
  planAdjustments,
  previewDeletion,
  runReconciliation,
  submitDrafts,
  type CommitSource,
  type DraftSubmitter,
  type ReconcileInput,
  type TicketService,
  type WorklogDeleter,
} from "../lib/reconcile-pass.js";
import type { RemoteWorklogRecord } from "../lib/remote-worklogs.js";
import type { DraftSegment } from "../lib/segmenter.js";
import type { Commit } from "../lib/ticket-keys.js";
import { formatClock } from "../lib/time-format.js";
import { at, createEvent, createRecord, createRow } from "./helpers.js";

const monday = new Date(2026, 1, 23);
const tuesday = new Date(2026, 1, 24);

function config(overrides: Record<string, unknown> = {}): ReconcileConfig {
  return resolveReconcileConfig(
    {
      identity: "dev@example.com",
      meetingTicket: "OPS-1",
      jira: { baseUrl: "https://tickets.example.com", email: "dev@example.com" },
      gitlab: { baseUrl: "https://git.example.com", projectIds: ["42"] },
      ...overrides,
    },
    { JIRA_API_TOKEN: "test-secret" }
  );
}

function lunchRow(overrides: Partial<AttendanceRow> = {}): AttendanceRow {
  return createRow({ pauseMinutes: 30, pauses: [{ start: at(12), end: at(12, 30) }], ...overrides });
}

function commitAt(message: string, timestamp: Date, authorEmail = "dev@example.com"): Commit {
  return { id: message, projectId: "42", timestamp, message, authorEmail, committerEmail: null };
}

function fakeCommits() {
  return {
    fetchCommits: vi.fn<CommitSource["fetchCommits"]>(async () => [
      commitAt("ABC-1 Login form", at(7)),
      commitAt("XYZ-9 Someone else", at(9), "other@example.com"),
      commitAt("ABC-2 Report export", at(14)),
    ]),
  };
}

function fakeTickets(records: RemoteWorklogRecord[], overrides: Partial<TicketService> = {}): TicketService {
  return {
    fetchMyAccountId: vi.fn(async () => "acc-1"),
    searchKeys: vi.fn(async () => [...new Set(records.map(r => r.ticket))]),
    fetchWorklogs: vi.fn(async (issue: string) => records.filter(r => r.ticket === issue)),
    fetchSummaries: vi.fn(async () => ({ "ABC-1": "Login form" })),
    ...overrides,
  };
}

function reconcileInput(overrides: Partial<ReconcileInput> = {}): ReconcileInput {
  return {
    config: config(),
    from: monday,
    to: monday,
    attendance: [lunchRow()],
    tickets: fakeTickets([createRecord("ABC-2", at(14), at(17))]),
    calendar: new CalendarNormalizer({ events: [createEvent({ title: "Planning", start: at(10), end: at(11) })] }),
    commits: fakeCommits(),
    ...overrides,
  };
}

function rows(drafts: DraftSegment[]): string[][] {
  return drafts.map(d => [formatClock(d.start), formatClock(d.end), d.ticket, d.label, d.classification.kind]);
}

describe("runReconciliation", () => {
  it("builds labelled drafts and classifies them against remote records", async () => {
    const input = reconcileInput();

    const result = await runReconciliation(input);

    expect(rows(result.drafts)).toEqual([
      ["08:00", "10:00", "ABC-1", "Work - Login form", "new"],
      ["10:00", "11:00", "OPS-1", "Meeting 10:00-11:00 - Planning", "new"],
      ["11:00", "12:00", "ABC-1", "Work - Login form", "new"],
      ["12:30", "14:00", "ABC-1", "Work - Login form", "new"],
      ["14:00", "17:00", "ABC-2", "Work", "duplicate"],
    ]);
    expect(result.outcomes.map(o => `${o.unit}:${o.status}`)).toEqual([
      "commits:42:ok",
      "summaries:ok",
      "account:ok",
      "worklog-search:ok",
      "worklogs:ABC-2:ok",
    ]);
    expect(result.trace).toContain("Commits: 3 fetched, 2 by you, 2 with a ticket key");
    expect(result.trace).toContain("2026-02-23: 2 work windows, 1 meetings");
    expect(result.trace[result.trace.length - 1]).toBe("Drafts: 5 (4 new, 1 duplicate, 0 overlap); 0 failed units");
  });

  it("looks back for commits before the range", async () => {
    const commits = fakeCommits();
    await runReconciliation(reconcileInput({ commits }));
    expect(commits.fetchCommits).toHaveBeenCalledWith("42", new Date(2026, 0, 24), tuesday);
  });

  it("forwards trace lines as progress", async () => {
    const progress: string[] = [];
    const result = await runReconciliation(reconcileInput({ onProgress: line => progress.push(line) }));
    expect(progress).toEqual(result.trace);
  });

  it("refuses to start without a valid configuration", async () => {
    const tickets = fakeTickets([]);
    const input = reconcileInput({ config: config({ identity: "" }), tickets });

    await expect(runReconciliation(input)).rejects.toThrow(ConfigurationError);
    expect(tickets.fetchMyAccountId).not.toHaveBeenCalled();
  });

  it("books only meetings without commit history", async () => {
    const tickets = fakeTickets([]);
    const result = await runReconciliation(reconcileInput({ commits: null, tickets }));

    expect(rows(result.drafts)).toEqual([["10:00", "11:00", "OPS-1", "Meeting 10:00-11:00 - Planning", "new"]]);
    expect(result.trace).toContain("No commit history configured; work time cannot be attributed");
    expect(tickets.fetchSummaries).not.toHaveBeenCalled();
  });

  it("has no meetings without a calendar", async () => {
    const result = await runReconciliation(reconcileInput({ calendar: null }));
    expect(rows(result.drafts).map(r => r.slice(0, 3))).toEqual([
      ["08:00", "12:00", "ABC-1"],
      ["12:30", "14:00", "ABC-1"],
      ["14:00", "17:00", "ABC-2"],
    ]);
  });

  it("records a failing commit project and continues", async () => {
    const commits: CommitSource = {
      fetchCommits: vi.fn(async () => {
        throw new NetworkError("Commits for project 42 returned HTTP 500", 500);
      }),
    };

    const result = await runReconciliation(reconcileInput({ commits }));

    expect(result.outcomes[0]).toEqual({
      unit: "commits:42",
      status: "failed",
      message: "Commits for project 42 returned HTTP 500",
    });
    expect(result.trace).toContain("[network] Commits for project 42 returned HTTP 500");
    expect(result.drafts.map(d => d.ticket)).toEqual(["OPS-1"]);
  });

  it("records a failed summary batch and keeps the plain label", async () => {
    const tickets = fakeTickets([], {
      fetchSummaries: vi.fn(async (keys: Iterable<string>, onBatchError?: (batch: string[], error: unknown) => void) => {
        onBatchError?.([...keys], new Error("search unavailable"));
        const none: Record<string, string> = {};
        return none;
      }),
    });

    const result = await runReconciliation(reconcileInput({ tickets }));

    expect(result.outcomes).toContainEqual({
      unit: "summaries:ABC-1,ABC-2",
      status: "failed",
      message: "search unavailable",
    });
    expect(result.trace).toContain("[error] search unavailable");
    expect(new Set(result.drafts.filter(d => d.kind === "work").map(d => d.label))).toEqual(new Set(["Work"]));
  });

  it("treats every draft as new without an account id", async () => {
    const tickets = fakeTickets([createRecord("ABC-2", at(14), at(17))], {
      fetchMyAccountId: vi.fn(async () => null),
    });

    const result = await runReconciliation(reconcileInput({ tickets }));

    expect(result.drafts.every(d => d.classification.kind === "new")).toBe(true);
    expect(result.remoteChecked).toBe(false);
    expect(result.trace).toContain("No ticketing account id; remote worklogs not fetched");
    expect(result.trace).toContain("Drafts were not checked against booked worklogs; they cannot be submitted");
    expect(tickets.searchKeys).not.toHaveBeenCalled();
  });

  it("marks drafts as checked when booked worklogs were read", async () => {
    expect((await runReconciliation(reconcileInput())).remoteChecked).toBe(true);
  });

  it("books meeting labels reworded by title rules", async () => {
    const input = reconcileInput({
      config: config({ titleRules: [{ trigger: "Planning", replacements: ["Sprint planning"] }] }),
    });
    const result = await runReconciliation(input);
    expect(result.drafts[1].label).toBe("Meeting 10:00-11:00 - Sprint planning");
    expect(result.trace).toContain('  Title "Planning" booked as "Sprint planning"');
  });
});

describe("submitDrafts", () => {
  function draft(ticket: string, start: Date, end: Date, classification: Classification = { kind: "new" }): DraftSegment {
    return { start, end, ticket, label: "Work", kind: "work", classification };
  }

  function submitter(overrides: Partial<DraftSubmitter> = {}): DraftSubmitter {
    return {
      resolveId: vi.fn(async (key: string) => (key === "ABC-1" ? "10001" : null)),
      createWorklog: vi.fn(async () => ({ ok: true, body: null })),
      ...overrides,
    };
  }

  it("books new drafts on the resolved issue id", async () => {
    const s = submitter();
    const drafts = [
      draft("ABC-1", at(8), at(10)),
      draft("ABC-1", at(11), at(12)),
      draft("ABC-2", at(14), at(17), { kind: "duplicate", match: createRecord("ABC-2", at(14), at(17)) }),
    ];

    const result = await submitDrafts({ drafts, remoteChecked: true }, s);

    expect(result).toMatchObject({ submitted: 2, failed: 0 });
    expect(s.resolveId).toHaveBeenCalledTimes(1);
    expect(s.createWorklog).toHaveBeenNthCalledWith(1, "10001", at(8), 7200, "Work");
    expect(s.createWorklog).toHaveBeenNthCalledWith(2, "10001", at(11), 3600, "Work");
    expect(result.outcomes.map(o => o.unit)).toEqual([
      "resolve:ABC-1",
      `submit:ABC-1@${at(8).toISOString()}`,
      `submit:ABC-1@${at(11).toISOString()}`,
    ]);
  });

  it("refuses drafts that were not checked against booked worklogs", async () => {
    const s = submitter();
    await expect(submitDrafts({ drafts: [draft("ABC-1", at(8), at(10))], remoteChecked: false }, s)).rejects.toThrow(
      "Invalid configuration: ticketing account id unknown; drafts were not checked against booked worklogs"
    );
    expect(s.createWorklog).not.toHaveBeenCalled();
  });

  it("falls back to the key and counts rejected bookings", async () => {
    const s = submitter({
      resolveId: vi.fn(async () => {
        throw new NetworkError("Resolving ABC-3 returned HTTP 500", 500);
      }),
      createWorklog: vi.fn(async () => ({ ok: false, body: "worklog rejected" })),
    });

    const result = await submitDrafts({ drafts: [draft("ABC-3", at(8), at(9))], remoteChecked: true }, s);

    expect(s.createWorklog).toHaveBeenCalledWith("ABC-3", at(8), 3600, "Work");
    expect(result.submitted).toBe(0);
    expect(result.failed).toBe(1);
    expect(result.outcomes[1]).toEqual({
      unit: `submit:ABC-3@${at(8).toISOString()}`,
      status: "failed",
      message: "Booking ABC-3 failed: worklog rejected",
    });
  });
});

describe("maintenance passes", () => {
  const misplaced = () => [
    createRecord("A-1", at(8, 10), at(12, 15)),
    createRecord("C-1", at(12, 16), at(12, 25)),
    createRecord("B-1", at(12, 20), at(16, 40)),
    createRecord("A-1", at(9, 0, 24), at(10, 0, 24)),
  ];

  it("plans days that have both records and attendance", async () => {
    const result = await planAdjustments({
      config: config(),
      from: monday,
      to: tuesday,
      attendance: [lunchRow()],
      tickets: fakeTickets(misplaced()),
    });

    expect(result.plans).toHaveLength(1);
    expect(result.plans[0].operations.map(op => op.type)).toEqual([
      "move-start",
      "move-end",
      "shorten-before",
      "delete",
      "shorten-after",
    ]);
    expect(result.trace).toContain("2026-02-23: 5 operations");
  });

  it("applies every planned operation", async () => {
    const { plans } = await planAdjustments({
      config: config(),
      from: monday,
      to: monday,
      attendance: [lunchRow()],
      tickets: fakeTickets(misplaced()),
    });
    const writer: WorklogWriter = {
      updateWorklog: vi.fn(async () => ({ ok: true, body: null })),
      createWorklog: vi.fn(async () => ({ ok: true, body: null })),
      deleteWorklog: vi.fn(async () => true),
    };

    const outcomes = await applyAdjustments(plans, writer);

    expect(outcomes.map(o => o.status)).toEqual(["ok", "ok", "ok", "ok", "ok"]);
    expect(writer.deleteWorklog).toHaveBeenCalledTimes(1);
  });

  it("lists outliers over the range", async () => {
    const result = await compareRange({
      config: config(),
      from: monday,
      to: monday,
      attendance: [lunchRow()],
      tickets: fakeTickets([createRecord("A-1", at(7, 30), at(8, 30)), createRecord("B-1", at(9), at(10))]),
      mode: "outliers",
    });

    expect(result.days).toHaveLength(1);
    expect(result.days[0].differences.map(d => d.type)).toEqual(["remote-before-work"]);
    expect(result.trace).toContain("Compared 1 of 1 days");
  });

  it("refuses to plan without a valid configuration", async () => {
    await expect(
      planAdjustments({
        config: config({ meetingTicket: "" }),
        from: monday,
        to: monday,
        attendance: [],
        tickets: fakeTickets([]),
      })
    ).rejects.toThrow("Invalid configuration: meetingTicket is not set");
  });
});

describe("delete pass", () => {
  const booked = () => [
    createRecord("A-1", at(9), at(10), { id: "wl-a" }),
    createRecord("B-1", at(11), at(12), { id: "wl-b" }),
    createRecord("A-1", at(9, 0, 24), at(10, 0, 24), { id: "wl-c" }),
    createRecord("A-1", at(9, 0, 25), at(10, 0, 25), { id: "wl-d" }),
    createRecord("B-1", at(13), at(14), { id: "wl-e", authorId: "acc-2" }),
  ];
  const wednesday = new Date(2026, 1, 25);

  function deleter(failing: string[] = []): WorklogDeleter {
    return { deleteWorklog: vi.fn(async (_issue: string, id: string) => !failing.includes(id)) };
  }

  it("lists the user's records on the selected days only", async () => {
    const tickets = fakeTickets(booked());

    const preview = await previewDeletion({ config: config(), days: [wednesday, monday], tickets });

    expect(preview.records.map(r => r.id)).toEqual(["wl-a", "wl-b", "wl-d"]);
    expect(tickets.searchKeys).toHaveBeenCalledWith(
      'worklogAuthor = "acc-1" AND worklogDate >= "2026-02-23" AND worklogDate <= "2026-02-25"',
      200
    );
    expect(preview.trace[preview.trace.length - 1]).toBe("Selected 3 worklogs on 2 days");
  });

  it("deletes each selected record and counts failures", async () => {
    const d = deleter(["wl-b"]);

    const result = await deleteWorklogsForDays({ config: config(), days: [monday], tickets: fakeTickets(booked()) }, d);

    expect(d.deleteWorklog).toHaveBeenCalledTimes(2);
    expect(d.deleteWorklog).toHaveBeenNthCalledWith(1, "A-1", "wl-a");
    expect(d.deleteWorklog).toHaveBeenNthCalledWith(2, "B-1", "wl-b");
    expect(result).toMatchObject({ deleted: 1, failed: 1 });
    expect(result.outcomes.slice(-2)).toEqual([
      { unit: "delete:A-1/wl-a", status: "ok", message: "" },
      { unit: "delete:B-1/wl-b", status: "failed", message: "Deleting worklog wl-b on B-1 failed" },
    ]);
    expect(result.trace[result.trace.length - 1]).toBe("Deleted 1, failed 1");
  });

  it("deletes nothing without an account id", async () => {
    const d = deleter();
    const tickets = fakeTickets(booked(), { fetchMyAccountId: vi.fn(async () => null) });

    const result = await deleteWorklogsForDays({ config: config(), days: [monday], tickets }, d);

    expect(result).toMatchObject({ records: [], deleted: 0, failed: 0 });
    expect(d.deleteWorklog).not.toHaveBeenCalled();
  });

  it("refuses to start without a valid configuration", async () => {
    const d = deleter();
    await expect(
      deleteWorklogsForDays({ config: config({ identity: "" }), days: [monday], tickets: fakeTickets(booked()) }, d)
    ).rejects.toThrow(ConfigurationError);
    expect(d.deleteWorklog).not.toHaveBeenCalled();
  });
});

describe("attendanceRange", () => {
  it("spans the first to the last attendance day", () => {
    const wednesday = new Date(2026, 1, 25);
    const range = attendanceRange([createRow({ day: wednesday }), createRow({ day: monday })]);
    expect(range).toEqual({ from: monday, to: wednesday });
  });

  it("is null without rows", () => {
    expect(attendanceRange([])).toBeNull();
  });
});

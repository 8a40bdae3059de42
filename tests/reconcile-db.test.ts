/**
 * Run Journal Tests
 *
 * Runs against an in-memory SQLite database.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  closeDatabase,
  getRecentRuns,
  getRunOutcomes,
  initDatabase,
  recordRun,
  type RunRecord,
} from "../lib/reconcile-db.js";

function createRun(overrides: Partial<RunRecord> = {}): RunRecord {
  return {
    kind: "drafts",
    from: new Date(2026, 1, 23),
    to: new Date(2026, 1, 27),
    startedAt: new Date("2026-03-02T08:00:00Z"),
    finishedAt: new Date("2026-03-02T08:01:30Z"),
    outcomes: [
      { unit: "commits:42", status: "ok", message: "" },
      { unit: "worklogs:ABC-1", status: "failed", message: "GET /rest/api/3/issue/ABC-1/worklog returned HTTP 500" },
      { unit: "summaries", status: "ok", message: "" },
    ],
    ...overrides,
  };
}

describe("reconcile-db", () => {
  beforeEach(async () => {
    await initDatabase(":memory:");
  });

  afterEach(() => {
    closeDatabase();
  });

  describe("recordRun", () => {
    it("stores the run with outcome counts", async () => {
      const id = await recordRun(createRun());

      const [run] = await getRecentRuns();
      expect(run).toEqual({
        id,
        kind: "drafts",
        range_from: "2026-02-23",
        range_to: "2026-02-27",
        started_at: "2026-03-02T08:00:00.000Z",
        finished_at: "2026-03-02T08:01:30.000Z",
        ok_count: 2,
        failed_count: 1,
      });
    });

    it("stores a run without outcomes", async () => {
      const id = await recordRun(createRun({ outcomes: [] }));
      expect(await getRunOutcomes(id)).toEqual([]);
      const [run] = await getRecentRuns();
      expect(run.ok_count).toBe(0);
      expect(run.failed_count).toBe(0);
    });
  });

  describe("getRunOutcomes", () => {
    it("returns outcomes in recorded order", async () => {
      const id = await recordRun(createRun());
      const outcomes = await getRunOutcomes(id);
      expect(outcomes.map(o => o.unit)).toEqual(["commits:42", "worklogs:ABC-1", "summaries"]);
      expect(outcomes.every(o => o.run_id === id)).toBe(true);
    });

    it("filters failed outcomes", async () => {
      const id = await recordRun(createRun());
      expect(await getRunOutcomes(id, true)).toEqual([
        {
          run_id: id,
          unit: "worklogs:ABC-1",
          status: "failed",
          message: "GET /rest/api/3/issue/ABC-1/worklog returned HTTP 500",
        },
      ]);
    });

    it("keeps outcomes of different runs apart", async () => {
      const first = await recordRun(createRun());
      const second = await recordRun(createRun({ outcomes: [{ unit: "account", status: "ok", message: "" }] }));
      expect(await getRunOutcomes(second)).toHaveLength(1);
      expect(await getRunOutcomes(first)).toHaveLength(3);
    });
  });

  describe("getRecentRuns", () => {
    it("lists the newest run first and honours the limit", async () => {
      await recordRun(createRun({ startedAt: new Date("2026-03-01T08:00:00Z") }));
      await recordRun(createRun({ kind: "compare", startedAt: new Date("2026-03-03T08:00:00Z") }));
      await recordRun(createRun({ kind: "plan", startedAt: new Date("2026-03-02T08:00:00Z") }));

      const runs = await getRecentRuns();
      expect(runs.map(r => r.kind)).toEqual(["compare", "plan", "drafts"]);
      expect((await getRecentRuns(1)).map(r => r.kind)).toEqual(["compare"]);
    });

    it("filters by kind", async () => {
      await recordRun(createRun());
      await recordRun(createRun({ kind: "submit" }));

      const runs = await getRecentRuns(20, "submit");
      expect(runs).toHaveLength(1);
      expect(runs[0].kind).toBe("submit");
    });

    it("breaks ties on start time by insertion order", async () => {
      await recordRun(createRun({ kind: "plan" }));
      await recordRun(createRun({ kind: "apply" }));
      expect((await getRecentRuns()).map(r => r.kind)).toEqual(["apply", "plan"]);
    });
  });
});

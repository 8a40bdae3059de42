/**
 * Markdown reports for drafts, adjustment plans, comparisons and deletions.
 */

import { describeOperation, type ApplyOutcome, type DayAdjustmentPlan } from "./adjustment-planner.js";
import { countByClassification } from "./delta-classifier.js";
import type { UnitOutcome } from "./errors.js";
import type { RemoteWorklogRecord } from "./remote-worklogs.js";
import type { DraftSegment } from "./segmenter.js";
import { describeDifference, type DayComparison } from "./time-comparator.js";
import { formatClock, formatDateKey, formatDuration } from "./time-format.js";

function dayHeading(day: Date): string {
  const weekday = day.toLocaleDateString("en-US", { weekday: "long" });
  return `### ${weekday} ${formatDateKey(day)}`;
}

function minutesOf(draft: DraftSegment): number {
  return Math.round((draft.end.getTime() - draft.start.getTime()) / 60000);
}

function groupByDayKey<T>(items: readonly T[], dayOf: (item: T) => Date): Map<string, { day: Date; items: T[] }> {
  const groups = new Map<string, { day: Date; items: T[] }>();
  for (const item of items) {
    const day = dayOf(item);
    const key = formatDateKey(day);
    const group = groups.get(key) ?? { day, items: [] };
    group.items.push(item);
    groups.set(key, group);
  }
  return groups;
}

export function formatDraftsMarkdown(drafts: readonly DraftSegment[]): string {
  const lines: string[] = [];
  const counts = countByClassification(drafts);
  const total = drafts.reduce((sum, d) => sum + minutesOf(d), 0);

  lines.push("# Worklog Drafts");
  lines.push(`- **Total:** ${formatDuration(total)} in ${drafts.length} segments`);
  lines.push(`- **New:** ${counts.new} | **Duplicate:** ${counts.duplicate} | **Overlap:** ${counts.overlap}`);
  lines.push("");

  for (const { day, items } of groupByDayKey(drafts, d => d.start).values()) {
    lines.push(dayHeading(day));
    lines.push("| Time | Ticket | Duration | Label | Status |");
    lines.push("|------|--------|----------|-------|--------|");
    for (const d of items) {
      lines.push(
        `| ${formatClock(d.start)}-${formatClock(d.end)} | ${d.ticket} | ${formatDuration(minutesOf(d))} | ${d.label} | ${d.classification.kind} |`
      );
    }
    lines.push("");
  }

  if (drafts.length === 0) lines.push("*(No drafts)*");
  return lines.join("\n");
}

export function formatPlansMarkdown(plans: readonly DayAdjustmentPlan[]): string {
  const lines: string[] = ["# Adjustment Plan", ""];
  const withOps = plans.filter(p => p.operations.length > 0);

  for (const plan of withOps) {
    lines.push(dayHeading(plan.day));
    lines.push(
      `Pause: ${formatDuration(plan.pauseMinutes)} recorded, ${formatDuration(plan.remotePauseMinutes)} between records` +
        (plan.paidNonWorkMinutes > 0 ? `, ${formatDuration(plan.paidNonWorkMinutes)} paid non-work` : "")
    );
    for (const op of plan.operations) {
      lines.push(`- ${describeOperation(op)}`);
    }
    lines.push("");
  }

  if (withOps.length === 0) lines.push("*(Nothing to adjust)*");
  return lines.join("\n");
}

export function formatApplyMarkdown(outcomes: readonly ApplyOutcome[]): string {
  const lines: string[] = ["# Applied Adjustments", ""];
  for (const o of outcomes) {
    const mark = o.status === "ok" ? "ok" : o.status === "failed" ? "FAILED" : "PARTIAL";
    lines.push(`- [${mark}] ${o.message}`);
  }
  if (outcomes.length === 0) lines.push("*(Nothing applied)*");
  return lines.join("\n");
}

export function formatComparisonMarkdown(days: readonly DayComparison[], outliers: boolean): string {
  const lines: string[] = [outliers ? "# Misplaced Worklogs" : "# Attendance vs. Worklogs", ""];

  for (const result of days) {
    lines.push(dayHeading(result.day));
    if (result.remoteOnly) lines.push("Worklogs without an attendance entry.");
    else if (!result.hasRemoteData) lines.push("No worklogs booked.");

    if (result.differences.length === 0 && result.hasLocalData && result.hasRemoteData) {
      lines.push("Matches.");
    }
    for (const d of result.differences) {
      lines.push(`- ${describeDifference(d)}`);
    }
    lines.push("");
  }

  if (days.length === 0) lines.push(outliers ? "*(No misplaced worklogs)*" : "*(No days to compare)*");
  return lines.join("\n");
}

/**
 * Worklogs selected for deletion, with the counts once they are gone.
 */
export function formatDeletionMarkdown(
  records: readonly RemoteWorklogRecord[],
  counts: { deleted: number; failed: number } | null
): string {
  const lines: string[] = [counts ? "# Deleted Worklogs" : "# Worklogs to Delete", ""];

  for (const { day, items } of groupByDayKey(records, r => r.start).values()) {
    lines.push(dayHeading(day));
    for (const r of items) {
      lines.push(`- ${formatClock(r.start)}-${formatClock(r.end)} ${r.ticket} (${r.id})`);
    }
    lines.push("");
  }

  if (records.length === 0) lines.push("*(No worklogs on these days)*");
  else if (counts) lines.push(`Done: ${counts.deleted} deleted, ${counts.failed} failed.`);
  else lines.push(`${records.length} worklogs would be deleted. This cannot be undone.`);
  return lines.join("\n");
}

export function formatOutcomesMarkdown(outcomes: readonly UnitOutcome[]): string {
  const failed = outcomes.filter(o => o.status === "failed");
  if (failed.length === 0) return "";
  const lines = ["## Failed", ...failed.map(o => `- ${o.unit}: ${o.message}`)];
  return lines.join("\n");
}

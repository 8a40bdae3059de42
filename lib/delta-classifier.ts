/**
 * Delta Classifier
 *
 * Tags draft segments against previously submitted remote records on the
 * same ticket: new, duplicate or overlap.
 */

import { overlaps, durationMs } from "./interval-algebra.js";
import type { RemoteWorklogRecord } from "./remote-worklogs.js";
import type { DraftSegment } from "./segmenter.js";
import { MINUTE_MS } from "./time-format.js";

// ============================================================================
// Types
// ============================================================================

export type Classification =
  | { kind: "new" }
  | { kind: "duplicate"; match: RemoteWorklogRecord }
  | { kind: "overlap"; conflicts: RemoteWorklogRecord[] };

export type ClassificationKind = Classification["kind"];

export const DUPLICATE_DURATION_TOLERANCE_MS = MINUTE_MS;
export const DUPLICATE_START_TOLERANCE_MS = 5 * MINUTE_MS;

// ============================================================================
// Classification
// ============================================================================

/**
 * Classify one draft. Only records sharing the draft's ticket key are
 * considered; the first overlapping record within both tolerances makes it
 * a duplicate.
 */
export function classifyDraft(
  draft: Pick<DraftSegment, "start" | "end" | "ticket">,
  records: readonly RemoteWorklogRecord[]
): Classification {
  const conflicts: RemoteWorklogRecord[] = [];

  for (const record of records) {
    if (record.ticket !== draft.ticket) continue;
    if (!overlaps(draft, record)) continue;

    const durationDelta = Math.abs(durationMs(draft) - durationMs(record));
    const startDelta = Math.abs(draft.start.getTime() - record.start.getTime());
    if (durationDelta <= DUPLICATE_DURATION_TOLERANCE_MS && startDelta <= DUPLICATE_START_TOLERANCE_MS) {
      return { kind: "duplicate", match: record };
    }
    conflicts.push(record);
  }

  return conflicts.length > 0 ? { kind: "overlap", conflicts } : { kind: "new" };
}

/**
 * Classify every draft, returning fresh copies.
 */
export function classifyDrafts(
  drafts: readonly DraftSegment[],
  records: readonly RemoteWorklogRecord[]
): DraftSegment[] {
  return drafts.map(d => ({ ...d, classification: classifyDraft(d, records) }));
}

export function countByClassification(drafts: readonly DraftSegment[]): Record<ClassificationKind, number> {
  const counts: Record<ClassificationKind, number> = { new: 0, duplicate: 0, overlap: 0 };
  for (const d of drafts) counts[d.classification.kind]++;
  return counts;
}

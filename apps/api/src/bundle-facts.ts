/**
 * Bundle fact extraction: display-ready facts derived from one governance bundle.
 * Every function is pure and degrades to a sentinel instead of throwing.
 */
import {
  STAGE_SLOT_COUNT,
  type Attachment,
  type Bundle,
  type StageAssignment,
} from "@gov-explorer/shared";
import {
  compareInstants,
  instantFromEpochMs,
  isKnownInstant,
  latestInstant,
  normalizeInstant,
  wholeDaysBetween,
  type Instant,
} from "./temporal";

export const UNASSIGNED = "Unassigned";

/** Days-in-stage value for a bundle with no parseable timestamp. */
export const INDETERMINATE_DAYS = -1;

export type AssigneeResolution =
  | { kind: "assigned"; name: string }
  | { kind: "unassigned" };

/**
 * First stage entry named `stageName` decides the outcome, even when its
 * assignee is blank. An empty stage name never matches.
 */
export function resolveStageAssignee(
  stages: readonly StageAssignment[],
  stageName: string
): AssigneeResolution {
  if (!stageName) return { kind: "unassigned" };
  const match = stages.find((entry) => entry.stageName === stageName);
  if (!match || !match.assigneeName) return { kind: "unassigned" };
  return { kind: "assigned", name: match.assigneeName };
}

export function assigneeLabel(resolution: AssigneeResolution): string {
  return resolution.kind === "assigned" ? resolution.name : UNASSIGNED;
}

export function stageAssignee(stages: readonly StageAssignment[], stageName: string): string {
  return assigneeLabel(resolveStageAssignee(stages, stageName));
}

export function currentStageAssignee(bundle: Bundle): string {
  return stageAssignee(bundle.stages, bundle.currentStage);
}

/**
 * Distinct stage names in first-seen order, fitted to exactly STAGE_SLOT_COUNT
 * slots (truncated, or padded with "").
 */
export function orderedDistinctStageNames(bundle: Bundle): string[] {
  const seen = new Set<string>();
  const names: string[] = [];
  for (const { stageName } of bundle.stages) {
    if (!stageName || seen.has(stageName)) continue;
    seen.add(stageName);
    names.push(stageName);
  }
  const slots = names.slice(0, STAGE_SLOT_COUNT);
  while (slots.length < STAGE_SLOT_COUNT) slots.push("");
  return slots;
}

/** Latest of the bundle's creation time and every attachment's creation time. */
export function lastUpdated(bundle: Bundle): Instant {
  return latestInstant([
    normalizeInstant(bundle.createdAt),
    ...bundle.attachments.map((attachment) => normalizeInstant(attachment.createdAt)),
  ]);
}

/**
 * Whole days since the bundle was last updated, or INDETERMINATE_DAYS when
 * that time is unknown. A last-updated time after `now` counts as zero days.
 *
 * @throws RangeError when `now` is not a valid date.
 */
export function daysInCurrentStage(bundle: Bundle, now: Date): number {
  const reference = instantFromEpochMs(now.getTime());
  if (!isKnownInstant(reference)) throw new RangeError("Reference time is not a valid date");
  const updated = lastUpdated(bundle);
  if (!isKnownInstant(updated)) return INDETERMINATE_DAYS;
  return Math.max(0, wholeDaysBetween(updated, reference));
}

/**
 * Branch of the most recent attachment that names one. Attachments without a
 * parseable date are scanned last, in input order.
 */
export function mostRecentBranch(attachments: readonly Attachment[]): string {
  const ordered = attachments
    .map((attachment) => ({ attachment, createdAt: normalizeInstant(attachment.createdAt) }))
    .sort((a, b) => compareInstants(b.createdAt, a.createdAt));
  for (const { attachment } of ordered) {
    if (attachment.identifier.branch) return attachment.identifier.branch;
  }
  return "";
}

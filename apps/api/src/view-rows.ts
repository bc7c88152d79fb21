/**
 * View builders: compose bundle facts and audit projections into the flat rows
 * served to the presentation layer (all bundles, bundle history, metrics).
 */
import type {
  AllBundlesRow,
  AuditEvent,
  Bundle,
  ChartPoint,
  HistoryRow,
  MetricsRow,
} from "@gov-explorer/shared";
import {
  UNASSIGNED,
  currentStageAssignee,
  daysInCurrentStage,
  lastUpdated,
  mostRecentBranch,
  orderedDistinctStageNames,
  stageAssignee,
} from "./bundle-facts";
import {
  affectedStageName,
  dominantFieldChange,
  filterEvents,
  rawFieldChanges,
  targetBundleName,
} from "./audit-projection";
import { formatInstant, normalizeInstant } from "./temporal";

export const DEFAULT_TOP_STALLED = 15;

export interface HistoryFilter {
  actionNames?: readonly string[];
  projectNames?: readonly string[];
}

function byLowerCase(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function slotAssignee(bundle: Bundle, stageName: string): string {
  return stageName ? stageAssignee(bundle.stages, stageName) : UNASSIGNED;
}

export function buildAllBundlesRow(bundle: Bundle): AllBundlesRow {
  const [stage1, stage2, stage3, stage4] = orderedDistinctStageNames(bundle);
  return {
    "Bundle Name": bundle.name,
    "State": bundle.state,
    "Current Stage": bundle.currentStage,
    "Current Stage Assignee": currentStageAssignee(bundle),
    "Last Updated": formatInstant(lastUpdated(bundle)),
    "Project Name": bundle.projectName,
    "Policy Name": bundle.policyName,
    "Date Bundle Created": formatInstant(normalizeInstant(bundle.createdAt)),
    "Owner": bundle.owner,
    "Stage 1 Name": stage1,
    "Stage 1 Assignee": slotAssignee(bundle, stage1),
    "Stage 2 Name": stage2,
    "Stage 2 Assignee": slotAssignee(bundle, stage2),
    "Stage 3 Name": stage3,
    "Stage 3 Assignee": slotAssignee(bundle, stage3),
    "Stage 4 Name": stage4,
    "Stage 4 Assignee": slotAssignee(bundle, stage4),
    "Repo Branch": mostRecentBranch(bundle.attachments),
    "Bundle ID": bundle.id,
  };
}

/** One row per bundle, ordered by bundle name ignoring case. */
export function buildAllBundlesRows(bundles: readonly Bundle[]): AllBundlesRow[] {
  return [...bundles]
    .sort((a, b) => byLowerCase(a.name, b.name))
    .map(buildAllBundlesRow);
}

export function buildHistoryRow(event: AuditEvent): HistoryRow {
  const change = dominantFieldChange(event);
  return {
    "Time (UTC)": formatInstant(normalizeInstant(event.timestamp)),
    "Action": event.actionName,
    "Stage": affectedStageName(event),
    "User": event.actorName,
    "Project": event.projectName,
    "Bundle": targetBundleName(event),
    "Before": change.before,
    "After": change.after,
    "Change": change.fieldKind,
    rawFieldChanges: rawFieldChanges(event),
  };
}

/** Filtered history rows in the order the data source returned the events. */
export function buildHistoryRows(
  events: readonly AuditEvent[],
  filter: HistoryFilter = {}
): HistoryRow[] {
  return filterEvents(events, filter.actionNames, filter.projectNames).map(buildHistoryRow);
}

export function buildMetricsRows(bundles: readonly Bundle[], now: Date): MetricsRow[] {
  return bundles.map((bundle) => ({
    "Bundle Name": bundle.name,
    "Project Name": bundle.projectName,
    "Policy Name": bundle.policyName,
    "Current Stage": bundle.currentStage,
    "Current Stage Assignee": currentStageAssignee(bundle),
    "Days in Current Stage": daysInCurrentStage(bundle, now),
  }));
}

/** Longest-waiting first; indeterminate (-1) rows land last. Ties keep input order. */
export function rankByDaysInStage(rows: readonly MetricsRow[]): MetricsRow[] {
  return [...rows].sort((a, b) => b["Days in Current Stage"] - a["Days in Current Stage"]);
}

export function topStalledBundles(
  rows: readonly MetricsRow[],
  limit: number = DEFAULT_TOP_STALLED
): MetricsRow[] {
  return rankByDaysInStage(rows.filter((row) => row["Days in Current Stage"] >= 0)).slice(
    0,
    Math.max(0, limit)
  );
}

export function toBarChartSeries(rows: readonly MetricsRow[]): ChartPoint[] {
  return rows.map((row) => ({ label: row["Bundle Name"], value: row["Days in Current Stage"] }));
}

/** Distinct non-empty bundle names, ordered ignoring case. */
export function listBundleNames(bundles: readonly Bundle[]): string[] {
  const names = new Set(bundles.map((bundle) => bundle.name).filter((name) => name.length > 0));
  return [...names].sort(byLowerCase);
}

export function listProjectNames(bundles: readonly Bundle[]): string[] {
  const names = new Set(
    bundles.map((bundle) => bundle.projectName).filter((name) => name.length > 0)
  );
  return [...names].sort();
}

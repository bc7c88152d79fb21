/**
 * Display column catalogs for the three explorer views.
 * Column names are part of the contract with the presentation layer; rows are
 * flat records keyed by them.
 */

export const STAGE_SLOT_COUNT = 4;

export const ALL_BUNDLES_COLUMNS = [
  "Bundle Name",
  "State",
  "Current Stage",
  "Current Stage Assignee",
  "Last Updated",
  "Project Name",
  "Policy Name",
  "Date Bundle Created",
  "Owner",
  "Stage 1 Name",
  "Stage 1 Assignee",
  "Stage 2 Name",
  "Stage 2 Assignee",
  "Stage 3 Name",
  "Stage 3 Assignee",
  "Stage 4 Name",
  "Stage 4 Assignee",
  "Repo Branch",
  "Bundle ID",
] as const;

export type AllBundlesColumn = (typeof ALL_BUNDLES_COLUMNS)[number];
export type AllBundlesRow = Record<AllBundlesColumn, string>;

export const HISTORY_COLUMNS = [
  "Time (UTC)",
  "Action",
  "Stage",
  "User",
  "Project",
  "Bundle",
  "Before",
  "After",
  "Change",
] as const;

export type HistoryColumn = (typeof HISTORY_COLUMNS)[number];
export type HistoryRow = Record<HistoryColumn, string> & {
  /** Pretty-printed field changes of every target, for the detail expansion. */
  rawFieldChanges: string;
};

export const METRICS_COLUMNS = [
  "Bundle Name",
  "Project Name",
  "Policy Name",
  "Current Stage",
  "Current Stage Assignee",
  "Days in Current Stage",
] as const;

export type MetricsColumn = (typeof METRICS_COLUMNS)[number];
export type MetricsRow = Record<Exclude<MetricsColumn, "Days in Current Stage">, string> & {
  /** -1 when the bundle carries no parseable timestamp. */
  "Days in Current Stage": number;
};

export interface ChartPoint {
  label: string;
  value: number;
}

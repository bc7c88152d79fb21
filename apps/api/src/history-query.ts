/**
 * Bundle history query helpers: which bundle a name refers to and which time
 * window the audit trail request covers.
 */
import { GOVERNANCE_ENTITY_TYPES, type Bundle } from "@gov-explorer/shared";
import type { AuditEventQuery } from "./governance-source";
import { compareInstants, isKnownInstant, normalizeInstant } from "./temporal";

export const AUDIT_EVENT_SORT = "-timestamp";

export interface HistoryWindowInput {
  start?: string;
  end?: string;
}

export interface HistoryWindow {
  since?: string;
  until?: string;
}

/**
 * Bundle names are not unique; the most recently created bundle with the name
 * is the one whose history is shown.
 */
export function selectBundleForHistory(bundles: readonly Bundle[], name: string): Bundle | null {
  let selected: Bundle | null = null;
  for (const bundle of bundles) {
    if (bundle.name !== name) continue;
    if (
      !selected ||
      compareInstants(normalizeInstant(bundle.createdAt), normalizeInstant(selected.createdAt)) > 0
    ) {
      selected = bundle;
    }
  }
  return selected;
}

const DATE_ONLY_PATTERN = /^\d{4}[-/]\d{1,2}[-/]\d{1,2}$/;

function resolveBoundary(raw: string | undefined, timeOfDay: string): string | undefined {
  const value = raw?.trim() ?? "";
  if (!value) return undefined;
  if (!isKnownInstant(normalizeInstant(value))) return undefined;
  if (!DATE_ONLY_PATTERN.test(value)) return value;
  const [year, month, day] = value.split(/[-/]/);
  return `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}T${timeOfDay}Z`;
}

/**
 * Turn user-entered start/end dates into the audit query window. Bare dates
 * cover the whole day; unparseable input is dropped.
 */
export function resolveHistoryWindow(input: HistoryWindowInput): HistoryWindow {
  const window: HistoryWindow = {};
  const since = resolveBoundary(input.start, "00:00:00");
  const until = resolveBoundary(input.end, "23:59:59");
  if (since) window.since = since;
  if (until) window.until = until;
  return window;
}

export function buildAuditEventQuery(
  bundleId: string,
  window: HistoryWindow,
  limit: number
): AuditEventQuery {
  return {
    targetType: GOVERNANCE_ENTITY_TYPES.bundle,
    targetId: bundleId,
    limit,
    sort: AUDIT_EVENT_SORT,
    ...window,
  };
}

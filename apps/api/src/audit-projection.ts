/**
 * Audit event projection: summarizes one audit trail event for the history view.
 */
import { GOVERNANCE_ENTITY_TYPES, type AuditEvent, type NamedRef } from "@gov-explorer/shared";
import { UNASSIGNED } from "./bundle-facts";

export type RecognizedFieldKind = "stage" | "state" | "assignee";

export interface FieldChangeSummary {
  before: string;
  after: string;
  /** "" when the event changes none of the recognized fields. */
  fieldKind: RecognizedFieldKind | "";
}

export const NO_FIELD_CHANGE: Readonly<FieldChangeSummary> = Object.freeze({
  before: "",
  after: "",
  fieldKind: "",
});

/**
 * Display text for a raw field value. Absent and empty values (null, "", 0,
 * false, [], {}) all read as "".
 */
export function displayValue(value: unknown): string {
  if (value === null || value === undefined || value === false || value === "") return "";
  if (typeof value === "string") return value;
  if (typeof value === "number") return value === 0 || Number.isNaN(value) ? "" : String(value);
  if (typeof value === "boolean" || typeof value === "bigint") return String(value);
  if (Array.isArray(value)) return value.length === 0 ? "" : JSON.stringify(value);
  if (typeof value === "object") return Object.keys(value).length === 0 ? "" : JSON.stringify(value);
  return "";
}

function firstRefName(refs: readonly NamedRef[] | undefined): string {
  return refs?.[0]?.name || UNASSIGNED;
}

/**
 * Stage the event is about. A related stage entity wins; otherwise a stage
 * field delta renders as "<before> → <after>".
 */
export function affectedStageName(event: AuditEvent): string {
  const related = event.affecting.find(
    (entity) => entity.entityType === GOVERNANCE_ENTITY_TYPES.stage && entity.name
  );
  if (related) return related.name;

  for (const target of event.targets) {
    for (const change of target.fieldChanges) {
      if (change.fieldName === "stage") {
        return `${displayValue(change.before)} → ${displayValue(change.after)}`;
      }
    }
  }
  return "";
}

/**
 * The first stage, state or assignee change in document order. Authors put the
 * primary change first, so later changes of other kinds are not surfaced.
 */
export function dominantFieldChange(event: AuditEvent): FieldChangeSummary {
  for (const target of event.targets) {
    for (const change of target.fieldChanges) {
      if (change.fieldName === "stage" || change.fieldName === "state") {
        return {
          before: displayValue(change.before),
          after: displayValue(change.after),
          fieldKind: change.fieldName === "stage" ? "stage" : "state",
        };
      }
      if (change.fieldName === "assignee") {
        return {
          before: firstRefName(change.removed),
          after: firstRefName(change.added),
          fieldKind: "assignee",
        };
      }
    }
  }
  return { ...NO_FIELD_CHANGE };
}

/** Name of the governance bundle the event targets; the last named one wins. */
export function targetBundleName(event: AuditEvent): string {
  let name = "";
  for (const target of event.targets) {
    if (target.entity.entityType === GOVERNANCE_ENTITY_TYPES.bundle && target.entity.name) {
      name = target.entity.name;
    }
  }
  return name;
}

/** Every target's field changes as received, pretty-printed for the detail expansion. */
export function rawFieldChanges(event: AuditEvent): string {
  return JSON.stringify(
    event.targets.map((target) => target.rawFieldChanges),
    null,
    2
  );
}

/**
 * Keep events matching both filters. An absent or empty list does not restrict.
 * Relative order is preserved.
 */
export function filterEvents(
  events: readonly AuditEvent[],
  actionNames?: readonly string[],
  projectNames?: readonly string[]
): AuditEvent[] {
  const actions = actionNames && actionNames.length > 0 ? new Set(actionNames) : null;
  const projects = projectNames && projectNames.length > 0 ? new Set(projectNames) : null;
  return events.filter(
    (event) =>
      (!actions || actions.has(event.actionName)) &&
      (!projects || projects.has(event.projectName))
  );
}

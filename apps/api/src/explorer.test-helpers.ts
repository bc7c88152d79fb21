import type { AuditEvent, AuditTarget, Bundle, FieldChange } from "@gov-explorer/shared";
import type { AuditEventPage, AuditEventQuery, GovernanceDataSource } from "./governance-source";

// ── Builders ───────────────────────────────────────────────────────────────────

export function makeBundle(overrides: Partial<Bundle> = {}): Bundle {
  return {
    id: "b-1",
    name: "Model Release",
    state: "Active",
    currentStage: "",
    projectName: "credit-risk",
    policyName: "Model Risk Policy",
    owner: "ops-lead",
    createdAt: null,
    stages: [],
    attachments: [],
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<AuditEvent> = {}): AuditEvent {
  return {
    timestamp: "2024-03-01T10:00:00Z",
    actionName: "Change Governance Bundle Stage",
    actorName: "alice",
    projectName: "credit-risk",
    targets: [],
    affecting: [],
    ...overrides,
  };
}

export function bundleTarget(name: string, fieldChanges: FieldChange[] = []): AuditTarget {
  return { entity: { entityType: "governanceBundle", name }, fieldChanges, rawFieldChanges: fieldChanges };
}

export function scalarChange(fieldName: string, before: unknown, after: unknown): FieldChange {
  return { fieldName, before, after };
}

// ── Fake data source ───────────────────────────────────────────────────────────

export interface FakeDataSource extends GovernanceDataSource {
  bundleLimits: number[];
  auditQueries: AuditEventQuery[];
}

export function fakeDataSource(bundles: Bundle[], page: AuditEventPage = { events: [], estimatedMatches: 0 }): FakeDataSource {
  const source: FakeDataSource = {
    bundleLimits: [],
    auditQueries: [],
    async listBundles(limit) {
      source.bundleLimits.push(limit);
      return bundles;
    },
    async listAuditEvents(query) {
      source.auditQueries.push(query);
      return page;
    },
  };
  return source;
}

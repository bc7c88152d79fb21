/**
 * Governance document model barrel.
 *
 * Usage:
 *   import { parseBundleDocuments, parseAuditEventDocuments } from "@gov-explorer/shared";
 *   import type { Bundle, AuditEvent, AllBundlesRow } from "@gov-explorer/shared";
 */

// Primitives
export {
  LenientString,
  RawTimestampSchema,
  NamedRefSchema,
  EntityRefSchema,
  lenientArray,
  parseDocuments,
  type RawTimestamp,
  type NamedRef,
  type EntityRef,
  type DocumentParseResult,
} from "./primitives";

// Bundles
export {
  BundleDocumentSchema,
  StageAssignmentDocumentSchema,
  AttachmentDocumentSchema,
  parseBundleDocuments,
  type Bundle,
  type StageAssignment,
  type Attachment,
} from "./bundle";

// Audit events
export {
  AuditEventDocumentSchema,
  AuditTargetDocumentSchema,
  FieldChangeDocumentSchema,
  GOVERNANCE_ENTITY_TYPES,
  parseAuditEventDocuments,
  type AuditEvent,
  type AuditTarget,
  type FieldChange,
} from "./audit-event";

// Views
export {
  STAGE_SLOT_COUNT,
  ALL_BUNDLES_COLUMNS,
  HISTORY_COLUMNS,
  METRICS_COLUMNS,
  type AllBundlesColumn,
  type AllBundlesRow,
  type HistoryColumn,
  type HistoryRow,
  type MetricsColumn,
  type MetricsRow,
  type ChartPoint,
} from "./views";

export {
  GOVERNANCE_EVENT_CATALOG,
  type GovernanceEventName,
} from "./event-catalog";

/**
 * Audit trail event: one immutable state transition on a governance entity.
 */
import { z } from "zod";
import {
  EntityRefSchema,
  LenientString,
  NamedRefSchema,
  RawTimestampSchema,
  lenientArray,
  parseDocuments,
  type DocumentParseResult,
  type EntityRef,
  type NamedRef,
  type RawTimestamp,
} from "./primitives";

export const GOVERNANCE_ENTITY_TYPES = {
  bundle: "governanceBundle",
  stage: "governancePolicyStage",
} as const;

export interface FieldChange {
  fieldName: string;
  /** Raw JSON value; null when the side is absent. */
  before: unknown;
  after: unknown;
  /** Multi-valued fields (assignee sets) only. */
  added?: NamedRef[];
  removed?: NamedRef[];
}

export interface AuditTarget {
  entity: EntityRef;
  fieldChanges: FieldChange[];
  /** The `fieldChanges` value exactly as received; [] when absent or empty. */
  rawFieldChanges: unknown;
}

export interface AuditEvent {
  timestamp: RawTimestamp;
  actionName: string;
  actorName: string;
  /** Project the event happened in. */
  projectName: string;
  targets: AuditTarget[];
  affecting: EntityRef[];
}

const NamedRefListSchema = z.array(NamedRefSchema).optional().catch(undefined);

export const FieldChangeDocumentSchema = z
  .object({
    fieldName: LenientString,
    before: z.unknown(),
    after: z.unknown(),
    added: NamedRefListSchema,
    removed: NamedRefListSchema,
  })
  .transform((doc): FieldChange => {
    const change: FieldChange = {
      fieldName: doc.fieldName,
      before: doc.before ?? null,
      after: doc.after ?? null,
    };
    if (doc.added) change.added = doc.added;
    if (doc.removed) change.removed = doc.removed;
    return change;
  })
  .catch((): FieldChange => ({ fieldName: "", before: null, after: null }));

const FieldChangeListSchema = lenientArray(FieldChangeDocumentSchema);

export const AuditTargetDocumentSchema = z
  .object({
    entity: EntityRefSchema,
    fieldChanges: z.unknown(),
  })
  .transform(
    (doc): AuditTarget => ({
      entity: doc.entity,
      fieldChanges: FieldChangeListSchema.parse(doc.fieldChanges),
      rawFieldChanges: doc.fieldChanges || [],
    })
  )
  .catch((): AuditTarget => ({ entity: { entityType: "", name: "" }, fieldChanges: [], rawFieldChanges: [] }));

export const AuditEventDocumentSchema = z
  .object({
    timestamp: RawTimestampSchema,
    action: z.object({ eventName: LenientString }).catch(() => ({ eventName: "" })),
    actor: NamedRefSchema,
    in: NamedRefSchema,
    targets: lenientArray(AuditTargetDocumentSchema),
    affecting: lenientArray(EntityRefSchema),
  })
  .transform((doc): AuditEvent => ({
    timestamp: doc.timestamp,
    actionName: doc.action.eventName,
    actorName: doc.actor.name,
    projectName: doc.in.name,
    targets: doc.targets,
    affecting: doc.affecting,
  }));

export function parseAuditEventDocuments(raw: readonly unknown[]): DocumentParseResult<AuditEvent> {
  return parseDocuments(AuditEventDocumentSchema, raw);
}

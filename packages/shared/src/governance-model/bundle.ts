/**
 * Governance bundle: a workflow item moving through named policy stages.
 */
import { z } from "zod";
import {
  LenientString,
  NamedRefSchema,
  RawTimestampSchema,
  lenientArray,
  parseDocuments,
  type DocumentParseResult,
  type RawTimestamp,
} from "./primitives";

export interface StageAssignment {
  stageName: string;
  assigneeName: string;
}

export interface Attachment {
  createdAt: RawTimestamp;
  /** `branch` is "" when the attachment was not produced from a repository. */
  identifier: { branch: string };
}

export interface Bundle {
  id: string;
  name: string;
  state: string;
  currentStage: string;
  projectName: string;
  policyName: string;
  owner: string;
  createdAt: RawTimestamp;
  /** Upstream order; not meaningful for display. */
  stages: StageAssignment[];
  attachments: Attachment[];
}

export const StageAssignmentDocumentSchema = z
  .object({
    stage: NamedRefSchema,
    assignee: NamedRefSchema,
  })
  .transform((doc): StageAssignment => ({
    stageName: doc.stage.name,
    assigneeName: doc.assignee.name,
  }))
  .catch((): StageAssignment => ({ stageName: "", assigneeName: "" }));

export const AttachmentDocumentSchema = z
  .object({
    createdAt: RawTimestampSchema,
    identifier: z.object({ branch: LenientString }).catch(() => ({ branch: "" })),
  })
  .catch((): Attachment => ({ createdAt: null, identifier: { branch: "" } }));

export const BundleDocumentSchema = z
  .object({
    id: LenientString,
    name: LenientString,
    state: LenientString,
    // Older API revisions name the current stage `currentStage`.
    stage: LenientString,
    currentStage: LenientString,
    projectName: LenientString,
    policyName: LenientString,
    projectOwner: LenientString,
    createdBy: z.object({ userName: LenientString }).catch(() => ({ userName: "" })),
    createdAt: RawTimestampSchema,
    stages: lenientArray(StageAssignmentDocumentSchema),
    attachments: lenientArray(AttachmentDocumentSchema),
  })
  .transform((doc): Bundle => ({
    id: doc.id,
    name: doc.name,
    state: doc.state,
    currentStage: doc.stage || doc.currentStage,
    projectName: doc.projectName,
    policyName: doc.policyName,
    owner: doc.projectOwner || doc.createdBy.userName,
    createdAt: doc.createdAt,
    stages: doc.stages,
    attachments: doc.attachments,
  }));

export function parseBundleDocuments(raw: readonly unknown[]): DocumentParseResult<Bundle> {
  return parseDocuments(BundleDocumentSchema, raw);
}

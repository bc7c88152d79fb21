/** Governance audit actions offered as history filter choices. */
export const GOVERNANCE_EVENT_CATALOG = [
  "Create Governance Bundle",
  "Change Governance Bundle Stage",
  "Change Governance Bundle State",
  "Create Governance Bundle Stage Approval Request",
  "Accept Governance Bundle Stage Approval Request",
  "Update Governance Bundle Stage Assignee",
  "Add Policy to Governance Bundle",
  "Deactivate Policy in Governance Bundle",
  "Add Attachment to Bundle",
  "Remove Attachment from Bundle",
  "Submit Results in a Bundle",
  "Copy Governance Bundle results from another Bundle",
] as const;

export type GovernanceEventName = (typeof GOVERNANCE_EVENT_CATALOG)[number];

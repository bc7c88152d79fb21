import { describe, expect, it } from "vitest";
import { BundleDocumentSchema, parseBundleDocuments } from "./bundle";

describe("BundleDocumentSchema", () => {
  it("maps a full governance bundle document onto the model", () => {
    const bundle = BundleDocumentSchema.parse({
      id: "b-1",
      name: "Model Release Q1",
      state: "Active",
      stage: "Review",
      projectName: "credit-risk",
      policyName: "Model Risk Policy",
      projectOwner: "ops-lead",
      createdBy: { userName: "someone-else" },
      createdAt: "2024-01-01T00:00:00Z",
      stages: [
        { stage: { name: "Intake" }, assignee: { name: "Alice" } },
        { stage: { name: "Review" }, assignee: { name: "Bob" } },
      ],
      attachments: [{ createdAt: "2024-02-01T00:00:00Z", identifier: { branch: "main" } }],
    });

    expect(bundle).toEqual({
      id: "b-1",
      name: "Model Release Q1",
      state: "Active",
      currentStage: "Review",
      projectName: "credit-risk",
      policyName: "Model Risk Policy",
      owner: "ops-lead",
      createdAt: "2024-01-01T00:00:00Z",
      stages: [
        { stageName: "Intake", assigneeName: "Alice" },
        { stageName: "Review", assigneeName: "Bob" },
      ],
      attachments: [{ createdAt: "2024-02-01T00:00:00Z", identifier: { branch: "main" } }],
    });
  });

  it("accepts currentStage when stage is absent", () => {
    const bundle = BundleDocumentSchema.parse({ currentStage: "Review" });
    expect(bundle.currentStage).toBe("Review");
  });

  it("falls back to the creator user name for owner", () => {
    const bundle = BundleDocumentSchema.parse({ createdBy: { userName: "jdoe" } });
    expect(bundle.owner).toBe("jdoe");
  });

  it("defaults every missing field", () => {
    const bundle = BundleDocumentSchema.parse({});
    expect(bundle).toEqual({
      id: "",
      name: "",
      state: "",
      currentStage: "",
      projectName: "",
      policyName: "",
      owner: "",
      createdAt: null,
      stages: [],
      attachments: [],
    });
  });

  it("degrades malformed nested values instead of failing", () => {
    const bundle = BundleDocumentSchema.parse({
      id: 42,
      name: ["not", "a", "string"],
      createdAt: { nested: true },
      stages: [null, { stage: null, assignee: { name: "Alice" } }, "junk"],
      attachments: "none",
    });

    expect(bundle.id).toBe("42");
    expect(bundle.name).toBe("");
    expect(bundle.createdAt).toBeNull();
    expect(bundle.stages).toEqual([
      { stageName: "", assigneeName: "" },
      { stageName: "", assigneeName: "Alice" },
      { stageName: "", assigneeName: "" },
    ]);
    expect(bundle.attachments).toEqual([]);
  });

  it("keeps attachment without identifier with an empty branch", () => {
    const bundle = BundleDocumentSchema.parse({
      attachments: [{ createdAt: 1704067200000 }],
    });
    expect(bundle.attachments).toEqual([{ createdAt: 1704067200000, identifier: { branch: "" } }]);
  });
});

describe("parseBundleDocuments", () => {
  it("drops documents that are not objects and counts them", () => {
    const result = parseBundleDocuments([{ name: "A" }, "oops", null, [1, 2], { name: "B" }]);
    expect(result.items.map((bundle) => bundle.name)).toEqual(["A", "B"]);
    expect(result.rejected).toBe(3);
    expect(result.issues).toHaveLength(3);
  });

  it("returns an empty result for an empty list", () => {
    expect(parseBundleDocuments([])).toEqual({ items: [], rejected: 0, issues: [] });
  });
});

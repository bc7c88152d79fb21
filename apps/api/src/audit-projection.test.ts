import { describe, expect, it } from "vitest";
import {
  affectedStageName,
  displayValue,
  dominantFieldChange,
  filterEvents,
  rawFieldChanges,
  targetBundleName,
} from "./audit-projection";
import { bundleTarget, makeEvent, scalarChange } from "./explorer.test-helpers";

describe("displayValue", () => {
  it("renders empty-ish values as an empty string", () => {
    for (const value of [null, undefined, "", 0, false, Number.NaN, [], {}]) {
      expect(displayValue(value)).toBe("");
    }
  });

  it("keeps strings and stringifies other values", () => {
    expect(displayValue("Review")).toBe("Review");
    expect(displayValue(3)).toBe("3");
    expect(displayValue(true)).toBe("true");
    expect(displayValue({ name: "x" })).toBe('{"name":"x"}');
  });
});

describe("affectedStageName", () => {
  it("prefers a related stage entity", () => {
    const event = makeEvent({
      affecting: [
        { entityType: "governanceBundle", name: "Release" },
        { entityType: "governancePolicyStage", name: "Validation" },
      ],
      targets: [bundleTarget("Release", [scalarChange("stage", "Intake", "Review")])],
    });
    expect(affectedStageName(event)).toBe("Validation");
  });

  it("falls back to the stage field delta", () => {
    const event = makeEvent({
      affecting: [{ entityType: "governancePolicyStage", name: "" }],
      targets: [bundleTarget("Release", [scalarChange("stage", "Intake", "Review")])],
    });
    expect(affectedStageName(event)).toBe("Intake → Review");
  });

  it("uses an empty side for a missing value", () => {
    const event = makeEvent({
      targets: [bundleTarget("Release", [scalarChange("stage", null, "Intake")])],
    });
    expect(affectedStageName(event)).toBe(" → Intake");
  });

  it("is empty when the event names no stage", () => {
    expect(affectedStageName(makeEvent())).toBe("");
  });
});

describe("dominantFieldChange", () => {
  it("returns empty values when no target has field changes", () => {
    expect(dominantFieldChange(makeEvent({ targets: [bundleTarget("Release")] }))).toEqual({
      before: "",
      after: "",
      fieldKind: "",
    });
  });

  it("summarizes a state change", () => {
    const event = makeEvent({
      targets: [bundleTarget("Release", [scalarChange("state", "Active", "Complete")])],
    });
    expect(dominantFieldChange(event)).toEqual({ before: "Active", after: "Complete", fieldKind: "state" });
  });

  it("reads assignee changes from removed and added lists", () => {
    const event = makeEvent({
      targets: [
        bundleTarget("Release", [
          { fieldName: "assignee", before: null, after: null, removed: [], added: [{ name: "Dana" }] },
        ]),
      ],
    });
    expect(dominantFieldChange(event)).toEqual({ before: "Unassigned", after: "Dana", fieldKind: "assignee" });
  });

  it("treats missing assignee lists as Unassigned", () => {
    const event = makeEvent({
      targets: [bundleTarget("Release", [{ fieldName: "assignee", before: "x", after: "y" }])],
    });
    expect(dominantFieldChange(event)).toEqual({ before: "Unassigned", after: "Unassigned", fieldKind: "assignee" });
  });

  it("takes the first recognized change in document order", () => {
    const event = makeEvent({
      targets: [
        bundleTarget("Release", [
          scalarChange("description", "old", "new"),
          { fieldName: "assignee", before: null, after: null, removed: [{ name: "Eve" }], added: [{ name: "Finn" }] },
          scalarChange("stage", "Intake", "Review"),
        ]),
        bundleTarget("Release", [scalarChange("state", "Active", "Complete")]),
      ],
    });
    expect(dominantFieldChange(event)).toEqual({ before: "Eve", after: "Finn", fieldKind: "assignee" });
  });

  it("returns a fresh object each time", () => {
    const first = dominantFieldChange(makeEvent());
    first.before = "mutated";
    expect(dominantFieldChange(makeEvent()).before).toBe("");
  });
});

describe("targetBundleName", () => {
  it("uses the last named bundle target", () => {
    const event = makeEvent({
      targets: [
        bundleTarget("First"),
        { entity: { entityType: "project", name: "Not a bundle" }, fieldChanges: [], rawFieldChanges: [] },
        bundleTarget("Second"),
        bundleTarget(""),
      ],
    });
    expect(targetBundleName(event)).toBe("Second");
  });
});

describe("rawFieldChanges", () => {
  it("lists field changes per target", () => {
    const event = makeEvent({
      targets: [bundleTarget("Release", [scalarChange("state", "Active", "Complete")]), bundleTarget("Other")],
    });
    const raw = rawFieldChanges(event);
    expect(JSON.parse(raw)).toEqual([[{ fieldName: "state", before: "Active", after: "Complete" }], []]);
    expect(raw.split("\n")[1]).toBe("  [");
  });
});

describe("filterEvents", () => {
  const events = [
    makeEvent({ actionName: "X", projectName: "p1", actorName: "a" }),
    makeEvent({ actionName: "Y", projectName: "p1", actorName: "b" }),
    makeEvent({ actionName: "X", projectName: "p2", actorName: "c" }),
  ];

  it("keeps every event without filters", () => {
    expect(filterEvents(events)).toEqual(events);
    expect(filterEvents(events, [], [])).toEqual(events);
  });

  it("filters by action name regardless of project", () => {
    expect(filterEvents(events, ["X"], []).map((event) => event.actorName)).toEqual(["a", "c"]);
  });

  it("combines both filters", () => {
    expect(filterEvents(events, ["X"], ["p2"]).map((event) => event.actorName)).toEqual(["c"]);
    expect(filterEvents(events, undefined, ["p1"]).map((event) => event.actorName)).toEqual(["a", "b"]);
  });
});

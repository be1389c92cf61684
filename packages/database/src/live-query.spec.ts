import { StoredDocument } from "./document-store";
import { applyQuery, compareValues, LiveQueryWindow } from "./live-query";

const doc = (id: string, version: number, data: StoredDocument["data"] = {}): StoredDocument => ({ id, version, data });

describe("LiveQueryWindow", () => {
  it("never reports removals on the initial delivery", () => {
    const window = new LiveQueryWindow();
    expect(window.diff([doc("a", 1), doc("b", 1)], true).map((change) => change.type)).toEqual(["added", "added"]);
  });

  it("reports modified only when the version moves", () => {
    const window = new LiveQueryWindow();
    window.diff([doc("a", 1), doc("b", 1)], true);

    const changes = window.diff([doc("a", 1), doc("b", 2), doc("c", 3)], false);
    expect(changes.map((change) => `${change.type}:${change.doc.id}`)).toEqual(["modified:b", "added:c"]);
  });

  it("reports documents that left the window as removed", () => {
    const window = new LiveQueryWindow();
    window.diff([doc("a", 1), doc("b", 1)], true);

    const changes = window.diff([doc("b", 1)], false);
    expect(changes.map((change) => `${change.type}:${change.doc.id}`)).toEqual(["removed:a"]);
  });
});

describe("applyQuery", () => {
  it("breaks ordering ties by id", () => {
    const docs = [doc("b", 1, { timestamp: 5 }), doc("a", 1, { timestamp: 5 }), doc("c", 1, { timestamp: 9 })];
    expect(applyQuery(docs, { orderBy: { field: "timestamp", direction: "desc" } }).map((d) => d.id)).toEqual(["c", "a", "b"]);
  });

  it("treats a missing where field as no match", () => {
    const docs = [doc("a", 1, { userId: "u1" }), doc("b", 1, {})];
    expect(applyQuery(docs, { where: [{ field: "userId", value: "u1" }] }).map((d) => d.id)).toEqual(["a"]);
  });
});

describe("compareValues", () => {
  it("orders by type before value", () => {
    expect(compareValues(null, false)).toBeLessThan(0);
    expect(compareValues(3, "1")).toBeLessThan(0);
    expect(compareValues("b", "a")).toBeGreaterThan(0);
  });
});

import { describe, it, expect } from "vitest";
import {
  buildLocationPaths,
  collectDescendantIds,
  wouldCreateCycle,
  type LocationNode,
} from "../tree";

const nodes: LocationNode[] = [
  { id: "wh", parentId: null, name: "Warehouse" },
  { id: "rack-a", parentId: "wh", name: "Rack A" },
  { id: "shelf-1", parentId: "rack-a", name: "Shelf 1" },
  { id: "van", parentId: null, name: "Van" },
];

describe("buildLocationPaths", () => {
  it("joins ancestor names from the root down", () => {
    const paths = buildLocationPaths(nodes);
    expect(paths.get("shelf-1")).toBe("Warehouse / Rack A / Shelf 1");
    expect(paths.get("van")).toBe("Van");
  });

  it("stops at a cycle instead of looping", () => {
    const paths = buildLocationPaths([
      { id: "a", parentId: "b", name: "A" },
      { id: "b", parentId: "a", name: "B" },
    ]);
    expect(paths.get("a")).toBe("B / A");
  });
});

describe("collectDescendantIds", () => {
  it("includes grandchildren but not the root", () => {
    expect([...collectDescendantIds(nodes, "wh")].sort()).toEqual([
      "rack-a",
      "shelf-1",
    ]);
  });
});

describe("wouldCreateCycle", () => {
  it("rejects moving a location under itself or a descendant", () => {
    expect(wouldCreateCycle(nodes, "wh", "wh")).toBe(true);
    expect(wouldCreateCycle(nodes, "wh", "shelf-1")).toBe(true);
  });

  it("allows moving to an unrelated branch or to the top level", () => {
    expect(wouldCreateCycle(nodes, "rack-a", "van")).toBe(false);
    expect(wouldCreateCycle(nodes, "rack-a", null)).toBe(false);
  });
});

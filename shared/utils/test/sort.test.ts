import { describe, it, expect } from "vitest";
import { sortByKey } from "../src/sort";

describe("sortByKey", () => {
  it("should sort ascending and keep ties in input order", () => {
    const items = [
      { id: "a", weight: 2 },
      { id: "b", weight: 1 },
      { id: "c", weight: 2 },
    ];

    expect(sortByKey(items, (item) => item.weight).map((i) => i.id)).toEqual([
      "b",
      "a",
      "c",
    ]);
  });

  it("should sort descending", () => {
    const items = [{ id: "a", n: 1 }, { id: "b", n: 3 }, { id: "c", n: 2 }];

    expect(sortByKey(items, (item) => item.n, "desc").map((i) => i.id)).toEqual(
      ["b", "c", "a"],
    );
  });

  it("should keep keyless items after keyed ones", () => {
    const items: Array<{ id: string; weight?: number }> = [
      { id: "none-1" },
      { id: "two", weight: 2 },
      { id: "none-2" },
      { id: "one", weight: 1 },
    ];

    expect(sortByKey(items, (item) => item.weight).map((i) => i.id)).toEqual([
      "one",
      "two",
      "none-1",
      "none-2",
    ]);
  });
});

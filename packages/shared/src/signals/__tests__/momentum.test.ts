import { describe, it, expect } from "vitest";
import { categoryMomentum, classifyMomentum } from "../momentum.js";

describe("classifyMomentum", () => {
  it("reports percentage change with a ten percent stable band", () => {
    expect(classifyMomentum(5, 10)).toEqual({ changePct: -50, momentum: "declining" });
    expect(classifyMomentum(10, 10)).toEqual({ changePct: 0, momentum: "stable" });
    expect(classifyMomentum(11, 10)).toEqual({ changePct: 10, momentum: "stable" });
    expect(classifyMomentum(12, 10)).toEqual({ changePct: 20, momentum: "rising" });
  });

  it("has no percentage when the previous window was empty", () => {
    expect(classifyMomentum(3, 0)).toEqual({ changePct: null, momentum: "rising" });
    expect(classifyMomentum(0, 0)).toEqual({ changePct: null, momentum: "stable" });
  });
});

describe("categoryMomentum", () => {
  it("covers categories from both windows, busiest first", () => {
    const current = { funding: 3, product: 1 };
    const previous = { funding: 1, regulation: 2, research: 0 };

    expect(categoryMomentum(current, previous)).toEqual([
      { category: "funding", current: 3, previous: 1, changePct: 200, momentum: "rising" },
      { category: "product", current: 1, previous: 0, changePct: null, momentum: "rising" },
      { category: "regulation", current: 0, previous: 2, changePct: -100, momentum: "declining" },
    ]);
  });

  it("works from totals well past any page size", () => {
    expect(categoryMomentum({ product: 2400 }, { product: 2000 })).toEqual([
      { category: "product", current: 2400, previous: 2000, changePct: 20, momentum: "rising" },
    ]);
  });
});

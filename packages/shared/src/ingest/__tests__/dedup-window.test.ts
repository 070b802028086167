import { describe, it, expect } from "vitest";
import { DedupWindow } from "../dedup-window.js";

const T0 = new Date("2026-01-10T00:00:00.000Z");
const at = (ms: number) => new Date(T0.getTime() + ms);

describe("DedupWindow", () => {
  it("evicts the oldest entry beyond capacity", () => {
    const window = new DedupWindow({ capacity: 2, maxAgeMs: 60_000 });
    window.add("a", "feed", at(0));
    window.add("b", "feed", at(1));
    window.add("c", "feed", at(2));

    expect(window.size).toBe(2);
    expect(window.has("a", at(3))).toBe(false);
    expect(window.has("b", at(3))).toBe(true);
    expect(window.has("c", at(3))).toBe(true);
  });

  it("keeps an entry until it is strictly older than maxAgeMs", () => {
    const window = new DedupWindow({ capacity: 10, maxAgeMs: 1000 });
    window.add("a", "feed", at(0));

    expect(window.has("a", at(1000))).toBe(true);
    expect(window.has("a", at(1001))).toBe(false);
  });

  it("moves a re-added title to the newest position", () => {
    const window = new DedupWindow({ capacity: 2, maxAgeMs: 60_000 });
    window.add("a", "feed", at(0));
    window.add("b", "feed", at(1));
    window.add("a", "feed", at(2));
    window.add("c", "feed", at(3));

    expect(window.snapshot().map((e) => e.titleNorm)).toEqual(["a", "c"]);
  });

  it("rebuilds from unordered rows keeping the newest within capacity", () => {
    const window = DedupWindow.fromEntries(
      [
        { titleNorm: "new", source: "feed", seenAt: at(3000).toISOString() },
        { titleNorm: "old", source: "feed", seenAt: at(1000).toISOString() },
        { titleNorm: "mid", source: "feed", seenAt: at(2000).toISOString() },
      ],
      { capacity: 2, maxAgeMs: 60_000 },
      at(4000),
    );

    expect(window.snapshot().map((e) => e.titleNorm)).toEqual(["mid", "new"]);
  });

  it("rejects a capacity below one", () => {
    expect(() => new DedupWindow({ capacity: 0, maxAgeMs: 1000 })).toThrow(RangeError);
  });
});

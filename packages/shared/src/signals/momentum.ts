import type { CategoryCounts } from "../stores.js";
import { CATEGORIES, type CategoryMomentum, type Momentum } from "../types.js";

/** Percentage change beyond which a category counts as moving */
export const MOMENTUM_BAND_PCT = 10;

export function classifyMomentum(current: number, previous: number): {
  changePct: number | null;
  momentum: Momentum;
} {
  if (previous === 0) {
    return { changePct: null, momentum: current > 0 ? "rising" : "stable" };
  }
  const changePct = Math.round((1000 * (current - previous)) / previous) / 10;
  if (changePct > MOMENTUM_BAND_PCT) return { changePct, momentum: "rising" };
  if (changePct < -MOMENTUM_BAND_PCT) return { changePct, momentum: "declining" };
  return { changePct, momentum: "stable" };
}

/**
 * Compares per-category volume of two equal-length windows. Categories
 * present in either window are reported, busiest current window first.
 */
export function categoryMomentum(
  current: CategoryCounts,
  previous: CategoryCounts,
): CategoryMomentum[] {
  return CATEGORIES.filter((category) => (current[category] ?? 0) + (previous[category] ?? 0) > 0)
    .map((category) => {
      const c = current[category] ?? 0;
      const p = previous[category] ?? 0;
      return { category, current: c, previous: p, ...classifyMomentum(c, p) };
    })
    .sort((a, b) => b.current - a.current || a.category.localeCompare(b.category));
}

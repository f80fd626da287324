import { describe, expect, it } from "vitest";
import { colorForPercent, formatPercent, heatmapTier } from "../grading.js";

describe("colorForPercent", () => {
  it.each([
    [100, "#26a269"],
    [99.9, "#2ec27e"],
    [80, "#2ec27e"],
    [79, "#e5a50a"],
    [50, "#e5a50a"],
    [49.5, "#ff7800"],
    [20, "#ff7800"],
    [19, "#c01c28"],
    [0, "#c01c28"],
  ])("%d%% is %s", (pct, color) => {
    expect(colorForPercent(pct)).toBe(color);
  });
});

describe("heatmapTier", () => {
  it.each([
    [100, "green"],
    [75, "yellow"],
    [74.9, "orange"],
    [50, "orange"],
    [49, "red"],
    [0.1, "red"],
    [0, "gray"],
  ])("%d%% is %s", (pct, tier) => {
    expect(heatmapTier(pct)).toBe(tier);
  });
});

describe("formatPercent", () => {
  it("rounds to a whole number", () => {
    expect(formatPercent(87.4)).toBe("87%");
    expect(formatPercent(99.6)).toBe("100%");
  });
});

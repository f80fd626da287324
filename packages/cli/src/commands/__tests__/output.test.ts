import { Chalk } from "chalk";
import { describe, expect, it } from "vitest";
import { percentBar, statLine } from "../output.js";

describe("percentBar", () => {
  it("fills proportionally", () => {
    expect(percentBar(50, 10)).toBe("█████░░░░░");
    expect(percentBar(0, 4)).toBe("░░░░");
    expect(percentBar(100, 4)).toBe("████");
  });

  it("clamps out-of-range values", () => {
    expect(percentBar(120, 4)).toBe("████");
    expect(percentBar(-5, 4)).toBe("░░░░");
  });
});

describe("statLine", () => {
  const chalk = new Chalk({ level: 0 });

  it("aligns the percentage before the bar", () => {
    expect(statLine(chalk, 7.4, "DNF")).toBe(`  7% ${"█".repeat(1)}${"░".repeat(19)} DNF`);
  });

  it("appends a note", () => {
    expect(statLine(chalk, 0, "Broken", "unavailable")).toBe(`  0% ${"░".repeat(20)} Broken (unavailable)`);
  });
});

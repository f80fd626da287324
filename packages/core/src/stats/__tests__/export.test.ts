import { describe, expect, it } from "vitest";
import { formatExport, toCsv, toExportRows, toJson } from "../export.js";

const rows = toExportRows([
  { slug: "anaconda", name: "Anaconda", translatedPct: 95.5 },
  { slug: "gnome-software", name: 'Software, "GNOME"', translatedPct: 40 },
]);

describe("export", () => {
  it("maps overview entries to rows", () => {
    expect(rows).toEqual([
      { project: "anaconda", name: "Anaconda", translated_percent: 95.5 },
      { project: "gnome-software", name: 'Software, "GNOME"', translated_percent: 40 },
    ]);
  });

  it("writes CSV with a header and quoted fields", () => {
    expect(toCsv(rows)).toBe(
      'project,name,translated_percent\nanaconda,Anaconda,95.5\ngnome-software,"Software, ""GNOME""",40\n'
    );
  });

  it("writes only the header for no rows", () => {
    expect(toCsv([])).toBe("project,name,translated_percent\n");
  });

  it("writes indented JSON", () => {
    expect(JSON.parse(toJson(rows))).toEqual(rows);
    expect(toJson([])).toBe("[]\n");
  });

  it("dispatches on format", () => {
    expect(formatExport(rows, "csv")).toBe(toCsv(rows));
    expect(formatExport(rows, "json")).toBe(toJson(rows));
  });
});

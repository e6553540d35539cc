import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Enricher } from "../../ai/enrichment.js";
import { LogStore } from "../../store/database.js";
import { ValidationError } from "../../store/validation.js";
import { ReportService, resolvePeriod } from "../service.js";

const NOW = new Date(2024, 2, 15, 12);

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("resolvePeriod", () => {
  it("uses the mode window without explicit bounds", () => {
    expect(resolvePeriod("weekly", undefined, undefined, NOW)).toEqual({ start: "2024-03-09", end: "2024-03-15" });
  });

  it("lets explicit bounds win, open on either side", () => {
    expect(resolvePeriod("monthly", "2024-01-01", "2024-01-31", NOW)).toEqual({ start: "2024-01-01", end: "2024-01-31" });
    expect(resolvePeriod("weekly", "2024-01-01", "", NOW)).toEqual({ start: "2024-01-01", end: undefined });
  });

  it("rejects an inverted range", () => {
    expect(() => resolvePeriod("weekly", "2024-02-01", "2024-01-01", NOW)).toThrow(
      "Start date 2024-02-01 is after end date 2024-01-01"
    );
    expect(() => resolvePeriod("weekly", "01/01/2024", undefined, NOW)).toThrow(ValidationError);
  });
});

describe("ReportService", () => {
  let store: LogStore;

  beforeEach(async () => {
    store = await LogStore.open(null, () => NOW);
    store.addLog({ project: "Website", description: "Fixed login", date: "2024-03-14" });
    store.addLog({ project: "API", description: "Added search", date: "2024-03-10" });
    store.addLog({ project: "API", description: "Too old", date: "2024-03-01" });
  });

  afterEach(() => {
    store.close();
  });

  it("builds a weekly report from stored entries", async () => {
    const reports = new ReportService({ store, logger: createLogger(), clock: () => NOW });
    const report = await reports.generateReport("weekly");

    expect(report.text).toBe(
      [
        "Report Period: 03/09 - 03/15",
        "=".repeat(60),
        "",
        "Project: API",
        "-".repeat(60),
        "  * 03/10 - Added search",
        "",
        "Project: Website",
        "-".repeat(60),
        "  * 03/14 - Fixed login",
        "",
      ].join("\n")
    );
    expect(report).toMatchObject({
      mode: "weekly",
      period: { start: "2024-03-09", end: "2024-03-15" },
      template: "standard",
      entryCount: 2,
      projectCount: 2,
      enriched: false,
    });
  });

  it("follows the stored template setting", async () => {
    store.setSetting("report_template", "compact");
    const reports = new ReportService({ store, logger: createLogger(), clock: () => NOW });

    const report = await reports.generateReport("weekly");
    expect(report.text.split("\n").slice(0, 3)).toEqual(["Project: API", "-".repeat(60), "- 03/10: Added search"]);
  });

  it("calls the enricher once and applies its lines to both renderings", async () => {
    const enrich = vi.fn<Enricher["enrich"]>(async () => ({
      Website: [{ date: "03/14", description: "Fixed the login flow." }],
    }));
    const reports = new ReportService({ store, logger: createLogger(), enricher: { enrich }, clock: () => NOW });

    const report = await reports.generateReport("weekly");

    expect(enrich).toHaveBeenCalledTimes(1);
    expect(enrich.mock.calls[0][1].mode).toBe("weekly");
    expect(report.enriched).toBe(true);
    expect(report.text).toContain("  * 03/14 - Fixed the login flow.");
    expect(report.html).toContain("<li><strong>03/14</strong> - Fixed the login flow.</li>");
  });

  it("skips the enricher for an empty period", async () => {
    const enrich = vi.fn<Enricher["enrich"]>(async () => ({}));
    const reports = new ReportService({ store, logger: createLogger(), enricher: { enrich }, clock: () => NOW });

    const report = await reports.generateReport("weekly", "2023-01-01", "2023-01-31");

    expect(enrich).not.toHaveBeenCalled();
    expect(report.text).toBe("No logs found for this period.");
    expect(report.html).toBe("<p>No logs found for this period.</p>");
  });
});

import { describe, it, expect } from "vitest";
import { groupByProject } from "../../report/assembler.js";
import { getTemplate } from "../../report/templates.js";
import { LogEntry } from "../../store/types.js";
import { ENRICHMENT_SYSTEM_INSTRUCTION, buildEnrichmentPrompt, treatmentFor } from "../prompt.js";

function entries(project: string, count: number): LogEntry[] {
  return Array.from({ length: count }, (_, i) => ({
    id: i + 1,
    project,
    description: `${project} task ${i + 1}`,
    date: `2024-03-${String(10 + i).padStart(2, "0")}`,
    createdAt: "2024-03-15T09:00:00.000Z",
  }));
}

const OPTIONS = {
  template: getTemplate("standard"),
  summaryPoints: "3-5",
  summaryThreshold: 2,
  customInstructions: "",
};

describe("treatmentFor", () => {
  it("summarizes only above the threshold", () => {
    expect(treatmentFor(5, 5)).toBe("polish");
    expect(treatmentFor(6, 5)).toBe("summarize");
  });
});

describe("buildEnrichmentPrompt", () => {
  it("marks each project with its treatment and lists formatted entries", () => {
    const grouped = groupByProject([...entries("API", 3), ...entries("Docs", 1)]);
    const { system, prompt } = buildEnrichmentPrompt(grouped, OPTIONS);

    expect(system).toBe(ENRICHMENT_SYSTEM_INSTRUCTION);
    expect(prompt).toContain(
      "Project: API (SUMMARIZE, 3 entries)\n- 03/12: API task 3\n- 03/11: API task 2\n- 03/10: API task 1"
    );
    expect(prompt).toContain("Project: Docs (POLISH, 1 entries)\n- 03/10: Docs task 1");
    expect(prompt).toContain('uses the format MM/DD (e.g. 03/15). A range is written as "MM/DD - MM/DD".');
    expect(prompt).not.toContain("Additional instructions:");
  });

  it("appends custom instructions before the answer format", () => {
    const grouped = groupByProject(entries("API", 1));
    const { prompt } = buildEnrichmentPrompt(grouped, { ...OPTIONS, customInstructions: "Mention ticket numbers." });

    const custom = prompt.indexOf("Additional instructions:\nMention ticket numbers.");
    expect(custom).toBeGreaterThan(0);
    expect(custom).toBeLessThan(prompt.indexOf("Respond with ONLY a JSON object"));
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ReportService } from "../../report/service.js";
import { LogStore } from "../../store/database.js";
import { ToolDeps, ToolResult, handleToolCall } from "../handlers.js";

const NOW = new Date(2024, 2, 15, 12);

function textOf(result: ToolResult): string {
  return result.content.map((c) => c.text).join("");
}

describe("handleToolCall", () => {
  let store: LogStore;
  let deps: ToolDeps;

  beforeEach(async () => {
    store = await LogStore.open(null, () => NOW);
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    deps = { store, reports: new ReportService({ store, logger, clock: () => NOW }) };
  });

  afterEach(() => {
    store.close();
  });

  it("logs work with defaults", async () => {
    const result = await handleToolCall("log_work", { description: "Reviewed PRs", date: "2024-03-14" }, deps);

    expect(result.isError).toBeUndefined();
    expect(textOf(result)).toBe("Logged entry #1\nProject: Misc\nDate: 2024-03-14");
  });

  it("lists entries newest first", async () => {
    store.addLog({ project: "API", description: "older", date: "2024-03-10" });
    store.addLog({ project: "Web", description: "newer", date: "2024-03-12" });

    const result = await handleToolCall("list_logs", {}, deps);
    expect(textOf(result)).toBe("Log entries (2):\n#2 2024-03-12 [Web] newer\n#1 2024-03-10 [API] older");
  });

  it("reports missing entries as errors", async () => {
    const update = await handleToolCall("update_log", { id: 9, description: "x" }, deps);
    expect(update).toEqual({ content: [{ type: "text", text: "Log entry #9 not found." }], isError: true });

    const remove = await handleToolCall("delete_log", { id: 9 }, deps);
    expect(textOf(remove)).toBe("Log entry #9 not found.");
  });

  it("updates and deletes existing entries", async () => {
    const { id } = store.addLog({ project: "API", description: "draft", date: "2024-03-10" });

    expect(textOf(await handleToolCall("update_log", { id, description: "final", project: "API" }, deps))).toBe(
      `Updated entry #${id}`
    );
    expect(store.getLog(id)?.description).toBe("final");
    expect(textOf(await handleToolCall("delete_log", { id }, deps))).toBe(`Deleted entry #${id}`);
  });

  it("lists projects", async () => {
    expect(textOf(await handleToolCall("list_projects", {}, deps))).toBe("No projects found.");
    store.addLog({ project: "Web", description: "x", date: "2024-03-10" });
    store.addLog({ project: "API", description: "y", date: "2024-03-10" });
    expect(textOf(await handleToolCall("list_projects", {}, deps))).toBe("Projects (2):\n- API\n- Web");
  });

  it("generates a report in the requested format", async () => {
    store.addLog({ project: "API", description: "Added <search>", date: "2024-03-14" });

    const html = await handleToolCall("generate_report", { mode: "weekly", format: "html" }, deps);
    expect(textOf(html)).toBe(
      "<p><strong>Report Period:</strong> 03/09 - 03/15</p><h4>API</h4><ul><li><strong>03/14</strong> - Added &lt;search&gt;</li></ul>"
    );
  });

  it("turns validation failures into error results", async () => {
    const result = await handleToolCall("log_work", { description: "x", date: "yesterday" }, deps);
    expect(result).toEqual({
      content: [{ type: "text", text: "Error: Invalid date format, expected YYYY-MM-DD" }],
      isError: true,
    });
  });

  it("rejects unknown tools", async () => {
    expect(await handleToolCall("make_coffee", {}, deps)).toEqual({
      content: [{ type: "text", text: "Unknown tool: make_coffee" }],
      isError: true,
    });
  });
});

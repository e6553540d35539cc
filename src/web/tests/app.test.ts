import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Server } from "http";
import { z } from "zod";
import { ReportService } from "../../report/service.js";
import { LogStore } from "../../store/database.js";
import { createApp } from "../app.js";

const NOW = new Date(2024, 2, 15, 12);

describe("web app", () => {
  let store: LogStore;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    store = await LogStore.open(null, () => NOW);
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const reports = new ReportService({ store, logger, clock: () => NOW });
    const app = createApp({ store, reports, logger, clock: () => NOW });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("expected a TCP address");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    store.close();
  });

  function post(path: string, body: unknown) {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("adds a log entry", async () => {
    const res = await post("/add_log", { project: "Web", description: "Fixed login", date: "2024-03-14" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, id: 1, message: "Log entry added successfully" });
    expect(store.getLog(1)).toMatchObject({ project: "Web", description: "Fixed login", date: "2024-03-14" });
  });

  it("accepts form posts and defaults the date to today", async () => {
    const res = await fetch(`${baseUrl}/add_log`, {
      method: "POST",
      body: new URLSearchParams({ project: "", description: "Standup" }),
    });

    expect(res.status).toBe(200);
    expect(store.getLog(1)).toMatchObject({ project: "Misc", description: "Standup", date: "2024-03-15" });
  });

  it("rejects invalid entries with 400", async () => {
    const missing = await post("/add_log", { project: "Web" });
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ success: false, error: "Description is required" });

    const wrongType = await post("/add_log", { description: 5 });
    expect(await wrongType.json()).toEqual({ success: false, error: "Project, description and date must be text" });
  });

  it("updates and deletes, with 404 for unknown ids", async () => {
    const { id } = store.addLog({ project: "Web", description: "draft", date: "2024-03-12" });

    const updated = await post(`/update_log/${id}`, { project: "Web", description: "final", date: "2024-03-12" });
    expect(await updated.json()).toEqual({ success: true, message: "Log entry updated" });
    expect(store.getLog(id)?.description).toBe("final");

    const unknown = await post("/delete_log/99", {});
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({ success: false, error: "Log entry not found" });

    const badId = await post("/delete_log/abc", {});
    expect(badId.status).toBe(400);

    expect((await post(`/delete_log/${id}`, {})).status).toBe(200);
    expect(store.getLog(id)).toBeNull();
  });

  it("clears every entry", async () => {
    store.addLog({ project: "A", description: "x", date: "2024-03-12" });
    store.addLog({ project: "B", description: "y", date: "2024-03-12" });

    const res = await post("/clear_all", {});
    expect(await res.json()).toEqual({ success: true, message: "All log entries cleared", removed: 2 });
    expect(store.listLogs()).toEqual([]);
  });

  it("serves reports as JSON and rejects unknown modes", async () => {
    store.addLog({ project: "API", description: "Added search", date: "2024-03-14" });

    const res = await fetch(`${baseUrl}/api/report/weekly`);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ success: true, period: { start: "2024-03-09", end: "2024-03-15" } });
    const { text } = z.object({ text: z.string() }).parse(body);
    expect(text.split("\n")[5]).toBe("  * 03/14 - Added search");

    const bad = await fetch(`${baseUrl}/api/report/yearly`);
    expect(bad.status).toBe(400);

    const inverted = await fetch(`${baseUrl}/api/report/weekly?start=2024-03-10&end=2024-03-01`);
    expect(inverted.status).toBe(400);
    expect(await inverted.json()).toEqual({ success: false, error: "Start date 2024-03-10 is after end date 2024-03-01" });
  });

  it("renders the page with entries and a report", async () => {
    store.addLog({ project: "API", description: "Added <search>", date: "2024-03-14" });

    const page = await (await fetch(`${baseUrl}/report/weekly`)).text();
    expect(page).toContain("<td>Added &lt;search&gt;</td>");
    expect(page).toContain("<h4>API</h4>");
    expect(page).toContain('<input name="date" type="date" value="2024-03-15">');
  });

  it("saves settings and masks the api key", async () => {
    const saved = await post("/api/settings", { ai_api_key: "test-secret-value", ai_timeout: 60, ai_enabled_weekly: true });
    expect(await saved.json()).toEqual({
      success: true,
      updated: ["ai_api_key", "ai_timeout", "ai_enabled_weekly"],
    });
    expect(store.getSetting("ai_enabled_weekly")).toBe("true");

    const res = await fetch(`${baseUrl}/api/settings`);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ success: true });
    expect(z.object({ settings: z.record(z.string()) }).parse(body).settings).toEqual({
      ai_api_key: "test****ue",
      ai_enabled_weekly: "true",
      ai_timeout: "60",
    });

    await post("/api/settings", { ai_api_key: "test****ue" });
    expect(store.getSetting("ai_api_key")).toBe("test-secret-value");
  });

  it("rejects unknown settings", async () => {
    const res = await post("/api/settings", { colour: "blue" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'Unknown setting "colour"' });
  });
});

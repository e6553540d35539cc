import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, existsSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { LogStore } from "../database.js";

const CLOCK = () => new Date("2024-03-15T12:00:00.000Z");

describe("LogStore", () => {
  let store: LogStore;

  beforeEach(async () => {
    store = await LogStore.open(null, CLOCK);
  });

  afterEach(() => {
    store.close();
  });

  it("adds and reads back an entry", () => {
    const added = store.addLog({ project: "Website", description: "Fixed login", date: "2024-03-14" });

    expect(added).toEqual({
      id: 1,
      project: "Website",
      description: "Fixed login",
      date: "2024-03-14",
      createdAt: "2024-03-15T12:00:00.000Z",
    });
    expect(store.getLog(1)).toEqual(added);
    expect(store.getLog(99)).toBeNull();
  });

  it("lists newest first within inclusive bounds", () => {
    store.addLog({ project: "A", description: "one", date: "2024-03-08" });
    store.addLog({ project: "A", description: "two", date: "2024-03-09" });
    store.addLog({ project: "B", description: "three", date: "2024-03-15" });
    store.addLog({ project: "B", description: "four", date: "2024-03-15" });

    expect(store.listLogs().map((e) => e.description)).toEqual(["four", "three", "two", "one"]);
    expect(
      store.listLogs({ start: "2024-03-09", end: "2024-03-15" }).map((e) => e.description)
    ).toEqual(["four", "three", "two"]);
    expect(store.listLogs({ limit: 1 }).map((e) => e.description)).toEqual(["four"]);
  });

  it("reports whether update and delete found the entry", () => {
    const { id } = store.addLog({ project: "A", description: "draft", date: "2024-03-10" });

    expect(store.updateLog(id, { project: "B", description: "final", date: "2024-03-11" })).toBe(true);
    expect(store.getLog(id)).toMatchObject({ project: "B", description: "final", date: "2024-03-11" });
    expect(store.updateLog(id + 1, { project: "B", description: "x", date: "2024-03-11" })).toBe(false);

    expect(store.deleteLog(id)).toBe(true);
    expect(store.deleteLog(id)).toBe(false);
  });

  it("clears every entry and lists distinct projects", () => {
    store.addLog({ project: "Zeta", description: "x", date: "2024-03-10" });
    store.addLog({ project: "Alpha", description: "y", date: "2024-03-10" });
    store.addLog({ project: "Alpha", description: "z", date: "2024-03-11" });

    expect(store.getProjects()).toEqual(["Alpha", "Zeta"]);
    expect(store.getStats()).toEqual({
      logCount: 3,
      projectCount: 2,
      lastLogged: "2024-03-15T12:00:00.000Z",
    });
    expect(store.clearAll()).toBe(3);
    expect(store.listLogs()).toEqual([]);
    expect(store.getStats().lastLogged).toBeNull();
  });

  it("keeps the last written setting", () => {
    expect(store.getSetting("report_template")).toBeUndefined();
    store.setSetting("report_template", "compact");
    store.setSettings({ report_template: "iso", ai_timeout: "60" });

    expect(store.getSetting("report_template")).toBe("iso");
    expect(store.getSettings()).toEqual({ ai_timeout: "60", report_template: "iso" });
  });
});

describe("LogStore persistence", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "worklog-store-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes the database file and reloads it", async () => {
    const dbPath = join(dir, "nested", "worklog.db");
    const first = await LogStore.open(dbPath, CLOCK);
    first.addLog({ project: "Website", description: "Persisted", date: "2024-03-14" });
    first.setSetting("ai_provider", "gemini");
    first.close();

    expect(existsSync(dbPath)).toBe(true);

    const second = await LogStore.open(dbPath, CLOCK);
    expect(second.listLogs().map((e) => e.description)).toEqual(["Persisted"]);
    expect(second.getSetting("ai_provider")).toBe("gemini");
    second.close();
  });
});

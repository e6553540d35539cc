import initSqlJs from "sql.js";
import type { Database, SqlValue } from "sql.js";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { Config, getDatabasePath } from "../config/index.js";
import { LogChanges, LogEntry, LogQuery, LogSource, NewLogEntry } from "./types.js";

let SQL: Awaited<ReturnType<typeof initSqlJs>> | null = null;

async function getSqlJs() {
  if (!SQL) {
    SQL = await initSqlJs();
  }
  return SQL;
}

function asText(value: SqlValue): string {
  if (value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return Buffer.from(value).toString("utf-8");
}

function asInteger(value: SqlValue): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && /^\d+$/.test(value)) return Number(value);
  throw new Error(`Expected an integer column, got ${value === null ? "null" : typeof value}`);
}

const LOG_COLUMNS = "id, project, description, date, created_at";

function rowToLogEntry(row: SqlValue[]): LogEntry {
  return {
    id: asInteger(row[0]),
    project: asText(row[1]),
    description: asText(row[2]),
    date: asText(row[3]),
    createdAt: asText(row[4]),
  };
}

/**
 * SQLite-backed store for log entries and settings. The whole database
 * lives in memory and is written back to `dbPath` after every change;
 * a null path keeps it in memory only.
 */
export class LogStore implements LogSource {
  private db: Database;
  private dbPath: string | null;
  private clock: () => Date;

  private constructor(db: Database, dbPath: string | null, clock: () => Date) {
    this.db = db;
    this.dbPath = dbPath;
    this.clock = clock;
  }

  static async open(dbPath: string | null, clock: () => Date = () => new Date()): Promise<LogStore> {
    const SQL = await getSqlJs();
    let db: Database;

    if (dbPath && existsSync(dbPath)) {
      db = new SQL.Database(readFileSync(dbPath));
    } else {
      if (dbPath) {
        const dir = dirname(dbPath);
        if (!existsSync(dir)) {
          mkdirSync(dir, { recursive: true });
        }
      }
      db = new SQL.Database();
    }

    const store = new LogStore(db, dbPath, clock);
    store.initializeSchema();
    return store;
  }

  static async create(config: Config): Promise<LogStore> {
    return LogStore.open(getDatabasePath(config));
  }

  private initializeSchema(): void {
    this.db.run(`
      CREATE TABLE IF NOT EXISTS logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        project TEXT NOT NULL,
        description TEXT NOT NULL,
        date TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_logs_date ON logs(date);
    `);
    this.save();
  }

  private save(): void {
    if (!this.dbPath) return;
    const data = this.db.export();
    writeFileSync(this.dbPath, Buffer.from(data));
  }

  addLog(entry: NewLogEntry): LogEntry {
    const createdAt = this.clock().toISOString();
    this.db.run(
      "INSERT INTO logs (project, description, date, created_at) VALUES (?, ?, ?, ?)",
      [entry.project, entry.description, entry.date, createdAt]
    );
    const result = this.db.exec("SELECT last_insert_rowid()");
    const id = asInteger(result[0].values[0][0]);
    this.save();
    return { id, ...entry, createdAt };
  }

  getLog(id: number): LogEntry | null {
    const results = this.db.exec(`SELECT ${LOG_COLUMNS} FROM logs WHERE id = ?`, [id]);
    if (results.length === 0 || results[0].values.length === 0) {
      return null;
    }
    return rowToLogEntry(results[0].values[0]);
  }

  listLogs(query: LogQuery = {}): LogEntry[] {
    const clauses: string[] = [];
    const params: SqlValue[] = [];

    if (query.start) {
      clauses.push("date >= ?");
      params.push(query.start);
    }
    if (query.end) {
      clauses.push("date <= ?");
      params.push(query.end);
    }

    let sql = `SELECT ${LOG_COLUMNS} FROM logs`;
    if (clauses.length > 0) {
      sql += ` WHERE ${clauses.join(" AND ")}`;
    }
    sql += " ORDER BY date DESC, created_at DESC, id DESC";
    if (query.limit !== undefined) {
      sql += " LIMIT ?";
      params.push(query.limit);
    }

    const results = this.db.exec(sql, params);
    if (results.length === 0) return [];
    return results[0].values.map(rowToLogEntry);
  }

  /** Replaces project, description and date together. False when the id is unknown. */
  updateLog(id: number, changes: LogChanges): boolean {
    this.db.run("UPDATE logs SET project = ?, description = ?, date = ? WHERE id = ?", [
      changes.project,
      changes.description,
      changes.date,
      id,
    ]);
    const updated = this.db.getRowsModified() > 0;
    if (updated) this.save();
    return updated;
  }

  deleteLog(id: number): boolean {
    this.db.run("DELETE FROM logs WHERE id = ?", [id]);
    const deleted = this.db.getRowsModified() > 0;
    if (deleted) this.save();
    return deleted;
  }

  clearAll(): number {
    this.db.run("DELETE FROM logs");
    const removed = this.db.getRowsModified();
    this.save();
    return removed;
  }

  getProjects(): string[] {
    const results = this.db.exec("SELECT DISTINCT project FROM logs ORDER BY project");
    if (results.length === 0) return [];
    return results[0].values.map((row) => asText(row[0]));
  }

  getSetting(key: string): string | undefined {
    const results = this.db.exec("SELECT value FROM settings WHERE key = ?", [key]);
    if (results.length === 0 || results[0].values.length === 0) {
      return undefined;
    }
    return asText(results[0].values[0][0]);
  }

  setSetting(key: string, value: string): void {
    this.db.run("INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)", [key, value]);
    this.save();
  }

  setSettings(values: Record<string, string>): void {
    for (const [key, value] of Object.entries(values)) {
      this.db.run("INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)", [key, value]);
    }
    this.save();
  }

  getSettings(): Record<string, string> {
    const results = this.db.exec("SELECT key, value FROM settings ORDER BY key");
    const settings: Record<string, string> = {};
    if (results.length === 0) return settings;
    for (const row of results[0].values) {
      settings[asText(row[0])] = asText(row[1]);
    }
    return settings;
  }

  getStats(): { logCount: number; projectCount: number; lastLogged: string | null } {
    const result = this.db.exec(
      "SELECT COUNT(*), COUNT(DISTINCT project), MAX(created_at) FROM logs"
    );
    const row = result[0].values[0];
    return {
      logCount: asInteger(row[0]),
      projectCount: asInteger(row[1]),
      lastLogged: row[2] === null ? null : asText(row[2]),
    };
  }

  close(): void {
    this.save();
    this.db.close();
  }
}

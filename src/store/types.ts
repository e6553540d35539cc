export const DEFAULT_PROJECT = "Misc";

export interface LogEntry {
  id: number;
  project: string;
  description: string;
  date: string; // YYYY-MM-DD
  createdAt: string; // ISO timestamp, set once
}

export interface NewLogEntry {
  project: string;
  description: string;
  date: string; // YYYY-MM-DD
}

/** Fields replaced together by an update. */
export type LogChanges = NewLogEntry;

export interface LogQuery {
  start?: string; // YYYY-MM-DD, inclusive
  end?: string; // YYYY-MM-DD, inclusive
  limit?: number;
}

/** Read side of the store used by report generation. */
export interface LogSource {
  listLogs(query?: LogQuery): LogEntry[];
  getSettings(): Record<string, string>;
}

import { LogEntry } from "../store/types.js";
import { DateRange, formatDisplayDate, isWithinRange } from "./dates.js";
import { ReportTemplate, escapeHtml, renderHtmlLine, renderTextLine } from "./templates.js";

export interface SummaryItem {
  date: string;
  description: string;
}

/** Per-project replacement lines produced by AI enrichment for one render. */
export type AISummaryResult = Record<string, SummaryItem[]>;

/** Project name to entries, keys in ascending order, entries newest first. */
export type GroupedLogs = Map<string, LogEntry[]>;

export interface RenderedReport {
  text: string;
  html: string;
}

export interface RenderOptions {
  template: ReportTemplate;
  /** When set, the period header is shown (if the template allows it). */
  period?: DateRange;
  enrichment?: AISummaryResult;
}

export const EMPTY_REPORT_TEXT = "No logs found for this period.";
export const EMPTY_REPORT_HTML = `<p>${EMPTY_REPORT_TEXT}</p>`;

const SEPARATOR_WIDTH = 60;
const OPEN_BOUND = "...";

// Code-point order, so output does not depend on the host locale.
export function compareProjectNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareEntriesNewestFirst(a: LogEntry, b: LogEntry): number {
  if (a.date !== b.date) return a.date < b.date ? 1 : -1;
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
  return b.id - a.id;
}

export function groupByProject(entries: LogEntry[], range: DateRange = {}): GroupedLogs {
  const buckets = new Map<string, LogEntry[]>();
  for (const entry of entries) {
    if (!isWithinRange(entry.date, range)) continue;
    const bucket = buckets.get(entry.project);
    if (bucket) {
      bucket.push(entry);
    } else {
      buckets.set(entry.project, [entry]);
    }
  }

  const grouped: GroupedLogs = new Map();
  for (const project of [...buckets.keys()].sort(compareProjectNames)) {
    const bucket = buckets.get(project) ?? [];
    grouped.set(project, bucket.sort(compareEntriesNewestFirst));
  }
  return grouped;
}

/** Reads a project's enrichment lines, ignoring keys inherited from Object.prototype. */
export function enrichmentFor(result: AISummaryResult | null | undefined, project: string): SummaryItem[] | undefined {
  if (!result || !Object.hasOwn(result, project)) return undefined;
  const items = result[project];
  return Array.isArray(items) ? items : undefined;
}

function lineItems(
  project: string,
  entries: LogEntry[],
  options: RenderOptions
): SummaryItem[] {
  const summarized = enrichmentFor(options.enrichment, project);
  if (summarized && summarized.length > 0) {
    // AI date labels are already formatted; pass them through untouched.
    return summarized;
  }
  return entries.map((entry) => ({
    date: formatDisplayDate(entry.date, options.template.datePattern),
    description: entry.description,
  }));
}

function periodLabels(period: DateRange, template: ReportTemplate): [string, string] {
  const start = period.start ? formatDisplayDate(period.start, template.datePattern) : OPEN_BOUND;
  const end = period.end ? formatDisplayDate(period.end, template.datePattern) : OPEN_BOUND;
  return [start, end];
}

export function renderText(grouped: GroupedLogs, options: RenderOptions): string {
  if (grouped.size === 0) {
    return EMPTY_REPORT_TEXT;
  }

  const lines: string[] = [];

  if (options.period && options.template.showHeader) {
    const [start, end] = periodLabels(options.period, options.template);
    lines.push(`Report Period: ${start} - ${end}`);
    lines.push("=".repeat(SEPARATOR_WIDTH));
    lines.push("");
  }

  for (const [project, entries] of grouped) {
    lines.push(`Project: ${project}`);
    lines.push("-".repeat(SEPARATOR_WIDTH));
    for (const item of lineItems(project, entries, options)) {
      lines.push(renderTextLine(options.template, item.date, item.description));
    }
    lines.push("");
  }

  return lines.join("\n");
}

export function renderHtml(grouped: GroupedLogs, options: RenderOptions): string {
  if (grouped.size === 0) {
    return EMPTY_REPORT_HTML;
  }

  const parts: string[] = [];

  if (options.period && options.template.showHeader) {
    const [start, end] = periodLabels(options.period, options.template);
    parts.push(
      `<p><strong>Report Period:</strong> ${escapeHtml(start)} - ${escapeHtml(end)}</p>`
    );
  }

  for (const [project, entries] of grouped) {
    parts.push(`<h4>${escapeHtml(project)}</h4>`);
    parts.push("<ul>");
    for (const item of lineItems(project, entries, options)) {
      parts.push(renderHtmlLine(options.template, item.date, item.description));
    }
    parts.push("</ul>");
  }

  return parts.join("");
}

/** Renders both forms from the same grouped and enriched data. */
export function renderReport(grouped: GroupedLogs, options: RenderOptions): RenderedReport {
  return {
    text: renderText(grouped, options),
    html: renderHtml(grouped, options),
  };
}

export function assembleReport(entries: LogEntry[], options: RenderOptions): RenderedReport {
  return renderReport(groupByProject(entries, options.period), options);
}

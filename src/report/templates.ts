export const TEMPLATE_NAMES = ["standard", "compact", "detailed", "iso"] as const;

export type TemplateName = (typeof TEMPLATE_NAMES)[number];

export const DEFAULT_TEMPLATE_NAME: TemplateName = "standard";

export interface ReportTemplate {
  readonly name: TemplateName;
  /** Tokens understood by formatDisplayDate. */
  readonly datePattern: string;
  readonly showHeader: boolean;
  /** Plain-text line with {date} and {description} placeholders. */
  readonly textLine: string;
  /** HTML line with {date} and {description} placeholders; values are escaped. */
  readonly htmlLine: string;
}

export const REPORT_TEMPLATES: Readonly<Record<TemplateName, ReportTemplate>> = {
  standard: {
    name: "standard",
    datePattern: "MM/DD",
    showHeader: true,
    textLine: "  * {date} - {description}",
    htmlLine: "<li><strong>{date}</strong> - {description}</li>",
  },
  compact: {
    name: "compact",
    datePattern: "MM/DD",
    showHeader: false,
    textLine: "- {date}: {description}",
    htmlLine: "<li>{date}: {description}</li>",
  },
  detailed: {
    name: "detailed",
    datePattern: "ddd, MMM DD YYYY",
    showHeader: true,
    textLine: "  [{date}] {description}",
    htmlLine: "<li><em>{date}</em><br>{description}</li>",
  },
  iso: {
    name: "iso",
    datePattern: "YYYY-MM-DD",
    showHeader: true,
    textLine: "  {date} | {description}",
    htmlLine: "<li><code>{date}</code> {description}</li>",
  },
};

export function isTemplateName(value: string): value is TemplateName {
  return (TEMPLATE_NAMES as readonly string[]).includes(value);
}

export function getTemplate(name: TemplateName): ReportTemplate {
  return REPORT_TEMPLATES[name];
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function fillLine(line: string, date: string, description: string): string {
  // Replacer function so "$&" and friends in user text are taken literally.
  return line.replace(/\{(date|description)\}/g, (_, key: string) =>
    key === "date" ? date : description
  );
}

export function renderTextLine(template: ReportTemplate, date: string, description: string): string {
  return fillLine(template.textLine, date, description);
}

export function renderHtmlLine(template: ReportTemplate, date: string, description: string): string {
  return fillLine(template.htmlLine, escapeHtml(date), escapeHtml(description));
}

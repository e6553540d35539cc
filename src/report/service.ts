import { Enricher } from "../ai/enrichment.js";
import { ReportSettings, parseReportSettings } from "../config/settings.js";
import { Logger } from "../logger.js";
import { LogSource } from "../store/types.js";
import { ValidationError, parseOptionalDate } from "../store/validation.js";
import { AISummaryResult, RenderedReport, groupByProject, renderReport } from "./assembler.js";
import { DateRange, ReportMode, getDateRange } from "./dates.js";
import { TemplateName, getTemplate } from "./templates.js";

export interface GeneratedReport extends RenderedReport {
  mode: ReportMode;
  period: DateRange;
  template: TemplateName;
  entryCount: number;
  projectCount: number;
  enriched: boolean;
}

export interface ReportServiceOptions {
  store: LogSource;
  logger: Logger;
  /** Omit to never call out for enrichment. */
  enricher?: Enricher;
  clock?: () => Date;
}

/** Resolves the period for a request: an explicit bound wins over the mode window. */
export function resolvePeriod(mode: ReportMode, start?: string, end?: string, now: Date = new Date()): DateRange {
  const customStart = parseOptionalDate(start, "start");
  const customEnd = parseOptionalDate(end, "end");

  if (customStart || customEnd) {
    if (customStart && customEnd && customStart > customEnd) {
      throw new ValidationError(`Start date ${customStart} is after end date ${customEnd}`);
    }
    return { start: customStart, end: customEnd };
  }
  return getDateRange(mode, now);
}

export class ReportService {
  private store: LogSource;
  private logger: Logger;
  private enricher?: Enricher;
  private clock: () => Date;

  constructor(options: ReportServiceOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.enricher = options.enricher;
    this.clock = options.clock ?? (() => new Date());
  }

  loadSettings(): ReportSettings {
    return parseReportSettings(this.store.getSettings());
  }

  async generateReport(mode: ReportMode, start?: string, end?: string): Promise<GeneratedReport> {
    const settings = this.loadSettings();
    const period = resolvePeriod(mode, start, end, this.clock());
    const template = getTemplate(settings.template);

    const entries = this.store.listLogs({ start: period.start, end: period.end });
    const grouped = groupByProject(entries, period);
    this.logger.debug(
      `Report ${mode}: ${entries.length} entries in ${grouped.size} project(s) for ${period.start ?? "..."} - ${period.end ?? "..."}`
    );

    // One enrichment call at most; both renderings share its result.
    let enrichment: AISummaryResult = {};
    if (this.enricher && grouped.size > 0) {
      enrichment = await this.enricher.enrich(grouped, { mode, settings, template });
    }

    const rendered = renderReport(grouped, { template, period, enrichment });

    return {
      ...rendered,
      mode,
      period,
      template: template.name,
      entryCount: entries.length,
      projectCount: grouped.size,
      enriched: Object.keys(enrichment).some((project) => grouped.has(project)),
    };
  }
}

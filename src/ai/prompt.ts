import { GroupedLogs } from "../report/assembler.js";
import { describeDatePattern, formatDisplayDate } from "../report/dates.js";
import { ReportTemplate } from "../report/templates.js";

export interface PromptOptions {
  template: ReportTemplate;
  summaryPoints: string;
  summaryThreshold: number;
  customInstructions: string;
}

export interface EnrichmentPrompt {
  system: string;
  prompt: string;
}

export type ProjectTreatment = "summarize" | "polish";

export function treatmentFor(entryCount: number, threshold: number): ProjectTreatment {
  return entryCount > threshold ? "summarize" : "polish";
}

export const ENRICHMENT_SYSTEM_INSTRUCTION =
  "You are a precise assistant that rewrites work-log entries for a status report. " +
  "You answer with strict JSON only. Do NOT output any <think> blocks or internal reasoning.";

/**
 * Builds one instruction covering every project in `grouped`, so a whole
 * report costs a single external call.
 */
export function buildEnrichmentPrompt(grouped: GroupedLogs, options: PromptOptions): EnrichmentPrompt {
  const dateFormat = describeDatePattern(options.template.datePattern);
  const pattern = options.template.datePattern;

  const sections: string[] = [];
  for (const [project, entries] of grouped) {
    const treatment = treatmentFor(entries.length, options.summaryThreshold);
    const lines = entries.map(
      (entry) => `- ${formatDisplayDate(entry.date, pattern)}: ${entry.description}`
    );
    sections.push(
      `Project: ${project} (${treatment.toUpperCase()}, ${entries.length} entries)\n${lines.join("\n")}`
    );
  }

  const rules = [
    `- Projects marked SUMMARIZE: condense the entries into ${options.summaryPoints} bullet points covering the key work. Each bullet names the date or date range it covers.`,
    "- Projects marked POLISH: rewrite every entry with correct grammar and a professional tone. Keep one item per entry and keep all of its information.",
    `- Every "date" value uses the format ${dateFormat}. A range is written as "${pattern} - ${pattern}".`,
    "- Keep project names exactly as given. Order items newest first.",
  ];

  const parts = [
    "Rewrite the following work log for a status report.",
    `Rules:\n${rules.join("\n")}`,
  ];

  if (options.customInstructions) {
    parts.push(`Additional instructions:\n${options.customInstructions}`);
  }

  parts.push(
    'Respond with ONLY a JSON object that maps each project name to an array of {"date": "...", "description": "..."} objects. ' +
      "No commentary, no markdown, no code fences."
  );
  parts.push(`Work log:\n\n${sections.join("\n\n")}`);

  return {
    system: ENRICHMENT_SYSTEM_INSTRUCTION,
    prompt: parts.join("\n\n"),
  };
}

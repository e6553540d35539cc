import { AiProviderSettings, ReportSettings } from "../config/settings.js";
import { Logger, errorMessage } from "../logger.js";
import { AISummaryResult, GroupedLogs, SummaryItem, enrichmentFor } from "../report/assembler.js";
import { ReportMode } from "../report/dates.js";
import { ReportTemplate } from "../report/templates.js";
import { LocalToolClient } from "./local-tool.js";
import { isCommandAvailable } from "./process.js";
import { buildEnrichmentPrompt } from "./prompt.js";
import { ConfiguredProvider, ProviderClient } from "./provider.js";
import { parseSummaryResponse, truncate } from "./response.js";
import { TextGenerationRequest, TextGenerator, TimeoutError } from "./types.js";

export const PER_PROJECT_DELAY_MS = 2000;
export const BATCH_TIMEOUT_FLOOR_SECONDS = 300;
export const RAW_RESPONSE_LOG_LIMIT = 500;
export const BATCH_LABEL = "all-projects";

export interface EnrichmentContext {
  mode: ReportMode;
  settings: ReportSettings;
  template: ReportTemplate;
}

export interface Enricher {
  enrich(grouped: GroupedLogs, context: EnrichmentContext): Promise<AISummaryResult>;
}

export interface EnrichmentDeps {
  logger: Logger;
  createProvider?: (settings: ConfiguredProvider) => TextGenerator;
  createLocalTool?: (command: string) => TextGenerator;
  isToolAvailable?: (command: string) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export function batchTimeoutSeconds(timeoutSeconds: number): number {
  return Math.max(timeoutSeconds * 2, BATCH_TIMEOUT_FLOOR_SECONDS);
}

function hasApiKey(provider: AiProviderSettings): provider is ConfiguredProvider {
  return typeof provider.apiKey === "string" && provider.apiKey.length > 0;
}

/**
 * Best-effort AI rewriting of report lines. Every failure path ends in an
 * empty result so the report falls back to the logged descriptions.
 */
export class EnrichmentAdapter implements Enricher {
  private logger: Logger;
  private createProvider: (settings: ConfiguredProvider) => TextGenerator;
  private createLocalTool: (command: string) => TextGenerator;
  private isToolAvailable: (command: string) => boolean;
  private sleep: (ms: number) => Promise<void>;

  constructor(deps: EnrichmentDeps) {
    this.logger = deps.logger;
    this.createProvider = deps.createProvider ?? ((settings) => new ProviderClient(settings));
    this.createLocalTool = deps.createLocalTool ?? ((command) => new LocalToolClient({ command }));
    this.isToolAvailable = deps.isToolAvailable ?? ((command) => isCommandAvailable(command));
    this.sleep = deps.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /** Generators in the order they are tried; empty when enrichment is off. */
  selectGenerators(context: EnrichmentContext): TextGenerator[] {
    const { settings, mode } = context;

    if (!settings.aiEnabled[mode]) {
      this.logger.debug(`AI enrichment disabled for ${mode} reports`);
      return [];
    }

    const generators: TextGenerator[] = [];
    if (hasApiKey(settings.provider)) {
      generators.push(this.createProvider(settings.provider));
    }
    if (this.isToolAvailable(settings.cliCommand)) {
      generators.push(this.createLocalTool(settings.cliCommand));
    }

    if (generators.length === 0) {
      this.logger.debug(
        `AI enrichment enabled for ${mode} but no API key is set and "${settings.cliCommand}" is not on PATH`
      );
    }
    return generators;
  }

  async enrich(grouped: GroupedLogs, context: EnrichmentContext): Promise<AISummaryResult> {
    if (grouped.size === 0) {
      return {};
    }

    try {
      const generators = this.selectGenerators(context);
      if (generators.length === 0) {
        return {};
      }

      if (context.settings.batchRequests) {
        return (await this.enrichBatch(grouped, context, generators)) ?? {};
      }
      return await this.enrichPerProject(grouped, context, generators);
    } catch (error) {
      this.logger.error("AI enrichment failed", error);
      return {};
    }
  }

  private async enrichBatch(
    grouped: GroupedLogs,
    context: EnrichmentContext,
    generators: TextGenerator[]
  ): Promise<AISummaryResult | null> {
    const { system, prompt } = buildEnrichmentPrompt(grouped, this.promptOptions(context));
    this.logger.info(`Requesting AI enrichment for ${grouped.size} project(s) in one call`);
    return this.generateWithFallback(generators, {
      system,
      prompt,
      label: BATCH_LABEL,
      timeoutMs: batchTimeoutSeconds(context.settings.timeoutSeconds) * 1000,
    });
  }

  /** Legacy mode: one call per project, spaced out by a fixed delay. */
  private async enrichPerProject(
    grouped: GroupedLogs,
    context: EnrichmentContext,
    generators: TextGenerator[]
  ): Promise<AISummaryResult> {
    const merged: [string, SummaryItem[]][] = [];
    let first = true;

    for (const [project, entries] of grouped) {
      if (!first) {
        await this.sleep(PER_PROJECT_DELAY_MS);
      }
      first = false;

      const single: GroupedLogs = new Map([[project, entries]]);
      const { system, prompt } = buildEnrichmentPrompt(single, this.promptOptions(context));
      const result = await this.generateWithFallback(generators, {
        system,
        prompt,
        label: project,
        timeoutMs: context.settings.timeoutSeconds * 1000,
      });

      const items = enrichmentFor(result, project);
      if (items && items.length > 0) {
        merged.push([project, items]);
      }
    }

    return Object.fromEntries(merged);
  }

  private async generateWithFallback(
    generators: TextGenerator[],
    request: TextGenerationRequest
  ): Promise<AISummaryResult | null> {
    for (const generator of generators) {
      try {
        const raw = await generator.generate(request);
        const parsed = parseSummaryResponse(raw);
        if (parsed.ok) {
          this.logger.debug(`${generator.name} enriched ${Object.keys(parsed.result).length} project(s)`);
          return parsed.result;
        }
        this.logger.warn(
          `${generator.name} returned an unusable response (${parsed.reason}): ${truncate(raw, RAW_RESPONSE_LOG_LIMIT)}`
        );
      } catch (error) {
        if (error instanceof TimeoutError) {
          this.logger.warn(`${generator.name} timed out after ${Math.round(error.timeoutMs / 1000)}s`);
        } else {
          this.logger.warn(`${generator.name} failed: ${errorMessage(error)}`);
        }
      }
    }
    return null;
  }

  private promptOptions(context: EnrichmentContext) {
    return {
      template: context.template,
      summaryPoints: context.settings.summaryPoints,
      summaryThreshold: context.settings.summaryThreshold,
      customInstructions: context.settings.customInstructions,
    };
  }
}

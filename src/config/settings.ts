import { z } from "zod";
import { ReportMode } from "../report/dates.js";
import { DEFAULT_TEMPLATE_NAME, TEMPLATE_NAMES, TemplateName } from "../report/templates.js";
import { ValidationError } from "../store/validation.js";

export const PROVIDER_NAMES = ["openai", "anthropic", "gemini"] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export const SETTING_KEYS = {
  template: "report_template",
  aiEnabledWeekly: "ai_enabled_weekly",
  aiEnabledBiweekly: "ai_enabled_biweekly",
  aiEnabledMonthly: "ai_enabled_monthly",
  summaryPoints: "ai_summary_points",
  summaryThreshold: "ai_summary_threshold",
  customInstructions: "ai_custom_instructions",
  provider: "ai_provider",
  apiKey: "ai_api_key",
  model: "ai_model",
  baseUrl: "ai_base_url",
  timeout: "ai_timeout",
  batchRequests: "ai_batch_requests",
  cliCommand: "ai_cli_command",
  recentLogsLimit: "recent_logs_limit",
  autoOpenBrowser: "auto_open_browser",
} as const;

export type SettingKey = (typeof SETTING_KEYS)[keyof typeof SETTING_KEYS];

export const SETTING_DESCRIPTIONS: Record<SettingKey, string> = {
  report_template: `Report template (${TEMPLATE_NAMES.join(", ")})`,
  ai_enabled_weekly: "Use AI enrichment for weekly reports (true/false)",
  ai_enabled_biweekly: "Use AI enrichment for biweekly reports (true/false)",
  ai_enabled_monthly: "Use AI enrichment for monthly reports (true/false)",
  ai_summary_points: 'Bullet count for condensed projects, e.g. "3-5"',
  ai_summary_threshold: "Entry count above which a project is condensed",
  ai_custom_instructions: "Extra instructions appended to the AI request",
  ai_provider: `Direct AI provider (${PROVIDER_NAMES.join(", ")})`,
  ai_api_key: "API key for the direct provider",
  ai_model: "Model id for the direct provider",
  ai_base_url: "Base URL override for the direct provider",
  ai_timeout: "AI call timeout in seconds",
  ai_batch_requests: "Send one request for all projects (true/false)",
  ai_cli_command: "Local text-generation CLI used as fallback",
  recent_logs_limit: "Number of recent entries shown in the web UI",
  auto_open_browser: "Open the browser when the web UI starts (true/false)",
};

const SECRET_KEYS: ReadonlySet<string> = new Set([SETTING_KEYS.apiKey]);

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(SETTING_DESCRIPTIONS, key);
}

export function assertSettingKey(key: string): SettingKey {
  if (!isSettingKey(key)) {
    throw new ValidationError(`Unknown setting "${key}"`);
  }
  return key;
}

export function maskSetting(key: string, value: string): string {
  if (!SECRET_KEYS.has(key) || value.length === 0) return value;
  return value.length <= 8 ? "****" : `${value.slice(0, 4)}****${value.slice(-2)}`;
}

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);

const flag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === ""
        ? defaultValue
        : TRUE_VALUES.has(value.trim().toLowerCase())
    );

/** One day; a doubled batch deadline in milliseconds still fits a timer. */
export const MAX_AI_TIMEOUT_SECONDS = 86_400;

const positiveInt = (defaultValue: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().positive().max(max).catch(defaultValue);

const text = (defaultValue: string) =>
  z
    .string()
    .optional()
    .transform((value) => value?.trim() || defaultValue);

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

export interface AiProviderSettings {
  name: ProviderName;
  apiKey?: string;
  model?: string;
  baseUrl?: string;
}

/** Typed view of the settings bag, loaded once per report request. */
export interface ReportSettings {
  template: TemplateName;
  aiEnabled: Record<ReportMode, boolean>;
  summaryPoints: string;
  summaryThreshold: number;
  customInstructions: string;
  provider: AiProviderSettings;
  timeoutSeconds: number;
  batchRequests: boolean;
  cliCommand: string;
  recentLogsLimit: number;
  autoOpenBrowser: boolean;
}

export const ReportSettingsSchema = z
  .object({
    report_template: z.enum(TEMPLATE_NAMES).catch(DEFAULT_TEMPLATE_NAME),
    ai_enabled_weekly: flag(false),
    ai_enabled_biweekly: flag(false),
    ai_enabled_monthly: flag(false),
    ai_summary_points: text("3-5"),
    ai_summary_threshold: positiveInt(5),
    ai_custom_instructions: text(""),
    ai_provider: z.enum(PROVIDER_NAMES).catch("openai"),
    ai_api_key: optionalText,
    ai_model: optionalText,
    ai_base_url: optionalText,
    ai_timeout: positiveInt(120, MAX_AI_TIMEOUT_SECONDS),
    ai_batch_requests: flag(true),
    ai_cli_command: text("cline"),
    recent_logs_limit: positiveInt(20),
    auto_open_browser: flag(true),
  })
  .transform(
    (raw): ReportSettings => ({
      template: raw.report_template,
      aiEnabled: {
        weekly: raw.ai_enabled_weekly,
        biweekly: raw.ai_enabled_biweekly,
        monthly: raw.ai_enabled_monthly,
      },
      summaryPoints: raw.ai_summary_points,
      summaryThreshold: raw.ai_summary_threshold,
      customInstructions: raw.ai_custom_instructions,
      provider: {
        name: raw.ai_provider,
        apiKey: raw.ai_api_key,
        model: raw.ai_model,
        baseUrl: raw.ai_base_url,
      },
      timeoutSeconds: raw.ai_timeout,
      batchRequests: raw.ai_batch_requests,
      cliCommand: raw.ai_cli_command,
      recentLogsLimit: raw.recent_logs_limit,
      autoOpenBrowser: raw.auto_open_browser,
    })
  );

export function parseReportSettings(raw: Record<string, string>): ReportSettings {
  return ReportSettingsSchema.parse(raw);
}

export const DEFAULT_REPORT_SETTINGS: ReportSettings = parseReportSettings({});

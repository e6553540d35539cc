import prompts from "prompts";
import chalk from "chalk";
import {
  Config,
  DEFAULT_CONFIG,
  saveConfig,
  getConfigPath,
  configExists,
  ensureDirectories,
  getDatabasePath,
} from "../config/index.js";
import {
  DEFAULT_REPORT_SETTINGS,
  MAX_AI_TIMEOUT_SECONDS,
  PROVIDER_NAMES,
  SETTING_KEYS,
} from "../config/settings.js";
import { isCommandAvailable } from "../ai/process.js";
import { TEMPLATE_NAMES } from "../report/templates.js";
import { LogStore } from "../store/database.js";

export interface SetupAnswers {
  dataDirectory: string;
  port: number;
  template: string;
  aiModes: string[];
  provider?: string;
  apiKey?: string;
  timeout: number;
  threshold: number;
  points: string;
}

/** Maps setup answers onto the settings table rows. */
export function settingsFromAnswers(answers: SetupAnswers): Record<string, string> {
  const settings: Record<string, string> = {
    [SETTING_KEYS.template]: answers.template,
    [SETTING_KEYS.aiEnabledWeekly]: String(answers.aiModes.includes("weekly")),
    [SETTING_KEYS.aiEnabledBiweekly]: String(answers.aiModes.includes("biweekly")),
    [SETTING_KEYS.aiEnabledMonthly]: String(answers.aiModes.includes("monthly")),
    [SETTING_KEYS.timeout]: String(answers.timeout),
    [SETTING_KEYS.summaryThreshold]: String(answers.threshold),
    [SETTING_KEYS.summaryPoints]: answers.points.trim(),
  };
  if (answers.provider) {
    settings[SETTING_KEYS.provider] = answers.provider;
  }
  if (answers.apiKey?.trim()) {
    settings[SETTING_KEYS.apiKey] = answers.apiKey.trim();
  }
  return settings;
}

export async function runInteractiveSetup(
  options: { force?: boolean } = {}
): Promise<Config | null> {
  console.log(chalk.bold("\nWork Log Setup\n"));

  if (configExists() && !options.force) {
    const { overwrite } = await prompts({
      type: "confirm",
      name: "overwrite",
      message: `Config already exists at ${getConfigPath()}. Overwrite?`,
      initial: false,
    });

    if (!overwrite) {
      console.log(chalk.yellow("Setup cancelled."));
      return null;
    }
  }

  const defaults = DEFAULT_REPORT_SETTINGS;
  const responses: SetupAnswers = await prompts(
    [
      {
        type: "text",
        name: "dataDirectory",
        message: "Where should the work log be stored?",
        initial: DEFAULT_CONFIG.dataDirectory,
        validate: (value: string) => (value.trim() ? true : "Directory path is required"),
      },
      {
        type: "number",
        name: "port",
        message: "Web UI port?",
        initial: DEFAULT_CONFIG.server.port,
        min: 1,
        max: 65535,
      },
      {
        type: "select",
        name: "template",
        message: "Report template",
        choices: TEMPLATE_NAMES.map((name) => ({ title: name, value: name })),
        initial: TEMPLATE_NAMES.indexOf(defaults.template),
      },
      {
        type: "multiselect",
        name: "aiModes",
        message: "Enable AI enrichment for which reports?",
        choices: [
          { title: "weekly", value: "weekly" },
          { title: "biweekly", value: "biweekly" },
          { title: "monthly", value: "monthly" },
        ],
        hint: "- Space to select. Return to submit",
      },
      {
        type: (_prev: unknown, values: { aiModes?: string[] }) =>
          values.aiModes && values.aiModes.length > 0 ? "select" : null,
        name: "provider",
        message: "Direct AI provider",
        choices: PROVIDER_NAMES.map((name) => ({ title: name, value: name })),
      },
      {
        type: (_prev: unknown, values: { aiModes?: string[] }) =>
          values.aiModes && values.aiModes.length > 0 ? "password" : null,
        name: "apiKey",
        message: "API key (leave empty to use the local CLI tool only):",
      },
      {
        type: "number",
        name: "timeout",
        message: "AI timeout (seconds)?",
        initial: defaults.timeoutSeconds,
        min: 5,
        max: MAX_AI_TIMEOUT_SECONDS,
      },
      {
        type: "number",
        name: "threshold",
        message: "Condense projects with more than how many entries?",
        initial: defaults.summaryThreshold,
        min: 1,
      },
      {
        type: "text",
        name: "points",
        message: "Bullet count for condensed projects:",
        initial: defaults.summaryPoints,
      },
    ],
    {
      onCancel: () => {
        console.log(chalk.yellow("\nSetup cancelled."));
        process.exit(0);
      },
    }
  );

  const config: Config = {
    ...DEFAULT_CONFIG,
    dataDirectory: responses.dataDirectory,
    server: { ...DEFAULT_CONFIG.server, port: responses.port },
  };

  console.log(chalk.dim("\nCreating configuration..."));
  saveConfig(config);
  console.log(chalk.green(`✓ Created ${getConfigPath()}`));

  ensureDirectories(config);
  const store = await LogStore.create(config);
  try {
    store.setSettings(settingsFromAnswers(responses));
  } finally {
    store.close();
  }
  console.log(chalk.green(`✓ Initialized ${getDatabasePath(config)}`));

  if (responses.aiModes.length > 0 && !isCommandAvailable(defaults.cliCommand)) {
    console.log(
      chalk.yellow(`⚠ Local CLI tool "${defaults.cliCommand}" not found on PATH; only the direct provider will be used`)
    );
  }

  console.log(chalk.bold.green("\nSetup complete!\n"));
  console.log("Next steps:");
  console.log(chalk.dim("  1. Log some work:        ") + "worklog log -d 'Fixed the login bug' -p Website");
  console.log(chalk.dim("  2. View a report:        ") + "worklog view -m weekly");
  console.log(chalk.dim("  3. Open the web UI:      ") + "worklog ui\n");

  return config;
}

#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import prompts from "prompts";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { readFileSync } from "fs";
import { getConfigPath, getDatabasePath, getLogFilePath } from "./config/index.js";
import {
  SETTING_DESCRIPTIONS,
  assertSettingKey,
  isSettingKey,
  maskSetting,
} from "./config/settings.js";
import { AppContext, createAppContext } from "./context.js";
import { runMcpServer } from "./index.js";
import { errorMessage } from "./logger.js";
import { REPORT_MODES, ReportMode, isReportMode } from "./report/dates.js";
import { runInteractiveSetup } from "./setup/interactive.js";
import { ValidationError, parseLogId, parseLogInput, parseOptionalDate } from "./store/validation.js";
import { formatEntryLine } from "./tools/handlers.js";
import { startWebServer } from "./web/server.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read version from package.json
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "..", "package.json"), "utf-8")
);

interface GlobalOptions {
  verbose?: boolean;
}

const program = new Command();

program
  .name("worklog")
  .description("Track daily work and build weekly, biweekly and monthly reports")
  .version(packageJson.version)
  .option("-v, --verbose", "Log debug output");

function fail(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

/** Opens the store, runs the command body and always closes the store. */
async function withContext(body: (context: AppContext) => Promise<void> | void): Promise<void> {
  const { verbose } = program.opts<GlobalOptions>();
  let context: AppContext;
  try {
    context = await createAppContext({ verbose });
  } catch (error) {
    fail(`Could not open the work log: ${errorMessage(error)}`);
  }

  try {
    await body(context);
  } catch (error) {
    if (!(error instanceof ValidationError)) {
      context.logger.error("Command failed", error);
    }
    context.store.close();
    fail(errorMessage(error));
  }
  context.store.close();
}

async function confirm(message: string): Promise<boolean> {
  const { confirmed } = await prompts({
    type: "confirm",
    name: "confirmed",
    message,
    initial: false,
  });
  return confirmed === true;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ValidationError(`Invalid limit: ${value}`);
  }
  return limit;
}

function parseMode(value: string): ReportMode {
  if (!isReportMode(value)) {
    throw new ValidationError(`Invalid mode "${value}", expected one of: ${REPORT_MODES.join(", ")}`);
  }
  return value;
}

// Init command
program
  .command("init")
  .description("Initialize the work log with interactive setup")
  .option("-f, --force", "Overwrite existing configuration")
  .action(async (options: { force?: boolean }) => {
    await runInteractiveSetup({ force: options.force });
  });

// Log command
program
  .command("log")
  .description("Log a work entry")
  .requiredOption("-d, --description <description>", "What you worked on")
  .option("-p, --project <project>", "Project name (defaults to Misc)")
  .option("--date <date>", "Date (YYYY-MM-DD, defaults to today)")
  .action((options: { description: string; project?: string; date?: string }) =>
    withContext(({ store }) => {
      const entry = store.addLog(parseLogInput(options));
      console.log(chalk.green(`Logged entry #${entry.id}`));
      console.log(chalk.dim(`Project: ${entry.project}`));
      console.log(chalk.dim(`Date: ${entry.date}`));
    })
  );

// View command
program
  .command("view")
  .description("Generate a report")
  .option("-m, --mode <mode>", `Report mode (${REPORT_MODES.join(", ")})`, "weekly")
  .option("-s, --start <date>", "Custom start date (YYYY-MM-DD)")
  .option("-e, --end <date>", "Custom end date (YYYY-MM-DD)")
  .option("--html", "Print the HTML rendering")
  .action((options: { mode: string; start?: string; end?: string; html?: boolean }) =>
    withContext(async ({ reports }) => {
      const mode = parseMode(options.mode);
      const report = await reports.generateReport(mode, options.start, options.end);
      if (!options.html) {
        const note = report.enriched ? chalk.dim(" (AI enriched)") : "";
        console.log(chalk.bold(`\n${mode} report${note}\n`));
      }
      console.log(options.html ? report.html : report.text);
    })
  );

// List command
program
  .command("list")
  .description("List recent log entries")
  .option("-n, --limit <limit>", "Maximum entries", "20")
  .option("-s, --start <date>", "Only entries on or after this date")
  .option("-e, --end <date>", "Only entries on or before this date")
  .action((options: { limit: string; start?: string; end?: string }) =>
    withContext(({ store }) => {
      const entries = store.listLogs({
        start: parseOptionalDate(options.start, "start"),
        end: parseOptionalDate(options.end, "end"),
        limit: parseLimit(options.limit),
      });

      if (entries.length === 0) {
        console.log(chalk.yellow("No log entries found."));
        return;
      }

      console.log(chalk.bold(`\nLog entries (${entries.length}):\n`));
      for (const entry of entries) {
        console.log(`${chalk.cyan(`#${entry.id}`)} ${entry.date} ${chalk.dim(`[${entry.project}]`)} ${entry.description}`);
      }
    })
  );

// Update command
program
  .command("update")
  .description("Update a log entry")
  .requiredOption("-i, --id <id>", "Entry id")
  .option("-d, --description <description>", "New description")
  .option("-p, --project <project>", "New project")
  .option("--date <date>", "New date (YYYY-MM-DD)")
  .action((options: { id: string; description?: string; project?: string; date?: string }) =>
    withContext(({ store }) => {
      const id = parseLogId(options.id);
      const existing = store.getLog(id);
      if (!existing) {
        throw new ValidationError(`Log entry #${id} not found.`);
      }

      const changes = parseLogInput({
        description: options.description ?? existing.description,
        project: options.project ?? existing.project,
        date: options.date ?? existing.date,
      });
      store.updateLog(id, changes);
      console.log(chalk.green(`Updated entry #${id}`));
      console.log(formatEntryLine({ ...existing, ...changes }));
    })
  );

// Delete command
program
  .command("delete")
  .description("Delete a log entry")
  .requiredOption("-i, --id <id>", "Entry id")
  .option("-y, --yes", "Skip confirmation")
  .action((options: { id: string; yes?: boolean }) =>
    withContext(async ({ store }) => {
      const id = parseLogId(options.id);
      const existing = store.getLog(id);
      if (!existing) {
        throw new ValidationError(`Log entry #${id} not found.`);
      }

      console.log(formatEntryLine(existing));
      if (!options.yes && !(await confirm("Delete this entry?"))) {
        console.log(chalk.yellow("Cancelled."));
        return;
      }
      store.deleteLog(id);
      console.log(chalk.green(`Deleted entry #${id}`));
    })
  );

// Clear command
program
  .command("clear")
  .description("Delete every log entry")
  .option("-y, --yes", "Skip confirmation")
  .action((options: { yes?: boolean }) =>
    withContext(async ({ store }) => {
      if (!options.yes && !(await confirm("Delete ALL log entries? This cannot be undone."))) {
        console.log(chalk.yellow("Cancelled."));
        return;
      }
      const removed = store.clearAll();
      console.log(chalk.green(`Cleared ${removed} log entries`));
    })
  );

// Projects command
program
  .command("projects")
  .description("List projects that have entries")
  .action(() =>
    withContext(({ store }) => {
      const projects = store.getProjects();
      if (projects.length === 0) {
        console.log(chalk.yellow("No projects found."));
        return;
      }
      for (const project of projects) {
        console.log(`- ${project}`);
      }
    })
  );

// Settings commands
const settingsCmd = program.command("settings").description("Manage report and AI settings");

settingsCmd
  .command("list")
  .description("Show all settings")
  .action(() =>
    withContext(({ store }) => {
      const stored = store.getSettings();
      for (const [key, description] of Object.entries(SETTING_DESCRIPTIONS)) {
        const value = stored[key];
        const shown = value === undefined ? chalk.dim("(default)") : maskSetting(key, value);
        console.log(`${chalk.cyan(key)} = ${shown}`);
        console.log(chalk.dim(`  ${description}`));
      }
      const unknown = Object.keys(stored).filter((key) => !isSettingKey(key));
      for (const key of unknown) {
        console.log(`${chalk.yellow(key)} = ${stored[key]} ${chalk.dim("(unused)")}`);
      }
    })
  );

settingsCmd
  .command("get <key>")
  .description("Show one setting")
  .action((key: string) =>
    withContext(({ store }) => {
      const name = assertSettingKey(key);
      const value = store.getSetting(name);
      console.log(value === undefined ? chalk.dim("(default)") : maskSetting(name, value));
    })
  );

settingsCmd
  .command("set <key> <value>")
  .description("Change one setting")
  .action((key: string, value: string) =>
    withContext(({ store }) => {
      const name = assertSettingKey(key);
      store.setSetting(name, value);
      console.log(chalk.green(`Set ${name} = ${maskSetting(name, value)}`));
    })
  );

// Status command
program
  .command("status")
  .description("Show where the work log lives and what it holds")
  .action(() =>
    withContext(({ config, store }) => {
      const stats = store.getStats();
      console.log(chalk.bold("\nWork log status\n"));
      console.log(`Config:   ${getConfigPath()}`);
      console.log(`Database: ${getDatabasePath(config)}`);
      console.log(`Log file: ${getLogFilePath(config)}`);
      console.log(`Entries:  ${stats.logCount}`);
      console.log(`Projects: ${stats.projectCount}`);
      console.log(`Last entry: ${stats.lastLogged ?? "never"}`);
    })
  );

// Web UI command
program
  .command("ui")
  .description("Start the web UI")
  .option("-p, --port <port>", "Port to listen on")
  .option("--host <host>", "Host to bind")
  .option("--no-open", "Do not open a browser")
  .action(async (options: { port?: string; host?: string; open: boolean }) => {
    const { verbose } = program.opts<GlobalOptions>();
    let context: AppContext;
    try {
      context = await createAppContext({ verbose });
    } catch (error) {
      fail(`Could not open the work log: ${errorMessage(error)}`);
    }

    const port = options.port ? Number(options.port) : context.config.server.port;
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
      context.store.close();
      fail(`Invalid port: ${options.port}`);
    }

    const host = options.host ?? context.config.server.host;
    try {
      await startWebServer(context, { host, port, open: options.open });
    } catch (error) {
      context.store.close();
      fail(`Could not start the web UI: ${errorMessage(error)}`);
    }
    console.log(chalk.green(`Work log UI running at http://${host}:${port}`));
    console.log(chalk.dim("Press Ctrl+C to stop"));

    const shutdown = () => {
      context.store.close();
      process.exit(0);
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });

// Serve command (MCP server)
program
  .command("serve")
  .description("Start the MCP server on stdio")
  .action(async () => {
    try {
      await runMcpServer();
    } catch (error) {
      fail(`Failed to start MCP server: ${errorMessage(error)}`);
    }
  });

program.parseAsync().catch((error: unknown) => fail(errorMessage(error)));

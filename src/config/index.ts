import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { Config, ConfigSchema, DEFAULT_CONFIG } from "./schema.js";

const CONFIG_FILENAME = ".worklog.json";

export function getConfigPath(): string {
  const override = process.env.WORKLOG_CONFIG;
  if (override) {
    return expandPath(override);
  }
  return join(homedir(), CONFIG_FILENAME);
}

export function expandPath(path: string): string {
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith("$HOME/")) {
    return join(homedir(), path.slice(6));
  }
  return resolve(path);
}

export function configExists(): boolean {
  return existsSync(getConfigPath());
}

export function loadConfig(): Config {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  const raw = readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${configPath}`);
    }
    throw error;
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid config file ${configPath}: ${result.error.message}`);
  }
  return result.data;
}

export function saveConfig(config: Config): void {
  const configPath = getConfigPath();
  const validated = ConfigSchema.parse(config);
  writeFileSync(configPath, JSON.stringify(validated, null, 2) + "\n");
}

export function getDataDirectory(config: Config): string {
  return expandPath(config.dataDirectory);
}

export function getDatabasePath(config: Config): string {
  return join(getDataDirectory(config), "worklog.db");
}

export function getLogFilePath(config: Config): string {
  if (config.logging.logFile) {
    return expandPath(config.logging.logFile);
  }
  return join(getDataDirectory(config), "worklog.log");
}

export function ensureDirectories(config: Config): void {
  const dataDir = getDataDirectory(config);
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }
}

export * from "./schema.js";

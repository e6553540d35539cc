import { EnrichmentAdapter } from "./ai/enrichment.js";
import { Config, ensureDirectories, getLogFilePath, loadConfig } from "./config/index.js";
import { Logger, createLogger } from "./logger.js";
import { ReportService } from "./report/service.js";
import { LogStore } from "./store/database.js";

export interface AppContext {
  config: Config;
  store: LogStore;
  reports: ReportService;
  logger: Logger;
}

export interface AppContextOptions {
  config?: Config;
  verbose?: boolean;
  /** Keep stderr quiet (MCP stdio); lines still go to the log file. */
  quiet?: boolean;
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = options.config ?? loadConfig();
  ensureDirectories(config);

  const logger = createLogger({
    logFile: getLogFilePath(config),
    verbose: options.verbose ?? config.logging.verbose,
    console: !options.quiet,
  });

  const store = await LogStore.create(config);
  const reports = new ReportService({
    store,
    logger,
    enricher: new EnrichmentAdapter({ logger }),
  });

  return { config, store, reports, logger };
}

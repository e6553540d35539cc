import express, { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { isCommandAvailable } from "../ai/process.js";
import { SETTING_KEYS, isSettingKey, maskSetting } from "../config/settings.js";
import { Logger } from "../logger.js";
import { isReportMode, todayKey } from "../report/dates.js";
import { GeneratedReport, ReportService } from "../report/service.js";
import { LogStore } from "../store/database.js";
import { LogInputSchema, ValidationError, parseLogId, parseLogInput } from "../store/validation.js";
import { renderPage } from "./page.js";

export interface WebDeps {
  store: LogStore;
  reports: ReportService;
  logger: Logger;
  clock?: () => Date;
}

type Handler = (req: Request, res: Response) => Promise<void> | void;

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function parseBody(body: unknown, now: Date) {
  const result = LogInputSchema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError("Project, description and date must be text");
  }
  return parseLogInput(result.data, now);
}

const SettingsUpdateSchema = z.record(z.string(), z.union([z.string(), z.boolean(), z.number()]));

export function createApp(deps: WebDeps): express.Express {
  const { store, reports, logger } = deps;
  const clock = deps.clock ?? (() => new Date());
  const app = express();

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  const page = (res: Response, report?: GeneratedReport) => {
    const settings = reports.loadSettings();
    res.type("html").send(
      renderPage({
        entries: store.listLogs({ limit: settings.recentLogsLimit }),
        projects: store.getProjects(),
        today: todayKey(clock()),
        report,
      })
    );
  };

  app.get("/", route((_req, res) => page(res)));

  app.post(
    "/add_log",
    route((req, res) => {
      const entry = store.addLog(parseBody(req.body, clock()));
      logger.debug(`Added log #${entry.id} for ${entry.project}`);
      res.json({ success: true, id: entry.id, message: "Log entry added successfully" });
    })
  );

  app.post(
    "/update_log/:id",
    route((req, res) => {
      const id = parseLogId(req.params.id);
      if (store.updateLog(id, parseBody(req.body, clock()))) {
        res.json({ success: true, message: "Log entry updated" });
      } else {
        res.status(404).json({ success: false, error: "Log entry not found" });
      }
    })
  );

  app.post(
    "/delete_log/:id",
    route((req, res) => {
      const id = parseLogId(req.params.id);
      if (store.deleteLog(id)) {
        res.json({ success: true, message: "Log entry deleted" });
      } else {
        res.status(404).json({ success: false, error: "Log entry not found" });
      }
    })
  );

  app.post(
    "/clear_all",
    route((_req, res) => {
      const removed = store.clearAll();
      logger.info(`Cleared ${removed} log entries`);
      res.json({ success: true, message: "All log entries cleared", removed });
    })
  );

  app.get(
    "/report/:mode",
    route(async (req, res) => {
      const { mode } = req.params;
      if (!isReportMode(mode)) {
        res.status(400).send("Invalid report mode");
        return;
      }
      const report = await reports.generateReport(mode, queryString(req.query.start), queryString(req.query.end));
      page(res, report);
    })
  );

  app.get(
    "/api/report/:mode",
    route(async (req, res) => {
      const { mode } = req.params;
      if (!isReportMode(mode)) {
        res.status(400).json({ success: false, error: "Invalid report mode" });
        return;
      }
      const report = await reports.generateReport(mode, queryString(req.query.start), queryString(req.query.end));
      res.json({ success: true, ...report });
    })
  );

  app.get(
    "/api/logs",
    route((req, res) => {
      const limit = queryString(req.query.limit);
      res.json(store.listLogs({ limit: limit ? parseLogId(limit) : undefined }));
    })
  );

  app.get(
    "/api/projects",
    route((_req, res) => {
      res.json(store.getProjects());
    })
  );

  app.get(
    "/api/settings",
    route((_req, res) => {
      const stored = store.getSettings();
      const settings: Record<string, string> = {};
      for (const [key, value] of Object.entries(stored)) {
        settings[key] = maskSetting(key, value);
      }
      const effective = reports.loadSettings();
      res.json({
        success: true,
        settings,
        cliAvailable: isCommandAvailable(effective.cliCommand),
      });
    })
  );

  app.post(
    "/api/settings",
    route((req, res) => {
      const parsed = SettingsUpdateSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError("Settings must be an object of text, number or boolean values");
      }

      const updates: Record<string, string> = {};
      for (const [key, value] of Object.entries(parsed.data)) {
        if (!isSettingKey(key)) {
          throw new ValidationError(`Unknown setting "${key}"`);
        }
        const text = String(value);
        // A masked key echoed back by the UI is not a new key.
        if (key === SETTING_KEYS.apiKey && text.includes("****")) continue;
        updates[key] = text;
      }

      store.setSettings(updates);
      res.json({ success: true, updated: Object.keys(updates) });
    })
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof ValidationError) {
      res.status(400).json({ success: false, error: error.message });
      return;
    }
    logger.error("Request failed", error);
    res.status(500).json({ success: false, error: "Internal server error" });
  });

  return app;
}

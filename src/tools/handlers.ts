import { errorMessage } from "../logger.js";
import { ReportService } from "../report/service.js";
import { LogStore } from "../store/database.js";
import { LogEntry } from "../store/types.js";
import { parseLogInput, parseOptionalDate } from "../store/validation.js";
import {
  DeleteLogSchema,
  GenerateReportSchema,
  ListLogsSchema,
  LogWorkSchema,
  UpdateLogSchema,
} from "./definitions.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export interface ToolDeps {
  store: LogStore;
  reports: ReportService;
}

const DEFAULT_LIST_LIMIT = 50;

function text(value: string, isError = false): ToolResult {
  return isError
    ? { content: [{ type: "text", text: value }], isError: true }
    : { content: [{ type: "text", text: value }] };
}

export function formatEntryLine(entry: LogEntry): string {
  return `#${entry.id} ${entry.date} [${entry.project}] ${entry.description}`;
}

export async function handleToolCall(name: string, args: unknown, deps: ToolDeps): Promise<ToolResult> {
  const { store, reports } = deps;

  try {
    switch (name) {
      case "log_work": {
        const input = parseLogInput(LogWorkSchema.parse(args ?? {}));
        const entry = store.addLog(input);
        return text(`Logged entry #${entry.id}\nProject: ${entry.project}\nDate: ${entry.date}`);
      }

      case "list_logs": {
        const input = ListLogsSchema.parse(args ?? {});
        const entries = store.listLogs({
          start: parseOptionalDate(input.start, "start"),
          end: parseOptionalDate(input.end, "end"),
          limit: input.limit ?? DEFAULT_LIST_LIMIT,
        });
        if (entries.length === 0) {
          return text("No log entries found.");
        }
        return text(`Log entries (${entries.length}):\n${entries.map(formatEntryLine).join("\n")}`);
      }

      case "update_log": {
        const input = UpdateLogSchema.parse(args ?? {});
        const changes = parseLogInput(input);
        if (!store.updateLog(input.id, changes)) {
          return text(`Log entry #${input.id} not found.`, true);
        }
        return text(`Updated entry #${input.id}`);
      }

      case "delete_log": {
        const input = DeleteLogSchema.parse(args ?? {});
        if (!store.deleteLog(input.id)) {
          return text(`Log entry #${input.id} not found.`, true);
        }
        return text(`Deleted entry #${input.id}`);
      }

      case "list_projects": {
        const projects = store.getProjects();
        if (projects.length === 0) {
          return text("No projects found.");
        }
        return text(`Projects (${projects.length}):\n${projects.map((p) => `- ${p}`).join("\n")}`);
      }

      case "generate_report": {
        const input = GenerateReportSchema.parse(args ?? {});
        const report = await reports.generateReport(input.mode, input.start, input.end);
        return text(input.format === "html" ? report.html : report.text);
      }

      default:
        return text(`Unknown tool: ${name}`, true);
    }
  } catch (error) {
    return text(`Error: ${errorMessage(error)}`, true);
  }
}

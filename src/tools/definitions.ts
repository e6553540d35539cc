import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { REPORT_MODES } from "../report/dates.js";

export const LogWorkSchema = z.object({
  description: z.string().describe("What was done"),
  project: z.string().optional().describe("Project name (defaults to Misc)"),
  date: z.string().optional().describe("Date in YYYY-MM-DD format (defaults to today)"),
});

export const ListLogsSchema = z.object({
  start: z.string().optional().describe("Start date YYYY-MM-DD"),
  end: z.string().optional().describe("End date YYYY-MM-DD"),
  limit: z.number().int().positive().optional().describe("Maximum entries (default: 50)"),
});

export const UpdateLogSchema = z.object({
  id: z.number().int().positive().describe("Log entry id"),
  description: z.string().describe("New description"),
  project: z.string().optional().describe("New project name (defaults to Misc)"),
  date: z.string().optional().describe("New date YYYY-MM-DD (defaults to today)"),
});

export const DeleteLogSchema = z.object({
  id: z.number().int().positive().describe("Log entry id"),
});

export const GenerateReportSchema = z.object({
  mode: z.enum(REPORT_MODES).default("weekly").describe("Report period"),
  start: z.string().optional().describe("Custom start date YYYY-MM-DD"),
  end: z.string().optional().describe("Custom end date YYYY-MM-DD"),
  format: z.enum(["text", "html"]).default("text").describe("Output format"),
});

export type LogWorkInput = z.infer<typeof LogWorkSchema>;
export type ListLogsInput = z.infer<typeof ListLogsSchema>;
export type UpdateLogInput = z.infer<typeof UpdateLogSchema>;
export type DeleteLogInput = z.infer<typeof DeleteLogSchema>;
export type GenerateReportInput = z.infer<typeof GenerateReportSchema>;

const dateProperty = (description: string) => ({ type: "string", description });

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: "log_work",
    description: "Record a work log entry for a project on a given day.",
    inputSchema: {
      type: "object",
      properties: {
        description: { type: "string", description: "What was done" },
        project: { type: "string", description: "Project name (defaults to Misc)" },
        date: dateProperty("Date in YYYY-MM-DD format (defaults to today)"),
      },
      required: ["description"],
    },
  },
  {
    name: "list_logs",
    description: "List work log entries, newest first, optionally within a date range.",
    inputSchema: {
      type: "object",
      properties: {
        start: dateProperty("Start date YYYY-MM-DD"),
        end: dateProperty("End date YYYY-MM-DD"),
        limit: { type: "number", description: "Maximum entries (default: 50)" },
      },
    },
  },
  {
    name: "update_log",
    description: "Replace the project, description and date of an existing entry.",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "number", description: "Log entry id" },
        description: { type: "string", description: "New description" },
        project: { type: "string", description: "New project name (defaults to Misc)" },
        date: dateProperty("New date YYYY-MM-DD (defaults to today)"),
      },
      required: ["id", "description"],
    },
  },
  {
    name: "delete_log",
    description: "Delete a work log entry by id.",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "number", description: "Log entry id" },
      },
      required: ["id"],
    },
  },
  {
    name: "list_projects",
    description: "List every project name that has entries.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "generate_report",
    description:
      "Generate a weekly, biweekly or monthly report grouped by project, or a report for a custom date range.",
    inputSchema: {
      type: "object",
      properties: {
        mode: { type: "string", enum: [...REPORT_MODES], description: "Report period (default: weekly)" },
        start: dateProperty("Custom start date YYYY-MM-DD"),
        end: dateProperty("Custom end date YYYY-MM-DD"),
        format: { type: "string", enum: ["text", "html"], description: "Output format (default: text)" },
      },
    },
  },
];

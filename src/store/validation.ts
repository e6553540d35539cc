import { z } from "zod";
import { isValidDateKey, todayKey } from "../report/dates.js";
import { DEFAULT_PROJECT, NewLogEntry } from "./types.js";

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export const LogInputSchema = z.object({
  project: z.string().optional(),
  description: z.string().optional(),
  date: z.string().optional(),
});

export type LogInput = z.infer<typeof LogInputSchema>;

/**
 * Normalizes raw entry fields from any front end: blank project becomes
 * "Misc", blank date becomes today, description is required.
 */
export function parseLogInput(input: LogInput, now: Date = new Date()): NewLogEntry {
  const description = input.description?.trim() ?? "";
  if (!description) {
    throw new ValidationError("Description is required");
  }

  const project = input.project?.trim() || DEFAULT_PROJECT;

  const rawDate = input.date?.trim();
  let date: string;
  if (rawDate) {
    if (!isValidDateKey(rawDate)) {
      throw new ValidationError("Invalid date format, expected YYYY-MM-DD");
    }
    date = rawDate;
  } else {
    date = todayKey(now);
  }

  return { project, description, date };
}

export function parseLogId(value: string | number): number {
  const id = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid log id: ${value}`);
  }
  return id;
}

export function parseOptionalDate(value: string | undefined, label: string): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }
  if (!isValidDateKey(trimmed)) {
    throw new ValidationError(`Invalid ${label} date "${trimmed}", expected YYYY-MM-DD`);
  }
  return trimmed;
}

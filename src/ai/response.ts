import { z } from "zod";
import { errorMessage } from "../logger.js";
import { AISummaryResult } from "../report/assembler.js";

export const SummaryResponseSchema = z.record(
  z.string(),
  z.array(
    z.object({
      date: z.string(),
      description: z.string(),
    })
  )
);

export type ParseOutcome =
  | { ok: true; result: AISummaryResult }
  | { ok: false; reason: string };

export function stripThinking(text: string): string {
  return text
    .replace(/<think>[\s\S]*?<\/think>/gi, "")
    .replace(/<think>[\s\S]*/gi, "")
    .replace(/<\/think>/gi, "")
    .trim();
}

export function stripCodeFences(text: string): string {
  const fenced = /```[\w-]*[^\S\n]*\n?([\s\S]*?)```/.exec(text);
  if (fenced) {
    return fenced[1].trim();
  }
  // Unterminated fence: drop the opening marker.
  return text.replace(/^```[\w-]*\s*/, "").trim();
}

/** All or nothing: a response that fails the shape check is never partially applied. */
export function parseSummaryResponse(raw: string): ParseOutcome {
  const cleaned = stripCodeFences(stripThinking(raw));
  if (!cleaned) {
    return { ok: false, reason: "empty response" };
  }

  let json: unknown;
  try {
    json = JSON.parse(cleaned);
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${errorMessage(error)}` };
  }

  const result = SummaryResponseSchema.safeParse(json);
  if (!result.success) {
    return { ok: false, reason: `unexpected shape: ${result.error.issues[0]?.message ?? "unknown"}` };
  }
  return { ok: true, result: result.data };
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

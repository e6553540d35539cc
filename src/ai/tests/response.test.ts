import { describe, it, expect } from "vitest";
import { parseSummaryResponse, stripCodeFences, stripThinking, truncate } from "../response.js";

const PAYLOAD = '{"Website": [{"date": "03/14", "description": "Fixed the login flow."}]}';

describe("stripThinking", () => {
  it("removes closed and unterminated think blocks", () => {
    expect(stripThinking("<think>plan</think>\nanswer")).toBe("answer");
    expect(stripThinking("answer <think>never closed")).toBe("answer");
    expect(stripThinking("stray </think> answer")).toBe("stray  answer");
  });
});

describe("stripCodeFences", () => {
  it("takes the body of a fenced block", () => {
    expect(stripCodeFences("Here you go:\n```json\n{\"a\": 1}\n```\nThanks")).toBe('{"a": 1}');
  });

  it("drops an unterminated opening fence", () => {
    expect(stripCodeFences('```json\n{"a": 1}')).toBe('{"a": 1}');
  });

  it("leaves plain text alone", () => {
    expect(stripCodeFences('  {"a": 1} ')).toBe('{"a": 1}');
  });
});

describe("parseSummaryResponse", () => {
  it("accepts a bare JSON object", () => {
    expect(parseSummaryResponse(PAYLOAD)).toEqual({
      ok: true,
      result: { Website: [{ date: "03/14", description: "Fixed the login flow." }] },
    });
  });

  it("accepts JSON wrapped in reasoning and fences", () => {
    const outcome = parseSummaryResponse(`<think>let me see</think>\n\`\`\`json\n${PAYLOAD}\n\`\`\``);
    expect(outcome.ok).toBe(true);
  });

  it("rejects an empty response", () => {
    expect(parseSummaryResponse("<think>only thoughts</think>")).toEqual({ ok: false, reason: "empty response" });
  });

  it("rejects malformed JSON", () => {
    const outcome = parseSummaryResponse("{not json");
    expect(outcome.ok).toBe(false);
    expect(outcome.ok ? "" : outcome.reason).toMatch(/^invalid JSON: /);
  });

  it("rejects the wrong shape as a whole", () => {
    const outcome = parseSummaryResponse('{"Website": [{"date": "03/14"}], "API": []}');
    expect(outcome.ok).toBe(false);
    expect(outcome.ok ? "" : outcome.reason).toMatch(/^unexpected shape: /);
  });
});

describe("truncate", () => {
  it("cuts long text with dots", () => {
    expect(truncate("abcdef", 3)).toBe("abc...");
    expect(truncate("abc", 3)).toBe("abc");
  });
});

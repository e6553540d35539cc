import { ApiError, GoogleGenAI, type GenerateContentParameters } from "@google/genai";
import { z } from "zod";
import { AiProviderSettings, ProviderName } from "../config/settings.js";
import { errorMessage } from "../logger.js";
import { stripThinking } from "./response.js";
import { ProviderError, TextGenerationRequest, TextGenerator, TimeoutError } from "./types.js";

export const PROVIDER_DEFAULTS: Record<ProviderName, { baseUrl: string; model: string }> = {
  openai: { baseUrl: "https://api.openai.com/v1", model: "gpt-4o-mini" },
  anthropic: { baseUrl: "https://api.anthropic.com/v1", model: "claude-3-5-haiku-latest" },
  gemini: { baseUrl: "https://generativelanguage.googleapis.com", model: "gemini-2.5-flash" },
};

const ANTHROPIC_VERSION = "2023-06-01";
const TEMPERATURE = 0.2;

const OpenAIResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

export interface HttpCall {
  url: string;
  headers: Record<string, string>;
  body: unknown;
  extract: (json: unknown) => string;
}

export type ConfiguredProvider = AiProviderSettings & { apiKey: string };

/** The part of the Gemini SDK client used here. */
export interface GeminiModels {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

export interface ProviderTransport {
  fetch?: typeof fetch;
  createGemini?: (apiKey: string, baseUrl?: string) => GeminiModels;
}

function createGeminiModels(apiKey: string, baseUrl?: string): GeminiModels {
  return new GoogleGenAI({ apiKey, httpOptions: baseUrl ? { baseUrl } : undefined }).models;
}

function isAbortTimeout(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

/**
 * Direct text generation. OpenAI-compatible chat completions and the
 * Anthropic messages API go over fetch; Gemini goes through @google/genai.
 */
export class ProviderClient implements TextGenerator {
  readonly name: string;
  private settings: ConfiguredProvider;
  private fetchImpl: typeof fetch;
  private createGemini: (apiKey: string, baseUrl?: string) => GeminiModels;

  constructor(settings: ConfiguredProvider, transport: ProviderTransport = {}) {
    this.settings = settings;
    this.fetchImpl = transport.fetch ?? fetch;
    this.createGemini = transport.createGemini ?? createGeminiModels;
    this.name = `${settings.name} provider`;
  }

  get model(): string {
    return this.settings.model ?? PROVIDER_DEFAULTS[this.settings.name].model;
  }

  get baseUrl(): string {
    return (this.settings.baseUrl ?? PROVIDER_DEFAULTS[this.settings.name].baseUrl).replace(/\/+$/, "");
  }

  buildCall(request: TextGenerationRequest): HttpCall {
    const { apiKey } = this.settings;

    switch (this.settings.name) {
      case "anthropic":
        return {
          url: `${this.baseUrl}/messages`,
          headers: {
            "content-type": "application/json",
            "x-api-key": apiKey,
            "anthropic-version": ANTHROPIC_VERSION,
          },
          body: {
            model: this.model,
            max_tokens: 4096,
            temperature: TEMPERATURE,
            system: request.system,
            messages: [{ role: "user", content: request.prompt }],
          },
          extract: (json) =>
            AnthropicResponseSchema.parse(json)
              .content.map((block) => (block.type === "text" ? block.text ?? "" : ""))
              .join(""),
        };

      default:
        return {
          url: `${this.baseUrl}/chat/completions`,
          headers: {
            "content-type": "application/json",
            authorization: `Bearer ${apiKey}`,
          },
          body: {
            model: this.model,
            temperature: TEMPERATURE,
            messages: [
              { role: "system", content: request.system },
              { role: "user", content: request.prompt },
            ],
          },
          extract: (json) => OpenAIResponseSchema.parse(json).choices[0].message.content ?? "",
        };
    }
  }

  async generate(request: TextGenerationRequest): Promise<string> {
    const content =
      this.settings.name === "gemini" ? await this.generateGemini(request) : await this.generateHttp(request);

    const cleaned = stripThinking(content);
    if (!cleaned) {
      throw new ProviderError(`Invalid response from ${this.name}: missing generated content`);
    }
    return cleaned;
  }

  private async generateGemini(request: TextGenerationRequest): Promise<string> {
    const signal = AbortSignal.timeout(request.timeoutMs);
    const models = this.createGemini(this.settings.apiKey, this.settings.baseUrl);

    try {
      const response = await models.generateContent({
        model: this.model,
        contents: request.prompt,
        config: {
          systemInstruction: request.system,
          temperature: TEMPERATURE,
          abortSignal: signal,
          httpOptions: { timeout: request.timeoutMs },
        },
      });
      return response.text ?? "";
    } catch (error) {
      if (signal.aborted || isAbortTimeout(error)) {
        throw new TimeoutError(this.name, request.timeoutMs);
      }
      if (error instanceof ApiError) {
        throw new ProviderError(`${this.name} error (${error.status}): ${error.message.slice(0, 200)}`, error.status);
      }
      throw new ProviderError(`Failed to reach ${this.name}: ${errorMessage(error)}`);
    }
  }

  private async generateHttp(request: TextGenerationRequest): Promise<string> {
    const call = this.buildCall(request);
    const signal = AbortSignal.timeout(request.timeoutMs);

    let resp: Response;
    let json: unknown;
    try {
      resp = await this.fetchImpl(call.url, {
        method: "POST",
        headers: call.headers,
        body: JSON.stringify(call.body),
        signal,
      });

      if (!resp.ok) {
        const text = await resp.text().catch(() => "");
        throw new ProviderError(
          `${this.name} error (${resp.status}): ${text.slice(0, 200) || resp.statusText}`,
          resp.status
        );
      }

      json = await resp.json();
    } catch (error) {
      if (isAbortTimeout(error)) {
        throw new TimeoutError(this.name, request.timeoutMs);
      }
      if (error instanceof ProviderError) {
        throw error;
      }
      throw new ProviderError(`Failed to reach ${this.name} at ${call.url}: ${errorMessage(error)}`);
    }

    try {
      return call.extract(json);
    } catch (error) {
      throw new ProviderError(`Invalid response from ${this.name}: ${errorMessage(error)}`);
    }
  }
}

export interface TextGenerationRequest {
  system: string;
  prompt: string;
  timeoutMs: number;
  /** Project name, or "all-projects" for the batched call; names temp files. */
  label: string;
}

/** A way to turn an instruction into generated text: direct API or local CLI. */
export interface TextGenerator {
  readonly name: string;
  generate(request: TextGenerationRequest): Promise<string>;
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${Math.round(timeoutMs / 1000)}s`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ProviderError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "ProviderError";
    this.status = status;
  }
}

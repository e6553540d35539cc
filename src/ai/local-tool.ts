import { existsSync } from "fs";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { CommandRunner, runCommand } from "./process.js";
import { TextGenerationRequest, TextGenerator } from "./types.js";

export interface LocalToolOptions {
  command: string;
  runner?: CommandRunner;
  /** Parent of the per-call private directory. */
  tempRoot?: string;
}

export function slugify(label: string): string {
  const slug = label
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 40);
  return slug || "project";
}

export function resultFileName(label: string, stamp: bigint = process.hrtime.bigint()): string {
  return `summary_${slugify(label)}_${stamp}.json`;
}

/**
 * Text generation through a local CLI agent. The tool gets the prompt as an
 * argument and is asked to write its answer to a file in a private temp
 * directory; stdout is used when no file appears.
 */
export class LocalToolClient implements TextGenerator {
  readonly name: string;
  private command: string;
  private runner: CommandRunner;
  private tempRoot: string;

  constructor(options: LocalToolOptions) {
    this.command = options.command;
    this.name = `local tool "${options.command}"`;
    this.runner = options.runner ?? runCommand;
    this.tempRoot = options.tempRoot ?? tmpdir();
  }

  buildArgs(prompt: string): string[] {
    return ["-y", prompt];
  }

  async generate(request: TextGenerationRequest): Promise<string> {
    const workDir = await mkdtemp(join(this.tempRoot, `worklog-${process.pid}-`));
    const resultFile = join(workDir, resultFileName(request.label));

    try {
      const prompt = [
        request.system,
        request.prompt,
        `Write the JSON answer, and nothing else, to this file: ${resultFile}`,
      ].join("\n\n");

      // The tool runs inside the private directory so its file write stays there.
      const result = await this.runner(this.command, this.buildArgs(prompt), {
        timeoutMs: request.timeoutMs,
        cwd: workDir,
      });

      if (existsSync(resultFile)) {
        return await readFile(resultFile, "utf-8");
      }
      if (result.stdout.trim()) {
        return result.stdout;
      }
      throw new Error(`${this.command} produced no output`);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}

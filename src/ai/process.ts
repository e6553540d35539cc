import { spawn } from "child_process";
import { accessSync, constants, statSync } from "fs";
import { delimiter, isAbsolute, join } from "path";
import { TimeoutError } from "./types.js";

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  timeoutMs: number;
  cwd?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: RunCommandOptions
) => Promise<CommandResult>;

/**
 * Runs a command with stdin closed and a hard deadline. The child is killed
 * when the deadline passes and the promise rejects with a TimeoutError once
 * it has exited.
 */
export const runCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    let stdout = "";
    let stderr = "";
    let settled = false;
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, options.timeoutMs);

    // Rejects once the killed child is gone, so callers can remove its working directory.
    child.on("exit", () => {
      if (settled || !timedOut) return;
      settled = true;
      reject(new TimeoutError(command, options.timeoutMs));
    });

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(error);
    });

    child.on("close", (code) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (code === 0) {
        resolve({ stdout, stderr });
      } else {
        const detail = stderr.trim().slice(0, 200);
        reject(new Error(`${command} exited with code ${code}${detail ? `: ${detail}` : ""}`));
      }
    });
  });

function isExecutableFile(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/** Looks the command up on PATH the way a shell would, without running it. */
export function isCommandAvailable(command: string, envPath: string = process.env.PATH ?? ""): boolean {
  if (!command) return false;

  if (isAbsolute(command) || command.includes("/") || command.includes("\\")) {
    return isExecutableFile(command);
  }

  const extensions =
    process.platform === "win32"
      ? (process.env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";").filter(Boolean)
      : [""];

  for (const dir of envPath.split(delimiter).filter(Boolean)) {
    for (const ext of extensions) {
      if (isExecutableFile(join(dir, command + ext))) {
        return true;
      }
    }
  }
  return false;
}
